import type { ThoughtMode } from '@recursive-witness/shared';
import { DEFAULT_MODE } from '../recursion/modes.js';

/** Per-chat settings a command runs with. */
export interface ChatSession {
  chatId: string;
  mode: ThoughtMode;
}

/**
 * Chat sessions keyed by chat id. Each chat keeps its own mode, so a
 * `!mode` in one chat does not change what another chat gets.
 */
export class ChatSessionStore {
  private sessions = new Map<string, ChatSession>();

  constructor(private readonly defaultMode: ThoughtMode = DEFAULT_MODE) {}

  get(chatId: string): ChatSession {
    const existing = this.sessions.get(chatId);
    if (existing) return existing;

    const session: ChatSession = { chatId, mode: this.defaultMode };
    this.sessions.set(chatId, session);
    return session;
  }

  setMode(chatId: string, mode: ThoughtMode): ChatSession {
    const session: ChatSession = { ...this.get(chatId), mode };
    this.sessions.set(chatId, session);
    return session;
  }
}
