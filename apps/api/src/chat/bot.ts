import type { ThoughtError, ThoughtMode, ThoughtRecord } from '@recursive-witness/shared';
import type { RecursionEngine } from '../recursion/engine.js';
import { describeModes, getTemperature, parseThoughtMode } from '../recursion/modes.js';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import { parseChatCommand, type ChatCommand } from './commands.js';
import { ChatSessionStore, type ChatSession } from './sessions.js';

export type SendMessage = (chatId: string, text: string) => Promise<void>;

export interface ChatBotOptions {
  engine: Pick<RecursionEngine, 'contemplate'>;
  send: SendMessage;
  sessions?: ChatSessionStore;
  /** Steps per `!think`. */
  depth?: number;
  /** Pause between streamed thought messages. */
  pacingMs?: number;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

// ── Message formatting (Telegram Markdown) ───

export function formatRecursionHeader(mode: ThoughtMode, seed: string): string {
  return `🌀 *Initiating ${capitalize(mode)} Recursion:*\n_'${seed}'_`;
}

export function formatThought(thought: ThoughtRecord): string {
  return `*Depth ${thought.depth} (${thought.mode}):*\n${thought.output}\n\`${thought.timestamp}\``;
}

export function formatHalted(completed: number, error: ThoughtError): string {
  return `⚠️ Recursion halted after ${completed} step(s): ${error.message}`;
}

export function formatProcessingError(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return `⚠️ Error: ${message}`;
}

export function formatModeChanged(mode: ThoughtMode): string {
  return `🔄 Mode changed to *${mode}*\nTemperature setting: ${getTemperature(mode)}`;
}

export function formatModeList(): string {
  const lines = describeModes().map(
    (info) => `- *${info.mode}*: ${info.description} (temp: ${info.temperature})`,
  );
  return `🔮 *Available Thinking Modes:*\n${lines.join('\n')}`;
}

export function formatStartupMessage(mode: ThoughtMode): string {
  return [
    '🌀 *Recursive Witness Online*',
    `🔮 Default mode: *${mode}*`,
    '📝 Commands:',
    '`!think [prompt]` - Generate recursive thoughts',
    '`!mode [mode]` - Change thinking mode',
    '`!modes` - List available modes',
  ].join('\n');
}

/**
 * Chat front end over the recursion engine. Transport-agnostic: the
 * caller supplies `send`, the bot decides what to say.
 */
export class ChatBot {
  private readonly engine: Pick<RecursionEngine, 'contemplate'>;
  private readonly send: SendMessage;
  readonly sessions: ChatSessionStore;
  private readonly depth: number;
  private readonly pacingMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: Logger;

  constructor(options: ChatBotOptions) {
    this.engine = options.engine;
    this.send = options.send;
    this.sessions = options.sessions ?? new ChatSessionStore();
    this.depth = options.depth ?? 3;
    this.pacingMs = options.pacingMs ?? 1000;
    this.sleep = options.sleep ?? sleep;
    this.logger = options.logger ?? silentLogger;
  }

  /** Run the command in `text`, if any. Returns the command that ran. */
  async handleMessage(chatId: string, text: string): Promise<ChatCommand | null> {
    const command = parseChatCommand(text);
    if (!command) return null;

    const session = this.sessions.get(chatId);
    this.logger.debug({ chatId, command: command.kind, mode: session.mode }, '[chat] Command received');

    switch (command.kind) {
      case 'think':
        await this.processThought(session, command.seed);
        break;
      case 'mode':
        await this.changeMode(session, command.name);
        break;
      case 'modes':
        await this.listModes(session);
        break;
    }
    return command;
  }

  async announce(chatId: string): Promise<void> {
    await this.send(chatId, formatStartupMessage(this.sessions.get(chatId).mode));
  }

  /** Tell the chat that a command failed. */
  async reportError(chatId: string, error: unknown): Promise<void> {
    await this.send(chatId, formatProcessingError(error));
  }

  private async processThought(session: ChatSession, seed: string): Promise<void> {
    await this.send(session.chatId, formatRecursionHeader(session.mode, seed));

    const result = await this.engine.contemplate(seed, this.depth, session.mode);

    for (const [index, thought] of result.thoughts.entries()) {
      if (index > 0) {
        await this.sleep(this.pacingMs);
      }
      await this.send(session.chatId, formatThought(thought));
    }

    if (result.status === 'halted' && result.error) {
      if (result.thoughts.length > 0) {
        await this.sleep(this.pacingMs);
      }
      await this.send(session.chatId, formatHalted(result.thoughts.length, result.error));
    }
  }

  private async changeMode(session: ChatSession, name: string): Promise<void> {
    const mode = parseThoughtMode(name);
    if (!mode) {
      await this.listModes(session);
      return;
    }

    this.sessions.setMode(session.chatId, mode);
    await this.send(session.chatId, formatModeChanged(mode));
  }

  private async listModes(session: ChatSession): Promise<void> {
    await this.send(session.chatId, formatModeList());
  }
}
