export type ChatCommand =
  | { kind: 'think'; seed: string }
  | { kind: 'mode'; name: string }
  | { kind: 'modes' };

export const DEFAULT_SEED = 'What is the nature of consciousness?';

// `!think`, `!mode`, `!modes`; Telegram's `/cmd` and `/cmd@botname` forms work too.
const COMMAND_PATTERN = /^[!/](think|modes|mode)(?:@\w+)?(?:\s+([\s\S]*))?$/i;

export function parseChatCommand(text: string): ChatCommand | null {
  const match = COMMAND_PATTERN.exec(text.trim());
  if (!match) return null;

  const name = (match[1] ?? '').toLowerCase();
  const argument = (match[2] ?? '').trim();

  switch (name) {
    case 'think':
      return { kind: 'think', seed: argument || DEFAULT_SEED };
    case 'mode':
      return { kind: 'mode', name: argument };
    case 'modes':
      return { kind: 'modes' };
    default:
      return null;
  }
}
