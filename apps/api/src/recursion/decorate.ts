import type { ThoughtMode } from '@recursive-witness/shared';

/** Picks one element of a non-empty list. Injected so tests can pin the frame. */
export type Chooser = <T>(items: readonly [T, ...T[]]) => T;

type Frame = (text: string) => string;

const POETIC_FRAMES: readonly [Frame, ...Frame[]] = [
  (text) => `🌌 Cosmic Reflection:\n${text}\n---`,
  (text) => `🌀 Recursive Echo:\n${text}\n---`,
  (text) => `🪞 Mirror of Consciousness:\n${text}\n---`,
  (text) => `⚛️ Quantum Thought:\n${text}\n---`,
];

const MYSTICAL_FRAMES: readonly [Frame, ...Frame[]] = [
  (text) => `🔮 Mystical Vision:\n${text}\n---`,
  (text) => `🌠 Cosmic Revelation:\n${text}\n---`,
  (text) => `🕳️ Void Whisper:\n${text}\n---`,
];

const FRAMES_BY_MODE: Partial<Record<ThoughtMode, readonly [Frame, ...Frame[]]>> = {
  poetic: POETIC_FRAMES,
  mystical: MYSTICAL_FRAMES,
};

export const randomChoice: Chooser = (items) => {
  const index = Math.floor(Math.random() * items.length);
  return items[index] ?? items[0];
};

export function decorateThought(text: string, mode: ThoughtMode, choose: Chooser = randomChoice): string {
  const frames = FRAMES_BY_MODE[mode];
  if (!frames) return text;
  return choose(frames)(text);
}
