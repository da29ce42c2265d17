import { THOUGHT_MODES } from '@recursive-witness/shared';
import type { ModeInfo, ThoughtMode } from '@recursive-witness/shared';

interface ModeProfile {
  description: string;
  temperature: number;
  /** Instruction wrapped around the current input; `null` sends the input as is. */
  prefix: string | null;
}

const MODE_PROFILES: Record<ThoughtMode, ModeProfile> = {
  standard: {
    description: 'Standard recursive thought generation',
    temperature: 0.7,
    prefix: null,
  },
  poetic: {
    description: 'Poetic and metaphorical responses',
    temperature: 0.9,
    prefix: 'Respond poetically about',
  },
  philosophical: {
    description: 'Philosophical analysis and reflection',
    temperature: 0.8,
    prefix: 'Analyze philosophically',
  },
  scientific: {
    description: 'Scientific explanation and reasoning',
    temperature: 0.5,
    prefix: 'Explain scientifically',
  },
  psychological: {
    description: 'Psychological perspective and analysis',
    temperature: 0.75,
    prefix: 'Analyze from psychological perspective',
  },
  mystical: {
    description: 'Mystical and esoteric interpretations',
    temperature: 1.0,
    prefix: 'Respond mystically about',
  },
};

export const DEFAULT_MODE: ThoughtMode = 'standard';

export function isThoughtMode(value: unknown): value is ThoughtMode {
  return THOUGHT_MODES.some((mode) => mode === value);
}

/** Case-insensitive lookup used by chat commands; `null` when unknown. */
export function parseThoughtMode(text: string): ThoughtMode | null {
  const normalized = text.trim().toLowerCase();
  return isThoughtMode(normalized) ? normalized : null;
}

export function formatPrompt(input: string, mode: ThoughtMode): string {
  const { prefix } = MODE_PROFILES[mode];
  return prefix ? `${prefix}: ${input}` : input;
}

export function getTemperature(mode: ThoughtMode): number {
  return MODE_PROFILES[mode].temperature;
}

export function getModeDescription(mode: ThoughtMode): string {
  return MODE_PROFILES[mode].description;
}

export function describeModes(): ModeInfo[] {
  return THOUGHT_MODES.map((mode) => ({
    mode,
    description: MODE_PROFILES[mode].description,
    temperature: MODE_PROFILES[mode].temperature,
  }));
}
