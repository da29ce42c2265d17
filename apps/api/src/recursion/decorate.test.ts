import { describe, expect, it } from 'vitest';
import { THOUGHT_MODES, type ThoughtMode } from '@recursive-witness/shared';
import { decorateThought, randomChoice, type Chooser } from './decorate.js';

/** Every frame `mode` can put around `text`, found by pinning the chooser to each index. */
function possibleDecorations(text: string, mode: ThoughtMode): string[] {
  let count = 0;
  const measure: Chooser = (items) => {
    count = items.length;
    return items[0];
  };
  decorateThought(text, mode, measure);
  return Array.from({ length: count }, (_, i) => decorateThought(text, mode, (items) => items[i] ?? items[0]));
}

const first: Chooser = (items) => items[0];
const last: Chooser = (items) => items[items.length - 1] ?? items[0];

describe('decorateThought', () => {
  it('frames poetic output with the chosen template', () => {
    expect(decorateThought('waves', 'poetic', first)).toBe('🌌 Cosmic Reflection:\nwaves\n---');
    expect(decorateThought('waves', 'poetic', last)).toBe('⚛️ Quantum Thought:\nwaves\n---');
  });

  it('frames mystical output with the chosen template', () => {
    expect(decorateThought('stars', 'mystical', first)).toBe('🔮 Mystical Vision:\nstars\n---');
    expect(decorateThought('stars', 'mystical', last)).toBe('🕳️ Void Whisper:\nstars\n---');
  });

  it('passes other modes through unchanged', () => {
    let calls = 0;
    const choose: Chooser = (items) => {
      calls++;
      return items[0];
    };
    for (const mode of ['standard', 'philosophical', 'scientific', 'psychological'] as const) {
      expect(decorateThought('plain text', mode, choose)).toBe('plain text');
    }
    expect(calls).toBe(0);
  });

  it('offers four poetic and three mystical frames', () => {
    expect(possibleDecorations('x', 'poetic')).toHaveLength(4);
    expect(possibleDecorations('x', 'mystical')).toHaveLength(3);
    expect(possibleDecorations('x', 'standard')).toEqual([]);
  });

  it('always lands on one of the mode frames with the random chooser', () => {
    for (const mode of THOUGHT_MODES) {
      const frames = possibleDecorations('echo', mode);
      for (let i = 0; i < 20; i++) {
        const decorated = decorateThought('echo', mode, randomChoice);
        if (frames.length === 0) {
          expect(decorated).toBe('echo');
        } else {
          expect(frames).toContain(decorated);
        }
      }
    }
  });
});
