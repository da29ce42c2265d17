import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { THOUGHT_MODES } from '@recursive-witness/shared';
import type { GenerateRequest, GenerateResponse } from '../llm/types.js';
import type { FailurePolicy } from '../config.js';
import type { Chooser } from './decorate.js';
import { RecursionEngine, formatUptime, placeholderOutput } from './engine.js';
import { ThoughtLog } from './thoughtLog.js';

function lastContent(request: GenerateRequest): string {
  return request.messages[request.messages.length - 1]?.content ?? '';
}

function echoClient() {
  return {
    generate: vi.fn(async (request: GenerateRequest): Promise<GenerateResponse> => ({
      content: `reply to ${lastContent(request)}`,
      finishReason: 'stop',
    })),
  };
}

/** Echoes, except the `failOn`-th call (1-based) throws `error`. */
function failingClient(failOn: number, error: Error) {
  let calls = 0;
  return {
    generate: vi.fn(async (request: GenerateRequest): Promise<GenerateResponse> => {
      calls++;
      if (calls === failOn) throw error;
      return { content: `reply to ${lastContent(request)}`, finishReason: 'stop' };
    }),
  };
}

const firstFrame: Chooser = (items) => items[0];

describe('RecursionEngine', () => {
  let dir: string;
  let clock: Date;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'recursion-engine-'));
    clock = new Date('2026-03-04T10:00:00.000Z');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function makeEngine(client: { generate: (r: GenerateRequest) => Promise<GenerateResponse> }, failurePolicy: FailurePolicy = 'halt') {
    const thoughtLog = new ThoughtLog(dir);
    const engine = new RecursionEngine({
      client,
      model: 'test-model',
      thoughtLog,
      failurePolicy,
      choose: firstFrame,
      now: () => clock,
    });
    return { engine, thoughtLog };
  }

  it('chains three philosophical steps from the seed', async () => {
    const client = echoClient();
    const { engine } = makeEngine(client);

    const result = await engine.contemplate('What is consciousness?', 3, 'philosophical');

    expect(result.status).toBe('completed');
    expect(result.error).toBeUndefined();
    expect(result.thoughts).toHaveLength(3);

    const [first, second, third] = result.thoughts;
    expect(first?.input).toBe('What is consciousness?');
    expect(first?.output).toBe('reply to Analyze philosophically: What is consciousness?');
    expect(second?.input).toBe(first?.output);
    expect(second?.output).toBe(`reply to Analyze philosophically: ${first?.output}`);
    expect(third?.input).toBe(second?.output);
    expect(result.thoughts.map((t) => t.mode)).toEqual(['philosophical', 'philosophical', 'philosophical']);
    expect(result.thoughts.map((t) => t.depth)).toEqual([1, 2, 3]);
    expect(first?.timestamp).toBe('2026-03-04T10:00:00.000Z');
  });

  it('returns exactly N chained records for every depth from 1 to 10', async () => {
    const { engine } = makeEngine(echoClient());

    for (let depth = 1; depth <= 10; depth++) {
      const { thoughts } = await engine.contemplate('seed', depth, 'standard');
      expect(thoughts).toHaveLength(depth);
      expect(thoughts[0]?.input).toBe('seed');
      for (let k = 1; k < thoughts.length; k++) {
        expect(thoughts[k]?.input).toBe(thoughts[k - 1]?.output);
      }
    }
  });

  it('rejects depths outside 1..10', async () => {
    const client = echoClient();
    const { engine } = makeEngine(client);

    await expect(engine.contemplate('seed', 0)).rejects.toThrow(RangeError);
    await expect(engine.contemplate('seed', 11)).rejects.toThrow(RangeError);
    await expect(engine.contemplate('seed', 2.5)).rejects.toThrow(RangeError);
    expect(client.generate).not.toHaveBeenCalled();
  });

  it('calls the model with the mode temperature and a single user message', async () => {
    const client = echoClient();
    const { engine } = makeEngine(client);

    await engine.think('light', 'scientific');
    await engine.think('light', 'mystical');

    expect(client.generate).toHaveBeenNthCalledWith(1, {
      model: 'test-model',
      messages: [{ role: 'user', content: 'Explain scientifically: light' }],
      temperature: 0.5,
    });
    expect(client.generate.mock.calls[1]?.[0].temperature).toBe(1.0);
  });

  it('uses the table temperature for every mode', async () => {
    const expected = { standard: 0.7, poetic: 0.9, philosophical: 0.8, scientific: 0.5, psychological: 0.75, mystical: 1.0 };
    const client = echoClient();
    const { engine } = makeEngine(client);

    for (const mode of THOUGHT_MODES) {
      await engine.think('x', mode);
      expect(client.generate.mock.lastCall?.[0].temperature).toBe(expected[mode]);
    }
  });

  it('decorates poetic and mystical output and leaves other modes raw', async () => {
    const { engine } = makeEngine(echoClient());

    expect(await engine.think('sea', 'poetic')).toEqual({
      ok: true,
      output: '🌌 Cosmic Reflection:\nreply to Respond poetically about: sea\n---',
    });
    expect(await engine.think('sea', 'mystical')).toEqual({
      ok: true,
      output: '🔮 Mystical Vision:\nreply to Respond mystically about: sea\n---',
    });
    expect(await engine.think('sea', 'psychological')).toEqual({
      ok: true,
      output: 'reply to Analyze from psychological perspective: sea',
    });
  });

  it('writes one log line per step with the required fields', async () => {
    const { engine, thoughtLog } = makeEngine(echoClient());

    await engine.contemplate('seed', 3, 'scientific');

    const content = await readFile(join(dir, 'thoughts_20260304.ndjson'), 'utf-8');
    const lines = content.trimEnd().split('\n');
    expect(lines).toHaveLength(3);
    for (const line of lines) {
      const parsed: unknown = JSON.parse(line);
      expect(parsed).toEqual({
        timestamp: '2026-03-04T10:00:00.000Z',
        input: expect.any(String),
        output: expect.any(String),
        mode: 'scientific',
        model: 'test-model',
      });
    }
    expect(thoughtLog.count()).toBe(3);
  });

  describe('halt policy', () => {
    it('stops at the first failed step and keeps the completed records', async () => {
      const { engine, thoughtLog } = makeEngine(failingClient(2, new Error('model exploded')), 'halt');

      const result = await engine.contemplate('seed', 4, 'standard');

      expect(result.status).toBe('halted');
      expect(result.thoughts).toHaveLength(1);
      expect(result.error).toEqual({ code: 'llm_error', message: 'model exploded' });
      expect(thoughtLog.count()).toBe(1);
    });
  });

  describe('placeholder policy', () => {
    it('substitutes the error text and continues', async () => {
      const client = failingClient(2, new Error('boom'));
      const { engine, thoughtLog } = makeEngine(client, 'placeholder');

      const result = await engine.contemplate('seed', 3, 'standard');

      expect(result.status).toBe('completed');
      expect(result.error).toEqual({ code: 'llm_error', message: 'boom' });
      expect(result.thoughts).toHaveLength(3);
      expect(result.thoughts[1]?.output).toBe('Contemplation error: boom');
      expect(result.thoughts[2]?.input).toBe('Contemplation error: boom');
      expect(result.thoughts[2]?.output).toBe('reply to Contemplation error: boom');
      // Placeholders are never logged as thoughts
      expect(thoughtLog.count()).toBe(2);
    });
  });

  it('classifies connection failures as an unreachable runtime', async () => {
    const error = new Error('Connection error.');
    error.name = 'APIConnectionError';
    const { engine } = makeEngine(failingClient(1, error));

    expect(await engine.think('x')).toEqual({
      ok: false,
      error: { code: 'llm_unreachable', message: 'Connection error.' },
    });
  });

  it('treats an empty completion as a failure', async () => {
    const client = {
      generate: vi.fn(async (): Promise<GenerateResponse> => ({ content: '  ', finishReason: 'stop' })),
    };
    const { engine, thoughtLog } = makeEngine(client);

    expect(await engine.think('x')).toEqual({
      ok: false,
      error: { code: 'empty_response', message: 'Model returned an empty response' },
    });
    expect(thoughtLog.count()).toBe(0);
  });

  it('reports uptime, logged thoughts, model and modes', async () => {
    const { engine } = makeEngine(echoClient());
    await engine.contemplate('seed', 2, 'standard');

    clock = new Date(clock.getTime() + 3_723_000);

    expect(engine.getSystemStats()).toEqual({
      uptime: '1:02:03',
      totalThoughts: 2,
      activeModel: 'test-model',
      modesAvailable: [...THOUGHT_MODES],
    });
  });
});

describe('formatUptime', () => {
  it('formats hours, minutes and seconds', () => {
    expect(formatUptime(0)).toBe('0:00:00');
    expect(formatUptime(59_999)).toBe('0:00:59');
    expect(formatUptime(26 * 3600 * 1000 + 5_000)).toBe('26:00:05');
  });
});

describe('placeholderOutput', () => {
  it('prefixes the error message', () => {
    expect(placeholderOutput({ code: 'llm_error', message: 'nope' })).toBe('Contemplation error: nope');
  });
});
