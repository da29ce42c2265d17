// ──────────────────────────────────────────────
// Recursive Witness  –  Recursion Engine
// Feeds each model response back in as the next
// prompt for a fixed number of steps.
// ──────────────────────────────────────────────

import { THOUGHT_MODES } from '@recursive-witness/shared';
import type {
  ContemplationStatus,
  ThoughtError,
  ThoughtErrorCode,
  ThoughtMode,
  ThoughtRecord,
} from '@recursive-witness/shared';
import type { CompletionClient } from '../llm/types.js';
import type { FailurePolicy } from '../config.js';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import { decorateThought, randomChoice, type Chooser } from './decorate.js';
import { DEFAULT_MODE, formatPrompt, getTemperature } from './modes.js';
import type { ThoughtLog } from './thoughtLog.js';

export const MIN_DEPTH = 1;
export const MAX_DEPTH = 10;

export type ThoughtResult =
  | { ok: true; output: string }
  | { ok: false; error: ThoughtError };

export interface ContemplationResult {
  status: ContemplationStatus;
  thoughts: ThoughtRecord[];
  /** Set when a step failed, whichever policy handled it. */
  error?: ThoughtError;
}

export interface SystemStats {
  uptime: string;
  totalThoughts: number;
  activeModel: string;
  modesAvailable: ThoughtMode[];
}

export interface RecursionEngineOptions {
  client: CompletionClient;
  model: string;
  thoughtLog: ThoughtLog;
  failurePolicy?: FailurePolicy;
  choose?: Chooser;
  now?: () => Date;
  logger?: Logger;
}

/** `H:MM:SS`, hours unbounded. */
export function formatUptime(ms: number): string {
  const totalSeconds = Math.max(0, Math.floor(ms / 1000));
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  return `${hours}:${String(minutes).padStart(2, '0')}:${String(seconds).padStart(2, '0')}`;
}

export function placeholderOutput(error: ThoughtError): string {
  return `Contemplation error: ${error.message}`;
}

function classifyError(err: unknown): ThoughtErrorCode {
  if (!(err instanceof Error)) return 'llm_error';

  const msg = err.message.toLowerCase();
  if (err.name === 'APIConnectionError') return 'llm_unreachable';
  if (msg.includes('econnrefused') || msg.includes('fetch failed') || msg.includes('connection')) {
    return 'llm_unreachable';
  }
  return 'llm_error';
}

/**
 * The RecursionEngine is the only place that talks to the model.
 *
 * Flow per step:
 *   input → mode prompt → completion (mode temperature)
 *     → decoration (poetic / mystical only) → thought log → next input
 */
export class RecursionEngine {
  readonly model: string;
  readonly failurePolicy: FailurePolicy;
  private readonly client: CompletionClient;
  private readonly thoughtLog: ThoughtLog;
  private readonly choose: Chooser;
  private readonly now: () => Date;
  private readonly logger: Logger;
  private readonly startedAt: Date;

  constructor(options: RecursionEngineOptions) {
    this.client = options.client;
    this.model = options.model;
    this.thoughtLog = options.thoughtLog;
    this.failurePolicy = options.failurePolicy ?? 'halt';
    this.choose = options.choose ?? randomChoice;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? silentLogger;
    this.startedAt = this.now();
  }

  /** One model call for `input`, decorated and logged on success. */
  async think(input: string, mode: ThoughtMode = DEFAULT_MODE): Promise<ThoughtResult> {
    let content: string;
    try {
      const response = await this.client.generate({
        model: this.model,
        messages: [{ role: 'user', content: formatPrompt(input, mode) }],
        temperature: getTemperature(mode),
      });
      content = response.content;
    } catch (err) {
      const error: ThoughtError = {
        code: classifyError(err),
        message: err instanceof Error ? err.message : String(err),
      };
      this.logger.warn({ err, mode }, `[recursion] Model call failed (${error.code})`);
      return { ok: false, error };
    }

    if (!content.trim()) {
      return { ok: false, error: { code: 'empty_response', message: 'Model returned an empty response' } };
    }

    const output = decorateThought(content, mode, this.choose);
    await this.thoughtLog.append({
      timestamp: this.now().toISOString(),
      input,
      output,
      mode,
      model: this.model,
    });
    return { ok: true, output };
  }

  /**
   * Run `depth` sequential steps starting from `seed`. Step k's input is
   * step k-1's output. How a failed step is handled depends on the
   * engine's failure policy.
   */
  async contemplate(seed: string, depth: number, mode: ThoughtMode = DEFAULT_MODE): Promise<ContemplationResult> {
    if (!Number.isInteger(depth) || depth < MIN_DEPTH || depth > MAX_DEPTH) {
      throw new RangeError(`depth must be an integer between ${MIN_DEPTH} and ${MAX_DEPTH}, got ${depth}`);
    }

    const thoughts: ThoughtRecord[] = [];
    let current = seed;
    let firstError: ThoughtError | undefined;

    for (let step = 1; step <= depth; step++) {
      const result = await this.think(current, mode);

      let output: string;
      if (result.ok) {
        output = result.output;
      } else {
        firstError ??= result.error;
        if (this.failurePolicy === 'halt') {
          this.logger.info({ step, depth, mode }, '[recursion] Contemplation halted');
          return { status: 'halted', thoughts, error: result.error };
        }
        output = placeholderOutput(result.error);
      }

      thoughts.push({
        depth: step,
        input: current,
        output,
        mode,
        timestamp: this.now().toISOString(),
      });
      current = output;
    }

    return firstError
      ? { status: 'completed', thoughts, error: firstError }
      : { status: 'completed', thoughts };
  }

  getSystemStats(): SystemStats {
    return {
      uptime: formatUptime(this.now().getTime() - this.startedAt.getTime()),
      totalThoughts: this.thoughtLog.count(),
      activeModel: this.model,
      modesAvailable: [...THOUGHT_MODES],
    };
  }
}
