// ──────────────────────────────────────────────
// Recursive Witness  –  Shared Type Definitions
// ──────────────────────────────────────────────

/** Every mode the recursion loop understands, in display order. */
export const THOUGHT_MODES = [
  'standard',
  'poetic',
  'philosophical',
  'scientific',
  'psychological',
  'mystical',
] as const;

/** Named preset controlling prompt phrasing, temperature and decoration. */
export type ThoughtMode = (typeof THOUGHT_MODES)[number];

/** One step of a contemplation: the input fed to the model and what came back. */
export interface ThoughtRecord {
  depth: number;
  input: string;
  output: string;
  mode: ThoughtMode;
  timestamp: string;
}

/** A line of the per-day thought log. */
export interface ThoughtLogEntry {
  timestamp: string;
  input: string;
  output: string;
  mode: ThoughtMode;
  model: string;
}

export interface ModeInfo {
  mode: ThoughtMode;
  description: string;
  temperature: number;
}

export interface SystemStatus {
  status: 'active';
  model: string;
  thoughts_processed: number;
  uptime: string;
  modes_available: ThoughtMode[];
}

export type ThoughtErrorCode =
  | 'llm_unreachable' // Runtime not listening / connection refused
  | 'llm_error'       // Runtime answered with an error
  | 'empty_response'; // Completion came back without text

export interface ThoughtError {
  code: ThoughtErrorCode;
  message: string;
}

export type ContemplationStatus = 'completed' | 'halted';
