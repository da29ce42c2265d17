import { z } from 'zod';
import { THOUGHT_MODES } from '@recursive-witness/shared';
import { MAX_DEPTH, MIN_DEPTH } from '../recursion/engine.js';

export const ThoughtModeSchema = z.enum(THOUGHT_MODES);

export const ContemplateRequestSchema = z.object({
  prompt: z.string().refine((value) => value.trim().length > 0, 'prompt must not be empty'),
  depth: z.number().int().min(MIN_DEPTH).max(MAX_DEPTH).default(3),
  mode: ThoughtModeSchema.default('standard'),
});

export type ContemplateRequest = z.infer<typeof ContemplateRequestSchema>;

export const ThoughtRecordSchema = z.object({
  depth: z.number().int().min(1),
  input: z.string(),
  output: z.string(),
  mode: ThoughtModeSchema,
  timestamp: z.string().datetime(),
});

export const ThoughtErrorSchema = z.object({
  code: z.enum(['llm_unreachable', 'llm_error', 'empty_response']),
  message: z.string(),
});

export const HaltedContemplationSchema = z.object({
  error: z.literal('Contemplation halted'),
  details: ThoughtErrorSchema,
  thoughts: z.array(ThoughtRecordSchema),
});

export const SystemStatusSchema = z.object({
  status: z.literal('active'),
  model: z.string(),
  thoughts_processed: z.number().int().min(0),
  uptime: z.string(),
  modes_available: z.array(ThoughtModeSchema),
});

export const ModeInfoSchema = z.object({
  mode: ThoughtModeSchema,
  description: z.string(),
  temperature: z.number(),
});
