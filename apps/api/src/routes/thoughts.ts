import type { FastifyPluginAsync } from 'fastify';
import type { ModeInfo, SystemStatus, ThoughtRecord } from '@recursive-witness/shared';
import type { RecursionEngine } from '../recursion/engine.js';
import { describeModes } from '../recursion/modes.js';
import { parseOrReply400 } from './validation.js';
import {
  ContemplateRequestSchema,
  HaltedContemplationSchema,
  ModeInfoSchema,
  SystemStatusSchema,
  ThoughtRecordSchema,
} from './schemas.js';

export interface ThoughtRoutesOptions {
  engine: RecursionEngine;
}

export const thoughtRoutes: FastifyPluginAsync<ThoughtRoutesOptions> = async (app, { engine }) => {
  // ── Recursive contemplation ────────────────
  app.post('/contemplate', async (request, reply) => {
    const body = parseOrReply400(reply, ContemplateRequestSchema, request.body);
    if (!body) return reply;

    const result = await engine.contemplate(body.prompt, body.depth, body.mode);

    if (result.status === 'halted') {
      request.log.warn(
        { error: result.error, completed: result.thoughts.length, depth: body.depth },
        '[contemplate] Recursion halted',
      );
      return reply.status(502).send(HaltedContemplationSchema.parse({
        error: 'Contemplation halted',
        details: result.error,
        thoughts: result.thoughts,
      }));
    }

    const thoughts: ThoughtRecord[] = ThoughtRecordSchema.array().parse(result.thoughts);
    return reply.send(thoughts);
  });

  // ── System status ──────────────────────────
  app.get('/status', async () => {
    const stats = engine.getSystemStats();
    const status: SystemStatus = SystemStatusSchema.parse({
      status: 'active',
      model: stats.activeModel,
      thoughts_processed: stats.totalThoughts,
      uptime: stats.uptime,
      modes_available: stats.modesAvailable,
    });
    return status;
  });

  // ── Mode catalogue ─────────────────────────
  app.get('/modes', async () => {
    const modes: ModeInfo[] = ModeInfoSchema.array().parse(describeModes());
    return modes;
  });
};
