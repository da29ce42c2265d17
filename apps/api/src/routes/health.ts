import type { FastifyPluginAsync } from 'fastify';
import type { LLMProviderAdapter } from '../llm/types.js';

export interface HealthSnapshot {
  status: 'ok' | 'degraded';
  timestamp: string;
  model: string;
  llm: {
    provider: string;
    reachable: boolean;
    error: string | null;
  };
}

export interface HealthRoutesOptions {
  provider: Pick<LLMProviderAdapter, 'name' | 'ping'>;
  model: string;
}

export const healthRoutes: FastifyPluginAsync<HealthRoutesOptions> = async (app, { provider, model }) => {
  app.get('/health', async (_request, reply) => {
    let error: string | null = null;
    try {
      await provider.ping();
    } catch (err) {
      error = err instanceof Error ? err.message : String(err);
    }

    const snapshot: HealthSnapshot = {
      status: error ? 'degraded' : 'ok',
      timestamp: new Date().toISOString(),
      model,
      llm: {
        provider: provider.name,
        reachable: !error,
        error,
      },
    };
    if (snapshot.status === 'degraded') {
      reply.code(503);
    }
    return snapshot;
  });
};
