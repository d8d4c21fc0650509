import Fastify, { type FastifyInstance } from 'fastify';
import type { BreakerState } from './circuit.js';
import type { TickReport } from './monitor/scheduler.js';
import { registry } from './observability/metrics.js';

export type HealthDeps = {
  lastReport: () => TickReport | null;
  lastCompletedAt: () => number | null;
  breakerState: () => BreakerState;
  flaggedIds?: () => string[];
  logger?: boolean;
};

export function buildHealthServer(deps: HealthDeps): FastifyInstance {
  const app = Fastify({ logger: deps.logger ?? false });
  const started = Date.now();

  app.get('/live', async () => ({ ok: true }));

  app.get('/ready', async (_req, reply) => {
    const breaker = deps.breakerState();
    const completed = deps.lastCompletedAt();
    const last = deps.lastReport();
    // a tick that priced nothing is not monitoring anything
    const blind = last !== null && last.requested > 0 && last.fetched === 0;
    if (completed === null || breaker === 'open' || blind) {
      reply.header('Retry-After', '30');
      return reply.code(503).send({ ready: false, completedTick: completed !== null, breaker, fetched: last?.fetched ?? 0 });
    }
    return { ready: true, breaker, fetched: last?.fetched ?? 0 };
  });

  app.get('/healthz', async () => {
    const last = deps.lastReport();
    return {
      ok: true,
      uptimeSec: Math.round((Date.now() - started) / 1000),
      breaker: deps.breakerState(),
      lastTick: last ? { seq: last.seq, outcome: last.outcome, startedAt: last.startedAt, durationMs: last.durationMs } : null,
    };
  });

  app.get('/metrics', async (_req, reply) => {
    reply.header('Content-Type', registry.contentType);
    return reply.send(await registry.metrics());
  });

  app.get('/status', async (_req, reply) => {
    const last = deps.lastReport();
    if (!last) return reply.code(404).send({ error: 'no tick yet' });
    return { ...last, flagged: deps.flaggedIds?.() ?? [] };
  });

  return app;
}
