import Fastify, { type FastifyInstance } from 'fastify';
import type { SchedulerStatus } from './scheduler.js';

export type HealthBody = {
  status: 'ok';
  state: SchedulerStatus['state'];
  last_run_at: string | null;
  last_run_ok: boolean | null;
  next_run_at: string | null;
};

export function healthBody(status: SchedulerStatus): HealthBody {
  return {
    status: 'ok',
    state: status.state,
    last_run_at: status.lastRun?.finishedAt.toISOString() ?? null,
    last_run_ok: status.lastRun?.ok ?? null,
    next_run_at: status.nextRunAt?.toISOString() ?? null,
  };
}

// Liveness only: the body reports scheduler state but the status code is
// always 200 while the process answers.
export function createHealthServer(status: () => SchedulerStatus): FastifyInstance {
  const app = Fastify({ logger: false });
  app.get('/health', async () => healthBody(status()));
  return app;
}

export async function startHealthServer(app: FastifyInstance, port: number): Promise<string> {
  return app.listen({ port, host: '0.0.0.0' });
}
