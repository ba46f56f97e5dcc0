import type { FastifyInstance } from 'fastify';
import { afterEach, describe, expect, it } from 'vitest';
import { createHealthServer } from '../src/health.js';
import type { SchedulerStatus } from '../src/scheduler.js';

describe('health endpoint', () => {
  let app: FastifyInstance | null = null;

  afterEach(async () => {
    await app?.close();
    app = null;
  });

  it('answers 200 with the scheduler state', async () => {
    const status: SchedulerStatus = {
      state: 'running',
      lastRun: {
        reason: 'startup',
        startedAt: new Date('2024-03-11T09:00:00Z'),
        finishedAt: new Date('2024-03-11T09:00:05Z'),
        ok: true,
      },
      nextRunAt: new Date('2024-03-18T09:00:00Z'),
    };
    app = createHealthServer(() => status);

    const response = await app.inject({ method: 'GET', url: '/health' });
    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      status: 'ok',
      state: 'running',
      last_run_at: '2024-03-11T09:00:05.000Z',
      last_run_ok: true,
      next_run_at: '2024-03-18T09:00:00.000Z',
    });
  });

  it('reports nulls before the first run', async () => {
    app = createHealthServer(() => ({ state: 'idle', lastRun: null, nextRunAt: null }));
    const response = await app.inject({ method: 'GET', url: '/health' });
    expect(response.json()).toEqual({
      status: 'ok',
      state: 'idle',
      last_run_at: null,
      last_run_ok: null,
      next_run_at: null,
    });
  });

  it('has no other routes', async () => {
    app = createHealthServer(() => ({ state: 'idle', lastRun: null, nextRunAt: null }));
    const response = await app.inject({ method: 'GET', url: '/' });
    expect(response.statusCode).toBe(404);
  });
});
