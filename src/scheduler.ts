import cron, { type ScheduledTask } from 'node-cron';
import { CronExpressionParser } from 'cron-parser';
import type { Logger } from './logger.js';

/**
 * idle --trigger--> triggered --> running --done/failed--> cooldown --> idle
 *
 * Triggers that arrive in any state but idle are dropped, never queued, so
 * two runs can't overlap.
 */
export type SchedulerState = 'idle' | 'triggered' | 'running' | 'cooldown';

export type Clock = { now(): Date };

export const systemClock: Clock = { now: () => new Date() };

export type Fire = (reason: string) => void;

export interface TriggerSource {
  readonly name: string;
  start(fire: Fire): void;
  stop(): void;
  nextFireAt?(after: Date): Date | null;
}

export type TriggerResult = {
  status: 'completed' | 'failed' | 'skipped';
  reason: string;
  state: SchedulerState; // state when the trigger arrived
};

export type LastRun = {
  reason: string;
  startedAt: Date;
  finishedAt: Date;
  ok: boolean;
};

export type SchedulerStatus = {
  state: SchedulerState;
  lastRun: LastRun | null;
  nextRunAt: Date | null;
};

export class CronTrigger implements TriggerSource {
  private task: ScheduledTask | null = null;

  constructor(
    readonly expression: string,
    private readonly timezone: string,
  ) {}

  get name(): string {
    return `cron(${this.expression})`;
  }

  start(fire: Fire): void {
    this.task = cron.schedule(this.expression, () => fire(this.name), { timezone: this.timezone });
  }

  stop(): void {
    this.task?.stop();
    this.task = null;
  }

  // null when cron-parser cannot read an expression node-cron accepted
  nextFireAt(after: Date): Date | null {
    try {
      return CronExpressionParser.parse(this.expression, { currentDate: after, tz: this.timezone }).next().toDate();
    } catch {
      return null;
    }
  }
}

// Fires once, as soon as the scheduler starts.
export class StartupTrigger implements TriggerSource {
  readonly name = 'startup';

  start(fire: Fire): void {
    fire(this.name);
  }

  stop(): void {}
}

type SignalEmitter = {
  on(event: NodeJS.Signals, listener: () => void): unknown;
  off(event: NodeJS.Signals, listener: () => void): unknown;
};

// Manual run, e.g. `kill -USR1 <pid>`.
export class SignalTrigger implements TriggerSource {
  private listener: (() => void) | null = null;

  constructor(
    private readonly signal: NodeJS.Signals = 'SIGUSR1',
    private readonly emitter: SignalEmitter = process,
  ) {}

  get name(): string {
    return `signal(${this.signal})`;
  }

  start(fire: Fire): void {
    const listener = () => fire(this.name);
    this.listener = listener;
    this.emitter.on(this.signal, listener);
  }

  stop(): void {
    if (this.listener) this.emitter.off(this.signal, this.listener);
    this.listener = null;
  }
}

export type SchedulerOptions = {
  job: () => Promise<unknown>;
  sources: readonly TriggerSource[];
  log: Logger;
  clock?: Clock;
  cooldownMs?: number;
};

export class Scheduler {
  private current: SchedulerState = 'idle';
  private cooldownUntil = 0;
  private inFlight: Promise<TriggerResult> | null = null;
  private last: LastRun | null = null;
  private readonly clock: Clock;
  private readonly cooldownMs: number;

  constructor(private readonly options: SchedulerOptions) {
    this.clock = options.clock ?? systemClock;
    this.cooldownMs = options.cooldownMs ?? 0;
  }

  get state(): SchedulerState {
    if (this.current === 'cooldown' && this.clock.now().getTime() >= this.cooldownUntil) {
      this.current = 'idle';
    }
    return this.current;
  }

  get lastRun(): LastRun | null {
    return this.last;
  }

  start(): void {
    for (const source of this.options.sources) {
      source.start((reason) => {
        this.trigger(reason).catch((err: unknown) => this.options.log.error({ reason, err }, 'Trigger handling failed'));
      });
      this.options.log.debug({ source: source.name }, 'Trigger source started');
    }
  }

  stop(): void {
    for (const source of this.options.sources) source.stop();
  }

  trigger(reason: string): Promise<TriggerResult> {
    const state = this.state;
    if (state !== 'idle') {
      this.options.log.warn({ reason, state }, 'Previous run still active; skipping trigger');
      return Promise.resolve({ status: 'skipped', reason, state });
    }
    this.current = 'triggered';
    this.options.log.info({ reason }, 'Run triggered');
    const run = this.execute(reason);
    this.inFlight = run;
    return run;
  }

  private async execute(reason: string): Promise<TriggerResult> {
    this.current = 'running';
    const startedAt = this.clock.now();
    let ok = true;
    try {
      await this.options.job();
    } catch (err) {
      ok = false;
      this.options.log.error({ reason, err }, 'Run failed');
    }
    const finishedAt = this.clock.now();
    this.last = { reason, startedAt, finishedAt, ok };
    if (this.cooldownMs > 0) {
      this.current = 'cooldown';
      this.cooldownUntil = finishedAt.getTime() + this.cooldownMs;
    } else {
      this.current = 'idle';
    }
    this.inFlight = null;
    const next = this.nextRunAt();
    this.options.log.info({ reason, ok, nextRunAt: next?.toISOString() ?? null }, 'Waiting for next trigger');
    return { status: ok ? 'completed' : 'failed', reason, state: 'idle' };
  }

  // Resolves when no run is in flight.
  async whenIdle(): Promise<void> {
    if (this.inFlight) await this.inFlight;
  }

  nextRunAt(): Date | null {
    const after = this.clock.now();
    let next: Date | null = null;
    for (const source of this.options.sources) {
      const at = source.nextFireAt?.(after) ?? null;
      if (at && (!next || at < next)) next = at;
    }
    return next;
  }

  status(): SchedulerStatus {
    return { state: this.state, lastRun: this.last, nextRunAt: this.nextRunAt() };
  }
}
