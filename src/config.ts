import path from 'node:path';
import { CronExpressionParser } from 'cron-parser';
import cron from 'node-cron';
import { IANAZone } from 'luxon';
import { z } from 'zod';
import { ConfigError, errorMessage } from './errors.js';
import { parseDiscordWebhookUrl } from './notify.js';
import type { CalendarSource, PassedEventPolicy, RangePolicy, ScheduleType } from './types.js';

export type DisplayConfig = {
  header: string;
  showDateRange: boolean;
  showTimezone: boolean;
  displayTime: boolean;
  use24Hour: boolean;
  leadingZero: boolean;
  startWeekOnMonday: boolean;
};

export type Config = {
  readonly calendars: readonly CalendarSource[];
  readonly discord: {
    readonly enabled: boolean;
    readonly webhookUrl: string | null;
    readonly mentionRoleId: string | null;
    readonly hideMentionInstructions: boolean;
    readonly customFooter: boolean;
  };
  readonly slack: {
    readonly enabled: boolean;
    readonly webhookUrl: string | null;
    readonly customFooter: boolean;
  };
  readonly schedule: {
    readonly cron: string | null; // overrides type/day/runTime
    readonly type: ScheduleType;
    readonly day: number; // 0 = Sunday
    readonly runTime: string; // HH:MM
    readonly runOnStartup: boolean;
    readonly runOnce: boolean;
  };
  readonly timezone: string;
  readonly range: RangePolicy;
  readonly passedEvents: PassedEventPolicy;
  readonly deduplicate: boolean;
  readonly display: Readonly<DisplayConfig>;
  readonly footersDir: string;
  readonly httpTimeoutMs: number;
  readonly healthPort: number;
  readonly log: {
    readonly debug: boolean;
    readonly dir: string | null;
    readonly file: string;
    readonly maxSizeMb: number;
    readonly backupCount: number;
  };
};

export type LoadedConfig = {
  config: Config;
  // Non-fatal problems, e.g. CALENDAR_URLS entries that were skipped.
  warnings: string[];
};

const TRUTHY = new Set(['true', '1', 'yes', 'on']);
const FALSY = new Set(['false', '0', 'no', 'off']);

// Trimmed value, or undefined when unset or blank.
function present(value: string | undefined): string | undefined {
  const v = value?.trim();
  return v ? v : undefined;
}

function flag(fallback: boolean) {
  return z
    .string()
    .optional()
    .transform((value, ctx) => {
      const v = present(value)?.toLowerCase();
      if (v === undefined) return fallback;
      if (TRUTHY.has(v)) return true;
      if (FALSY.has(v)) return false;
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected true or false, got "${value}"` });
      return z.NEVER;
    });
}

function number(fallback: number, opts: { min: number; max?: number; integer?: boolean }) {
  return z
    .string()
    .optional()
    .transform((value, ctx) => {
      const v = present(value);
      if (v === undefined) return fallback;
      const n = Number(v);
      const ok =
        Number.isFinite(n) &&
        n >= opts.min &&
        (opts.max === undefined || n <= opts.max) &&
        (!opts.integer || Number.isInteger(n));
      if (!ok) {
        const range = opts.max === undefined ? `>= ${opts.min}` : `between ${opts.min} and ${opts.max}`;
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `expected ${opts.integer ? 'an integer' : 'a number'} ${range}, got "${value}"`,
        });
        return z.NEVER;
      }
      return n;
    });
}

function choice<const T extends readonly [string, ...string[]]>(values: T, fallback: T[number]) {
  return z
    .string()
    .optional()
    .transform((value) => present(value)?.toUpperCase() ?? fallback)
    .pipe(z.enum(values));
}

function text(fallback: string | null = null) {
  return z
    .string()
    .optional()
    .transform((value) => present(value) ?? fallback);
}

const RUN_TIME = /^([01]?\d|2[0-3]):([0-5]\d)$/;

// node-cron runs the schedule and cron-parser predicts the next run, so
// both have to accept the expression.
function validCron(expression: string): boolean {
  if (!cron.validate(expression)) return false;
  try {
    CronExpressionParser.parse(expression);
    return true;
  } catch {
    return false;
  }
}

const envSchema = z
  .object({
    USE_DISCORD: flag(false),
    USE_SLACK: flag(false),
    DISCORD_WEBHOOK_URL: text(),
    SLACK_WEBHOOK_URL: text(),
    DISCORD_MENTION_ROLE_ID: text().refine((v) => v === null || /^\d+$/.test(v), 'expected a numeric role id'),
    DISCORD_HIDE_MENTION_INSTRUCTIONS: flag(false),
    ENABLE_CUSTOM_DISCORD_FOOTER: flag(false),
    ENABLE_CUSTOM_SLACK_FOOTER: flag(false),
    CUSTOM_FOOTERS_DIR: text('/app/custom_footers'),
    CRON_SCHEDULE: text().refine((v) => v === null || validCron(v), 'expected a valid cron expression'),
    SCHEDULE_TYPE: choice(['DAILY', 'WEEKLY'], 'WEEKLY'),
    SCHEDULE_DAY: number(1, { min: 0, max: 6, integer: true }),
    RUN_TIME: text('09:00').refine((v) => v !== null && RUN_TIME.test(v), 'expected HH:MM (24-hour)'),
    TZ: text('UTC').refine((v) => v !== null && IANAZone.isValidZone(v), 'expected an IANA timezone name'),
    CALENDAR_RANGE: choice(['AUTO', 'DAY', 'WEEK'], 'AUTO'),
    PASSED_EVENT_HANDLING: choice(['DISPLAY', 'HIDE', 'STRIKE'], 'DISPLAY'),
    DEDUPLICATE_EVENTS: flag(true),
    CUSTOM_HEADER: text('TV Guide'),
    SHOW_DATE_RANGE: flag(true),
    SHOW_TIMEZONE_IN_SUBHEADER: flag(false),
    DISPLAY_TIME: flag(true),
    USE_24_HOUR: flag(false),
    ADD_LEADING_ZERO: flag(false),
    START_WEEK_ON_MONDAY: flag(true),
    RUN_ON_STARTUP: flag(true),
    RUN_ONCE: flag(false),
    HTTP_TIMEOUT: number(30, { min: 1, max: 600 }),
    HEALTH_PORT: number(5000, { min: 0, max: 65535, integer: true }),
    DEBUG: flag(false),
    LOG_DIR: text(),
    LOG_FILE: text('airwaves.log'),
    LOG_MAX_SIZE_MB: number(1, { min: 0.01 }),
    LOG_BACKUP_COUNT: number(15, { min: 1, integer: true }),
  })
  .superRefine((env, ctx) => {
    if (!env.USE_DISCORD && !env.USE_SLACK) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['USE_DISCORD'], message: 'enable at least one of USE_DISCORD or USE_SLACK' });
    }
    if (env.USE_DISCORD) {
      if (!env.DISCORD_WEBHOOK_URL) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['DISCORD_WEBHOOK_URL'], message: 'required when USE_DISCORD is true' });
      } else if (!parseDiscordWebhookUrl(env.DISCORD_WEBHOOK_URL)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['DISCORD_WEBHOOK_URL'], message: 'expected https://discord.com/api/webhooks/<id>/<token>' });
      }
    }
    if (env.USE_SLACK) {
      if (!env.SLACK_WEBHOOK_URL) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['SLACK_WEBHOOK_URL'], message: 'required when USE_SLACK is true' });
      } else if (!z.string().url().safeParse(env.SLACK_WEBHOOK_URL).success) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['SLACK_WEBHOOK_URL'], message: 'expected a URL' });
      }
    }
  });

const sourceSchema = z.object({
  url: z
    .string()
    .trim()
    .url()
    .refine((u) => /^https?:\/\//i.test(u), 'expected an http(s) URL'),
  type: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(['tv', 'movie'])),
});

export function parseCalendarSources(raw: string | undefined): { sources: CalendarSource[]; rejected: string[] } {
  const json = present(raw);
  if (json === undefined) throw new ConfigError(['CALENDAR_URLS: required']);

  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (err) {
    throw new ConfigError([`CALENDAR_URLS: not valid JSON (${errorMessage(err)})`]);
  }
  if (!Array.isArray(data)) throw new ConfigError(['CALENDAR_URLS: expected a JSON array of {"url", "type"} objects']);

  const sources: CalendarSource[] = [];
  const rejected: string[] = [];
  data.forEach((entry: unknown, i: number) => {
    const result = sourceSchema.safeParse(entry);
    if (result.success) {
      sources.push(result.data);
    } else {
      const why = result.error.issues.map((issue) => `${issue.path.join('.') || 'entry'} ${issue.message}`).join('; ');
      rejected.push(`CALENDAR_URLS[${i}] skipped: ${why}`);
    }
  });
  if (sources.length === 0) {
    throw new ConfigError(['CALENDAR_URLS: no valid calendar entries', ...rejected]);
  }
  return { sources, rejected };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): LoadedConfig {
  const issues: string[] = [];
  let sources: CalendarSource[] = [];
  let warnings: string[] = [];
  try {
    const parsed = parseCalendarSources(env.CALENDAR_URLS);
    sources = parsed.sources;
    warnings = parsed.rejected;
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    issues.push(...err.issues);
  }

  const result = envSchema.safeParse(env);
  if (!result.success) {
    for (const issue of result.error.issues) {
      issues.push(`${issue.path.join('.')}: ${issue.message}`);
    }
  }
  if (!result.success || issues.length > 0) throw new ConfigError(issues);

  const e = result.data;
  const config: Config = {
    calendars: Object.freeze(sources.map((s) => Object.freeze({ ...s }))),
    discord: Object.freeze({
      enabled: e.USE_DISCORD,
      webhookUrl: e.DISCORD_WEBHOOK_URL,
      mentionRoleId: e.DISCORD_MENTION_ROLE_ID,
      hideMentionInstructions: e.DISCORD_HIDE_MENTION_INSTRUCTIONS,
      customFooter: e.ENABLE_CUSTOM_DISCORD_FOOTER,
    }),
    slack: Object.freeze({
      enabled: e.USE_SLACK,
      webhookUrl: e.SLACK_WEBHOOK_URL,
      customFooter: e.ENABLE_CUSTOM_SLACK_FOOTER,
    }),
    schedule: Object.freeze({
      cron: e.CRON_SCHEDULE,
      type: e.SCHEDULE_TYPE,
      day: e.SCHEDULE_DAY,
      runTime: e.RUN_TIME ?? '09:00',
      runOnStartup: e.RUN_ON_STARTUP,
      runOnce: e.RUN_ONCE,
    }),
    timezone: e.TZ ?? 'UTC',
    range: e.CALENDAR_RANGE,
    passedEvents: e.PASSED_EVENT_HANDLING,
    deduplicate: e.DEDUPLICATE_EVENTS,
    display: Object.freeze({
      header: e.CUSTOM_HEADER ?? 'TV Guide',
      showDateRange: e.SHOW_DATE_RANGE,
      showTimezone: e.SHOW_TIMEZONE_IN_SUBHEADER,
      displayTime: e.DISPLAY_TIME,
      use24Hour: e.USE_24_HOUR,
      leadingZero: e.ADD_LEADING_ZERO,
      startWeekOnMonday: e.START_WEEK_ON_MONDAY,
    }),
    footersDir: path.resolve(e.CUSTOM_FOOTERS_DIR ?? '/app/custom_footers'),
    httpTimeoutMs: Math.round(e.HTTP_TIMEOUT * 1000),
    healthPort: e.HEALTH_PORT,
    log: Object.freeze({
      debug: e.DEBUG,
      dir: e.LOG_DIR,
      file: e.LOG_FILE ?? 'airwaves.log',
      maxSizeMb: e.LOG_MAX_SIZE_MB,
      backupCount: e.LOG_BACKUP_COUNT,
    }),
  };
  return { config: Object.freeze(config), warnings };
}

// Derived schedule as a 5-field cron expression.
export function scheduleExpression(schedule: Config['schedule']): string {
  if (schedule.cron) return schedule.cron;
  const [hour, minute] = schedule.runTime.split(':').map(Number);
  const dayOfWeek = schedule.type === 'WEEKLY' ? String(schedule.day) : '*';
  return `${minute} ${hour} * * ${dayOfWeek}`;
}
