import fs from 'node:fs/promises';
import path from 'node:path';
import type { Config } from './config.js';
import { buildDigest, isEmpty } from './digest.js';
import { type DiscordMessage, formatDiscord } from './discord.js';
import { FormatError, ParseError, errorMessage } from './errors.js';
import { filterEvents } from './filter.js';
import type { DisplayOptions } from './format.js';
import { type FetchLike, type SourceFailure, fetchCalendars, redactUrl } from './ingest.js';
import type { Logger } from './logger.js';
import { type Delivery, DiscordTarget, SlackTarget, type WebhookTarget, deliver } from './notify.js';
import { expandEvents } from './parse.js';
import { type SlackMessage, formatSlack } from './slack.js';
import type { Destination, Digest, ExpandedEvent } from './types.js';
import { resolveWindow } from './window.js';

export type Targets = {
  discord?: WebhookTarget<DiscordMessage>;
  slack?: WebhookTarget<SlackMessage>;
};

export type FooterReader = (destination: Destination) => Promise<string | null>;

export type PipelineDeps = {
  log: Logger;
  targets: Targets;
  now?: () => Date;
  fetch?: FetchLike;
  readFooter?: FooterReader;
};

export type RunReport = {
  startedAt: Date;
  finishedAt: Date;
  digest: Digest;
  sourceFailures: SourceFailure[];
  formatFailures: FormatError[];
  deliveries: Delivery[];
};

export function createTargets(config: Config): Targets {
  const targets: Targets = {};
  if (config.discord.enabled && config.discord.webhookUrl) {
    targets.discord = DiscordTarget.create(config.discord.webhookUrl, config.httpTimeoutMs);
  }
  if (config.slack.enabled && config.slack.webhookUrl) {
    targets.slack = SlackTarget.create(config.slack.webhookUrl, config.httpTimeoutMs);
  }
  return targets;
}

// Footers are re-read every run so edits apply without a restart.
export function footerReader(dir: string, log?: Logger): FooterReader {
  return async (destination) => {
    const file = path.join(dir, `${destination}.txt`);
    try {
      const text = (await fs.readFile(file, 'utf8')).trim();
      return text || null;
    } catch (err) {
      log?.warn({ destination, file, err }, 'Custom footer enabled but not readable; sending without it');
      return null;
    }
  };
}

function displayOptions(config: Config, footer: string | null): DisplayOptions {
  return { ...config.display, timezone: config.timezone, passedEvents: config.passedEvents, footer };
}

function formatFor<M>(destination: Destination, log: Logger, failures: FormatError[], build: () => M[]): M[] | null {
  try {
    return build();
  } catch (err) {
    const error = err instanceof FormatError ? err : new FormatError(destination, errorMessage(err), { cause: err });
    log.error({ destination, err: error }, 'Could not build message; skipping destination');
    failures.push(error);
    return null;
  }
}

export async function runPipeline(config: Config, deps: PipelineDeps): Promise<RunReport> {
  const { log, targets } = deps;
  const now = deps.now ? deps.now() : new Date();
  const startedAt = new Date();
  const window = resolveWindow(now, {
    range: config.range,
    scheduleType: config.schedule.type,
    customCron: config.schedule.cron !== null,
    timezone: config.timezone,
    startWeekOnMonday: config.display.startWeekOnMonday,
  });
  log.info({ from: window.from.toISOString(), to: window.to.toISOString(), sources: config.calendars.length }, 'Starting run');

  const { fetched, failures } = await fetchCalendars(config.calendars, { timeoutMs: config.httpTimeoutMs, fetch: deps.fetch, log });
  const sourceFailures: SourceFailure[] = [...failures];

  const events: ExpandedEvent[] = [];
  for (const { source, body } of fetched) {
    try {
      const expanded = expandEvents(body, source, window, config.timezone, log);
      log.debug({ url: redactUrl(source.url), events: expanded.length }, 'Parsed calendar');
      events.push(...expanded);
    } catch (err) {
      const error = err instanceof ParseError ? err : new ParseError(redactUrl(source.url), errorMessage(err), { cause: err });
      log.error({ url: redactUrl(source.url), type: source.type, err: error }, 'Calendar parse failed; skipping source');
      sourceFailures.push({ source, error });
    }
  }

  const items = filterEvents(events, {
    window,
    now,
    passedEvents: config.passedEvents,
    deduplicate: config.deduplicate,
    log,
  });
  const digest = buildDigest(items, window, config.timezone);
  log.info({ ...digest.counts, days: digest.days.length, failedSources: sourceFailures.length }, 'Digest built');
  if (isEmpty(digest)) log.info('Nothing scheduled in this window; sending the header only');

  const readFooter = deps.readFooter ?? footerReader(config.footersDir, log);
  const formatFailures: FormatError[] = [];
  const deliveries: Delivery[] = [];

  if (targets.discord) {
    const footer = config.discord.customFooter ? await readFooter('discord') : null;
    const options = {
      ...displayOptions(config, footer),
      mentionRoleId: config.discord.mentionRoleId,
      hideMentionInstructions: config.discord.hideMentionInstructions,
    };
    const messages = formatFor('discord', log, formatFailures, () => formatDiscord(digest, options, now));
    if (messages) deliveries.push(await deliver(targets.discord, messages, log));
  }

  if (targets.slack) {
    const footer = config.slack.customFooter ? await readFooter('slack') : null;
    const options = displayOptions(config, footer);
    const messages = formatFor('slack', log, formatFailures, () => formatSlack(digest, options, now));
    if (messages) deliveries.push(await deliver(targets.slack, messages, log));
  }

  const finishedAt = new Date();
  log.info(
    {
      durationMs: finishedAt.getTime() - startedAt.getTime(),
      delivered: deliveries.filter((d) => !d.error).map((d) => d.destination),
      failed: [...deliveries.filter((d) => d.error).map((d) => d.destination), ...formatFailures.map((f) => f.destination)],
    },
    'Run complete',
  );
  return { startedAt, finishedAt, digest, sourceFailures, formatFailures, deliveries };
}

// True when nothing useful happened: every source or every destination failed.
export function runFailed(report: RunReport, sourceCount: number): boolean {
  const allSourcesFailed = sourceCount > 0 && report.sourceFailures.length >= sourceCount;
  const attempted = report.deliveries.length + report.formatFailures.length;
  const allTargetsFailed = attempted > 0 && report.deliveries.every((d) => d.error !== null);
  return allSourcesFailed || allTargetsFailed;
}
