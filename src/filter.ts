import { dedupeKey } from './hash.js';
import type { Logger } from './logger.js';
import type { DateWindow, EventItem, ExpandedEvent, PassedEventPolicy } from './types.js';

// S01E02, s1e2, 1x02
export const EPISODE_PATTERN = /^(?:S(\d{1,4})E(\d{1,4})|(\d{1,4})x(\d{1,4}))$/i;

export type FilterOptions = {
  window: DateWindow;
  now: Date;
  passedEvents: PassedEventPolicy;
  deduplicate: boolean;
  log?: Logger;
};

export type EpisodeInfo = {
  show_name: string;
  episode_number: string | null;
  episode_title: string | null;
  is_premiere: boolean;
};

export function isStandardEpisodeNumber(value: string | null | undefined): boolean {
  return !!value && EPISODE_PATTERN.test(value);
}

/**
 * Splits a TV summary such as "Show - S01E02 - Title" or "Show - 1x02 - Title"
 * into its parts. The episode number is the first " - " segment after the
 * show name that looks like one; without such a segment the second segment
 * is taken as a free-form number (specials, dates).
 */
export function parseEpisodeSummary(summary: string): EpisodeInfo {
  const parts = summary.split(' - ').map((p) => p.trim());
  if (parts.length < 2) {
    return { show_name: summary.trim(), episode_number: null, episode_title: null, is_premiere: false };
  }

  let idx = parts.findIndex((p, i) => i > 0 && EPISODE_PATTERN.test(p));
  if (idx === -1) idx = 1;

  const number = parts[idx] || null;
  const title = parts.slice(idx + 1).join(' - ') || null;
  const match = number ? EPISODE_PATTERN.exec(number) : null;
  const episode = match ? Number(match[2] ?? match[4]) : NaN;

  return {
    show_name: parts.slice(0, idx).join(' - '),
    episode_number: number,
    episode_title: title,
    is_premiere: episode === 1,
  };
}

function toItem(e: ExpandedEvent, isPast: boolean): EventItem {
  if (e.source.type === 'movie') {
    return { ...e, is_past: isPast, show_name: e.summary, episode_number: null, episode_title: null, is_premiere: false };
  }
  return { ...e, is_past: isPast, ...parseEpisodeSummary(e.summary) };
}

export function inWindow(e: Pick<ExpandedEvent, 'start' | 'end'>, window: DateWindow): boolean {
  const start = e.start.getTime();
  const end = e.end.getTime();
  if (start >= window.to.getTime()) return false;
  if (end === start) return start >= window.from.getTime();
  return end > window.from.getTime();
}

export function compareItems(a: ExpandedEvent, b: ExpandedEvent): number {
  return a.start.getTime() - b.start.getTime() || a.summary.localeCompare(b.summary);
}

/**
 * Applies the window, passed-event and deduplication policies. Input order
 * decides which duplicate survives: the first one seen wins.
 */
export function filterEvents(events: readonly ExpandedEvent[], options: FilterOptions): EventItem[] {
  const now = options.now.getTime();
  const seen = new Set<string>();
  const out: EventItem[] = [];

  for (const e of events) {
    if (!inWindow(e, options.window)) continue;

    const isPast = e.end.getTime() < now;
    if (isPast && options.passedEvents === 'HIDE') continue;

    if (options.deduplicate) {
      const key = dedupeKey(e);
      if (seen.has(key)) {
        options.log?.debug({ title: e.summary, start: e.start.toISOString(), type: e.source.type }, 'Dropping duplicate event');
        continue;
      }
      seen.add(key);
    }

    out.push(toItem(e, isPast));
  }

  return out.sort(compareItems);
}
