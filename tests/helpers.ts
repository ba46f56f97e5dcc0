import { pino, type Logger } from 'pino';
import { parseEpisodeSummary } from '../src/filter.js';
import type { DisplayOptions } from '../src/format.js';
import type { CalendarSource, CalendarType, EventItem, ExpandedEvent } from '../src/types.js';

export const tvSource: CalendarSource = { url: 'https://tv.test/cal.ics', type: 'tv' };
export const movieSource: CalendarSource = { url: 'https://movies.test/cal.ics', type: 'movie' };

export const display: DisplayOptions = {
  header: 'TV Guide',
  showDateRange: true,
  showTimezone: false,
  displayTime: true,
  use24Hour: false,
  leadingZero: false,
  startWeekOnMonday: true,
  timezone: 'UTC',
  passedEvents: 'DISPLAY',
  footer: null,
};

export type LogLine = { level: number; msg: string; [key: string]: unknown };

export function captureLogger(): { log: Logger; lines: LogLine[] } {
  const lines: LogLine[] = [];
  const log = pino(
    { level: 'debug' },
    {
      write(msg: string) {
        lines.push(JSON.parse(msg));
      },
    },
  );
  return { log, lines };
}

export function at(iso: string): Date {
  return new Date(iso);
}

export function expanded(
  summary: string,
  start: string,
  options: { end?: string; type?: CalendarType; allDay?: boolean; source?: CalendarSource } = {},
): ExpandedEvent {
  const source = options.source ?? (options.type === 'movie' ? movieSource : tvSource);
  const startAt = at(start);
  const end = options.end ? at(options.end) : new Date(startAt.getTime() + 60 * 60 * 1000);
  return { uid: `${summary}@${start}`, summary, start: startAt, end, all_day: options.allDay ?? false, source };
}

export function item(
  summary: string,
  start: string,
  options: { end?: string; type?: CalendarType; allDay?: boolean; isPast?: boolean } = {},
): EventItem {
  const e = expanded(summary, start, options);
  const parts =
    e.source.type === 'tv'
      ? parseEpisodeSummary(summary)
      : { show_name: summary, episode_number: null, episode_title: null, is_premiere: false };
  return { ...e, is_past: options.isPast ?? false, ...parts };
}

export function ics(...lines: string[]): string {
  return ['BEGIN:VCALENDAR', 'VERSION:2.0', 'PRODID:-//airwaves//test//EN', ...lines, 'END:VCALENDAR'].join('\r\n');
}

export function vevent(...lines: string[]): string[] {
  return ['BEGIN:VEVENT', ...lines, 'END:VEVENT'];
}
