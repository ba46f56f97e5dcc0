import { DateTime } from 'luxon';
import type { DisplayConfig } from './config.js';
import { isStandardEpisodeNumber } from './filter.js';
import type { DateWindow, DigestCounts, EventItem, PassedEventPolicy } from './types.js';

export type DisplayOptions = DisplayConfig & {
  timezone: string;
  passedEvents: PassedEventPolicy;
  footer: string | null;
};

export type Markup = {
  bold(text: string): string;
  italic(text: string): string;
  strike(text: string): string;
  escape(text: string): string;
};

const LOCALE = 'en-US';

export const ELLIPSIS = '…';

// Palette is laid out from the first day of the week.
const PALETTE = [0x3498db, 0x2ecc71, 0xe67e22, 0x9b59b6, 0xe74c3c, 0xf1c40f, 0x1abc9c] as const;

export function dayColor(weekday: number, startWeekOnMonday: boolean): number {
  const idx = startWeekOnMonday ? weekday - 1 : weekday % 7;
  return PALETTE[((idx % 7) + 7) % 7];
}

export function truncate(text: string, limit: number): string {
  if (text.length <= limit) return text;
  return text.slice(0, Math.max(0, limit - ELLIPSIS.length)) + ELLIPSIS;
}

/**
 * Packs lines into newline-joined chunks of at most `limit` characters.
 * Lines are never split across chunks; a single line longer than the limit
 * is truncated.
 */
export function chunkLines(lines: readonly string[], limit: number): string[] {
  const chunks: string[] = [];
  let current = '';
  for (const raw of lines) {
    const line = truncate(raw, limit);
    const candidate = current === '' ? line : `${current}\n${line}`;
    if (candidate.length <= limit) {
      current = candidate;
      continue;
    }
    chunks.push(current.trimEnd());
    current = line;
  }
  if (current !== '' || chunks.length === 0) chunks.push(current.trimEnd());
  return chunks;
}

export function formatTime(date: Date, options: Pick<DisplayOptions, 'timezone' | 'use24Hour' | 'leadingZero'>): string {
  const hour = options.use24Hour ? (options.leadingZero ? 'HH' : 'H') : options.leadingZero ? 'hh' : 'h';
  const pattern = options.use24Hour ? `${hour}:mm` : `${hour}:mm a`;
  return DateTime.fromJSDate(date, { zone: options.timezone }).setLocale(LOCALE).toFormat(pattern);
}

export function formatDateRange(window: DateWindow, timezone: string): string {
  const from = DateTime.fromJSDate(window.from, { zone: timezone }).setLocale(LOCALE);
  const last = DateTime.fromJSDate(window.to, { zone: timezone }).setLocale(LOCALE).minus({ days: 1 });
  if (from.hasSame(last, 'day')) return from.toFormat('cccc, LLLL d, yyyy');
  if (from.hasSame(last, 'year')) return `${from.toFormat('LLLL d')} - ${last.toFormat('LLLL d, yyyy')}`;
  return `${from.toFormat('LLLL d, yyyy')} - ${last.toFormat('LLLL d, yyyy')}`;
}

export function formatTimezoneLine(timezone: string, at: Date): string {
  const abbr = DateTime.fromJSDate(at, { zone: timezone }).setLocale(LOCALE).toFormat('ZZZZ');
  return abbr === timezone ? `Times are shown in ${timezone}` : `Times are shown in ${timezone} (${abbr})`;
}

function plural(n: number, one: string, many: string): string {
  return `${n} ${n === 1 ? one : many}`;
}

export function formatCounts(counts: DigestCounts, markup: Pick<Markup, 'bold'>): string {
  if (counts.tv === 0 && counts.movie === 0) return 'Nothing scheduled for this period.';
  const parts = [
    `📺 ${markup.bold(plural(counts.tv, 'episode', 'episodes'))}`,
    `🎬 ${markup.bold(plural(counts.movie, 'movie', 'movies'))}`,
  ];
  if (counts.premiere > 0) parts.push(`🎉 ${markup.bold(plural(counts.premiere, 'premiere', 'premieres'))}`);
  return parts.join('  ·  ');
}

function timePrefix(item: EventItem, options: DisplayOptions): string {
  if (!options.displayTime || item.all_day) return '';
  return `${formatTime(item.start, options)}: `;
}

function episodeDetails(item: EventItem, markup: Markup): string {
  const number = item.episode_number ? markup.escape(item.episode_number) : null;
  const title = item.episode_title ? markup.escape(item.episode_title) : null;
  const standard = isStandardEpisodeNumber(item.episode_number);
  if (title) {
    if (!number) return ` - ${markup.italic(title)}`;
    return standard ? ` - ${number} - ${markup.italic(title)}` : ` - ${markup.italic(`${number} - ${title}`)}`;
  }
  if (number) return standard ? ` - ${number}` : ` - ${markup.italic(number)}`;
  return '';
}

export function formatItem(item: EventItem, markup: Markup, options: DisplayOptions): string {
  const name = markup.bold(markup.escape(item.show_name || item.summary));
  let line = `${timePrefix(item, options)}${name}`;
  if (item.source.type === 'tv') {
    line += episodeDetails(item, markup);
    if (item.is_premiere) line += ' 🎉';
  }
  if (item.is_past && options.passedEvents === 'STRIKE') line = markup.strike(line);
  return line;
}

export function dayLines(tv: readonly EventItem[], movie: readonly EventItem[], markup: Markup, options: DisplayOptions): string[] {
  const lines = tv.map((item) => formatItem(item, markup, options));
  if (movie.length > 0) {
    if (lines.length > 0) lines.push('');
    lines.push(markup.bold('MOVIES'), ...movie.map((item) => formatItem(item, markup, options)));
  }
  return lines;
}
