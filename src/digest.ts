import { DateTime } from 'luxon';
import type { DateWindow, Day, Digest, EventItem } from './types.js';

const LOCALE = 'en-US';

function compareWithinDay(a: EventItem, b: EventItem): number {
  if (a.all_day !== b.all_day) return a.all_day ? -1 : 1;
  return a.start.getTime() - b.start.getTime() || a.summary.localeCompare(b.summary);
}

// Items that began before the window (multi-day releases) are listed on its first day.
function localDay(item: EventItem, window: DateWindow, timezone: string): DateTime {
  const at = Math.max(item.start.getTime(), window.from.getTime());
  return DateTime.fromMillis(at, { zone: timezone, locale: LOCALE }).startOf('day');
}

export function buildDigest(items: readonly EventItem[], window: DateWindow, timezone: string): Digest {
  const days = new Map<string, Day>();

  for (const item of items) {
    const local = localDay(item, window, timezone);
    const key = local.toISODate() ?? local.toFormat('yyyy-MM-dd');
    let day = days.get(key);
    if (!day) {
      day = {
        date: key,
        weekday: local.weekday,
        day_name: local.toFormat('cccc'),
        name: local.toFormat('cccc, LLL d'),
        tv: [],
        movie: [],
      };
      days.set(key, day);
    }
    day[item.source.type].push(item);
  }

  const ordered = [...days.values()].sort((a, b) => a.date.localeCompare(b.date));
  for (const day of ordered) {
    day.tv.sort(compareWithinDay);
    day.movie.sort(compareWithinDay);
  }

  const tv = items.filter((i) => i.source.type === 'tv');
  return {
    window,
    timezone,
    days: ordered,
    counts: {
      tv: tv.length,
      movie: items.length - tv.length,
      premiere: tv.filter((i) => i.is_premiere).length,
    },
  };
}

export function isEmpty(digest: Digest): boolean {
  return digest.days.length === 0;
}
