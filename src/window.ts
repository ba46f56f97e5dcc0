import { DateTime } from 'luxon';
import type { DateWindow, RangePolicy, ScheduleType } from './types.js';

export type WindowOptions = {
  range: RangePolicy;
  scheduleType: ScheduleType;
  customCron: boolean; // CRON_SCHEDULE is set
  timezone: string;
  startWeekOnMonday: boolean;
};

export function resolveRange(options: Pick<WindowOptions, 'range' | 'scheduleType' | 'customCron'>): 'DAY' | 'WEEK' {
  if (options.range !== 'AUTO') return options.range;
  if (options.customCron) return 'WEEK';
  return options.scheduleType === 'DAILY' ? 'DAY' : 'WEEK';
}

// DAY is today; WEEK is the calendar week containing `now`. Both are
// half-open and computed in the display timezone, so DST days keep their
// real length.
export function resolveWindow(now: Date, options: WindowOptions): DateWindow {
  const local = DateTime.fromJSDate(now, { zone: options.timezone }).startOf('day');
  if (resolveRange(options) === 'DAY') {
    return { from: local.toJSDate(), to: local.plus({ days: 1 }).toJSDate() };
  }
  // luxon weekdays: 1 = Monday ... 7 = Sunday
  const offset = options.startWeekOnMonday ? local.weekday - 1 : local.weekday % 7;
  const from = local.minus({ days: offset });
  return { from: from.toJSDate(), to: from.plus({ days: 7 }).toJSDate() };
}
