import { describe, expect, it } from 'vitest';
import { type WindowOptions, resolveRange, resolveWindow } from '../src/window.js';

const options: WindowOptions = {
  range: 'WEEK',
  scheduleType: 'WEEKLY',
  customCron: false,
  timezone: 'UTC',
  startWeekOnMonday: true,
};

function iso(window: { from: Date; to: Date }) {
  return { from: window.from.toISOString(), to: window.to.toISOString() };
}

describe('resolveRange', () => {
  it('follows the schedule type for AUTO', () => {
    expect(resolveRange({ range: 'AUTO', scheduleType: 'DAILY', customCron: false })).toBe('DAY');
    expect(resolveRange({ range: 'AUTO', scheduleType: 'WEEKLY', customCron: false })).toBe('WEEK');
  });

  it('uses WEEK for AUTO with a custom cron', () => {
    expect(resolveRange({ range: 'AUTO', scheduleType: 'DAILY', customCron: true })).toBe('WEEK');
  });

  it('keeps an explicit range', () => {
    expect(resolveRange({ range: 'DAY', scheduleType: 'WEEKLY', customCron: true })).toBe('DAY');
  });
});

describe('resolveWindow', () => {
  it('covers today for DAY', () => {
    const window = resolveWindow(new Date('2024-03-13T15:00:00Z'), { ...options, range: 'DAY' });
    expect(iso(window)).toEqual({ from: '2024-03-13T00:00:00.000Z', to: '2024-03-14T00:00:00.000Z' });
  });

  it('covers the Monday-based week for WEEK', () => {
    const window = resolveWindow(new Date('2024-03-13T15:00:00Z'), options);
    expect(iso(window)).toEqual({ from: '2024-03-11T00:00:00.000Z', to: '2024-03-18T00:00:00.000Z' });
  });

  it('puts Sunday at the end of a Monday-based week', () => {
    const window = resolveWindow(new Date('2024-03-17T23:00:00Z'), options);
    expect(iso(window)).toEqual({ from: '2024-03-11T00:00:00.000Z', to: '2024-03-18T00:00:00.000Z' });
  });

  it('starts on Sunday when configured', () => {
    const window = resolveWindow(new Date('2024-03-13T15:00:00Z'), { ...options, startWeekOnMonday: false });
    expect(iso(window)).toEqual({ from: '2024-03-10T00:00:00.000Z', to: '2024-03-17T00:00:00.000Z' });
  });

  it('uses the local date of the display timezone', () => {
    // 03:00 UTC is still the 12th in New York
    const window = resolveWindow(new Date('2024-03-13T03:00:00Z'), {
      ...options,
      range: 'DAY',
      timezone: 'America/New_York',
    });
    expect(iso(window)).toEqual({ from: '2024-03-12T04:00:00.000Z', to: '2024-03-13T04:00:00.000Z' });
  });

  it('keeps local midnights across a DST change', () => {
    const window = resolveWindow(new Date('2024-03-12T16:00:00Z'), {
      ...options,
      timezone: 'America/New_York',
      startWeekOnMonday: false,
    });
    expect(iso(window)).toEqual({ from: '2024-03-10T05:00:00.000Z', to: '2024-03-17T04:00:00.000Z' });
  });
});
