import { describe, expect, it } from 'vitest';
import { buildDigest, isEmpty } from '../src/digest.js';
import type { DateWindow } from '../src/types.js';
import { at, item } from './helpers.js';

const week: DateWindow = { from: at('2024-03-11T00:00:00Z'), to: at('2024-03-18T00:00:00Z') };

describe('buildDigest', () => {
  const items = [
    item('Film', '2024-03-14T00:00:00Z', { type: 'movie', allDay: true, end: '2024-03-15T00:00:00Z' }),
    item('A Show - S01E01 - Pilot', '2024-03-12T20:00:00Z'),
    item('B Show - S01E05', '2024-03-12T00:00:00Z', { allDay: true, end: '2024-03-13T00:00:00Z' }),
  ];

  it('groups items by local day in date order', () => {
    const digest = buildDigest(items, week, 'UTC');
    expect(digest.days.map((d) => d.date)).toEqual(['2024-03-12', '2024-03-14']);
    expect(digest.days[0]).toMatchObject({ weekday: 2, day_name: 'Tuesday', name: 'Tuesday, Mar 12' });
    expect(digest.days[1].movie.map((i) => i.summary)).toEqual(['Film']);
    expect(digest.days[1].tv).toEqual([]);
  });

  it('lists all-day items first within a day', () => {
    const digest = buildDigest(items, week, 'UTC');
    expect(digest.days[0].tv.map((i) => i.summary)).toEqual(['B Show - S01E05', 'A Show - S01E01 - Pilot']);
  });

  it('counts episodes, movies and premieres', () => {
    expect(buildDigest(items, week, 'UTC').counts).toEqual({ tv: 2, movie: 1, premiere: 1 });
  });

  it('groups by the display timezone', () => {
    const nyWeek: DateWindow = { from: at('2024-03-11T04:00:00Z'), to: at('2024-03-18T04:00:00Z') };
    const digest = buildDigest([item('Late Show - S01E02', '2024-03-13T02:00:00Z')], nyWeek, 'America/New_York');
    expect(digest.days.map((d) => d.date)).toEqual(['2024-03-12']);
    expect(digest.timezone).toBe('America/New_York');
  });

  it('files items that began before the window under its first day', () => {
    const early = item('Overnight - S01E03', '2024-03-10T22:00:00Z', { end: '2024-03-11T02:00:00Z' });
    const digest = buildDigest([early], week, 'UTC');
    expect(digest.days.map((d) => d.date)).toEqual(['2024-03-11']);
  });

  it('is empty without items', () => {
    const digest = buildDigest([], week, 'UTC');
    expect(isEmpty(digest)).toBe(true);
    expect(digest.counts).toEqual({ tv: 0, movie: 0, premiere: 0 });
    expect(digest.window).toBe(week);
  });
});
