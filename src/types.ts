export type CalendarType = 'tv' | 'movie';

export type CalendarSource = {
  url: string;
  type: CalendarType;
};

export type RawEvent = {
  uid: string;
  summary: string;
  start: Date;
  end: Date;
  all_day: boolean;
  rrule?: string | null; // RRULE value as published
};

export type ExpandedEvent = {
  uid: string;
  summary: string;
  start: Date;
  end: Date; // always >= start
  all_day: boolean;
  source: CalendarSource;
};

export type EventItem = ExpandedEvent & {
  is_past: boolean; // ended before "now"
  show_name: string;
  episode_number?: string | null;
  episode_title?: string | null;
  is_premiere: boolean;
};

export type DateWindow = {
  from: Date; // inclusive
  to: Date; // exclusive
};

export type Day = {
  date: string; // ISO date, yyyy-MM-dd, in the display timezone
  weekday: number; // 1 = Monday ... 7 = Sunday
  day_name: string; // Monday, Tuesday, ...
  name: string; // heading, e.g. "Tuesday, Oct 20"
  tv: EventItem[];
  movie: EventItem[];
};

export type DigestCounts = {
  tv: number;
  movie: number;
  premiere: number;
};

export type Digest = {
  window: DateWindow;
  timezone: string;
  days: Day[];
  counts: DigestCounts;
};

export type RangePolicy = 'AUTO' | 'DAY' | 'WEEK';
export type PassedEventPolicy = 'DISPLAY' | 'HIDE' | 'STRIKE';
export type ScheduleType = 'DAILY' | 'WEEKLY';

export type Destination = 'discord' | 'slack';
