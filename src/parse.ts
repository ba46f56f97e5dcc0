import ICAL from 'ical.js';
import { DateTime, IANAZone } from 'luxon';
import { ParseError, errorMessage } from './errors.js';
import { compareItems, inWindow } from './filter.js';
import { redactUrl } from './ingest.js';
import type { Logger } from './logger.js';
import type { CalendarSource, DateWindow, ExpandedEvent, RawEvent } from './types.js';

type ICALTime = InstanceType<typeof ICAL.Time>;
type ICALComponent = InstanceType<typeof ICAL.Component>;
type ICALEvent = InstanceType<typeof ICAL.Event>;

type Series = {
  event: ICALEvent;
  exceptions: ICALEvent[]; // overrides of single occurrences
};

type DecodedEvent = Series & { raw: RawEvent };

// Upper bound on occurrences emitted per recurring event in one window.
const MAX_OCCURRENCES = 1000;

/**
 * Converts an ical.js time to an instant. Times bound to UTC or to a
 * VTIMEZONE in the feed are absolute. Floating times are read as wall-clock
 * time in `tzid` when the property named a known IANA zone, else in `zone`;
 * all-day dates always use `zone`.
 */
export function toInstant(time: ICALTime, zone: string, tzid?: string): Date {
  const floating = time.isDate || !time.zone || time.zone.tzid === 'floating';
  if (!floating) return new Date(time.toUnixTime() * 1000);
  return DateTime.fromObject(
    {
      year: time.year,
      month: time.month,
      day: time.day,
      hour: time.isDate ? 0 : time.hour,
      minute: time.isDate ? 0 : time.minute,
      second: time.isDate ? 0 : time.second,
    },
    { zone: !time.isDate && tzid ? tzid : zone },
  ).toJSDate();
}

// TZID of a date property when it names an IANA zone; feeds often omit the
// matching VTIMEZONE block.
function zoneParam(event: ICALEvent, name: 'dtstart' | 'dtend' | 'recurrence-id'): string | undefined {
  const tzid = event.component.getFirstProperty(name)?.getParameter('tzid');
  return typeof tzid === 'string' && IANAZone.isValidZone(tzid) ? tzid : undefined;
}

// ical.js derives the end from DTEND, else DURATION, else one day for
// all-day events and zero length otherwise.
function interval(event: ICALEvent, startTime: ICALTime, endTime: ICALTime, zone: string): { start: Date; end: Date } {
  const startZone = zoneParam(event, 'dtstart');
  const endZone = event.component.hasProperty('dtend') ? zoneParam(event, 'dtend') : startZone;
  const start = toInstant(startTime, zone, startZone);
  const end = toInstant(endTime, zone, endZone);
  return { start, end: new Date(Math.max(start.getTime(), end.getTime())) };
}

function loadComponent(text: string, source: CalendarSource): ICALComponent {
  const where = redactUrl(source.url);
  if (!text.includes('BEGIN:VCALENDAR')) {
    throw new ParseError(where, 'missing BEGIN:VCALENDAR');
  }
  let root: ICALComponent;
  try {
    root = new ICAL.Component(ICAL.parse(text));
  } catch (err) {
    throw new ParseError(where, errorMessage(err), { cause: err });
  }
  if (root.name !== 'vcalendar') {
    throw new ParseError(where, `expected a VCALENDAR, got ${root.name.toUpperCase()}`);
  }
  // TZID parameters resolve through the global registry; unregistered zones
  // would make those times floating.
  for (const vtimezone of root.getAllSubcomponents('vtimezone')) {
    const tzid = vtimezone.getFirstPropertyValue('tzid');
    if (typeof tzid === 'string' && !ICAL.TimezoneService.has(tzid)) ICAL.TimezoneService.register(vtimezone);
  }
  return root;
}

function readEvents(root: ICALComponent, source: CalendarSource): Series[] {
  const where = redactUrl(source.url);
  const masters = new Map<string, Series>();
  const overrides: ICALEvent[] = [];
  const events: Series[] = [];

  for (const vevent of root.getAllSubcomponents('vevent')) {
    let event: ICALEvent;
    try {
      event = new ICAL.Event(vevent);
    } catch (err) {
      throw new ParseError(where, `bad VEVENT: ${errorMessage(err)}`, { cause: err });
    }
    if (!vevent.getFirstProperty('dtstart')) continue;
    if (event.isRecurrenceException()) {
      overrides.push(event);
      continue;
    }
    const entry: Series = { event, exceptions: [] };
    events.push(entry);
    if (event.uid) masters.set(event.uid, entry);
  }

  // Overridden occurrences replace the generated ones of their series;
  // orphans are kept as standalone events.
  for (const exception of overrides) {
    const master = masters.get(exception.uid);
    if (master && master.event.isRecurring()) {
      master.event.relateException(exception);
      master.exceptions.push(exception);
    } else {
      events.push({ event: exception, exceptions: [] });
    }
  }
  return events;
}

function decode(text: string, source: CalendarSource, zone: string): DecodedEvent[] {
  const root = loadComponent(text, source);
  return readEvents(root, source).map(({ event, exceptions }) => {
    const rrule = event.component.getFirstProperty('rrule');
    return {
      raw: {
        uid: event.uid ?? '',
        summary: (event.summary ?? '').trim(),
        ...interval(event, event.startDate, event.endDate, zone),
        all_day: event.startDate.isDate,
        rrule: rrule ? rrule.toICALString().replace(/^RRULE:/i, '') : null,
      },
      event,
      exceptions,
    };
  });
}

/** Decodes each VEVENT of a feed once, recurring series as their first occurrence. */
export function parseCalendar(text: string, source: CalendarSource, zone: string = 'UTC'): RawEvent[] {
  return decode(text, source, zone).map((decoded) => decoded.raw);
}

function occurrence(uid: string, summary: string, span: { start: Date; end: Date }, allDay: boolean, source: CalendarSource): ExpandedEvent {
  return { uid: `${uid}_${span.start.getTime()}`, summary, ...span, all_day: allDay, source };
}

function expandEvent(
  { raw, event, exceptions }: DecodedEvent,
  source: CalendarSource,
  window: DateWindow,
  zone: string,
  out: ExpandedEvent[],
  log?: Logger,
): void {
  if (!event.isRecurring()) {
    if (inWindow(raw, window)) {
      out.push({ uid: raw.uid, summary: raw.summary, start: raw.start, end: raw.end, all_day: raw.all_day, source });
    }
    return;
  }

  const to = window.to.getTime();
  const seriesZone = zoneParam(event, 'dtstart');
  const iterator = event.iterator();
  let emitted = 0;
  for (let next: ICALTime | null | undefined = iterator.next(); next; next = iterator.next()) {
    if (toInstant(next, zone, seriesZone).getTime() >= to) break;
    const details = event.getOccurrenceDetails(next);
    const span = interval(details.item, details.startDate, details.endDate, zone);
    if (!inWindow(span, window)) continue;
    if (emitted === MAX_OCCURRENCES) {
      log?.warn(
        { url: redactUrl(source.url), uid: raw.uid, rrule: raw.rrule, limit: MAX_OCCURRENCES },
        'Occurrence limit reached; dropping the rest of the series',
      );
      break;
    }
    emitted++;
    out.push(occurrence(raw.uid, (details.item.summary ?? raw.summary).trim(), span, details.startDate.isDate, source));
  }

  // The walk stops at the window end, so occurrences moved here from a
  // later date are picked up from their overrides.
  for (const exception of exceptions) {
    const recurrenceId = exception.recurrenceId;
    if (!recurrenceId) continue;
    if (toInstant(recurrenceId, zone, zoneParam(exception, 'recurrence-id')).getTime() < to) continue;
    const span = interval(exception, exception.startDate, exception.endDate, zone);
    if (!inWindow(span, window)) continue;
    out.push(occurrence(raw.uid, (exception.summary ?? raw.summary).trim(), span, exception.startDate.isDate, source));
  }
}

/**
 * Expands every VEVENT of a feed into the occurrences that intersect
 * `window`, in chronological order.
 */
export function expandEvents(
  text: string,
  source: CalendarSource,
  window: DateWindow,
  zone: string = 'UTC',
  log?: Logger,
): ExpandedEvent[] {
  const out: ExpandedEvent[] = [];
  for (const decoded of decode(text, source, zone)) {
    try {
      expandEvent(decoded, source, window, zone, out, log);
    } catch (err) {
      const name = decoded.raw.summary || decoded.raw.uid;
      throw new ParseError(redactUrl(source.url), `cannot expand "${name}": ${errorMessage(err)}`, { cause: err });
    }
  }
  return out.sort(compareItems);
}
