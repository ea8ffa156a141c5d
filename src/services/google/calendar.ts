import {
  type CalendarEvent,
  CalendarEventCodec,
  CalendarEventListCodec,
  type CalendarListEntry,
  CalendarListCodec,
  type EventDateTime,
} from '../../types/google.codecs.js';
import type { GoogleApiClient } from './client.js';

export const PRIMARY_CALENDAR = 'primary';

const DAY_MS = 24 * 60 * 60 * 1000;

export type NewEvent = {
  summary: string;
  startTime: string;
  endTime: string;
  description?: string;
  timeZone: string;
};

export type EventChanges = {
  summary?: string;
  startTime?: string;
  endTime?: string;
  description?: string;
};

function eventsPath(calendarId: string, eventId?: string): string {
  const base = `calendars/${encodeURIComponent(calendarId)}/events`;
  return eventId ? `${base}/${encodeURIComponent(eventId)}` : base;
}

export async function listCalendars(
  api: GoogleApiClient,
  signal?: AbortSignal,
): Promise<CalendarListEntry[]> {
  const result = await api.request(CalendarListCodec, 'GET', 'users/me/calendarList', {
    signal,
  });
  return result.items ?? [];
}

export async function listUpcomingEvents(
  api: GoogleApiClient,
  options: { calendarId: string; maxResults: number; daysAhead: number; now: Date },
  signal?: AbortSignal,
): Promise<CalendarEvent[]> {
  const timeMin = options.now.toISOString();
  const timeMax = new Date(options.now.getTime() + options.daysAhead * DAY_MS).toISOString();
  const result = await api.request(CalendarEventListCodec, 'GET', eventsPath(options.calendarId), {
    query: {
      timeMin,
      timeMax,
      maxResults: options.maxResults,
      singleEvents: true,
      orderBy: 'startTime',
    },
    signal,
  });
  return result.items ?? [];
}

export async function createEvent(
  api: GoogleApiClient,
  calendarId: string,
  event: NewEvent,
  signal?: AbortSignal,
): Promise<CalendarEvent> {
  const body: Record<string, unknown> = {
    summary: event.summary,
    start: { dateTime: event.startTime, timeZone: event.timeZone },
    end: { dateTime: event.endTime, timeZone: event.timeZone },
  };
  if (event.description) {
    body.description = event.description;
  }
  return api.request(CalendarEventCodec, 'POST', eventsPath(calendarId), { body, signal });
}

export function applyEventChanges(event: CalendarEvent, changes: EventChanges): CalendarEvent {
  const next: CalendarEvent = { ...event };
  if (changes.summary) {
    next.summary = changes.summary;
  }
  if (changes.description !== undefined) {
    next.description = changes.description;
  }
  if (changes.startTime) {
    next.start = withDateTime(event.start, changes.startTime);
  }
  if (changes.endTime) {
    next.end = withDateTime(event.end, changes.endTime);
  }
  return next;
}

function withDateTime(current: EventDateTime | undefined, dateTime: string): EventDateTime {
  // An all-day `date` cannot coexist with `dateTime`.
  const { date: _date, ...rest }: EventDateTime = current ?? {};
  return { ...rest, dateTime };
}

export async function updateEvent(
  api: GoogleApiClient,
  calendarId: string,
  eventId: string,
  changes: EventChanges,
  signal?: AbortSignal,
): Promise<CalendarEvent> {
  const existing = await api.request(
    CalendarEventCodec,
    'GET',
    eventsPath(calendarId, eventId),
    { signal },
  );
  return api.request(CalendarEventCodec, 'PUT', eventsPath(calendarId, eventId), {
    body: applyEventChanges(existing, changes),
    signal,
  });
}

export async function deleteEvent(
  api: GoogleApiClient,
  calendarId: string,
  eventId: string,
  signal?: AbortSignal,
): Promise<void> {
  await api.send('DELETE', eventsPath(calendarId, eventId), { signal });
}
