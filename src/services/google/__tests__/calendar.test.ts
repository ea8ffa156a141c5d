import { describe, expect, test } from 'vitest';

import {
  applyEventChanges,
  createEvent,
  deleteEvent,
  listCalendars,
  listUpcomingEvents,
  updateEvent,
} from '../calendar.js';
import { CALENDAR_BASE, fakeGoogleApi } from './fake-google.js';

describe('listCalendars', () => {
  test('reads the calendar list', async () => {
    const { api } = fakeGoogleApi(CALENDAR_BASE, {
      'GET users/me/calendarList': {
        body: { items: [{ id: 'primary-id', summary: 'Personal', primary: true }] },
      },
    });
    await expect(listCalendars(api)).resolves.toEqual([
      { id: 'primary-id', summary: 'Personal', primary: true },
    ]);
  });
});

describe('listUpcomingEvents', () => {
  test('queries a window from now, expanded and ordered by start', async () => {
    const { api, calls } = fakeGoogleApi(CALENDAR_BASE, {
      'GET calendars/primary/events': { body: { items: [{ id: 'e1', summary: 'Standup' }] } },
    });
    const now = new Date('2026-03-01T08:00:00.000Z');

    const events = await listUpcomingEvents(api, {
      calendarId: 'primary',
      maxResults: 5,
      daysAhead: 7,
      now,
    });

    expect(events).toEqual([{ id: 'e1', summary: 'Standup' }]);
    const params = calls[0]?.url.searchParams;
    expect(params?.get('timeMin')).toBe('2026-03-01T08:00:00.000Z');
    expect(params?.get('timeMax')).toBe('2026-03-08T08:00:00.000Z');
    expect(params?.get('maxResults')).toBe('5');
    expect(params?.get('singleEvents')).toBe('true');
    expect(params?.get('orderBy')).toBe('startTime');
  });

  test('encodes calendar ids in the path', async () => {
    const { api, calls } = fakeGoogleApi(CALENDAR_BASE, {
      'GET calendars/team@group.calendar.google.com/events': { body: {} },
    });
    await listUpcomingEvents(api, {
      calendarId: 'team@group.calendar.google.com',
      maxResults: 10,
      daysAhead: 30,
      now: new Date('2026-03-01T00:00:00.000Z'),
    });
    expect(calls[0]?.url.pathname).toBe(
      '/calendar/v3/calendars/team%40group.calendar.google.com/events',
    );
  });
});

describe('createEvent', () => {
  test('sends times with the configured time zone', async () => {
    const { api, calls } = fakeGoogleApi(CALENDAR_BASE, {
      'POST calendars/primary/events': {
        body: { id: 'new1', htmlLink: 'https://calendar.example.com/new1' },
      },
    });

    const created = await createEvent(api, 'primary', {
      summary: 'Review',
      startTime: '2026-03-02T10:00:00',
      endTime: '2026-03-02T11:00:00',
      timeZone: 'Europe/Warsaw',
    });

    expect(created.id).toBe('new1');
    expect(calls[0]?.body).toEqual({
      summary: 'Review',
      start: { dateTime: '2026-03-02T10:00:00', timeZone: 'Europe/Warsaw' },
      end: { dateTime: '2026-03-02T11:00:00', timeZone: 'Europe/Warsaw' },
    });
  });
});

describe('applyEventChanges', () => {
  const event = {
    id: 'e1',
    summary: 'Standup',
    description: 'Daily',
    start: { dateTime: '2026-03-02T09:00:00Z' },
    end: { dateTime: '2026-03-02T09:15:00Z' },
    location: 'Room 1',
  };

  test('changes only the supplied fields', () => {
    expect(applyEventChanges(event, { summary: 'Sync' })).toEqual({ ...event, summary: 'Sync' });
  });

  test('ignores an empty summary but applies an empty description', () => {
    expect(applyEventChanges(event, { summary: '', description: '' })).toEqual({
      ...event,
      description: '',
    });
  });

  test('replaces an all-day date with a date-time', () => {
    const allDay = { id: 'e2', start: { date: '2026-03-02' }, end: { date: '2026-03-03' } };
    expect(
      applyEventChanges(allDay, { startTime: '2026-03-02T10:00:00', endTime: '2026-03-02T11:00:00' }),
    ).toEqual({
      id: 'e2',
      start: { dateTime: '2026-03-02T10:00:00' },
      end: { dateTime: '2026-03-02T11:00:00' },
    });
  });
});

describe('updateEvent', () => {
  test('reads the event and writes it back with changes, keeping unknown fields', async () => {
    const { api, calls } = fakeGoogleApi(CALENDAR_BASE, {
      'GET calendars/primary/events/e1': {
        body: { id: 'e1', summary: 'Standup', location: 'Room 1' },
      },
      'PUT calendars/primary/events/e1': (call) => ({ body: call.body }),
    });

    const updated = await updateEvent(api, 'primary', 'e1', { summary: 'Sync' });

    expect(updated).toEqual({ id: 'e1', summary: 'Sync', location: 'Room 1' });
    expect(calls.map((c) => c.method)).toEqual(['GET', 'PUT']);
  });
});

describe('deleteEvent', () => {
  test('accepts an empty 204 response', async () => {
    const { api, calls } = fakeGoogleApi(CALENDAR_BASE, {
      'DELETE calendars/primary/events/e1': { status: 204 },
    });
    await expect(deleteEvent(api, 'primary', 'e1')).resolves.toBeUndefined();
    expect(calls[0]?.method).toBe('DELETE');
  });
});
