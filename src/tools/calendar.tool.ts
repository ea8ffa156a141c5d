import { toolsMetadata } from '../config/metadata.js';
import {
  CreateEventInputSchema,
  DeleteEventInputSchema,
  ListCalendarsInputSchema,
  ListUpcomingEventsInputSchema,
  UpdateEventInputSchema,
} from '../schemas/inputs.js';
import {
  CalendarsOutput,
  EventChangedOutput,
  EventDeletedOutput,
  type EventSummary,
  UpcomingEventsOutput,
} from '../schemas/outputs.js';
import {
  createEvent,
  deleteEvent,
  listCalendars,
  listUpcomingEvents,
  PRIMARY_CALENDAR,
  updateEvent,
} from '../services/google/calendar.js';
import type { CalendarEvent, CalendarListEntry, EventDateTime } from '../types/google.codecs.js';
import { logger } from '../utils/logger.js';
import { validateDev } from '../utils/validate.js';
import { errorResult, textResult } from './result.js';
import { defineTool } from './types.js';

function when(value: EventDateTime | undefined): string | undefined {
  return value?.dateTime ?? value?.date;
}

export function toEventSummary(event: CalendarEvent): EventSummary {
  return {
    id: event.id,
    summary: event.summary ?? 'No Title',
    start: when(event.start),
    end: when(event.end),
    link: event.htmlLink,
  };
}

export function formatCalendars(calendars: readonly CalendarListEntry[]): string {
  if (calendars.length === 0) {
    return 'No calendars found.';
  }
  const lines = calendars.map((c) => `- ${c.summary ?? c.id} (ID: ${c.id})`);
  return `Available Calendars:\n${lines.join('\n')}`;
}

export function formatUpcomingEvents(events: readonly EventSummary[], daysAhead: number): string {
  if (events.length === 0) {
    return `No upcoming events found in the next ${daysAhead} days.`;
  }
  const entries = events.map(
    (event, i) =>
      `${i + 1}. Summary: ${event.summary}\n` +
      `   Start: ${event.start ?? ''}\n` +
      `   End: ${event.end ?? ''}\n` +
      `   Event ID: ${event.id}`,
  );
  return `Upcoming Events:\n${entries.join('\n\n')}`;
}

function formatChanged(heading: string, event: EventSummary): string {
  return `${heading}\nEvent ID: ${event.id}\nEvent Link: ${event.link ?? 'No link available'}`;
}

export const listCalendarsTool = defineTool({
  ...toolsMetadata.list_calendars,
  inputSchema: ListCalendarsInputSchema,
  outputSchema: CalendarsOutput.shape,
  annotations: { readOnlyHint: true, openWorldHint: true },
  handler: async (_args, context) => {
    try {
      const calendars = await listCalendars(context.services.calendar, context.signal);
      const structured: CalendarsOutput = {
        _msg: formatCalendars(calendars),
        calendars: calendars.map((c) => ({
          id: c.id,
          summary: c.summary ?? c.id,
          primary: c.primary,
        })),
      };
      return textResult(validateDev(CalendarsOutput, structured), context);
    } catch (error) {
      logger.error('calendar', { tool: 'list_calendars', error: String(error) });
      return errorResult('An error occurred while listing calendars', error);
    }
  },
});

export const listUpcomingEventsTool = defineTool({
  ...toolsMetadata.list_upcoming_events,
  inputSchema: ListUpcomingEventsInputSchema,
  outputSchema: UpcomingEventsOutput.shape,
  annotations: { readOnlyHint: true, openWorldHint: true },
  handler: async (args, context) => {
    const calendarId = args.calendar_id ?? PRIMARY_CALENDAR;
    try {
      const events = await listUpcomingEvents(
        context.services.calendar,
        {
          calendarId,
          maxResults: args.max_results,
          daysAhead: args.days_ahead,
          now: context.services.now(),
        },
        context.signal,
      );
      const summaries = events.map(toEventSummary);
      const structured: UpcomingEventsOutput = {
        _msg: formatUpcomingEvents(summaries, args.days_ahead),
        calendar_id: calendarId,
        events: summaries,
      };
      return textResult(validateDev(UpcomingEventsOutput, structured), context);
    } catch (error) {
      logger.error('calendar', { tool: 'list_upcoming_events', calendarId, error: String(error) });
      return errorResult('An error occurred while listing events', error);
    }
  },
});

export const createEventTool = defineTool({
  ...toolsMetadata.create_event,
  inputSchema: CreateEventInputSchema,
  outputSchema: EventChangedOutput.shape,
  annotations: { readOnlyHint: false, destructiveHint: false, openWorldHint: true },
  handler: async (args, context) => {
    const calendarId = args.calendar_id ?? PRIMARY_CALENDAR;
    try {
      const created = await createEvent(
        context.services.calendar,
        calendarId,
        {
          summary: args.summary,
          startTime: args.start_time,
          endTime: args.end_time,
          description: args.description,
          timeZone: context.services.calendarTimeZone,
        },
        context.signal,
      );
      logger.info('calendar', { message: 'Event created', calendarId, eventId: created.id });
      const event = toEventSummary(created);
      const structured: EventChangedOutput = {
        _msg: formatChanged('Event created successfully!', event),
        calendar_id: calendarId,
        event,
      };
      return textResult(validateDev(EventChangedOutput, structured), context);
    } catch (error) {
      logger.error('calendar', { tool: 'create_event', calendarId, error: String(error) });
      return errorResult('An error occurred while creating event', error);
    }
  },
});

export const updateEventTool = defineTool({
  ...toolsMetadata.update_event,
  inputSchema: UpdateEventInputSchema,
  outputSchema: EventChangedOutput.shape,
  annotations: { readOnlyHint: false, destructiveHint: false, idempotentHint: true, openWorldHint: true },
  handler: async (args, context) => {
    const calendarId = args.calendar_id ?? PRIMARY_CALENDAR;
    try {
      const updated = await updateEvent(
        context.services.calendar,
        calendarId,
        args.event_id,
        {
          summary: args.summary,
          startTime: args.start_time,
          endTime: args.end_time,
          description: args.description,
        },
        context.signal,
      );
      logger.info('calendar', { message: 'Event updated', calendarId, eventId: updated.id });
      const event = toEventSummary(updated);
      const structured: EventChangedOutput = {
        _msg: formatChanged('Event updated successfully!', event),
        calendar_id: calendarId,
        event,
      };
      return textResult(validateDev(EventChangedOutput, structured), context);
    } catch (error) {
      logger.error('calendar', { tool: 'update_event', calendarId, error: String(error) });
      return errorResult('An error occurred while updating event', error);
    }
  },
});

export const deleteEventTool = defineTool({
  ...toolsMetadata.delete_event,
  inputSchema: DeleteEventInputSchema,
  outputSchema: EventDeletedOutput.shape,
  annotations: { readOnlyHint: false, destructiveHint: true, openWorldHint: true },
  handler: async (args, context) => {
    const calendarId = args.calendar_id ?? PRIMARY_CALENDAR;
    try {
      await deleteEvent(context.services.calendar, calendarId, args.event_id, context.signal);
      logger.info('calendar', { message: 'Event deleted', calendarId, eventId: args.event_id });
      const structured: EventDeletedOutput = {
        _msg: `Event with ID ${args.event_id} deleted successfully from calendar ${calendarId}.`,
        calendar_id: calendarId,
        event_id: args.event_id,
      };
      return textResult(validateDev(EventDeletedOutput, structured), context);
    } catch (error) {
      logger.error('calendar', { tool: 'delete_event', calendarId, error: String(error) });
      return errorResult('An error occurred while deleting event', error);
    }
  },
});

export const calendarTools = [
  listCalendarsTool,
  listUpcomingEventsTool,
  createEventTool,
  updateEventTool,
  deleteEventTool,
];
