import { z } from 'zod';

const IsoDateTime = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:\d{2})?$/, {
    message: 'Expected ISO 8601 date-time (YYYY-MM-DDTHH:MM:SS)',
  });

const CalendarId = z
  .string()
  .min(1)
  .optional()
  .describe("Calendar ID from list_calendars. Defaults to 'primary'.");

// Gmail
export const ListEmailLabelsInputSchema = z.object({});
export type ListEmailLabelsInput = z.infer<typeof ListEmailLabelsInputSchema>;

export const ListRecentEmailsInputSchema = z.object({
  label_name: z
    .string()
    .min(1)
    .optional()
    .describe('Exact label name to filter by (see list_email_labels).'),
  max_results: z
    .number()
    .int()
    .min(1)
    .max(100)
    .default(10)
    .describe('Maximum number of emails to retrieve (1-100).'),
});
export type ListRecentEmailsInput = z.infer<typeof ListRecentEmailsInputSchema>;

export const ReadEmailInputSchema = z.object({
  message_id: z.string().min(1).describe('Message ID from list_recent_emails.'),
});
export type ReadEmailInput = z.infer<typeof ReadEmailInputSchema>;

export const SendEmailInputSchema = z.object({
  to: z.string().email().describe('Recipient email address.'),
  subject: z.string().describe('Email subject.'),
  body: z.string().describe('Plain-text email body.'),
});
export type SendEmailInput = z.infer<typeof SendEmailInputSchema>;

export const ReplyToEmailInputSchema = z.object({
  message_id: z.string().min(1).describe('Message ID of the email being answered.'),
  reply_text: z.string().min(1).describe('Plain-text reply body.'),
});
export type ReplyToEmailInput = z.infer<typeof ReplyToEmailInputSchema>;

// Calendar
export const ListCalendarsInputSchema = z.object({});
export type ListCalendarsInput = z.infer<typeof ListCalendarsInputSchema>;

export const ListUpcomingEventsInputSchema = z.object({
  calendar_id: CalendarId,
  max_results: z
    .number()
    .int()
    .min(1)
    .max(250)
    .default(10)
    .describe('Maximum number of events to retrieve (1-250).'),
  days_ahead: z
    .number()
    .int()
    .min(1)
    .max(365)
    .default(30)
    .describe('How many days ahead to look (1-365).'),
});
export type ListUpcomingEventsInput = z.infer<typeof ListUpcomingEventsInputSchema>;

export const CreateEventInputSchema = z.object({
  summary: z.string().min(1).describe('Event title.'),
  start_time: IsoDateTime.describe('Start time (YYYY-MM-DDTHH:MM:SS).'),
  end_time: IsoDateTime.describe('End time (YYYY-MM-DDTHH:MM:SS).'),
  description: z.string().optional().describe('Event description.'),
  calendar_id: CalendarId,
});
export type CreateEventInput = z.infer<typeof CreateEventInputSchema>;

export const UpdateEventInputSchema = z.object({
  event_id: z.string().min(1).describe('Event ID from list_upcoming_events.'),
  calendar_id: CalendarId,
  summary: z.string().optional().describe('New event title.'),
  start_time: IsoDateTime.optional().describe('New start time (YYYY-MM-DDTHH:MM:SS).'),
  end_time: IsoDateTime.optional().describe('New end time (YYYY-MM-DDTHH:MM:SS).'),
  description: z.string().optional().describe('New description; an empty string clears it.'),
});
export type UpdateEventInput = z.infer<typeof UpdateEventInputSchema>;

export const DeleteEventInputSchema = z.object({
  event_id: z.string().min(1).describe('Event ID to delete.'),
  calendar_id: CalendarId,
});
export type DeleteEventInput = z.infer<typeof DeleteEventInputSchema>;

// Spotify
export const SearchAndPlayInputSchema = z.object({
  query: z
    .string()
    .trim()
    .min(1)
    .describe('What to play: "Song", "Song by Artist", or "Song - Artist".'),
  search_type: z
    .enum(['track'])
    .optional()
    .describe("Catalog item type to search. Only 'track' is playable here."),
});
export type SearchAndPlayInput = z.infer<typeof SearchAndPlayInputSchema>;

// Weather
export const FindLocationInputSchema = z.object({});
export type FindLocationInput = z.infer<typeof FindLocationInputSchema>;

export const CurrentWeatherInputSchema = z.object({
  location: z.string().min(1).describe('City name to get current weather for.'),
});
export type CurrentWeatherInput = z.infer<typeof CurrentWeatherInputSchema>;

export const ForecastWeatherInputSchema = z.object({
  location: z.string().min(1).describe('City name to get the forecast for.'),
  date: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/, { message: 'Expected YYYY-MM-DD' })
    .optional()
    .describe('Specific date for the forecast (YYYY-MM-DD).'),
});
export type ForecastWeatherInput = z.infer<typeof ForecastWeatherInputSchema>;

// Health
export const HealthInputSchema = z.object({
  verbose: z.boolean().optional().describe('Include additional runtime details'),
});
export type HealthInput = z.infer<typeof HealthInputSchema>;
