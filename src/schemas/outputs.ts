/**
 * Output schemas for the agent tools.
 * Every successful result carries `_msg`, the same text shown to the model.
 */

import { z } from 'zod';

// ---------------------------------------------------------------------------
// Gmail
// ---------------------------------------------------------------------------

export const EmailLabelsOutput = z.object({
  _msg: z.string(),
  labels: z.array(z.object({ id: z.string(), name: z.string() })),
});
export type EmailLabelsOutput = z.infer<typeof EmailLabelsOutput>;

const EmailSummarySchema = z.object({
  id: z.string(),
  from: z.string(),
  subject: z.string(),
  date: z.string(),
});

export const RecentEmailsOutput = z.object({
  _msg: z.string(),
  label_id: z.string().optional(),
  emails: z.array(EmailSummarySchema),
});
export type RecentEmailsOutput = z.infer<typeof RecentEmailsOutput>;

export const EmailContentOutput = z.object({
  _msg: z.string(),
  email: EmailSummarySchema.extend({ body: z.string() }),
});
export type EmailContentOutput = z.infer<typeof EmailContentOutput>;

export const EmailSentOutput = z.object({
  _msg: z.string(),
  id: z.string(),
  thread_id: z.string().optional(),
});
export type EmailSentOutput = z.infer<typeof EmailSentOutput>;

// ---------------------------------------------------------------------------
// Calendar
// ---------------------------------------------------------------------------

export const CalendarsOutput = z.object({
  _msg: z.string(),
  calendars: z.array(
    z.object({ id: z.string(), summary: z.string(), primary: z.boolean().optional() }),
  ),
});
export type CalendarsOutput = z.infer<typeof CalendarsOutput>;

const EventSummarySchema = z.object({
  id: z.string(),
  summary: z.string(),
  start: z.string().optional(),
  end: z.string().optional(),
  link: z.string().optional(),
});
export type EventSummary = z.infer<typeof EventSummarySchema>;

export const UpcomingEventsOutput = z.object({
  _msg: z.string(),
  calendar_id: z.string(),
  events: z.array(EventSummarySchema),
});
export type UpcomingEventsOutput = z.infer<typeof UpcomingEventsOutput>;

export const EventChangedOutput = z.object({
  _msg: z.string(),
  calendar_id: z.string(),
  event: EventSummarySchema,
});
export type EventChangedOutput = z.infer<typeof EventChangedOutput>;

export const EventDeletedOutput = z.object({
  _msg: z.string(),
  calendar_id: z.string(),
  event_id: z.string(),
});
export type EventDeletedOutput = z.infer<typeof EventDeletedOutput>;

// ---------------------------------------------------------------------------
// Spotify
// ---------------------------------------------------------------------------

export const SearchAndPlayOutput = z.object({
  _msg: z.string(),
  ok: z.boolean(),
  reason: z.enum(['no_match', 'no_device', 'launch_failed']).optional(),
  retried: z.boolean(),
  track: z
    .object({
      id: z.string(),
      uri: z.string(),
      name: z.string(),
      artists: z.array(z.string()),
    })
    .optional(),
  device: z
    .object({
      id: z.string(),
      name: z.string(),
      was_active: z.boolean(),
    })
    .optional(),
});
export type SearchAndPlayOutput = z.infer<typeof SearchAndPlayOutput>;

// ---------------------------------------------------------------------------
// Weather
// ---------------------------------------------------------------------------

export const LocationOutput = z.object({
  _msg: z.string(),
  city: z.string(),
  region: z.string(),
  country: z.string(),
});
export type LocationOutput = z.infer<typeof LocationOutput>;

export const CurrentWeatherOutput = z.object({
  _msg: z.string(),
  location: z.object({ name: z.string(), country: z.string() }),
  temp_c: z.number(),
  feelslike_c: z.number(),
  condition: z.string(),
  humidity: z.number(),
  wind_kph: z.number(),
  wind_dir: z.string(),
  gust_kph: z.number(),
  vis_km: z.number(),
  uv: z.number(),
  precip_mm: z.number(),
});
export type CurrentWeatherOutput = z.infer<typeof CurrentWeatherOutput>;

export const ForecastOutput = z.object({
  _msg: z.string(),
  location: z.string(),
  date: z.string(),
  condition: z.string(),
  maxtemp_c: z.number(),
  mintemp_c: z.number(),
  avgtemp_c: z.number(),
  daily_chance_of_rain: z.number(),
  totalprecip_mm: z.number(),
  maxwind_kph: z.number(),
  sunrise: z.string(),
  sunset: z.string(),
  moon_phase: z.string(),
  hours: z.array(
    z.object({
      time: z.string(),
      temp_c: z.number(),
      condition: z.string(),
      chance_of_rain: z.number(),
      wind_kph: z.number(),
    }),
  ),
});
export type ForecastOutput = z.infer<typeof ForecastOutput>;

// ---------------------------------------------------------------------------
// Health
// ---------------------------------------------------------------------------

export const HealthOutput = z.object({
  status: z.enum(['ok', 'degraded', 'error']),
  timestamp: z.number(),
  uptime: z.number(),
  runtime: z.string(),
  nodeVersion: z.string().optional(),
  memoryUsage: z.number().optional(),
});
export type HealthOutput = z.infer<typeof HealthOutput>;
