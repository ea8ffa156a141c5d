import { z } from 'zod';

// OAuth token endpoint
export const GoogleTokenResponseCodec = z.object({
  access_token: z.string(),
  expires_in: z.union([z.number(), z.string()]).optional(),
  scope: z.string().optional(),
  token_type: z.string().optional(),
});
export type GoogleTokenResponseCodecType = z.infer<typeof GoogleTokenResponseCodec>;

// Error envelope shared by Google REST APIs
export const GoogleErrorCodec = z.object({
  error: z.object({
    code: z.number().optional(),
    message: z.string().optional(),
    status: z.string().optional(),
  }),
});

// Gmail
export const GmailLabelCodec = z.object({
  id: z.string(),
  name: z.string(),
  type: z.string().optional(),
});
export const GmailLabelListCodec = z.object({
  labels: z.array(GmailLabelCodec).optional(),
});
export type GmailLabel = z.infer<typeof GmailLabelCodec>;

export const GmailMessageRefCodec = z.object({
  id: z.string(),
  threadId: z.string().optional(),
});
export const GmailMessageListCodec = z.object({
  messages: z.array(GmailMessageRefCodec).optional(),
  resultSizeEstimate: z.number().optional(),
});

const GmailHeaderCodec = z.object({ name: z.string(), value: z.string() });
export type GmailHeader = z.infer<typeof GmailHeaderCodec>;

const GmailBodyCodec = z.object({
  size: z.number().optional(),
  data: z.string().optional(),
  attachmentId: z.string().optional(),
});

export type GmailMessagePart = {
  partId?: string;
  mimeType?: string;
  filename?: string;
  headers?: GmailHeader[];
  body?: z.infer<typeof GmailBodyCodec>;
  parts?: GmailMessagePart[];
};

export const GmailMessagePartCodec: z.ZodType<GmailMessagePart> = z.lazy(() =>
  z.object({
    partId: z.string().optional(),
    mimeType: z.string().optional(),
    filename: z.string().optional(),
    headers: z.array(GmailHeaderCodec).optional(),
    body: GmailBodyCodec.optional(),
    parts: z.array(GmailMessagePartCodec).optional(),
  }),
);

export const GmailMessageCodec = z.object({
  id: z.string(),
  threadId: z.string().optional(),
  labelIds: z.array(z.string()).optional(),
  snippet: z.string().optional(),
  payload: GmailMessagePartCodec.optional(),
});
export type GmailMessage = z.infer<typeof GmailMessageCodec>;

export const GmailSendResponseCodec = z.object({
  id: z.string(),
  threadId: z.string().optional(),
  labelIds: z.array(z.string()).optional(),
});

// Calendar
export const CalendarListEntryCodec = z.object({
  id: z.string(),
  summary: z.string().optional(),
  primary: z.boolean().optional(),
  timeZone: z.string().optional(),
});
export const CalendarListCodec = z.object({
  items: z.array(CalendarListEntryCodec).optional(),
});
export type CalendarListEntry = z.infer<typeof CalendarListEntryCodec>;

const EventDateTimeCodec = z.object({
  date: z.string().optional(),
  dateTime: z.string().optional(),
  timeZone: z.string().optional(),
});
export type EventDateTime = z.infer<typeof EventDateTimeCodec>;

// Updates send the whole resource back, so unknown fields must survive parsing.
export const CalendarEventCodec = z
  .object({
    id: z.string(),
    summary: z.string().optional(),
    description: z.string().optional(),
    htmlLink: z.string().optional(),
    start: EventDateTimeCodec.optional(),
    end: EventDateTimeCodec.optional(),
  })
  .passthrough();
export type CalendarEvent = z.infer<typeof CalendarEventCodec>;

export const CalendarEventListCodec = z.object({
  items: z.array(CalendarEventCodec).optional(),
});
