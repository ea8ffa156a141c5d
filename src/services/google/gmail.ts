import {
  type GmailLabel,
  GmailLabelListCodec,
  type GmailMessage,
  GmailMessageCodec,
  GmailMessageListCodec,
  GmailSendResponseCodec,
} from '../../types/google.codecs.js';
import type { GoogleApiClient } from './client.js';
import { encodeRawEmail, extractPlainTextBody, getHeader, type OutgoingEmail } from './mime.js';

export type EmailSummary = {
  id: string;
  from: string;
  subject: string;
  date: string;
};

export type EmailContent = EmailSummary & { body: string };

const SUMMARY_HEADERS = ['Subject', 'From', 'Date'];

export async function listLabels(
  api: GoogleApiClient,
  signal?: AbortSignal,
): Promise<GmailLabel[]> {
  const result = await api.request(GmailLabelListCodec, 'GET', 'labels', { signal });
  return result.labels ?? [];
}

export async function findLabelId(
  api: GoogleApiClient,
  labelName: string,
  signal?: AbortSignal,
): Promise<string | undefined> {
  const labels = await listLabels(api, signal);
  return labels.find((label) => label.name === labelName)?.id;
}

export async function listMessageIds(
  api: GoogleApiClient,
  options: { labelId?: string; maxResults: number },
  signal?: AbortSignal,
): Promise<string[]> {
  const result = await api.request(GmailMessageListCodec, 'GET', 'messages', {
    query: {
      maxResults: options.maxResults,
      labelIds: options.labelId ? [options.labelId] : undefined,
    },
    signal,
  });
  return (result.messages ?? []).map((m) => m.id);
}

export async function getMessage(
  api: GoogleApiClient,
  id: string,
  options: { format: 'full' | 'metadata' } = { format: 'full' },
  signal?: AbortSignal,
): Promise<GmailMessage> {
  return api.request(GmailMessageCodec, 'GET', `messages/${encodeURIComponent(id)}`, {
    query: {
      format: options.format,
      metadataHeaders: options.format === 'metadata' ? SUMMARY_HEADERS : undefined,
    },
    signal,
  });
}

export function toEmailSummary(message: GmailMessage): EmailSummary {
  const headers = message.payload?.headers;
  return {
    id: message.id,
    from: getHeader(headers, 'From') ?? 'Unknown Sender',
    subject: getHeader(headers, 'Subject') ?? 'No Subject',
    date: getHeader(headers, 'Date') ?? 'No Date',
  };
}

export async function listRecentEmails(
  api: GoogleApiClient,
  options: { labelId?: string; maxResults: number },
  signal?: AbortSignal,
): Promise<EmailSummary[]> {
  const ids = await listMessageIds(api, options, signal);
  const summaries: EmailSummary[] = [];
  for (const id of ids) {
    const message = await getMessage(api, id, { format: 'metadata' }, signal);
    summaries.push(toEmailSummary(message));
  }
  return summaries;
}

export async function readEmail(
  api: GoogleApiClient,
  id: string,
  signal?: AbortSignal,
): Promise<EmailContent> {
  const message = await getMessage(api, id, { format: 'full' }, signal);
  return { ...toEmailSummary(message), body: extractPlainTextBody(message.payload) };
}

export async function sendEmail(
  api: GoogleApiClient,
  email: OutgoingEmail,
  options: { threadId?: string } = {},
  signal?: AbortSignal,
): Promise<{ id: string; threadId?: string }> {
  return api.request(GmailSendResponseCodec, 'POST', 'messages/send', {
    body: { raw: encodeRawEmail(email), threadId: options.threadId },
    signal,
  });
}

export function replySubject(subject: string | undefined): string {
  if (!subject) {
    return 'Re: No Subject';
  }
  return subject.startsWith('Re: ') ? subject : `Re: ${subject}`;
}

export async function replyToEmail(
  api: GoogleApiClient,
  messageId: string,
  replyText: string,
  signal?: AbortSignal,
): Promise<{ id: string; threadId?: string }> {
  const original = await getMessage(api, messageId, { format: 'full' }, signal);
  const headers = original.payload?.headers;
  const rfcMessageId = getHeader(headers, 'Message-ID') ?? messageId;
  const priorReferences = getHeader(headers, 'References');

  return sendEmail(
    api,
    {
      to: getHeader(headers, 'From') ?? '',
      subject: replySubject(getHeader(headers, 'Subject')),
      body: replyText,
      inReplyTo: rfcMessageId,
      references: priorReferences ? `${priorReferences} ${rfcMessageId}` : rfcMessageId,
    },
    { threadId: original.threadId },
    signal,
  );
}
