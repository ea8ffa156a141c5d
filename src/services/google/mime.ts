import type { GmailHeader, GmailMessagePart } from '../../types/google.codecs.js';

export type OutgoingEmail = {
  to: string;
  subject: string;
  body: string;
  inReplyTo?: string;
  references?: string;
};

const NO_BODY = 'No readable content found.';

// biome-ignore lint/suspicious/noControlCharactersInRegex: ASCII range check
const NON_ASCII = /[^\x00-\x7f]/;

export function getHeader(
  headers: GmailHeader[] | undefined,
  name: string,
): string | undefined {
  const wanted = name.toLowerCase();
  return headers?.find((h) => h.name.toLowerCase() === wanted)?.value;
}

export function encodeHeaderValue(value: string): string {
  if (!NON_ASCII.test(value)) {
    return value;
  }
  return `=?UTF-8?B?${Buffer.from(value, 'utf-8').toString('base64')}?=`;
}

/** Serializes a plain-text UTF-8 message (RFC 5322) with CRLF line endings. */
export function buildRawEmail(email: OutgoingEmail): string {
  const headers: string[] = [
    `To: ${email.to}`,
    `Subject: ${encodeHeaderValue(email.subject)}`,
  ];
  if (email.inReplyTo) {
    headers.push(`In-Reply-To: ${email.inReplyTo}`);
  }
  if (email.references) {
    headers.push(`References: ${email.references}`);
  }
  headers.push('MIME-Version: 1.0', 'Content-Type: text/plain; charset="utf-8"');

  const normalizedBody = email.body.replace(/\r?\n/g, '\r\n');
  if (NON_ASCII.test(normalizedBody)) {
    headers.push('Content-Transfer-Encoding: base64');
    const encoded = Buffer.from(normalizedBody, 'utf-8').toString('base64');
    const wrapped = encoded.match(/.{1,76}/g)?.join('\r\n') ?? '';
    return `${headers.join('\r\n')}\r\n\r\n${wrapped}\r\n`;
  }

  headers.push('Content-Transfer-Encoding: 7bit');
  return `${headers.join('\r\n')}\r\n\r\n${normalizedBody}\r\n`;
}

/** Gmail's `raw` field: the whole message, base64url without padding. */
export function encodeRawEmail(email: OutgoingEmail): string {
  return Buffer.from(buildRawEmail(email), 'utf-8').toString('base64url');
}

export function decodeBase64Url(data: string): string {
  return Buffer.from(data, 'base64url').toString('utf-8');
}

function findPlainText(part: GmailMessagePart): string | undefined {
  if (part.mimeType === 'text/plain' && part.body?.data) {
    return decodeBase64Url(part.body.data);
  }
  for (const child of part.parts ?? []) {
    const found = findPlainText(child);
    if (found !== undefined) {
      return found;
    }
  }
  return undefined;
}

/**
 * First text/plain part, depth-first; a single-part message falls back to its
 * own body whatever its type.
 */
export function extractPlainTextBody(payload: GmailMessagePart | undefined): string {
  if (!payload) {
    return NO_BODY;
  }
  if (payload.parts && payload.parts.length > 0) {
    return findPlainText(payload) ?? NO_BODY;
  }
  if (payload.body?.data) {
    return decodeBase64Url(payload.body.data);
  }
  return NO_BODY;
}
