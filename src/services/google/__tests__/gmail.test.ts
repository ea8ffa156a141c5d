import { describe, expect, test } from 'vitest';

import { TransportError } from '../../../utils/http-result.js';
import {
  findLabelId,
  listRecentEmails,
  readEmail,
  replySubject,
  replyToEmail,
  sendEmail,
} from '../gmail.js';
import { decodeBase64Url } from '../mime.js';
import { encodeBody, fakeGoogleApi, GMAIL_BASE } from './fake-google.js';

const labels = {
  labels: [
    { id: 'INBOX', name: 'INBOX', type: 'system' },
    { id: 'Label_7', name: 'Receipts', type: 'user' },
  ],
};

function rawOf(body: unknown): string {
  if (typeof body === 'object' && body !== null && 'raw' in body && typeof body.raw === 'string') {
    return decodeBase64Url(body.raw);
  }
  throw new Error('request body has no raw message');
}

describe('findLabelId', () => {
  test('matches the exact label name', async () => {
    const { api } = fakeGoogleApi(GMAIL_BASE, { 'GET labels': { body: labels } });
    await expect(findLabelId(api, 'Receipts')).resolves.toBe('Label_7');
    await expect(findLabelId(api, 'receipts')).resolves.toBeUndefined();
  });
});

describe('listRecentEmails', () => {
  test('fetches summary headers for each listed message', async () => {
    const { api, calls } = fakeGoogleApi(GMAIL_BASE, {
      'GET messages': { body: { messages: [{ id: 'm1' }, { id: 'm2' }] } },
      'GET messages/m1': {
        body: {
          id: 'm1',
          payload: {
            headers: [
              { name: 'From', value: 'Ada <ada@example.com>' },
              { name: 'Subject', value: 'Invoice' },
              { name: 'Date', value: 'Mon, 5 Jan 2026 09:00:00 +0000' },
            ],
          },
        },
      },
      'GET messages/m2': { body: { id: 'm2', payload: { headers: [] } } },
    });

    const emails = await listRecentEmails(api, { labelId: 'Label_7', maxResults: 2 });

    expect(emails).toEqual([
      {
        id: 'm1',
        from: 'Ada <ada@example.com>',
        subject: 'Invoice',
        date: 'Mon, 5 Jan 2026 09:00:00 +0000',
      },
      { id: 'm2', from: 'Unknown Sender', subject: 'No Subject', date: 'No Date' },
    ]);

    const list = calls[0];
    expect(list?.url.searchParams.get('maxResults')).toBe('2');
    expect(list?.url.searchParams.getAll('labelIds')).toEqual(['Label_7']);
    const detail = calls[1];
    expect(detail?.url.searchParams.get('format')).toBe('metadata');
    expect(detail?.url.searchParams.getAll('metadataHeaders')).toEqual(['Subject', 'From', 'Date']);
    expect(detail?.headers.get('authorization')).toBe('Bearer test-token');
  });

  test('returns nothing for an empty mailbox', async () => {
    const { api } = fakeGoogleApi(GMAIL_BASE, { 'GET messages': { body: { resultSizeEstimate: 0 } } });
    await expect(listRecentEmails(api, { maxResults: 10 })).resolves.toEqual([]);
  });
});

describe('readEmail', () => {
  test('returns headers and the plain-text body', async () => {
    const { api } = fakeGoogleApi(GMAIL_BASE, {
      'GET messages/m1': {
        body: {
          id: 'm1',
          payload: {
            mimeType: 'multipart/alternative',
            headers: [{ name: 'Subject', value: 'Hello' }],
            parts: [{ mimeType: 'text/plain', body: { data: encodeBody('Body text') } }],
          },
        },
      },
    });
    await expect(readEmail(api, 'm1')).resolves.toEqual({
      id: 'm1',
      from: 'Unknown Sender',
      subject: 'Hello',
      date: 'No Date',
      body: 'Body text',
    });
  });

  test('surfaces API failures as TransportError', async () => {
    const { api } = fakeGoogleApi(GMAIL_BASE, {
      'GET messages/missing': {
        status: 404,
        body: { error: { code: 404, message: 'Requested entity was not found.' } },
      },
    });
    const failure = readEmail(api, 'missing');
    await expect(failure).rejects.toBeInstanceOf(TransportError);
    await expect(failure).rejects.toThrow(
      'Google API GET messages/missing returned 404: Requested entity was not found. [bad_response]',
    );
  });
});

describe('sendEmail', () => {
  test('posts the encoded message', async () => {
    const { api, calls } = fakeGoogleApi(GMAIL_BASE, {
      'POST messages/send': { body: { id: 's1', threadId: 't9' } },
    });
    const sent = await sendEmail(api, { to: 'ada@example.com', subject: 'Hi', body: 'Hello' });

    expect(sent).toEqual({ id: 's1', threadId: 't9' });
    const raw = rawOf(calls[0]?.body);
    expect(raw.startsWith('To: ada@example.com\r\nSubject: Hi\r\n')).toBe(true);
    expect(raw.endsWith('\r\n\r\nHello\r\n')).toBe(true);
  });
});

describe('replySubject', () => {
  test('prefixes Re: once', () => {
    expect(replySubject('Invoice')).toBe('Re: Invoice');
    expect(replySubject('Re: Invoice')).toBe('Re: Invoice');
    expect(replySubject(undefined)).toBe('Re: No Subject');
  });
});

describe('replyToEmail', () => {
  test('answers the sender in the same thread', async () => {
    const { api, calls } = fakeGoogleApi(GMAIL_BASE, {
      'GET messages/m1': {
        body: {
          id: 'm1',
          threadId: 't1',
          payload: {
            headers: [
              { name: 'From', value: 'Ada <ada@example.com>' },
              { name: 'Subject', value: 'Invoice' },
              { name: 'Message-ID', value: '<m1@mail.example.com>' },
            ],
          },
        },
      },
      'POST messages/send': { body: { id: 'r1', threadId: 't1' } },
    });

    const sent = await replyToEmail(api, 'm1', 'Thanks!');

    expect(sent.id).toBe('r1');
    const send = calls[1];
    expect(send?.body).toMatchObject({ threadId: 't1' });
    const raw = rawOf(send?.body);
    expect(raw).toContain('To: Ada <ada@example.com>\r\n');
    expect(raw).toContain('Subject: Re: Invoice\r\n');
    expect(raw).toContain('In-Reply-To: <m1@mail.example.com>\r\n');
    expect(raw).toContain('References: <m1@mail.example.com>\r\n');
  });
});
