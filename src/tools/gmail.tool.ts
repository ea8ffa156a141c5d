import { toolsMetadata } from '../config/metadata.js';
import {
  ListEmailLabelsInputSchema,
  ListRecentEmailsInputSchema,
  ReadEmailInputSchema,
  ReplyToEmailInputSchema,
  SendEmailInputSchema,
} from '../schemas/inputs.js';
import {
  EmailContentOutput,
  EmailLabelsOutput,
  EmailSentOutput,
  RecentEmailsOutput,
} from '../schemas/outputs.js';
import {
  type EmailContent,
  type EmailSummary,
  findLabelId,
  listLabels,
  listRecentEmails,
  readEmail,
  replyToEmail,
  sendEmail,
} from '../services/google/gmail.js';
import type { GmailLabel } from '../types/google.codecs.js';
import { logger } from '../utils/logger.js';
import { validateDev } from '../utils/validate.js';
import { errorResult, textResult } from './result.js';
import { defineTool } from './types.js';

export function formatLabels(labels: readonly GmailLabel[]): string {
  if (labels.length === 0) {
    return 'No labels found.';
  }
  const lines = labels.map((label) => `- ${label.name} (ID: ${label.id})`);
  return `Available Labels:\n${lines.join('\n')}`;
}

export function formatRecentEmails(emails: readonly EmailSummary[]): string {
  if (emails.length === 0) {
    return 'No emails found.';
  }
  const entries = emails.map(
    (email, i) =>
      `${i + 1}. From: ${email.from}\n` +
      `   Subject: ${email.subject}\n` +
      `   Date: ${email.date}\n` +
      `   Message ID: ${email.id}`,
  );
  return `Recent Emails:\n${entries.join('\n\n')}`;
}

export function formatEmail(email: EmailContent): string {
  return (
    'Email Details:\n' +
    `From: ${email.from}\n` +
    `Subject: ${email.subject}\n` +
    `Date: ${email.date}\n\n` +
    `Content:\n${email.body}`
  );
}

export const listEmailLabelsTool = defineTool({
  ...toolsMetadata.list_email_labels,
  inputSchema: ListEmailLabelsInputSchema,
  outputSchema: EmailLabelsOutput.shape,
  annotations: { readOnlyHint: true, openWorldHint: true },
  handler: async (_args, context) => {
    try {
      const labels = await listLabels(context.services.gmail, context.signal);
      const structured: EmailLabelsOutput = {
        _msg: formatLabels(labels),
        labels: labels.map((l) => ({ id: l.id, name: l.name })),
      };
      return textResult(validateDev(EmailLabelsOutput, structured), context);
    } catch (error) {
      logger.error('gmail', { tool: 'list_email_labels', error: String(error) });
      return errorResult('An error occurred while listing labels', error);
    }
  },
});

export const listRecentEmailsTool = defineTool({
  ...toolsMetadata.list_recent_emails,
  inputSchema: ListRecentEmailsInputSchema,
  outputSchema: RecentEmailsOutput.shape,
  annotations: { readOnlyHint: true, openWorldHint: true },
  handler: async (args, context) => {
    const api = context.services.gmail;
    try {
      let labelId: string | undefined;
      if (args.label_name) {
        labelId = await findLabelId(api, args.label_name, context.signal);
        if (!labelId) {
          const message = `Label '${args.label_name}' not found.`;
          return {
            isError: true,
            content: [{ type: 'text', text: message }],
            structuredContent: { ok: false, error: message, code: 'not_found' },
          };
        }
      }

      const emails = await listRecentEmails(
        api,
        { labelId, maxResults: args.max_results },
        context.signal,
      );
      logger.debug('gmail', { message: 'Listed emails', count: emails.length, labelId });

      const structured: RecentEmailsOutput = {
        _msg: formatRecentEmails(emails),
        label_id: labelId,
        emails,
      };
      return textResult(validateDev(RecentEmailsOutput, structured), context);
    } catch (error) {
      logger.error('gmail', { tool: 'list_recent_emails', error: String(error) });
      return errorResult('An error occurred while listing emails', error);
    }
  },
});

export const readEmailContentTool = defineTool({
  ...toolsMetadata.read_email_content,
  inputSchema: ReadEmailInputSchema,
  outputSchema: EmailContentOutput.shape,
  annotations: { readOnlyHint: true, openWorldHint: true },
  handler: async (args, context) => {
    try {
      const email = await readEmail(context.services.gmail, args.message_id, context.signal);
      const structured: EmailContentOutput = { _msg: formatEmail(email), email };
      return textResult(validateDev(EmailContentOutput, structured), context);
    } catch (error) {
      logger.error('gmail', { tool: 'read_email_content', error: String(error) });
      return errorResult('An error occurred while reading email', error);
    }
  },
});

export const sendEmailTool = defineTool({
  ...toolsMetadata.send_email,
  inputSchema: SendEmailInputSchema,
  outputSchema: EmailSentOutput.shape,
  annotations: { readOnlyHint: false, destructiveHint: false, openWorldHint: true },
  handler: async (args, context) => {
    try {
      const sent = await sendEmail(
        context.services.gmail,
        { to: args.to, subject: args.subject, body: args.body },
        {},
        context.signal,
      );
      logger.info('gmail', { message: 'Email sent', id: sent.id });
      const structured: EmailSentOutput = {
        _msg: `Email sent successfully! Message ID: ${sent.id}`,
        id: sent.id,
        thread_id: sent.threadId,
      };
      return textResult(validateDev(EmailSentOutput, structured), context);
    } catch (error) {
      logger.error('gmail', { tool: 'send_email', error: String(error) });
      return errorResult('An error occurred while sending email', error);
    }
  },
});

export const replyToEmailTool = defineTool({
  ...toolsMetadata.reply_to_email,
  inputSchema: ReplyToEmailInputSchema,
  outputSchema: EmailSentOutput.shape,
  annotations: { readOnlyHint: false, destructiveHint: false, openWorldHint: true },
  handler: async (args, context) => {
    try {
      const sent = await replyToEmail(
        context.services.gmail,
        args.message_id,
        args.reply_text,
        context.signal,
      );
      logger.info('gmail', { message: 'Reply sent', id: sent.id, inReplyTo: args.message_id });
      const structured: EmailSentOutput = {
        _msg: `Reply sent successfully! Message ID: ${sent.id}`,
        id: sent.id,
        thread_id: sent.threadId,
      };
      return textResult(validateDev(EmailSentOutput, structured), context);
    } catch (error) {
      logger.error('gmail', { tool: 'reply_to_email', error: String(error) });
      return errorResult('An error occurred while replying to email', error);
    }
  },
});

export const gmailTools = [
  listEmailLabelsTool,
  listRecentEmailsTool,
  readEmailContentTool,
  sendEmailTool,
  replyToEmailTool,
];
