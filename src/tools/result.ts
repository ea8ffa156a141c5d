import {
  type ErrorCode,
  extractErrorCode,
  stripErrorCode,
  TransportError,
} from '../utils/http-result.js';
import type { ToolContext, ToolResult } from './types.js';

export function textResult<T extends { _msg: string } & Record<string, unknown>>(
  structured: T,
  context: Pick<ToolContext, 'includeJsonInContent'>,
): ToolResult {
  const contentParts: Array<{ type: 'text'; text: string }> = [
    { type: 'text', text: structured._msg },
  ];
  if (context.includeJsonInContent) {
    contentParts.push({ type: 'text', text: JSON.stringify(structured) });
  }
  return { content: contentParts, structuredContent: structured };
}

const FRIENDLY: Partial<Record<ErrorCode, string>> = {
  unauthorized: 'Not authorized. Check the configured credentials.',
  forbidden: 'Access denied by the service.',
  rate_limited: 'Rate limited. Please wait and retry.',
};

export function errorCodeOf(error: unknown): ErrorCode {
  if (error instanceof TransportError) {
    return error.code;
  }
  const message = error instanceof Error ? error.message : '';
  return extractErrorCode(message) ?? 'bad_response';
}

/**
 * Converts a failure into a tool result instead of throwing, e.g.
 * "An error occurred while listing labels: Not authorized. …".
 */
export function errorResult(context: string, error: unknown): ToolResult {
  const code = errorCodeOf(error);
  const raw = error instanceof Error ? error.message : String(error);
  const detail = FRIENDLY[code] ?? stripErrorCode(raw);
  const message = `${context}: ${detail}`;
  return {
    isError: true,
    content: [{ type: 'text', text: message }],
    structuredContent: { ok: false, error: message, code },
  };
}
