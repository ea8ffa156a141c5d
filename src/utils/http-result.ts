export type ErrorCode = 'unauthorized' | 'forbidden' | 'rate_limited' | 'bad_response';

const ERROR_CODES: readonly ErrorCode[] = [
  'unauthorized',
  'forbidden',
  'rate_limited',
  'bad_response',
];

export function mapStatusToCode(status: number): ErrorCode {
  if (status === 401) {
    return 'unauthorized';
  }
  if (status === 403) {
    return 'forbidden';
  }
  if (status === 429) {
    return 'rate_limited';
  }
  return 'bad_response';
}

/**
 * A vendor HTTP call failed (network, auth, or a non-2xx status).
 * The message always ends in `[code]` so callers can recover the category
 * from plain text.
 */
export class TransportError extends Error {
  readonly status?: number;
  readonly code: ErrorCode;

  constructor(
    message: string,
    options: { status?: number; code?: ErrorCode; cause?: unknown } = {},
  ) {
    const code =
      options.code ??
      (typeof options.status === 'number' ? mapStatusToCode(options.status) : 'bad_response');
    super(`${stripErrorCode(message)} [${code}]`, { cause: options.cause });
    this.name = 'TransportError';
    this.status = options.status;
    this.code = code;
  }
}

export function extractErrorCode(message: string): ErrorCode | undefined {
  const match = message.match(/\[(\w+)\]$/);
  const candidate = match?.[1];
  return ERROR_CODES.find((code) => code === candidate);
}

export function stripErrorCode(message: string): string {
  return message.replace(/\s*\[[^\]]+\]$/, '');
}

/** HTTP status carried by an arbitrary thrown value, when it has one. */
export function statusOf(error: unknown): number | undefined {
  if (
    typeof error === 'object' &&
    error !== null &&
    'status' in error &&
    typeof error.status === 'number'
  ) {
    return error.status;
  }
  return undefined;
}
