import { isAxiosError } from 'axios';

export type FetchFailureReason =
  | 'timeout'
  | 'connection-error'
  | 'invalid-url'
  | 'too-many-redirects'
  | 'other-transport-error';

export class TooManyRedirectsError extends Error {
  name = 'TooManyRedirectsError';

  constructor(readonly maxRedirects: number) {
    super(`Maximum redirects (${maxRedirects}) exceeded`);
  }
}

const CONNECTION_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EPIPE',
]);

const TIMEOUT_ERROR_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT', 'ESOCKETTIMEDOUT']);

function errorCode(error: unknown): string | undefined {
  if (isAxiosError(error)) {
    return error.code ?? errorCode(error.cause);
  }
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Maps a rejected transport call to a failure reason.
 * `aborted` is the state of the fetch's deadline signal at the time of the rejection.
 */
export function classifyTransportError(error: unknown, aborted: boolean): FetchFailureReason {
  if (error instanceof TooManyRedirectsError) return 'too-many-redirects';
  if (aborted) return 'timeout';

  const code = errorCode(error);
  if (code === undefined) return 'other-transport-error';
  if (TIMEOUT_ERROR_CODES.has(code)) return 'timeout';
  if (CONNECTION_ERROR_CODES.has(code)) return 'connection-error';
  if (code === 'ERR_INVALID_URL') return 'invalid-url';
  if (code === 'ERR_FR_TOO_MANY_REDIRECTS') return 'too-many-redirects';
  return 'other-transport-error';
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message || error.name;
  return String(error);
}
