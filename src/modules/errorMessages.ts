import { HttpError, TransportFailure } from '../interfaces/weatherResult';

export const HTTP_ERROR_MESSAGES: Readonly<Record<number, string>> = {
  401: 'Authentication error. Please verify your API key.',
  404: 'City not found.',
  429: 'Too many requests. API limit exceeded.',
  500: 'OpenWeatherMap server error.',
  503: 'Service temporarily unavailable.',
};

export const UNKNOWN_ERROR_MESSAGE = 'Unknown error.';

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

export function describeHttpError(status: number, remoteMessage?: string): string {
  const canned = HTTP_ERROR_MESSAGES[status] ?? UNKNOWN_ERROR_MESSAGE;
  const details = remoteMessage?.trim();

  return details ? `${canned} Details: ${details}` : canned;
}

export function toHttpError(status: number, remoteMessage?: string): HttpError {
  return {
    kind: 'HttpError',
    status,
    message: describeHttpError(status, remoteMessage),
  };
}

export function classifyTransportError(err: unknown): TransportFailure {
  const code =
    err instanceof Error && 'code' in err && typeof err.code === 'string'
      ? err.code
      : undefined;

  return {
    kind: 'TransportFailure',
    reason: code && TIMEOUT_CODES.has(code) ? 'timeout' : 'network',
    message: err instanceof Error ? err.message : String(err),
  };
}
