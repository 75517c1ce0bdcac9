import { UserInputError, errorMessage } from '../security';

export type TransportFailure = 'timeout' | 'too-many-redirects' | 'connection' | 'blocked' | 'other';

const CONNECTION_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EPIPE',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT'
]);

function errorCode(error: unknown): string | null {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return null;
  }
  const { code } = error;
  return typeof code === 'string' ? code : null;
}

function errorCause(error: unknown): unknown {
  return error instanceof Error ? error.cause : undefined;
}

export function classifyTransportError(error: unknown): TransportFailure {
  if (error instanceof UserInputError) {
    return 'blocked';
  }

  if (error instanceof Error) {
    if (error.name === 'TimeoutError' || error.name === 'AbortError') {
      return 'timeout';
    }
    if (error.name === 'TooManyRedirectsError') {
      return 'too-many-redirects';
    }
  }

  const code = errorCode(error) ?? errorCode(errorCause(error));
  if (code === 'UND_ERR_CONNECT_TIMEOUT' || code === 'ETIMEDOUT') {
    return 'timeout';
  }
  if (code && CONNECTION_ERROR_CODES.has(code)) {
    return 'connection';
  }

  // undici reports socket-level failures as a bare TypeError.
  if (error instanceof TypeError && error.message === 'fetch failed') {
    return 'connection';
  }

  return 'other';
}

export function describeTransportError(error: unknown): string {
  switch (classifyTransportError(error)) {
    case 'timeout':
      return 'Request timeout';
    case 'too-many-redirects':
      return 'Too many redirects';
    case 'connection':
      return 'Connection error';
    case 'blocked':
      return errorMessage(error);
    case 'other':
      return `Request error: ${errorMessage(error)}`;
  }
}
