import dns from 'dns/promises';
import net from 'net';
import path from 'path';
import { MAX_REDIRECTS, REQUEST_TIMEOUT_MS } from './config';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;
export type HostLookup = (hostname: string) => Promise<Array<{ address: string; family: number }>>;

export class UserInputError extends Error {
  statusCode: number;

  constructor(message: string, statusCode = 400) {
    super(message);
    this.name = 'UserInputError';
    this.statusCode = statusCode;
  }
}

export class TooManyRedirectsError extends Error {
  constructor(maxRedirects: number) {
    super(`Exceeded ${maxRedirects} redirects.`);
    this.name = 'TooManyRedirectsError';
  }
}

export class RequestTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`No response within ${timeoutMs} ms.`);
    this.name = 'TimeoutError';
  }
}

function isPrivateIpv4(ip: string): boolean {
  const parts = ip.split('.').map((value) => Number.parseInt(value, 10));
  if (parts.length !== 4 || parts.some((part) => Number.isNaN(part) || part < 0 || part > 255)) {
    return true;
  }

  const [a, b] = parts;

  if (a === 10 || a === 127 || a === 0) return true;
  if (a === 169 && b === 254) return true;
  if (a === 172 && b >= 16 && b <= 31) return true;
  if (a === 192 && b === 168) return true;
  if (a === 100 && b >= 64 && b <= 127) return true;
  if (a === 198 && (b === 18 || b === 19)) return true;
  if (a >= 224) return true;

  return false;
}

function isPrivateIpv6(ip: string): boolean {
  const lower = ip.toLowerCase();

  if (lower === '::1' || lower === '::') return true;
  if (lower.startsWith('fc') || lower.startsWith('fd')) return true;
  if (lower.startsWith('fe8') || lower.startsWith('fe9') || lower.startsWith('fea') || lower.startsWith('feb')) {
    return true;
  }

  if (lower.startsWith('::ffff:')) {
    const ipv4 = lower.slice('::ffff:'.length);
    return isPrivateIpv4(ipv4);
  }

  return false;
}

export function isPrivateIp(ip: string): boolean {
  const family = net.isIP(ip);
  if (family === 4) {
    return isPrivateIpv4(ip);
  }
  if (family === 6) {
    return isPrivateIpv6(ip);
  }
  return true;
}

/**
 * Parses a stream URL. Only http(s) URLs with a host are accepted;
 * anything else yields null so callers can report it without throwing.
 */
export function parseHttpUrl(rawUrl: string): URL | null {
  if (typeof rawUrl !== 'string') {
    return null;
  }

  let parsed: URL;
  try {
    parsed = new URL(rawUrl.trim());
  } catch {
    return null;
  }

  if (!['http:', 'https:'].includes(parsed.protocol) || !parsed.hostname) {
    return null;
  }

  return parsed;
}

export function validateHttpUrl(rawUrl: string): URL {
  const parsed = parseHttpUrl(rawUrl);
  if (!parsed) {
    throw new UserInputError('Invalid URL format. Provide a full http(s) address.');
  }
  return parsed;
}

const defaultLookup: HostLookup = (hostname) => dns.lookup(hostname, { all: true, verbatim: true });

export async function assertSafeUrl(inputUrl: URL, lookup: HostLookup = defaultLookup): Promise<void> {
  if (!['http:', 'https:'].includes(inputUrl.protocol)) {
    throw new UserInputError('Only http(s) URLs are allowed.');
  }

  // URL keeps the brackets around IPv6 literals.
  const hostname = inputUrl.hostname.toLowerCase().replace(/^\[(.*)\]$/, '$1');

  if (hostname === 'localhost' || hostname.endsWith('.localhost') || hostname.endsWith('.local')) {
    throw new UserInputError('Local and private network targets are blocked.');
  }

  if (net.isIP(hostname) !== 0) {
    if (isPrivateIp(hostname)) {
      throw new UserInputError('Local and private network targets are blocked.');
    }
    return;
  }

  let records: Array<{ address: string; family: number }>;
  try {
    records = await lookup(hostname);
  } catch {
    throw new UserInputError('Could not resolve host name.');
  }

  if (records.length === 0) {
    throw new UserInputError('Could not resolve host name.');
  }

  for (const record of records) {
    if (isPrivateIp(record.address)) {
      throw new UserInputError('Local and private network targets are blocked.');
    }
  }
}

function isRedirectStatus(status: number): boolean {
  return status >= 300 && status < 400;
}

export interface FetchPolicy {
  fetch?: FetchLike;
  /** Deadline for response headers of each hop; the body is not covered. 0 disables it. */
  timeoutMs?: number;
  maxRedirects?: number;
  blockPrivateNetworks?: boolean;
  lookup?: HostLookup;
}

async function fetchOnce(
  fetchImpl: FetchLike,
  url: URL,
  init: RequestInit,
  timeoutMs: number
): Promise<Response> {
  const controller = new AbortController();
  const outer = init.signal ?? undefined;

  const forwardAbort = (): void => {
    controller.abort(outer?.reason);
  };
  if (outer) {
    if (outer.aborted) {
      forwardAbort();
    } else {
      outer.addEventListener('abort', forwardAbort, { once: true });
    }
  }

  let timedOut = false;
  const timer =
    timeoutMs > 0
      ? setTimeout(() => {
          timedOut = true;
          controller.abort(new RequestTimeoutError(timeoutMs));
        }, timeoutMs)
      : null;

  try {
    return await fetchImpl(url.toString(), {
      ...init,
      redirect: 'manual',
      signal: controller.signal
    });
  } catch (error) {
    if (timedOut) {
      throw new RequestTimeoutError(timeoutMs);
    }
    throw error;
  } finally {
    if (timer) {
      clearTimeout(timer);
    }
    outer?.removeEventListener('abort', forwardAbort);
  }
}

export async function fetchWithRedirects(
  url: string | URL,
  init: RequestInit = {},
  policy: FetchPolicy = {}
): Promise<{ response: Response; finalUrl: URL }> {
  const fetchImpl = policy.fetch ?? fetch;
  const timeoutMs = policy.timeoutMs ?? REQUEST_TIMEOUT_MS;
  const maxRedirects = policy.maxRedirects ?? MAX_REDIRECTS;
  let current = typeof url === 'string' ? new URL(url) : new URL(url.toString());

  for (let hop = 0; hop <= maxRedirects; hop += 1) {
    if (policy.blockPrivateNetworks) {
      await assertSafeUrl(current, policy.lookup);
    }

    const response = await fetchOnce(fetchImpl, current, init, timeoutMs);

    if (!isRedirectStatus(response.status)) {
      return { response, finalUrl: current };
    }

    const location = response.headers.get('location');
    await response.body?.cancel();

    if (!location) {
      throw new Error('Redirect response is missing a Location header.');
    }

    current = new URL(location, current);
  }

  throw new TooManyRedirectsError(maxRedirects);
}

export function safeJoin(baseDir: string, requestPath: string): string {
  const baseResolved = path.resolve(baseDir);
  const cleaned = requestPath.replace(/\\/g, '/');
  const normalized = path.posix.normalize(`/${cleaned}`).slice(1);

  if (!normalized || normalized.startsWith('..') || normalized.includes('\u0000')) {
    throw new UserInputError('Invalid file path.');
  }

  const joined = path.resolve(baseResolved, normalized);
  if (joined !== baseResolved && !joined.startsWith(`${baseResolved}${path.sep}`)) {
    throw new UserInputError('Invalid file path.');
  }

  return joined;
}

export function isSafeItemId(id: string): boolean {
  return /^[a-zA-Z0-9-]{1,100}$/.test(id);
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error && error.message) {
    return error.message;
  }
  return 'Unexpected error';
}
