import { SniffOutcome } from './types';

export interface SniffOptions {
  minBytes: number;
  timeoutMs: number;
}

const MARKUP_WINDOW_BYTES = 200;
const ASCII_WHITESPACE = new Set([0x20, 0x09, 0x0a, 0x0b, 0x0c, 0x0d]);

async function readLeadingBytes(
  reader: ReadableStreamDefaultReader<Uint8Array>,
  minBytes: number
): Promise<Buffer> {
  const chunks: Buffer[] = [];
  let total = 0;

  while (total < minBytes) {
    const { done, value } = await reader.read();
    if (done) {
      break;
    }
    if (value && value.length > 0) {
      chunks.push(Buffer.from(value));
      total += value.length;
    }
  }

  return Buffer.concat(chunks).subarray(0, minBytes);
}

export function looksLikeMarkup(data: Buffer): boolean {
  let start = 0;
  while (start < data.length && ASCII_WHITESPACE.has(data[start])) {
    start += 1;
  }

  if (start < data.length && data[start] === 0x3c) {
    return true;
  }

  const head = data.subarray(0, MARKUP_WINDOW_BYTES).toString('latin1').toLowerCase();
  return head.includes('<!doctype html') || head.includes('html');
}

/**
 * Reads the first bytes of a response body to tell media payload apart from
 * an HTML page. The read has its own deadline, separate from the request
 * timeout, and the body is released on every path.
 */
export async function sniffStreamData(response: Response, options: SniffOptions): Promise<SniffOutcome> {
  if (!response.body) {
    return { ok: false };
  }

  const reader = response.body.getReader();
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<'timeout'>((resolve) => {
    timer = setTimeout(() => resolve('timeout'), options.timeoutMs);
  });

  try {
    const data = await Promise.race([readLeadingBytes(reader, options.minBytes), deadline]);
    if (data === 'timeout') {
      return { ok: false };
    }

    if (data.length === 0) {
      return { ok: false };
    }

    if (looksLikeMarkup(data)) {
      return { ok: false };
    }

    return { ok: true, bytes: data.length };
  } catch {
    return { ok: false };
  } finally {
    clearTimeout(timer);
    await reader.cancel().catch(() => {
      // The stream already errored; there is nothing left to release.
    });
  }
}
