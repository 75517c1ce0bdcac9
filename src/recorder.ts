import crypto from 'crypto';
import { createWriteStream } from 'fs';
import fs from 'fs/promises';
import path from 'path';
import { Readable, Transform } from 'stream';
import { pipeline } from 'stream/promises';
import mime from 'mime-types';
import { MAX_REDIRECTS, RECORDER_USER_AGENT, RECORDINGS_DIR, REQUEST_TIMEOUT_MS } from './config';
import { FetchLike, errorMessage, fetchWithRedirects, safeJoin, validateHttpUrl } from './security';

export type RecordingStatus = 'recording' | 'stopped' | 'finished' | 'error';

export interface Recording {
  id: string;
  stationName: string;
  sourceUrl: string;
  filePath: string | null;
  status: RecordingStatus;
  reason: string | null;
  sizeBytes: number;
  startedAt: number;
}

export interface StreamRecorderOptions {
  recordingsDir?: string;
  fetch?: FetchLike;
  now?: () => Date;
}

interface RecordingJob {
  controller: AbortController;
  reader: ReadableStreamDefaultReader<Uint8Array>;
  done: Promise<void>;
}

const FALLBACK_EXTENSION = '.mp3';

// mime-types picks the first registered extension, which is rarely the one players expect.
const PREFERRED_EXTENSIONS: Record<string, string> = {
  'audio/mpeg': '.mp3',
  'audio/mp3': '.mp3',
  'audio/aac': '.aac',
  'audio/aacp': '.aac',
  'audio/ogg': '.ogg',
  'audio/x-m4a': '.m4a',
  'audio/mp4': '.m4a',
  'video/mp2t': '.ts'
};

function isAbortError(err: unknown): boolean {
  if (!(err instanceof Error)) {
    return false;
  }
  return err.name === 'AbortError';
}

export function toSafeRecordingName(stationName: string): string {
  const cleaned = Array.from(stationName)
    .filter((char) => /[\p{L}\p{N} _-]/u.test(char))
    .join('')
    .trim();
  return cleaned || 'recording';
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

export function formatRecordingTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

function toSafeExtensionFromUrl(urlString: string): string {
  try {
    const parsed = new URL(urlString);
    const ext = path.extname(parsed.pathname).toLowerCase();
    if (ext && /^\.[a-z0-9]{1,8}$/i.test(ext) && !['.m3u', '.m3u8', '.pls', '.asx', '.xspf'].includes(ext)) {
      return ext;
    }
  } catch {
    // Unparseable URL: fall back to the content type.
  }

  return '';
}

export function toSafeExtensionFromContentType(contentType: string | null): string {
  if (!contentType) {
    return '';
  }

  const normalized = contentType.split(';')[0].trim().toLowerCase();
  if (!normalized) {
    return '';
  }

  const preferred = PREFERRED_EXTENSIONS[normalized];
  if (preferred) {
    return preferred;
  }

  const resolved = mime.extension(normalized);
  if (typeof resolved === 'string' && /^[a-z0-9]{1,8}$/i.test(resolved)) {
    return `.${resolved.toLowerCase()}`;
  }

  return '';
}

export function chooseRecordingExtension(sourceUrl: string, finalUrl: string, contentType: string | null): string {
  return (
    toSafeExtensionFromUrl(finalUrl) ||
    toSafeExtensionFromUrl(sourceUrl) ||
    toSafeExtensionFromContentType(contentType) ||
    FALLBACK_EXTENSION
  );
}

async function* readBody(reader: ReadableStreamDefaultReader<Uint8Array>): AsyncGenerator<Buffer> {
  while (true) {
    const { done, value } = await reader.read();
    if (done) {
      return;
    }
    if (value && value.length > 0) {
      yield Buffer.from(value);
    }
  }
}

/**
 * Records live streams to disk in the background. Stopping a recording
 * keeps whatever was written so far.
 */
export class StreamRecorder {
  private readonly recordingsDir: string;
  private readonly fetchImpl: FetchLike | undefined;
  private readonly now: () => Date;
  private readonly jobs = new Map<string, RecordingJob>();
  private readonly recordings = new Map<string, Recording>();

  constructor(options: StreamRecorderOptions = {}) {
    this.recordingsDir = options.recordingsDir ?? RECORDINGS_DIR;
    this.fetchImpl = options.fetch;
    this.now = options.now ?? (() => new Date());
  }

  async start(rawUrl: string, stationName: string): Promise<Recording> {
    const sourceUrl = validateHttpUrl(rawUrl);
    const startedAt = this.now();
    const recording: Recording = {
      id: crypto.randomUUID(),
      stationName: stationName.trim() || 'Recording',
      sourceUrl: sourceUrl.toString(),
      filePath: null,
      status: 'recording',
      reason: null,
      sizeBytes: 0,
      startedAt: startedAt.getTime()
    };
    this.recordings.set(recording.id, recording);

    const controller = new AbortController();
    let response: Response;
    let finalUrl: URL;
    try {
      ({ response, finalUrl } = await fetchWithRedirects(
        sourceUrl,
        { method: 'GET', headers: { 'User-Agent': RECORDER_USER_AGENT }, signal: controller.signal },
        { fetch: this.fetchImpl, timeoutMs: REQUEST_TIMEOUT_MS, maxRedirects: MAX_REDIRECTS }
      ));
    } catch (error) {
      return this.fail(recording, errorMessage(error));
    }

    const body = response.body;
    if (!response.ok || !body) {
      await body?.cancel();
      return this.fail(recording, `Stream answered HTTP ${response.status}.`);
    }

    const ext = chooseRecordingExtension(recording.sourceUrl, finalUrl.toString(), response.headers.get('content-type'));
    const fileName = `${toSafeRecordingName(recording.stationName)}_${formatRecordingTimestamp(startedAt)}${ext}`;
    try {
      await fs.mkdir(this.recordingsDir, { recursive: true });
      recording.filePath = safeJoin(this.recordingsDir, fileName);
    } catch (error) {
      await body.cancel().catch((cancelError: unknown) => {
        console.warn(`[recorder] could not release ${recording.sourceUrl}: ${errorMessage(cancelError)}`);
      });
      return this.fail(recording, errorMessage(error));
    }

    const reader = body.getReader();
    const job: RecordingJob = {
      controller,
      reader,
      done: Promise.resolve()
    };
    job.done = this.run(recording, reader)
      .catch((error: unknown) => {
        console.error(`[recorder] ${recording.id} crashed: ${errorMessage(error)}`);
      })
      .finally(() => {
        this.jobs.delete(recording.id);
      });
    this.jobs.set(recording.id, job);

    console.log(`[recorder] recording ${recording.sourceUrl} to ${recording.filePath}`);
    return { ...recording };
  }

  private fail(recording: Recording, reason: string): Recording {
    recording.status = 'error';
    recording.reason = reason;
    console.error(`[recorder] ${recording.sourceUrl}: ${reason}`);
    return { ...recording };
  }

  private async run(recording: Recording, reader: ReadableStreamDefaultReader<Uint8Array>): Promise<void> {
    const filePath = recording.filePath;
    if (!filePath) {
      throw new Error('Recording has no target file.');
    }

    const counter = new Transform({
      transform(chunk: Buffer, _encoding, callback) {
        recording.sizeBytes += chunk.length;
        callback(null, chunk);
      }
    });

    try {
      await pipeline(Readable.from(readBody(reader)), counter, createWriteStream(filePath, { flags: 'w' }));
      if (recording.status === 'recording') {
        recording.status = 'finished';
      }
    } catch (error) {
      if (recording.status === 'stopped' || isAbortError(error)) {
        recording.status = 'stopped';
        return;
      }
      recording.status = 'error';
      recording.reason = errorMessage(error);
      console.error(`[recorder] ${recording.id} failed: ${recording.reason}`);
    }
  }

  /** Stops a running recording and waits until its file is closed. */
  async stop(id: string): Promise<Recording | null> {
    const recording = this.recordings.get(id);
    if (!recording) {
      return null;
    }

    const job = this.jobs.get(id);
    if (job) {
      recording.status = 'stopped';
      job.controller.abort();
      await job.reader.cancel().catch(() => {
        // The body already failed with the abort.
      });
      await job.done;
    }

    return { ...recording };
  }

  get(id: string): Recording | null {
    const recording = this.recordings.get(id);
    return recording ? { ...recording } : null;
  }

  list(): Recording[] {
    return Array.from(this.recordings.values(), (recording) => ({ ...recording }));
  }

  /** Resolves once the recording's background write has ended. */
  async settled(id: string): Promise<void> {
    await this.jobs.get(id)?.done;
  }

  async stopAll(): Promise<void> {
    await Promise.all(Array.from(this.jobs.keys(), (id) => this.stop(id)));
  }
}
