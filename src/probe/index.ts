import {
  BLOCK_PRIVATE_NETWORKS,
  CONCURRENT_PROBE_LIMIT,
  MAX_REDIRECTS,
  MIN_SNIFF_BYTES,
  PROBE_USER_AGENT,
  REQUEST_TIMEOUT_MS,
  SNIFF_TIMEOUT_CEILING_MS,
  SNIFF_TIMEOUT_MS
} from '../config';
import { FetchLike, errorMessage, parseHttpUrl } from '../security';
import { kindFromExtension } from './classify';
import { PhaseContext, probeContent, probeHeaders } from './phases';
import { mapBounded, withDeadline } from './pool';
import { ProbeOptions, ProbeResult, createProbeResult, failedProbeResult } from './types';

export { type ProbeOptions, type ProbeResult, type StreamKind } from './types';

export interface StreamProbeOptions {
  requestTimeoutMs?: number;
  maxRedirects?: number;
  minSniffBytes?: number;
  concurrentProbeLimit?: number;
  sniffTimeoutMs?: number;
  /** Extra time on top of the request timeout before a batch entry is abandoned. */
  batchDeadlineSlackMs?: number;
  blockPrivateNetworks?: boolean;
  userAgent?: string;
  fetch?: FetchLike;
}

export interface ProbeCallOptions extends ProbeOptions {
  signal?: AbortSignal;
}

const DEFAULT_BATCH_DEADLINE_SLACK_MS = 5_000;

export class StreamProbe {
  readonly requestTimeoutMs: number;
  readonly maxRedirects: number;
  readonly minSniffBytes: number;
  readonly concurrentProbeLimit: number;
  readonly sniffTimeoutMs: number;
  private readonly batchDeadlineSlackMs: number;
  private readonly blockPrivateNetworks: boolean;
  private readonly userAgent: string;
  private readonly fetchImpl: FetchLike | undefined;

  constructor(options: StreamProbeOptions = {}) {
    this.requestTimeoutMs = options.requestTimeoutMs ?? REQUEST_TIMEOUT_MS;
    this.maxRedirects = options.maxRedirects ?? MAX_REDIRECTS;
    this.minSniffBytes = options.minSniffBytes ?? MIN_SNIFF_BYTES;
    this.concurrentProbeLimit = options.concurrentProbeLimit ?? CONCURRENT_PROBE_LIMIT;
    this.sniffTimeoutMs = Math.min(options.sniffTimeoutMs ?? SNIFF_TIMEOUT_MS, SNIFF_TIMEOUT_CEILING_MS);
    this.batchDeadlineSlackMs = options.batchDeadlineSlackMs ?? DEFAULT_BATCH_DEADLINE_SLACK_MS;
    this.blockPrivateNetworks = options.blockPrivateNetworks ?? BLOCK_PRIVATE_NETWORKS;
    this.userAgent = options.userAgent ?? PROBE_USER_AGENT;
    this.fetchImpl = options.fetch;
  }

  private context(signal: AbortSignal | undefined): PhaseContext {
    return {
      policy: {
        fetch: this.fetchImpl,
        timeoutMs: this.requestTimeoutMs,
        maxRedirects: this.maxRedirects,
        blockPrivateNetworks: this.blockPrivateNetworks
      },
      userAgent: this.userAgent,
      signal,
      sniff: {
        minBytes: this.minSniffBytes,
        timeoutMs: this.sniffTimeoutMs
      }
    };
  }

  /**
   * Classifies `rawUrl` as a playable stream or not: HEAD first, then a GET
   * whose first bytes are sniffed. Never rejects.
   */
  async probe(rawUrl: string, options: ProbeCallOptions = {}): Promise<ProbeResult> {
    const checkPlayability = options.checkPlayability ?? true;
    const url = parseHttpUrl(rawUrl);
    if (!url) {
      return failedProbeResult('Invalid URL format');
    }

    const hint = kindFromExtension(url);
    const context = this.context(options.signal);

    try {
      const head = await probeHeaders(url, context);
      if (head.ok) {
        return head.result;
      }

      const content = await probeContent(url, context, checkPlayability);
      if (content.ok) {
        return content.result;
      }

      return createProbeResult({
        valid: false,
        reason: content.reason,
        contentType: content.contentType,
        statusCode: content.statusCode,
        streamKind: content.streamKind ?? hint
      });
    } catch (error) {
      return createProbeResult({
        valid: false,
        reason: `Unexpected error: ${errorMessage(error)}`,
        contentType: null,
        statusCode: null,
        streamKind: hint
      });
    }
  }

  /**
   * Probes every URL with bounded concurrency. Each URL is always present in
   * the result, with a failing entry when its probe overran the deadline.
   */
  async probeMany(urls: readonly string[], options: ProbeOptions = {}): Promise<Record<string, ProbeResult>> {
    const unique = Array.from(new Set(urls));
    const deadlineMs = this.requestTimeoutMs + this.batchDeadlineSlackMs;

    const settled = await mapBounded(unique, this.concurrentProbeLimit, (url) =>
      withDeadline(deadlineMs, (signal) => this.probe(url, { ...options, signal }))
    );

    // Own properties only: a URL such as "__proto__" must stay a key.
    return Object.fromEntries(
      unique.map((url, index): [string, ProbeResult] => {
        const outcome = settled[index];
        return [
          url,
          outcome.status === 'fulfilled'
            ? outcome.value
            : failedProbeResult(`Check failed: ${errorMessage(outcome.reason)}`)
        ];
      })
    );
  }
}
