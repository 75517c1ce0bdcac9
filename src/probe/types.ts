export type StreamKind = 'audio' | 'video' | 'hls-playlist' | 'pls-playlist' | 'dash' | 'icy-shoutcast' | 'unknown';

export interface ProbeResult {
  readonly valid: boolean;
  readonly reason: string;
  readonly contentType: string | null;
  readonly statusCode: number | null;
  readonly streamKind: StreamKind | null;
}

export interface ProbeOptions {
  checkPlayability?: boolean;
}

/** Outcome of a single probe phase; a failure carries what was observed so far. */
export type PhaseOutcome =
  | { ok: true; result: ProbeResult }
  | {
      ok: false;
      reason: string;
      statusCode: number | null;
      contentType: string | null;
      streamKind: StreamKind | null;
    };

export type SniffOutcome = { ok: true; bytes: number } | { ok: false };

export function createProbeResult(fields: ProbeResult): ProbeResult {
  return Object.freeze({
    valid: fields.valid,
    reason: fields.reason,
    contentType: fields.contentType,
    statusCode: fields.statusCode,
    streamKind: fields.streamKind
  });
}

export function failedProbeResult(reason: string): ProbeResult {
  return createProbeResult({
    valid: false,
    reason,
    contentType: null,
    statusCode: null,
    streamKind: null
  });
}
