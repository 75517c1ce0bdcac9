import { FetchPolicy, fetchWithRedirects } from '../security';
import { categorizeContentType, hasIcyHeaders, isStreamContentType } from './classify';
import { describeTransportError } from './errors';
import { SniffOptions, sniffStreamData } from './sniff';
import { PhaseOutcome, StreamKind, createProbeResult } from './types';

export interface PhaseContext {
  policy: FetchPolicy;
  userAgent: string;
  signal?: AbortSignal;
  sniff: SniffOptions;
}

function readContentType(response: Response): string | null {
  const raw = response.headers.get('content-type');
  return raw === null ? null : raw.toLowerCase();
}

async function releaseBody(response: Response): Promise<void> {
  await response.body?.cancel().catch(() => {
    // Body already consumed or errored.
  });
}

function failure(
  reason: string,
  statusCode: number | null = null,
  contentType: string | null = null,
  streamKind: StreamKind | null = null
): PhaseOutcome {
  return { ok: false, reason, statusCode, contentType, streamKind };
}

function success(
  reason: string,
  statusCode: number,
  contentType: string | null,
  streamKind: StreamKind
): PhaseOutcome {
  return {
    ok: true,
    result: createProbeResult({ valid: true, reason, statusCode, contentType, streamKind })
  };
}

/** HEAD request: succeeds on a known streaming Content-Type or ICY headers without fetching content. */
export async function probeHeaders(url: URL, context: PhaseContext): Promise<PhaseOutcome> {
  let response: Response;
  try {
    ({ response } = await fetchWithRedirects(
      url,
      { method: 'HEAD', headers: { 'User-Agent': context.userAgent }, signal: context.signal },
      context.policy
    ));
  } catch (error) {
    return failure(`HEAD request failed: ${describeTransportError(error)}`);
  }

  await releaseBody(response);

  const statusCode = response.status;
  if (statusCode !== 200) {
    return failure(`HTTP ${statusCode}`, statusCode);
  }

  const contentType = readContentType(response);
  const matchable = contentType ?? '';

  if (isStreamContentType(matchable)) {
    return success('Valid stream (HEAD check)', statusCode, contentType, categorizeContentType(matchable));
  }

  if (hasIcyHeaders(response.headers)) {
    return success('Valid ICY stream', statusCode, contentType, 'icy-shoutcast');
  }

  return failure('Content type not recognized as stream', statusCode, contentType);
}

/**
 * GET request with a streamed body. When playability is checked, the first
 * bytes are sniffed; a failed sniff keeps the status and type already seen.
 */
export async function probeContent(
  url: URL,
  context: PhaseContext,
  checkPlayability: boolean
): Promise<PhaseOutcome> {
  let response: Response;
  try {
    ({ response } = await fetchWithRedirects(
      url,
      { method: 'GET', headers: { 'User-Agent': context.userAgent }, signal: context.signal },
      context.policy
    ));
  } catch (error) {
    return failure(describeTransportError(error));
  }

  const statusCode = response.status;
  if (statusCode !== 200) {
    await releaseBody(response);
    return failure(`HTTP ${statusCode}`, statusCode);
  }

  const contentType = readContentType(response);
  const matchable = contentType ?? '';

  if (hasIcyHeaders(response.headers)) {
    await releaseBody(response);
    return success('Valid ICY stream', statusCode, contentType, 'icy-shoutcast');
  }

  if (isStreamContentType(matchable)) {
    const streamKind = categorizeContentType(matchable);

    if (!checkPlayability) {
      await releaseBody(response);
      return success('Valid stream (content type)', statusCode, contentType, streamKind);
    }

    const sniffed = await sniffStreamData(response, context.sniff);
    if (sniffed.ok) {
      return success('Valid and active stream', statusCode, contentType, streamKind);
    }
    return failure('Stream not providing data', statusCode, contentType, streamKind);
  }

  // Some servers omit or mis-set Content-Type, so the data decides.
  if (checkPlayability) {
    const sniffed = await sniffStreamData(response, context.sniff);
    if (sniffed.ok) {
      return success('Active stream (unrecognized type)', statusCode, contentType, 'unknown');
    }
  } else {
    await releaseBody(response);
  }

  return failure('Not recognized as a valid stream', statusCode, contentType);
}
