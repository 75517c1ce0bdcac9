import { FetchLike } from '../../src/security';

export interface FakeCall {
  url: string;
  method: string;
  headers: Headers;
}

export type FakeHandler = (call: FakeCall, signal: AbortSignal | undefined) => Response | Promise<Response>;

/** In-process stand-in for fetch that records every request it sees. */
export function fakeFetch(handler: FakeHandler): { fetch: FetchLike; calls: FakeCall[] } {
  const calls: FakeCall[] = [];
  const fetch: FetchLike = async (input, init) => {
    const call: FakeCall = {
      url: input,
      method: init?.method ?? 'GET',
      headers: new Headers(init?.headers)
    };
    calls.push(call);
    return handler(call, init?.signal ?? undefined);
  };
  return { fetch, calls };
}

/** Settles only when the request is aborted, like a server that never answers. */
export function hangUntilAborted(signal: AbortSignal | undefined): Promise<Response> {
  return new Promise<Response>((_resolve, reject) => {
    signal?.addEventListener('abort', () => reject(signal.reason), { once: true });
  });
}

export interface TrackedBody {
  stream: ReadableStream<Uint8Array>;
  cancelled: () => boolean;
}

/** A body that yields `chunks` and then either closes or stays open forever. */
export function trackedBody(chunks: Uint8Array[], options: { keepOpen?: boolean } = {}): TrackedBody {
  let wasCancelled = false;
  let index = 0;
  const stream = new ReadableStream<Uint8Array>({
    pull(controller) {
      if (index < chunks.length) {
        controller.enqueue(chunks[index]);
        index += 1;
        return undefined;
      }
      if (!options.keepOpen) {
        controller.close();
        return undefined;
      }
      return new Promise<void>(() => {
        // Never delivers more data.
      });
    },
    cancel() {
      wasCancelled = true;
    }
  });
  return { stream, cancelled: () => wasCancelled };
}

export function bytes(...values: number[]): Uint8Array {
  return new Uint8Array(values);
}

export function text(value: string): Uint8Array {
  return new TextEncoder().encode(value);
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
