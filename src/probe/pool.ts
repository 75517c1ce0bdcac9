export class DeadlineExceededError extends Error {
  constructor(deadlineMs: number) {
    super(`Probe exceeded its ${deadlineMs} ms deadline`);
    this.name = 'DeadlineExceededError';
  }
}

/**
 * Runs `task` with a deadline. On expiry the controller passed to the task is
 * aborted and the returned promise rejects, whether or not the task stops.
 */
export function withDeadline<T>(deadlineMs: number, task: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      const error = new DeadlineExceededError(deadlineMs);
      controller.abort(error);
      reject(error);
    }, deadlineMs);

    let running: Promise<T>;
    try {
      running = task(controller.signal);
    } catch (error) {
      clearTimeout(timer);
      reject(error);
      return;
    }

    running.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}

/**
 * Maps `items` through `worker` with at most `limit` calls in flight. Every
 * item settles independently; results keep input order.
 */
export async function mapBounded<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T) => Promise<R>
): Promise<PromiseSettledResult<R>[]> {
  const results: PromiseSettledResult<R>[] = [];
  let next = 0;

  async function drain(): Promise<void> {
    while (next < items.length) {
      const index = next;
      next += 1;
      try {
        results[index] = { status: 'fulfilled', value: await worker(items[index]) };
      } catch (reason) {
        results[index] = { status: 'rejected', reason };
      }
    }
  }

  const workerCount = Math.max(1, Math.min(limit, items.length));
  await Promise.all(Array.from({ length: workerCount }, () => drain()));
  return results;
}
