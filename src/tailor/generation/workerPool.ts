/**
 * Bounded worker pool.
 *
 * Runs independent tasks with at most `concurrency` in flight. Each task owns
 * its result slot, so a failure leaves that slot rejected without touching the
 * others, and slot order always matches task order. Aborting the signal stops
 * unstarted tasks and releases waiting on in-flight ones.
 */

export type SlotResult<T> =
  | { status: 'fulfilled'; value: T }
  | { status: 'rejected'; error: unknown }
  | { status: 'cancelled'; reason: unknown };

export type PoolTask<T> = (signal: AbortSignal) => Promise<T>;

export interface BoundedOptions {
  concurrency: number;
  signal?: AbortSignal;
}

function fulfilled<T>(value: T): SlotResult<T> {
  return { status: 'fulfilled', value };
}

function rejected<T>(error: unknown): SlotResult<T> {
  return { status: 'rejected', error };
}

function cancelled<T>(reason: unknown): SlotResult<T> {
  return { status: 'cancelled', reason };
}

export async function runBounded<T>(
  tasks: ReadonlyArray<PoolTask<T>>,
  options: BoundedOptions
): Promise<SlotResult<T>[]> {
  const results: SlotResult<T>[] = new Array(tasks.length);
  if (tasks.length === 0) {
    return results;
  }

  const controller = new AbortController();
  const forwardAbort = (): void => controller.abort(options.signal?.reason);
  if (options.signal?.aborted) {
    forwardAbort();
  } else {
    options.signal?.addEventListener('abort', forwardAbort, { once: true });
  }

  const abortedSignal = controller.signal;
  const whenAborted = new Promise<SlotResult<T>>(resolve => {
    if (abortedSignal.aborted) {
      resolve(cancelled(abortedSignal.reason));
    } else {
      abortedSignal.addEventListener('abort', () => resolve(cancelled(abortedSignal.reason)), {
        once: true
      });
    }
  });

  let next = 0;
  const worker = async (): Promise<void> => {
    while (next < tasks.length) {
      const index = next++;
      if (abortedSignal.aborted) {
        results[index] = cancelled(abortedSignal.reason);
        continue;
      }

      const run = Promise.resolve()
        .then(() => tasks[index](abortedSignal))
        .then(value => fulfilled(value), error => rejected<T>(error));
      results[index] = await Promise.race([run, whenAborted]);
    }
  };

  const workerCount = Math.min(Math.max(1, Math.floor(options.concurrency)), tasks.length);
  try {
    await Promise.all(Array.from({ length: workerCount }, () => worker()));
  } finally {
    options.signal?.removeEventListener('abort', forwardAbort);
  }

  return results;
}
