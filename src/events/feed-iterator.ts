import type { ChangeFeed } from "../models";

/**
 * Turns a callback feed into an `AsyncGenerator`, for callers that prefer
 * `for await` over handlers. The first value yielded is the feed's replay of
 * its current value.
 *
 * Values arriving faster than the consumer pulls them are queued, never
 * dropped. Aborting `signal` (or breaking out of the loop) cancels the
 * underlying subscription.
 */
export async function* iterateFeed<T>(
  feed: Pick<ChangeFeed<T>, "subscribe">,
  signal?: AbortSignal,
): AsyncGenerator<T> {
  const queue: { value: T }[] = [];
  let wake: (() => void) | null = null;

  const notify = () => {
    const resolve = wake;
    wake = null;
    resolve?.();
  };

  const subscription = feed.subscribe((value) => {
    queue.push({ value });
    notify();
  });
  signal?.addEventListener("abort", notify, { once: true });

  try {
    while (!signal?.aborted) {
      const entry = queue.shift();
      if (entry) {
        yield entry.value;
        continue;
      }
      await new Promise<void>((resolve) => {
        wake = resolve;
      });
    }
  } finally {
    subscription.cancel();
    signal?.removeEventListener("abort", notify);
  }
}
