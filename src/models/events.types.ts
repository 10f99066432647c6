export type ValueHandler<T> = (value: T) => void;
export type WillChangeListener = () => void;

/**
 * A handle returned by every subscription. Cancelling one handle never
 * affects any other subscriber of the same feed.
 */
export interface Cancellable {
  cancel(): void;
}

/**
 * A multi-subscriber feed that replays the last known value to each new
 * subscriber, then delivers every subsequent update.
 */
export interface ChangeFeed<T> {
  subscribe(handler: ValueHandler<T>): Cancellable;
  /**
   * The same feed as an async generator. Iteration ends when `signal` aborts
   * or the consumer breaks out of the loop.
   */
  values(signal?: AbortSignal): AsyncGenerator<T>;
}
