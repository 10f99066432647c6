import type {
  Cancellable,
  ChangeFeed,
  ValueHandler,
  WillChangeListener,
} from "../models";
import { iterateFeed } from "./feed-iterator";

interface Subscription<T> {
  handler: ValueHandler<T>;
  active: boolean;
}

/**
 * A broadcast channel holding the last sent value. Every new subscriber is
 * handed that value synchronously, then receives each `send` in order.
 */
export class ValueSubject<T> implements ChangeFeed<T> {
  private current: T;
  private readonly subscriptions = new Set<Subscription<T>>();

  constructor(initial: T) {
    this.current = initial;
  }

  public get value(): T {
    return this.current;
  }

  public send(value: T): void {
    this.current = value;
    // Snapshot so that handlers may subscribe or cancel while we deliver.
    for (const subscription of Array.from(this.subscriptions)) {
      if (subscription.active) {
        subscription.handler(value);
      }
    }
  }

  /** Changes the value replayed to new subscribers without delivering it. */
  public replace(value: T): void {
    this.current = value;
  }

  public subscribe(handler: ValueHandler<T>): Cancellable {
    const subscription: Subscription<T> = { handler, active: true };
    this.subscriptions.add(subscription);
    handler(this.current);
    return {
      cancel: () => {
        subscription.active = false;
        this.subscriptions.delete(subscription);
      },
    };
  }

  public values(signal?: AbortSignal): AsyncGenerator<T> {
    return iterateFeed(this, signal);
  }

  public get subscriberCount(): number {
    return this.subscriptions.size;
  }
}

/** A listener list without replay, used for will-change notifications. */
export class Signal {
  private readonly listeners = new Set<{ listener: WillChangeListener }>();

  public emit(): void {
    for (const entry of Array.from(this.listeners)) {
      if (this.listeners.has(entry)) {
        entry.listener();
      }
    }
  }

  public listen(listener: WillChangeListener): Cancellable {
    const entry = { listener };
    this.listeners.add(entry);
    return {
      cancel: () => {
        this.listeners.delete(entry);
      },
    };
  }
}
