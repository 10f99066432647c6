import type {
  Cancellable,
  ChangeFeed,
  Storage,
  ValueHandler,
  WillChangeListener,
} from "../models";
import { Signal, ValueSubject } from "../events/value-subject";

/**
 * Shared plumbing of the concrete backends: a lazily created subject seeded
 * with the first read, and the will-change signal.
 *
 * Subclasses implement `read`/`write`. `write` returns whether the value was
 * stored; only stored values are published.
 */
export abstract class BaseStorage<T> implements Storage<T> {
  private subject: ValueSubject<T> | null = null;
  private readonly willChange = new Signal();

  protected abstract read(): T;
  protected abstract write(value: T): boolean;

  public get value(): T {
    return this.read();
  }

  public set value(newValue: T) {
    this.willChange.emit();
    if (this.write(newValue)) {
      this.publish(newValue);
    }
  }

  public get changes(): ChangeFeed<T> {
    if (!this.subject) {
      this.subject = new ValueSubject(this.read());
    }
    return this.subject;
  }

  public subscribe(handler: ValueHandler<T>): Cancellable {
    return this.changes.subscribe(handler);
  }

  public onWillChange(listener: WillChangeListener): Cancellable {
    return this.willChange.listen(listener);
  }

  /** Last value delivered to subscribers, without touching the backend. */
  protected get lastKnown(): T | undefined {
    return this.subject ? this.subject.value : undefined;
  }

  protected get isObserved(): boolean {
    return this.subject !== null;
  }

  protected publish(value: T): void {
    if (this.subject) {
      this.subject.send(value);
    } else {
      this.subject = new ValueSubject(value);
    }
  }
}
