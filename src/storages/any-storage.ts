import type {
  Cancellable,
  ChangeFeed,
  Storage,
  ValueHandler,
  WillChangeListener,
} from "../models";

/**
 * Hides the concrete backend behind the plain `Storage` contract, so that a
 * composition can hold memory, file, key-value and secure storages in one
 * list. Every call is forwarded to the wrapped storage.
 */
export class AnyStorage<T> implements Storage<T> {
  private readonly base: Storage<T>;

  constructor(base: Storage<T>) {
    this.base = base;
  }

  public get value(): T {
    return this.base.value;
  }

  public set value(newValue: T) {
    this.base.value = newValue;
  }

  public get changes(): ChangeFeed<T> {
    return this.base.changes;
  }

  public subscribe(handler: ValueHandler<T>): Cancellable {
    return this.base.changes.subscribe(handler);
  }

  public onWillChange(listener: WillChangeListener): Cancellable {
    return this.base.onWillChange(listener);
  }
}

/** Erases the backend type. An `AnyStorage` is returned as is. */
export function toAny<T>(storage: Storage<T>): AnyStorage<T> {
  if (storage instanceof AnyStorage) {
    return storage;
  }
  return new AnyStorage(storage);
}
