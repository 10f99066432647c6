import type {
  Cancellable,
  ChangeFeed,
  Storage,
  ValueHandler,
  ValueTraits,
  WillChangeListener,
} from "../models";
import { Signal, ValueSubject } from "../events/value-subject";
import { AnyStorage, toAny } from "../storages/any-storage";
import { MemoryStorage } from "../storages/memory-storage";
import { assertionFailure } from "../utils/diagnostics";

/**
 * Keeps one logical value in sync across several storages.
 *
 * The order of `storages` is the tier order: reads return the value of the
 * first storage that is not empty and copy it into the storages before it.
 * Writes go to every storage. A change published by one storage (for example
 * a key-value store edited by other code) is written to all the others and
 * re-published by the composition, exactly once.
 *
 * Compositions are storages themselves and can be nested.
 */
export class StorageComposition<T> implements Storage<T> {
  private readonly storages: AnyStorage<T>[];
  private readonly traits: ValueTraits<T>;
  private readonly subject: ValueSubject<T>;
  private readonly willChange = new Signal();
  private observers: Cancellable[];
  private isSyncing = false;

  constructor(storages: readonly Storage<T>[], traits: ValueTraits<T>) {
    this.traits = traits;

    if (storages.length === 0) {
      // Callers may filter their list at runtime (no keychain on this
      // platform, say); keep working on a volatile storage.
      assertionFailure(
        "StorageComposition",
        "Created without storages; falling back to an in-memory storage.",
      );
      this.storages = [toAny(new MemoryStorage<T>(traits.empty))];
    } else {
      this.storages = storages.map((storage) => toAny(storage));
    }

    let found = traits.empty;
    for (const storage of this.storages) {
      const value = storage.value;
      if (!this.isEmpty(value)) {
        found = value;
        break;
      }
    }
    this.subject = new ValueSubject(found);

    if (!this.isEmpty(found)) {
      this.whileSyncing(() => {
        for (const storage of this.storages) {
          if (this.isEmpty(storage.value)) {
            storage.value = found;
          }
        }
      });
    }

    this.observers = this.storages.map((actual) => {
      let replayed = false;
      return actual.changes.subscribe((newValue) => {
        // The first call is the replay of the value the storage holds now.
        if (!replayed) {
          replayed = true;
          return;
        }
        this.storageDidChange(actual, newValue);
      });
    });
  }

  public get value(): T {
    return this.get();
  }

  public set value(newValue: T) {
    this.set(newValue);
  }

  public get changes(): ChangeFeed<T> {
    return this.subject;
  }

  public subscribe(handler: ValueHandler<T>): Cancellable {
    return this.subject.subscribe(handler);
  }

  public onWillChange(listener: WillChangeListener): Cancellable {
    return this.willChange.listen(listener);
  }

  /** Number of tiers, including the in-memory fallback of an empty list. */
  public get size(): number {
    return this.storages.length;
  }

  /**
   * Stops relaying changes between the storages. Reads and writes through
   * the composition keep working.
   */
  public dispose(): void {
    for (const observer of this.observers) {
      observer.cancel();
    }
    this.observers = [];
  }

  private isEmpty(value: T): boolean {
    return this.traits.equals(value, this.traits.empty);
  }

  private whileSyncing(body: () => void): void {
    const previous = this.isSyncing;
    this.isSyncing = true;
    try {
      body();
    } finally {
      this.isSyncing = previous;
    }
  }

  private storageDidChange(actual: AnyStorage<T>, newValue: T): void {
    // An echo of a write we are making right now.
    if (this.isSyncing) {
      return;
    }

    this.whileSyncing(() => {
      for (const storage of this.storages) {
        if (storage !== actual) {
          storage.value = newValue;
        }
      }
    });

    this.willChange.emit();
    this.subject.send(newValue);
  }

  private get(): T {
    let foundIndex = -1;
    let found = this.traits.empty;
    for (let i = 0; i < this.storages.length; i++) {
      const value = this.storages[i].value;
      if (!this.isEmpty(value)) {
        foundIndex = i;
        found = value;
        break;
      }
    }

    // Warm the faster tiers with the value found further down.
    if (foundIndex > 0) {
      this.whileSyncing(() => {
        for (let i = foundIndex - 1; i >= 0; i--) {
          this.storages[i].value = found;
        }
      });
    }
    if (!this.traits.equals(found, this.subject.value)) {
      this.subject.replace(found);
    }

    return found;
  }

  private set(newValue: T): void {
    this.willChange.emit();
    this.whileSyncing(() => {
      for (const storage of this.storages) {
        storage.value = newValue;
      }
    });
    this.subject.send(newValue);
  }
}
