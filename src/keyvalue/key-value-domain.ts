import type { Cancellable, KeyValueDomainConfig, Result } from "../models";
import type { IKeyValueStore } from "../persistence/ikeystore";
import { KeyObservers, type KeyListener } from "../utils/key-observers";
import { tryCatch } from "../utils/try-catch";
import { assertionFailure } from "../utils/diagnostics";

/**
 * A synchronous, observable key-value registry: the preferences store that
 * `KeyValueStorage` reads from and writes to.
 *
 * Reads and writes hit memory only and notify observers before returning.
 * When the domain has a backing `IKeyValueStore`, writes are queued behind
 * one another and persisted in order; `flush()` waits for the queue.
 */
export class KeyValueDomain {
  private static standardDomain: KeyValueDomain | null = null;

  /** The process-wide default domain. It lives in memory only. */
  public static get standard(): KeyValueDomain {
    if (!KeyValueDomain.standardDomain) {
      KeyValueDomain.standardDomain = new KeyValueDomain({ name: "standard" });
    }
    return KeyValueDomain.standardDomain;
  }

  /** Creates a domain and loads every key its store already holds. */
  public static async open(
    config: KeyValueDomainConfig,
  ): Promise<Result<KeyValueDomain>> {
    return tryCatch(async () => {
      const domain = new KeyValueDomain(config);
      await domain.reload();
      return domain;
    });
  }

  public readonly name: string;
  private readonly store: IKeyValueStore | null;
  private readonly entries = new Map<string, string>();
  private readonly observers = new KeyObservers();
  private pending: Promise<void> = Promise.resolve();
  // Write sequence per key; `reload` leaves keys written after it began.
  private writeCount = 0;
  private readonly lastWrite = new Map<string, number>();

  constructor(config: KeyValueDomainConfig = {}) {
    this.name = config.name ?? "default";
    this.store = config.store ?? null;
  }

  public get(key: string): string | undefined {
    return this.entries.get(key);
  }

  public set(key: string, raw: string): void {
    this.lastWrite.set(key, ++this.writeCount);
    this.entries.set(key, raw);
    this.observers.notify(key, raw);
    this.persist(key, (store) => store.set(key, raw));
  }

  public remove(key: string): void {
    if (!this.entries.delete(key)) {
      return;
    }
    this.lastWrite.set(key, ++this.writeCount);
    this.observers.notify(key, undefined);
    this.persist(key, (store) => store.del(key));
  }

  public keys(): string[] {
    return Array.from(this.entries.keys());
  }

  public observe(key: string, listener: KeyListener): Cancellable {
    return this.observers.observe(key, listener);
  }

  /** Resolves once every write issued so far has reached the store. */
  public flush(): Promise<void> {
    return this.pending;
  }

  /**
   * Re-reads the backing store and notifies observers of every key whose
   * value changed since the last load, e.g. after another process wrote to it.
   * Keys written locally while the reload is running keep their local value.
   */
  public async reload(): Promise<void> {
    if (!this.store) {
      return;
    }
    const startedAt = this.writeCount;
    await this.flush();
    const store = this.store;
    const keys = await store.keys();
    const loaded = new Map<string, string>();
    for (const key of keys) {
      const raw = await store.get<unknown>(key);
      if (typeof raw === "string") {
        loaded.set(key, raw);
      }
    }

    const isLocal = (key: string) => (this.lastWrite.get(key) ?? 0) > startedAt;
    const changed: string[] = [];
    for (const [key, raw] of loaded) {
      if (!isLocal(key) && this.entries.get(key) !== raw) {
        this.entries.set(key, raw);
        changed.push(key);
      }
    }
    for (const key of Array.from(this.entries.keys())) {
      if (!isLocal(key) && !loaded.has(key)) {
        this.entries.delete(key);
        changed.push(key);
      }
    }
    for (const key of changed) {
      this.observers.notify(key, this.entries.get(key));
    }
  }

  private persist(
    key: string,
    write: (store: IKeyValueStore) => Promise<void>,
  ): void {
    const store = this.store;
    if (!store) {
      return;
    }
    this.pending = this.pending
      .then(() => write(store))
      .catch((error: unknown) => {
        assertionFailure(
          "KeyValueDomain",
          `Failed to persist "${key}" in domain "${this.name}": ${String(error)}`,
        );
      });
  }
}
