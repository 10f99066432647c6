import type { Cancellable, KeyValueStorageConfig, ValueCodec } from "../models";
import { BaseStorage } from "./base-storage";
import { KeyValueDomain } from "../keyvalue/key-value-domain";
import { jsonCodec } from "../utils/json-codec";
import { tryCatchSync } from "../utils/try-catch";
import { assertionFailure } from "../utils/diagnostics";

/**
 * One key of a `KeyValueDomain`. Every write to that key is published here,
 * including writes made directly on the domain by other code.
 */
export class KeyValueStorage<V> extends BaseStorage<V | null> {
  public readonly key: string;
  public readonly domain: KeyValueDomain;
  private readonly codec: ValueCodec<V>;
  private readonly observation: Cancellable;

  constructor(config: KeyValueStorageConfig<V>) {
    super();
    this.key = config.key;
    this.domain = config.domain ?? KeyValueDomain.standard;
    this.codec = config.codec ?? jsonCodec<V>();
    this.observation = this.domain.observe(this.key, (raw) => {
      this.publish(this.decode(raw));
    });
  }

  private decode(raw: string | undefined): V | null {
    if (raw === undefined) {
      return null;
    }
    const result = tryCatchSync(() => this.codec.decode(raw));
    return result.success ? result.data : null;
  }

  protected read(): V | null {
    return this.decode(this.domain.get(this.key));
  }

  // The domain notifies our observer, which publishes; returning false
  // keeps the base class from publishing a second time.
  protected write(value: V | null): boolean {
    if (value === null) {
      const existed = this.domain.get(this.key) !== undefined;
      this.domain.remove(this.key);
      if (!existed) {
        this.publish(null);
      }
      return false;
    }
    const encoded = tryCatchSync(() => this.codec.encode(value));
    if (!encoded.success) {
      assertionFailure("KeyValueStorage", `"${this.key}": ${encoded.error.message}`);
      return false;
    }
    this.domain.set(this.key, encoded.data);
    return false;
  }

  /** Stops following the domain. The storage keeps working for reads and writes. */
  public detach(): void {
    this.observation.cancel();
  }
}
