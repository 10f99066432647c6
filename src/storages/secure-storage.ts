import type { Cancellable, SecureStorageConfig, ValueCodec } from "../models";
import { BaseStorage } from "./base-storage";
import type { Keychain } from "../keychain/keychain";
import { jsonCodec } from "../utils/json-codec";
import { tryCatchSync } from "../utils/try-catch";
import { assertionFailure } from "../utils/diagnostics";

/**
 * One account of an open `Keychain`. Writing `null` deletes the item.
 *
 * @example
 * ```ts
 * const opened = await Keychain.open({ service: "com.example.app", passphrase });
 * if (opened.success) {
 *   const token = new SecureStorage<string>({ key: "auth_token", keychain: opened.data });
 *   token.value = "abc123";
 * }
 * ```
 */
export class SecureStorage<V> extends BaseStorage<V | null> {
  public readonly key: string;
  private readonly keychain: Keychain;
  private readonly codec: ValueCodec<V>;
  private readonly observation: Cancellable;

  constructor(config: SecureStorageConfig<V>) {
    super();
    this.key = config.key;
    this.keychain = config.keychain;
    this.codec = config.codec ?? jsonCodec<V>();
    this.observation = this.keychain.observe(this.key, (raw) => {
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
    return this.decode(this.keychain.read(this.key));
  }

  // Same contract as KeyValueStorage: the keychain observer publishes.
  protected write(value: V | null): boolean {
    if (value === null) {
      const existed = this.keychain.read(this.key) !== undefined;
      this.keychain.clear(this.key);
      if (!existed) {
        this.publish(null);
      }
      return false;
    }
    const encoded = tryCatchSync(() => this.codec.encode(value));
    if (!encoded.success) {
      assertionFailure("SecureStorage", `"${this.key}": ${encoded.error.message}`);
      return false;
    }
    this.keychain.write(this.key, encoded.data);
    return false;
  }

  public detach(): void {
    this.observation.cancel();
  }
}
