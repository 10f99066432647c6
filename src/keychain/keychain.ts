import { zxcvbn } from "@zxcvbn-ts/core";
import { sha256 } from "@noble/hashes/sha2";
import { bytesToHex, utf8ToBytes } from "@noble/hashes/utils";
import type { Cancellable, KeychainConfig, Result } from "../models";
import type { IKeyValueStore } from "../persistence/ikeystore";
import { createDefaultStore } from "../persistence";
import { getRandomValues } from "../crypto/crypto-provider";
import { deriveItemKey, openItem, sealItem } from "../crypto/item-cipher";
import { KeyObservers, type KeyListener } from "../utils/key-observers";
import { tryCatch } from "../utils/try-catch";
import { getGroundedError } from "../utils/error-parser";
import { assertionFailure } from "../utils/diagnostics";
import { KeychainError } from "./errors";

const SALT_KEY_PREFIX = "kc-salt/";
const ITEM_KEY_PREFIX = "kc/";

function assertStrongPassphrase(passphrase: string): void {
  if (passphrase.length < 8) {
    throw new KeychainError(
      "weak_passphrase",
      "The passphrase must be at least 8 characters long.",
    );
  }
  const strength = zxcvbn(passphrase);
  if (strength.score < 3) {
    throw new KeychainError(
      "weak_passphrase",
      "Passphrase is too weak. Please choose a stronger one.",
    );
  }
}

async function loadOrCreateSalt(
  store: IKeyValueStore,
  service: string,
): Promise<Uint8Array> {
  const saltKey = SALT_KEY_PREFIX + service;
  const existing = await store.get<unknown>(saltKey);
  if (existing instanceof Uint8Array && existing.length > 0) {
    return existing;
  }
  const salt = getRandomValues(new Uint8Array(16));
  await store.set(saltKey, salt);
  return salt;
}

/**
 * A secure credential store. Items are strings addressed by account name,
 * scoped to a service and an optional access group, and persisted encrypted
 * (compact JWE) in an `IKeyValueStore`. Account names are hashed at rest.
 *
 * Items are decrypted once when the keychain opens; afterwards reads are
 * synchronous and writes are encrypted and persisted in the background.
 */
export class Keychain {
  /**
   * Opens the keychain of `config.service`, deriving the item key from the
   * passphrase. Items that cannot be decrypted with it are treated as absent.
   */
  public static async open(config: KeychainConfig): Promise<Result<Keychain>> {
    return tryCatch(async () => {
      assertStrongPassphrase(config.passphrase);
      const store =
        config.store ?? createDefaultStore(`${config.service}-keychain`);
      const salt = await loadOrCreateSalt(store, config.service);
      const key = await deriveItemKey(
        config.passphrase,
        salt,
        config.iterations,
      );
      const keychain = new Keychain(config, store, key);
      await keychain.reload();
      return keychain;
    });
  }

  public readonly service: string;
  public readonly accessGroup: string | null;
  private readonly store: IKeyValueStore;
  private readonly key: Uint8Array;
  private readonly items = new Map<string, string>();
  private readonly observers = new KeyObservers();
  private pending: Promise<void> = Promise.resolve();
  private writeCount = 0;
  private readonly lastWrite = new Map<string, number>();

  private constructor(
    config: KeychainConfig,
    store: IKeyValueStore,
    key: Uint8Array,
  ) {
    this.service = config.service;
    this.accessGroup = config.accessGroup ?? null;
    this.store = store;
    this.key = key;
  }

  private get prefix(): string {
    return `${ITEM_KEY_PREFIX}${this.service}/${this.accessGroup ?? "default"}/`;
  }

  private itemKey(account: string): string {
    return this.prefix + bytesToHex(sha256(utf8ToBytes(account)));
  }

  public read(account: string): string | undefined {
    return this.items.get(this.itemKey(account));
  }

  public write(account: string, raw: string): void {
    const itemKey = this.itemKey(account);
    this.lastWrite.set(itemKey, ++this.writeCount);
    this.items.set(itemKey, raw);
    this.observers.notify(itemKey, raw);
    this.persist(async () => {
      const jwe = await sealItem(raw, this.key);
      await this.store.set(itemKey, jwe);
    });
  }

  public clear(account: string): void {
    const itemKey = this.itemKey(account);
    if (!this.items.delete(itemKey)) {
      return;
    }
    this.lastWrite.set(itemKey, ++this.writeCount);
    this.observers.notify(itemKey, undefined);
    this.persist(() => this.store.del(itemKey));
  }

  public observe(account: string, listener: KeyListener): Cancellable {
    return this.observers.observe(this.itemKey(account), listener);
  }

  /** Resolves once every write issued so far has been encrypted and stored. */
  public flush(): Promise<void> {
    return this.pending;
  }

  /**
   * Decrypts every item of this service and access group from the store and
   * notifies observers of the ones that changed. Items written or cleared
   * while the reload is running keep their local state.
   */
  public async reload(): Promise<void> {
    const startedAt = this.writeCount;
    await this.flush();
    const prefix = this.prefix;
    const keys = (await this.store.keys()).filter((key) =>
      key.startsWith(prefix),
    );

    const loaded = new Map<string, string>();
    for (const itemKey of keys) {
      const jwe = await this.store.get<unknown>(itemKey);
      if (typeof jwe !== "string") {
        continue;
      }
      const opened = await tryCatch(() => openItem(jwe, this.key));
      if (opened.success) {
        loaded.set(itemKey, opened.data);
      } else {
        assertionFailure("Keychain", getGroundedError(opened.error));
      }
    }

    const isLocal = (itemKey: string) =>
      (this.lastWrite.get(itemKey) ?? 0) > startedAt;
    const changed: string[] = [];
    for (const [itemKey, raw] of loaded) {
      if (!isLocal(itemKey) && this.items.get(itemKey) !== raw) {
        this.items.set(itemKey, raw);
        changed.push(itemKey);
      }
    }
    for (const itemKey of Array.from(this.items.keys())) {
      if (!isLocal(itemKey) && !loaded.has(itemKey)) {
        this.items.delete(itemKey);
        changed.push(itemKey);
      }
    }
    for (const itemKey of changed) {
      this.observers.notify(itemKey, this.items.get(itemKey));
    }
  }

  private persist(write: () => Promise<void>): void {
    this.pending = this.pending.then(write).catch((error: unknown) => {
      const wrapped = new KeychainError(
        "unhandled",
        `Failed to persist an item of "${this.service}"`,
        { cause: error },
      );
      assertionFailure("Keychain", getGroundedError(wrapped));
    });
  }
}
