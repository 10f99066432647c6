import type { IKeyValueStore } from "../persistence/ikeystore";
import type { ValueCodec } from "./storage.types";
import type { KeyValueDomain } from "../keyvalue/key-value-domain";
import type { Keychain } from "../keychain/keychain";

export interface FileStorageConfig {
  fileName: string;
  /** Defaults to `<cache home>/Storages`. */
  directory?: string;
  /** Defaults to `stg`. */
  extension?: string;
}

export interface KeyValueDomainConfig {
  name?: string;
  /** Where writes are persisted. Without one the domain lives in memory only. */
  store?: IKeyValueStore;
}

export interface KeyValueStorageConfig<V> {
  key: string;
  /** Defaults to `KeyValueDomain.standard`. */
  domain?: KeyValueDomain;
  codec?: ValueCodec<V>;
}

export interface KeychainConfig {
  /** Unique id of the application, usually its package name. */
  service: string;
  /** Narrows the items to one group when several apps share a service id. */
  accessGroup?: string;
  passphrase: string;
  iterations?: number;
  /** Defaults to `createDefaultStore("<service>-keychain")`. */
  store?: IKeyValueStore;
}

export interface SecureStorageConfig<V> {
  key: string;
  keychain: Keychain;
  codec?: ValueCodec<V>;
}
