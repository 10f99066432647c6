export type * from "./models";

export { ValueSubject, Signal } from "./events/value-subject";
export { iterateFeed } from "./events/feed-iterator";

export { BaseStorage } from "./storages/base-storage";
export { MemoryStorage } from "./storages/memory-storage";
export { FileStorage, defaultStorageDirectory } from "./storages/file-storage";
export { KeyValueStorage } from "./storages/keyvalue-storage";
export { SecureStorage } from "./storages/secure-storage";
export { AnyStorage, toAny } from "./storages/any-storage";

export { StorageComposition } from "./composition/storage-composition";
export { combine, zip, zipWith } from "./composition/combine";
export { nullable } from "./composition/value-traits";

export { KeyValueDomain } from "./keyvalue/key-value-domain";
export { Keychain } from "./keychain/keychain";
export { KeychainError, type KeychainErrorCode } from "./keychain/errors";

export {
  createDefaultStore,
  FileStore,
  IndexedDBStore,
  type IKeyValueStore,
} from "./persistence";

export { jsonCodec } from "./utils/json-codec";
export { tryCatch, tryCatchSync } from "./utils/try-catch";
export { getGroundedError } from "./utils/error-parser";
