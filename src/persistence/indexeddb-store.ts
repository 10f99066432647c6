import {
  clear,
  createStore,
  del,
  get,
  keys,
  set,
  type UseStore,
} from "idb-keyval";
import type { IKeyValueStore } from "./ikeystore";

/**
 * An IKeyValueStore on top of IndexedDB. This is the default persistence in
 * browsers. Each instance owns one object store named after the database.
 */
export class IndexedDBStore implements IKeyValueStore {
  private readonly customStore: UseStore;

  constructor(dbName: string, storeName = "keyval") {
    this.customStore = createStore(dbName, storeName);
  }

  public async get<T>(key: string): Promise<T | undefined> {
    return get<T>(key, this.customStore);
  }

  public async set<T>(key: string, value: T): Promise<void> {
    return set(key, value, this.customStore);
  }

  public async del(key: string): Promise<void> {
    return del(key, this.customStore);
  }

  public async keys(): Promise<string[]> {
    const all = await keys(this.customStore);
    return all.filter((key): key is string => typeof key === "string");
  }

  public async clear(): Promise<void> {
    return clear(this.customStore);
  }
}
