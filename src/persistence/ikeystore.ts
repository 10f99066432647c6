/**
 * A generic, asynchronous key-value persistence mechanism. Key-value domains
 * and keychains write behind to one of these, so the same code persists to
 * IndexedDB in a browser and to the file system under Node.js.
 */
export interface IKeyValueStore {
  get<T>(key: string): Promise<T | undefined>;
  set<T>(key: string, value: T): Promise<void>;
  del(key: string): Promise<void>;
  keys(): Promise<string[]>;
  clear?(): Promise<void>;
}
