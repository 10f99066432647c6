import * as path from "path";
import type { IKeyValueStore } from "./ikeystore";
import { FileStore } from "./filestore";
import { IndexedDBStore } from "./indexeddb-store";

const isNode = typeof window === "undefined";

/**
 * Picks the persistence for the current environment: a JSON file in the
 * working directory under Node.js, IndexedDB in the browser.
 */
export function createDefaultStore(name: string): IKeyValueStore {
  if (isNode) {
    return new FileStore(path.join(process.cwd(), `${name}.json`));
  }
  return new IndexedDBStore(name);
}

export type { IKeyValueStore } from "./ikeystore";
export { FileStore } from "./filestore";
export { IndexedDBStore } from "./indexeddb-store";
