import { promises as fs } from "fs";
import * as path from "path";
import type { IKeyValueStore } from "./ikeystore";
import { replacer, reviver } from "../utils/json-codec";

function isMissingFile(error: unknown): boolean {
  return (
    error instanceof Error && "code" in error && error.code === "ENOENT"
  );
}

/**
 * An IKeyValueStore kept in a single local JSON file. This is the default
 * persistence under Node.js. Every operation re-reads the file, so writes
 * made by another process are picked up by the next `get` or `keys`.
 */
export class FileStore implements IKeyValueStore {
  private readonly filePath: string;
  private inMemoryCache: Map<string, unknown> = new Map();

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  public get path(): string {
    return this.filePath;
  }

  public async load(): Promise<void> {
    try {
      const data = await fs.readFile(this.filePath, "utf-8");
      if (!data.trim()) {
        this.inMemoryCache = new Map();
        return;
      }
      try {
        const parsed: unknown = JSON.parse(data, reviver);
        if (!parsed || typeof parsed !== "object") {
          throw new Error("not an object");
        }
        this.inMemoryCache = new Map(Object.entries(parsed));
      } catch {
        // If not valid JSON, reset the file and cache
        await fs.writeFile(this.filePath, "", {
          mode: 0o600,
          encoding: "utf-8",
        });
        await fs.chmod(this.filePath, 0o600);
        this.inMemoryCache = new Map();
        console.warn(`[FileStore] Corrupted store file reset: ${this.filePath}`);
      }
    } catch (error) {
      // A missing file is an empty store; it is created on the first `set`.
      if (!isMissingFile(error)) {
        throw error;
      }
      this.inMemoryCache = new Map();
    }
  }

  private async save(): Promise<void> {
    const data =
      this.inMemoryCache.size > 0
        ? JSON.stringify(Object.fromEntries(this.inMemoryCache), replacer)
        : "";

    const dir = path.dirname(this.filePath);
    await fs.mkdir(dir, { recursive: true });
    const tempPath = this.filePath + ".tmp";
    await fs.writeFile(tempPath, data, { mode: 0o600, encoding: "utf-8" });
    await fs.chmod(tempPath, 0o600);
    await fs.rename(tempPath, this.filePath);
  }

  public async get<T>(key: string): Promise<T | undefined> {
    await this.load();
    return this.inMemoryCache.get(key) as T | undefined;
  }

  public async set<T>(key: string, value: T): Promise<void> {
    await this.load();
    this.inMemoryCache.set(key, value);
    await this.save();
  }

  public async del(key: string): Promise<void> {
    await this.load();
    this.inMemoryCache.delete(key);
    await this.save();
  }

  public async keys(): Promise<string[]> {
    await this.load();
    return Array.from(this.inMemoryCache.keys());
  }

  public async clear(): Promise<void> {
    this.inMemoryCache.clear();
    await this.save();
  }
}
