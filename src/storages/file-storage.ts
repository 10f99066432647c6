import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import type { FileStorageConfig, ValueCodec } from "../models";
import { BaseStorage } from "./base-storage";
import { jsonCodec } from "../utils/json-codec";
import { tryCatchSync } from "../utils/try-catch";
import { assertionFailure } from "../utils/diagnostics";

export function defaultStorageDirectory(): string {
  const cacheHome =
    process.env.XDG_CACHE_HOME ?? path.join(os.homedir(), ".cache");
  return path.join(cacheHome, "Storages");
}

function resolveFolder(directory: string): string {
  const created = tryCatchSync(() =>
    fs.mkdirSync(directory, { recursive: true }),
  );
  return created.success ? directory : path.dirname(directory);
}

/**
 * Keeps one value as a JSON document on disk. A missing or undecodable file
 * reads as `null`.
 *
 * Writes go to a temporary file that is renamed over the target, so readers
 * in other processes never see a partial document.
 */
export class FileStorage<V> extends BaseStorage<V | null> {
  public readonly filePath: string;
  private readonly codec: ValueCodec<V | null> = jsonCodec<V | null>();

  constructor(config: FileStorageConfig) {
    super();
    const folder = resolveFolder(config.directory ?? defaultStorageDirectory());
    this.filePath = path.join(
      folder,
      `${config.fileName}.${config.extension ?? "stg"}`,
    );
  }

  protected read(): V | null {
    const result = tryCatchSync(() => {
      if (!fs.existsSync(this.filePath)) {
        return null;
      }
      return this.codec.decode(fs.readFileSync(this.filePath, "utf-8"));
    });
    if (!result.success) {
      assertionFailure("FileStorage", `${this.filePath}: ${result.error.message}`);
      return null;
    }
    return result.data;
  }

  protected write(value: V | null): boolean {
    const result = tryCatchSync(() => {
      const tempPath = this.filePath + ".tmp";
      fs.writeFileSync(tempPath, this.codec.encode(value), {
        mode: 0o600,
        encoding: "utf-8",
      });
      fs.renameSync(tempPath, this.filePath);
    });
    if (!result.success) {
      assertionFailure("FileStorage", `${this.filePath}: ${result.error.message}`);
    }
    return result.success;
  }

  /**
   * Re-reads the file and publishes its value when it differs from the last
   * one subscribers saw. Use it after the file was replaced from outside.
   */
  public reload(): V | null {
    const current = this.read();
    if (
      this.isObserved &&
      this.codec.encode(current) !== this.codec.encode(this.lastKnown ?? null)
    ) {
      this.publish(current);
    }
    return current;
  }
}
