import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { FileStorage, defaultStorageDirectory } from "./file-storage";

describe("FileStorage", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "file-storage-"));
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("should place the file under the directory with the default extension", () => {
    const storage = new FileStorage<string>({ fileName: "token", directory: tmpDir });
    expect(storage.filePath).toBe(path.join(tmpDir, "token.stg"));
  });

  it("should default to a Storages folder under the cache home", () => {
    vi.stubEnv("XDG_CACHE_HOME", tmpDir);
    expect(defaultStorageDirectory()).toBe(path.join(tmpDir, "Storages"));

    const storage = new FileStorage<string>({ fileName: "token", extension: "json" });
    expect(storage.filePath).toBe(path.join(tmpDir, "Storages", "token.json"));
    expect(fs.statSync(path.join(tmpDir, "Storages")).isDirectory()).toBe(true);
  });

  it("should read a missing file as null", () => {
    const storage = new FileStorage<number>({ fileName: "missing", directory: tmpDir });
    expect(storage.value).toBeNull();
  });

  it("should persist values as JSON that another instance can read", () => {
    const writer = new FileStorage<{ name: string; tags: string[] }>({
      fileName: "profile",
      directory: tmpDir,
    });
    writer.value = { name: "Ada", tags: ["admin"] };

    const reader = new FileStorage<{ name: string; tags: string[] }>({
      fileName: "profile",
      directory: tmpDir,
    });
    expect(reader.value).toEqual({ name: "Ada", tags: ["admin"] });
    expect(fs.readFileSync(writer.filePath, "utf-8")).toBe(
      '{"name":"Ada","tags":["admin"]}',
    );
    expect(fs.existsSync(writer.filePath + ".tmp")).toBe(false);
  });

  it("should keep binary values intact", () => {
    const storage = new FileStorage<Uint8Array>({ fileName: "blob", directory: tmpDir });
    storage.value = new Uint8Array([1, 2, 250]);

    const reread = new FileStorage<Uint8Array>({ fileName: "blob", directory: tmpDir });
    expect(reread.value).toEqual(new Uint8Array([1, 2, 250]));
  });

  it("should read a corrupted file as null and report it", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const storage = new FileStorage<number>({ fileName: "broken", directory: tmpDir });
    fs.writeFileSync(storage.filePath, "{not json");

    expect(storage.value).toBeNull();
    expect(warn).toHaveBeenCalledOnce();
    expect(String(warn.mock.calls[0][0])).toMatch(/^\[FileStorage\] /);
  });

  it("should not publish when the write fails", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const storage = new FileStorage<number>({ fileName: "gone", directory: tmpDir });
    const handler = vi.fn();
    storage.subscribe(handler);
    fs.rmSync(tmpDir, { recursive: true, force: true });

    storage.value = 7;

    expect(handler.mock.calls).toEqual([[null]]);
    expect(warn).toHaveBeenCalledOnce();
  });

  it("should publish external edits on reload", () => {
    const storage = new FileStorage<number>({ fileName: "shared", directory: tmpDir });
    const handler = vi.fn();
    storage.subscribe(handler);

    const other = new FileStorage<number>({ fileName: "shared", directory: tmpDir });
    other.value = 42;

    expect(storage.reload()).toBe(42);
    expect(storage.reload()).toBe(42);
    expect(handler.mock.calls).toEqual([[null], [42]]);
  });
});
