import { describe, it, expect, vi, afterEach } from "vitest";
import { KeyValueDomain } from "./key-value-domain";
import { InMemoryKeyValueStore } from "../testing/in-memory-store";

describe("KeyValueDomain", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should share one standard domain per process", () => {
    expect(KeyValueDomain.standard).toBe(KeyValueDomain.standard);
    expect(KeyValueDomain.standard.name).toBe("standard");
  });

  it("should read its own writes synchronously", () => {
    const domain = new KeyValueDomain();
    domain.set("theme", '"dark"');

    expect(domain.get("theme")).toBe('"dark"');
    expect(domain.keys()).toEqual(["theme"]);

    domain.remove("theme");
    expect(domain.get("theme")).toBeUndefined();
  });

  it("should notify observers of the key before set returns", () => {
    const domain = new KeyValueDomain();
    const listener = vi.fn();
    const other = vi.fn();
    domain.observe("a", listener);
    domain.observe("b", other);

    domain.set("a", "1");
    domain.remove("a");
    domain.remove("a");

    expect(listener.mock.calls).toEqual([["1"], [undefined]]);
    expect(other).not.toHaveBeenCalled();
  });

  it("should write behind to its store in order", async () => {
    const store = new InMemoryKeyValueStore();
    const domain = new KeyValueDomain({ name: "prefs", store });

    domain.set("a", "1");
    domain.set("b", "2");
    domain.remove("a");
    await domain.flush();

    expect(Array.from(store.data.entries())).toEqual([["b", "2"]]);
  });

  it("should load existing keys when opened", async () => {
    const store = new InMemoryKeyValueStore();
    await store.set("count", "3");
    await store.set("ignored", 3);

    const result = await KeyValueDomain.open({ store });

    expect(result.success).toBe(true);
    expect(result.data?.get("count")).toBe("3");
    expect(result.data?.get("ignored")).toBeUndefined();
  });

  it("should report a store that cannot be read as a failed open", async () => {
    const store = new InMemoryKeyValueStore();
    vi.spyOn(store, "keys").mockRejectedValue(new Error("disk unavailable"));

    const result = await KeyValueDomain.open({ store });

    expect(result.success).toBe(false);
    expect(result.error?.message).toBe("disk unavailable");
  });

  it("should notify changed keys on reload", async () => {
    const store = new InMemoryKeyValueStore();
    const domain = new KeyValueDomain({ store });
    domain.set("same", "1");
    domain.set("edited", "1");
    domain.set("deleted", "1");
    await domain.flush();

    const listener = vi.fn();
    domain.observe("same", listener);
    domain.observe("edited", listener);
    domain.observe("deleted", listener);

    await store.set("edited", "2");
    await store.del("deleted");
    await domain.reload();

    expect(listener.mock.calls).toEqual([["2"], [undefined]]);
    expect(domain.get("edited")).toBe("2");
    expect(domain.get("deleted")).toBeUndefined();
  });

  it("should keep keys written while a reload is reading the store", async () => {
    const store = new InMemoryKeyValueStore();
    const domain = new KeyValueDomain({ store });
    domain.set("kept", "1");
    await domain.flush();
    await store.set("external", "7");

    const listener = vi.fn();
    domain.observe("fresh", listener);
    domain.observe("kept", listener);
    store.afterKeys = () => {
      store.afterKeys = null;
      domain.set("fresh", '"x"');
      domain.remove("kept");
    };
    await domain.reload();

    expect(domain.get("fresh")).toBe('"x"');
    expect(domain.get("kept")).toBeUndefined();
    expect(domain.get("external")).toBe("7");
    expect(listener.mock.calls).toEqual([['"x"'], [undefined]]);

    await domain.flush();
    expect(store.data.get("fresh")).toBe('"x"');
    expect(store.data.has("kept")).toBe(false);
  });

  it("should keep working when the store rejects a write", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const store = new InMemoryKeyValueStore();
    store.failWrites = true;
    const domain = new KeyValueDomain({ name: "prefs", store });

    domain.set("a", "1");
    await domain.flush();
    store.failWrites = false;
    domain.set("b", "2");
    await domain.flush();

    expect(domain.get("a")).toBe("1");
    expect(store.data.get("b")).toBe("2");
    expect(warn.mock.calls).toEqual([
      [
        '[KeyValueDomain] Failed to persist "a" in domain "prefs": Error: write of "a" rejected',
      ],
    ]);
  });
});
