import { describe, it, expect, vi } from "vitest";
import { AnyStorage, toAny } from "./any-storage";
import { MemoryStorage } from "./memory-storage";

describe("toAny", () => {
  it("should return an erased storage unchanged", () => {
    const erased = toAny(new MemoryStorage<number | null>(1));
    expect(toAny(erased)).toBe(erased);
  });

  it("should wrap a concrete storage exactly once", () => {
    const base = new MemoryStorage("a");
    const erased = toAny(base);
    expect(erased).toBeInstanceOf(AnyStorage);
    expect(erased).not.toBe(base);
  });

  it("should forward reads, writes and the change feed", () => {
    const base = new MemoryStorage("a");
    const erased = toAny(base);
    const handler = vi.fn();
    erased.subscribe(handler);

    erased.value = "b";
    expect(base.value).toBe("b");

    base.value = "c";
    expect(erased.value).toBe("c");
    expect(handler.mock.calls).toEqual([["a"], ["b"], ["c"]]);
    expect(erased.changes).toBe(base.changes);
  });

  it("should announce writes through the wrapped storage's will-change signal", () => {
    const base = new MemoryStorage(0);
    const listener = vi.fn();
    toAny(base).onWillChange(listener);

    base.value = 1;

    expect(listener).toHaveBeenCalledOnce();
  });
});
