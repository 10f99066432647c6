import type { Cancellable } from "../models";

export type KeyListener = (raw: string | undefined) => void;

/** Per-key listener registry shared by key-value domains and keychains. */
export class KeyObservers {
  private readonly listeners = new Map<string, Set<{ listener: KeyListener }>>();

  public observe(key: string, listener: KeyListener): Cancellable {
    const entry = { listener };
    let entries = this.listeners.get(key);
    if (!entries) {
      entries = new Set();
      this.listeners.set(key, entries);
    }
    entries.add(entry);
    return {
      cancel: () => {
        const current = this.listeners.get(key);
        current?.delete(entry);
        if (current && current.size === 0) {
          this.listeners.delete(key);
        }
      },
    };
  }

  public notify(key: string, raw: string | undefined): void {
    const entries = this.listeners.get(key);
    if (!entries) {
      return;
    }
    for (const entry of Array.from(entries)) {
      if (entries.has(entry)) {
        entry.listener(raw);
      }
    }
  }
}
