import { BaseStorage } from "./base-storage";

/** A volatile storage. Nothing outlives the instance. */
export class MemoryStorage<T> extends BaseStorage<T> {
  private current: T;

  /** A memory storage holding the empty value `null`. */
  public static empty<V>(): MemoryStorage<V | null> {
    return new MemoryStorage<V | null>(null);
  }

  constructor(value: T) {
    super();
    this.current = value;
  }

  protected read(): T {
    return this.current;
  }

  protected write(value: T): boolean {
    this.current = value;
    return true;
  }
}
