import type {
  Cancellable,
  ChangeFeed,
  ValueHandler,
  WillChangeListener,
} from "./events.types";

/**
 * The contract every backend implements: a single observable value slot.
 *
 * Reading never throws. A backend that cannot produce a value (missing file,
 * undecodable data, absent credential) reports its empty value instead.
 */
export interface Storage<T> {
  value: T;
  readonly changes: ChangeFeed<T>;
  subscribe(handler: ValueHandler<T>): Cancellable;
  /** Called before every write made through `value`. Not replayed. */
  onWillChange(listener: WillChangeListener): Cancellable;
}

/**
 * What a composition needs to know about its value type: the canonical
 * "absent" value and how to compare two values.
 */
export interface ValueTraits<T> {
  readonly empty: T;
  equals(a: T, b: T): boolean;
}

/** Encodes values to the raw string form kept by key-value and secure stores. */
export interface ValueCodec<V> {
  encode(value: V): string;
  decode(raw: string): V;
}
