import type { Storage, ValueTraits } from "../models";
import { StorageComposition } from "./storage-composition";
import { nullable } from "./value-traits";

type Nullable<V> = Storage<V | null>;

/**
 * Composes two to five storages of a nullable value, fastest tier first.
 */
export function combine<V>(
  a: Nullable<V>,
  b: Nullable<V>,
): StorageComposition<V | null>;
export function combine<V>(
  a: Nullable<V>,
  b: Nullable<V>,
  c: Nullable<V>,
): StorageComposition<V | null>;
export function combine<V>(
  a: Nullable<V>,
  b: Nullable<V>,
  c: Nullable<V>,
  d: Nullable<V>,
): StorageComposition<V | null>;
export function combine<V>(
  a: Nullable<V>,
  b: Nullable<V>,
  c: Nullable<V>,
  d: Nullable<V>,
  e: Nullable<V>,
): StorageComposition<V | null>;
export function combine<V>(
  ...storages: Nullable<V>[]
): StorageComposition<V | null> {
  return zip(storages);
}

/** Composes any number of storages of a nullable value, fastest tier first. */
export function zip<V>(
  storages: readonly Nullable<V>[],
): StorageComposition<V | null> {
  return zipWith(storages, nullable<V>());
}

/**
 * Composes storages of a value type with its own notion of "empty", e.g. an
 * empty string or an empty list.
 */
export function zipWith<T>(
  storages: readonly Storage<T>[],
  traits: ValueTraits<T>,
): StorageComposition<T> {
  return new StorageComposition(storages, traits);
}
