import type { ValueTraits } from "../models";

/**
 * Traits of nullable values: `null` is the empty value, `undefined` counts as
 * `null`, anything else compares with `===`.
 */
export function nullable<V>(): ValueTraits<V | null> {
  return {
    empty: null,
    equals: (a, b) => a === b || (a == null && b == null),
  };
}
