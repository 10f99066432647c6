import type { ValueCodec } from "../models";

// Binary values are tagged so they survive a JSON round trip.
export function replacer(_key: string, value: unknown): unknown {
  if (value instanceof Uint8Array) {
    return { __dataType: "Uint8Array", data: Array.from(value) };
  }
  if (value instanceof ArrayBuffer) {
    const base64 = Buffer.from(value).toString("base64");
    return { __dataType: "ArrayBuffer", data: base64 };
  }
  return value;
}

export function reviver(_key: string, value: unknown): unknown {
  if (
    value &&
    typeof value === "object" &&
    "__dataType" in value &&
    "data" in value
  ) {
    if (value.__dataType === "Uint8Array" && Array.isArray(value.data)) {
      return new Uint8Array(value.data);
    }
    if (value.__dataType === "ArrayBuffer" && typeof value.data === "string") {
      const buffer = Buffer.from(value.data, "base64");
      return buffer.buffer.slice(
        buffer.byteOffset,
        buffer.byteOffset + buffer.byteLength,
      );
    }
  }
  return value;
}

/**
 * The default codec of key-value and secure storages. Decoding does not
 * validate the shape of the value; a malformed document throws and the
 * storage reads it as empty.
 */
export function jsonCodec<V>(): ValueCodec<V> {
  return {
    encode: (value) => JSON.stringify(value, replacer),
    decode: (raw) => JSON.parse(raw, reviver) as V,
  };
}
