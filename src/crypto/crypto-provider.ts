import { createRequire } from "module";
const require = createRequire(import.meta.url);

let crypto: Crypto;

if (typeof globalThis.crypto !== "undefined" && globalThis.crypto.subtle) {
  crypto = globalThis.crypto;
} else {
  const { webcrypto } = require("crypto") as { webcrypto: Crypto };
  crypto = webcrypto;
}

if (!crypto) {
  throw new Error(
    "Unsupported environment: A Web Crypto API implementation is required.",
  );
}

/**
 * Provides SubtleCrypto in any environment (Browser, Worker, or Node).
 */
export function getSubtleCrypto(): SubtleCrypto {
  return crypto.subtle;
}

/**
 * Provides getRandomValues in any environment (Browser, Worker, or Node).
 */
export function getRandomValues<T extends Uint8Array>(array: T): T {
  return crypto.getRandomValues(array);
}
