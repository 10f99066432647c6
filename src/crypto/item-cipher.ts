import { CompactEncrypt, compactDecrypt } from "jose";
import { getSubtleCrypto } from "./crypto-provider";
import { KeychainError } from "../keychain/errors";

export const DEFAULT_ITERATIONS = 250_000;

/**
 * Derives the 256-bit item key from a passphrase and a salt.
 */
export async function deriveItemKey(
  passphrase: string,
  salt: Uint8Array,
  iterations: number = DEFAULT_ITERATIONS,
): Promise<Uint8Array> {
  const crypto = getSubtleCrypto();
  const baseKey = await crypto.importKey(
    "raw",
    new TextEncoder().encode(passphrase),
    "PBKDF2",
    false,
    ["deriveBits"],
  );
  const bits = await crypto.deriveBits(
    {
      name: "PBKDF2",
      salt: new Uint8Array(salt),
      iterations,
      hash: "SHA-256",
    },
    baseKey,
    256,
  );
  return new Uint8Array(bits);
}

/** Encrypts one item into a compact JWE (direct key, AES-256-GCM). */
export async function sealItem(plaintext: string, key: Uint8Array): Promise<string> {
  return new CompactEncrypt(new TextEncoder().encode(plaintext))
    .setProtectedHeader({ alg: "dir", enc: "A256GCM" })
    .encrypt(key);
}

export async function openItem(jwe: string, key: Uint8Array): Promise<string> {
  try {
    const { plaintext } = await compactDecrypt(jwe, key);
    return new TextDecoder().decode(plaintext);
  } catch (error) {
    throw new KeychainError("broken_data", "Keychain item cannot be decrypted", {
      cause: error,
    });
  }
}
