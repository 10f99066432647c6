export type KeychainErrorCode = "weak_passphrase" | "broken_data" | "unhandled";

/**
 * The failure type of keychain operations. It never escapes a storage read:
 * secure storages turn it into an absent value.
 */
export class KeychainError extends Error {
  override readonly name = "KeychainError";

  constructor(
    public readonly code: KeychainErrorCode,
    message?: string,
    options?: { cause?: unknown },
  ) {
    super(message ?? `Keychain failed: ${code.replace(/_/g, " ")}`, options);
  }
}
