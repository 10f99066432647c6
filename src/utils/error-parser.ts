import { KeychainError } from "../keychain/errors";

/**
 * Digs into an error object to find the most useful message. Keychain
 * failures keep their code in front so callers can tell a weak passphrase
 * from corrupted data, and wrapped errors are unpacked through `cause`.
 *
 * @param error The error object, which could be anything.
 */
export function getGroundedError(error: unknown): string {
  if (error instanceof KeychainError) {
    return `[${error.code}] ${error.message}`;
  }

  if (error instanceof Error) {
    if (error.cause !== undefined && error.cause !== error) {
      const inner = getGroundedError(error.cause);
      if (inner && inner !== error.message) {
        return `${error.message}: ${inner}`;
      }
    }
    return error.message;
  }

  return String(error);
}
