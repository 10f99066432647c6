import type { Result } from "../models";
import { getGroundedError } from "./error-parser";

/**
 * Wraps a promise-returning function so that it always resolves to a
 * `Result`. This is how every asynchronous operation of the library reports
 * failure: callers inspect `success` instead of catching.
 *
 * @param promiseFn The operation to run.
 * @param errorFn Turns whatever was thrown into a message. Defaults to `getGroundedError`.
 */
export async function tryCatch<T>(
  promiseFn: () => Promise<T>,
  errorFn: (error: unknown) => string = getGroundedError,
): Promise<Result<T>> {
  try {
    const data = await promiseFn();
    return { success: true, data, error: null };
  } catch (caughtError) {
    return {
      success: false,
      data: null,
      error: new Error(errorFn(caughtError), { cause: caughtError }),
    };
  }
}

export function tryCatchSync<T>(fn: () => T): Result<T, Error> {
  try {
    const data = fn();
    return { success: true, data, error: null };
  } catch (caughtError) {
    if (caughtError instanceof Error) {
      return { success: false, data: null, error: caughtError };
    }
    return {
      success: false,
      data: null,
      error: new Error(String(caughtError)),
    };
  }
}
