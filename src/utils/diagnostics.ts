/**
 * Reports a situation that should never happen in a correct program but that
 * the library repairs on its own. Silent in production builds.
 *
 * @param scope Name of the reporting component, printed as `[scope]`.
 */
export function assertionFailure(scope: string, message: string): void {
  if (process.env.NODE_ENV === "production") {
    return;
  }
  console.warn(`[${scope}] ${message}`);
}
