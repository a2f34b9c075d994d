/**
 * Extracts a string message from an unknown error value.
 * Handles both Error instances and arbitrary thrown values.
 *
 * @param error - The caught error value (Error instance or any thrown value)
 * @returns The error message string
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Returns the stack of an Error, or undefined for thrown non-Error values.
 * Suitable as the second argument of `Logger.error`.
 */
export function getErrorStack(error: unknown): string | undefined {
  return error instanceof Error ? error.stack : undefined;
}
