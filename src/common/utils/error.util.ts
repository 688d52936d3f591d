/**
 * Extract error message from error object or value
 * @param error - Error object, string, or any value
 * @returns Error message as string
 */
export function extractErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Narrow a caught value to an Error, wrapping anything else
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
