/**
 * Error Handling Utilities
 *
 * Pure helpers for turning unknown errors and response bodies into messages.
 */

/**
 * Extract error message from error object or value
 * @param error - Error object, string, or any value
 * @returns Error message as string
 */
export function extractErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Truncate error message to max length
 */
export function truncateErrorMessage(message: string, maxLength: number = 200): string {
  return message.length > maxLength ? message.substring(0, maxLength) : message;
}
