/**
 * Error handling utilities
 */

/**
 * Extract the message of an unknown thrown value
 */
export function getErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
