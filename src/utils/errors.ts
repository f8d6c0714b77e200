/**
 * @fileoverview Standardized error handling utilities.
 *
 * - AppError: Base class for application-specific errors
 * - Result: Tagged success/failure value for callers that branch on outcome
 * - errorMessage: Normalizes unknown thrown values into a message string
 */

/**
 * Base class for application-specific errors.
 * Includes error code, recoverability flag, and optional context.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly recoverable: boolean = false,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
  }
}

/**
 * Result type for operations that may fail.
 * Prefer this over try-catch when callers need to handle both cases.
 */
export type Result<T> =
  | { success: true; data: T }
  | { success: false; error: string };

/**
 * Message of an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
