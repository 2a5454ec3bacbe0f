/**
 * Error handling utilities
 *
 * Consistent message extraction and logging for the CLI and tests.
 */

import { ConfigError, InvalidArgumentError, InvalidBoardError } from './errors'

/**
 * Extract a readable message from an unknown error value.
 * Handles Error objects, strings, and objects with a message property.
 *
 * @param err - The error to extract a message from
 * @param fallback - Returned when nothing usable is found
 *
 * @example
 * try {
 *   parsePuzzle(text)
 * } catch (err) {
 *   console.error(getErrorMessage(err))
 * }
 */
export function getErrorMessage(err: unknown, fallback = 'An error occurred'): string {
  if (err instanceof Error) {
    return err.message
  }

  if (typeof err === 'string') {
    return err
  }

  if (err && typeof err === 'object' && 'message' in err && typeof err.message === 'string') {
    return err.message
  }

  return fallback
}

/**
 * Whether the error was caused by bad input (puzzle file, arguments or
 * options) rather than a fault in the program.
 */
export function isInputError(err: unknown): boolean {
  return (
    err instanceof InvalidBoardError ||
    err instanceof InvalidArgumentError ||
    err instanceof ConfigError
  )
}

/**
 * Log an error with context for debugging.
 *
 * @param context - Where the error occurred
 * @param err - The error to log
 */
export function logError(context: string, err: unknown): void {
  const message = getErrorMessage(err)
  if (isInputError(err)) {
    console.error(`[${context}]`, message)
  } else {
    console.error(`[${context}]`, message, err)
  }
}
