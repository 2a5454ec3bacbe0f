/**
 * Error types
 *
 * Every error raised by the board and solver modules is one of these.
 * They are thrown at the point of detection and never caught internally.
 */

/**
 * A required argument was missing (e.g. no initial board given to the solver).
 */
export class InvalidArgumentError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'InvalidArgumentError'
  }
}

/**
 * A tile grid or puzzle file does not describe a valid board.
 */
export class InvalidBoardError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'InvalidBoardError'
  }
}

/**
 * A 1-based coordinate fell outside [1, N].
 */
export class IndexOutOfRangeError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'IndexOutOfRangeError'
  }
}

/**
 * Solver options failed schema validation.
 */
export class ConfigError extends Error {
  readonly issues: string[]

  constructor(issues: string[]) {
    super(`Invalid solver options: ${issues.join('; ')}`)
    this.name = 'ConfigError'
    this.issues = issues
  }
}
