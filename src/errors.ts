/**
 * Error types raised by the match engine
 */

/**
 * A regex criterion that does not compile
 */
export class PatternError extends Error {
  readonly pattern: string;
  readonly field: string;
  readonly reason: string;

  constructor(pattern: string, field: string, reason: string) {
    super(`Invalid pattern for ${field}: /${pattern}/ (${reason})`);
    this.name = "PatternError";
    this.pattern = pattern;
    this.field = field;
    this.reason = reason;
  }
}

/**
 * A required argument is missing or out of range
 */
export class ArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ArgumentError";
  }
}
