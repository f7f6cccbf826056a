/**
 * Error types for schematic solving
 *
 * Every error is fatal for the input being solved: a skipped line could
 * silently under-count part numbers, so nothing is recovered or retried.
 */

/**
 * Source position for error reporting
 */
export interface SourcePosition {
  /** 1-based line number */
  line: number;
  /** 0-based column number */
  column: number;
}

/**
 * Base class for schematic errors
 */
export abstract class SchematicError extends Error {
  /** Position where the error occurred (if available) */
  readonly position: SourcePosition | null;

  constructor(message: string, position: SourcePosition | null = null, options?: ErrorOptions) {
    const fullMessage = position
      ? `${message} at line ${position.line}, column ${position.column}`
      : message;
    super(fullMessage, options);
    this.name = this.constructor.name;
    this.position = position;
  }
}

/**
 * Thrown when the input file cannot be read
 */
export class IoError extends SchematicError {
  /** Path that failed to read */
  readonly path: string;

  constructor(path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Unable to read input '${path}': ${reason}`, null, { cause });
    this.path = path;
  }
}

/**
 * Thrown when a digit run does not fit the numeric type
 */
export class ParseError extends SchematicError {
  /** The offending source text */
  readonly text: string;

  constructor(message: string, text: string, position: SourcePosition | null = null) {
    super(message, position);
    this.text = text;
  }
}

/**
 * Thrown when tokenizer output breaks a shape the engine relies on
 */
export class StructuralAssumptionViolation extends SchematicError {
  constructor(message: string, position: SourcePosition | null = null) {
    super(message, position);
  }
}

/**
 * Thrown when a gear ratio or a running sum leaves the safe integer range
 */
export class ArithmeticOverflowError extends SchematicError {
  constructor(message: string, position: SourcePosition | null = null) {
    super(message, position);
  }
}
