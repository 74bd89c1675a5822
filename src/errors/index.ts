/**
 * Centralized Error Types
 *
 * Typed, categorized errors for the snippet renderer. Every failure the CLI
 * reports is one of these, so `main` can print a single readable line and
 * exit non-zero.
 *
 * Error Categories:
 * - VALIDATION: bad line spec, format or option value
 * - INPUT: nothing to render, nowhere to write it
 * - DEPENDENCY: the highlighting library failed
 * - IO: reading or writing a file failed
 *
 * @example
 * ```typescript
 * throw new InvalidRangeError('10-8', 10, 8);
 * ```
 */

// =============================================================================
// ERROR CATEGORIES
// =============================================================================

/**
 * Categories of errors.
 */
export enum ErrorCategory {
  /** Invalid user input: line specs, formats, option values */
  VALIDATION = 'VALIDATION',

  /** Missing input or output */
  INPUT = 'INPUT',

  /** Highlighting library failures */
  DEPENDENCY = 'DEPENDENCY',

  /** Filesystem failures */
  IO = 'IO',

  /** Unexpected internal failures */
  INTERNAL = 'INTERNAL',
}

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

/**
 * Base class for all snippet errors.
 */
export class SnippetError extends Error {
  readonly category: ErrorCategory;

  readonly timestamp: Date;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  /** Original error that caused this one (if wrapping) */
  readonly cause?: Error;

  constructor(
    message: string,
    category: ErrorCategory,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message);
    this.name = 'SnippetError';
    this.category = category;
    this.timestamp = new Date();
    this.context = context ?? {};
    this.cause = cause;

    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Create a serializable representation of the error.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      category: this.category,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      cause: this.cause?.message,
      stack: this.stack,
    };
  }

  /**
   * Format error for logging.
   */
  toLogString(): string {
    const parts = [`[${this.name}]`, `(${this.category})`, this.message];

    if (Object.keys(this.context).length > 0) {
      parts.push(`context=${JSON.stringify(this.context)}`);
    }

    return parts.join(' ');
  }
}

// =============================================================================
// LINE SPEC ERRORS
// =============================================================================

/**
 * Parent of the three line-spec failures. Carries the offending token.
 */
export class LineSpecError extends SnippetError {
  readonly token: string;

  constructor(message: string, token: string, context?: Record<string, unknown>, cause?: Error) {
    super(message, ErrorCategory.VALIDATION, { ...context, token }, cause);
    this.name = 'LineSpecError';
    this.token = token;
  }
}

/**
 * A single-number token that is not a positive integer.
 */
export class InvalidLineNumberError extends LineSpecError {
  constructor(token: string) {
    super(`Invalid line number: '${token}'`, token);
    this.name = 'InvalidLineNumberError';
  }
}

/**
 * A range token whose start is greater than its end.
 */
export class InvalidRangeError extends LineSpecError {
  readonly start: number;
  readonly end: number;

  constructor(token: string, start: number, end: number) {
    super(`Invalid range '${token}': start (${start}) is greater than end (${end})`, token, {
      start,
      end,
    });
    this.name = 'InvalidRangeError';
    this.start = start;
    this.end = end;
  }
}

/**
 * A range token with a bound that is not a positive integer.
 */
export class InvalidRangeFormatError extends LineSpecError {
  constructor(token: string, cause: Error) {
    super(`Invalid range format '${token}': ${cause.message}`, token, undefined, cause);
    this.name = 'InvalidRangeFormatError';
  }
}

// =============================================================================
// PIPELINE ERRORS
// =============================================================================

/**
 * Output format other than svg or html.
 */
export class UnsupportedFormatError extends SnippetError {
  readonly format: string;

  constructor(format: string) {
    super(`Unsupported format: ${format}`, ErrorCategory.VALIDATION, { format });
    this.name = 'UnsupportedFormatError';
    this.format = format;
  }
}

/**
 * Empty or whitespace-only code.
 */
export class EmptyInputError extends SnippetError {
  constructor(source?: string) {
    super('No code provided', ErrorCategory.INPUT, source ? { source } : undefined);
    this.name = 'EmptyInputError';
  }
}

/**
 * No -o/--output given.
 */
export class MissingOutputPathError extends SnippetError {
  constructor() {
    super('the following arguments are required: -o/--output', ErrorCategory.INPUT);
    this.name = 'MissingOutputPathError';
  }
}

export type RenderStage = 'read' | 'highlight' | 'write';

/**
 * Failure from the highlighting library or the filesystem.
 */
export class RenderError extends SnippetError {
  readonly stage: RenderStage;

  constructor(message: string, stage: RenderStage, context?: Record<string, unknown>, cause?: Error) {
    super(
      message,
      stage === 'highlight' ? ErrorCategory.DEPENDENCY : ErrorCategory.IO,
      { ...context, stage },
      cause
    );
    this.name = 'RenderError';
    this.stage = stage;
  }

  /**
   * Wrap an error thrown at the given stage.
   */
  static fromError(error: unknown, stage: RenderStage, context?: Record<string, unknown>): RenderError {
    const err = error instanceof Error ? error : new Error(String(error));
    return new RenderError(err.message, stage, context, err);
  }
}

/**
 * Error from validation failures.
 */
export class ValidationError extends SnippetError {
  /** Field(s) that failed validation */
  readonly fields?: string[];

  constructor(message: string, fields?: string[], context?: Record<string, unknown>) {
    super(message, ErrorCategory.VALIDATION, { ...context, fields });
    this.name = 'ValidationError';
    this.fields = fields;
  }

  /**
   * Create error from Zod validation result.
   */
  static fromZodError(error: {
    issues: Array<{ path: PropertyKey[]; message: string }>;
  }): ValidationError {
    const fields = error.issues.map((i) => i.path.map(String).join('.'));
    const messages = error.issues.map((i) => `${i.path.map(String).join('.')}: ${i.message}`);
    return new ValidationError(`Validation failed: ${messages.join(', ')}`, fields);
  }
}

// =============================================================================
// ERROR UTILITIES
// =============================================================================

/**
 * Wrap an unknown error as a SnippetError.
 */
export function wrapError(error: unknown, context?: Record<string, unknown>): SnippetError {
  if (error instanceof SnippetError) {
    return error;
  }

  const err = error instanceof Error ? error : new Error(String(error));
  return new SnippetError(err.message, ErrorCategory.INTERNAL, context, err);
}
