/**
 * Error types and codes for routemark.
 * All errors raised by the compiler extend RoutemarkError.
 */

/**
 * Base error class for all routemark errors.
 */
export class RoutemarkError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'RoutemarkError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Configuration-related errors (loading, parsing, validation).
 */
export class ConfigError extends RoutemarkError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * Marker registry errors (invalid definitions).
 */
export class RegistryError extends RoutemarkError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'RegistryError';
  }
}

/**
 * System errors (unreadable directory, unparsable source file, I/O).
 * Always fatal for the run.
 */
export class SystemError extends RoutemarkError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

/**
 * A declaration-level marker problem.
 * Collected across a whole scan and reported together through MultipleValidationError.
 */
export class ValidationError extends RoutemarkError {
  constructor(
    code: string,
    public readonly file: string,
    public readonly line: number,
    public readonly reason: string
  ) {
    super(code, line > 0 ? `${file}:${line} - ${reason}` : `${file} - ${reason}`, { file, line });
    this.name = 'ValidationError';
  }
}

/**
 * Every ValidationError of a run, one per line in the message.
 */
export class MultipleValidationError extends RoutemarkError {
  constructor(public readonly errors: readonly ValidationError[]) {
    super(
      ErrorCodes.VALIDATION_FAILED,
      errors.map((e) => e.message).join('\n'),
      { count: errors.length }
    );
    this.name = 'MultipleValidationError';
  }
}

/**
 * A post-parse or pre-generation hook threw.
 */
export class HookError extends RoutemarkError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'HookError';
  }
}

/**
 * Rendering or writing the generated module failed.
 */
export class GenerationError extends RoutemarkError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'GenerationError';
  }
}

/**
 * The generated module failed a post-generation check.
 */
export class PostValidationError extends RoutemarkError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'PostValidationError';
  }
}

export const ErrorCodes = {
  // Marker syntax (declaration-level)
  MALFORMED_MARKER: 'MALFORMED_MARKER',
  UNMATCHED_QUOTES: 'UNMATCHED_QUOTES',
  UNMATCHED_PARENTHESES: 'UNMATCHED_PARENTHESES',
  INVALID_ARGUMENTS: 'INVALID_ARGUMENTS',
  INVALID_ARGUMENT_COUNT: 'INVALID_ARGUMENT_COUNT',

  // Route domain rules (declaration-level)
  INVALID_HTTP_METHOD: 'INVALID_HTTP_METHOD',
  INVALID_PATH: 'INVALID_PATH',
  DUPLICATE_ROUTE: 'DUPLICATE_ROUTE',
  HANDLER_NOT_EXPORTED: 'HANDLER_NOT_EXPORTED',

  // Aggregate
  VALIDATION_FAILED: 'VALIDATION_FAILED',

  // Registry
  INVALID_MARKER_DEFINITION: 'INVALID_MARKER_DEFINITION',

  // Config
  CONFIG_LOAD_ERROR: 'CONFIG_LOAD_ERROR',

  // System (fatal)
  PARSE_ERROR: 'PARSE_ERROR',
  DIRECTORY_NOT_FOUND: 'DIRECTORY_NOT_FOUND',
  INVALID_YAML: 'INVALID_YAML',

  // Hooks (fatal)
  HOOK_FAILED: 'HOOK_FAILED',
  MODULE_DECLARATION_NOT_FOUND: 'MODULE_DECLARATION_NOT_FOUND',

  // Generation (fatal)
  UNRESOLVED_HANDLER_IMPORT: 'UNRESOLVED_HANDLER_IMPORT',
  UNRESOLVED_RUNTIME_IMPORT: 'UNRESOLVED_RUNTIME_IMPORT',
  WRITE_FAILED: 'WRITE_FAILED',

  // Post-generation validation (fatal)
  GENERATED_FILE_NOT_FOUND: 'GENERATED_FILE_NOT_FOUND',
  GENERATED_FILE_EMPTY: 'GENERATED_FILE_EMPTY',
  GENERATED_SYNTAX_ERROR: 'GENERATED_SYNTAX_ERROR',
  MISSING_IMPORTS: 'MISSING_IMPORTS',
  MISSING_ENTRY_POINT: 'MISSING_ENTRY_POINT',
  MISSING_REGISTRATIONS: 'MISSING_REGISTRATIONS',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
