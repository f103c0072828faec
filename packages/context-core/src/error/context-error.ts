/**
 * @module @repo-context/core/error
 * Standardized error class for repo-context
 */

export class ContextError extends Error {
  constructor(
    public code: string,
    message: string,
    public hint?: string,
    public meta?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ContextError';
  }
}

/**
 * Error codes with their standard hints
 */
export const ERROR_HINTS = {
  CTX_INVALID_ROOT: 'Root path must be an existing directory',
  CTX_FILE_NOT_FOUND: 'Listed file does not exist under the root - check the --files values',
  CTX_PATH_ESCAPES_ROOT: 'Listed files must stay inside the root directory',
  CTX_INVALID_CONFIG: 'Configuration is invalid - check option names and value types',
  CTX_BAD_FLAGS: 'Invalid command line flags - check values and try again',
  CTX_READ_ERROR: 'File could not be read - check permissions and encoding',
  CTX_WRITE_ERROR: 'Output could not be written - check the --out path and permissions',
} as const;

export type ErrorCode = keyof typeof ERROR_HINTS;

const CONFIGURATION_CODES: ReadonlySet<string> = new Set<ErrorCode>([
  'CTX_INVALID_ROOT',
  'CTX_FILE_NOT_FOUND',
  'CTX_PATH_ESCAPES_ROOT',
  'CTX_INVALID_CONFIG',
  'CTX_BAD_FLAGS',
]);

/**
 * Maps ContextError codes to CLI exit codes
 */
export function getExitCode(err: ContextError): number {
  if (CONFIGURATION_CODES.has(err.code)) {return 2;}
  return 1;
}

/**
 * Create a ContextError with standardized code and hint
 */
export function createContextError(
  code: ErrorCode,
  message: string,
  meta?: Record<string, unknown>
): ContextError {
  return new ContextError(code, message, ERROR_HINTS[code], meta);
}

/**
 * Create a ContextError from a generic error
 */
export function wrapError(error: unknown, code: ErrorCode = 'CTX_READ_ERROR'): ContextError {
  if (error instanceof ContextError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  return createContextError(code, message, { originalError: error });
}

/**
 * Check if an error is a ContextError
 */
export function isContextError(error: unknown): error is ContextError {
  return error instanceof ContextError;
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
