export interface ErrorResponse {
  code: string;
  type: string;
  message: string;
  context?: Record<string, unknown>;
}

export const ErrorCodes = {
  EXTRACTION_ERROR: 'EXTRACTION_ERROR',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  CONFIG_ERROR: 'CONFIG_ERROR',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

/**
 * One code per structural shape that can fail to match.
 */
export const ExtractionErrorCodes = {
  INDIRECTION_TABLE_MATCH_FAILED: 'INDIRECTION_TABLE_MATCH_FAILED',
  HELPER_OBJECT_NOT_FOUND: 'HELPER_OBJECT_NOT_FOUND',
  HELPER_OBJECT_HAS_NO_RECOGNIZED_OPERATIONS: 'HELPER_OBJECT_HAS_NO_RECOGNIZED_OPERATIONS',
  DECIPHER_DRIVER_NOT_FOUND: 'DECIPHER_DRIVER_NOT_FOUND',
  GLOBAL_DECLARATIONS_NOT_FOUND: 'GLOBAL_DECLARATIONS_NOT_FOUND',
  N_TRANSFORM_NOT_FOUND: 'N_TRANSFORM_NOT_FOUND',
  N_TRANSFORM_PARAMETER_NOT_FOUND: 'N_TRANSFORM_PARAMETER_NOT_FOUND',
  MALFORMED_OR_OVERSIZED_BUNDLE: 'MALFORMED_OR_OVERSIZED_BUNDLE',
} as const;

export type ExtractionErrorCode = (typeof ExtractionErrorCodes)[keyof typeof ExtractionErrorCodes];

export class ExtractionError extends Error {
  override readonly name = 'ExtractionError';
  readonly code: ExtractionErrorCode;
  /** Name of the matcher that missed, e.g. `HELPER_OBJECT`. */
  readonly shape: string;
  readonly context?: Record<string, unknown>;

  constructor(
    code: ExtractionErrorCode,
    shape: string,
    message: string,
    context?: Record<string, unknown>,
  ) {
    super(message);
    this.code = code;
    this.shape = shape;
    this.context = context;
  }
}

export function isExtractionError(error: unknown): error is ExtractionError {
  return error instanceof ExtractionError;
}

export function formatError(
  error: unknown,
  code: string = ErrorCodes.INTERNAL_ERROR,
  context?: Record<string, unknown>,
): ErrorResponse {
  if (error instanceof ExtractionError) {
    return {
      code: error.code,
      type: error.name,
      message: error.message,
      context: { shape: error.shape, ...error.context, ...context },
    };
  }

  if (error instanceof Error) {
    return {
      code,
      type: error.name || 'Error',
      message: error.message,
      context,
    };
  }

  return {
    code,
    type: 'UnknownError',
    message: String(error),
    context,
  };
}
