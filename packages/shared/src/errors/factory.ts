import { DEFAULT_ERROR_MESSAGES, getHttpStatus } from "./codes";
import type { ErrorCode } from "./codes";
import type {
  ErrorContext,
  ErrorContextInput,
  TrackerErrorOptions,
  ValidationErrorDetails,
  ValidationFieldError,
} from "./types";

export class TrackerError extends Error {
  readonly code: ErrorCode;
  readonly httpStatus: number;
  readonly context?: ErrorContext;
  readonly details?: Record<string, unknown>;
  override cause?: unknown;

  constructor(code: ErrorCode, message: string, options?: TrackerErrorOptions) {
    super(message);
    this.name = "TrackerError";
    this.code = code;
    this.httpStatus = options?.httpStatus ?? getHttpStatus(code);

    const context = normalizeContext(options?.context);
    if (context) {
      this.context = context;
    }

    if (options?.details) {
      this.details = options.details;
    }

    if (options && "cause" in options) {
      this.cause = options.cause;
    }
  }
}

/** Create a validation error with field-level details. */
export function createValidationError(
  code: ErrorCode,
  fields: ValidationFieldError[],
  options?: TrackerErrorOptions,
): TrackerError {
  const details: ValidationErrorDetails = { fields };
  return new TrackerError(code, DEFAULT_ERROR_MESSAGES[code], {
    ...options,
    details: {
      ...(options?.details ?? {}),
      validation: details,
    },
  });
}

function normalizeContext(input?: ErrorContextInput): ErrorContext | undefined {
  if (!input) {
    return undefined;
  }
  return {
    ...input,
    timestamp: input.timestamp ?? new Date().toISOString(),
  };
}
