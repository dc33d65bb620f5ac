export {
  DEFAULT_ERROR_MESSAGES,
  ERROR_CODE_LIST,
  type ErrorCode,
  ErrorCodes,
  getHttpStatus,
} from "./codes";
export { createValidationError, TrackerError } from "./factory";
export type {
  ErrorContext,
  ErrorContextInput,
  TrackerErrorOptions,
  ValidationErrorDetails,
  ValidationFieldError,
} from "./types";
