/**
 * Canonical error codes for the datatracker client.
 * Each entry defines the equivalent HTTP status and the default message.
 */
export const ErrorCodes = {
  // Remote resources
  RESOURCE_NOT_FOUND: { httpStatus: 404, message: "Resource not found" },

  // Transport
  TRANSPORT_FAILED: { httpStatus: 502, message: "Request could not be sent" },
  TRANSPORT_TIMEOUT: { httpStatus: 504, message: "Request timed out" },
  RESPONSE_INVALID: {
    httpStatus: 502,
    message: "Response body did not match the expected shape",
  },

  // Local validation
  INVALID_URI: { httpStatus: 400, message: "Invalid resource URI" },
  INVALID_FILTER: { httpStatus: 400, message: "Invalid query filter" },
  CONFIG_INVALID: { httpStatus: 500, message: "Invalid configuration" },

  // System
  SYSTEM_INTERNAL_ERROR: { httpStatus: 500, message: "System internal error" },
} as const;

export type ErrorCode = keyof typeof ErrorCodes;

export const ERROR_CODE_LIST = Object.keys(ErrorCodes) as ErrorCode[];

export const DEFAULT_ERROR_MESSAGES: Record<ErrorCode, string> =
  ERROR_CODE_LIST.reduce(
    (acc, code) => {
      acc[code] = ErrorCodes[code].message;
      return acc;
    },
    {} as Record<ErrorCode, string>,
  );

/** Returns the HTTP status code for the given error code. */
export function getHttpStatus(code: ErrorCode): number {
  return ErrorCodes[code].httpStatus;
}
