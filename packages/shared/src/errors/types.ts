export interface ErrorContext {
  timestamp: string;
  url?: string;
}

export type ErrorContextInput = Omit<ErrorContext, "timestamp"> & {
  timestamp?: string;
};

export interface TrackerErrorOptions {
  httpStatus?: number;
  context?: ErrorContextInput;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export interface ValidationFieldError {
  path: string;
  message: string;
  code?: string;
}

export interface ValidationErrorDetails {
  fields: ValidationFieldError[];
}
