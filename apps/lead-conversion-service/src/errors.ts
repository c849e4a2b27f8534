import { formatValidationIssues, RecordIssue } from "./schema/predictionRecord";

export const ErrorCodes = {
  MALFORMED_REQUEST: "MALFORMED_REQUEST",
  VALIDATION_FAILED: "VALIDATION_FAILED",
  PREDICTION_FAILED: "PREDICTION_FAILED",
  SERVICE_UNAVAILABLE: "SERVICE_UNAVAILABLE",
} as const;

type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export const MALFORMED_REQUEST_DETAIL = "Malformed request: body must be a JSON array of records";
export const PREDICTION_ERROR_DETAIL = "Prediction error";

/**
 * Base error for everything the prediction API reports.
 * `detail` is what the caller sees; `message` may carry internals and is only logged.
 */
export class PredictionApiError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly statusCode: number,
    public readonly detail: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = "PredictionApiError";
  }
}

/** Body is not JSON, or not a JSON array */
export class MalformedRequestError extends PredictionApiError {
  constructor(reason: string, options?: ErrorOptions) {
    super(reason, ErrorCodes.MALFORMED_REQUEST, 400, MALFORMED_REQUEST_DETAIL, options);
    this.name = "MalformedRequestError";
  }
}

/** One or more records violate the record contract */
export class ValidationFailedError extends PredictionApiError {
  constructor(public readonly issues: RecordIssue[]) {
    const detail = formatValidationIssues(issues);
    super(detail, ErrorCodes.VALIDATION_FAILED, 400, detail);
    this.name = "ValidationFailedError";
  }
}

/** Model invocation raised or returned something unusable */
export class PredictionFailedError extends PredictionApiError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, ErrorCodes.PREDICTION_FAILED, 500, PREDICTION_ERROR_DETAIL, options);
    this.name = "PredictionFailedError";
  }
}

/** Model could not be loaded; the service must not become ready */
export class ServiceUnavailableError extends PredictionApiError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, ErrorCodes.SERVICE_UNAVAILABLE, 503, "Service unavailable", options);
    this.name = "ServiceUnavailableError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}
