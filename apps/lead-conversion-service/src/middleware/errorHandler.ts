import { Request, Response, NextFunction } from "express";
import { ErrorResponse } from "../types/prediction";
import {
  ErrorCodes,
  MalformedRequestError,
  PredictionApiError,
  PredictionFailedError,
  ValidationFailedError,
  errorMessage,
} from "../errors";
import { createLogger } from "../logger";

const log = createLogger("http");

/**
 * express.json() reports unparseable bodies with type "entity.parse.failed"
 */
function isBodyParseError(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "type" in error &&
    error.type === "entity.parse.failed"
  );
}

/**
 * Other body-parser rejections (entity.too.large, charset.unsupported, ...)
 * carry a 4xx status and a message meant for the caller
 */
function toBodyReadError(error: unknown): PredictionApiError | null {
  if (
    typeof error === "object" &&
    error !== null &&
    "type" in error &&
    typeof error.type === "string" &&
    "status" in error &&
    typeof error.status === "number" &&
    error.status >= 400 &&
    error.status < 500
  ) {
    const detail = errorMessage(error);
    return new PredictionApiError(detail, ErrorCodes.MALFORMED_REQUEST, error.status, detail, { cause: error });
  }
  return null;
}

function causeMessage(error: Error): string | undefined {
  return error.cause === undefined ? undefined : errorMessage(error.cause);
}

/**
 * Unknown routes
 */
export function notFoundHandler(_req: Request, res: Response<ErrorResponse>) {
  res.status(404).json({ detail: "Not Found" });
}

/**
 * Maps errors to `{ detail }` responses.
 * Validation detail goes back to the caller; prediction faults are logged and
 * answered with the generic detail only.
 */
export function errorHandler(
  error: unknown,
  req: Request,
  res: Response<ErrorResponse>,
  // Express recognizes error middleware by its four parameters
  _next: NextFunction
) {
  const apiError = isBodyParseError(error)
    ? new MalformedRequestError("Request body is not valid JSON", { cause: error })
    : toBodyReadError(error) ?? error;

  if (apiError instanceof ValidationFailedError) {
    log.warn("Validation error", { path: req.path, issues: apiError.issues.length, detail: apiError.detail });
  } else if (apiError instanceof PredictionFailedError) {
    log.error("Error during prediction", { path: req.path, error: apiError.message, cause: causeMessage(apiError) });
  } else if (apiError instanceof PredictionApiError) {
    log.warn(apiError.message, { path: req.path, code: apiError.code });
  } else {
    log.error("Unhandled error", { path: req.path, error: errorMessage(apiError) });
    return res.status(500).json({ detail: "Internal server error" });
  }

  return res.status(apiError.statusCode).json({ detail: apiError.detail });
}
