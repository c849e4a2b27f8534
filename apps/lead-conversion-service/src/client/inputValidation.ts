import {
  formatValidationIssues,
  PredictionRecord,
  validateBatch,
} from "../schema/predictionRecord";

export type InputValidationResult =
  | { ok: true; records: PredictionRecord[] }
  | { ok: false; error: string };

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Normalize user-supplied data before it is sent.
 * A single record object is wrapped into a one-element batch.
 */
export function processValidateInputData(data: unknown): InputValidationResult {
  const batch: unknown = isPlainObject(data) ? [data] : data;

  if (!Array.isArray(batch)) {
    return { ok: false, error: "Error processing data: expected a record or an array of records" };
  }

  const validation = validateBatch(batch);
  if (!validation.success) {
    return { ok: false, error: `Validation error: ${formatValidationIssues(validation.issues)}` };
  }

  return { ok: true, records: validation.records };
}
