/**
 * Prediction Record Contract
 *
 * Defines the shape of one lead's feature vector.
 * This contract is used by:
 * - Prediction service (POST /predict/ request validation)
 * - Client adapter (local validation before the network call)
 *
 * Unknown keys are stripped, not rejected. The categorical one-hot flags
 * (occupation, profile completion, last activity) are not checked for
 * mutual exclusivity.
 *
 * @module schema/predictionRecord
 */

import { z } from "zod";

// ===========================================
// Field Builders
// ===========================================

const REQUIRED = "required field missing";

function count(max?: number) {
  const base = z
    .number({ required_error: REQUIRED, invalid_type_error: "must be a number" })
    .int("must be an integer")
    .min(0, "must be ≥ 0");

  return max === undefined ? base : base.max(max, `must be ≤ ${max}`);
}

function measure() {
  return z
    .number({ required_error: REQUIRED, invalid_type_error: "must be a number" })
    .finite("must be a finite number")
    .min(0, "must be ≥ 0");
}

function flag() {
  return z.boolean({ required_error: REQUIRED, invalid_type_error: "must be a boolean" });
}

// ===========================================
// Prediction Record Schema
// ===========================================

export const PredictionRecordSchema = z.object(
  {
    // === Numeric features ===
    age: count(100).describe("Lead age in years"),
    website_visits: count().describe("Total number of website visits"),
    time_spent_on_website: measure().describe("Total time spent on the website, in seconds"),
    page_views_per_visit: measure().describe("Average pages viewed per visit"),

    // === One-hot categorical features ===
    current_occupation_student: flag(),
    current_occupation_unemployed: flag(),
    first_interaction_website: flag(),
    profile_completed_low: flag(),
    profile_completed_medium: flag(),
    last_activity_phone: flag(),
    last_activity_website: flag(),

    // === Channel features ===
    print_media_type1_yes: flag(),
    print_media_type2_yes: flag(),
    digital_media_yes: flag(),
    educational_channels_yes: flag(),
    referral_yes: flag(),
  },
  { required_error: "must be an object", invalid_type_error: "must be an object" }
);

export type PredictionRecord = z.infer<typeof PredictionRecordSchema>;

export type PredictionFeature = keyof PredictionRecord;

/** Feature names in declaration order */
export const PREDICTION_FEATURES: readonly PredictionFeature[] = PredictionRecordSchema.keyof().options;

// ===========================================
// Prediction Response Schema
// ===========================================

export const PredictionResponseSchema = z.object({
  prediction: z.array(z.union([z.literal(0), z.literal(1)])),
  probability: z.array(z.tuple([z.number().min(0).max(1), z.number().min(0).max(1)])),
});

// ===========================================
// Validation
// ===========================================

/** Field name used when the record itself is not an object */
export const RECORD_FIELD = "record";

export interface FieldIssue {
  field: string;
  message: string;
}

export interface RecordIssue extends FieldIssue {
  /** Position of the offending record in the submitted batch */
  index: number;
}

export type RecordValidationResult =
  | { success: true; record: PredictionRecord }
  | { success: false; issues: FieldIssue[] };

export type BatchValidationResult =
  | { success: true; records: PredictionRecord[] }
  | { success: false; issues: RecordIssue[] };

function toFieldIssues(error: z.ZodError): FieldIssue[] {
  return error.issues.map((issue) => ({
    field: issue.path.length > 0 ? issue.path.join(".") : RECORD_FIELD,
    message: issue.message,
  }));
}

/**
 * Validate one untyped record and coerce it into a PredictionRecord.
 * Every failing field is reported, not just the first.
 */
export function validateRecord(raw: unknown): RecordValidationResult {
  const parsed = PredictionRecordSchema.safeParse(raw);

  if (parsed.success) {
    return { success: true, record: parsed.data };
  }

  return { success: false, issues: toFieldIssues(parsed.error) };
}

/**
 * Validate every record of a batch independently.
 * Fails as a whole if any record fails; issues carry the record index.
 */
export function validateBatch(raws: readonly unknown[]): BatchValidationResult {
  const records: PredictionRecord[] = [];
  const issues: RecordIssue[] = [];

  raws.forEach((raw, index) => {
    const result = validateRecord(raw);
    if (result.success) {
      records.push(result.record);
    } else {
      issues.push(...result.issues.map((issue) => ({ ...issue, index })));
    }
  });

  if (issues.length > 0) {
    return { success: false, issues };
  }

  return { success: true, records };
}

/**
 * Render issues as a single line, e.g.
 * `record[0].age: must be ≤ 100; record[2]: must be an object`
 */
export function formatValidationIssues(issues: readonly RecordIssue[]): string {
  return issues
    .map((issue) =>
      issue.field === RECORD_FIELD
        ? `record[${issue.index}]: ${issue.message}`
        : `record[${issue.index}].${issue.field}: ${issue.message}`
    )
    .join("; ");
}
