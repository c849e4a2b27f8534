import { PredictionRecord } from "../schema/predictionRecord";
import { ClassLabel, ProbabilityPair } from "../types/prediction";

export type Outcome = "CONVERT" | "NOT CONVERT";

export type PredictionRow = PredictionRecord & {
  prediction: ClassLabel;
  /** Probability of the predicted class */
  probability: number;
  outcome: Outcome;
};

export type CombineResult =
  | { ok: true; rows: PredictionRow[] }
  | { ok: false; error: string };

export function outcomeLabel(label: ClassLabel): Outcome {
  return label === 1 ? "CONVERT" : "NOT CONVERT";
}

/**
 * Join submitted records with the service's answer, row by row
 */
export function combineResults(
  records: readonly PredictionRecord[] | null | undefined,
  prediction: readonly ClassLabel[] | null | undefined,
  probability: readonly ProbabilityPair[] | null | undefined
): CombineResult {
  if (!records || !prediction || !probability) {
    return { ok: false, error: "Missing input data, predictions, or probabilities" };
  }

  if (records.length !== prediction.length || records.length !== probability.length) {
    return { ok: false, error: "Length mismatch between input data, predictions, and probabilities" };
  }

  const rows = records.map((record, i) => {
    const label = prediction[i];
    return {
      ...record,
      prediction: label,
      probability: probability[i][label],
      outcome: outcomeLabel(label),
    };
  });

  return { ok: true, rows };
}
