import { PredictionRecord } from "../schema/predictionRecord";
import { ConversionModel, FeatureMatrix } from "../model/conversionModel";
import { ClassLabel, isClassLabel, PredictionResponse, ProbabilityPair } from "../types/prediction";
import { errorMessage, PredictionFailedError } from "../errors";

const PROBABILITY_DECIMALS = 3;

// ============================================================================
// FEATURE MATRIX
// ============================================================================

function encodeFeatures(record: PredictionRecord): Map<string, number> {
  return new Map(
    Object.entries(record).map(([name, value]): [string, number] => [
      name,
      typeof value === "boolean" ? Number(value) : value,
    ])
  );
}

/**
 * Build one row per record, columns in the model's feature order.
 * Booleans become 1/0. A model feature the record lacks is a prediction fault.
 */
export function buildFeatureMatrix(
  records: readonly PredictionRecord[],
  featureNames: readonly string[]
): FeatureMatrix {
  return records.map((record, index) => {
    const features = encodeFeatures(record);

    return featureNames.map((name) => {
      const value = features.get(name);
      if (value === undefined) {
        throw new PredictionFailedError(`Record ${index} has no value for model feature "${name}"`);
      }
      return value;
    });
  });
}

// ============================================================================
// OUTPUT CHECKS
// ============================================================================

export function roundProbability(value: number): number {
  const factor = 10 ** PROBABILITY_DECIMALS;
  return Math.round(value * factor) / factor;
}

function isProbability(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value) && value >= 0 && value <= 1;
}

function toLabels(labels: readonly unknown[], expected: number): ClassLabel[] {
  if (labels.length !== expected) {
    throw new PredictionFailedError(`Model returned ${labels.length} labels for ${expected} records`);
  }

  return labels.map((label, index) => {
    if (!isClassLabel(label)) {
      throw new PredictionFailedError(`Model returned label ${String(label)} for record ${index}`);
    }
    return label;
  });
}

function toProbabilityPairs(rows: readonly (readonly unknown[])[], expected: number): ProbabilityPair[] {
  if (rows.length !== expected) {
    throw new PredictionFailedError(`Model returned ${rows.length} probability rows for ${expected} records`);
  }

  return rows.map((row, index) => {
    const [negative, positive] = row;
    if (row.length !== 2 || !isProbability(negative) || !isProbability(positive)) {
      throw new PredictionFailedError(`Model returned an unusable probability row for record ${index}`);
    }
    return [roundProbability(negative), roundProbability(positive)];
  });
}

// ============================================================================
// PREDICTION
// ============================================================================

/**
 * Run validated records through the model.
 * Output order matches input order; probabilities are rounded for the wire.
 */
export function predictBatch(
  model: ConversionModel,
  records: readonly PredictionRecord[]
): PredictionResponse {
  if (records.length === 0) {
    return { prediction: [], probability: [] };
  }

  const matrix = buildFeatureMatrix(records, model.featureNames);

  let labels: number[];
  let probabilities: number[][];
  try {
    labels = model.predict(matrix);
    probabilities = model.predictProba(matrix);
  } catch (error) {
    throw new PredictionFailedError(`Model invocation failed: ${errorMessage(error)}`, { cause: error });
  }

  return {
    prediction: toLabels(labels, records.length),
    probability: toProbabilityPairs(probabilities, records.length),
  };
}
