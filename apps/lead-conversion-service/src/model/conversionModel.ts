/**
 * Conversion model
 * The service only talks to the classifier through ConversionModel.
 */

/** One row per record, one column per model feature */
export type FeatureMatrix = number[][];

export interface ConversionModel {
  readonly version: string;

  /** Column order the model was trained on */
  readonly featureNames: readonly string[];

  /** Class label (0 or 1) per row */
  predict(matrix: FeatureMatrix): number[];

  /** [P(0), P(1)] per row */
  predictProba(matrix: FeatureMatrix): number[][];
}

export interface LogisticRegressionParams {
  version: string;
  featureNames: readonly string[];
  coefficients: readonly number[];
  intercept: number;
  threshold?: number;
}

/** Cap on one feature's contribution to the linear score */
const MAX_TERM = 1e6;

function boundedTerm(value: number, coefficient: number): number {
  const term = value * coefficient;
  if (Number.isNaN(term)) {
    return 0;
  }
  return Math.min(MAX_TERM, Math.max(-MAX_TERM, term));
}

function sigmoid(z: number): number {
  return 1 / (1 + Math.exp(-z));
}

/**
 * Binary logistic regression over a fixed feature order.
 * Label 1 when P(1) exceeds the threshold (default 0.5).
 */
export class LogisticRegressionModel implements ConversionModel {
  readonly version: string;
  readonly featureNames: readonly string[];
  private readonly coefficients: readonly number[];
  private readonly intercept: number;
  private readonly threshold: number;

  constructor(params: LogisticRegressionParams) {
    if (params.coefficients.length !== params.featureNames.length) {
      throw new Error(
        `Model has ${params.featureNames.length} features but ${params.coefficients.length} coefficients`
      );
    }

    this.version = params.version;
    this.featureNames = Object.freeze([...params.featureNames]);
    this.coefficients = Object.freeze([...params.coefficients]);
    this.intercept = params.intercept;
    this.threshold = params.threshold ?? 0.5;
  }

  predict(matrix: FeatureMatrix): number[] {
    return this.predictProba(matrix).map(([, positive]) => (positive > this.threshold ? 1 : 0));
  }

  predictProba(matrix: FeatureMatrix): number[][] {
    return matrix.map((row, rowIndex) => {
      if (row.length !== this.coefficients.length) {
        throw new Error(
          `Feature matrix row ${rowIndex} has ${row.length} columns, model expects ${this.coefficients.length}`
        );
      }

      const z = row.reduce((sum, value, i) => sum + boundedTerm(value, this.coefficients[i]), this.intercept);
      const positive = sigmoid(z);
      return [1 - positive, positive];
    });
  }
}
