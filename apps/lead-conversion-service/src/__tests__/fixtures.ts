import { Server } from "http";
import { Express } from "express";
import { PREDICTION_FEATURES, PredictionRecord } from "../schema/predictionRecord";
import { ConversionModel, FeatureMatrix } from "../model/conversionModel";

export const SAMPLE_RECORD: PredictionRecord = {
  age: 57,
  website_visits: 1,
  time_spent_on_website: 582,
  page_views_per_visit: 2.197,
  current_occupation_student: false,
  current_occupation_unemployed: false,
  first_interaction_website: false,
  profile_completed_low: false,
  profile_completed_medium: false,
  last_activity_phone: false,
  last_activity_website: false,
  print_media_type1_yes: false,
  print_media_type2_yes: false,
  digital_media_yes: false,
  educational_channels_yes: true,
  referral_yes: false,
};

export function makeRecord(overrides: Partial<PredictionRecord> = {}): PredictionRecord {
  return { ...SAMPLE_RECORD, ...overrides };
}

/**
 * P(convert) = age / 100, so each output row is traceable to its input row
 */
export class AgeModel implements ConversionModel {
  readonly version = "test-age";
  readonly featureNames: readonly string[] = PREDICTION_FEATURES;

  predict(matrix: FeatureMatrix): number[] {
    return this.predictProba(matrix).map(([, positive]) => (positive > 0.5 ? 1 : 0));
  }

  predictProba(matrix: FeatureMatrix): number[][] {
    return matrix.map((row) => {
      const positive = row[0] / 100;
      return [1 - positive, positive];
    });
  }
}

/**
 * Returns whatever it was constructed with
 */
export class FixedModel implements ConversionModel {
  readonly version = "test-fixed";

  constructor(
    private readonly labels: number[],
    private readonly probabilities: number[][],
    readonly featureNames: readonly string[] = PREDICTION_FEATURES
  ) {}

  predict(): number[] {
    return this.labels;
  }

  predictProba(): number[][] {
    return this.probabilities;
  }
}

export class FailingModel implements ConversionModel {
  readonly version = "test-failing";
  readonly featureNames: readonly string[] = PREDICTION_FEATURES;

  predict(): number[] {
    throw new Error("X has 15 features, but the model expects 16");
  }

  predictProba(): number[][] {
    throw new Error("X has 15 features, but the model expects 16");
  }
}

export interface TestServer {
  baseUrl: string;
  close(): Promise<void>;
}

/**
 * Listen on an ephemeral port in-process
 */
export function startTestServer(app: Express): Promise<TestServer> {
  return new Promise((resolve, reject) => {
    const server: Server = app.listen(0, () => {
      const address = server.address();
      const port = typeof address === "object" && address !== null ? address.port : 0;
      resolve({
        baseUrl: `http://127.0.0.1:${port}`,
        close: () =>
          new Promise<void>((done, fail) => {
            server.close((error) => (error ? fail(error) : done()));
            server.closeAllConnections();
          }),
      });
    });
    server.once("error", reject);
  });
}
