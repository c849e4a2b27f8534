import { readFile } from "fs/promises";
import { z } from "zod";
import { ConversionModel, LogisticRegressionModel } from "./conversionModel";
import { errorMessage, ServiceUnavailableError } from "../errors";
import { createLogger } from "../logger";

const log = createLogger("model");

export const ModelArtifactSchema = z
  .object({
    model_type: z.literal("logistic_regression"),
    version: z.string().min(1),
    feature_names: z.array(z.string().min(1)).min(1),
    coefficients: z.array(z.number().finite()),
    intercept: z.number().finite(),
    threshold: z.number().gt(0).lt(1).optional(),
  })
  .refine((artifact) => artifact.coefficients.length === artifact.feature_names.length, {
    message: "coefficients must have one entry per feature name",
    path: ["coefficients"],
  });

export type ModelArtifact = z.infer<typeof ModelArtifactSchema>;

/**
 * Build a model from an already-parsed artifact document
 */
export function modelFromArtifact(document: unknown): ConversionModel {
  const parsed = ModelArtifactSchema.safeParse(document);

  if (!parsed.success) {
    const reasons = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "artifact"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid model artifact (${reasons})`);
  }

  const artifact = parsed.data;
  return Object.freeze(
    new LogisticRegressionModel({
      version: artifact.version,
      featureNames: artifact.feature_names,
      coefficients: artifact.coefficients,
      intercept: artifact.intercept,
      threshold: artifact.threshold,
    })
  );
}

/**
 * Read the model artifact from disk.
 * Any failure here is fatal for startup and surfaces as ServiceUnavailableError.
 */
export async function loadModel(modelPath: string): Promise<ConversionModel> {
  try {
    const contents = await readFile(modelPath, "utf8");
    const model = modelFromArtifact(JSON.parse(contents));

    log.info("Model loaded", {
      path: modelPath,
      version: model.version,
      features: model.featureNames.length,
    });

    return model;
  } catch (error) {
    log.error("Error loading model", { path: modelPath, error: errorMessage(error) });
    throw new ServiceUnavailableError(`Failed to load model from ${modelPath}: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}
