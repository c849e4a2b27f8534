import { Router, Request, Response, NextFunction } from "express";
import { validateBatch } from "../schema/predictionRecord";
import { predictBatch } from "../services/prediction";
import { ConversionModel } from "../model/conversionModel";
import { PredictionResponse } from "../types/prediction";
import { MalformedRequestError, ValidationFailedError } from "../errors";
import { createLogger } from "../logger";

const log = createLogger("predict");

/**
 * POST /predict/
 * Batch lead-conversion prediction endpoint
 *
 * Flow: Check array body → Validate every record → Predict → Return in input order
 * No partial success: one invalid record rejects the whole batch.
 */
export function createPredictRouter(model: ConversionModel): Router {
  const router = Router();

  router.post("/", (req: Request, res: Response<PredictionResponse>, next: NextFunction) => {
    const startTime = Date.now();

    try {
      const body: unknown = req.body;

      if (!Array.isArray(body)) {
        throw new MalformedRequestError("Request body is not a JSON array");
      }

      const validation = validateBatch(body);
      if (!validation.success) {
        throw new ValidationFailedError(validation.issues);
      }

      const response = predictBatch(model, validation.records);

      log.info(`Predicted ${validation.records.length} records`, {
        model_version: model.version,
        converting: response.prediction.filter((label) => label === 1).length,
        duration_ms: Date.now() - startTime,
      });

      res.status(200).json(response);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
