import express, { Express } from "express";
import cors from "cors";
import { config } from "./config";
import { ConversionModel } from "./model/conversionModel";
import { createPredictRouter } from "./routes/predict";
import { errorHandler, notFoundHandler } from "./middleware/errorHandler";
import { HealthResponse } from "./types/prediction";

export const HEALTH_MESSAGE = "ML Model API is running";

export interface AppOptions {
  /** Largest accepted JSON body, e.g. "10mb" */
  bodyLimit?: string;
}

/**
 * Build the HTTP app around an already-loaded model.
 * The model is only reachable through the handlers built here.
 */
export function createApp(model: ConversionModel, options: AppOptions = {}): Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json({ limit: options.bodyLimit ?? config.bodyLimit }));

  // Health check endpoint
  app.get("/", (_req, res: express.Response<HealthResponse>) => {
    res.json({ message: HEALTH_MESSAGE });
  });

  // Mount routes
  app.use("/predict", createPredictRouter(model));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
