import path from "path";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function parseLogLevel(value: string | undefined): LogLevel {
  const level = (value || "info").toLowerCase();
  return isLogLevel(level) ? level : "info";
}

/**
 * Environment configuration
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env) {
  return {
    port: parseInt(env.PORT || "8000", 10),

    // Model artifact, read once at startup
    modelPath: env.MODEL_PATH || path.resolve(process.cwd(), "model", "model.json"),

    // Largest JSON body POST /predict/ accepts (body-parser size string)
    bodyLimit: env.BODY_LIMIT || "10mb",

    // Client side: where the prediction endpoint lives
    predictionApiUrl: env.PREDICTION_API_URL || env.FASTAPI_URL || "http://localhost:8000/predict/",
    predictionTimeoutMs: parseInt(env.PREDICTION_TIMEOUT_MS || "10000", 10),

    logLevel: parseLogLevel(env.LOG_LEVEL),
    nodeEnv: env.NODE_ENV || "development",
  };
}

export type Config = ReturnType<typeof loadConfig>;

export const config: Config = loadConfig();
