import { Server } from "http";
import { Express } from "express";
import { config } from "./config";
import { createApp } from "./app";
import { loadModel } from "./model/loader";
import { ConversionModel } from "./model/conversionModel";
import { ServiceState } from "./types/prediction";
import { errorMessage } from "./errors";
import { createLogger } from "./logger";

const log = createLogger("server");

export interface ServerOptions {
  port?: number;
  modelPath?: string;
}

export interface RunningService {
  state: ServiceState;
  model: ConversionModel;
  server: Server;
  port: number;
  close(): Promise<void>;
}

function listen(app: Express, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, () => resolve(server));
    server.once("error", reject);
  });
}

/**
 * Loading → Ready.
 * The model is read before anything listens; a load failure rejects with
 * ServiceUnavailableError and no port is ever opened.
 */
export async function startServer(options: ServerOptions = {}): Promise<RunningService> {
  const modelPath = options.modelPath ?? config.modelPath;
  const port = options.port ?? config.port;

  let state: ServiceState = "Loading";
  log.info(`State: ${state}`, { modelPath });

  const model = await loadModel(modelPath);
  const server = await listen(createApp(model), port);
  const address = server.address();
  const boundPort = typeof address === "object" && address !== null ? address.port : port;

  state = "Ready";
  log.info(`Lead Conversion Prediction Service started`);
  log.info(`Port: ${boundPort}`);
  log.info(`Environment: ${config.nodeEnv}`);
  log.info(`Model version: ${model.version}`);
  log.info(`State: ${state}`);

  return {
    state,
    model,
    server,
    port: boundPort,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
        server.closeAllConnections();
      }),
  };
}

if (require.main === module) {
  startServer().catch((error: unknown) => {
    log.error("Service failed to start", { error: errorMessage(error) });
    process.exit(1);
  });
}
