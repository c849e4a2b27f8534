import { config } from "../config";
import { PredictionRecord, PredictionResponseSchema } from "../schema/predictionRecord";
import { ClassLabel, ProbabilityPair } from "../types/prediction";
import { errorMessage } from "../errors";
import { createLogger } from "../logger";

const log = createLogger("client");

export interface PredictionClientOptions {
  /** Full URL of the predict endpoint */
  apiUrl?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

export type PredictionCallResult =
  | { ok: true; prediction: ClassLabel[]; probability: ProbabilityPair[] }
  | { ok: false; error: string };

/**
 * HTTP client for POST /predict/.
 * Never throws: transport failures, timeouts and non-200 answers come back as `{ ok: false }`.
 */
export class PredictionClient {
  private readonly apiUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: PredictionClientOptions = {}) {
    this.apiUrl = options.apiUrl ?? config.predictionApiUrl;
    this.timeoutMs = options.timeoutMs ?? config.predictionTimeoutMs;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async predict(records: readonly PredictionRecord[]): Promise<PredictionCallResult> {
    const fetchImpl = this.fetchImpl;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const res = await fetchImpl(this.apiUrl, {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify(records),
        signal: controller.signal,
      });

      if (res.status !== 200) {
        log.warn("Prediction request rejected", { status: res.status, url: this.apiUrl });
        return { ok: false, error: `Error in prediction: ${res.status}` };
      }

      const parsed = PredictionResponseSchema.safeParse(await res.json());
      if (!parsed.success) {
        return { ok: false, error: "Backend API request error: unexpected response shape" };
      }

      return { ok: true, prediction: parsed.data.prediction, probability: parsed.data.probability };
    } catch (error) {
      const message = controller.signal.aborted
        ? `request timed out after ${this.timeoutMs}ms`
        : errorMessage(error);
      log.warn("Prediction request failed", { url: this.apiUrl, error: message });
      return { ok: false, error: `Backend API request error: ${message}` };
    } finally {
      clearTimeout(timeout);
    }
  }
}
