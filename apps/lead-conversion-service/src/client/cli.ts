/**
 * Lead Conversion Prediction - Command Line Client
 *
 * Validates lead records locally, sends them to the prediction service and
 * prints one line per lead.
 *
 * Usage:
 *   lead-predict <records.json>
 *   lead-predict --sample
 *
 * Environment variables:
 *   PREDICTION_API_URL     - Predict endpoint (default: http://localhost:8000/predict/)
 *   FASTAPI_URL            - Fallback name for the predict endpoint
 *   PREDICTION_TIMEOUT_MS  - Bounded wait on the call (default: 10000)
 */

import { readFile } from "fs/promises";
import sampleLeads from "../../data/sample-leads.json";
import { processValidateInputData } from "./inputValidation";
import { PredictionClient } from "./predictionClient";
import { combineResults } from "./results";
import { errorMessage } from "../errors";

export interface CliIo {
  out: (line: string) => void;
  err: (line: string) => void;
  readText: (file: string) => Promise<string>;
}

const defaultIo: CliIo = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
  readText: (file) => readFile(file, "utf8"),
};

type CliArgs = { source: "sample" } | { source: "file"; file: string } | { source: "none" };

function parseArgs(args: readonly string[]): CliArgs {
  if (args.includes("--sample")) {
    return { source: "sample" };
  }

  const file = args.find((arg) => !arg.startsWith("--"));
  return file ? { source: "file", file } : { source: "none" };
}

async function loadInput(args: CliArgs, io: CliIo): Promise<unknown> {
  if (args.source === "sample") {
    return sampleLeads;
  }
  if (args.source === "file") {
    return JSON.parse(await io.readText(args.file));
  }
  throw new Error("Usage: lead-predict <records.json> | --sample");
}

/**
 * Returns the process exit code
 */
export async function runCli(
  args: readonly string[],
  client: PredictionClient = new PredictionClient(),
  io: CliIo = defaultIo
): Promise<number> {
  let data: unknown;
  try {
    data = await loadInput(parseArgs(args), io);
  } catch (error) {
    io.err(error instanceof SyntaxError ? "Invalid JSON file. Please provide a valid JSON file." : errorMessage(error));
    return 1;
  }

  const input = processValidateInputData(data);
  if (!input.ok) {
    io.err(input.error);
    return 1;
  }

  const result = await client.predict(input.records);
  if (!result.ok) {
    io.err(result.error);
    return 1;
  }

  const combined = combineResults(input.records, result.prediction, result.probability);
  if (!combined.ok) {
    io.err(combined.error);
    return 1;
  }

  combined.rows.forEach((row, i) => {
    io.out(`#${i} ${row.outcome} (${row.probability.toFixed(3)})`);
  });

  return 0;
}

if (require.main === module) {
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(errorMessage(error));
      process.exitCode = 1;
    });
}
