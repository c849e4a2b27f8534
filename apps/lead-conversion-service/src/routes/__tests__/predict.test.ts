import { createApp, HEALTH_MESSAGE } from "../../app";
import { ConversionModel, LogisticRegressionModel } from "../../model/conversionModel";
import { PREDICTION_FEATURES } from "../../schema/predictionRecord";
import { MALFORMED_REQUEST_DETAIL } from "../../errors";
import {
  AgeModel,
  FailingModel,
  FixedModel,
  makeRecord,
  SAMPLE_RECORD,
  startTestServer,
  TestServer,
} from "../../__tests__/fixtures";

async function withServer<T>(model: ConversionModel, run: (baseUrl: string) => Promise<T>): Promise<T> {
  const server = await startTestServer(createApp(model));
  try {
    return await run(server.baseUrl);
  } finally {
    await server.close();
  }
}

function postJson(baseUrl: string, path: string, body: string) {
  return fetch(`${baseUrl}${path}`, {
    method: "POST",
    headers: { "content-type": "application/json" },
    body,
  });
}

describe("POST /predict/", () => {
  let server: TestServer;

  beforeAll(async () => {
    server = await startTestServer(createApp(new AgeModel()));
  });

  afterAll(async () => {
    await server.close();
  });

  it("should report readiness on GET /", async () => {
    const res = await fetch(`${server.baseUrl}/`);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ message: HEALTH_MESSAGE });
  });

  it("should answer an empty batch with empty arrays", async () => {
    const res = await postJson(server.baseUrl, "/predict/", "[]");

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ prediction: [], probability: [] });
  });

  it("should predict a single record", async () => {
    const res = await postJson(server.baseUrl, "/predict/", JSON.stringify([SAMPLE_RECORD]));

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ prediction: [1], probability: [[0.43, 0.57]] });
  });

  it("should return predictions in submission order", async () => {
    const batch = [makeRecord({ age: 10 }), makeRecord({ age: 90 }), makeRecord({ age: 57 })];

    const res = await postJson(server.baseUrl, "/predict/", JSON.stringify(batch));

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      prediction: [0, 1, 1],
      probability: [
        [0.9, 0.1],
        [0.1, 0.9],
        [0.43, 0.57],
      ],
    });
  });

  it("should accept the path without a trailing slash", async () => {
    const res = await postJson(server.baseUrl, "/predict", JSON.stringify([SAMPLE_RECORD]));

    expect(res.status).toBe(200);
  });

  it("should ignore unknown fields", async () => {
    const res = await postJson(
      server.baseUrl,
      "/predict/",
      JSON.stringify([{ ...SAMPLE_RECORD, lead_id: "lead-42" }])
    );

    expect(res.status).toBe(200);
  });

  it("should reject age 150 with a detail naming age", async () => {
    const res = await postJson(server.baseUrl, "/predict/", JSON.stringify([makeRecord({ age: 150 })]));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ detail: "record[0].age: must be ≤ 100" });
  });

  it("should reject the whole batch and name the failing record", async () => {
    const batch = [SAMPLE_RECORD, makeRecord({ website_visits: -1 })];

    const res = await postJson(server.baseUrl, "/predict/", JSON.stringify(batch));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ detail: "record[1].website_visits: must be ≥ 0" });
  });

  it("should name a missing field", async () => {
    const raw: Record<string, unknown> = { ...SAMPLE_RECORD };
    delete raw.referral_yes;

    const res = await postJson(server.baseUrl, "/predict/", JSON.stringify([raw]));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ detail: "record[0].referral_yes: required field missing" });
  });

  it("should reject a body that is not an array", async () => {
    const res = await postJson(server.baseUrl, "/predict/", JSON.stringify(SAMPLE_RECORD));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ detail: MALFORMED_REQUEST_DETAIL });
  });

  it("should reject a body that is not JSON", async () => {
    const res = await postJson(server.baseUrl, "/predict/", "[{ age: 57");

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ detail: MALFORMED_REQUEST_DETAIL });
  });

  it("should accept a batch of several hundred records", async () => {
    const batch = Array.from({ length: 400 }, () => SAMPLE_RECORD);

    const res = await postJson(server.baseUrl, "/predict/", JSON.stringify(batch));

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      prediction: batch.map(() => 1),
      probability: batch.map(() => [0.43, 0.57]),
    });
  });

  it("should reject an unsupported charset with 415", async () => {
    const res = await fetch(`${server.baseUrl}/predict/`, {
      method: "POST",
      headers: { "content-type": "application/json; charset=latin9" },
      body: "[]",
    });

    expect(res.status).toBe(415);
    expect(await res.json()).toEqual({ detail: 'unsupported charset "LATIN9"' });
  });

  it("should answer unknown routes with 404", async () => {
    const res = await fetch(`${server.baseUrl}/predictions`);

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ detail: "Not Found" });
  });
});

describe("POST /predict/ on a separately built app", () => {
  it("should hide the model exception behind a generic 500", async () => {
    await withServer(new FailingModel(), async (baseUrl) => {
      const res = await postJson(baseUrl, "/predict/", JSON.stringify([SAMPLE_RECORD]));

      expect(res.status).toBe(500);
      expect(await res.json()).toEqual({ detail: "Prediction error" });
    });
  });

  it("should treat a feature the record cannot supply as a prediction fault", async () => {
    const model = new FixedModel([1], [[0.3, 0.7]], ["age", "lead_source_email"]);

    await withServer(model, async (baseUrl) => {
      const res = await postJson(baseUrl, "/predict/", JSON.stringify([SAMPLE_RECORD]));

      expect(res.status).toBe(500);
      expect(await res.json()).toEqual({ detail: "Prediction error" });
    });
  });

  it("should answer a body over the configured limit with 413", async () => {
    const server = await startTestServer(createApp(new AgeModel(), { bodyLimit: "1kb" }));

    try {
      const batch = Array.from({ length: 10 }, () => SAMPLE_RECORD);
      const res = await postJson(server.baseUrl, "/predict/", JSON.stringify(batch));

      expect(res.status).toBe(413);
      expect(await res.json()).toEqual({ detail: "request entity too large" });
    } finally {
      await server.close();
    }
  });

  it("should predict schema-valid records with extreme counts", async () => {
    const model = new LogisticRegressionModel({
      version: "test-extreme",
      featureNames: PREDICTION_FEATURES,
      coefficients: PREDICTION_FEATURES.map((name) =>
        name === "website_visits" ? 10 : name === "time_spent_on_website" ? -10 : 0
      ),
      intercept: 0,
    });
    const record = makeRecord({ website_visits: 1e308, time_spent_on_website: 1e308 });

    await withServer(model, async (baseUrl) => {
      const res = await postJson(baseUrl, "/predict/", JSON.stringify([record]));

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ prediction: [0], probability: [[0.5, 0.5]] });
    });
  });

  it("should still validate before touching the model", async () => {
    await withServer(new FailingModel(), async (baseUrl) => {
      const res = await postJson(baseUrl, "/predict/", JSON.stringify([makeRecord({ age: -5 })]));

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ detail: "record[0].age: must be ≥ 0" });
    });
  });
});
