import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { createApp } from "../app";
import type { AppConfig } from "../config/environment";
import type { ModelService, ModelStatus } from "../services/model-service";

const CONFIG: AppConfig = {
  port: 3001,
  corsOrigins: ["http://localhost:3000"],
  modelServiceUrl: null,
  modelServiceTimeoutMs: 5000,
  modelClassifyTimeoutMs: 1500,
};

const FIXTURE = { pm10: 50, pm2_5: 35, so2: 20, no2: 40, o3: 50, co: 4.0 };

const OFFLINE: ModelStatus = {
  enabled: false,
  classifier: false,
  forecaster: false,
  scaler: false,
  checkedAt: null,
};

function createStubModelService(overrides: Partial<ModelService> = {}): ModelService {
  return {
    loadModels: vi.fn(async () => OFFLINE),
    getStatus: vi.fn(() => OFFLINE),
    classify: vi.fn(async () => null),
    forecast: vi.fn(async () => null),
    ...overrides,
  };
}

function makeApp(modelService: ModelService = createStubModelService()) {
  return createApp({ config: CONFIG, modelService });
}

function post(app: ReturnType<typeof createApp>, path: string, body: unknown) {
  return app.request(path, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: typeof body === "string" ? body : JSON.stringify(body),
  });
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("POST /api/ispu/calculate", () => {
  it("returns the index result for valid readings", async () => {
    const app = makeApp();

    const res = await post(app, "/api/ispu/calculate", FIXTURE);
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body).toMatchObject({
      ispu: 74.44,
      category: "Moderate",
      categoryKey: "moderate",
      tier: 2,
      dominantPollutant: "pm2_5",
      dominantPollutantName: "PM2.5",
      subIndices: { pm10: 50, pm2_5: 74.44, so2: 19.23, no2: 25, o3: 20.83, co: 50 },
      classification: { source: "ispu", label: "Moderate", confidence: null },
      recommendation: { title: "Air quality is MODERATE" },
      breakdown: [
        { pollutant: "pm10", contribution: 67.2 },
        {
          pollutant: "pm2_5",
          name: "PM2.5",
          concentration: 35,
          unit: "μg/m³",
          subIndex: 74.44,
          contribution: 100,
        },
        { pollutant: "so2" },
        { pollutant: "no2" },
        { pollutant: "o3" },
        { pollutant: "co", unit: "mg/m³" },
      ],
      readings: [
        { parameter: "pm10" },
        { parameter: "pm2_5" },
        { parameter: "so2" },
        { parameter: "no2" },
        { parameter: "o3" },
        { parameter: "co", value: 4, unit: "mg/m³", advisory: false },
      ],
    });
  });

  it("carries advisory readings through untouched", async () => {
    const app = makeApp();

    const res = await post(app, "/api/ispu/calculate", { ...FIXTURE, no: 10, nh3: 2.5 });
    const body = await res.json();

    expect(body).toMatchObject({
      ispu: 74.44,
      readings: [
        { advisory: false },
        { advisory: false },
        { advisory: false },
        { advisory: false },
        { advisory: false },
        { advisory: false },
        { parameter: "no", name: "NO", value: 10, unit: "μg/m³", advisory: true },
        { parameter: "nh3", name: "NH₃", value: 2.5, unit: "μg/m³", advisory: true },
      ],
    });
  });

  it("uses the classification model when it answers", async () => {
    const classify = vi.fn(async () => ({ label: "Sedang", confidence: 0.9 }));
    const app = makeApp(createStubModelService({ classify }));

    const res = await post(app, "/api/ispu/calculate", FIXTURE);
    const body = await res.json();

    expect(body).toMatchObject({
      category: "Moderate",
      classification: { source: "model", label: "Sedang", confidence: 0.9 },
    });
  });

  it("rejects CO above 100 mg/m³ without computing", async () => {
    const modelService = createStubModelService();
    const app = makeApp(modelService);

    const res = await post(app, "/api/ispu/calculate", { ...FIXTURE, co: 150 });
    const body = await res.json();

    expect(res.status).toBe(422);
    expect(body).toEqual({
      error: "Validation failed",
      errors: [
        { field: "co", reason: "above_maximum", message: "CO is too high (maximum 100 mg/m³)" },
      ],
    });
    expect(modelService.classify).not.toHaveBeenCalled();
  });

  it("rejects a body that is not JSON", async () => {
    const app = makeApp();

    const res = await post(app, "/api/ispu/calculate", "pm10=50");

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Request body must be valid JSON" });
  });

  it("rejects missing readings", async () => {
    const app = makeApp();

    const { co, ...withoutCo } = FIXTURE;
    expect(co).toBe(4);
    const res = await post(app, "/api/ispu/calculate", withoutCo);
    const body = await res.json();

    expect(res.status).toBe(400);
    expect(body).toEqual({
      error: "Invalid readings",
      details: [{ field: "co", message: "Required" }],
    });
  });
});

describe("ISPU reference routes", () => {
  let app: ReturnType<typeof makeApp>;

  beforeEach(() => {
    app = makeApp();
  });

  it("lists the breakpoint table", async () => {
    const res = await app.request("/api/ispu/breakpoints");
    const body = await res.json();

    expect(body).toMatchObject({
      indexBreakpoints: [0, 50, 100, 150, 200, 250],
      pollutants: [
        { pollutant: "pm10", breakpoints: [0, 50, 150, 350, 420, 500] },
        { pollutant: "pm2_5" },
        { pollutant: "so2" },
        { pollutant: "no2" },
        { pollutant: "o3" },
        {
          pollutant: "co",
          name: "CO",
          unit: "μg/m³",
          inputUnit: "mg/m³",
          breakpoints: [0, 4000, 8000, 15000, 30000, 45000],
        },
      ],
    });
  });

  it("describes each pollutant with its Good threshold and sources", async () => {
    const res = await app.request("/api/ispu/pollutants");
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body).toMatchObject({
      pollutants: [
        { pollutant: "pm10", name: "PM10", goodThreshold: 50, inIndex: true },
        {
          pollutant: "pm2_5",
          name: "PM2.5",
          description: "Fine particulate matter (≤ 2.5 μm)",
          goodThreshold: 15.5,
          inIndex: true,
        },
        { pollutant: "so2", inIndex: true },
        { pollutant: "no2", inIndex: true },
        { pollutant: "o3", inIndex: true },
        { pollutant: "co", description: "Carbon monoxide", goodThreshold: 4000, inIndex: true },
        {
          pollutant: "nh3",
          name: "NH₃",
          description: "Ammonia",
          goodThreshold: null,
          inIndex: false,
        },
      ],
      sources: [
        { group: "Transport" },
        { group: "Industry" },
        { group: "Other", sources: expect.arrayContaining(["Agriculture (NH₃ from fertilizer)"]) },
        { group: "Natural" },
      ],
    });
  });

  it("lists the categories with their ranges", async () => {
    const res = await app.request("/api/ispu/categories");
    const body = await res.json();

    expect(body).toMatchObject([
      { key: "good", range: "0-50" },
      { key: "moderate", range: "51-100" },
      { key: "unhealthy", range: "101-200" },
      { key: "very_unhealthy", range: "201-300" },
      {
        key: "hazardous",
        range: ">300",
        localLabel: "Berbahaya",
        recommendation: { title: "Air quality is HAZARDOUS" },
      },
    ]);
  });

  it("classifies an index value", async () => {
    const res = await app.request("/api/ispu/classify?value=50.01");
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body).toMatchObject({ ispu: 50.01, category: "Moderate", tier: 2, localLabel: "Sedang" });
  });

  it("rejects an invalid index value", async () => {
    expect((await app.request("/api/ispu/classify?value=abc")).status).toBe(400);
    expect((await app.request("/api/ispu/classify?value=-1")).status).toBe(400);
    expect((await app.request("/api/ispu/classify")).status).toBe(400);
  });
});

describe("model routes", () => {
  it("reports the model status", async () => {
    const app = makeApp();

    const res = await app.request("/api/models/status");

    expect(await res.json()).toEqual(OFFLINE);
  });

  it("answers 503 when the forecaster is unavailable", async () => {
    const modelService = createStubModelService();
    const app = makeApp(modelService);

    const res = await app.request("/api/models/forecast");

    expect(res.status).toBe(503);
    expect(modelService.forecast).toHaveBeenCalledWith(24);
  });

  it("categorizes forecast values with the ISPU scale", async () => {
    const forecast = vi.fn(async () => ({ values: [40, 120.456, 600, -3] }));
    const app = makeApp(createStubModelService({ forecast }));

    const res = await app.request("/api/models/forecast?hours=4");
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body).toMatchObject([
      { hour: 1, ispu: 40, category: "Good", tier: 1 },
      { hour: 2, ispu: 120.46, category: "Unhealthy", tier: 3 },
      { hour: 3, ispu: 500, category: "Hazardous", tier: 5 },
      { hour: 4, ispu: 0, category: "Good", tier: 1 },
    ]);
  });

  it("rejects an out-of-range horizon", async () => {
    const app = makeApp();

    expect((await app.request("/api/models/forecast?hours=0")).status).toBe(400);
    expect((await app.request("/api/models/forecast?hours=200")).status).toBe(400);
    expect((await app.request("/api/models/forecast?hours=abc")).status).toBe(400);
  });

  it("answers 503 when the classifier is unavailable", async () => {
    const app = makeApp();

    const res = await post(app, "/api/models/classify", FIXTURE);

    expect(res.status).toBe(503);
  });

  it("returns the classifier label", async () => {
    const classify = vi.fn(async () => ({ label: "Baik", confidence: null }));
    const app = makeApp(createStubModelService({ classify }));

    const res = await post(app, "/api/models/classify", FIXTURE);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ source: "model", label: "Baik", confidence: null });
  });

  it("validates readings before classifying", async () => {
    const modelService = createStubModelService();
    const app = makeApp(modelService);

    const res = await post(app, "/api/models/classify", { ...FIXTURE, pm10: -1 });

    expect(res.status).toBe(422);
    expect(modelService.classify).not.toHaveBeenCalled();
  });
});

describe("application", () => {
  let app: ReturnType<typeof makeApp>;

  beforeEach(() => {
    app = makeApp();
  });

  it("reports health", async () => {
    const res = await app.request("/api/health");
    expect(await res.json()).toEqual({ status: "ok", models: OFFLINE });
  });

  it("answers preflight requests for allowed origins", async () => {
    const res = await app.request("/api/ispu/calculate", {
      method: "OPTIONS",
      headers: { Origin: "http://localhost:3000" },
    });

    expect(res.status).toBe(204);
    expect(res.headers.get("Access-Control-Allow-Origin")).toBe("http://localhost:3000");
    expect(res.headers.get("Access-Control-Allow-Credentials")).toBe("true");
  });

  it("falls back to any origin for unknown callers", async () => {
    const res = await app.request("/api/ispu/categories", {
      headers: { Origin: "https://unknown.example.org" },
    });

    expect(res.status).toBe(200);
    expect(res.headers.get("Access-Control-Allow-Origin")).toBe("*");
    expect(res.headers.get("Access-Control-Allow-Credentials")).toBeNull();
  });

  it("returns JSON for unknown routes", async () => {
    const res = await app.request("/api/unknown");
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "Not Found" });
  });
});
