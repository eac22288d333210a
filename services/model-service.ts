import axios from "axios";
import type { AxiosInstance } from "axios";
import { z } from "zod";
import type { Readings } from "./validation-service";

/**
 * Client for the optional model service that hosts the pre-trained
 * classification and forecasting models.
 *
 * The service is never required: when it is not configured, not reachable
 * or answers with something unexpected, every call resolves to null and the
 * ISPU engine keeps working on its own.
 */

export interface ModelStatus {
  enabled: boolean;
  classifier: boolean;
  forecaster: boolean;
  scaler: boolean;
  checkedAt: number | null;
}

export interface ModelClassification {
  label: string;
  confidence: number | null;
}

export interface ModelForecast {
  values: number[];
}

export interface ModelService {
  loadModels(): Promise<ModelStatus>;
  getStatus(): ModelStatus;
  classify(readings: Readings): Promise<ModelClassification | null>;
  forecast(hours: number): Promise<ModelForecast | null>;
}

export interface ModelServiceOptions {
  baseUrl: string | null;
  timeoutMs?: number;
  // Per-request limit for classify, which sits on the /calculate path
  classifyTimeoutMs?: number;
  client?: AxiosInstance;
}

const DEFAULT_CLASSIFY_TIMEOUT_MS = 1500;

const healthSchema = z.object({
  classifier: z.boolean(),
  forecaster: z.boolean(),
  scaler: z.boolean(),
});

const classificationSchema = z.object({
  label: z.string().min(1),
  confidence: z.number().min(0).max(1).optional(),
});

const forecastSchema = z.object({
  values: z.array(z.number().finite()),
});

const ARTIFACT_NAMES = {
  classifier: "Classification model",
  forecaster: "Forecasting model",
  scaler: "Feature scaler",
} as const;

function describeError(error: unknown): string {
  if (axios.isAxiosError(error)) {
    return `${error.code ?? "HTTP_ERROR"} ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}

function unavailableStatus(enabled: boolean, checkedAt: number | null): ModelStatus {
  return { enabled, classifier: false, forecaster: false, scaler: false, checkedAt };
}

export function createModelService(options: ModelServiceOptions): ModelService {
  const { baseUrl } = options;
  const classifyTimeoutMs = options.classifyTimeoutMs ?? DEFAULT_CLASSIFY_TIMEOUT_MS;
  const client =
    options.client ??
    axios.create({
      timeout: options.timeoutMs ?? 5000,
      headers: { Accept: "application/json", "Content-Type": "application/json" },
    });

  let status: ModelStatus = unavailableStatus(baseUrl !== null, null);

  return {
    /**
     * Probes the model service once and remembers which artifacts it has
     * loaded. Failures are logged and reported as "not loaded".
     */
    async loadModels(): Promise<ModelStatus> {
      if (baseUrl === null) {
        console.warn("⚠️ MODEL_SERVICE_URL not set, using ISPU calculation only");
        status = unavailableStatus(false, Date.now());
        return status;
      }

      try {
        const response = await client.get(`${baseUrl}/health`);
        const parsed = healthSchema.safeParse(response.data);

        if (!parsed.success) {
          console.error("❌ Model service returned an unexpected health payload");
          status = unavailableStatus(true, Date.now());
          return status;
        }

        status = { enabled: true, ...parsed.data, checkedAt: Date.now() };
      } catch (error) {
        console.error(`❌ Model service unreachable: ${describeError(error)}`);
        status = unavailableStatus(true, Date.now());
        return status;
      }

      for (const key of ["classifier", "forecaster", "scaler"] as const) {
        if (status[key]) {
          console.log(`✅ ${ARTIFACT_NAMES[key]} loaded`);
        } else {
          console.error(`❌ ${ARTIFACT_NAMES[key]} not found`);
        }
      }

      return status;
    },

    getStatus(): ModelStatus {
      return { ...status };
    },

    async classify(readings: Readings): Promise<ModelClassification | null> {
      if (baseUrl === null || !status.classifier) {
        return null;
      }

      try {
        const response = await client.post(
          `${baseUrl}/classify`,
          { features: readings },
          { timeout: classifyTimeoutMs }
        );
        const parsed = classificationSchema.safeParse(response.data);
        if (!parsed.success) {
          console.error("❌ Classification model returned an unexpected payload");
          return null;
        }
        return { label: parsed.data.label, confidence: parsed.data.confidence ?? null };
      } catch (error) {
        console.error(`❌ Classification request failed: ${describeError(error)}`);
        return null;
      }
    },

    async forecast(hours: number): Promise<ModelForecast | null> {
      if (baseUrl === null || !status.forecaster) {
        return null;
      }

      try {
        const response = await client.post(`${baseUrl}/forecast`, { steps: hours });
        const parsed = forecastSchema.safeParse(response.data);
        if (!parsed.success) {
          console.error("❌ Forecasting model returned an unexpected payload");
          return null;
        }
        return parsed.data;
      } catch (error) {
        console.error(`❌ Forecast request failed: ${describeError(error)}`);
        return null;
      }
    },
  };
}
