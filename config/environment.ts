import * as dotenv from "dotenv";
import { resolve } from "node:path";

export interface AppConfig {
  port: number;
  corsOrigins: string[];
  modelServiceUrl: string | null;
  modelServiceTimeoutMs: number;
  // Tighter limit for the classifier call made inside /calculate
  modelClassifyTimeoutMs: number;
}

const DEFAULT_PORT = 3001;
const DEFAULT_CORS_ORIGINS = ["http://localhost:3000", "http://localhost:3001"];
const DEFAULT_MODEL_TIMEOUT_MS = 5000;
const DEFAULT_CLASSIFY_TIMEOUT_MS = 1500;

export function envFileCandidates(cwd: string = process.cwd()): string[] {
  return [resolve(cwd, ".env"), resolve(cwd, "../.env")];
}

/**
 * Loads the first .env file found. Variables already present in the
 * process environment are left untouched.
 */
export function loadEnvFile(): string | null {
  for (const path of envFileCandidates()) {
    const result = dotenv.config({ path });
    if (result.parsed) {
      console.log(`Environment variables loaded from: ${path}`);
      return path;
    }
  }

  console.warn("No .env file found! Using environment variables from process.");
  return null;
}

function readPositiveInt(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === "") return fallback;

  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    console.warn(`⚠️ Invalid ${name}="${value}", using default ${fallback}`);
    return fallback;
  }
  return parsed;
}

export function getConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const corsOrigins = (env.CORS_ORIGINS ?? "")
    .split(",")
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);

  const modelServiceUrl = env.MODEL_SERVICE_URL?.trim().replace(/\/+$/, "");

  return {
    port: readPositiveInt("PORT", env.PORT, DEFAULT_PORT),
    corsOrigins: corsOrigins.length > 0 ? corsOrigins : DEFAULT_CORS_ORIGINS,
    modelServiceUrl: modelServiceUrl ? modelServiceUrl : null,
    modelServiceTimeoutMs: readPositiveInt(
      "MODEL_SERVICE_TIMEOUT_MS",
      env.MODEL_SERVICE_TIMEOUT_MS,
      DEFAULT_MODEL_TIMEOUT_MS
    ),
    modelClassifyTimeoutMs: readPositiveInt(
      "MODEL_CLASSIFY_TIMEOUT_MS",
      env.MODEL_CLASSIFY_TIMEOUT_MS,
      DEFAULT_CLASSIFY_TIMEOUT_MS
    ),
  };
}
