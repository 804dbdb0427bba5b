import fs from "node:fs";
import path from "node:path";
import type { LogLevel } from "../observability/types";
import type { AppConfig, ConfigOverrides } from "./types";

const DEFAULT_CONFIG: AppConfig = {
  documentsDir: "data/documents",
  storePath: "data/documents.sqlite",
  insightsEnabled: true,
  openaiApiKey: undefined,
  openaiModel: "gpt-4o-mini",
  insightTemperature: 0.3,
  insightMaxChars: 3000,
  insightTimeoutMs: 30_000,
  processConcurrency: 1,
  searchResultLimit: 3,
  logLevel: "info",
};

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Config file not found: ${absolutePath}`);
  }

  const raw = fs.readFileSync(absolutePath, "utf-8");
  const parsed: unknown = JSON.parse(raw);
  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new Error(`Config file must contain a JSON object: ${absolutePath}`);
  }
  return pickOverrides(Object.entries(parsed), absolutePath);
}

function pickOverrides(entries: Array<[string, unknown]>, source: string): ConfigOverrides {
  const overrides: ConfigOverrides = {};
  for (const [key, value] of entries) {
    switch (key) {
      case "documentsDir":
      case "storePath":
      case "openaiApiKey":
      case "openaiModel":
        if (typeof value !== "string") {
          throw new Error(`Config key ${key} must be a string in ${source}`);
        }
        overrides[key] = value;
        break;
      case "insightTemperature":
        if (typeof value !== "number" || !Number.isFinite(value)) {
          throw new Error(`Config key ${key} must be a number in ${source}`);
        }
        overrides[key] = value;
        break;
      case "insightMaxChars":
      case "insightTimeoutMs":
      case "processConcurrency":
      case "searchResultLimit":
        if (typeof value !== "number" || !Number.isInteger(value) || value < 1) {
          throw new Error(`Config key ${key} must be a positive integer in ${source}`);
        }
        overrides[key] = value;
        break;
      case "insightsEnabled":
        if (typeof value !== "boolean") {
          throw new Error(`Config key ${key} must be a boolean in ${source}`);
        }
        overrides.insightsEnabled = value;
        break;
      case "logLevel":
        overrides.logLevel = toLogLevel(typeof value === "string" ? value : undefined, DEFAULT_CONFIG.logLevel);
        break;
      default:
        break;
    }
  }
  return overrides;
}

function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toPositiveInt(value: string | undefined, fallback: number): number {
  const parsed = toInt(value, fallback);
  return parsed >= 1 ? parsed : fallback;
}

function toFloat(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseFloat(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return fallback;
}

function toLogLevel(value: string | undefined, fallback: LogLevel): LogLevel {
  const normalized = value?.trim().toLowerCase();
  if (normalized === "debug" || normalized === "info" || normalized === "warn" || normalized === "error") {
    return normalized;
  }
  return fallback;
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const fileConfig = readConfigFile(configPath);

  const merged: AppConfig = {
    ...DEFAULT_CONFIG,
    ...fileConfig,
  };

  return {
    ...merged,
    documentsDir: env.DOCUMENTS_DIR ?? merged.documentsDir,
    storePath: env.STORE_PATH ?? merged.storePath,
    insightsEnabled: toBool(env.INSIGHTS_ENABLED, merged.insightsEnabled),
    openaiApiKey: env.OPENAI_API_KEY ?? merged.openaiApiKey,
    openaiModel: env.OPENAI_MODEL ?? merged.openaiModel,
    insightTemperature: toFloat(env.INSIGHT_TEMPERATURE, merged.insightTemperature),
    insightMaxChars: toPositiveInt(env.INSIGHT_MAX_CHARS, merged.insightMaxChars),
    insightTimeoutMs: toPositiveInt(env.INSIGHT_TIMEOUT_MS, merged.insightTimeoutMs),
    processConcurrency: toPositiveInt(env.PROCESS_CONCURRENCY, merged.processConcurrency),
    searchResultLimit: toPositiveInt(env.SEARCH_RESULT_LIMIT, merged.searchResultLimit),
    logLevel: toLogLevel(env.LOG_LEVEL, merged.logLevel),
  };
}

export { DEFAULT_CONFIG };
