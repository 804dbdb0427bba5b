import type { LogLevel } from "../observability/types";

export interface AppConfig {
  documentsDir: string;
  storePath: string;
  insightsEnabled: boolean;
  openaiApiKey?: string;
  openaiModel: string;
  insightTemperature: number;
  insightMaxChars: number;
  insightTimeoutMs: number;
  processConcurrency: number;
  searchResultLimit: number;
  logLevel: LogLevel;
}

export type ConfigOverrides = Partial<AppConfig>;
