export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogFields {
  filename?: string;
  filePath?: string;
  fileType?: string;
  query?: string;
  [key: string]: unknown;
}

export type MetricCounterName =
  | "documents_ok"
  | "documents_failed"
  | "documents_skipped"
  | "insights_generated"
  | "insights_fallback"
  | "searches";

export type MetricTimerName = "extract_ms" | "insight_ms";
