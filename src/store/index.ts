import type { AppConfig } from "../config";
import type { DocumentMetadataStore } from "./types";
import { SqliteStore } from "./sqliteStore";

export function createStore(config: AppConfig): DocumentMetadataStore {
  return new SqliteStore(config.storePath);
}

export * from "./memoryStore";
export * from "./sqliteStore";
export * from "./types";
