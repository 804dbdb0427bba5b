import fs from "node:fs";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { makeTempDir } from "../testing/fixtures";
import { DEFAULT_CONFIG, loadConfig } from "./loadConfig";

describe("loadConfig", () => {
  let dir = "";

  afterEach(() => {
    if (dir) {
      fs.rmSync(dir, { recursive: true, force: true });
      dir = "";
    }
  });

  it("returns the defaults with an empty environment", () => {
    expect(loadConfig(undefined, {})).toEqual(DEFAULT_CONFIG);
  });

  it("applies environment overrides and ignores malformed values", () => {
    const config = loadConfig(undefined, {
      DOCUMENTS_DIR: "/srv/docs",
      PROCESS_CONCURRENCY: "many",
      INSIGHTS_ENABLED: "no",
      INSIGHT_TEMPERATURE: "0.7",
      LOG_LEVEL: "WARN",
      OPENAI_API_KEY: "test-key",
    });

    expect(config.documentsDir).toBe("/srv/docs");
    expect(config.processConcurrency).toBe(1);
    expect(config.insightsEnabled).toBe(false);
    expect(config.insightTemperature).toBe(0.7);
    expect(config.logLevel).toBe("warn");
    expect(config.openaiApiKey).toBe("test-key");
  });

  it("layers the config file between defaults and environment", () => {
    dir = makeTempDir();
    const configPath = path.join(dir, "config.json");
    fs.writeFileSync(configPath, JSON.stringify({ openaiModel: "gpt-test", searchResultLimit: 5, unknownKey: true }));

    const config = loadConfig(configPath, { SEARCH_RESULT_LIMIT: "8" });

    expect(config.openaiModel).toBe("gpt-test");
    expect(config.searchResultLimit).toBe(8);
    expect(config.insightMaxChars).toBe(3000);
  });

  it("keeps defaults for non-positive integer settings in the environment", () => {
    const config = loadConfig(undefined, { PROCESS_CONCURRENCY: "0", INSIGHT_MAX_CHARS: "-50" });

    expect(config.processConcurrency).toBe(1);
    expect(config.insightMaxChars).toBe(3000);
  });

  it.each([
    ["processConcurrency", 1.5],
    ["processConcurrency", 0],
    ["insightMaxChars", -3000],
    ["searchResultLimit", 2.5],
  ])("rejects %s = %s in the config file", (key, value) => {
    dir = makeTempDir();
    const configPath = path.join(dir, "config.json");
    fs.writeFileSync(configPath, JSON.stringify({ [key]: value }));

    expect(() => loadConfig(configPath, {})).toThrow(`Config key ${key} must be a positive integer`);
  });

  it("rejects a missing config file", () => {
    expect(() => loadConfig("/nonexistent/config.json", {})).toThrow("Config file not found");
  });

  it("rejects a value of the wrong type", () => {
    dir = makeTempDir();
    const configPath = path.join(dir, "config.json");
    fs.writeFileSync(configPath, JSON.stringify({ processConcurrency: "two" }));

    expect(() => loadConfig(configPath, {})).toThrow("Config key processConcurrency must be a positive integer");
  });
});
