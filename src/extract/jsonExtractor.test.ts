import { describe, expect, it } from "vitest";
import { ExtractionError } from "../core/errors";
import { describeJson, formatJsonTree, JsonExtractor, parseJsonTree } from "./jsonExtractor";

function extractorFor(raw: string): JsonExtractor {
  return new JsonExtractor({ readFile: async () => Buffer.from(raw, "utf-8") });
}

describe("JsonExtractor", () => {
  it("pretty-prints with two spaces and keeps key order", async () => {
    const result = await extractorFor('{"b":2,"a":1}').extract("profile.json");

    expect(result.text).toBe('{\n  "b": 2,\n  "a": 1\n}');
    expect(result.metadata).toEqual({ format: "json", keys: ["b", "a"], type: "object", size: 2 });
  });

  it("keeps integer-like keys in source order", async () => {
    const result = await extractorFor('{"name":"x","2024":"a","10":"b"}').extract("timeline.json");

    expect(result.text).toBe('{\n  "name": "x",\n  "2024": "a",\n  "10": "b"\n}');
    expect(result.metadata.keys).toEqual(["name", "2024", "10"]);
  });

  it("copies number literals exactly as written", async () => {
    const result = await extractorFor('{"id":12345678901234567890,"ratio":1.50,"big":1E+21,"neg":-0}').extract("ids.json");

    expect(result.text).toBe('{\n  "id": 12345678901234567890,\n  "ratio": 1.50,\n  "big": 1E+21,\n  "neg": -0\n}');
  });

  it("indents nested values and collapses empty containers", async () => {
    const result = await extractorFor('{"tags":["ai", {"k":null}],"empty":{},"none":[],"ok":true}').extract("nested.json");

    expect(result.text).toBe(
      '{\n  "tags": [\n    "ai",\n    {\n      "k": null\n    }\n  ],\n  "empty": {},\n  "none": [],\n  "ok": true\n}',
    );
  });

  it("keeps the first position and the last value of a repeated key", async () => {
    const result = await extractorFor('{"a":1,"b":2,"a":3}').extract("dup.json");

    expect(result.text).toBe('{\n  "a": 3,\n  "b": 2\n}');
    expect(result.metadata).toEqual({ format: "json", keys: ["a", "b"], type: "object", size: 2 });
  });

  it("rejects comments and trailing commas", async () => {
    await expect(extractorFor('{"a":1,}').extract("trailing.json")).rejects.toThrow(/^Error processing JSON:/);
    await expect(extractorFor('// note\n{"a":1}').extract("comment.json")).rejects.toThrow(/^Error processing JSON:/);
    await expect(extractorFor("").extract("empty.json")).rejects.toThrow(/^Error processing JSON:/);
  });

  it("describes arrays by length", async () => {
    const result = await extractorFor("[1, 2, 3]").extract("list.json");
    expect(result.metadata).toEqual({ format: "json", keys: [], type: "array", size: 3 });
  });

  it("fails with a parse error", async () => {
    const extraction = extractorFor("{not json").extract("broken.json");
    await expect(extraction).rejects.toBeInstanceOf(ExtractionError);
    await expect(extractorFor("{not json").extract("broken.json")).rejects.toThrow(/^Error processing JSON:/);
  });
});

describe("describeJson", () => {
  it("gives scalars a size of one", () => {
    expect(describeJson(parseJsonTree('"hi"'))).toEqual({ format: "json", keys: [], type: "string", size: 1 });
    expect(describeJson(parseJsonTree("null"))).toEqual({ format: "json", keys: [], type: "null", size: 1 });
    expect(describeJson(parseJsonTree("4.5"))).toEqual({ format: "json", keys: [], type: "number", size: 1 });
  });
});

describe("formatJsonTree", () => {
  it("prints a scalar root on its own", () => {
    const source = ' "caf\\u00e9" ';
    expect(formatJsonTree(parseJsonTree(source), source)).toBe('"café"');
  });
});
