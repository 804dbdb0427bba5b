import fs from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { InMemoryStore } from "../store";
import { FakeTextGenerator, makeTempDir } from "../testing/fixtures";
import { parseCliArgs, runCli } from "./index";

describe("parseCliArgs", () => {
  it("returns help for unknown commands and help flags", () => {
    expect(parseCliArgs([])).toBe("help");
    expect(parseCliArgs(["publish"])).toBe("help");
    expect(parseCliArgs(["scan", "--help"])).toBe("help");
  });

  it("joins positional words into the query and reads options", () => {
    expect(parseCliArgs(["search", "machine", "learning", "--limit", "5", "--dir", "/docs", "--no-insights"])).toEqual({
      command: "search",
      argument: "machine learning",
      configPath: undefined,
      documentsDir: "/docs",
      limit: 5,
      insights: false,
    });
  });

  it("ignores a non-numeric limit", () => {
    const parsed = parseCliArgs(["search", "ai", "--limit", "lots"]);
    expect(parsed !== "help" && parsed.limit).toBeUndefined();
  });
});

describe("runCli", () => {
  let dir = "";
  let output: string[] = [];
  let store = new InMemoryStore();
  const env = () => ({ DOCUMENTS_DIR: dir, LOG_LEVEL: "error" });
  const deps = () => ({
    env: env(),
    print: (text: string) => {
      output.push(text);
    },
    createStore: () => store,
    createTextGenerator: () => new FakeTextGenerator('{"summary":"Teaching and AI work.","keywords":["education"]}'),
  });

  beforeEach(() => {
    dir = makeTempDir();
    output = [];
    store = new InMemoryStore();
    fs.writeFileSync(path.join(dir, "teaching.md"), "# Teaching\nSeven years of electronics courses\n", "utf-8");
    fs.writeFileSync(path.join(dir, "skills.txt"), "Python, PyTorch, Kubernetes", "utf-8");
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("prints ranked results shaped for the search tool", async () => {
    const code = await runCli(["search", "kubernetes"], deps());

    expect(code).toBe(0);
    expect(JSON.parse(output[0])).toEqual({
      search_results: [
        { document: "skills.txt", relevance: 3, summary: "Teaching and AI work.", keywords: ["education"] },
      ],
    });
  });

  it("rejects an empty search query", async () => {
    expect(await runCli(["search"], deps())).toBe(1);
    expect(output).toEqual([]);
  });

  it("persists metadata on scan and reports unchanged files the second time", async () => {
    await runCli(["scan"], deps());
    await runCli(["scan"], deps());

    const first = JSON.parse(output[0]);
    const second = JSON.parse(output[1]);
    expect([...first.changes.new].sort()).toEqual(["skills.txt", "teaching.md"]);
    expect(first.changes.changed).toEqual([]);
    expect([...second.changes.unchanged].sort()).toEqual(["skills.txt", "teaching.md"]);
    expect(first.stats.successfulCount).toBe(2);
    expect((await store.listDocuments()).map((document) => document.status)).toEqual(["active", "active"]);
  });

  it("prints the system prompt context block", async () => {
    await runCli(["context", "--no-insights"], deps());

    expect(output[0].split("\n").sort()).toEqual([
      "**skills.txt**: Document: skills.txt",
      "**teaching.md**: Document: teaching.md",
    ]);
  });

  it("prints the search tool definition", async () => {
    expect(await runCli(["tools"], deps())).toBe(0);

    const [tool] = JSON.parse(output[0]);
    expect(tool.type).toBe("function");
    expect(tool.function.name).toBe("search_documents");
    expect(tool.function.parameters.required).toEqual(["query"]);
  });

  it("copies and processes an added file", async () => {
    const sourceDir = makeTempDir();
    const source = path.join(sourceDir, "talk.json");
    fs.writeFileSync(source, '{"title":"Edge AI"}', "utf-8");

    try {
      const code = await runCli(["add", source], deps());

      expect(code).toBe(0);
      expect(fs.existsSync(path.join(dir, "talk.json"))).toBe(true);
      expect(JSON.parse(output[0])).toMatchObject({ filename: "talk.json", fileType: "json", contentLength: 24 });
      expect((await store.getDocument("talk.json"))?.status).toBe("active");
    } finally {
      fs.rmSync(sourceDir, { recursive: true, force: true });
    }
  });

  it("propagates add failures to the caller", async () => {
    await expect(runCli(["add", path.join(dir, "missing.pdf")], deps())).rejects.toThrow("Document not found");
  });
});
