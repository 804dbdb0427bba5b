import { loadConfig } from "../config";
import type { AppConfig } from "../config";
import { runAdd, runContext, runDocuments, runScan, runSearch, runStats, runTools } from "../core/commands";
import { InsightGenerator, OpenAiTextGenerator } from "../insight";
import type { TextGenerator } from "../insight";
import { createRunId, Logger, MetricsRegistry } from "../observability";
import { DocumentRegistry } from "../registry";
import { createStore } from "../store";
import type { DocumentMetadataStore } from "../store";

export type CommandName = "scan" | "add" | "search" | "stats" | "context" | "tools" | "documents";

export interface ParsedCliArgs {
  command: CommandName;
  argument?: string;
  configPath?: string;
  documentsDir?: string;
  limit?: number;
  insights: boolean;
}

export interface CliDeps {
  env?: NodeJS.ProcessEnv;
  print?: (text: string) => void;
  createStore?: (config: AppConfig) => DocumentMetadataStore;
  createTextGenerator?: (config: AppConfig) => TextGenerator;
}

const HELP_TEXT = `
Usage:
  portfolio-docs <command> [options]

Commands:
  scan              Process every document and store its metadata
  add <file>        Copy a file into the documents directory and process it
  search <query>    Rank documents against a query
  stats             Print corpus statistics
  context           Print the document context block for the chat system prompt
  tools             Print the search_documents tool definition for the chat API
  documents         List stored document metadata

Options:
  --config <path>   Optional path to JSON config file
  --dir <path>      Documents directory (overrides DOCUMENTS_DIR)
  --limit <n>       Maximum number of search results
  --no-insights     Skip AI summaries and keywords
  -h, --help        Show this help
`;

const OPTIONS_WITH_VALUES = new Set(["--config", "--dir", "--limit"]);

function parseCommand(raw: string | undefined): CommandName | undefined {
  if (!raw) {
    return undefined;
  }

  if (
    raw === "scan" ||
    raw === "add" ||
    raw === "search" ||
    raw === "stats" ||
    raw === "context" ||
    raw === "tools" ||
    raw === "documents"
  ) {
    return raw;
  }

  return undefined;
}

function optionValue(argv: string[], name: string): string | undefined {
  const index = argv.indexOf(name);
  return index >= 0 ? argv[index + 1] : undefined;
}

/** Words that are neither options nor option values, after the command itself. */
function positionals(argv: string[]): string[] {
  const values: string[] = [];
  for (let index = 1; index < argv.length; index += 1) {
    const token = argv[index];
    if (OPTIONS_WITH_VALUES.has(token)) {
      index += 1;
      continue;
    }
    if (token.startsWith("--")) {
      continue;
    }
    values.push(token);
  }
  return values;
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  const command = parseCommand(argv[0]);
  if (!command) {
    return "help";
  }

  const rest = positionals(argv);
  const limitRaw = optionValue(argv, "--limit");
  const limitParsed = limitRaw ? Number.parseInt(limitRaw, 10) : undefined;

  return {
    command,
    argument: rest.length > 0 ? rest.join(" ") : undefined,
    configPath: optionValue(argv, "--config"),
    documentsDir: optionValue(argv, "--dir"),
    limit: limitParsed !== undefined && Number.isFinite(limitParsed) ? limitParsed : undefined,
    insights: !argv.includes("--no-insights"),
  };
}

export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const print = deps.print ?? ((text: string) => console.log(text));
  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    print(HELP_TEXT.trim());
    return 0;
  }

  if ((parsed.command === "add" || parsed.command === "search") && !parsed.argument?.trim()) {
    console.error(`${parsed.command} requires ${parsed.command === "add" ? "a file path" : "a non-empty query"}`);
    return 1;
  }

  let config = loadConfig(parsed.configPath, deps.env);
  if (parsed.documentsDir) {
    config = {
      ...config,
      documentsDir: parsed.documentsDir,
    };
  }
  if (!parsed.insights) {
    config = {
      ...config,
      insightsEnabled: false,
    };
  }

  const runId = createRunId();
  const store = (deps.createStore ?? createStore)(config);
  const metrics = new MetricsRegistry();
  const logger = new Logger({ component: "cli", runId, minLevel: config.logLevel });
  const generator =
    deps.createTextGenerator?.(config) ??
    new OpenAiTextGenerator({ apiKey: config.openaiApiKey, timeoutMs: config.insightTimeoutMs });
  const insights = new InsightGenerator({
    generator,
    options: {
      enabled: config.insightsEnabled,
      model: config.openaiModel,
      temperature: config.insightTemperature,
      maxChars: config.insightMaxChars,
    },
    logger: logger.child("insight"),
    metrics,
  });
  const registry = new DocumentRegistry({ config, logger: logger.child("registry"), metrics, insights });
  const context = { runId, config, store, registry, logger, metrics, print };

  logger.info("command_start", {
    command: parsed.command,
    documentsDir: config.documentsDir,
    insightsEnabled: config.insightsEnabled,
  });

  try {
    switch (parsed.command) {
      case "scan":
        await runScan({ ...context, logger: logger.child("scan") });
        break;
      case "add":
        await runAdd({ ...context, logger: logger.child("add") }, parsed.argument ?? "");
        break;
      case "search":
        await runSearch({ ...context, logger: logger.child("search") }, parsed.argument ?? "", parsed.limit);
        break;
      case "stats":
        await runStats({ ...context, logger: logger.child("stats") });
        break;
      case "context":
        await runContext({ ...context, logger: logger.child("context") });
        break;
      case "tools":
        runTools(context);
        break;
      case "documents":
        await runDocuments({ ...context, logger: logger.child("documents") });
        break;
    }

    logger.info("command_complete", { command: parsed.command });
    return 0;
  } finally {
    await store.close();
    if (logger.isEnabled("info")) {
      metrics.printSummary();
    }
  }
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
