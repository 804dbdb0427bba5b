import fs from "node:fs";
import { parseTree, printParseErrorCode } from "jsonc-parser";
import type { Node, ParseError } from "jsonc-parser";
import { ExtractionError } from "../core/errors";
import type { JsonMetadata, JsonValueType } from "../types";
import { decodeUtf8 } from "./textExtractor";
import type { Extraction, FormatExtractor } from "./types";

const INDENT = "  ";

/** Strict JSON into a syntax tree; the tree keeps source key order and raw number literals. */
export function parseJsonTree(source: string): Node {
  const errors: ParseError[] = [];
  const root = parseTree(source, errors, { disallowComments: true, allowTrailingComma: false });
  const [first] = errors;
  if (first) {
    throw new SyntaxError(`${printParseErrorCode(first.error)} at offset ${first.offset}`);
  }
  if (!root) {
    throw new SyntaxError("Empty JSON document");
  }
  return root;
}

/** Object members in first-seen order; a repeated key keeps its first position and its last value. */
function objectMembers(node: Node): Map<string, Node> {
  const members = new Map<string, Node>();
  for (const property of node.children ?? []) {
    const [keyNode, valueNode] = property.children ?? [];
    if (!keyNode || !valueNode || typeof keyNode.value !== "string") {
      throw new SyntaxError(`Malformed property at offset ${property.offset}`);
    }
    members.set(keyNode.value, valueNode);
  }
  return members;
}

/** Two-space pretty print in the layout of `JSON.stringify(value, null, 2)`. */
export function formatJsonTree(node: Node, source: string, depth = 0): string {
  const pad = INDENT.repeat(depth);
  const inner = INDENT.repeat(depth + 1);

  switch (node.type) {
    case "object": {
      const members = [...objectMembers(node)];
      if (members.length === 0) {
        return "{}";
      }
      const lines = members.map(
        ([key, value]) => `${inner}${JSON.stringify(key)}: ${formatJsonTree(value, source, depth + 1)}`,
      );
      return `{\n${lines.join(",\n")}\n${pad}}`;
    }
    case "array": {
      const items = node.children ?? [];
      if (items.length === 0) {
        return "[]";
      }
      const lines = items.map((item) => `${inner}${formatJsonTree(item, source, depth + 1)}`);
      return `[\n${lines.join(",\n")}\n${pad}]`;
    }
    case "string":
      return JSON.stringify(typeof node.value === "string" ? node.value : "");
    case "number":
    case "boolean":
    case "null":
      return source.slice(node.offset, node.offset + node.length);
    default:
      throw new SyntaxError(`Unexpected ${node.type} node at offset ${node.offset}`);
  }
}

function jsonValueType(node: Node): JsonValueType {
  switch (node.type) {
    case "object":
    case "array":
    case "string":
    case "number":
    case "boolean":
    case "null":
      return node.type;
    default:
      throw new SyntaxError(`Unexpected ${node.type} node at offset ${node.offset}`);
  }
}

export function describeJson(root: Node): JsonMetadata {
  const type = jsonValueType(root);
  if (type === "object") {
    const keys = [...objectMembers(root).keys()];
    return { format: "json", keys, type, size: keys.length };
  }
  if (type === "array") {
    return { format: "json", keys: [], type, size: root.children?.length ?? 0 };
  }
  return { format: "json", keys: [], type, size: 1 };
}

export class JsonExtractor implements FormatExtractor<"json"> {
  readonly fileType = "json";
  private readonly readFile: (filePath: string) => Promise<Buffer>;

  constructor(deps?: { readFile?: (filePath: string) => Promise<Buffer> }) {
    this.readFile = deps?.readFile ?? fs.promises.readFile;
  }

  async extract(filePath: string): Promise<Extraction<"json">> {
    try {
      const source = decodeUtf8(await this.readFile(filePath));
      const root = parseJsonTree(source);
      return {
        text: formatJsonTree(root, source),
        metadata: describeJson(root),
      };
    } catch (error) {
      throw new ExtractionError("json", error);
    }
  }
}
