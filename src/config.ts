import fs from "node:fs/promises";
import yaml from "js-yaml";
import type { MalformedHeaderPolicy, OutputFormat, SortKey, ToolConfig } from "./types.js";

export const OUTPUT_FORMATS: readonly OutputFormat[] = ["html", "json", "text"];
export const SORT_KEYS: readonly SortKey[] = ["source", "size", "name"];
const HEADER_POLICIES: readonly MalformedHeaderPolicy[] = ["skip", "stop"];

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

function isRecord(input: unknown): input is Record<string, unknown> {
  return typeof input === "object" && input !== null && !Array.isArray(input);
}

function asNumber(input: unknown, key: string): number | undefined {
  if (input === undefined || input === null) {
    return undefined;
  }
  if (typeof input === "number" && Number.isFinite(input)) {
    return input;
  }
  throw new ConfigError(`"${key}" must be a number`);
}

function asInteger(input: unknown, key: string, min: number): number | undefined {
  const value = asNumber(input, key);
  if (value === undefined) {
    return undefined;
  }
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`"${key}" must be an integer of at least ${min}`);
  }
  return value;
}

function asString(input: unknown, key: string): string | undefined {
  if (input === undefined || input === null) {
    return undefined;
  }
  if (typeof input === "string") {
    return input;
  }
  throw new ConfigError(`"${key}" must be a string`);
}

function asBoolean(input: unknown, key: string): boolean | undefined {
  if (input === undefined || input === null) {
    return undefined;
  }
  if (typeof input === "boolean") {
    return input;
  }
  throw new ConfigError(`"${key}" must be true or false`);
}

function asChoice<T extends string>(input: unknown, key: string, choices: readonly T[]): T | undefined {
  const text = asString(input, key);
  if (text === undefined) {
    return undefined;
  }
  const found = choices.find((choice) => choice === text);
  if (found === undefined) {
    throw new ConfigError(`"${key}" must be one of: ${choices.join(", ")}`);
  }
  return found;
}

/** Later layers win; keys left undefined in a layer do not override earlier ones. */
export function mergeConfig(...layers: ToolConfig[]): ToolConfig {
  const out: ToolConfig = {};
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) {
        Object.assign(out, { [key]: value });
      }
    }
  }
  return out;
}

export function parseConfigYaml(raw: string): ToolConfig {
  const loaded = yaml.load(raw);
  if (loaded === undefined || loaded === null) {
    return {};
  }
  if (!isRecord(loaded)) {
    throw new ConfigError("config must be a YAML mapping");
  }

  return mergeConfig({
    toolchain: asString(loaded.toolchain, "toolchain"),
    touch: asString(loaded.touch, "touch"),
    output: asChoice(loaded.output, "output", OUTPUT_FORMATS),
    outFile: asString(loaded.outFile, "outFile"),
    sort: asChoice(loaded.sort, "sort", SORT_KEYS),
    reverse: asBoolean(loaded.reverse, "reverse"),
    filter: asString(loaded.filter, "filter"),
    minSize: asInteger(loaded.minSize, "minSize", 0),
    indentUnit: asInteger(loaded.indentUnit, "indentUnit", 1),
    strictIndent: asBoolean(loaded.strictIndent, "strictIndent"),
    malformedHeader: asChoice(loaded.malformedHeader, "malformedHeader", HEADER_POLICIES),
  });
}

export async function loadConfigFile(filePath: string): Promise<ToolConfig> {
  const raw = await fs.readFile(filePath, "utf8");
  try {
    return parseConfigYaml(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Invalid config ${filePath}: ${message}`);
  }
}
