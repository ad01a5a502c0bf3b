import type { MalformedHeaderPolicy, ParseOptions } from "../types.js";

export const DEFAULT_INDENT_UNIT = 4;

export interface ResolvedParseOptions {
  indentUnit: number;
  strictIndent: boolean;
  malformedHeader: MalformedHeaderPolicy;
}

export function resolveParseOptions(options: ParseOptions = {}): ResolvedParseOptions {
  const indentUnit = options.indentUnit ?? DEFAULT_INDENT_UNIT;
  if (!Number.isInteger(indentUnit) || indentUnit <= 0) {
    throw new RangeError(`indentUnit must be a positive integer, got ${indentUnit}`);
  }

  return {
    indentUnit,
    strictIndent: options.strictIndent ?? false,
    malformedHeader: options.malformedHeader ?? "skip",
  };
}
