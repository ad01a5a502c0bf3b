import type { ParseDiagnostic, ParseOptions, ParseResult, SourceLine, TypeRecord } from "../types.js";
import { matchTypeHeader, matchWrapper } from "./classify.js";
import { resolveParseOptions } from "./defaults.js";
import { buildTree } from "./tree.js";

export { TypeLayoutParseError } from "./errors.js";
export type { ParseErrorCode } from "./errors.js";
export { DEFAULT_INDENT_UNIT } from "./defaults.js";

/** Keeps the payload of `print-type-size` lines; every other line is unrelated compiler output. */
export function stripWrapper(rawLines: string[]): SourceLine[] {
  const out: SourceLine[] = [];
  for (let i = 0; i < rawLines.length; i += 1) {
    const tail = matchWrapper(rawLines[i]);
    if (tail !== null) {
      out.push({ text: tail, lineNumber: i + 1 });
    }
  }
  return out;
}

export function assembleTypes(lines: SourceLine[], options: ParseOptions = {}): ParseResult {
  const resolved = resolveParseOptions(options);
  const types: TypeRecord[] = [];
  const diagnostics: ParseDiagnostic[] = [];
  let index = 0;

  while (index < lines.length) {
    const source = lines[index];
    const header = matchTypeHeader(source.text);
    if (!header) {
      diagnostics.push({
        code: "malformed-header",
        severity: "warning",
        message: `Ignoring line ${source.lineNumber} (expected type header): ${source.text}`,
        line: source.text,
        lineNumber: source.lineNumber,
      });
      if (resolved.malformedHeader === "stop") {
        break;
      }
      index += 1;
      continue;
    }

    const body = buildTree(lines, index + 1, 1, resolved);
    types.push({
      name: header.name,
      size: Number.parseInt(header.size, 10),
      alignment: Number.parseInt(header.alignment, 10),
      children: body.children,
    });
    index = body.next;
  }

  return { types, diagnostics };
}

export function parseTypeSizes(rawLines: string[], options: ParseOptions = {}): ParseResult {
  return assembleTypes(stripWrapper(rawLines), options);
}

export function parseTypeSizeOutput(text: string, options: ParseOptions = {}): ParseResult {
  return parseTypeSizes(text.replace(/\r\n/g, "\n").split("\n"), options);
}
