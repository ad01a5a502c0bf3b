import type { SourceLine } from "../types.js";

export type ParseErrorCode = "unknown-kind" | "missing-name" | "orphan-block" | "misaligned-indent";

export class TypeLayoutParseError extends Error {
  readonly code: ParseErrorCode;
  readonly line: string;
  readonly lineNumber: number;

  constructor(code: ParseErrorCode, message: string, source: SourceLine) {
    super(`${message} (line ${source.lineNumber}: ${source.text})`);
    this.name = "TypeLayoutParseError";
    this.code = code;
    this.line = source.text;
    this.lineNumber = source.lineNumber;
  }
}
