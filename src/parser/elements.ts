import type { FieldNode, LayoutNode, SourceLine } from "../types.js";
import type { ElementMatch } from "./classify.js";
import { TypeLayoutParseError } from "./errors.js";

function toInt(digits: string): number {
  return Number.parseInt(digits, 10);
}

function toOptionalInt(digits?: string): number | undefined {
  return digits === undefined ? undefined : toInt(digits);
}

function requireName(match: ElementMatch, source: SourceLine): string {
  if (match.name === undefined) {
    throw new TypeLayoutParseError("missing-name", `Element "${match.kind}" has no name`, source);
  }
  return match.name;
}

export function buildElement(match: ElementMatch, source: SourceLine): LayoutNode {
  const size = toInt(match.size);

  switch (match.kind) {
    case "discriminant":
      return { kind: "discriminant", size };
    case "padding":
      return { kind: "padding", size };
    case "end padding":
      return { kind: "endPadding", size };
    case "field": {
      const node: FieldNode = { kind: "field", name: requireName(match, source), size };
      const offset = toOptionalInt(match.offset);
      const alignment = toOptionalInt(match.alignment);
      if (offset !== undefined) {
        node.offset = offset;
      }
      if (alignment !== undefined) {
        node.alignment = alignment;
      }
      return node;
    }
    case "variant":
      return { kind: "variant", name: requireName(match, source), size };
    default:
      throw new TypeLayoutParseError("unknown-kind", `Unrecognized element kind "${match.kind}"`, source);
  }
}
