import type { LayoutNode, SourceLine } from "../types.js";
import { matchElement } from "./classify.js";
import type { ResolvedParseOptions } from "./defaults.js";
import { buildElement } from "./elements.js";
import { TypeLayoutParseError } from "./errors.js";

export interface TreeResult {
  children: LayoutNode[];
  /** Index of the first line this level did not consume. */
  next: number;
}

function attachSubtree(children: LayoutNode[], subtree: LayoutNode[], source: SourceLine): void {
  const last = children[children.length - 1];
  if (!last || last.kind !== "variant" || last.children !== undefined) {
    const owner = last ? `"${last.kind}"` : "nothing";
    throw new TypeLayoutParseError("orphan-block", `Nested block follows ${owner} instead of a variant`, source);
  }
  children[children.length - 1] = { ...last, children: subtree };
}

/**
 * Collects the elements indented at `depth` starting from `lines[start]`.
 * Stops without consuming at the first line that is shallower or is not an element.
 */
export function buildTree(
  lines: SourceLine[],
  start: number,
  depth: number,
  options: ResolvedParseOptions,
): TreeResult {
  const children: LayoutNode[] = [];
  const expectedIndent = depth * options.indentUnit;
  let index = start;

  while (index < lines.length) {
    const source = lines[index];
    const match = matchElement(source.text);
    if (!match) {
      break;
    }

    const indent = match.indent.length;
    if (options.strictIndent && indent % options.indentUnit !== 0) {
      throw new TypeLayoutParseError(
        "misaligned-indent",
        `Indentation of ${indent} is not a multiple of ${options.indentUnit}`,
        source,
      );
    }

    if (indent > expectedIndent) {
      const nested = buildTree(lines, index, depth + 1, options);
      if (nested.next === index) {
        // Indented between two levels: keep it at this depth so the scan advances.
        children.push(buildElement(match, source));
        index += 1;
        continue;
      }
      attachSubtree(children, nested.children, source);
      index = nested.next;
      continue;
    }

    if (indent < expectedIndent) {
      break;
    }

    children.push(buildElement(match, source));
    index += 1;
  }

  return { children, next: index };
}
