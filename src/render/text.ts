import type { LayoutNode, TypeRecord } from "../types.js";
import { describeNode, describeType, nodeChildren } from "./labels.js";

const INDENT = "  ";

function pushNodes(out: string[], nodes: LayoutNode[], depth: number): void {
  for (const node of nodes) {
    out.push(`${INDENT.repeat(depth)}${describeNode(node)}`);
    const children = nodeChildren(node);
    if (children) {
      pushNodes(out, children, depth + 1);
    }
  }
}

export function renderText(types: TypeRecord[]): string {
  const out: string[] = [];
  for (const type of types) {
    out.push(describeType(type));
    pushNodes(out, type.children, 1);
  }
  return out.length > 0 ? `${out.join("\n")}\n` : "";
}

export function renderJson(types: TypeRecord[]): string {
  return `${JSON.stringify(types, null, 2)}\n`;
}
