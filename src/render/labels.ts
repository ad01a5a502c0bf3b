import type { LayoutNode, TypeRecord } from "../types.js";

export function describeType(type: TypeRecord): string {
  return `Type ${type.name}: ${type.size} bytes, alignment ${type.alignment} bytes`;
}

export function describeNode(node: LayoutNode): string {
  switch (node.kind) {
    case "discriminant":
      return `Discriminant: ${node.size} bytes`;
    case "padding":
      return `Padding: ${node.size} bytes`;
    case "endPadding":
      return `End padding: ${node.size} bytes`;
    case "field": {
      let text = `Field ${node.name}: ${node.size} bytes`;
      if (node.offset !== undefined) {
        text += `, offset: ${node.offset} bytes`;
      }
      if (node.alignment !== undefined) {
        text += `, alignment: ${node.alignment} bytes`;
      }
      return text;
    }
    case "variant":
      return `Variant ${node.name}: ${node.size} bytes`;
  }
}

export function nodeChildren(node: LayoutNode): LayoutNode[] | undefined {
  return node.kind === "variant" ? node.children : undefined;
}
