import { readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import type { LayoutNode, TypeRecord } from "../types.js";
import { describeNode, describeType, nodeChildren } from "./labels.js";

export const TYPES_PLACEHOLDER = "<!-- types -->";
export const DEFAULT_HTML_OUTPUT = "type-sizes.html";

const ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/gu, (ch) => ESCAPES[ch] ?? ch);
}

function renderItem(label: string, children: LayoutNode[] | undefined): string {
  if (!children) {
    return `<li>${escapeHtml(label)}</li>`;
  }

  const nested = children.map((child) => renderItem(describeNode(child), nodeChildren(child)));
  return [
    "<li>",
    `<span class="caret">${escapeHtml(label)}</span>`,
    '<ul class="nested">',
    ...nested,
    "</ul>",
    "</li>",
  ].join("\n");
}

export function renderTypeList(types: TypeRecord[]): string {
  return types
    .map((type) => renderItem(describeType(type), type.children.length > 0 ? type.children : undefined))
    .join("\n");
}

export function renderHtml(types: TypeRecord[], template: string): string {
  if (!template.includes(TYPES_PLACEHOLDER)) {
    throw new Error(`HTML template has no ${TYPES_PLACEHOLDER} placeholder`);
  }
  return template.replace(TYPES_PLACEHOLDER, () => renderTypeList(types));
}

export async function loadHtmlTemplate(): Promise<string> {
  const templatePath = fileURLToPath(new URL("../../templates/index.html", import.meta.url));
  return readFile(templatePath, "utf8");
}

export async function writeHtmlReport(types: TypeRecord[], outputPath: string): Promise<string> {
  const resolved = path.resolve(outputPath);
  const template = await loadHtmlTemplate();
  await writeFile(resolved, renderHtml(types, template), "utf8");
  return resolved;
}
