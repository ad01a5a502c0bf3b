export interface DiscriminantNode {
  kind: "discriminant";
  size: number;
}

export interface PaddingNode {
  kind: "padding";
  size: number;
}

export interface EndPaddingNode {
  kind: "endPadding";
  size: number;
}

export interface FieldNode {
  kind: "field";
  name: string;
  size: number;
  offset?: number;
  alignment?: number;
}

/**
 * `children` stays undefined until a deeper-indented block follows the variant line.
 * An empty array would mean members were observed but none were listed.
 */
export interface VariantNode {
  kind: "variant";
  name: string;
  size: number;
  children?: LayoutNode[];
}

export type LayoutNode = DiscriminantNode | PaddingNode | EndPaddingNode | FieldNode | VariantNode;

export interface TypeRecord {
  name: string;
  size: number;
  alignment: number;
  children: LayoutNode[];
}

export type DiagnosticSeverity = "error" | "warning";

export interface ParseDiagnostic {
  code: "malformed-header";
  severity: DiagnosticSeverity;
  message: string;
  line: string;
  lineNumber: number;
}

export interface ParseResult {
  types: TypeRecord[];
  diagnostics: ParseDiagnostic[];
}

/** A payload line with the `print-type-size` prefix removed, keyed to its raw position. */
export interface SourceLine {
  text: string;
  lineNumber: number;
}

export type MalformedHeaderPolicy = "skip" | "stop";

export interface ParseOptions {
  indentUnit?: number;
  strictIndent?: boolean;
  malformedHeader?: MalformedHeaderPolicy;
}

export type SortKey = "source" | "size" | "name";

export type OutputFormat = "html" | "json" | "text";

export interface SelectOptions {
  sort?: SortKey;
  reverse?: boolean;
  filter?: string;
  minSize?: number;
}

export interface ToolConfig extends ParseOptions, SelectOptions {
  toolchain?: string;
  touch?: string;
  output?: OutputFormat;
  outFile?: string;
}
