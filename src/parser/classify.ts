const WRAPPER_RE = /^print-type-size (?<tail>.*)$/u;
const TYPE_HEADER_RE = /^type: `(?<name>[^`]+)`: (?<size>\d+) bytes, alignment: (?<align>\d+) bytes$/u;
const ELEMENT_RE =
  /^(?<indent>\s+)(?<kind>[a-z ]+)(?: `(?<name>[^`]+)`)?: (?<size>\d+) bytes(?:, offset: (?<offset>\d+) bytes)?(?:, alignment: (?<align>\d+) bytes)?$/u;

export interface TypeHeaderMatch {
  name: string;
  size: string;
  alignment: string;
}

export interface ElementMatch {
  indent: string;
  kind: string;
  name?: string;
  size: string;
  offset?: string;
  alignment?: string;
}

export function matchWrapper(line: string): string | null {
  const match = line.match(WRAPPER_RE);
  return match?.groups ? match.groups.tail : null;
}

export function matchTypeHeader(payload: string): TypeHeaderMatch | null {
  const groups = payload.match(TYPE_HEADER_RE)?.groups;
  if (!groups) {
    return null;
  }
  return {
    name: groups.name,
    size: groups.size,
    alignment: groups.align,
  };
}

export function matchElement(payload: string): ElementMatch | null {
  const groups = payload.match(ELEMENT_RE)?.groups;
  if (!groups) {
    return null;
  }
  return {
    indent: groups.indent,
    kind: groups.kind,
    name: groups.name,
    size: groups.size,
    offset: groups.offset,
    alignment: groups.align,
  };
}
