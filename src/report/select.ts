import type { SelectOptions, SortKey, TypeRecord } from "../types.js";

function compareBy(key: SortKey): ((a: TypeRecord, b: TypeRecord) => number) | null {
  if (key === "size") {
    return (a, b) => a.size - b.size;
  }
  if (key === "name") {
    return (a, b) => a.name.localeCompare(b.name, "en");
  }
  return null;
}

export function selectTypes(types: TypeRecord[], options: SelectOptions = {}): TypeRecord[] {
  const filter = options.filter?.trim();
  const minSize = options.minSize ?? 0;

  const out = types.filter((type) => {
    if (type.size < minSize) {
      return false;
    }
    return !filter || type.name.includes(filter);
  });

  // Array.prototype.sort is stable, so equal keys keep compiler order.
  const compare = compareBy(options.sort ?? "source");
  if (compare) {
    out.sort(compare);
  }
  if (options.reverse) {
    out.reverse();
  }
  return out;
}
