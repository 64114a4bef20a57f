export type OutputFormat = "json" | "jsonl" | "table";

type Row = Record<string, unknown>;

function isRow(value: unknown): value is Row {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Round-trip through JSON so DateTimes and other toJSON values become plain strings */
function plain(data: unknown): unknown {
  return data === undefined ? null : JSON.parse(JSON.stringify(data));
}

/** Pick specific fields from an object or from each element of an array */
export function pickFields(data: unknown, fields: string[]): unknown {
  if (!fields.length) return data;

  const pick = (item: unknown): unknown => {
    if (!isRow(item)) return item;
    const result: Row = {};
    for (const f of fields) {
      if (f in item) result[f] = item[f];
    }
    return result;
  };

  const value = plain(data);
  return Array.isArray(value) ? value.map(pick) : pick(value);
}

export function formatOutput(data: unknown, format: string, mapColumns?: [string, string]): string {
  const value = plain(data);
  switch (format) {
    case "jsonl":
      if (Array.isArray(value)) return value.map((d) => JSON.stringify(d)).join("\n");
      return JSON.stringify(value);
    case "table":
      return formatTable(value, mapColumns);
    case "json":
    default:
      return JSON.stringify(value, null, 2);
  }
}

const isScalar = (v: unknown) => v === null || typeof v !== "object";

function formatTable(data: unknown, mapColumns?: [string, string]): string {
  let items: Row[];

  if (Array.isArray(data)) {
    items = data.filter(isRow);
  } else if (isRow(data)) {
    // A flat name -> value map reads better as two columns
    const [keyCol, valueCol] = mapColumns ?? ["key", "value"];
    items = Object.values(data).every(isScalar)
      ? Object.entries(data).map(([k, v]) => ({ [keyCol]: k, [valueCol]: v }))
      : [data];
  } else {
    return String(data);
  }

  if (!items.length) return "(no results)";

  const keys = [...new Set(items.flatMap((item) => Object.keys(item)))];

  const fmt = (v: unknown): string => {
    if (v === null || v === undefined) return "";
    if (typeof v === "object") return JSON.stringify(v);
    return String(v);
  };

  const widths = keys.map((k) => Math.min(60, Math.max(k.length, ...items.map((item) => fmt(item[k]).length))));

  const header = keys.map((k, i) => k.padEnd(widths[i])).join("  ");
  const sep = widths.map((w) => "─".repeat(w)).join("──");
  const rows = items.map((item) =>
    keys
      .map((k, i) => {
        const s = fmt(item[k]);
        return s.length > widths[i] ? s.slice(0, widths[i] - 1) + "…" : s.padEnd(widths[i]);
      })
      .join("  "),
  );

  return [header, sep, ...rows].join("\n");
}
