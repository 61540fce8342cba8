/**
 * Record model
 *
 * Records are JSON-like nested mappings as returned by the remote service.
 * Display records are what the transformation engine produces: the same
 * shape, except that a value may carry a decoration (display text + style).
 */

// =============================================================================
// Types
// =============================================================================

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export type JsonObject = { [key: string]: JsonValue };

/** One domain object: incident, alert, user, service or team. */
export type DataRecord = JsonObject;

/** Style tags understood by the table renderer. */
export type StyleName =
  | "red"
  | "green"
  | "yellow"
  | "blue"
  | "magenta"
  | "cyan"
  | "white"
  | "gray";

/**
 * A value annotated for display. `value` keeps the raw data (sorting uses
 * it), `text` is what gets printed, `style` is a hint renderers may ignore.
 */
export class Decorated {
  readonly kind = "decorated";

  constructor(
    readonly value: JsonValue,
    readonly text: string,
    readonly style: StyleName,
  ) {}

  toJSON(): string {
    return this.text;
  }

  toString(): string {
    return this.text;
  }
}

export type DisplayValue = JsonPrimitive | Decorated | DisplayValue[] | DisplayRecord;
export type DisplayRecord = { [key: string]: DisplayValue };

export type PathLookup<T> = { found: true; value: T } | { found: false };

// =============================================================================
// Guards
// =============================================================================

export function isDecorated(value: unknown): value is Decorated {
  return value instanceof Decorated;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !isDecorated(value);
}

function isDisplayRecord(value: DisplayValue): value is DisplayRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !isDecorated(value);
}

// =============================================================================
// Path lookup
// =============================================================================

export function splitPath(path: string): string[] {
  return path.split(".").filter((segment) => segment.length > 0);
}

/**
 * Resolve a dotted path. Mapping segments descend into objects, numeric
 * segments index into arrays. Decorated values are leaves.
 */
export function lookupPath(root: JsonObject, path: string): PathLookup<JsonValue>;
export function lookupPath(root: DisplayRecord, path: string): PathLookup<DisplayValue>;
export function lookupPath(root: DisplayRecord, path: string): PathLookup<DisplayValue> {
  const segments = splitPath(path);
  if (segments.length === 0) return { found: false };

  let current: DisplayValue = root;
  for (const segment of segments) {
    if (Array.isArray(current)) {
      if (!/^\d+$/.test(segment)) return { found: false };
      const index = Number.parseInt(segment, 10);
      if (index >= current.length) return { found: false };
      current = current[index];
    } else if (isDisplayRecord(current)) {
      if (!Object.prototype.hasOwnProperty.call(current, segment)) return { found: false };
      current = current[segment];
    } else {
      return { found: false };
    }
  }
  return { found: true, value: current };
}

/** Top-level key first (flat keys may contain dots), then dotted path. */
export function lookupField(record: DisplayRecord, field: string): PathLookup<DisplayValue> {
  if (Object.prototype.hasOwnProperty.call(record, field)) {
    return { found: true, value: record[field] };
  }
  return lookupPath(record, field);
}

// =============================================================================
// Conversion
// =============================================================================

/** String form used by filters, lookup tables and plain output. */
export function stringifyValue(value: DisplayValue): string {
  if (value === null) return "null";
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  if (isDecorated(value)) return value.text;
  return JSON.stringify(toPlain(value));
}

/** Strip decorations, keeping display text. */
export function toPlain(value: DisplayValue): JsonValue {
  if (isDecorated(value)) return value.text;
  if (Array.isArray(value)) return value.map(toPlain);
  if (isDisplayRecord(value)) {
    const out: JsonObject = {};
    for (const [key, inner] of Object.entries(value)) {
      out[key] = toPlain(inner);
    }
    return out;
  }
  return value;
}

export function toPlainRecord(record: DisplayRecord): JsonObject {
  const out: JsonObject = {};
  for (const [key, value] of Object.entries(record)) {
    out[key] = toPlain(value);
  }
  return out;
}

/** Ids of records that carry a string `id`, in order. */
export function recordIds(records: readonly DataRecord[]): string[] {
  const ids: string[] = [];
  for (const record of records) {
    const id = record.id;
    if (typeof id === "string") ids.push(id);
  }
  return ids;
}
