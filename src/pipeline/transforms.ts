/**
 * Transformation Engine
 *
 * Rewrites each record into a display record according to a transformation
 * spec: an ordered mapping of output field → extraction rule. Rules always
 * see the original record, so a rule may consult sibling fields regardless
 * of what other rules produce.
 *
 * Count and order of records are preserved. Without `preserve` the output
 * holds exactly the spec's fields in spec order; with `preserve` it starts
 * as a shallow copy of the original and the computed fields are overlaid.
 */

import { ConfigurationError } from "../errors.js";
import { mapWithConcurrency } from "../utils.js";
import {
  Decorated,
  isJsonObject,
  lookupPath,
  stringifyValue,
  type DataRecord,
  type DisplayRecord,
  type DisplayValue,
  type JsonValue,
  type StyleName,
} from "./record.js";

// =============================================================================
// Types
// =============================================================================

export type ExtractionRule = (record: DataRecord) => DisplayValue | Promise<DisplayValue>;

/** Output field → rule. Iteration order is output field order. */
export type TransformationSpec = Readonly<Record<string, ExtractionRule>>;

export type TransformOptions = {
  /** Keep every original field and overlay the computed ones. */
  preserve?: boolean;
  /** Records processed in parallel (only matters for rules that do I/O). */
  concurrency?: number;
};

export const DEFAULT_TRANSFORM_CONCURRENCY = 4;
export const DEFAULT_COLOR: StyleName = "white";
export const DEFAULT_ALERT_LIMIT = 25;

// =============================================================================
// Engine
// =============================================================================

export async function applyTransformations(
  records: readonly DataRecord[],
  spec: TransformationSpec,
  options: TransformOptions = {},
): Promise<DisplayRecord[]> {
  const entries = Object.entries(spec);
  return mapWithConcurrency(
    records,
    options.concurrency ?? DEFAULT_TRANSFORM_CONCURRENCY,
    async (record) => {
      const out: DisplayRecord = options.preserve ? { ...record } : {};
      for (const [field, rule] of entries) {
        out[field] = await rule(record);
      }
      return out;
    },
  );
}

// =============================================================================
// Plain lookup
// =============================================================================

export function extract(path: string, defaultValue: JsonValue = null): ExtractionRule {
  return (record) => {
    const hit = lookupPath(record, path);
    return hit.found ? hit.value : defaultValue;
  };
}

// =============================================================================
// Decoration
// =============================================================================

export type Decoration = {
  text: string;
  style?: StyleName;
};

/**
 * Custom display mapping. Receives the raw extracted value and the full
 * original record; a returned style overrides the colour table.
 */
export type MapFunc = (item: JsonValue, record: DataRecord) => string | Decoration;

export type DecorateOptions = {
  /** raw value → display label */
  changeMap?: Readonly<Record<string, string>>;
  /** raw value → style tag */
  colorMap?: Readonly<Record<string, StyleName>>;
  defaultColor?: StyleName;
  mapFunc?: MapFunc;
};

function tableLookup<V>(table: Readonly<Record<string, V>> | undefined, key: string): V | undefined {
  if (!table || !Object.prototype.hasOwnProperty.call(table, key)) return undefined;
  return table[key];
}

/** Decorate a raw value. Unmapped values keep their text and get `defaultColor`. */
export function decorate(raw: JsonValue, record: DataRecord, options: DecorateOptions = {}): Decorated {
  const key = raw === null ? "" : stringifyValue(raw);
  const style = tableLookup(options.colorMap, key) ?? options.defaultColor ?? DEFAULT_COLOR;

  if (options.mapFunc) {
    const mapped = options.mapFunc(raw, record);
    if (typeof mapped === "string") return new Decorated(raw, mapped, style);
    return new Decorated(raw, mapped.text, mapped.style ?? style);
  }

  return new Decorated(raw, tableLookup(options.changeMap, key) ?? key, style);
}

export function extractDecorated(path: string, options: DecorateOptions = {}): ExtractionRule {
  return (record) => {
    const hit = lookupPath(record, path);
    return decorate(hit.found ? hit.value : null, record, options);
  };
}

// =============================================================================
// Dates
// =============================================================================

/** Accepted input: `%Y-%m-%dT%H:%M:%S%z`, optional fractional seconds. */
export const DATE_INPUT_PATTERN = "%Y-%m-%dT%H:%M:%S%z";
/** Emitted output, in the target time zone. */
export const DATE_OUTPUT_PATTERN = "YYYY-MM-DD HH:mm:ss";

const INPUT_RE =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,9}))?(Z|[+-]\d{2}:?\d{2})$/;

/** Epoch milliseconds, or null when `value` does not follow DATE_INPUT_PATTERN. */
export function parseTimestamp(value: string): number | null {
  const m = INPUT_RE.exec(value);
  if (!m) return null;
  const [year, month, day, hour, minute, second] = m.slice(1, 7).map((part) => Number.parseInt(part, 10));
  const millis = m[7] ? Number.parseInt(m[7].slice(0, 3).padEnd(3, "0"), 10) : 0;

  const local = new Date(Date.UTC(year, month - 1, day, hour, minute, second, millis));
  if (
    local.getUTCFullYear() !== year ||
    local.getUTCMonth() !== month - 1 ||
    local.getUTCDate() !== day ||
    local.getUTCHours() !== hour ||
    local.getUTCMinutes() !== minute ||
    local.getUTCSeconds() !== second
  ) {
    return null;
  }

  const zone = m[8];
  let offsetMinutes = 0;
  if (zone !== "Z") {
    const digits = zone.slice(1).replace(":", "");
    const hours = Number.parseInt(digits.slice(0, 2), 10);
    const minutes = Number.parseInt(digits.slice(2, 4), 10);
    if (hours > 23 || minutes > 59) return null;
    offsetMinutes = (zone.startsWith("-") ? -1 : 1) * (hours * 60 + minutes);
  }
  return local.getTime() - offsetMinutes * 60_000;
}

export function createDateFormatter(timeZone: string): (epochMs: number) => string {
  let fmt: Intl.DateTimeFormat;
  try {
    fmt = new Intl.DateTimeFormat("en-US", {
      timeZone,
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
      hourCycle: "h23",
    });
  } catch {
    throw new ConfigurationError(
      `Unknown time zone: ${timeZone}`,
      "Use an IANA zone name such as UTC or Europe/Rome.",
    );
  }

  return (epochMs) => {
    const parts: Record<string, string> = {};
    for (const part of fmt.formatToParts(new Date(epochMs))) {
      parts[part.type] = part.value;
    }
    return `${parts.year}-${parts.month}-${parts.day} ${parts.hour}:${parts.minute}:${parts.second}`;
  };
}

/**
 * Re-express a timestamp field in `timeZone`. Values that do not parse are
 * returned unchanged; a missing field yields null.
 */
export function extractDate(path: string, options: { timeZone?: string } = {}): ExtractionRule {
  const format = createDateFormatter(options.timeZone ?? "UTC");
  return (record) => {
    const hit = lookupPath(record, path);
    if (!hit.found) return null;
    if (typeof hit.value !== "string") return hit.value;
    const epochMs = parseTimestamp(hit.value);
    return epochMs === null ? hit.value : format(epochMs);
  };
}

// =============================================================================
// Nested lists
// =============================================================================

function collectStrings(record: DataRecord, listPath: string, itemPath: string): string[] {
  const list = lookupPath(record, listPath);
  if (!list.found || !Array.isArray(list.value)) return [];
  const out: string[] = [];
  for (const item of list.value) {
    if (!isJsonObject(item)) continue;
    const hit = lookupPath(item, itemPath);
    if (hit.found && typeof hit.value === "string") out.push(hit.value);
  }
  return out;
}

/** `assignments[].assignee.summary` as one comma-separated string. */
export function extractAssignees(style: StyleName = "magenta"): ExtractionRule {
  return (record) => {
    const text = collectStrings(record, "assignments", "assignee.summary").join(", ");
    return new Decorated(text, text, style);
  };
}

/** `teams[].summary` as one comma-separated string. */
export function extractUserTeams(): ExtractionRule {
  return (record) => collectStrings(record, "teams", "summary").join(", ");
}

// =============================================================================
// Alerts
// =============================================================================

export type AlertFetcher = (incidentId: string) => Promise<DataRecord[]>;

/**
 * Fetch the alerts of the record's incident (one call per record) and
 * project each through `alertSpec`.
 */
export function extractAlerts(
  fetchAlerts: AlertFetcher,
  alertSpec: TransformationSpec,
  options: { limit?: number } = {},
): ExtractionRule {
  const limit = options.limit ?? DEFAULT_ALERT_LIMIT;
  return async (record) => {
    const id = record.id;
    if (typeof id !== "string") return [];
    const alerts = (await fetchAlerts(id)).slice(0, limit);
    return applyTransformations(alerts, alertSpec, { concurrency: 1 });
  };
}

/** Raw alerts, for output modes that bypass projection. */
export function attachAlerts(fetchAlerts: AlertFetcher, options: { limit?: number } = {}): ExtractionRule {
  const limit = options.limit ?? DEFAULT_ALERT_LIMIT;
  return async (record) => {
    const id = record.id;
    if (typeof id !== "string") return [];
    return (await fetchAlerts(id)).slice(0, limit);
  };
}
