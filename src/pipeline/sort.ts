/**
 * Sort Engine
 *
 * Stable ordering by one or more field paths, compared as a tuple (first
 * path is the primary key). `reverse` flips the tuple comparison; records
 * with equal keys keep their input order either way.
 *
 * A key missing from any record is a user-facing configuration error, not a
 * silent default.
 */

import { InvalidSortFieldError } from "../errors.js";
import {
  isDecorated,
  lookupField,
  type DisplayRecord,
  type DisplayValue,
} from "./record.js";

/**
 * Per-field ranking of known enumeration values, lowest first. Values not in
 * the table fall back to ordinary comparison.
 */
export type OrdinalTable = Readonly<Record<string, readonly string[]>>;

export type SortOptions = {
  reverse?: boolean;
  ordinals?: OrdinalTable;
  /** Field names listed in the error when a key is missing. Defaults to the first record's keys. */
  availableFields?: readonly string[];
};

const TYPE_RANK: Record<string, number> = {
  null: 0,
  boolean: 1,
  number: 2,
  string: 3,
  array: 4,
  object: 5,
};

function sortValue(value: DisplayValue): DisplayValue {
  return isDecorated(value) ? value.value : value;
}

function typeRank(value: DisplayValue): number {
  if (value === null) return TYPE_RANK.null;
  if (Array.isArray(value)) return TYPE_RANK.array;
  return TYPE_RANK[typeof value] ?? TYPE_RANK.object;
}

function compareNumbers(a: number, b: number): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function compareValues(
  left: DisplayValue,
  right: DisplayValue,
  ordinal?: readonly string[],
): number {
  const a = sortValue(left);
  const b = sortValue(right);

  // Strings outside the table rank after every listed one.
  if (ordinal && typeof a === "string" && typeof b === "string") {
    const ia = ordinal.indexOf(a);
    const ib = ordinal.indexOf(b);
    const cmp = compareNumbers(ia === -1 ? ordinal.length : ia, ib === -1 ? ordinal.length : ib);
    if (cmp !== 0) return cmp;
  }

  const ra = typeRank(a);
  const rb = typeRank(b);
  if (ra !== rb) return compareNumbers(ra, rb);

  if (typeof a === "number" && typeof b === "number") return compareNumbers(a, b);
  if (typeof a === "string" && typeof b === "string") return compareStrings(a, b);
  if (typeof a === "boolean" && typeof b === "boolean") return compareNumbers(Number(a), Number(b));
  if (a === null || b === null) return 0;
  return compareStrings(JSON.stringify(a), JSON.stringify(b));
}

export function sortRecords<T extends DisplayRecord>(
  records: readonly T[],
  keyPaths: readonly string[],
  options: SortOptions = {},
): T[] {
  if (keyPaths.length === 0 || records.length === 0) return [...records];

  const available = options.availableFields ?? Object.keys(records[0]);
  const keyed = records.map((record, index) => {
    const keys = keyPaths.map((path) => {
      const hit = lookupField(record, path);
      if (!hit.found) throw new InvalidSortFieldError(path, [...available]);
      return hit.value;
    });
    return { record, keys, index };
  });

  const direction = options.reverse ? -1 : 1;
  keyed.sort((x, y) => {
    for (let i = 0; i < keyPaths.length; i++) {
      const cmp = compareValues(x.keys[i], y.keys[i], options.ordinals?.[keyPaths[i]]);
      if (cmp !== 0) return cmp * direction;
    }
    return x.index - y.index;
  });
  return keyed.map((entry) => entry.record);
}
