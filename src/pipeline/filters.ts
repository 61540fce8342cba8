/**
 * Filter Engine
 *
 * Filters are named, pure predicates over records. `applyFilters` keeps a
 * record only when every filter accepts it; the result is always an ordered
 * subsequence of the input.
 *
 * Missing fields never raise: `inSet` and `regexMatches` reject the record,
 * `regexExcludes` keeps it.
 */

import { InvalidPatternError } from "../errors.js";
import type { PipelineStage } from "./stage.js";
import { lookupPath, stringifyValue, type DataRecord, type JsonPrimitive } from "./record.js";

export type RecordFilter = {
  readonly name: string;
  readonly test: (record: DataRecord) => boolean;
};

// ---------------------------------------------------------------------------
// Constructors
// ---------------------------------------------------------------------------

/**
 * Compile a pattern up front. `g` and `y` are dropped because they make
 * `RegExp.test` stateful across records.
 */
export function compilePattern(pattern: string | RegExp): RegExp {
  if (pattern instanceof RegExp) {
    return new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ""));
  }
  try {
    return new RegExp(pattern);
  } catch (err) {
    throw new InvalidPatternError(pattern, err instanceof Error ? err.message : String(err));
  }
}

/**
 * Field value is one of `allowed`. Comparison is case-sensitive on the
 * stringified value (`1` and `"1"` are equal, `"High"` and `"high"` are not).
 */
export function inSet(path: string, allowed: Iterable<JsonPrimitive>): RecordFilter {
  const members = new Set<string>();
  for (const value of allowed) members.add(stringifyValue(value));
  return {
    name: `${path} in [${[...members].join(", ")}]`,
    test: (record) => {
      const hit = lookupPath(record, path);
      return hit.found && members.has(stringifyValue(hit.value));
    },
  };
}

/** Stringified field value contains a match for `pattern` (search, not full match). */
export function regexMatches(path: string, pattern: string | RegExp): RecordFilter {
  const re = compilePattern(pattern);
  return {
    name: `${path} =~ /${re.source}/`,
    test: (record) => {
      const hit = lookupPath(record, path);
      return hit.found && re.test(stringifyValue(hit.value));
    },
  };
}

/** Negation of `regexMatches`; a record without the field is kept. */
export function regexExcludes(path: string, pattern: string | RegExp): RecordFilter {
  const matches = regexMatches(path, pattern);
  return {
    name: `${path} !~ /${compilePattern(pattern).source}/`,
    test: (record) => !matches.test(record),
  };
}

// ---------------------------------------------------------------------------
// Application
// ---------------------------------------------------------------------------

export function applyFilters<T extends DataRecord>(
  records: readonly T[],
  filters: readonly RecordFilter[],
): T[] {
  if (filters.length === 0) return [...records];
  return records.filter((record) => filters.every((filter) => filter.test(record)));
}

/** A filter list as a pipeline stage. */
export class FilterStage implements PipelineStage {
  readonly name: string;
  private readonly filters: readonly RecordFilter[];

  constructor(filters: readonly RecordFilter[], name?: string) {
    this.filters = filters;
    this.name = name ?? `filter(${filters.map((f) => f.name).join(" && ")})`;
  }

  async apply(records: DataRecord[]): Promise<DataRecord[]> {
    return applyFilters(records, this.filters);
  }
}
