/**
 * Renderer: serialises a record sequence to stdout in one of the output
 * modes. Styling only reaches the table; json/yaml/raw print display text.
 */

import { stringify as toYaml } from "yaml";
import type { RuntimeEnv } from "../runtime.js";
import {
  lookupField,
  stringifyValue,
  toPlainRecord,
  type DisplayRecord,
} from "../pipeline/record.js";
import { formatTable } from "./table.js";

export const OUTPUT_MODES = ["table", "json", "yaml", "raw", "plain"] as const;
export type OutputMode = (typeof OUTPUT_MODES)[number];

export function isOutputMode(value: string): value is OutputMode {
  return OUTPUT_MODES.some((mode) => mode === value);
}

/** Modes whose stdout must stay machine-readable. */
export function isStructuredMode(mode: OutputMode): boolean {
  return mode === "json" || mode === "yaml";
}

export type PlainPrint = (record: DisplayRecord, columns: readonly string[]) => string;

export type RenderOptions = {
  mode: OutputMode;
  /** Column order for table/plain. Defaults to the keys in first-seen order. */
  columns?: readonly string[];
  plainPrint?: PlainPrint;
};

export interface Renderer {
  render(records: readonly DisplayRecord[], options: RenderOptions): void;
  clear(): void;
}

export function inferColumns(records: readonly DisplayRecord[]): string[] {
  const seen = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record)) seen.add(key);
  }
  return [...seen];
}

/** Tab-separated column values. */
export const defaultPlainPrint: PlainPrint = (record, columns) =>
  columns
    .map((column) => {
      const hit = lookupField(record, column);
      return hit.found ? stringifyValue(hit.value) : "";
    })
    .join("\t");

export function createRenderer(runtime: RuntimeEnv, options: { colors?: boolean } = {}): Renderer {
  const colors = options.colors ?? false;

  return {
    render(records, { mode, columns, plainPrint }) {
      switch (mode) {
        case "json":
        case "raw":
          runtime.log(JSON.stringify(records.map(toPlainRecord), null, 2));
          return;
        case "yaml":
          runtime.log(toYaml(records.map(toPlainRecord)).trimEnd());
          return;
        case "plain": {
          const cols = columns ?? inferColumns(records);
          const print = plainPrint ?? defaultPlainPrint;
          for (const record of records) runtime.log(print(record, cols));
          return;
        }
        case "table": {
          if (records.length === 0) {
            runtime.log("(none)");
            return;
          }
          runtime.log(formatTable(records, columns ?? inferColumns(records), { colors }));
          return;
        }
      }
    },
    clear() {
      runtime.clear();
    },
  };
}
