/**
 * Column-aligned table for terminal output. Cells may span several lines
 * (nested alerts, multi-line text); styles are applied after padding so
 * escape codes never affect alignment.
 */

import { colorize } from "../terminal/theme.js";
import {
  isDecorated,
  lookupField,
  stringifyValue,
  type DisplayRecord,
  type DisplayValue,
  type StyleName,
} from "../pipeline/record.js";

type Segment = { text: string; style?: StyleName };
type Line = Segment[];

export type TableOptions = {
  colors?: boolean;
};

const CELL_SEPARATOR = "  ";

function lineWidth(line: Line): number {
  return line.reduce((n, seg) => n + seg.text.length, 0);
}

function textLines(text: string, style?: StyleName): Line[] {
  return text.split(/\r?\n/).map((part) => [{ text: part, style }]);
}

/** One line for a nested record: its values side by side. */
function inlineRecord(record: DisplayRecord): Line {
  const line: Line = [];
  for (const value of Object.values(record)) {
    if (line.length > 0) line.push({ text: CELL_SEPARATOR });
    if (isDecorated(value)) {
      line.push({ text: value.text, style: value.style });
    } else {
      line.push({ text: value === null ? "" : stringifyValue(value).replace(/\r?\n/g, " ") });
    }
  }
  return line;
}

export function cellLines(value: DisplayValue): Line[] {
  if (value === null) return [[]];
  if (isDecorated(value)) return textLines(value.text, value.style);
  if (Array.isArray(value)) {
    if (value.length === 0) return [[]];
    return value.flatMap((item): Line[] => {
      if (item !== null && typeof item === "object" && !Array.isArray(item) && !isDecorated(item)) {
        return [inlineRecord(item)];
      }
      return cellLines(item);
    });
  }
  return textLines(stringifyValue(value));
}

function renderLine(line: Line, width: number, colors: boolean): string {
  const body = line.map((seg) => (seg.style ? colorize(seg.style, seg.text, colors) : seg.text)).join("");
  return body + " ".repeat(Math.max(0, width - lineWidth(line)));
}

export function formatTable(
  records: readonly DisplayRecord[],
  columns: readonly string[],
  options: TableOptions = {},
): string {
  const colors = options.colors ?? false;

  const rows = records.map((record) =>
    columns.map((column) => {
      const hit = lookupField(record, column);
      return hit.found ? cellLines(hit.value) : [[]];
    }),
  );

  const widths = columns.map((column, i) =>
    Math.max(column.length, ...rows.flatMap((row) => row[i].map(lineWidth))),
  );

  const formatRow = (cells: string[]) => cells.map((cell) => ` ${cell} `).join("│").trimEnd();

  const out: string[] = [];
  out.push(formatRow(columns.map((column, i) => colorize("bold", column.padEnd(widths[i]), colors))));
  out.push(widths.map((w) => "─".repeat(w + 2)).join("┼"));

  for (const row of rows) {
    const height = Math.max(1, ...row.map((cell) => cell.length));
    for (let lineNo = 0; lineNo < height; lineNo++) {
      out.push(formatRow(row.map((cell, i) => renderLine(cell[lineNo] ?? [], widths[i], colors))));
    }
  }
  return out.join("\n");
}
