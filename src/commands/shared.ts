import type { PdctlConfig } from "../config/config.js";
import type { Logger } from "../logging/logger.js";
import type { OutputMode, Renderer } from "../output/render.js";
import type { IncidentClient } from "../pagerduty/types.js";
import { buildTransformationSpec, outputFieldName, type FieldRegistry } from "../pipeline/fields.js";
import type { DataRecord } from "../pipeline/record.js";
import { sortRecords, type OrdinalTable } from "../pipeline/sort.js";
import { applyTransformations } from "../pipeline/transforms.js";
import type { RuntimeEnv } from "../runtime.js";
import type { Theme } from "../terminal/theme.js";
import { splitList } from "../utils.js";

/** Everything a command needs, built once by the CLI layer. */
export type CommandDeps = {
  config: PdctlConfig;
  client: IncidentClient;
  runtime: RuntimeEnv;
  renderer: Renderer;
  logger: Logger;
  theme: Theme;
};

export type ListOutputOptions = {
  output: OutputMode;
  /** Comma-separated field list from `-f`. */
  fields?: string;
};

export type ListSortOptions = {
  /** Comma-separated sort keys from `--sort`. */
  sort?: string;
  reverse?: boolean;
};

/** `-f` value as a field list; field names are case-insensitive. */
export function parseFields(value: string | undefined, defaults: readonly string[]): string[] {
  const fields = splitList(value, { lowercase: true });
  return fields.length > 0 ? fields : [...defaults];
}

/**
 * Project, sort and render a fetched list. Raw mode skips projection and
 * sorts the records as fetched.
 */
export async function showRecords(
  deps: CommandDeps,
  records: readonly DataRecord[],
  options: {
    output: OutputMode;
    fields: readonly string[];
    registry: FieldRegistry;
    sort?: ListSortOptions;
    ordinals?: OrdinalTable;
  },
): Promise<void> {
  const sortFields = splitList(options.sort?.sort);
  const sortOptions = { reverse: options.sort?.reverse, ordinals: options.ordinals };

  if (options.output === "raw") {
    deps.renderer.render(sortRecords(records, sortFields, sortOptions), { mode: "raw" });
    return;
  }

  const { spec, columns } = buildTransformationSpec(options.fields, options.registry);
  const displayed = await applyTransformations(records, spec);
  const displayedSortFields = sortFields.map((field) => outputFieldName(field, options.registry));
  deps.renderer.render(sortRecords(displayed, displayedSortFields, { ...sortOptions, availableFields: columns }), {
    mode: options.output,
    columns,
  });
}
