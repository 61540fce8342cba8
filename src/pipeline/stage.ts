import type { DataRecord } from "./record.js";

/**
 * One step of the query loop between fetch and display. The loop threads the
 * output of each stage into the next and does not care how a stage works
 * (in-process filter, external rule script, ...).
 */
export interface PipelineStage {
  readonly name: string;
  apply(records: DataRecord[], signal?: AbortSignal): Promise<DataRecord[]>;
}
