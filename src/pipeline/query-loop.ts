/**
 * Query Loop
 *
 * One pass: fetch → stages (rules, filters) → display transform → sort →
 * render → bulk actions. Actions always target the records as they left the
 * stages, never the display projection.
 *
 * In watch mode the loop sleeps, clears the screen and runs another pass
 * until the signal aborts. The signal is checked after every stage and
 * again before rendering and acting, so an aborted pass neither renders nor
 * mutates anything. `run` treats that abort as a clean stop.
 */

import { setTimeout as sleep } from "node:timers/promises";

import { silentLogger, type Logger } from "../logging/logger.js";
import type { Renderer, OutputMode } from "../output/render.js";
import { isStructuredMode } from "../output/render.js";
import type { IncidentClient, IncidentQuery } from "../pagerduty/types.js";
import { DEFAULT_SNOOZE_SECONDS } from "../pagerduty/types.js";
import type { RuntimeEnv } from "../runtime.js";
import { formatDuration } from "../utils.js";
import type { BuiltSpec } from "./fields.js";
import { recordIds, type DataRecord, type DisplayRecord } from "./record.js";
import { sortRecords, type OrdinalTable } from "./sort.js";
import type { PipelineStage } from "./stage.js";
import { applyTransformations, attachAlerts, type AlertFetcher } from "./transforms.js";

export type IncidentActions = {
  acknowledge?: boolean;
  resolve?: boolean;
  /** Snooze for this many seconds. */
  snooze?: number;
  /** Reassign to these user ids. */
  reassign?: string[];
};

export type SortSettings = {
  fields: string[];
  reverse?: boolean;
  ordinals?: OrdinalTable;
};

export type QueryLoopOptions = {
  client: IncidentClient;
  query: IncidentQuery;
  renderer: Renderer;
  /** Where action confirmations go. */
  runtime: RuntimeEnv;
  output: OutputMode;
  /** Display projection; ignored in raw mode. */
  display: BuiltSpec;
  stages?: PipelineStage[];
  /** Raw mode only: attach each incident's raw alerts. */
  rawAlerts?: { fetchAlerts: AlertFetcher; limit?: number };
  sort?: SortSettings;
  actions?: IncidentActions;
  /** Re-run every `intervalMs` until aborted. */
  watch?: { intervalMs: number };
  concurrency?: number;
  logger?: Logger;
};

export type PassResult = {
  /** Records after the stages: what the actions were applied to. */
  records: DataRecord[];
  displayed: DisplayRecord[];
};

export class QueryLoop {
  private readonly options: QueryLoopOptions;
  private readonly logger: Logger;

  constructor(options: QueryLoopOptions) {
    this.options = options;
    this.logger = options.logger ?? silentLogger;
  }

  async runOnce(signal?: AbortSignal): Promise<PassResult> {
    const { client, query, output, display } = this.options;

    let records = await client.listIncidents(query);
    this.logger.debug("fetched incidents", { count: records.length });

    for (const stage of this.options.stages ?? []) {
      records = await stage.apply(records, signal);
      signal?.throwIfAborted();
      this.logger.debug(`stage ${stage.name}`, { count: records.length });
    }

    let displayed: DisplayRecord[];
    let available: string[];
    if (output === "raw") {
      const raw = this.options.rawAlerts;
      displayed = raw
        ? await applyTransformations(
            records,
            { alerts: attachAlerts(raw.fetchAlerts, { limit: raw.limit }) },
            { preserve: true, concurrency: this.options.concurrency },
          )
        : records;
      available = records.length > 0 ? Object.keys(records[0]) : [];
    } else {
      displayed = await applyTransformations(records, display.spec, { concurrency: this.options.concurrency });
      available = display.columns;
    }

    const sort = this.options.sort;
    if (sort && sort.fields.length > 0) {
      displayed = sortRecords(displayed, sort.fields, {
        reverse: sort.reverse,
        ordinals: sort.ordinals,
        availableFields: available,
      });
    }

    signal?.throwIfAborted();
    this.options.renderer.render(displayed, {
      mode: output,
      columns: output === "raw" ? undefined : display.columns,
    });

    signal?.throwIfAborted();
    await this.applyActions(records);
    return { records, displayed };
  }

  async run(signal?: AbortSignal): Promise<void> {
    const watch = this.options.watch;
    for (;;) {
      if (signal?.aborted) return;
      try {
        await this.runOnce(signal);
      } catch (err) {
        if (signal?.aborted) return;
        throw err;
      }
      if (!watch) return;
      try {
        await sleep(watch.intervalMs, undefined, { signal });
      } catch (err) {
        if (signal?.aborted) return;
        throw err;
      }
      this.options.renderer.clear();
    }
  }

  private async applyActions(records: DataRecord[]): Promise<void> {
    const actions = this.options.actions;
    if (!actions) return;
    const { client, runtime } = this.options;
    const ids = recordIds(records);
    const quiet = isStructuredMode(this.options.output);
    const report = (line: (id: string) => string) => {
      if (quiet) return;
      for (const id of ids) runtime.log(line(id));
    };

    if (actions.acknowledge) {
      await client.acknowledge(records);
      report((id) => `Marked ${id} as ACK`);
    }
    if (actions.snooze !== undefined) {
      const seconds = actions.snooze > 0 ? actions.snooze : DEFAULT_SNOOZE_SECONDS;
      await client.snooze(records, seconds);
      report((id) => `Snoozing incident ${id} for ${formatDuration(seconds)}`);
    }
    if (actions.resolve) {
      await client.resolve(records);
      report((id) => `Mark ${id} as RESOLVED`);
    }
    const reassign = actions.reassign;
    if (reassign && reassign.length > 0) {
      await client.reassign(records, reassign);
      report((id) => `Reassign incident ${id} to ${reassign.join(", ")}`);
    }
  }
}
