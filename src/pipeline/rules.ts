/**
 * Rule Executor
 *
 * Rules are executable files under a rules directory. Each one receives the
 * current record sequence on stdin and prints the replacement sequence on
 * stdout. Scripts run one at a time in discovery order; the output of one is
 * the input of the next.
 *
 * Protocol v1:
 *   - stdin:  NDJSON, one record (JSON object) per line
 *   - stdout: NDJSON, same shape; blank lines are ignored
 *   - exit 0 = success; anything else is a failure, stderr is the detail
 *   - env:    PDCTL_RULES_PROTOCOL=1
 */

import { spawn } from "node:child_process";
import fs from "node:fs/promises";
import path from "node:path";

import { RuleExecutionError, formatErrorMessage } from "../errors.js";
import { silentLogger, type Logger } from "../logging/logger.js";
import { resolveUserPath } from "../utils.js";
import type { PipelineStage } from "./stage.js";
import { isJsonObject, type DataRecord } from "./record.js";

export const RULES_PROTOCOL_VERSION = 1;
export const RULES_PROTOCOL_ENV = "PDCTL_RULES_PROTOCOL";

/**
 * `abort`: the first failure ends the rule pass and the input sequence is
 * used as if no rule had run. `continue`: the failing script is skipped and
 * the last good sequence goes to the next script.
 */
export type RuleFailurePolicy = "abort" | "continue";

export const RULE_FAILURE_POLICIES: readonly RuleFailurePolicy[] = ["abort", "continue"];

export type RuleFailure = {
  script: string;
  detail: string;
};

export type RuleRunResult =
  | { ok: true; records: DataRecord[]; applied: string[]; failed: RuleFailure[] }
  | { ok: false; records: DataRecord[]; applied: string[]; error: RuleFailure };

export type RuleRunOptions = {
  onSuccess?: (script: string) => void;
  onError?: (script: string, detail: string) => void;
  policy?: RuleFailurePolicy;
  /** Kill a script that runs longer than this. */
  timeoutMs?: number;
  env?: Record<string, string>;
  signal?: AbortSignal;
  logger?: Logger;
};

// ---------------------------------------------------------------------------
// Interchange
// ---------------------------------------------------------------------------

export function encodeRecords(records: readonly DataRecord[]): string {
  return records.map((record) => `${JSON.stringify(record)}\n`).join("");
}

export function decodeRecords(text: string): DataRecord[] {
  const records: DataRecord[] = [];
  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (!line) continue;
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch (err) {
      throw new Error(`output line ${i + 1} is not valid JSON: ${formatErrorMessage(err)}`);
    }
    if (!isJsonObject(parsed)) {
      throw new Error(`output line ${i + 1} is not a JSON object`);
    }
    records.push(parsed);
  }
  return records;
}

// ---------------------------------------------------------------------------
// Discovery
// ---------------------------------------------------------------------------

async function isExecutableFile(file: string): Promise<boolean> {
  try {
    const stat = await fs.stat(file);
    if (!stat.isFile()) return false;
    await fs.access(file, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Executable regular files under `dir`, recursively. Entries are visited in
 * name order so the run order does not depend on the filesystem. A missing
 * directory yields no rules.
 */
export async function discoverRules(dir: string): Promise<string[]> {
  const root = resolveUserPath(dir);
  const found: string[] = [];

  const walk = async (current: string): Promise<void> => {
    let entries;
    try {
      entries = await fs.readdir(current, { withFileTypes: true });
    } catch {
      return;
    }
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    for (const entry of entries) {
      const full = path.join(current, entry.name);
      if (entry.isDirectory()) {
        await walk(full);
      } else if (await isExecutableFile(full)) {
        found.push(full);
      }
    }
  };

  await walk(root);
  return found;
}

// ---------------------------------------------------------------------------
// Execution
// ---------------------------------------------------------------------------

/** Run one script over `records`. Rejects with RuleExecutionError. */
export function runRule(
  script: string,
  records: readonly DataRecord[],
  options: Pick<RuleRunOptions, "timeoutMs" | "env" | "signal"> = {},
): Promise<DataRecord[]> {
  return new Promise((resolve, reject) => {
    const child = spawn(script, [], {
      stdio: ["pipe", "pipe", "pipe"],
      env: { ...process.env, ...options.env, [RULES_PROTOCOL_ENV]: String(RULES_PROTOCOL_VERSION) },
      signal: options.signal,
    });

    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    let settled = false;

    const settle = (err: RuleExecutionError | null, result?: DataRecord[]) => {
      if (settled) return;
      settled = true;
      if (timer) clearTimeout(timer);
      if (err) reject(err);
      else resolve(result ?? []);
    };

    const timer =
      options.timeoutMs !== undefined
        ? setTimeout(() => {
            child.kill("SIGKILL");
            settle(new RuleExecutionError(script, `timed out after ${options.timeoutMs}ms`));
          }, options.timeoutMs)
        : undefined;

    child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

    child.on("error", (err) => settle(new RuleExecutionError(script, err.message)));

    child.on("close", (code: number | null, signal: NodeJS.Signals | null) => {
      if (code !== 0) {
        const message = Buffer.concat(stderr).toString("utf8").trim();
        const status = code === null ? `killed by ${signal ?? "signal"}` : `exited with code ${code}`;
        settle(new RuleExecutionError(script, message ? `${status}: ${message}` : status));
        return;
      }
      try {
        settle(null, decodeRecords(Buffer.concat(stdout).toString("utf8")));
      } catch (err) {
        settle(new RuleExecutionError(script, formatErrorMessage(err)));
      }
    });

    // A script may exit without reading its input.
    child.stdin.on("error", (err: NodeJS.ErrnoException) => {
      if (err.code !== "EPIPE") settle(new RuleExecutionError(script, err.message));
    });
    child.stdin.end(encodeRecords(records));
  });
}

/**
 * Thread `records` through `scripts` in order. Never runs two scripts at once
 * and never retries.
 */
export async function applyRules(
  records: readonly DataRecord[],
  scripts: readonly string[],
  options: RuleRunOptions = {},
): Promise<RuleRunResult> {
  const logger = options.logger ?? silentLogger;
  const policy = options.policy ?? "abort";
  const applied: string[] = [];
  const failed: RuleFailure[] = [];
  let current: DataRecord[] = [...records];

  for (const script of scripts) {
    logger.debug(`running rule ${script}`, { records: current.length });
    try {
      current = await runRule(script, current, options);
      applied.push(script);
      options.onSuccess?.(script);
    } catch (err) {
      if (options.signal?.aborted) throw err;
      const detail = err instanceof RuleExecutionError ? err.detail : formatErrorMessage(err);
      const failure = { script, detail };
      logger.warn(`rule failed: ${script}`, { detail, policy });
      options.onError?.(script, detail);
      if (policy === "abort") {
        return { ok: false, records: [...records], applied, error: failure };
      }
      failed.push(failure);
    }
  }

  return { ok: true, records: current, applied, failed };
}

// ---------------------------------------------------------------------------
// Pipeline adapter
// ---------------------------------------------------------------------------

export type RuleStageOptions = Omit<RuleRunOptions, "signal"> & {
  rulesPath: string;
  /** Called when discovery finds nothing, so the caller can warn the user. */
  onEmpty?: (rulesPath: string) => void;
};

/** Discovers scripts on every pass and runs them as one pipeline stage. */
export class RuleStage implements PipelineStage {
  readonly name = "rules";
  private readonly options: RuleStageOptions;

  constructor(options: RuleStageOptions) {
    this.options = options;
  }

  async apply(records: DataRecord[], signal?: AbortSignal): Promise<DataRecord[]> {
    const scripts = await discoverRules(this.options.rulesPath);
    if (scripts.length === 0) {
      this.options.onEmpty?.(resolveUserPath(this.options.rulesPath));
      return records;
    }
    const result = await applyRules(records, scripts, { ...this.options, signal });
    return result.records;
  }
}
