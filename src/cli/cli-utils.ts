import { InvalidArgumentError, type Command } from "commander";

import type { ConfigCommandDeps } from "../commands/config.js";
import type { CommandDeps } from "../commands/shared.js";
import { ConfigurationError, formatErrorMessage } from "../errors.js";
import { isOutputMode, OUTPUT_MODES, type OutputMode } from "../output/render.js";
import { PagerDutyApiError } from "../pagerduty/errors.js";
import { RULE_FAILURE_POLICIES, type RuleFailurePolicy } from "../pipeline/rules.js";
import type { RuntimeEnv } from "../runtime.js";
import { theme } from "../terminal/theme.js";

export const EXIT_FAILURE = 1;
export const EXIT_CONFIG = 2;

/** Options every command sees through `optsWithGlobals()`. */
export type GlobalOptions = {
  config?: string;
  verbose?: boolean;
};

export type DepsRequest = GlobalOptions;

export type ProgramContext = {
  runtime: RuntimeEnv;
  /** Builds the command dependencies once config and flags are known. */
  loadDeps: (request: DepsRequest) => CommandDeps;
  /** Prompt and file locations for `pdctl config`. */
  configDeps?: ConfigCommandDeps;
};

/**
 * Command boundary: configuration problems exit 2 with their hint, remote
 * and unexpected failures exit 1.
 */
export async function runCommandWithRuntime(runtime: RuntimeEnv, action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (err) {
    if (err instanceof ConfigurationError) {
      runtime.error(theme.error(err.message));
      if (err.hint) runtime.error(theme.muted(err.hint));
      runtime.exit(EXIT_CONFIG);
      return;
    }
    if (err instanceof PagerDutyApiError) {
      runtime.error(theme.error(err.message));
      runtime.exit(EXIT_FAILURE);
      return;
    }
    runtime.error(theme.error(formatErrorMessage(err)));
    runtime.exit(EXIT_FAILURE);
  }
}

/** Load deps for `command`, run `action`, and flush the logger afterwards. */
export async function runWithDeps(
  ctx: ProgramContext,
  command: Command,
  action: (deps: CommandDeps) => Promise<void>,
): Promise<void> {
  const globals = command.optsWithGlobals<GlobalOptions>();
  await runCommandWithRuntime(ctx.runtime, async () => {
    const deps = ctx.loadDeps({ config: globals.config, verbose: globals.verbose });
    try {
      await action(deps);
    } finally {
      await deps.logger.close();
    }
  });
}

/** AbortSignal that fires on SIGINT/SIGTERM while `run` is in progress. */
export async function withAbortOnSignals(run: (signal: AbortSignal) => Promise<void>): Promise<void> {
  const controller = new AbortController();
  const onSignal = () => controller.abort();
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);
  try {
    await run(controller.signal);
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
  }
}

// ---------------------------------------------------------------------------
// Option parsers
// ---------------------------------------------------------------------------

export function parseOutputMode(value: string): OutputMode {
  const mode = value.trim().toLowerCase();
  if (!isOutputMode(mode)) {
    throw new InvalidArgumentError(`Expected one of: ${OUTPUT_MODES.join(", ")}.`);
  }
  return mode;
}

export function parseRuleFailurePolicy(value: string): RuleFailurePolicy {
  const policy = RULE_FAILURE_POLICIES.find((candidate) => candidate === value.trim().toLowerCase());
  if (!policy) {
    throw new InvalidArgumentError(`Expected one of: ${RULE_FAILURE_POLICIES.join(", ")}.`);
  }
  return policy;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

/** `-c/--config` on a command group. */
export function addConfigOption(command: Command): Command {
  return command.option("-c, --config <path>", "Config file (default: $PDCTL_CONFIG or ~/.config/pdctl.yaml)");
}

/** `-o/--output` and `-f/--fields` shared by the list commands. */
export function addListOutputOptions(command: Command): Command {
  return command
    .option("-o, --output <mode>", `Output mode: ${OUTPUT_MODES.join(", ")}`, parseOutputMode, "table")
    .option("-f, --fields <list>", "Comma-separated fields to show");
}
