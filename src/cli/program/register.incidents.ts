import type { Command } from "commander";

import {
  DEFAULT_WATCH_SECONDS,
  ackIncidentsCommand,
  listIncidentsCommand,
  reassignIncidentsCommand,
  resolveIncidentsCommand,
  snoozeIncidentsCommand,
  type ListIncidentsOptions,
} from "../../commands/incidents.js";
import type { OutputMode } from "../../output/render.js";
import { DEFAULT_SNOOZE_SECONDS } from "../../pagerduty/types.js";
import type { RuleFailurePolicy } from "../../pipeline/rules.js";
import { DEFAULT_ALERT_LIMIT } from "../../pipeline/transforms.js";
import {
  addConfigOption,
  addListOutputOptions,
  parsePositiveInt,
  parseRuleFailurePolicy,
  runWithDeps,
  withAbortOnSignals,
  type ProgramContext,
} from "../cli-utils.js";

/** `inc ls` flags as commander names them. */
type IncidentListFlags = {
  output: OutputMode;
  fields?: string;
  everything?: boolean;
  user?: string;
  new?: boolean;
  ack?: boolean;
  snooze?: boolean;
  resolve?: boolean;
  high?: boolean;
  low?: boolean;
  watch?: boolean;
  timeout?: number;
  rules?: boolean;
  rulesPath?: string;
  rulesOnError?: RuleFailurePolicy;
  rulesTimeout?: number;
  regexp?: string;
  excludedRegexp?: string;
  alerts?: boolean;
  alertFields?: string;
  alertLimit?: number;
  serviceRe?: string;
  excludedServiceRe?: string;
  sort?: string;
  reverse?: boolean;
  teams?: string;
};

export function toListIncidentsOptions(flags: IncidentListFlags): ListIncidentsOptions {
  return {
    output: flags.output,
    fields: flags.fields,
    sort: flags.sort,
    reverse: flags.reverse,
    everything: flags.everything,
    user: flags.user,
    newOnly: flags.new,
    high: flags.high,
    low: flags.low,
    teams: flags.teams,
    regexp: flags.regexp,
    excludedRegexp: flags.excludedRegexp,
    serviceRe: flags.serviceRe,
    excludedServiceRe: flags.excludedServiceRe,
    rules: flags.rules,
    rulesPath: flags.rulesPath,
    rulesOnError: flags.rulesOnError,
    rulesTimeout: flags.rulesTimeout,
    alerts: flags.alerts,
    alertFields: flags.alertFields,
    alertLimit: flags.alertLimit,
    ack: flags.ack,
    resolve: flags.resolve,
    snooze: flags.snooze,
    watch: flags.watch,
    interval: flags.timeout,
  };
}

export function registerIncidentCommands(program: Command, ctx: ProgramContext) {
  const inc = addConfigOption(program.command("inc").description("PagerDuty incidents"));

  // -h is --high here.
  addListOutputOptions(inc.command("ls").description("List incidents, optionally acting on them").helpOption("--help"))
    .option("-e, --everything", "Incidents of every assignee")
    .option("-u, --user <user>", "Only incidents assigned to this user (name, email or id)")
    .option("-n, --new", "Only triggered incidents")
    .option("-a, --ack", "Acknowledge the listed incidents")
    .option("-s, --snooze", "Snooze the listed incidents for four hours")
    .option("-r, --resolve", "Resolve the listed incidents")
    .option("-h, --high", "Only high urgency")
    .option("-l, --low", "Only low urgency")
    .option("-w, --watch", "Repeat until interrupted")
    .option("-t, --timeout <seconds>", `Seconds between watch passes (default: ${DEFAULT_WATCH_SECONDS})`, parsePositiveInt)
    .option("--rules", "Pipe incidents through the rule scripts")
    .option("--rules-path <dir>", "Rule scripts directory")
    .option("--rules-on-error <policy>", "continue or abort", parseRuleFailurePolicy)
    .option("--rules-timeout <seconds>", "Kill a rule script after this many seconds", parsePositiveInt)
    .option("-R, --regexp <pattern>", "Keep incidents whose title matches")
    .option("--excluded-regexp <pattern>", "Drop incidents whose title matches")
    .option("--alerts", "Show the alerts of each incident")
    .option("--alert-fields <list>", "Alert fields to show")
    .option("--alert-limit <n>", `Alerts per incident (default: ${DEFAULT_ALERT_LIMIT})`, parsePositiveInt)
    .option("-S, --service-re <pattern>", "Keep incidents whose service matches")
    .option("--excluded-service-re <pattern>", "Drop incidents whose service matches")
    .option("--sort <fields>", "Sort by these comma-separated fields")
    .option("--reverse", "Reverse the sort order")
    .option("-T, --teams <teams>", "`mine` or comma-separated team ids")
    .action(async (_opts, command: Command) => {
      const opts = toListIncidentsOptions(command.opts<IncidentListFlags>());
      await runWithDeps(ctx, command, (deps) =>
        withAbortOnSignals((signal) => listIncidentsCommand(deps, opts, signal)),
      );
    });

  inc
    .command("ack")
    .description("Acknowledge incidents")
    .argument("<ids...>", "Incident ids")
    .action(async (ids: string[], _opts, command: Command) => {
      await runWithDeps(ctx, command, (deps) => ackIncidentsCommand(deps, ids));
    });

  inc
    .command("resolve")
    .description("Resolve incidents")
    .argument("<ids...>", "Incident ids")
    .action(async (ids: string[], _opts, command: Command) => {
      await runWithDeps(ctx, command, (deps) => resolveIncidentsCommand(deps, ids));
    });

  inc
    .command("snooze")
    .description("Snooze incidents")
    .argument("<ids...>", "Incident ids")
    .option("-d, --duration <seconds>", "Snooze duration", parsePositiveInt, DEFAULT_SNOOZE_SECONDS)
    .action(async (ids: string[], _opts, command: Command) => {
      const { duration } = command.opts<{ duration: number }>();
      await runWithDeps(ctx, command, (deps) => snoozeIncidentsCommand(deps, ids, duration));
    });

  inc
    .command("reassign")
    .description("Reassign incidents to a user")
    .argument("<ids...>", "Incident ids")
    .requiredOption("-u, --user <user>", "Name, email or id of the new assignee")
    .action(async (ids: string[], _opts, command: Command) => {
      const { user } = command.opts<{ user: string }>();
      await runWithDeps(ctx, command, (deps) => reassignIncidentsCommand(deps, ids, user));
    });
}
