/**
 * Incident commands: `inc ls` (the query loop) and the per-id actions.
 */

import { ConfigurationError } from "../errors.js";
import {
  DEFAULT_SNOOZE_SECONDS,
  DEFAULT_URGENCIES,
  STATUS_ACK,
  STATUS_TRIGGERED,
  URGENCY_HIGH,
  URGENCY_LOW,
  type IncidentQuery,
  type IncidentStatus,
  type IncidentUrgency,
} from "../pagerduty/types.js";
import {
  DEFAULT_ALERT_FIELDS,
  DEFAULT_INCIDENT_FIELDS,
  INCIDENT_ORDINALS,
  buildTransformationSpec,
  incidentFieldRegistry,
  outputFieldName,
} from "../pipeline/fields.js";
import { FilterStage, applyFilters, inSet, regexExcludes, regexMatches } from "../pipeline/filters.js";
import { QueryLoop, type IncidentActions } from "../pipeline/query-loop.js";
import { recordIds, stringifyValue, type DataRecord } from "../pipeline/record.js";
import { RuleStage, type RuleFailurePolicy, type RuleStageOptions } from "../pipeline/rules.js";
import type { PipelineStage } from "../pipeline/stage.js";
import { DEFAULT_ALERT_LIMIT, type AlertFetcher } from "../pipeline/transforms.js";
import { formatDuration, splitList } from "../utils.js";
import { myTeams } from "./teams.js";
import { findUsers } from "./users.js";
import { parseFields, type CommandDeps, type ListOutputOptions, type ListSortOptions } from "./shared.js";

export const DEFAULT_WATCH_SECONDS = 5;

export type ListIncidentsOptions = ListOutputOptions &
  ListSortOptions & {
    /** Every assignee, not only the configured user. */
    everything?: boolean;
    /** Only incidents assigned to this user (name, email or id). */
    user?: string;
    /** Only triggered incidents. */
    newOnly?: boolean;
    high?: boolean;
    low?: boolean;
    /** `mine` or comma-separated team ids. */
    teams?: string;

    regexp?: string;
    excludedRegexp?: string;
    serviceRe?: string;
    excludedServiceRe?: string;

    rules?: boolean;
    rulesPath?: string;
    rulesOnError?: RuleFailurePolicy;
    /** Seconds before a rule script is killed. */
    rulesTimeout?: number;

    alerts?: boolean;
    alertFields?: string;
    alertLimit?: number;

    ack?: boolean;
    resolve?: boolean;
    snooze?: boolean;

    watch?: boolean;
    /** Seconds between passes in watch mode. */
    interval?: number;
  };

async function resolveUserIds(deps: CommandDeps, user: string): Promise<string[]> {
  const ids = recordIds(await findUsers(deps, user));
  if (ids.length === 0) {
    throw new ConfigurationError(`No user matches "${user}"`, "Try `pdctl user ls` to see the available users.");
  }
  return ids;
}

export async function buildIncidentQuery(deps: CommandDeps, opts: ListIncidentsOptions): Promise<IncidentQuery> {
  const statuses: IncidentStatus[] = opts.newOnly ? [STATUS_TRIGGERED] : [STATUS_TRIGGERED, STATUS_ACK];

  let urgencies: IncidentUrgency[] = [...DEFAULT_URGENCIES];
  if (opts.high) urgencies = [URGENCY_HIGH];
  if (opts.low) urgencies = [URGENCY_LOW];

  let userIds: string[] | undefined;
  if (opts.user) userIds = await resolveUserIds(deps, opts.user);
  else if (!opts.everything) userIds = [deps.config.uid];

  let teamIds: string[] | undefined;
  if (opts.teams === "mine") teamIds = recordIds(await myTeams(deps));
  else if (opts.teams) teamIds = splitList(opts.teams);

  return { statuses, urgencies, userIds, teamIds };
}

/** Rule stage settings: flags first, then the config file. */
export function ruleStageOptions(deps: CommandDeps, opts: ListIncidentsOptions): RuleStageOptions {
  const { runtime, theme } = deps;
  const timeout = opts.rulesTimeout ?? deps.config.rulesTimeout;
  return {
    rulesPath: opts.rulesPath ?? deps.config.rulesPath,
    policy: opts.rulesOnError ?? deps.config.rulesOnError,
    timeoutMs: timeout !== undefined ? timeout * 1000 : undefined,
    logger: deps.logger.child("rules"),
    onEmpty: (dir) => runtime.error(theme.warn(`No rules found in ${dir}`)),
    onSuccess: (script) => runtime.error(`${theme.success("Applied rule:")} ${script}`),
    onError: (script, detail) => runtime.error(`${theme.error("Error:")} ${script}: ${detail}`),
  };
}

function buildStages(deps: CommandDeps, opts: ListIncidentsOptions): PipelineStage[] {
  const stages: PipelineStage[] = [];

  if (opts.rules) stages.push(new RuleStage(ruleStageOptions(deps, opts)));

  // Patterns compile here, before anything is fetched.
  if (opts.regexp) stages.push(new FilterStage([regexMatches("title", opts.regexp)], "title"));
  if (opts.excludedRegexp) stages.push(new FilterStage([regexExcludes("title", opts.excludedRegexp)], "!title"));
  if (opts.serviceRe) stages.push(new FilterStage([regexMatches("service.summary", opts.serviceRe)], "service"));
  if (opts.excludedServiceRe) {
    stages.push(new FilterStage([regexExcludes("service.summary", opts.excludedServiceRe)], "!service"));
  }
  return stages;
}

export async function listIncidentsCommand(
  deps: CommandDeps,
  opts: ListIncidentsOptions,
  signal?: AbortSignal,
): Promise<void> {
  const stages = buildStages(deps, opts);

  const fields = parseFields(opts.fields, DEFAULT_INCIDENT_FIELDS);
  if (opts.alerts && !fields.includes("alerts")) fields.push("alerts");
  const alertLimit = opts.alertLimit ?? DEFAULT_ALERT_LIMIT;
  const fetchAlerts: AlertFetcher = (id) => deps.client.listAlerts(id, { limit: alertLimit });

  const registry = incidentFieldRegistry({
    timeZone: deps.config.timeZone,
    fetchAlerts: opts.alerts ? fetchAlerts : undefined,
    alertFields: parseFields(opts.alertFields, DEFAULT_ALERT_FIELDS),
    alertLimit,
  });
  const display = buildTransformationSpec(fields, registry);
  // Sort keys name fields; the projection may have renamed their columns.
  const sortFields = splitList(opts.sort).map((field) =>
    opts.output === "raw" ? field : outputFieldName(field, registry),
  );

  const actions: IncidentActions = {
    acknowledge: opts.ack,
    resolve: opts.resolve,
    snooze: opts.snooze ? DEFAULT_SNOOZE_SECONDS : undefined,
  };

  const loop = new QueryLoop({
    client: deps.client,
    query: await buildIncidentQuery(deps, opts),
    renderer: deps.renderer,
    runtime: deps.runtime,
    output: opts.output,
    display,
    stages,
    rawAlerts: opts.alerts ? { fetchAlerts, limit: alertLimit } : undefined,
    sort: { fields: sortFields, reverse: opts.reverse, ordinals: INCIDENT_ORDINALS },
    actions,
    watch: opts.watch ? { intervalMs: (opts.interval ?? DEFAULT_WATCH_SECONDS) * 1000 } : undefined,
    logger: deps.logger.child("loop"),
  });
  await loop.run(signal);
}

// ---------------------------------------------------------------------------
// Per-id actions
// ---------------------------------------------------------------------------

/** Open incidents (any assignee) whose id is in `ids`. */
async function findIncidents(deps: CommandDeps, ids: readonly string[]): Promise<DataRecord[]> {
  const open = await deps.client.listIncidents({
    statuses: [STATUS_TRIGGERED, STATUS_ACK],
    urgencies: [...DEFAULT_URGENCIES],
  });
  const found = applyFilters(open, [inSet("id", ids)]);
  const missing = ids.filter((id) => !found.some((incident) => incident.id === id));
  if (missing.length > 0) {
    deps.runtime.error(deps.theme.warn(`Not found or not open: ${missing.join(", ")}`));
  }
  return found;
}

function titleOf(incident: DataRecord): string {
  return typeof incident.title === "string" ? incident.title : stringifyValue(incident.title ?? null);
}

export async function ackIncidentsCommand(deps: CommandDeps, ids: readonly string[]): Promise<void> {
  const incidents = await findIncidents(deps, ids);
  for (const incident of incidents) {
    deps.runtime.log(`${deps.theme.warn("✔")} ${String(incident.id)} ${deps.theme.muted(titleOf(incident))}`);
  }
  await deps.client.acknowledge(incidents);
}

export async function resolveIncidentsCommand(deps: CommandDeps, ids: readonly string[]): Promise<void> {
  const incidents = await findIncidents(deps, ids);
  for (const incident of incidents) {
    deps.runtime.log(`${deps.theme.success("✅")} ${String(incident.id)} ${deps.theme.muted(titleOf(incident))}`);
  }
  await deps.client.resolve(incidents);
}

export async function snoozeIncidentsCommand(
  deps: CommandDeps,
  ids: readonly string[],
  durationSeconds: number = DEFAULT_SNOOZE_SECONDS,
): Promise<void> {
  if (!Number.isInteger(durationSeconds) || durationSeconds <= 0) {
    throw new ConfigurationError(`Invalid snooze duration: ${durationSeconds}`, "Pass a positive number of seconds.");
  }
  const incidents = await findIncidents(deps, ids);
  for (const id of recordIds(incidents)) {
    deps.runtime.log(`Snoozing incident ${id} for ${formatDuration(durationSeconds)}`);
  }
  await deps.client.snooze(incidents, durationSeconds);
}

export async function reassignIncidentsCommand(
  deps: CommandDeps,
  ids: readonly string[],
  user: string,
): Promise<void> {
  const userIds = await resolveUserIds(deps, user);
  const incidents = await findIncidents(deps, ids);
  for (const id of recordIds(incidents)) {
    deps.runtime.log(`Reassign incident ${id} to ${userIds.join(", ")}`);
  }
  await deps.client.reassign(incidents, userIds);
}
