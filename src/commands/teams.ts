import { DEFAULT_TEAM_FIELDS, TEAM_FIELD_REGISTRY } from "../pipeline/fields.js";
import { isJsonObject, type DataRecord } from "../pipeline/record.js";
import { parseFields, showRecords, type CommandDeps, type ListOutputOptions } from "./shared.js";

/** Team references embedded in the current user. */
export async function myTeams(deps: Pick<CommandDeps, "client">): Promise<DataRecord[]> {
  const me = await deps.client.getCurrentUser();
  return Array.isArray(me.teams) ? me.teams.filter(isJsonObject) : [];
}

export async function listTeamsCommand(
  deps: CommandDeps,
  opts: ListOutputOptions & { mine: boolean },
): Promise<void> {
  const teams = opts.mine ? await myTeams(deps) : await deps.client.listTeams();
  await showRecords(deps, teams, {
    output: opts.output,
    fields: parseFields(opts.fields, DEFAULT_TEAM_FIELDS),
    registry: TEAM_FIELD_REGISTRY,
  });
}
