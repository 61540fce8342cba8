import { DEFAULT_USER_FIELDS, userFieldRegistry } from "../pipeline/fields.js";
import type { DataRecord } from "../pipeline/record.js";
import { parseFields, showRecords, type CommandDeps, type ListOutputOptions } from "./shared.js";

export async function listUsersCommand(deps: CommandDeps, opts: ListOutputOptions): Promise<void> {
  const users = await deps.client.listUsers();
  await showRecords(deps, users, {
    output: opts.output,
    fields: parseFields(opts.fields, DEFAULT_USER_FIELDS),
    registry: userFieldRegistry(),
  });
}

/** Name/email search first; when nothing matches, try the query as a user id. */
export async function findUsers(deps: Pick<CommandDeps, "client">, query: string): Promise<DataRecord[]> {
  const found = await deps.client.searchUsers(query);
  if (found.length > 0) return found;
  const all = await deps.client.listUsers();
  return all.filter((user) => user.id === query);
}

export async function getUserCommand(deps: CommandDeps, query: string, opts: ListOutputOptions): Promise<void> {
  const users = await findUsers(deps, query);
  deps.logger.debug(`user search "${query}"`, { matches: users.length });
  const fields = parseFields(opts.fields, DEFAULT_USER_FIELDS);
  if (!fields.includes("teams")) fields.push("teams");
  await showRecords(deps, users, {
    output: opts.output,
    fields,
    registry: userFieldRegistry(),
  });
}
