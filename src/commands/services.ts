import {
  DEFAULT_SERVICE_FIELDS,
  DEFAULT_SERVICE_STATUSES,
  SERVICE_ORDINALS,
  serviceFieldRegistry,
} from "../pipeline/fields.js";
import { applyFilters, inSet } from "../pipeline/filters.js";
import { splitList } from "../utils.js";
import {
  parseFields,
  showRecords,
  type CommandDeps,
  type ListOutputOptions,
  type ListSortOptions,
} from "./shared.js";

export type ListServicesOptions = ListOutputOptions &
  ListSortOptions & {
    /** Comma-separated statuses to keep. */
    status?: string;
  };

export async function listServicesCommand(deps: CommandDeps, opts: ListServicesOptions): Promise<void> {
  const statuses = splitList(opts.status);
  const services = applyFilters(await deps.client.listServices(), [
    inSet("status", statuses.length > 0 ? statuses : DEFAULT_SERVICE_STATUSES),
  ]);
  await showRecords(deps, services, {
    output: opts.output,
    fields: parseFields(opts.fields, DEFAULT_SERVICE_FIELDS),
    registry: serviceFieldRegistry({ timeZone: deps.config.timeZone }),
    sort: opts,
    ordinals: SERVICE_ORDINALS,
  });
}
