import type { Command } from "commander";

import { listServicesCommand, type ListServicesOptions } from "../../commands/services.js";
import { DEFAULT_SERVICE_STATUSES } from "../../pipeline/fields.js";
import { addConfigOption, addListOutputOptions, runWithDeps, type ProgramContext } from "../cli-utils.js";

export function registerServiceCommands(program: Command, ctx: ProgramContext) {
  const svc = addConfigOption(program.command("svc").description("PagerDuty services"));

  addListOutputOptions(svc.command("ls").description("List services"))
    .option("-s, --status <list>", `Statuses to show (default: ${DEFAULT_SERVICE_STATUSES.join(",")})`)
    .option("--sort <fields>", "Sort by these comma-separated fields")
    .option("--reverse", "Reverse the sort order")
    .action(async (_opts, command: Command) => {
      const opts = command.opts<ListServicesOptions>();
      await runWithDeps(ctx, command, (deps) => listServicesCommand(deps, opts));
    });
}
