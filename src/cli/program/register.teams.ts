import type { Command } from "commander";

import type { ListOutputOptions } from "../../commands/shared.js";
import { listTeamsCommand } from "../../commands/teams.js";
import { addConfigOption, addListOutputOptions, runWithDeps, type ProgramContext } from "../cli-utils.js";

export function registerTeamsCommands(program: Command, ctx: ProgramContext) {
  const teams = addConfigOption(program.command("teams").description("PagerDuty teams"));

  addListOutputOptions(teams.command("mine").description("Teams you belong to")).action(
    async (_opts, command: Command) => {
      const opts = command.opts<ListOutputOptions>();
      await runWithDeps(ctx, command, (deps) => listTeamsCommand(deps, { ...opts, mine: true }));
    },
  );

  addListOutputOptions(teams.command("ls").description("List all teams")).action(async (_opts, command: Command) => {
    const opts = command.opts<ListOutputOptions>();
    await runWithDeps(ctx, command, (deps) => listTeamsCommand(deps, { ...opts, mine: false }));
  });
}
