import type { Command } from "commander";

import { getUserCommand, listUsersCommand } from "../../commands/users.js";
import type { ListOutputOptions } from "../../commands/shared.js";
import { addConfigOption, addListOutputOptions, runWithDeps, type ProgramContext } from "../cli-utils.js";

export function registerUserCommands(program: Command, ctx: ProgramContext) {
  const user = addConfigOption(program.command("user").description("PagerDuty users"));

  addListOutputOptions(user.command("ls").description("List users")).action(async (_opts, command: Command) => {
    const opts = command.opts<ListOutputOptions>();
    await runWithDeps(ctx, command, (deps) => listUsersCommand(deps, opts));
  });

  addListOutputOptions(
    user.command("get").description("Find users by name, email or id").argument("<query>", "Search text"),
  ).action(async (query: string, _opts, command: Command) => {
    const opts = command.opts<ListOutputOptions>();
    await runWithDeps(ctx, command, (deps) => getUserCommand(deps, query, opts));
  });
}
