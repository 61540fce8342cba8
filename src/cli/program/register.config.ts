import type { Command } from "commander";

import { configCommand } from "../../commands/config.js";
import { VERSION } from "../../version.js";
import { runCommandWithRuntime, type ProgramContext } from "../cli-utils.js";

type ConfigFlags = {
  config?: string;
  apikey?: string;
  email?: string;
  uid?: string;
};

export function registerConfigCommand(program: Command, ctx: ProgramContext) {
  program
    .command("config")
    .description("Create or update the config file")
    .option("-c, --config <path>", "Config file to write (default: $PDCTL_CONFIG or ~/.config/pdctl.yaml)")
    .option("--apikey <key>", "PagerDuty API key")
    .option("--email <email>", "Login email, sent as From on changes")
    .option("--uid <id>", "Your PagerDuty user id")
    .action(async (_opts, command: Command) => {
      const flags = command.opts<ConfigFlags>();
      await runCommandWithRuntime(ctx.runtime, async () => {
        await configCommand(
          { configPath: flags.config, apikey: flags.apikey, email: flags.email, uid: flags.uid },
          ctx.runtime,
          ctx.configDeps,
        );
      });
    });
}

export function registerVersionCommand(program: Command, ctx: ProgramContext) {
  program
    .command("version")
    .description("Print the pdctl version")
    .action(() => {
      ctx.runtime.log(VERSION);
    });
}
