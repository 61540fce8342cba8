import { Command } from "commander";

import { VERSION } from "../version.js";
import type { ProgramContext } from "./cli-utils.js";
import { registerConfigCommand, registerVersionCommand } from "./program/register.config.js";
import { registerIncidentCommands } from "./program/register.incidents.js";
import { registerServiceCommands } from "./program/register.services.js";
import { registerTeamsCommands } from "./program/register.teams.js";
import { registerUserCommands } from "./program/register.users.js";

export function buildProgram(ctx: ProgramContext, configure?: (program: Command) => void): Command {
  const program = new Command();
  program
    .name("pdctl")
    .description("PagerDuty incidents, users, teams and services from the terminal")
    .version(VERSION, "-V, --version")
    .option("--verbose", "Debug logging to stderr")
    .showHelpAfterError();
  // Subcommands copy settings such as exitOverride when they are created.
  configure?.(program);

  registerConfigCommand(program, ctx);
  registerVersionCommand(program, ctx);
  registerUserCommands(program, ctx);
  registerTeamsCommands(program, ctx);
  registerServiceCommands(program, ctx);
  registerIncidentCommands(program, ctx);
  return program;
}
