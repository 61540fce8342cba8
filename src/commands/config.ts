import { stdin, stdout } from "node:process";
import { createInterface } from "node:readline/promises";

import type { PdctlConfigInput } from "../config/config.js";
import { createConfigIO, type ConfigIOOptions } from "../config/io.js";
import { ConfigFileError, ConfigurationError } from "../errors.js";
import type { RuntimeEnv } from "../runtime.js";

export type ConfigCommandOptions = {
  configPath?: string;
  apikey?: string;
  email?: string;
  uid?: string;
};

export type Prompt = (question: string) => Promise<string>;

export type ConfigCommandDeps = {
  /** `null` disables prompting; omitted means the terminal when interactive. */
  prompt?: Prompt | null;
  io?: Omit<ConfigIOOptions, "configPath">;
};

const REQUIRED_KEYS = ["apikey", "email", "uid"] as const;
type RequiredKey = (typeof REQUIRED_KEYS)[number];

const QUESTIONS: Record<RequiredKey, string> = {
  apikey: "PagerDuty API key: ",
  email: "Your PagerDuty login email: ",
  uid: "Your PagerDuty user id: ",
};

/** Line prompt on the terminal, or null when stdin is not interactive. */
export function createTerminalPrompt(): Prompt | null {
  if (!stdin.isTTY) return null;
  return async (question) => {
    const rl = createInterface({ input: stdin, output: stdout });
    try {
      return (await rl.question(question)).trim();
    } finally {
      rl.close();
    }
  };
}

/**
 * Create or update the config file. Flags win over the existing file;
 * required values still missing are asked for when a prompt is available.
 */
export async function configCommand(
  opts: ConfigCommandOptions,
  runtime: RuntimeEnv,
  deps: ConfigCommandDeps = {},
): Promise<void> {
  const io = createConfigIO({ ...deps.io, configPath: opts.configPath });

  let base: PdctlConfigInput | undefined;
  if (io.exists()) {
    try {
      base = io.loadConfig();
    } catch (err) {
      if (!(err instanceof ConfigFileError)) throw err;
      runtime.error(`Existing config is invalid, starting over: ${err.message}`);
    }
  }

  const values: Record<RequiredKey, string> = {
    apikey: opts.apikey?.trim() || base?.apikey || "",
    email: opts.email?.trim() || base?.email || "",
    uid: opts.uid?.trim() || base?.uid || "",
  };

  const prompt = deps.prompt === undefined ? createTerminalPrompt() : deps.prompt;
  const missing: RequiredKey[] = [];
  for (const key of REQUIRED_KEYS) {
    if (values[key]) continue;
    const answer = prompt ? await prompt(QUESTIONS[key]) : "";
    if (answer) values[key] = answer;
    else missing.push(key);
  }
  if (missing.length > 0) {
    throw new ConfigurationError(
      `Missing required config values: ${missing.join(", ")}`,
      `Pass them as flags, e.g. pdctl config --${missing[0]} <value>`,
    );
  }

  await io.writeConfig({ ...base, ...values });
  runtime.log(`Config written to ${io.configPath}`);
}
