import os from "node:os";

import type { CommandDeps } from "../commands/shared.js";
import { createConfigIO } from "../config/io.js";
import { createLogger } from "../logging/logger.js";
import { createRenderer } from "../output/render.js";
import { PagerDutyClient } from "../pagerduty/client.js";
import type { RuntimeEnv } from "../runtime.js";
import { createTheme, shouldUseColor } from "../terminal/theme.js";
import { resolveUserPath } from "../utils.js";
import type { DepsRequest } from "./cli-utils.js";

export type LoadDepsOptions = {
  env?: NodeJS.ProcessEnv;
  homedir?: () => string;
};

/**
 * Config file → logger → client → renderer. `--verbose` forces debug
 * logging; the API key never reaches a log line.
 */
export function loadCommandDeps(
  runtime: RuntimeEnv,
  request: DepsRequest,
  options: LoadDepsOptions = {},
): CommandDeps {
  const env = options.env ?? process.env;
  const homedir = options.homedir ?? os.homedir;
  const config = createConfigIO({ configPath: request.config, env, homedir }).loadConfig();

  const logger = createLogger("pdctl", {
    level: request.verbose ? "debug" : config.logLevel,
    file: config.logFile ? resolveUserPath(config.logFile, env, homedir) : undefined,
    redact: [config.apikey],
  });

  const colors = shouldUseColor(process.stdout, env);
  return {
    config,
    client: new PagerDutyClient({
      apiKey: config.apikey,
      email: config.email,
      baseUrl: config.apiUrl,
      logger: logger.child("api"),
    }),
    runtime,
    renderer: createRenderer(runtime, { colors }),
    logger,
    theme: createTheme(colors),
  };
}
