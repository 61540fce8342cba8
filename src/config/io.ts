/**
 * Config file IO: path resolution, YAML parse, schema validation, write.
 */

import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { parse as parseYaml, stringify as toYaml } from "yaml";
import type { ZodError } from "zod";

import { ConfigFileError, formatErrorMessage, type ConfigIssue } from "../errors.js";
import { resolveUserPath } from "../utils.js";
import {
  CONFIG_PATH_ENV,
  PdctlConfigSchema,
  resolveDefaultConfigPath,
  type PdctlConfig,
  type PdctlConfigInput,
} from "./config.js";

export type ConfigIOOptions = {
  /** `-c/--config` from the command line. */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  homedir?: () => string;
};

export type ConfigIO = {
  configPath: string;
  exists(): boolean;
  loadConfig(): PdctlConfig;
  writeConfig(config: PdctlConfigInput): Promise<void>;
};

/** Explicit path, then `$PDCTL_CONFIG`, then `~/.config/pdctl.yaml`. */
export function resolveConfigPath(options: ConfigIOOptions = {}): string {
  const env = options.env ?? process.env;
  const homedir = options.homedir ?? os.homedir;
  const explicit = options.configPath?.trim() || env[CONFIG_PATH_ENV]?.trim();
  if (explicit) return resolveUserPath(explicit, env, homedir);
  return resolveDefaultConfigPath(homedir);
}

function toIssues(error: ZodError): ConfigIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.length > 0 ? issue.path.join(".") : "<root>",
    message: issue.message,
  }));
}

function validate(configPath: string, raw: unknown): PdctlConfig {
  const result = PdctlConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = toIssues(result.error);
    throw new ConfigFileError(
      configPath,
      `Invalid config at ${configPath}: ${issues.map((i) => `${i.path}: ${i.message}`).join("; ")}`,
      issues,
    );
  }
  return result.data;
}

export function createConfigIO(options: ConfigIOOptions = {}): ConfigIO {
  const configPath = resolveConfigPath(options);

  return {
    configPath,

    exists() {
      return fs.existsSync(configPath);
    },

    loadConfig() {
      let text: string;
      try {
        text = fs.readFileSync(configPath, "utf8");
      } catch (err) {
        const missing = err instanceof Error && "code" in err && err.code === "ENOENT";
        throw new ConfigFileError(
          configPath,
          missing ? `Config file not found: ${configPath}` : `Cannot read ${configPath}: ${formatErrorMessage(err)}`,
        );
      }

      let raw: unknown;
      try {
        raw = parseYaml(text);
      } catch (err) {
        throw new ConfigFileError(configPath, `Invalid YAML in ${configPath}: ${formatErrorMessage(err)}`);
      }
      return validate(configPath, raw);
    },

    async writeConfig(config) {
      validate(configPath, config);
      await fs.promises.mkdir(path.dirname(configPath), { recursive: true });
      await fs.promises.writeFile(configPath, toYaml(config), { encoding: "utf8", mode: 0o600 });
      await fs.promises.chmod(configPath, 0o600);
    },
  };
}
