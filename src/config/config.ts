import os from "node:os";
import path from "node:path";
import { z } from "zod";

import { DEFAULT_API_URL } from "../pagerduty/types.js";

export const CONFIG_PATH_ENV = "PDCTL_CONFIG";
export const DEFAULT_RULES_PATH = "~/.config/pdctl/rules";
export const DEFAULT_TIME_ZONE = "UTC";

export const PdctlConfigSchema = z.object({
  /** PagerDuty REST API key. */
  apikey: z.string().min(1, "apikey is required"),
  /** Sent as `From` on mutations. */
  email: z.string().email(),
  /** Your own user id: the default assignee filter for `inc ls`. */
  uid: z.string().min(1, "uid is required"),
  apiUrl: z.string().url().default(DEFAULT_API_URL),
  timeZone: z.string().min(1).default(DEFAULT_TIME_ZONE),
  rulesPath: z.string().min(1).default(DEFAULT_RULES_PATH),
  rulesOnError: z.enum(["abort", "continue"]).default("abort"),
  /** Seconds before a rule script is killed; unset means no limit. */
  rulesTimeout: z.number().int().positive().optional(),
  logLevel: z.enum(["trace", "debug", "info", "warn", "error", "fatal"]).default("warn"),
  logFile: z.string().optional(),
});

export type PdctlConfig = z.infer<typeof PdctlConfigSchema>;
/** What a config file may contain: defaults not yet applied. */
export type PdctlConfigInput = z.input<typeof PdctlConfigSchema>;

export function resolveDefaultConfigPath(homedir: () => string = os.homedir): string {
  return path.join(homedir(), ".config", "pdctl.yaml");
}
