/**
 * Error taxonomy shared by the pipeline and the command layer.
 *
 * Configuration errors are user-correctable: they carry an optional hint and
 * map to exit code 2 at the command boundary. Remote failures live in
 * `pagerduty/errors.ts`.
 */

export class ConfigurationError extends Error {
  readonly hint?: string;

  constructor(message: string, hint?: string) {
    super(message);
    this.name = "ConfigurationError";
    this.hint = hint;
  }
}

/** A filter pattern that does not compile. Raised before any record is filtered. */
export class InvalidPatternError extends ConfigurationError {
  readonly pattern: string;

  constructor(pattern: string, reason: string) {
    super(`Invalid regular expression: ${reason}`);
    this.name = "InvalidPatternError";
    this.pattern = pattern;
  }
}

/** A sort key that is missing from at least one record. */
export class InvalidSortFieldError extends ConfigurationError {
  readonly field: string;
  readonly availableFields: string[];

  constructor(field: string, availableFields: string[]) {
    super(`Invalid sort field: ${field}`, `Available fields: ${availableFields.join(", ")}`);
    this.name = "InvalidSortFieldError";
    this.field = field;
    this.availableFields = availableFields;
  }
}

export type ConfigIssue = {
  path: string;
  message: string;
};

/** The configuration file is missing, unreadable or fails validation. */
export class ConfigFileError extends ConfigurationError {
  readonly configPath: string;
  readonly issues: ConfigIssue[];

  constructor(configPath: string, message: string, issues: ConfigIssue[] = []) {
    super(message, `Run \`pdctl config -c ${configPath}\` to create or repair it.`);
    this.name = "ConfigFileError";
    this.configPath = configPath;
    this.issues = issues;
  }
}

/** A rule script failed: spawn error, non-zero exit, timeout or bad output. */
export class RuleExecutionError extends Error {
  readonly script: string;
  readonly detail: string;

  constructor(script: string, detail: string) {
    super(`${script}: ${detail}`);
    this.name = "RuleExecutionError";
    this.script = script;
    this.detail = detail;
  }
}

export function formatErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
