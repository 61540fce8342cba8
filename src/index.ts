// Pipeline
export {
  Decorated,
  isDecorated,
  lookupField,
  lookupPath,
  recordIds,
  stringifyValue,
  toPlainRecord,
} from "./pipeline/record.js";
export type {
  DataRecord,
  DisplayRecord,
  DisplayValue,
  JsonObject,
  JsonValue,
  PathLookup,
  StyleName,
} from "./pipeline/record.js";
export type { PipelineStage } from "./pipeline/stage.js";
export { FilterStage, applyFilters, inSet, regexExcludes, regexMatches } from "./pipeline/filters.js";
export type { RecordFilter } from "./pipeline/filters.js";
export {
  applyTransformations,
  decorate,
  extract,
  extractAlerts,
  extractAssignees,
  extractDate,
  extractDecorated,
  extractUserTeams,
} from "./pipeline/transforms.js";
export type { AlertFetcher, ExtractionRule, TransformationSpec } from "./pipeline/transforms.js";
export {
  buildTransformationSpec,
  incidentFieldRegistry,
  serviceFieldRegistry,
  userFieldRegistry,
} from "./pipeline/fields.js";
export type { FieldRegistry } from "./pipeline/fields.js";
export { RuleStage, applyRules, discoverRules, runRule } from "./pipeline/rules.js";
export type { RuleFailurePolicy, RuleRunResult } from "./pipeline/rules.js";
export { compareValues, sortRecords } from "./pipeline/sort.js";
export type { OrdinalTable, SortOptions } from "./pipeline/sort.js";
export { QueryLoop } from "./pipeline/query-loop.js";
export type { IncidentActions, QueryLoopOptions } from "./pipeline/query-loop.js";

// Collaborators
export { PagerDutyClient } from "./pagerduty/client.js";
export { PagerDutyApiError, UnauthorizedError } from "./pagerduty/errors.js";
export type { IncidentClient, IncidentQuery } from "./pagerduty/types.js";
export { createRenderer } from "./output/render.js";
export type { OutputMode, Renderer } from "./output/render.js";
export { createConfigIO } from "./config/io.js";
export type { PdctlConfig } from "./config/config.js";
export { createLogger } from "./logging/logger.js";
export type { Logger } from "./logging/logger.js";
export {
  ConfigFileError,
  ConfigurationError,
  InvalidPatternError,
  InvalidSortFieldError,
  RuleExecutionError,
} from "./errors.js";
export { VERSION } from "./version.js";
