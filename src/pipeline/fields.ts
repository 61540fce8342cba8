/**
 * Field registries
 *
 * Which extraction rule a requested field gets is decided here, once per
 * command, from a closed table per record kind. Fields without an entry use
 * a plain path lookup. An entry may rename its output column.
 */

import {
  STATUS_ACK,
  STATUS_RESOLVED,
  STATUS_TRIGGERED,
  URGENCY_HIGH,
  URGENCY_LOW,
} from "../pagerduty/types.js";
import { stringifyValue, type StyleName } from "./record.js";
import type { OrdinalTable } from "./sort.js";
import {
  extract,
  extractAlerts,
  extractAssignees,
  extractDate,
  extractDecorated,
  extractUserTeams,
  type AlertFetcher,
  type ExtractionRule,
  type TransformationSpec,
} from "./transforms.js";

export type FieldEntry = {
  /** Output column name when it differs from the requested field. */
  output?: string;
  create: (field: string) => ExtractionRule;
};

export type FieldRegistry = Readonly<Record<string, FieldEntry>>;

export type BuiltSpec = {
  spec: TransformationSpec;
  /** Output columns in display order. */
  columns: string[];
};

// =============================================================================
// Defaults
// =============================================================================

export const DEFAULT_INCIDENT_FIELDS = ["id", "assignee", "title", "status", "created_at", "service.summary"];
export const DEFAULT_ALERT_FIELDS = ["status", "created_at", "service.summary", "body.details"];
export const DEFAULT_SERVICE_FIELDS = ["id", "name", "description", "status", "created_at", "updated_at", "html_url"];
export const DEFAULT_USER_FIELDS = ["id", "name", "email", "time_zone", "role", "job_title", "teams"];
export const DEFAULT_TEAM_FIELDS = ["id", "summary", "html_url"];

export const DEFAULT_SERVICE_STATUSES = ["active", "warning", "critical"];

// =============================================================================
// Decoration tables
// =============================================================================

export const INCIDENT_STATUS_COLORS: Record<string, StyleName> = {
  [STATUS_TRIGGERED]: "red",
  [STATUS_ACK]: "yellow",
  [STATUS_RESOLVED]: "green",
};

export const INCIDENT_STATUS_LABELS: Record<string, string> = {
  [STATUS_TRIGGERED]: "✘",
  [STATUS_ACK]: "✔",
  [STATUS_RESOLVED]: "✔",
};

export const URGENCY_COLORS: Record<string, StyleName> = {
  [URGENCY_HIGH]: "red",
  [URGENCY_LOW]: "green",
};

export const URGENCY_LABELS: Record<string, string> = {
  [URGENCY_HIGH]: "HIGH",
  [URGENCY_LOW]: "LOW",
};

export const SERVICE_STATUS_COLORS: Record<string, StyleName> = {
  active: "green",
  warning: "yellow",
  critical: "red",
  unknown: "gray",
  disabled: "gray",
};

export const SERVICE_STATUS_LABELS: Record<string, string> = {
  active: "OK",
  warning: "WARN",
  critical: "CRIT",
  unknown: "❔",
  disabled: "off",
};

// =============================================================================
// Sort ordinals
// =============================================================================

export const INCIDENT_ORDINALS: OrdinalTable = {
  urgency: [URGENCY_LOW, URGENCY_HIGH],
  status: [STATUS_TRIGGERED, STATUS_ACK, STATUS_RESOLVED],
};

export const SERVICE_ORDINALS: OrdinalTable = {
  status: ["active", "warning", "critical", "unknown", "disabled"],
};

// =============================================================================
// Spec builder
// =============================================================================

function registryEntry(registry: FieldRegistry, field: string): FieldEntry | undefined {
  return Object.prototype.hasOwnProperty.call(registry, field) ? registry[field] : undefined;
}

export function outputFieldName(field: string, registry: FieldRegistry): string {
  return registryEntry(registry, field)?.output ?? field;
}

/**
 * Resolve requested fields to a spec. Rule constructors run here, so a bad
 * option (an unknown time zone, say) fails before any record is touched.
 */
export function buildTransformationSpec(fields: readonly string[], registry: FieldRegistry): BuiltSpec {
  const spec: Record<string, ExtractionRule> = {};
  const columns: string[] = [];
  for (const field of fields) {
    const entry = registryEntry(registry, field);
    const output = entry?.output ?? field;
    spec[output] = entry ? entry.create(field) : extract(field);
    if (!columns.includes(output)) columns.push(output);
  }
  return { spec, columns };
}

// =============================================================================
// Registries
// =============================================================================

export type DateOptions = {
  timeZone?: string;
};

function dateEntry(options: DateOptions): FieldEntry {
  return { create: (field) => extractDate(field, { timeZone: options.timeZone }) };
}

export function alertFieldRegistry(options: DateOptions = {}): FieldRegistry {
  return {
    created_at: dateEntry(options),
  };
}

export type IncidentRegistryOptions = DateOptions & {
  /** Enables the `alerts` field. */
  fetchAlerts?: AlertFetcher;
  alertFields?: readonly string[];
  alertLimit?: number;
};

export function incidentFieldRegistry(options: IncidentRegistryOptions = {}): FieldRegistry {
  const registry: Record<string, FieldEntry> = {
    assignee: { create: () => extractAssignees() },
    status: {
      create: () =>
        extractDecorated("status", {
          colorMap: INCIDENT_STATUS_COLORS,
          changeMap: INCIDENT_STATUS_LABELS,
          defaultColor: "cyan",
        }),
    },
    urgency: {
      create: () =>
        extractDecorated("urgency", {
          colorMap: URGENCY_COLORS,
          changeMap: URGENCY_LABELS,
        }),
    },
    title: {
      create: () =>
        extractDecorated("title", {
          defaultColor: "cyan",
          mapFunc: (item, record) => ({
            text: item === null ? "" : stringifyValue(item),
            style: record.urgency === URGENCY_HIGH ? "red" : "cyan",
          }),
        }),
    },
    url: { create: () => extract("html_url") },
    "service.summary": { output: "service", create: () => extract("service.summary") },
    created_at: dateEntry(options),
    last_status_change_at: dateEntry(options),
  };

  const fetchAlerts = options.fetchAlerts;
  if (fetchAlerts) {
    registry.alerts = {
      create: () => {
        const { spec } = buildTransformationSpec(
          options.alertFields ?? DEFAULT_ALERT_FIELDS,
          alertFieldRegistry(options),
        );
        return extractAlerts(fetchAlerts, spec, { limit: options.alertLimit });
      },
    };
  }
  return registry;
}

export function serviceFieldRegistry(options: DateOptions = {}): FieldRegistry {
  return {
    status: {
      create: () =>
        extractDecorated("status", {
          colorMap: SERVICE_STATUS_COLORS,
          changeMap: SERVICE_STATUS_LABELS,
        }),
    },
    url: { create: () => extract("html_url") },
    created_at: dateEntry(options),
    updated_at: dateEntry(options),
  };
}

export function userFieldRegistry(): FieldRegistry {
  return {
    teams: { create: () => extractUserTeams() },
  };
}

export const TEAM_FIELD_REGISTRY: FieldRegistry = {};
