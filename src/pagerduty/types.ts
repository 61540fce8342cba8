/**
 * PagerDuty domain constants and the client contract the pipeline relies on.
 */

import type { DataRecord } from "../pipeline/record.js";

// =============================================================================
// Constants
// =============================================================================

export const STATUS_TRIGGERED = "triggered";
export const STATUS_ACK = "acknowledged";
export const STATUS_RESOLVED = "resolved";

export const URGENCY_HIGH = "high";
export const URGENCY_LOW = "low";
export type IncidentStatus = typeof STATUS_TRIGGERED | typeof STATUS_ACK | typeof STATUS_RESOLVED;
export type IncidentUrgency = typeof URGENCY_HIGH | typeof URGENCY_LOW;

export const DEFAULT_URGENCIES: readonly IncidentUrgency[] = [URGENCY_HIGH, URGENCY_LOW];

/** Default snooze: four hours. */
export const DEFAULT_SNOOZE_SECONDS = 14_400;

export const DEFAULT_API_URL = "https://api.pagerduty.com";

// =============================================================================
// Client contract
// =============================================================================

export type IncidentQuery = {
  /** Only incidents assigned to these users. */
  userIds?: string[];
  statuses: IncidentStatus[];
  urgencies: IncidentUrgency[];
  /** Only incidents of these teams. */
  teamIds?: string[];
};

/**
 * Everything the commands and the query loop need from the remote service.
 * Records are returned exactly as the API delivers them.
 */
export interface IncidentClient {
  listIncidents(query: IncidentQuery): Promise<DataRecord[]>;
  listAlerts(incidentId: string, options?: { limit?: number }): Promise<DataRecord[]>;
  listUsers(): Promise<DataRecord[]>;
  searchUsers(query: string): Promise<DataRecord[]>;
  getCurrentUser(): Promise<DataRecord>;
  listServices(): Promise<DataRecord[]>;
  listTeams(): Promise<DataRecord[]>;
  acknowledge(incidents: readonly DataRecord[]): Promise<void>;
  resolve(incidents: readonly DataRecord[]): Promise<void>;
  snooze(incidents: readonly DataRecord[], durationSeconds: number): Promise<void>;
  reassign(incidents: readonly DataRecord[], userIds: readonly string[]): Promise<void>;
}
