/**
 * PagerDuty REST v2 client: implements IncidentClient over native fetch.
 */

import { silentLogger, type Logger } from "../logging/logger.js";
import { isJsonObject, type DataRecord, type JsonObject, type JsonValue } from "../pipeline/record.js";
import { PagerDutyApiError, UnauthorizedError } from "./errors.js";
import {
  DEFAULT_API_URL,
  STATUS_ACK,
  STATUS_RESOLVED,
  type IncidentClient,
  type IncidentQuery,
} from "./types.js";

export type PagerDutyClientConfig = {
  apiKey: string;
  /** Sent as `From` on every mutation; must be a valid user of the account. */
  email: string;
  baseUrl?: string;
  /** Page size for list endpoints. */
  pageSize?: number;
  logger?: Logger;
};

type QueryValue = string | number | readonly string[] | undefined;
type QueryParams = Record<string, QueryValue>;

const PAGE_SIZE = 100;

export function buildQueryString(params: QueryParams): string {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined) continue;
    if (typeof value === "string" || typeof value === "number") {
      search.append(key, String(value));
    } else {
      for (const item of value) search.append(`${key}[]`, item);
    }
  }
  const qs = search.toString();
  return qs ? `?${qs}` : "";
}

function incidentReference(record: DataRecord): JsonObject | null {
  return typeof record.id === "string" ? { id: record.id, type: "incident_reference" } : null;
}

function apiErrorDetail(body: unknown): string | undefined {
  const error = isJsonObject(body) ? body.error : undefined;
  if (!isJsonObject(error)) return undefined;
  const { message, errors } = error;
  const parts: string[] = [];
  if (typeof message === "string") parts.push(message);
  if (Array.isArray(errors)) {
    for (const item of errors) if (typeof item === "string") parts.push(item);
  }
  return parts.length > 0 ? parts.join(": ") : undefined;
}

export class PagerDutyClient implements IncidentClient {
  private baseUrl: string;
  private apiKey: string;
  private email: string;
  private pageSize: number;
  private logger: Logger;

  constructor(config: PagerDutyClientConfig) {
    this.baseUrl = (config.baseUrl ?? DEFAULT_API_URL).replace(/\/+$/, "");
    this.apiKey = config.apiKey;
    this.email = config.email;
    this.pageSize = config.pageSize ?? PAGE_SIZE;
    this.logger = config.logger ?? silentLogger;
  }

  private async request(method: string, path: string, body?: JsonValue): Promise<unknown> {
    const url = `${this.baseUrl}${path}`;
    const headers: Record<string, string> = {
      Accept: "application/vnd.pagerduty+json;version=2",
      Authorization: `Token token=${this.apiKey}`,
    };
    if (method !== "GET") headers.From = this.email;
    if (body !== undefined) headers["Content-Type"] = "application/json";

    this.logger.debug(`${method} ${path}`);
    const res = await fetch(url, {
      method,
      headers,
      body: body !== undefined ? JSON.stringify(body) : undefined,
    });

    const text = await res.text();
    let parsed: unknown = undefined;
    if (text) {
      try {
        parsed = JSON.parse(text);
      } catch {
        parsed = text;
      }
    }

    if (!res.ok) {
      const detail = apiErrorDetail(parsed) ?? (typeof parsed === "string" ? parsed : undefined);
      this.logger.debug(`${method} ${path} failed`, { status: res.status });
      if (res.status === 401 || res.status === 403) {
        throw new UnauthorizedError(res.status, method, path, detail);
      }
      throw new PagerDutyApiError(res.status, method, path, detail);
    }
    return parsed;
  }

  /** Walk offset pagination until `more` is false or `max` records are collected. */
  private async paginate(path: string, key: string, params: QueryParams = {}, max?: number): Promise<DataRecord[]> {
    const out: DataRecord[] = [];
    let offset = 0;
    for (;;) {
      const limit = max !== undefined ? Math.min(this.pageSize, max - out.length) : this.pageSize;
      const page = await this.request("GET", `${path}${buildQueryString({ ...params, limit, offset })}`);
      if (!isJsonObject(page)) break;
      const items = page[key];
      if (Array.isArray(items)) {
        for (const item of items) if (isJsonObject(item)) out.push(item);
      }
      const fetched = Array.isArray(items) ? items.length : 0;
      if (page.more !== true || fetched === 0) break;
      if (max !== undefined && out.length >= max) break;
      offset += fetched;
    }
    this.logger.debug(`${path}: ${out.length} ${key}`);
    return max !== undefined ? out.slice(0, max) : out;
  }

  // ---------------------------------------------------------------------------
  // Reads
  // ---------------------------------------------------------------------------

  async listIncidents(query: IncidentQuery): Promise<DataRecord[]> {
    return this.paginate("/incidents", "incidents", {
      statuses: query.statuses,
      urgencies: query.urgencies,
      user_ids: query.userIds,
      team_ids: query.teamIds,
    });
  }

  async listAlerts(incidentId: string, options: { limit?: number } = {}): Promise<DataRecord[]> {
    return this.paginate(`/incidents/${encodeURIComponent(incidentId)}/alerts`, "alerts", {}, options.limit);
  }

  async listUsers(): Promise<DataRecord[]> {
    return this.paginate("/users", "users");
  }

  async searchUsers(query: string): Promise<DataRecord[]> {
    return this.paginate("/users", "users", { query });
  }

  async getCurrentUser(): Promise<DataRecord> {
    const body = await this.request("GET", "/users/me");
    const user = isJsonObject(body) ? body.user : undefined;
    if (isJsonObject(user)) return user;
    throw new PagerDutyApiError(200, "GET", "/users/me", "response has no user");
  }

  async listServices(): Promise<DataRecord[]> {
    return this.paginate("/services", "services");
  }

  async listTeams(): Promise<DataRecord[]> {
    return this.paginate("/teams", "teams");
  }

  // ---------------------------------------------------------------------------
  // Mutations
  // ---------------------------------------------------------------------------

  private async updateIncidents(
    incidents: readonly DataRecord[],
    patch: (ref: JsonObject) => JsonObject,
  ): Promise<void> {
    const refs: JsonValue[] = [];
    for (const record of incidents) {
      const ref = incidentReference(record);
      if (ref) refs.push(patch(ref));
    }
    if (refs.length === 0) return;
    await this.request("PUT", "/incidents", { incidents: refs });
  }

  async acknowledge(incidents: readonly DataRecord[]): Promise<void> {
    await this.updateIncidents(incidents, (ref) => ({ ...ref, status: STATUS_ACK }));
  }

  async resolve(incidents: readonly DataRecord[]): Promise<void> {
    await this.updateIncidents(incidents, (ref) => ({ ...ref, status: STATUS_RESOLVED }));
  }

  async snooze(incidents: readonly DataRecord[], durationSeconds: number): Promise<void> {
    for (const record of incidents) {
      if (typeof record.id !== "string") continue;
      await this.request("POST", `/incidents/${encodeURIComponent(record.id)}/snooze`, {
        duration: durationSeconds,
      });
    }
  }

  async reassign(incidents: readonly DataRecord[], userIds: readonly string[]): Promise<void> {
    if (userIds.length === 0) return;
    const assignments: JsonValue[] = userIds.map((id) => ({ assignee: { id, type: "user_reference" } }));
    await this.updateIncidents(incidents, (ref) => ({ ...ref, assignments }));
  }
}
