import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { PagerDutyClient, buildQueryString } from "./client.js";
import { PagerDutyApiError, UnauthorizedError } from "./errors.js";

// ===========================================================================
// Helpers
// ===========================================================================

const mockFetch = vi.fn();

beforeEach(() => {
  mockFetch.mockReset();
  vi.stubGlobal("fetch", mockFetch);
});

afterEach(() => {
  vi.unstubAllGlobals();
});

function fakeResponse(body: unknown, status = 200): Response {
  return new Response(body === undefined ? null : JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

function client(): PagerDutyClient {
  return new PagerDutyClient({
    apiKey: "test-secret",
    email: "oncall@example.com",
    baseUrl: "https://pd.example.test/",
    pageSize: 2,
  });
}

function calledUrl(call = 0): URL {
  return new URL(String(mockFetch.mock.calls[call][0]));
}

function calledInit(call = 0): RequestInit {
  return mockFetch.mock.calls[call][1];
}

// ===========================================================================
// Query strings
// ===========================================================================

describe("buildQueryString", () => {
  it("expands arrays with [] suffix and skips undefined", () => {
    expect(buildQueryString({ statuses: ["triggered", "acknowledged"], query: "ann", team_ids: undefined })).toBe(
      "?statuses%5B%5D=triggered&statuses%5B%5D=acknowledged&query=ann",
    );
  });

  it("returns an empty string without parameters", () => {
    expect(buildQueryString({})).toBe("");
  });
});

// ===========================================================================
// Reads
// ===========================================================================

describe("PagerDutyClient reads", () => {
  it("sends auth and version headers without From on GET", async () => {
    mockFetch.mockResolvedValueOnce(fakeResponse({ teams: [], more: false }));

    await client().listTeams();

    const headers = calledInit().headers;
    expect(headers).toEqual({
      Accept: "application/vnd.pagerduty+json;version=2",
      Authorization: "Token token=test-secret",
    });
    expect(calledInit().method).toBe("GET");
    expect(calledUrl().origin + calledUrl().pathname).toBe("https://pd.example.test/teams");
  });

  it("follows offset pagination until more is false", async () => {
    mockFetch
      .mockResolvedValueOnce(fakeResponse({ incidents: [{ id: "P1" }, { id: "P2" }], more: true }))
      .mockResolvedValueOnce(fakeResponse({ incidents: [{ id: "P3" }], more: false }));

    const incidents = await client().listIncidents({
      statuses: ["triggered"],
      urgencies: ["high", "low"],
      userIds: ["U1"],
    });

    expect(incidents).toEqual([{ id: "P1" }, { id: "P2" }, { id: "P3" }]);
    expect(mockFetch).toHaveBeenCalledTimes(2);
    const first = calledUrl(0).searchParams;
    expect(first.getAll("statuses[]")).toEqual(["triggered"]);
    expect(first.getAll("urgencies[]")).toEqual(["high", "low"]);
    expect(first.getAll("user_ids[]")).toEqual(["U1"]);
    expect(first.has("team_ids[]")).toBe(false);
    expect(first.get("offset")).toBe("0");
    expect(calledUrl(1).searchParams.get("offset")).toBe("2");
  });

  it("stops listing alerts at the limit", async () => {
    mockFetch
      .mockResolvedValueOnce(fakeResponse({ alerts: [{ id: "A1" }, { id: "A2" }], more: true }))
      .mockResolvedValueOnce(fakeResponse({ alerts: [{ id: "A3" }], more: true }));

    const alerts = await client().listAlerts("P1", { limit: 3 });

    expect(alerts.map((a) => a.id)).toEqual(["A1", "A2", "A3"]);
    expect(mockFetch).toHaveBeenCalledTimes(2);
    expect(calledUrl(0).pathname).toBe("/incidents/P1/alerts");
    expect(calledUrl(1).searchParams.get("limit")).toBe("1");
  });

  it("passes the search query for users", async () => {
    mockFetch.mockResolvedValueOnce(fakeResponse({ users: [{ id: "U1", name: "Ann" }], more: false }));

    const users = await client().searchUsers("ann");

    expect(users).toEqual([{ id: "U1", name: "Ann" }]);
    expect(calledUrl().searchParams.get("query")).toBe("ann");
  });

  it("unwraps the current user", async () => {
    mockFetch.mockResolvedValueOnce(fakeResponse({ user: { id: "U9", teams: [] } }));

    expect(await client().getCurrentUser()).toEqual({ id: "U9", teams: [] });
    expect(calledUrl().pathname).toBe("/users/me");
  });
});

// ===========================================================================
// Errors
// ===========================================================================

describe("PagerDutyClient errors", () => {
  it("maps 401 to UnauthorizedError", async () => {
    mockFetch.mockResolvedValueOnce(fakeResponse({ error: { message: "Unauthorized", code: 2006 } }, 401));

    const err = await client().listServices().catch((e: unknown) => e);

    expect(err).toBeInstanceOf(UnauthorizedError);
    expect(err).toBeInstanceOf(PagerDutyApiError);
    expect(err).toMatchObject({ status: 401, method: "GET" });
  });

  it("maps other failures to PagerDutyApiError with the API message", async () => {
    mockFetch.mockResolvedValueOnce(
      fakeResponse({ error: { message: "Invalid Input Provided", errors: ["Statuses is invalid"] } }, 400),
    );

    const err = await client().listServices().catch((e: unknown) => e);

    expect(err).not.toBeInstanceOf(UnauthorizedError);
    expect(err).toBeInstanceOf(PagerDutyApiError);
    expect(err).toMatchObject({
      status: 400,
      message: "PagerDuty API GET /services?limit=2&offset=0: 400 Invalid Input Provided: Statuses is invalid",
    });
  });
});

// ===========================================================================
// Mutations
// ===========================================================================

describe("PagerDutyClient mutations", () => {
  const incidents = [{ id: "P1", title: "a" }, { id: "P2", title: "b" }];

  it("acknowledges with one PUT carrying From", async () => {
    mockFetch.mockResolvedValueOnce(fakeResponse({ incidents: [] }));

    await client().acknowledge(incidents);

    const init = calledInit();
    expect(init.method).toBe("PUT");
    expect(calledUrl().pathname).toBe("/incidents");
    expect(init.headers).toMatchObject({ From: "oncall@example.com", "Content-Type": "application/json" });
    expect(JSON.parse(String(init.body))).toEqual({
      incidents: [
        { id: "P1", type: "incident_reference", status: "acknowledged" },
        { id: "P2", type: "incident_reference", status: "acknowledged" },
      ],
    });
  });

  it("resolves", async () => {
    mockFetch.mockResolvedValueOnce(fakeResponse({ incidents: [] }));

    await client().resolve([{ id: "P1" }]);

    expect(JSON.parse(String(calledInit().body))).toEqual({
      incidents: [{ id: "P1", type: "incident_reference", status: "resolved" }],
    });
  });

  it("snoozes each incident separately", async () => {
    mockFetch.mockImplementation(() => Promise.resolve(fakeResponse({ incident: {} }, 201)));

    await client().snooze(incidents, 3600);

    expect(mockFetch).toHaveBeenCalledTimes(2);
    expect(calledInit(0).method).toBe("POST");
    expect(calledUrl(0).pathname).toBe("/incidents/P1/snooze");
    expect(calledUrl(1).pathname).toBe("/incidents/P2/snooze");
    expect(JSON.parse(String(calledInit(1).body))).toEqual({ duration: 3600 });
  });

  it("reassigns to every given user", async () => {
    mockFetch.mockResolvedValueOnce(fakeResponse({ incidents: [] }));

    await client().reassign([{ id: "P1" }], ["U1", "U2"]);

    expect(JSON.parse(String(calledInit().body))).toEqual({
      incidents: [
        {
          id: "P1",
          type: "incident_reference",
          assignments: [
            { assignee: { id: "U1", type: "user_reference" } },
            { assignee: { id: "U2", type: "user_reference" } },
          ],
        },
      ],
    });
  });

  it("issues no request for an empty list", async () => {
    const c = client();
    await c.acknowledge([]);
    await c.resolve([{ title: "no id" }]);
    await c.snooze([], 60);
    await c.reassign([{ id: "P1" }], []);

    expect(mockFetch).not.toHaveBeenCalled();
  });
});
