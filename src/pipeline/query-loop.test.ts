import { describe, expect, it, vi } from "vitest";
import { createFakeClient } from "../../test/fake-client.js";
import { createTestRuntime } from "../../test/runtime.js";
import { InvalidSortFieldError } from "../errors.js";
import type { Renderer } from "../output/render.js";
import { buildTransformationSpec, incidentFieldRegistry, INCIDENT_ORDINALS } from "./fields.js";
import { FilterStage, regexExcludes, regexMatches } from "./filters.js";
import { QueryLoop, type QueryLoopOptions } from "./query-loop.js";
import type { DataRecord, DisplayRecord } from "./record.js";

const INCIDENTS: DataRecord[] = [
  { id: "P1", title: "disk full on db-1", status: "triggered", urgency: "low", service: { summary: "db" } },
  { id: "P2", title: "cpu hot", status: "triggered", urgency: "high", service: { summary: "web" } },
  { id: "P3", title: "disk slow", status: "acknowledged", urgency: "low", service: { summary: "web" } },
];

function createRenderer() {
  return { render: vi.fn(), clear: vi.fn() } satisfies Renderer;
}

function setup(overrides: Partial<QueryLoopOptions> = {}) {
  const client = createFakeClient({
    incidents: INCIDENTS,
    alerts: { P1: [{ id: "A1", status: "triggered" }], P2: [{ id: "A2" }, { id: "A3" }] },
  });
  const renderer = createRenderer();
  const { runtime, stdout } = createTestRuntime();
  const loop = new QueryLoop({
    client,
    query: { statuses: ["triggered", "acknowledged"], urgencies: ["high", "low"], userIds: ["U1"] },
    renderer,
    runtime,
    output: "table",
    display: buildTransformationSpec(["id", "urgency", "service.summary"], incidentFieldRegistry()),
    ...overrides,
  });
  return { loop, client, renderer, runtime, stdout };
}

function renderedIds(renderer: ReturnType<typeof createRenderer>, call = 0): unknown[] {
  const records: DisplayRecord[] = renderer.render.mock.calls[call][0];
  return records.map((record) => record.id);
}

describe("QueryLoop.runOnce", () => {
  it("fetches with the query, transforms and renders the display columns", async () => {
    const { loop, client, renderer } = setup();

    await loop.runOnce();

    expect(client.listIncidents).toHaveBeenCalledWith({
      statuses: ["triggered", "acknowledged"],
      urgencies: ["high", "low"],
      userIds: ["U1"],
    });
    const [records, options] = renderer.render.mock.calls[0];
    expect(options).toEqual({ mode: "table", columns: ["id", "urgency", "service"] });
    expect(records.map((r: DisplayRecord) => [r.id, String(r.urgency), r.service])).toEqual([
      ["P1", "LOW", "db"],
      ["P2", "HIGH", "web"],
      ["P3", "LOW", "web"],
    ]);
  });

  it("sorts urgency descending with ties in input order", async () => {
    const { loop, renderer } = setup({
      sort: { fields: ["urgency"], reverse: true, ordinals: INCIDENT_ORDINALS },
    });

    await loop.runOnce();

    expect(renderedIds(renderer)).toEqual(["P2", "P1", "P3"]);
  });

  it("rejects an unknown sort field before rendering or acting", async () => {
    const { loop, client, renderer } = setup({
      sort: { fields: ["nope"] },
      actions: { acknowledge: true },
    });

    const err = await loop.runOnce().catch((e: unknown) => e);

    expect(err).toBeInstanceOf(InvalidSortFieldError);
    expect(err).toMatchObject({ field: "nope", availableFields: ["id", "urgency", "service"] });
    expect(renderer.render).not.toHaveBeenCalled();
    expect(client.acknowledge).not.toHaveBeenCalled();
  });

  it("runs stages in order and acts on the pre-transform records", async () => {
    const { loop, client, renderer, stdout } = setup({
      stages: [
        new FilterStage([regexMatches("title", "disk")]),
        new FilterStage([regexExcludes("service.summary", "^db$")]),
      ],
      actions: { acknowledge: true },
    });

    const result = await loop.runOnce();

    expect(renderedIds(renderer)).toEqual(["P3"]);
    expect(result.records).toEqual([INCIDENTS[2]]);
    expect(client.acknowledge).toHaveBeenCalledWith([INCIDENTS[2]]);
    expect(stdout).toEqual(["Marked P3 as ACK"]);
  });

  it("reports snooze, resolve and reassign per incident", async () => {
    const { loop, client, stdout } = setup({
      stages: [new FilterStage([regexMatches("title", "cpu")])],
      actions: { snooze: 14_400, resolve: true, reassign: ["U7", "U8"] },
    });

    await loop.runOnce();

    expect(client.snooze).toHaveBeenCalledWith([INCIDENTS[1]], 14_400);
    expect(client.resolve).toHaveBeenCalledWith([INCIDENTS[1]]);
    expect(client.reassign).toHaveBeenCalledWith([INCIDENTS[1]], ["U7", "U8"]);
    expect(stdout).toEqual([
      "Snoozing incident P2 for 4:00:00",
      "Mark P2 as RESOLVED",
      "Reassign incident P2 to U7, U8",
    ]);
  });

  it("keeps json output clean of action lines", async () => {
    const { loop, client, stdout } = setup({ output: "json", actions: { acknowledge: true } });

    await loop.runOnce();

    expect(client.acknowledge).toHaveBeenCalledTimes(1);
    expect(stdout).toEqual([]);
  });

  it("renders raw records with attached alerts in raw mode", async () => {
    const { loop, client, renderer } = setup({ output: "raw" });
    const withAlerts = setup({
      output: "raw",
      rawAlerts: { fetchAlerts: (id) => client.listAlerts(id), limit: 1 },
    });

    await loop.runOnce();
    await withAlerts.loop.runOnce();

    expect(renderer.render.mock.calls[0]).toEqual([INCIDENTS, { mode: "raw", columns: undefined }]);
    const [records] = withAlerts.renderer.render.mock.calls[0];
    expect(records[0]).toEqual({ ...INCIDENTS[0], alerts: [{ id: "A1", status: "triggered" }] });
    expect(records[1].alerts).toEqual([{ id: "A2" }]);
    expect(records[2].alerts).toEqual([]);
  });
});

describe("QueryLoop.run", () => {
  it("runs a single pass without watch", async () => {
    const { loop, client, renderer } = setup();

    await loop.run();

    expect(client.listIncidents).toHaveBeenCalledTimes(1);
    expect(renderer.clear).not.toHaveBeenCalled();
  });

  it("does nothing once the signal is aborted", async () => {
    const { loop, client } = setup({ watch: { intervalMs: 1 } });
    const controller = new AbortController();
    controller.abort();

    await loop.run(controller.signal);

    expect(client.listIncidents).not.toHaveBeenCalled();
  });

  it("repeats passes in watch mode until aborted", async () => {
    const controller = new AbortController();
    const { loop, client, renderer } = setup({ watch: { intervalMs: 1 } });
    renderer.render.mockImplementation(() => {
      if (renderer.render.mock.calls.length === 2) controller.abort();
    });

    await loop.run(controller.signal);

    expect(client.listIncidents).toHaveBeenCalledTimes(2);
    expect(renderer.clear).toHaveBeenCalledTimes(1);
  });

  it("stops without rendering or acting when aborted during a stage", async () => {
    const controller = new AbortController();
    const { loop, client, renderer } = setup({
      watch: { intervalMs: 1 },
      actions: { acknowledge: true },
      stages: [
        {
          name: "cancel",
          apply: async (records: DataRecord[]) => {
            controller.abort();
            return records;
          },
        },
      ],
    });

    await loop.run(controller.signal);

    expect(client.listIncidents).toHaveBeenCalledTimes(1);
    expect(renderer.render).not.toHaveBeenCalled();
    expect(client.acknowledge).not.toHaveBeenCalled();
    expect(renderer.clear).not.toHaveBeenCalled();
  });

  it("rejects a single pass aborted before its actions", async () => {
    const controller = new AbortController();
    const { loop, client, renderer } = setup({ actions: { resolve: true } });
    renderer.render.mockImplementation(() => controller.abort());

    const err = await loop.runOnce(controller.signal).catch((e: unknown) => e);

    expect(err).toBe(controller.signal.reason);
    expect(renderer.render).toHaveBeenCalledTimes(1);
    expect(client.resolve).not.toHaveBeenCalled();
  });

  it("propagates a failing pass", async () => {
    const { loop, client } = setup({ watch: { intervalMs: 1 } });
    client.listIncidents.mockRejectedValueOnce(new Error("network down"));

    await expect(loop.run()).rejects.toThrow("network down");
  });
});
