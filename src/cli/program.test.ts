import type { Command } from "commander";
import { beforeEach, describe, expect, it, vi, type Mock } from "vitest";

import { createTestDeps } from "../../test/deps.js";
import type { FakeClient } from "../../test/fake-client.js";
import type { CommandDeps } from "../commands/shared.js";
import { PagerDutyApiError } from "../pagerduty/errors.js";
import type { RuntimeEnv } from "../runtime.js";
import { stripAnsi } from "../terminal/theme.js";
import { VERSION } from "../version.js";
import type { DepsRequest } from "./cli-utils.js";
import { buildProgram } from "./program.js";
import { toListIncidentsOptions } from "./program/register.incidents.js";

const INCIDENTS = [
  { id: "P1", title: "disk full", status: "triggered", urgency: "high", service: { summary: "db" } },
  { id: "P2", title: "cpu hot", status: "acknowledged", urgency: "low", service: { summary: "web" } },
];

describe("pdctl program", () => {
  let deps: CommandDeps;
  let client: FakeClient;
  let runtime: RuntimeEnv;
  let stdout: string[];
  let stderr: string[];
  let loadDeps: Mock<(request: DepsRequest) => CommandDeps>;
  let program: Command;

  beforeEach(() => {
    ({ deps, client, runtime, stdout, stderr } = createTestDeps({
      incidents: INCIDENTS,
      users: [{ id: "U1", name: "Ann Lee", email: "ann@example.com" }],
      services: [{ id: "S1", name: "api", status: "active" }],
    }));
    loadDeps = vi.fn((_request: DepsRequest) => deps);
    program = buildProgram({ runtime, loadDeps }, (root) => {
      root.exitOverride();
      root.configureOutput({ writeOut: () => {}, writeErr: () => {} });
    });
  });

  const run = (...args: string[]) => program.parseAsync(args, { from: "user" });

  it("registers the command groups", () => {
    expect(program.commands.map((c) => c.name())).toEqual(["config", "version", "user", "teams", "svc", "inc"]);
    const inc = program.commands.find((c) => c.name() === "inc");
    expect(inc?.commands.map((c) => c.name())).toEqual(["ls", "ack", "resolve", "snooze", "reassign"]);
  });

  it("prints the version", async () => {
    await run("version");

    expect(stdout).toEqual([VERSION]);
    expect(loadDeps).not.toHaveBeenCalled();
  });

  it("passes the group config path and global verbosity to the deps loader", async () => {
    await run("--verbose", "inc", "-c", "/tmp/pdctl-test.yaml", "ack", "P1");

    expect(loadDeps).toHaveBeenCalledWith({ config: "/tmp/pdctl-test.yaml", verbose: true });
    expect(client.acknowledge).toHaveBeenCalledWith([INCIDENTS[0]]);
  });

  it("reads -h as high urgency on inc ls", async () => {
    await run("inc", "ls", "-n", "-h", "-o", "json", "-f", "id");

    expect(client.listIncidents).toHaveBeenCalledWith({
      statuses: ["triggered"],
      urgencies: ["high"],
      userIds: ["PUSER01"],
      teamIds: undefined,
    });
    expect(JSON.parse(stdout[0])).toEqual([{ id: "P1" }, { id: "P2" }]);
  });

  it("snoozes for the given duration", async () => {
    await run("inc", "snooze", "-d", "60", "P2");

    expect(client.snooze).toHaveBeenCalledWith([INCIDENTS[1]], 60);
    expect(stdout).toEqual(["Snoozing incident P2 for 0:01:00"]);
  });

  it("reassigns to a user found by name", async () => {
    await run("inc", "reassign", "-u", "ann", "P1", "P2");

    expect(client.reassign).toHaveBeenCalledWith(INCIDENTS, ["U1"]);
  });

  it("lists services with a status filter", async () => {
    await run("svc", "ls", "-s", "active", "-o", "plain", "-f", "id,name");

    expect(stdout).toEqual(["S1\tapi"]);
  });

  it("exits 2 on a bad pattern", async () => {
    await run("inc", "ls", "-R", "(");

    expect(runtime.exit).toHaveBeenCalledWith(2);
    expect(stripAnsi(stderr[0])).toMatch(/^Invalid regular expression: /);
    expect(client.listIncidents).not.toHaveBeenCalled();
  });

  it("exits 1 on an API failure", async () => {
    client.listServices.mockRejectedValueOnce(new PagerDutyApiError(500, "GET", "/services", "boom"));

    await run("svc", "ls");

    expect(runtime.exit).toHaveBeenCalledWith(1);
    expect(stderr.map(stripAnsi)).toEqual(["PagerDuty API GET /services: 500 boom"]);
  });

  it("takes --rules-timeout in whole seconds", async () => {
    await expect(run("inc", "ls", "--rules-timeout", "0")).rejects.toMatchObject({
      code: "commander.invalidArgument",
    });
    expect(toListIncidentsOptions({ output: "table", rulesTimeout: 15 }).rulesTimeout).toBe(15);
    expect(loadDeps).not.toHaveBeenCalled();
  });

  it("rejects an unknown output mode before loading config", async () => {
    await expect(run("user", "ls", "-o", "xml")).rejects.toMatchObject({ code: "commander.invalidArgument" });
    expect(loadDeps).not.toHaveBeenCalled();
  });
});
