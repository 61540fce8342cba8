import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";

import { ConfigFileError } from "../errors.js";
import { createConfigIO, resolveConfigPath } from "./io.js";

async function withTempHome(run: (home: string) => Promise<void>): Promise<void> {
  const home = await fs.mkdtemp(path.join(os.tmpdir(), "pdctl-config-"));
  try {
    await run(home);
  } finally {
    await fs.rm(home, { recursive: true, force: true });
  }
}

async function writeYaml(home: string, text: string, rel = ".config/pdctl.yaml"): Promise<string> {
  const file = path.join(home, rel);
  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.writeFile(file, text);
  return file;
}

const VALID = ["apikey: test-secret", "email: oncall@example.com", "uid: PUSER01", ""].join("\n");

describe("resolveConfigPath", () => {
  it("prefers the explicit path, expanding ~", () => {
    expect(
      resolveConfigPath({
        configPath: "~/custom.yaml",
        env: { PDCTL_CONFIG: "/elsewhere.yaml" },
        homedir: () => "/home/ops",
      }),
    ).toBe(path.resolve("/home/ops/custom.yaml"));
  });

  it("falls back to PDCTL_CONFIG, then the default location", () => {
    expect(resolveConfigPath({ env: { PDCTL_CONFIG: "/etc/pdctl.yaml" }, homedir: () => "/home/ops" })).toBe(
      path.resolve("/etc/pdctl.yaml"),
    );
    expect(resolveConfigPath({ env: {}, homedir: () => "/home/ops" })).toBe(
      path.join("/home/ops", ".config", "pdctl.yaml"),
    );
  });
});

describe("config io", () => {
  it("loads a valid file and applies defaults", async () => {
    await withTempHome(async (home) => {
      const file = await writeYaml(home, VALID);

      const io = createConfigIO({ env: {}, homedir: () => home });

      expect(io.configPath).toBe(file);
      expect(io.exists()).toBe(true);
      expect(io.loadConfig()).toEqual({
        apikey: "test-secret",
        email: "oncall@example.com",
        uid: "PUSER01",
        apiUrl: "https://api.pagerduty.com",
        timeZone: "UTC",
        rulesPath: "~/.config/pdctl/rules",
        rulesOnError: "abort",
        logLevel: "warn",
      });
    });
  });

  it("reports a missing file as a configuration error", async () => {
    await withTempHome(async (home) => {
      const io = createConfigIO({ env: {}, homedir: () => home });

      expect(io.exists()).toBe(false);
      expect(() => io.loadConfig()).toThrow(ConfigFileError);
      expect(() => io.loadConfig()).toThrow(`Config file not found: ${io.configPath}`);
    });
  });

  it("lists every schema issue by path", async () => {
    await withTempHome(async (home) => {
      await writeYaml(home, "email: not-an-email\nlogLevel: loud\n");
      const io = createConfigIO({ env: {}, homedir: () => home });

      let error: unknown;
      try {
        io.loadConfig();
      } catch (err) {
        error = err;
      }

      expect(error).toBeInstanceOf(ConfigFileError);
      if (error instanceof ConfigFileError) {
        expect(error.issues.map((issue) => issue.path).sort()).toEqual(["apikey", "email", "logLevel", "uid"]);
        expect(error.hint).toBe(`Run \`pdctl config -c ${io.configPath}\` to create or repair it.`);
      }
    });
  });

  it("reads the rule timeout and rejects a non-positive one", async () => {
    await withTempHome(async (home) => {
      await writeYaml(home, `${VALID}rulesTimeout: 30\n`);
      const io = createConfigIO({ env: {}, homedir: () => home });
      expect(io.loadConfig().rulesTimeout).toBe(30);

      await writeYaml(home, `${VALID}rulesTimeout: 0\n`);
      expect(() => io.loadConfig()).toThrow(ConfigFileError);
    });
  });

  it("rejects malformed YAML", async () => {
    await withTempHome(async (home) => {
      await writeYaml(home, "apikey: [unclosed\n");
      const io = createConfigIO({ env: {}, homedir: () => home });

      expect(() => io.loadConfig()).toThrow(/^Invalid YAML in /);
    });
  });

  it("writes a private file, creating the directory", async () => {
    await withTempHome(async (home) => {
      const io = createConfigIO({ configPath: path.join(home, "nested", "dir", "pdctl.yaml"), env: {} });

      await io.writeConfig({ apikey: "test-secret", email: "oncall@example.com", uid: "PUSER01", timeZone: "Europe/Rome" });

      const stat = await fs.stat(io.configPath);
      expect(stat.mode & 0o777).toBe(0o600);
      expect(io.loadConfig().timeZone).toBe("Europe/Rome");
      expect(await fs.readFile(io.configPath, "utf8")).toBe(
        "apikey: test-secret\nemail: oncall@example.com\nuid: PUSER01\ntimeZone: Europe/Rome\n",
      );
    });
  });

  it("refuses to write an invalid config", async () => {
    await withTempHome(async (home) => {
      const io = createConfigIO({ env: {}, homedir: () => home });

      await expect(io.writeConfig({ apikey: "", email: "oncall@example.com", uid: "U" })).rejects.toThrow(
        ConfigFileError,
      );
      expect(io.exists()).toBe(false);
    });
  });
});
