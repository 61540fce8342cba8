import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, expect, it, vi } from "vitest";

import { createTestRuntime } from "../../test/runtime.js";
import { createConfigIO } from "../config/io.js";
import { ConfigurationError } from "../errors.js";
import { configCommand } from "./config.js";

async function withTempHome(run: (home: string) => Promise<void>): Promise<void> {
  const home = await fs.mkdtemp(path.join(os.tmpdir(), "pdctl-config-cmd-"));
  try {
    await run(home);
  } finally {
    await fs.rm(home, { recursive: true, force: true });
  }
}

describe("configCommand", () => {
  it("writes the values passed as flags", async () => {
    await withTempHome(async (home) => {
      const { runtime, stdout } = createTestRuntime();
      const io = { env: {}, homedir: () => home };

      await configCommand(
        { apikey: "test-secret", email: "oncall@example.com", uid: "PUSER01" },
        runtime,
        { prompt: null, io },
      );

      const file = path.join(home, ".config", "pdctl.yaml");
      expect(stdout).toEqual([`Config written to ${file}`]);
      expect(await fs.readFile(file, "utf8")).toBe(
        "apikey: test-secret\nemail: oncall@example.com\nuid: PUSER01\n",
      );
    });
  });

  it("asks for missing values", async () => {
    await withTempHome(async (home) => {
      const { runtime } = createTestRuntime();
      const prompt = vi.fn(async (question: string) =>
        question.includes("email") ? "oncall@example.com" : "PUSER01",
      );
      const io = { env: {}, homedir: () => home };

      await configCommand({ apikey: "test-secret" }, runtime, { prompt, io });

      expect(prompt).toHaveBeenCalledTimes(2);
      expect(createConfigIO(io).loadConfig().uid).toBe("PUSER01");
    });
  });

  it("keeps the existing file's values under new flags", async () => {
    await withTempHome(async (home) => {
      const { runtime } = createTestRuntime();
      const io = { env: {}, homedir: () => home };
      await createConfigIO(io).writeConfig({
        apikey: "test-secret",
        email: "oncall@example.com",
        uid: "PUSER01",
        timeZone: "Europe/Rome",
      });

      await configCommand({ uid: "PUSER02" }, runtime, { prompt: null, io });

      const config = createConfigIO(io).loadConfig();
      expect(config.uid).toBe("PUSER02");
      expect(config.apikey).toBe("test-secret");
      expect(config.timeZone).toBe("Europe/Rome");
    });
  });

  it("fails without a prompt when values are missing", async () => {
    await withTempHome(async (home) => {
      const { runtime } = createTestRuntime();
      const io = { env: {}, homedir: () => home };

      const result = configCommand({ apikey: "test-secret" }, runtime, { prompt: null, io });

      await expect(result).rejects.toBeInstanceOf(ConfigurationError);
      await expect(result).rejects.toThrow("Missing required config values: email, uid");
      expect(createConfigIO(io).exists()).toBe(false);
    });
  });
});
