import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { RunCommand } from "../../src/cli/commands/run.js";
import {
  ClearAllCommand,
  ClearCacheCommand,
  ClearHistoryCommand,
  PurgeExpiredCommand,
} from "../../src/cli/commands/cache-cmd.js";
import { ClearLocalsCommand, ListLocalsCommand, SetLocalsCommand } from "../../src/cli/commands/locals-cmd.js";
import { AppHelpCommand, ValidateCommand } from "../../src/cli/commands/validate.js";
import type { DynaliasCommand } from "../../src/cli/commands/base.js";
import { createSilentLogger } from "../../src/logging/logger.js";
import { captureStdout, FakeRunner, makeCache, testMachine } from "../helpers/fixtures.js";

const config = {
  dicts: [{ name: "envs", data: [{ name: "dev" }, { name: "prod" }] }],
  dynamicDicts: [{ name: "pods", command: "get pods", mapping: { name: "n" }, cacheTtl: 10 }],
  commands: [{ name: "greet", alias: "greet $${envs.name}", command: "echo hello $${envs.name}", helper: "Say hello" }],
};

describe("CLI commands", () => {
  let tempDir: string;
  let configPath: string;
  let cachePath: string;
  let runner: FakeRunner;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), "dynalias-cli-test-"));
    configPath = join(tempDir, "dyal.json");
    cachePath = join(tempDir, "dyal-cache.json");
    writeFileSync(configPath, JSON.stringify(config));
    runner = new FakeRunner();
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  function prepare<T extends DynaliasCommand>(cmd: T, now?: () => number): { cmd: T; output: () => string } {
    cmd.configOverride = configPath;
    cmd.cacheOverride = cachePath;
    cmd.services = { runner, logger: createSilentLogger(), machineIdentity: testMachine, now };
    const { stream, output } = captureStdout();
    cmd.context = { ...cmd.context, stdout: stream };
    return { cmd, output };
  }

  function runWith(tokens: string[]) {
    const prepared = prepare(new RunCommand());
    prepared.cmd.tokens = tokens;
    return prepared;
  }

  describe("RunCommand", () => {
    it("runs a matched alias and records it in history", async () => {
      const { cmd, output } = runWith(["greet", "prod"]);

      expect(await cmd.execute()).toBe(0);
      expect(output()).toBe(`Running: echo hello prod\n${"-".repeat(30)}\n`);
      expect(runner.commands).toEqual(["echo hello prod"]);

      const cache = makeCache(cachePath);
      await cache.load();
      expect(cache.getHistory()).toEqual(["greet prod"]);
    });

    it("returns the command's exit code", async () => {
      runner = new FakeRunner(() => ({ exitCode: 2 }));
      const { cmd } = runWith(["greet", "dev"]);
      expect(await cmd.execute()).toBe(2);
    });

    it("prints the global helper without tokens", async () => {
      const { cmd, output } = runWith([]);
      expect(await cmd.execute()).toBe(0);
      expect(output()).toContain("DYNALIAS Helper");
      expect(output()).toContain("  greet (alias: greet $${envs.name})\n    Say hello\n");
    });

    it("prints command help on a partial match", async () => {
      const { cmd, output } = runWith(["greet", "-h"]);
      expect(await cmd.execute()).toBe(0);
      expect(output()).toContain("    Description:\n        Say hello\n");
      expect(runner.runs).toHaveLength(0);
    });

    it("reports an unknown command", async () => {
      const { cmd, output } = runWith(["nope"]);
      expect(await cmd.execute()).toBe(1);
      expect(output()).toBe("Error: Command not found.\n");
    });

    it("fails on a missing config", async () => {
      const { cmd, output } = runWith(["greet", "dev"]);
      cmd.configOverride = join(tempDir, "missing.json");
      expect(await cmd.execute()).toBe(1);
      expect(output()).toBe(`Error: Failed to load config "${join(tempDir, "missing.json")}": file not found\n`);
    });

    it("falls back to the application help when only help was asked for", async () => {
      const { cmd, output } = runWith(["-h"]);
      cmd.configOverride = join(tempDir, "missing.json");
      expect(await cmd.execute()).toBe(0);
      expect(output()).toContain("DYNALIAS Application Help");
    });

    it("refuses to run with an invalid config", async () => {
      writeFileSync(configPath, JSON.stringify({ commands: [{ name: "x", alias: "x", command: "$${ghost.k}" }] }));
      const { cmd, output } = runWith(["x"]);
      expect(await cmd.execute()).toBe(1);
      expect(output()).toContain("  [FAIL] command 'x' references undefined source: 'ghost'\n");
      expect(runner.runs).toHaveLength(0);
    });
  });

  describe("locals", () => {
    it("sets, lists and clears locals", async () => {
      const set = prepare(new SetLocalsCommand());
      set.cmd.key = "env";
      set.cmd.value = "prod";
      await set.cmd.execute();
      expect(set.output()).toBe("Local variable set: env=prod\n");

      const list = prepare(new ListLocalsCommand());
      await list.cmd.execute();
      expect(list.output()).toBe("env=prod\n");

      const clear = prepare(new ClearLocalsCommand());
      await clear.cmd.execute();
      expect(clear.output()).toBe("Local variables cleared\n");

      const empty = prepare(new ListLocalsCommand());
      await empty.cmd.execute();
      expect(empty.output()).toBe("No local variables set\n");
    });
  });

  describe("cache management", () => {
    async function seed(now: number): Promise<void> {
      const cache = makeCache(cachePath, { now: () => now });
      cache.set("pods", [{ name: "api-1" }]);
      cache.set("other", [{ name: "x" }]);
      cache.addHistory("greet dev");
      await cache.save();
    }

    it("clears source entries but keeps history", async () => {
      await seed(1_000);
      const { cmd, output } = prepare(new ClearCacheCommand());
      await cmd.execute();
      expect(output()).toBe("Cleared 2 cache entries (history preserved)\n");

      const cache = makeCache(cachePath);
      await cache.load();
      expect(cache.getHistory()).toEqual(["greet dev"]);
    });

    it("clears history", async () => {
      await seed(1_000);
      const first = prepare(new ClearHistoryCommand());
      await first.cmd.execute();
      expect(first.output()).toBe("Command history cleared\n");

      const second = prepare(new ClearHistoryCommand());
      await second.cmd.execute();
      expect(second.output()).toBe("No history to clear\n");
    });

    it("deletes the cache file", async () => {
      await seed(1_000);
      const first = prepare(new ClearAllCommand());
      await first.cmd.execute();
      expect(first.output()).toBe(`Cache file deleted: ${cachePath}\n`);

      const second = prepare(new ClearAllCommand());
      await second.cmd.execute();
      expect(second.output()).toBe(`Cache file not found: ${cachePath}\n`);
    });

    it("purges entries past their configured TTL", async () => {
      await seed(1_000);
      const { cmd, output } = prepare(new PurgeExpiredCommand(), () => 1_100);
      await cmd.execute();
      expect(output()).toBe("Purged 1 expired cache entries\n");
    });
  });

  describe("ValidateCommand", () => {
    it("passes a valid config", async () => {
      const { cmd, output } = prepare(new ValidateCommand());
      expect(await cmd.execute()).toBe(0);
      expect(output()).toContain("  [OK] All 6 checks passed!\n");
    });

    it("fails a missing config", async () => {
      const { cmd } = prepare(new ValidateCommand());
      cmd.configOverride = join(tempDir, "missing.json");
      expect(await cmd.execute()).toBe(1);
    });
  });

  describe("AppHelpCommand", () => {
    it("prints the reserved arguments", async () => {
      const cmd = new AppHelpCommand();
      const { stream, output } = captureStdout();
      cmd.context = { ...cmd.context, stdout: stream };
      await cmd.execute();
      expect(output()).toContain("Reserved Arguments:");
    });
  });
});
