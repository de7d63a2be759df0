import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { createSilentLogger } from "../../src/logging/logger.js";
import { makeCache, otherMachine } from "../helpers/fixtures.js";

describe("CacheStore", () => {
  let tempDir: string;
  let cachePath: string;
  let now: number;
  const clock = () => now;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), "dynalias-cache-test-"));
    cachePath = join(tempDir, "cache.json");
    now = 1_000;
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  describe("source entries", () => {
    it("serves an entry until its TTL has strictly elapsed", () => {
      const cache = makeCache(cachePath, { now: clock });
      cache.set("pods", [{ name: "api-1" }]);

      now = 1_300;
      expect(cache.get("pods")).toEqual([{ name: "api-1" }]);
      now = 1_301;
      expect(cache.get("pods")).toBeUndefined();
    });

    it("honours a per-source TTL", () => {
      const cache = makeCache(cachePath, { now: clock });
      cache.set("pods", [{ name: "api-1" }]);
      now = 1_011;
      expect(cache.get("pods", 10)).toBeUndefined();
      expect(cache.get("pods", 60)).toEqual([{ name: "api-1" }]);
    });

    it("returns nothing for unknown names", () => {
      expect(makeCache(cachePath).get("missing")).toBeUndefined();
    });
  });

  describe("persistence", () => {
    it("writes only an encrypted envelope and reads it back", async () => {
      const writer = makeCache(cachePath, { now: clock });
      writer.set("pods", [{ name: "api-1" }]);
      writer.addHistory("pg prod");
      await writer.save();

      const onDisk = JSON.parse(readFileSync(cachePath, "utf-8")) as Record<string, unknown>;
      expect(Object.keys(onDisk)).toEqual(["_crypt"]);
      expect(readFileSync(cachePath, "utf-8")).not.toContain("api-1");

      const reader = makeCache(cachePath, { now: clock });
      await reader.load();
      expect(reader.get("pods")).toEqual([{ name: "api-1" }]);
      expect(reader.getHistory()).toEqual(["pg prod"]);
    });

    it("starts empty when the file was encrypted on another machine", async () => {
      const writer = makeCache(cachePath);
      await writer.setLocal("env", "prod");

      const logger = createSilentLogger();
      const warn = vi.spyOn(logger, "warn");
      const reader = makeCache(cachePath, { machineIdentity: otherMachine, logger });
      await reader.load();

      expect(reader.getLocals()).toEqual({});
      expect(reader.snapshot()).toEqual({});
      expect(warn).toHaveBeenCalledTimes(1);
    });

    it("treats an unparseable file as empty", async () => {
      writeFileSync(cachePath, "{not json");
      const cache = makeCache(cachePath);
      await cache.load();
      expect(cache.snapshot()).toEqual({});
    });

    it("migrates a legacy plaintext cache on the next save", async () => {
      writeFileSync(
        cachePath,
        JSON.stringify({ pods: { timestamp: 1_000, data: [{ name: "api-1" }] }, _history: ["deploy"] }),
      );
      const cache = makeCache(cachePath, { now: clock });
      await cache.load();

      expect(cache.needsMigration).toBe(true);
      expect(cache.get("pods")).toEqual([{ name: "api-1" }]);
      expect(cache.getHistory()).toEqual(["deploy"]);

      await cache.save();
      expect(cache.needsMigration).toBe(false);
      const onDisk = JSON.parse(readFileSync(cachePath, "utf-8")) as Record<string, unknown>;
      expect(Object.keys(onDisk)).toEqual(["_crypt"]);
    });

    it("picks up writes made by another process on reload", async () => {
      const parent = makeCache(cachePath);
      await parent.load();

      const child = makeCache(cachePath);
      await child.setLocal("token", "test-secret");

      expect(parent.getLocal("token")).toBeUndefined();
      await parent.load();
      expect(parent.getLocal("token")).toBe("test-secret");
    });
  });

  describe("history", () => {
    it("keeps only the most recent entries", () => {
      const cache = makeCache(cachePath, { historyLimit: 3 });
      for (const entry of ["a", "b", "c", "d", "e"]) cache.addHistory(entry);
      expect(cache.getHistory()).toEqual(["c", "d", "e"]);
    });

    it("reports whether there was history to clear", async () => {
      const cache = makeCache(cachePath);
      expect(await cache.clearHistory()).toBe(false);
      cache.addHistory("pg prod");
      expect(await cache.clearHistory()).toBe(true);
      expect(cache.getHistory()).toEqual([]);
    });
  });

  describe("locals", () => {
    it("persists each local immediately", async () => {
      const cache = makeCache(cachePath);
      await cache.setLocal("env", "prod");
      await cache.setLocal("region", "eu");

      const reader = makeCache(cachePath);
      await reader.load();
      expect(reader.getLocals()).toEqual({ env: "prod", region: "eu" });
    });

    it("clears locals", async () => {
      const cache = makeCache(cachePath);
      expect(await cache.clearLocals()).toBe(false);
      await cache.setLocal("env", "prod");
      expect(await cache.clearLocals()).toBe(true);
      expect(cache.getLocal("env")).toBeUndefined();
    });

    it("does not report inherited object members as locals", async () => {
      const cache = makeCache(cachePath);
      await cache.setLocal("env", "prod");
      expect(cache.getLocal("constructor")).toBeUndefined();
      expect(cache.getLocal("toString")).toBeUndefined();
      expect(cache.getLocal("env")).toBe("prod");
    });
  });

  describe("clearing", () => {
    it("clearSources keeps history and locals", async () => {
      const cache = makeCache(cachePath);
      cache.set("pods", [{ name: "api-1" }]);
      cache.set("dbs", []);
      cache.addHistory("pg prod");
      await cache.setLocal("env", "prod");

      expect(await cache.clearSources()).toBe(2);
      expect(cache.get("pods")).toBeUndefined();
      expect(cache.getHistory()).toEqual(["pg prod"]);
      expect(cache.getLocals()).toEqual({ env: "prod" });
    });

    it("purgeExpired uses each source's TTL and the default for the rest", async () => {
      const cache = makeCache(cachePath, { now: clock });
      cache.set("short", [{ id: 1 }]);
      cache.set("long", [{ id: 2 }]);
      cache.addHistory("x");

      now = 1_100;
      expect(await cache.purgeExpired({ short: 50 })).toBe(1);
      expect(cache.get("short", 1_000)).toBeUndefined();
      expect(cache.get("long")).toEqual([{ id: 2 }]);
      expect(cache.getHistory()).toEqual(["x"]);
    });

    it("deleteAll removes the file", async () => {
      const cache = makeCache(cachePath);
      await cache.setLocal("env", "prod");
      expect(existsSync(cachePath)).toBe(true);

      expect(await cache.deleteAll()).toBe(true);
      expect(existsSync(cachePath)).toBe(false);
      expect(cache.getLocals()).toEqual({});
      expect(await cache.deleteAll()).toBe(false);
    });
  });

  describe("disabled", () => {
    it("stores nothing and never touches the disk", async () => {
      const cache = makeCache(cachePath, { enabled: false });
      cache.set("pods", [{ name: "api-1" }]);
      cache.addHistory("pg prod");
      await cache.setLocal("env", "prod");
      await cache.save();

      expect(cache.get("pods")).toBeUndefined();
      expect(cache.getHistory()).toEqual([]);
      expect(cache.getLocals()).toEqual({});
      expect(existsSync(cachePath)).toBe(false);
    });
  });
});
