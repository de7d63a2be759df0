import { describe, it, expect, vi } from "vitest";
import { join } from "node:path";
import { tmpdir } from "node:os";
import type { Row } from "../../src/config/types.js";
import {
  classifyToken,
  extractAppVars,
  parseAppVar,
  parseUserVar,
  resolveAppVars,
  resolveUserVars,
} from "../../src/template/variables.js";
import { makeCache } from "../helpers/fixtures.js";

const envs: Row[] = [
  { name: "dev", user: "u1" },
  { name: "prod", user: "u2" },
];

const resolveSource = async (name: string): Promise<readonly Row[]> => (name === "envs" ? envs : []);

describe("token parsing", () => {
  it("parses app variables with and without an index", () => {
    expect(parseAppVar("$${db.host}")).toEqual({ source: "db", index: undefined, key: "host" });
    expect(parseAppVar("$${db[2].host}")).toEqual({ source: "db", index: 2, key: "host" });
    expect(parseAppVar("${db}")).toBeUndefined();
  });

  it("parses user variables but not the tail of an app variable", () => {
    expect(parseUserVar("${name}")).toBe("name");
    expect(parseUserVar("$${name}")).toBeUndefined();
  });

  it("classifies tokens", () => {
    expect(classifyToken("$${envs.name}").kind).toBe("app");
    expect(classifyToken("${file}")).toEqual({ kind: "user", name: "file" });
    expect(classifyToken("deploy")).toEqual({ kind: "static", text: "deploy" });
  });

  it("extracts every app variable in a template", () => {
    expect(extractAppVars("ssh $${hosts.ip} -p $${ports[1].num}")).toEqual([
      { source: "hosts", index: undefined, key: "ip" },
      { source: "ports", index: 1, key: "num" },
    ]);
  });
});

describe("resolveAppVars", () => {
  it("uses row 0 without a bound row (direct mode)", async () => {
    expect(await resolveAppVars("login $${envs.user}", { resolveSource })).toBe("login u1");
  });

  it("uses an explicit index", async () => {
    expect(await resolveAppVars("login $${envs[1].user}", { resolveSource })).toBe("login u2");
  });

  it("prefers the row bound during matching (list mode)", async () => {
    const contextVars = { envs: { name: "prod", user: "u2" } };
    expect(await resolveAppVars("login $${envs.user}", { resolveSource, contextVars })).toBe("login u2");
    expect(await resolveAppVars("login $${envs[0].user}", { resolveSource, contextVars })).toBe("login u1");
  });

  it("reads locals through the lookup", async () => {
    const localsLookup = (key: string) => (key === "region" ? "eu" : undefined);
    expect(
      await resolveAppVars("deploy $${locals.region} $${locals.zone}", { resolveSource, localsLookup }),
    ).toBe("deploy eu $${locals.zone}");
  });

  it("keeps out-of-bounds references and reports them", async () => {
    const onDiagnostic = vi.fn();
    expect(await resolveAppVars("x $${envs[5].user}", { resolveSource, onDiagnostic })).toBe("x $${envs[5].user}");
    expect(onDiagnostic).toHaveBeenCalledWith("Index 5 out of bounds for 'envs' (size: 2)");
  });

  it("keeps references to empty sources and missing keys", async () => {
    expect(await resolveAppVars("$${nothing.key} $${envs.missing}", { resolveSource })).toBe(
      "$${nothing.key} $${envs.missing}",
    );
  });

  it("keeps references to keys that only exist on Object.prototype", async () => {
    const cache = makeCache(join(tmpdir(), "dynalias-unused-cache.json"));
    const localsLookup = (key: string) => cache.getLocal(key);
    const contextVars = { envs: envs[1] ?? {} };

    expect(await resolveAppVars("x $${locals.constructor} y", { resolveSource, localsLookup })).toBe(
      "x $${locals.constructor} y",
    );
    expect(await resolveAppVars("$${envs.toString}", { resolveSource, contextVars })).toBe("$${envs.toString}");
    expect(await resolveAppVars("$${envs[0].valueOf}", { resolveSource })).toBe("$${envs[0].valueOf}");
  });

  it("stringifies non-string values", async () => {
    const rows: Row[] = [{ port: 5432, tags: ["a", "b"] }];
    const out = await resolveAppVars("$${db.port} $${db.tags}", { resolveSource: async () => rows });
    expect(out).toBe('5432 ["a","b"]');
  });

  it("reports each substitution", async () => {
    const onResolved = vi.fn();
    await resolveAppVars("$${envs.name}", { resolveSource, onResolved });
    expect(onResolved).toHaveBeenCalledWith("$${envs.name}", "dev");
  });
});

describe("resolveUserVars", () => {
  it("substitutes bound strings and leaves the rest", () => {
    expect(resolveUserVars("cp ${src} ${dst}", { src: "a.txt" })).toBe("cp a.txt ${dst}");
  });

  it("ignores rows and app-variable tails", () => {
    expect(resolveUserVars("$${x} ${envs}", { x: "1", envs: { name: "dev" } })).toBe("$${x} ${envs}");
  });
});
