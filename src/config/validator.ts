import { extractAppVars, LOCALS_SOURCE, type AppVarRef } from "../template/variables.js";
import { ConfigLoadError } from "../errors.js";
import { SHORTCUT } from "./paths.js";
import { readRawConfig } from "./loader.js";
import type { RawAliasConfig } from "./schema.js";

export type ValidationCheck = "load" | "names" | "references" | "indexes" | "priority" | "cycles";
export type ValidationSeverity = "ok" | "warning" | "error";

export interface ValidationResult {
  readonly check: ValidationCheck;
  readonly passed: boolean;
  readonly severity: ValidationSeverity;
  readonly message: string;
  readonly hint?: string;
}

export interface ValidationReport {
  readonly configPath: string;
  readonly results: readonly ValidationResult[];
}

export function failedResults(report: ValidationReport): ValidationResult[] {
  return report.results.filter((r) => !r.passed);
}

export function reportPassed(report: ValidationReport): boolean {
  return report.results.every((r) => r.passed);
}

interface TemplateSite {
  /** e.g. `command 'deploy'`, `arg in 'deploy'`. */
  readonly context: string;
  readonly text: string;
}

type RawCommand = RawAliasConfig["commands"][number];
type RawSub = RawCommand["sub"][number];
type RawArg = RawCommand["args"][number];

function* argSites(args: readonly RawArg[], parent: string): Generator<TemplateSite> {
  for (const arg of args) {
    const aliases = typeof arg.alias === "string" ? [arg.alias] : arg.alias;
    for (const alias of aliases) yield { context: `arg in '${parent}'`, text: alias };
    yield { context: `arg in '${parent}'`, text: arg.command };
  }
}

function* subSites(subs: readonly RawSub[], parent: string): Generator<TemplateSite> {
  for (const sub of subs) {
    yield { context: `subcommand in '${parent}'`, text: sub.alias };
    yield { context: `subcommand in '${parent}'`, text: sub.command };
    yield* subSites(sub.sub, parent);
    yield* argSites(sub.args, parent);
  }
}

/** Every command-tree template, then every dynamic source command. */
function* templateSites(config: RawAliasConfig): Generator<TemplateSite> {
  for (const cmd of config.commands) {
    yield { context: `command '${cmd.name}'`, text: cmd.alias };
    yield { context: `command '${cmd.name}'`, text: cmd.command };
    yield* subSites(cmd.sub, cmd.name);
    yield* argSites(cmd.args, cmd.name);
  }
  for (const dd of config.dynamicDicts) {
    yield { context: `dynamic dict '${dd.name}'`, text: dd.command };
  }
}

function checkNames(config: RawAliasConfig): ValidationResult[] {
  const results: ValidationResult[] = [];
  const seen = new Set<string>();
  const names = [...config.dicts.map((d) => d.name), ...config.dynamicDicts.map((d) => d.name)];

  for (const name of names) {
    if (name === LOCALS_SOURCE) {
      results.push({
        check: "names",
        passed: false,
        severity: "error",
        message: `'${LOCALS_SOURCE}' is a reserved source name`,
        hint: `Rename the dict; $\${${LOCALS_SOURCE}.key} always reads local variables`,
      });
    } else if (seen.has(name)) {
      results.push({
        check: "names",
        passed: false,
        severity: "error",
        message: `Source name '${name}' is defined more than once`,
        hint: "Dict and dynamic dict names share one namespace",
      });
    }
    seen.add(name);
  }

  if (results.length === 0) {
    results.push({ check: "names", passed: true, severity: "ok", message: "All source names are unique" });
  }
  return results;
}

function checkReferences(config: RawAliasConfig): ValidationResult[] {
  const known = new Set([...config.dicts.map((d) => d.name), ...config.dynamicDicts.map((d) => d.name), LOCALS_SOURCE]);
  const results: ValidationResult[] = [];

  for (const site of templateSites(config)) {
    for (const ref of extractAppVars(site.text)) {
      if (known.has(ref.source)) continue;
      results.push({
        check: "references",
        passed: false,
        severity: "error",
        message: `${site.context} references undefined source: '${ref.source}'`,
        hint: `Define a dict or dynamic dict named '${ref.source}'`,
      });
    }
  }

  if (results.length === 0) {
    results.push({ check: "references", passed: true, severity: "ok", message: "All dict/dynamic dict references are valid" });
  }
  return results;
}

function checkIndexes(config: RawAliasConfig): ValidationResult[] {
  const staticRows = new Map(config.dicts.map((d) => [d.name, d.data]));
  const results: ValidationResult[] = [];

  const check = (ref: AppVarRef, context: string): ValidationResult | undefined => {
    const rows = staticRows.get(ref.source);
    if (!rows) return undefined;

    const index = ref.index ?? 0;
    const row = rows[index];
    if (!row) {
      return {
        check: "indexes",
        passed: false,
        severity: "error",
        message: `${context} uses index [${index}] but '${ref.source}' only has ${rows.length} items`,
        hint: rows.length > 0 ? `Valid indices for '${ref.source}': 0 to ${rows.length - 1}` : `Dict '${ref.source}' is empty`,
      };
    }
    if (!Object.hasOwn(row, ref.key)) {
      const keys = Object.keys(row);
      return {
        check: "indexes",
        passed: false,
        severity: "error",
        message: `${context} references key '${ref.key}' not found at '${ref.source}[${index}]'`,
        hint: keys.length > 0 ? `Available keys at position ${index}: ${keys.join(", ")}` : "Item has no keys",
      };
    }
    return undefined;
  };

  for (const site of templateSites(config)) {
    for (const ref of extractAppVars(site.text)) {
      const failure = check(ref, site.context);
      if (failure) results.push(failure);
    }
  }

  if (results.length === 0) {
    results.push({ check: "indexes", passed: true, severity: "ok", message: "All dict index and key references are valid" });
  }
  return results;
}

function checkPriorities(config: RawAliasConfig): ValidationResult[] {
  const priorities = new Map(config.dynamicDicts.map((d) => [d.name, d.priority]));
  const results: ValidationResult[] = [];

  for (const dd of config.dynamicDicts) {
    for (const ref of extractAppVars(dd.command)) {
      const refPriority = priorities.get(ref.source);
      if (refPriority === undefined || refPriority < dd.priority) continue;
      // Resolution is lazy, so an out-of-order reference still works.
      results.push({
        check: "priority",
        passed: true,
        severity: "warning",
        message: `dynamic dict '${dd.name}' (priority ${dd.priority}) references '${ref.source}' (priority ${refPriority})`,
      });
    }
  }

  results.push({ check: "priority", passed: true, severity: "ok", message: "Priority order checked" });
  return results;
}

/** Cycles among dynamic sources, each as a closed path such as `a -> b -> a`. */
export function findCycles(config: RawAliasConfig): string[][] {
  const graph = new Map<string, string[]>();
  for (const dd of config.dynamicDicts) graph.set(dd.name, []);
  for (const dd of config.dynamicDicts) {
    const deps = extractAppVars(dd.command).map((r) => r.source).filter((s) => graph.has(s));
    graph.set(dd.name, [...new Set(deps)]);
  }

  const visited = new Set<string>();
  const onStack = new Set<string>();
  const cycles: string[][] = [];

  const visit = (node: string, path: string[]): string[] | undefined => {
    if (onStack.has(node)) return [...path.slice(path.indexOf(node)), node];
    if (visited.has(node)) return undefined;

    visited.add(node);
    onStack.add(node);
    path.push(node);
    for (const dep of graph.get(node) ?? []) {
      const cycle = visit(dep, path);
      if (cycle) return cycle;
    }
    path.pop();
    onStack.delete(node);
    return undefined;
  };

  for (const name of graph.keys()) {
    if (visited.has(name)) continue;
    onStack.clear();
    const cycle = visit(name, []);
    if (cycle) cycles.push(cycle);
  }
  return cycles;
}

function checkCycles(config: RawAliasConfig): ValidationResult[] {
  const cycles = findCycles(config);
  if (cycles.length === 0) {
    return [{ check: "cycles", passed: true, severity: "ok", message: "No circular references in dynamic dict dependencies" }];
  }
  return cycles.map((cycle): ValidationResult => ({
    check: "cycles",
    passed: false,
    severity: "error",
    message: `Circular reference detected: ${cycle.join(" -> ")}`,
    hint: "Break the cycle by using a static dict or restructuring dependencies",
  }));
}

export function validateConfig(config: RawAliasConfig, configPath = "<inline>"): ValidationReport {
  return {
    configPath,
    results: [
      { check: "load", passed: true, severity: "ok", message: "Config file is valid JSON and matches the schema" },
      ...checkNames(config),
      ...checkReferences(config),
      ...checkIndexes(config),
      ...checkPriorities(config),
      ...checkCycles(config),
    ],
  };
}

export function validateFile(configPath: string): ValidationReport {
  let config: RawAliasConfig;
  try {
    config = readRawConfig(configPath);
  } catch (err) {
    if (!(err instanceof ConfigLoadError)) throw err;
    return {
      configPath,
      results: [{ check: "load", passed: false, severity: "error", message: err.message }],
    };
  }
  return validateConfig(config, configPath);
}

export function formatReport(report: ValidationReport): string {
  const rule = "=".repeat(60);
  const thin = "  " + "-".repeat(40);
  const lines = [
    "",
    rule,
    `  Configuration Validator (${SHORTCUT})`,
    rule,
    "",
    `  Config: ${report.configPath}`,
    "",
    "  VALIDATION CHECKLIST",
    thin,
  ];

  for (const result of report.results) {
    const status = !result.passed ? "FAIL" : result.severity === "warning" ? "WARN" : "OK";
    lines.push(`  [${status}] ${result.message}`);
    if (!result.passed && result.hint) lines.push(`      Hint: ${result.hint}`);
  }

  const total = report.results.length;
  const failed = failedResults(report).length;
  lines.push("", thin, "  SUMMARY", thin, "");
  if (failed === 0) {
    lines.push(`  [OK] All ${total} checks passed!`, "", "  Configuration is valid.");
  } else {
    lines.push(
      `  Results: ${total - failed}/${total} passed, ${failed} failed`,
      "",
      `  [FAIL] Configuration has ${failed} error(s).`,
      "  Please fix the issues above and run validation again.",
    );
  }
  lines.push("", rule, "");
  return lines.join("\n");
}

/** Errors only, for the check that runs before every command. */
export function formatErrors(report: ValidationReport): string {
  const failed = failedResults(report);
  const lines = [`[${SHORTCUT.toUpperCase()}] Configuration errors found in: ${report.configPath}`, "-".repeat(50)];
  for (const result of failed) {
    lines.push(`  [FAIL] ${result.message}`);
    if (result.hint) lines.push(`    Hint: ${result.hint}`);
  }
  lines.push(
    "-".repeat(50),
    `Fix the ${failed.length} error(s) above or run '${SHORTCUT} --${SHORTCUT}-validate' for full report.`,
    "",
  );
  return lines.join("\n");
}
