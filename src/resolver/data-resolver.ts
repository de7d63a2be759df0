import type { AliasModel, DynamicSource, Row } from "../config/types.js";
import type { CacheStore } from "../cache/store.js";
import type { Logger } from "../logging/logger.js";
import type { RunResult, ShellRunner } from "../process/runner.js";
import { resolveAppVars } from "../template/variables.js";
import {
  CircularDependencyError,
  ConfigReferenceError,
  SourceExecutionError,
} from "../errors.js";

export interface DataResolverOpts {
  model: AliasModel;
  cache: CacheStore;
  runner: ShellRunner;
  logger: Logger;
}

const PREVIEW_LENGTH = 100;

function preview(text: string, max = PREVIEW_LENGTH): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Lazy, memoized resolution of named sources.
 *
 * Dynamic sources may reference other sources inside their command; those
 * are resolved recursively. The in-progress set breaks cycles: a source that
 * is reached again while it is still resolving yields no rows.
 */
export class DataResolver {
  private readonly model: AliasModel;
  private readonly cache: CacheStore;
  private readonly runner: ShellRunner;
  private readonly logger: Logger;
  private readonly resolved = new Map<string, readonly Row[]>();
  private readonly inProgress = new Set<string>();

  constructor(opts: DataResolverOpts) {
    this.model = opts.model;
    this.cache = opts.cache;
    this.runner = opts.runner;
    this.logger = opts.logger;
  }

  /** Names currently being resolved, in the order they were entered. */
  get resolving(): readonly string[] {
    return [...this.inProgress];
  }

  isKnown(name: string): boolean {
    return this.model.staticSources.has(name) || this.model.dynamicSources.has(name);
  }

  sourceNames(): string[] {
    return [...this.model.staticSources.keys(), ...this.model.dynamicSources.keys()];
  }

  async resolveOne(name: string): Promise<readonly Row[]> {
    const memo = this.resolved.get(name);
    if (memo) return memo;

    if (!this.isKnown(name)) {
      const err = new ConfigReferenceError(name, this.sourceNames());
      this.logger.warn({ err, available: err.available }, `Source '${name}' not found in dicts or dynamic dicts`);
      return [];
    }

    const staticSource = this.model.staticSources.get(name);
    if (staticSource) {
      this.resolved.set(name, staticSource.rows);
      return staticSource.rows;
    }

    const dynamicSource = this.model.dynamicSources.get(name);
    return dynamicSource ? this.resolveDynamic(dynamicSource) : [];
  }

  /** Resolves every static source, then every dynamic source by ascending priority. */
  async resolveAll(): Promise<void> {
    for (const name of this.model.staticSources.keys()) {
      await this.resolveOne(name);
    }
    for (const name of this.model.dynamicSources.keys()) {
      await this.resolveOne(name);
    }
  }

  private async resolveDynamic(source: DynamicSource): Promise<readonly Row[]> {
    const { name } = source;
    if (this.inProgress.has(name)) {
      const err = new CircularDependencyError([...this.inProgress, name]);
      this.logger.warn({ err }, err.message);
      return [];
    }

    this.inProgress.add(name);
    try {
      const cached = this.cache.get(name, source.cacheTtl);
      if (cached) {
        if (cached.length === 0) {
          this.logger.warn({ source: name }, `Dynamic source '${name}' has empty cached data; clear the cache to refresh`);
        }
        this.logger.debug({ source: name }, "Loaded dynamic source from cache");
        this.resolved.set(name, cached);
        return cached;
      }

      const started = performance.now();
      const rows = await this.fetch(source);
      const elapsed = ((performance.now() - started) / 1000).toFixed(2);
      this.logger.debug({ source: name }, `Executed dynamic source '${name}' in ${elapsed}s`);

      if (rows.length === 0) {
        this.logger.warn(
          { source: name, command: preview(source.command) },
          `Dynamic source '${name}' returned no rows`,
        );
      }

      this.cache.set(name, rows);
      await this.cache.save();
      this.resolved.set(name, rows);
      return rows;
    } finally {
      this.inProgress.delete(name);
    }
  }

  private async fetch(source: DynamicSource): Promise<Row[]> {
    const command = await resolveAppVars(source.command, {
      resolveSource: (dep) => this.resolveOne(dep),
      onDiagnostic: (message) => this.logger.warn({ source: source.name }, message),
    });

    try {
      return await this.execute(source, command);
    } catch (err) {
      if (!(err instanceof SourceExecutionError)) throw err;
      this.logger.warn({ err, reason: err.reason, command: preview(command) }, err.message);
      return [];
    }
  }

  private async execute(source: DynamicSource, command: string): Promise<Row[]> {
    let result: RunResult;
    try {
      result = await this.runner.capture(command, { timeoutMs: source.timeout * 1000 });
    } catch (err) {
      throw new SourceExecutionError(source.name, "spawn", err instanceof Error ? err.message : String(err), {
        cause: err,
      });
    }

    if (result.timedOut) {
      throw new SourceExecutionError(source.name, "timeout", `command timed out after ${source.timeout}s`);
    }
    if (result.exitCode !== 0) {
      throw new SourceExecutionError(
        source.name,
        "exit",
        `exit code ${result.exitCode ?? result.signal ?? "unknown"}: ${result.stderr.trim()}`,
      );
    }

    const stdout = result.stdout.trim();
    if (!stdout) {
      throw new SourceExecutionError(source.name, "empty", "command produced no output (expected a JSON array or object)");
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(stdout) as unknown;
    } catch (err) {
      throw new SourceExecutionError(
        source.name,
        "json",
        `invalid JSON output: ${err instanceof Error ? err.message : String(err)}; output: ${preview(stdout, 200)}`,
        { cause: err },
      );
    }

    if (!Array.isArray(parsed) && !isRecord(parsed)) {
      throw new SourceExecutionError(source.name, "shape", "output must be a JSON array of objects or a single object");
    }

    // A bare object is a single row.
    const items: unknown[] = Array.isArray(parsed) ? parsed : [parsed];
    return this.mapRows(source, items);
  }

  private mapRows(source: DynamicSource, items: readonly unknown[]): Row[] {
    const rows: Row[] = [];
    for (const item of items) {
      if (!isRecord(item)) continue;
      const row: Record<string, unknown> = {};
      for (const [internalKey, externalKey] of Object.entries(source.mapping)) {
        if (Object.hasOwn(item, externalKey)) row[internalKey] = item[externalKey];
      }
      if (Object.keys(row).length > 0) rows.push(row);
    }
    return rows;
  }
}
