import { mkdir, readFile, rm, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { Row } from "../config/types.js";
import { HISTORY_SIZE_CAP } from "../config/schema.js";
import type { Logger } from "../logging/logger.js";
import { CacheCorruptionError } from "../errors.js";
import { decryptDocument, deriveKey, encryptDocument, type CacheDocument } from "./crypto.js";
import { machineIdentity, type MachineIdentityProbe } from "./machine-id.js";

export const CACHE_KEY_HISTORY = "_history";
export const CACHE_KEY_LOCALS = "_locals";
export const CACHE_KEY_CRYPT = "_crypt";
export const DEFAULT_SOURCE_TTL = 300;

export interface CacheEntry {
  readonly timestamp: number;
  readonly data: Row[];
}

export interface CacheStoreOptions {
  readonly filePath: string;
  readonly logger: Logger;
  readonly enabled?: boolean;
  readonly historyLimit?: number;
  readonly machineIdentity?: MachineIdentityProbe;
  /** Current time in whole seconds. */
  readonly now?: () => number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isRowArray(value: unknown): value is Row[] {
  return Array.isArray(value) && value.every(isRecord);
}

function asEntry(value: unknown): CacheEntry | undefined {
  if (!isRecord(value) || !isRowArray(value["data"])) return undefined;
  const timestamp = typeof value["timestamp"] === "number" ? value["timestamp"] : 0;
  return { timestamp, data: value["data"] };
}

/**
 * Persistent key/value cache for resolved source rows, history and locals.
 *
 * Everything lives in memory after `load()`; `save()` writes the whole
 * document encrypted. Neither ever throws: a cache that cannot be read is
 * treated as empty and a failed write is logged. There is no file locking;
 * callers that spawn processes sharing the file reload before saving.
 */
export class CacheStore {
  readonly filePath: string;
  private readonly logger: Logger;
  private readonly enabled: boolean;
  private readonly historyLimit: number;
  private readonly probe: MachineIdentityProbe;
  private readonly now: () => number;
  private doc: CacheDocument = {};
  private derivedKey: Buffer | undefined;
  private migrationPending = false;

  constructor(opts: CacheStoreOptions) {
    this.filePath = opts.filePath;
    this.logger = opts.logger;
    this.enabled = opts.enabled ?? true;
    this.historyLimit = Math.min(opts.historyLimit ?? 20, HISTORY_SIZE_CAP);
    this.probe = opts.machineIdentity ?? machineIdentity;
    this.now = opts.now ?? (() => Math.floor(Date.now() / 1000));
  }

  /** True after loading a legacy plaintext cache that has not been re-saved yet. */
  get needsMigration(): boolean {
    return this.migrationPending;
  }

  async load(): Promise<void> {
    if (!this.enabled) return;

    let content: string;
    try {
      content = await readFile(this.filePath, "utf-8");
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code !== "ENOENT") {
        this.logger.warn({ err, path: this.filePath }, "Failed to read cache file");
      }
      return;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content) as unknown;
    } catch (err) {
      this.logger.warn(
        { err: new CacheCorruptionError("Cache file is not valid JSON", { cause: err }), path: this.filePath },
        "Ignoring unreadable cache",
      );
      this.doc = {};
      return;
    }

    if (!isRecord(raw)) {
      this.logger.warn({ path: this.filePath }, "Ignoring cache file that is not a JSON object");
      this.doc = {};
      return;
    }

    const blob = raw[CACHE_KEY_CRYPT];
    if (blob === undefined) {
      this.doc = raw;
      this.migrationPending = Object.keys(raw).length > 0;
      return;
    }

    try {
      if (typeof blob !== "string") {
        throw new CacheCorruptionError(`"${CACHE_KEY_CRYPT}" must be a base64 string`);
      }
      this.doc = decryptDocument(blob, await this.key());
    } catch (err) {
      this.logger.warn(
        { err, path: this.filePath },
        "Failed to decrypt cache; it may have been created on a different machine. Starting empty",
      );
      this.doc = {};
    }
  }

  async save(): Promise<void> {
    if (!this.enabled) return;
    try {
      const encrypted = encryptDocument(this.doc, await this.key());
      await mkdir(dirname(this.filePath), { recursive: true });
      await writeFile(this.filePath, JSON.stringify({ [CACHE_KEY_CRYPT]: encrypted }), "utf-8");
      this.migrationPending = false;
    } catch (err) {
      this.logger.warn({ err, path: this.filePath }, "Failed to save cache");
    }
  }

  get(name: string, ttl = DEFAULT_SOURCE_TTL): Row[] | undefined {
    if (!this.enabled) return undefined;
    const entry = asEntry(this.doc[name]);
    if (!entry) return undefined;
    if (this.now() - entry.timestamp > ttl) return undefined;
    return entry.data;
  }

  set(name: string, rows: readonly Row[]): void {
    if (!this.enabled) return;
    const entry: CacheEntry = { timestamp: this.now(), data: [...rows] };
    this.doc[name] = entry;
  }

  /** Removes every source entry, keeping `_`-prefixed ones. Returns the count removed. */
  async clearSources(): Promise<number> {
    if (!this.enabled) return 0;
    const keys = Object.keys(this.doc).filter((k) => !k.startsWith("_"));
    for (const key of keys) delete this.doc[key];
    await this.save();
    return keys.length;
  }

  /** Removes source entries older than their TTL (default 300s). Returns the count removed. */
  async purgeExpired(ttlMap: Readonly<Record<string, number>>): Promise<number> {
    if (!this.enabled) return 0;
    const now = this.now();
    const expired: string[] = [];

    for (const [key, value] of Object.entries(this.doc)) {
      if (key.startsWith("_") || !isRecord(value)) continue;
      const timestamp = typeof value["timestamp"] === "number" ? value["timestamp"] : 0;
      const ttl = ttlMap[key] ?? DEFAULT_SOURCE_TTL;
      if (now - timestamp > ttl) expired.push(key);
    }

    for (const key of expired) delete this.doc[key];
    if (expired.length > 0) await this.save();
    return expired.length;
  }

  /** Deletes the cache file and resets memory. Returns whether a file was removed. */
  async deleteAll(): Promise<boolean> {
    this.doc = {};
    this.migrationPending = false;
    try {
      await rm(this.filePath);
      return true;
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code !== "ENOENT") {
        this.logger.warn({ err, path: this.filePath }, "Failed to delete cache file");
      }
      return false;
    }
  }

  addHistory(entry: string): void {
    if (!this.enabled) return;
    const history = [...this.getHistory(), entry];
    this.doc[CACHE_KEY_HISTORY] = history.slice(Math.max(0, history.length - this.historyLimit));
  }

  getHistory(): string[] {
    if (!this.enabled) return [];
    const history = this.doc[CACHE_KEY_HISTORY];
    return Array.isArray(history) ? history.filter((h): h is string => typeof h === "string") : [];
  }

  async clearHistory(): Promise<boolean> {
    if (!this.enabled || !Object.hasOwn(this.doc, CACHE_KEY_HISTORY)) return false;
    delete this.doc[CACHE_KEY_HISTORY];
    await this.save();
    return true;
  }

  async setLocal(key: string, value: string): Promise<void> {
    if (!this.enabled) return;
    this.doc[CACHE_KEY_LOCALS] = { ...this.getLocals(), [key]: value };
    await this.save();
  }

  getLocal(key: string): string | undefined {
    const locals = this.getLocals();
    return Object.hasOwn(locals, key) ? locals[key] : undefined;
  }

  getLocals(): Record<string, string> {
    if (!this.enabled) return {};
    const locals = this.doc[CACHE_KEY_LOCALS];
    if (!isRecord(locals)) return {};
    const out: Record<string, string> = {};
    for (const [k, v] of Object.entries(locals)) {
      if (typeof v === "string") out[k] = v;
    }
    return out;
  }

  async clearLocals(): Promise<boolean> {
    if (!this.enabled || !Object.hasOwn(this.doc, CACHE_KEY_LOCALS)) return false;
    delete this.doc[CACHE_KEY_LOCALS];
    await this.save();
    return true;
  }

  /** Deep copy of the in-memory document. */
  snapshot(): CacheDocument {
    return structuredClone(this.doc);
  }

  private async key(): Promise<Buffer> {
    // PBKDF2 runs once per store; a failed probe is retried on the next call.
    this.derivedKey ??= deriveKey(await this.probe());
    return this.derivedKey;
  }
}
