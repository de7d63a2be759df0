import { Command } from "clipanion";
import { loadConfig } from "../../config/loader.js";
import { DynaliasCommand } from "./base.js";

export class ClearCacheCommand extends DynaliasCommand {
  static override paths = [["--dyal-clear-cache"]];

  static override usage = Command.Usage({
    description: "Clear cached dynamic dict results (history and locals are kept)",
    examples: [["Clear the cache", "dyal --dyal-clear-cache"]],
  });

  async execute(): Promise<void> {
    const cache = await this.openCache(this.createLogger());
    const count = await cache.clearSources();
    this.writeLine(`Cleared ${count} cache entries (history preserved)`);
  }
}

export class ClearHistoryCommand extends DynaliasCommand {
  static override paths = [["--dyal-clear-history"]];

  static override usage = Command.Usage({
    description: "Clear the command history",
    examples: [["Clear history", "dyal --dyal-clear-history"]],
  });

  async execute(): Promise<void> {
    const cache = await this.openCache(this.createLogger());
    this.writeLine((await cache.clearHistory()) ? "Command history cleared" : "No history to clear");
  }
}

export class ClearAllCommand extends DynaliasCommand {
  static override paths = [["--dyal-clear-all"]];

  static override usage = Command.Usage({
    description: "Delete the cache file",
    examples: [["Delete everything", "dyal --dyal-clear-all"]],
  });

  async execute(): Promise<void> {
    const cache = await this.openCache(this.createLogger());
    const removed = await cache.deleteAll();
    this.writeLine(removed ? `Cache file deleted: ${cache.filePath}` : `Cache file not found: ${cache.filePath}`);
  }
}

export class PurgeExpiredCommand extends DynaliasCommand {
  static override paths = [["--dyal-purge-expired"]];

  static override usage = Command.Usage({
    description: "Remove cached dynamic dict results older than their cacheTtl",
    details: "Entries of sources that are not in the current configuration expire after the default TTL of 300 seconds.",
    examples: [["Purge expired entries", "dyal --dyal-purge-expired"]],
  });

  async execute(): Promise<void> {
    const logger = this.createLogger();
    const ttls: Record<string, number> = {};
    try {
      for (const source of loadConfig(this.configPath).dynamicSources.values()) {
        ttls[source.name] = source.cacheTtl;
      }
    } catch (err) {
      logger.warn({ err }, "Could not read dynamic dict TTLs; using the default for every entry");
    }

    const cache = await this.openCache(logger);
    const count = await cache.purgeExpired(ttls);
    this.writeLine(`Purged ${count} expired cache entries`);
  }
}
