import { Command, Option } from "clipanion";
import type { LoggingConfig } from "../../config/types.js";
import { getCachePath, getConfigPath } from "../../config/paths.js";
import { CacheStore } from "../../cache/store.js";
import type { MachineIdentityProbe } from "../../cache/machine-id.js";
import { createLogger, type Logger } from "../../logging/logger.js";
import { NodeShellRunner, type ShellRunner } from "../../process/runner.js";

/** Collaborators a caller may swap out, e.g. in tests. */
export interface CommandServices {
  runner?: ShellRunner;
  logger?: Logger;
  machineIdentity?: MachineIdentityProbe;
  now?: () => number;
}

export abstract class DynaliasCommand extends Command {
  configOverride = Option.String("--dyal-config", {
    description: "Path to the configuration file",
  });

  cacheOverride = Option.String("--dyal-cache", {
    description: "Path to the cache file",
  });

  services: CommandServices = {};

  protected get configPath(): string {
    return getConfigPath(this.configOverride);
  }

  protected get cachePath(): string {
    return getCachePath(this.cacheOverride);
  }

  protected get runner(): ShellRunner {
    return this.services.runner ?? new NodeShellRunner();
  }

  protected createLogger(config?: Partial<LoggingConfig>): Logger {
    return this.services.logger ?? createLogger(config);
  }

  protected async openCache(logger: Logger, historyLimit?: number): Promise<CacheStore> {
    const cache = new CacheStore({
      filePath: this.cachePath,
      logger,
      historyLimit,
      machineIdentity: this.services.machineIdentity,
      now: this.services.now,
    });
    await cache.load();
    return cache;
  }

  protected writeLine(line = ""): void {
    this.context.stdout.write(line + "\n");
  }
}
