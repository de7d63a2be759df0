import { Command, Option } from "clipanion";
import { readRawConfig } from "../../config/loader.js";
import { buildModel } from "../../config/schema.js";
import { formatErrors, reportPassed, validateConfig } from "../../config/validator.js";
import type { AliasModel } from "../../config/types.js";
import { AliasMatcher, isHelpFlag } from "../../alias/matcher.js";
import { DataResolver } from "../../resolver/data-resolver.js";
import { Executor, type ExecutionOutcome } from "../../execution/executor.js";
import { formatAppHelp, formatGlobalHelp, formatHelp } from "../../help/formatter.js";
import { ConfigLoadError } from "../../errors.js";
import { DynaliasCommand } from "./base.js";

const EXIT_INTERRUPTED = 130;

function exitCodeOf(outcome: ExecutionOutcome): number {
  switch (outcome.status) {
    case "completed":
      return outcome.exitCode ?? 1;
    case "interrupted":
      return EXIT_INTERRUPTED;
    default:
      return 1;
  }
}

export class RunCommand extends DynaliasCommand {
  static override paths = [Command.Default];

  static override usage = Command.Usage({
    description: "Match the given tokens against the configured aliases and run the resulting command",
    examples: [
      ["Show the global helper", "dyal -h"],
      ["Run an alias", "dyal pg prod"],
      ["Use another config file", "dyal --dyal-config ./team.json deploy api"],
    ],
  });

  tokens = Option.Proxy();

  async execute(): Promise<number> {
    const tokens = [...this.tokens];
    const configPath = this.configPath;
    const helpOnly = tokens.length === 1 && isHelpFlag(tokens[0]);

    let model: AliasModel;
    try {
      const raw = readRawConfig(configPath);
      const report = validateConfig(raw, configPath);
      if (!reportPassed(report)) {
        this.writeLine(formatErrors(report));
        return 1;
      }
      model = buildModel(raw);
    } catch (err) {
      if (!(err instanceof ConfigLoadError)) throw err;
      this.writeLine(`Error: ${err.message}`);
      if (!helpOnly) return 1;
      this.writeLine("\n" + "=".repeat(30));
      this.writeLine(formatAppHelp());
      return 0;
    }

    const logger = this.createLogger(model.logging);
    logger.debug({ configPath }, "Loaded configuration");
    const cache = await this.openCache(logger, model.settings.historySize);
    logger.debug({ cachePath: cache.filePath, history: cache.getHistory().length }, "Loaded cache");

    // Without tokens there is nothing to match; the interactive prompt is not part of this build.
    if (tokens.length === 0 || helpOnly) {
      this.writeLine(formatGlobalHelp(model));
      return 0;
    }

    const runner = this.runner;
    const resolver = new DataResolver({ model, cache, runner, logger });
    const matcher = new AliasMatcher({
      resolveSource: (name) => resolver.resolveOne(name),
      onPhase: (phase, node) => logger.trace({ phase, alias: node.alias }, "Matcher phase"),
    });

    const match = await matcher.findCommand(model.commands, tokens);
    if (match.state === "failed") {
      this.writeLine("Error: Command not found.");
      return 1;
    }

    if (match.state === "help") {
      this.writeLine(formatHelp(match.chain));
      await cache.save();
      return 0;
    }

    const executor = new Executor({
      cache,
      resolver,
      runner,
      logger,
      stdout: this.context.stdout,
    });
    const outcome = await executor.execute(match.chain, match.vars, match.remaining);
    cache.addHistory(tokens.join(" "));
    await cache.save();
    return exitCodeOf(outcome);
  }
}
