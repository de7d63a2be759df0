import { Cli } from "clipanion";
import { RunCommand } from "./commands/run.js";
import {
  ClearAllCommand,
  ClearCacheCommand,
  ClearHistoryCommand,
  PurgeExpiredCommand,
} from "./commands/cache-cmd.js";
import {
  ClearLocalsCommand,
  ListLocalsCommand,
  SetLocalsCommand,
} from "./commands/locals-cmd.js";
import { AppHelpCommand, ValidateCommand } from "./commands/validate.js";

export function createCli(): Cli {
  const cli = new Cli({
    binaryLabel: "Dynalias",
    binaryName: "dyal",
    binaryVersion: "0.1.0",
  });

  // Alias matching and execution
  cli.register(RunCommand);

  // Cache management
  cli.register(ClearCacheCommand);
  cli.register(ClearHistoryCommand);
  cli.register(ClearAllCommand);
  cli.register(PurgeExpiredCommand);

  // Locals
  cli.register(SetLocalsCommand);
  cli.register(ClearLocalsCommand);
  cli.register(ListLocalsCommand);

  // Config
  cli.register(ValidateCommand);
  cli.register(AppHelpCommand);

  return cli;
}
