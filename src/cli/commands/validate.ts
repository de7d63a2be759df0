import { Command } from "clipanion";
import { formatReport, reportPassed, validateFile } from "../../config/validator.js";
import { formatAppHelp } from "../../help/formatter.js";
import { DynaliasCommand } from "./base.js";

export class ValidateCommand extends DynaliasCommand {
  static override paths = [["--dyal-validate"]];

  static override usage = Command.Usage({
    description: "Validate the configuration file and print a checklist",
    examples: [
      ["Validate the default config", "dyal --dyal-validate"],
      ["Validate a specific file", "dyal --dyal-validate --dyal-config ./team.json"],
    ],
  });

  async execute(): Promise<number> {
    const report = validateFile(this.configPath);
    this.writeLine(formatReport(report));
    return reportPassed(report) ? 0 : 1;
  }
}

export class AppHelpCommand extends Command {
  static override paths = [["--dyal-help"]];

  static override usage = Command.Usage({
    description: "Describe the configuration format and the reserved --dyal-* arguments",
  });

  async execute(): Promise<void> {
    this.context.stdout.write(formatAppHelp() + "\n");
  }
}
