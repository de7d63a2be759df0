import { Command, Option } from "clipanion";
import { DynaliasCommand } from "./base.js";

export class SetLocalsCommand extends DynaliasCommand {
  static override paths = [["--dyal-set-locals"]];

  static override usage = Command.Usage({
    description: "Set a persistent local variable, readable as $${locals.<key>}",
    examples: [["Pin the current environment", "dyal --dyal-set-locals env prod"]],
  });

  key = Option.String({ name: "key", required: true });
  value = Option.String({ name: "value", required: true });

  async execute(): Promise<void> {
    const cache = await this.openCache(this.createLogger());
    await cache.setLocal(this.key, this.value);
    this.writeLine(`Local variable set: ${this.key}=${this.value}`);
  }
}

export class ClearLocalsCommand extends DynaliasCommand {
  static override paths = [["--dyal-clear-locals"]];

  static override usage = Command.Usage({
    description: "Remove all local variables",
    examples: [["Clear locals", "dyal --dyal-clear-locals"]],
  });

  async execute(): Promise<void> {
    const cache = await this.openCache(this.createLogger());
    this.writeLine((await cache.clearLocals()) ? "Local variables cleared" : "No local variables to clear");
  }
}

export class ListLocalsCommand extends DynaliasCommand {
  static override paths = [["--dyal-list-locals"]];

  static override usage = Command.Usage({
    description: "Print the local variables",
    examples: [["List locals", "dyal --dyal-list-locals"]],
  });

  async execute(): Promise<void> {
    const cache = await this.openCache(this.createLogger());
    const locals = Object.entries(cache.getLocals());
    if (locals.length === 0) {
      this.writeLine("No local variables set");
      return;
    }
    for (const [key, value] of locals) {
      this.writeLine(`${key}=${value}`);
    }
  }
}
