import type { AliasModel, ArgNode, ChainNode, CommandNode, HelperType } from "../config/types.js";
import { SHORTCUT } from "../config/paths.js";

const MAX_LINE_WIDTH = 80;
const MIN_SPACING = 2;
const MAX_SPACING = 20;
const NO_HELP = "No helper information available for this command.";
const NO_DESCRIPTION = "No description available.";

export const APP_NAME = "DYNALIAS";

function isCommand(node: ChainNode): node is CommandNode {
  return node.kind !== "arg";
}

function helperLines(helper: string | undefined): string[] {
  const text = helper?.trim();
  return text ? text.split("\n") : [];
}

function firstWord(alias: string): string {
  return alias.trim().split(/\s+/)[0] ?? alias;
}

export function matchedPath(chain: readonly ChainNode[]): string {
  return chain.filter(isCommand).map((n) => n.alias).join(" ");
}

/** `[arg flags] [sub [...] | sub]`, recursively for nested subs. */
export function optionalSection(node: CommandNode): string {
  const parts: string[] = [];

  const flags = node.args.flatMap((arg) => arg.alias.map(firstWord));
  if (flags.length > 0) parts.push(`[${flags.join(" | ")}]`);

  if (node.sub.length > 0) {
    const subs = node.sub.map((sub) => {
      const nested = optionalSection(sub);
      return nested ? `${sub.alias} ${nested}` : sub.alias;
    });
    parts.push(`[${subs.join(" | ")}]`);
  }

  return parts.join(" ");
}

function formatArg(arg: ArgNode, indent: number): string[] {
  const prefix = " ".repeat(indent);
  const display = arg.alias.length > 1 ? arg.alias.map(firstWord).join(", ") : (arg.alias[0] ?? "");
  const helper = arg.helper?.trim() ?? "";
  if (!helper) return [`${prefix}${display}`];

  const spacing = Math.min(Math.max(MIN_SPACING, MAX_SPACING - display.length), MAX_SPACING);
  const line = `${prefix}${display}${" ".repeat(spacing)}${helper}`;
  return line.length > MAX_LINE_WIDTH ? [`${prefix}${display}`, `${prefix}    ${helper}`] : [line];
}

function formatSub(sub: CommandNode, indent: number, parentPath: string): string[] {
  const prefix = " ".repeat(indent);
  const inner = " ".repeat(indent + 4);
  const fullPath = parentPath ? `${parentPath} ${sub.alias}` : sub.alias;
  const lines = [`${prefix}${sub.alias}`, "", `${inner}Description:`];

  const description = helperLines(sub.helper);
  if (description.length === 0) description.push(NO_DESCRIPTION);
  lines.push(...description.map((l) => `${inner}    ${l}`), "", `${inner}Usage:`);

  const optional = optionalSection(sub);
  lines.push(`${inner}    ${optional ? `${fullPath} ${optional}` : fullPath}`);

  if (sub.args.length > 0) {
    lines.push("", `${inner}Args:`);
    for (const arg of sub.args) lines.push(...formatArg(arg, indent + 8));
  }
  if (sub.sub.length > 0) {
    lines.push("", `${inner}Options/Subcommands:`);
    for (const nested of sub.sub) lines.push(...formatSub(nested, indent + 8, fullPath));
  }

  lines.push("");
  return lines;
}

/** Helper texts of the chain, separated by blank lines. */
export function formatCustomHelp(chain: readonly ChainNode[]): string {
  const texts = chain.map((node) => node.helper?.trim()).filter((t): t is string => Boolean(t));
  return texts.length > 0 ? texts.join("\n\n") : NO_HELP;
}

/** Path, Description, Usage, Args and Options/Subcommands of the last command in the chain. */
export function formatAutoHelp(chain: readonly ChainNode[]): string {
  const commands = chain.filter(isCommand);
  const target = commands[commands.length - 1];
  if (!target) return NO_HELP;

  const path = matchedPath(chain);
  // The description follows the chain's last node, which may be an arg.
  const last = chain[chain.length - 1];
  const description = helperLines(last?.helper);
  if (description.length === 0) description.push(NO_DESCRIPTION);

  const optional = optionalSection(target);
  const lines = [
    path,
    "",
    "    Description:",
    ...description.map((l) => `        ${l}`),
    "",
    "    Usage:",
    `        ${optional ? `${path} ${optional}` : path}`,
  ];

  if (target.args.length > 0) {
    lines.push("", "    Args:");
    for (const arg of target.args) lines.push(...formatArg(arg, 8));
  }
  if (target.sub.length > 0) {
    lines.push("", "    Options/Subcommands:");
    for (const sub of target.sub) lines.push(...formatSub(sub, 8, path));
  }

  return lines.join("\n");
}

function footer(): string[] {
  return ["", `Command Line Interface powered by ${APP_NAME}`, `To display ${SHORTCUT} helper use --${SHORTCUT}-help`, ""];
}

export function formatHelp(chain: readonly ChainNode[]): string {
  const head = chain[0];
  const helperType: HelperType = head?.kind === "command" ? head.helperType : "auto";
  const body = helperType === "custom" ? formatCustomHelp(chain) : formatAutoHelp(chain);
  return ["", "HELPER", "", body, ...footer()].join("\n");
}

export function formatGlobalHelp(model: AliasModel): string {
  const lines = ["", `${APP_NAME} Helper`, ""];

  if (model.staticSources.size > 0) {
    lines.push("Dicts (Static):", ...[...model.staticSources.keys()].map((n) => `  - ${n}`), "");
  }
  if (model.dynamicSources.size > 0) {
    lines.push("Dynamic Dicts:", ...[...model.dynamicSources.keys()].map((n) => `  - ${n}`), "");
  }
  if (model.commands.length > 0) {
    lines.push("Commands:");
    for (const cmd of model.commands) {
      lines.push(`  ${cmd.name} (alias: ${cmd.alias})`);
      lines.push(...helperLines(cmd.helper).map((l) => `    ${l}`));
      lines.push("-".repeat(20));
    }
  }

  return [...lines, ...footer()].join("\n");
}

export function formatAppHelp(): string {
  const flag = (name: string) => `--${SHORTCUT}-${name}`;
  const rows: Array<[string, string]> = [
    ["-h, --help", "Display help for commands or global help"],
    [`${flag("config")} <path>`, "Specify custom configuration file"],
    [`${flag("cache")} <path>`, "Specify custom cache file"],
    [flag("validate"), "Validate configuration file"],
    [flag("clear-cache"), "Clear dynamic dict cache (keeps history)"],
    [flag("clear-history"), "Clear command history"],
    [flag("clear-all"), "Delete entire cache file"],
    [flag("purge-expired"), "Remove cache entries older than their TTL"],
    [`${flag("set-locals")} <k> <v>`, "Set a local variable"],
    [flag("clear-locals"), "Clear all local variables"],
    [flag("list-locals"), "List local variables"],
    [flag("help"), "Display this command line builder help"],
  ];
  const width = Math.max(...rows.map(([name]) => name.length)) + 1;

  return [
    "",
    `${APP_NAME} Application Help`,
    "-".repeat(30),
    "Usage Rules:",
    "  - Configuration is defined in JSON format.",
    "  - Supports static dicts, dynamic dicts (via shell commands), and commands.",
    "  - Commands can use variables from user input values ${var} or dicts/dynamic dicts $${source.key} syntax.",
    "  - Supports persistent local variables via $${locals.key} syntax.",
    "",
    "Configuration Example:",
    '  { "commands": [{ "name": "Hello World", "alias": "hello", "command": "echo \'Hello World\'" }] }',
    "",
    "Reserved Arguments:",
    ...rows.map(([name, text]) => `  ${name.padEnd(width)}: ${text}`),
    "",
  ].join("\n");
}
