import { quote } from "shell-quote";
import type { ChainNode, RootCommandNode } from "../config/types.js";
import type { CacheStore } from "../cache/store.js";
import type { DataResolver } from "../resolver/data-resolver.js";
import type { Logger } from "../logging/logger.js";
import type { RunResult, ShellRunner } from "../process/runner.js";
import { resolveAppVars, resolveUserVars, type BoundVars } from "../template/variables.js";
import { SetLocalsViolationError, StrictViolationError } from "../errors.js";
import { guardTerminal, type TerminalGuard } from "./terminal.js";

export type ExecutionOutcome =
  | { readonly status: "completed"; readonly command: string; readonly exitCode: number | null }
  | { readonly status: "timeout"; readonly command: string; readonly timeoutSeconds: number }
  | { readonly status: "interrupted"; readonly command: string }
  | { readonly status: "rejected"; readonly error: StrictViolationError }
  | { readonly status: "error"; readonly command: string; readonly error: unknown };

export interface ExecutorOpts {
  cache: CacheStore;
  resolver: DataResolver;
  runner: ShellRunner;
  logger: Logger;
  stdout: NodeJS.WritableStream;
  terminal?: () => TerminalGuard;
}

const SEPARATOR = "-".repeat(30);

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function rootOf(chain: readonly ChainNode[]): RootCommandNode | undefined {
  const head = chain[0];
  return head?.kind === "command" ? head : undefined;
}

/**
 * Builds the final command line for a matched chain and runs it.
 */
export class Executor {
  private readonly cache: CacheStore;
  private readonly resolver: DataResolver;
  private readonly runner: ShellRunner;
  private readonly logger: Logger;
  private readonly stdout: NodeJS.WritableStream;
  private readonly terminal: () => TerminalGuard;

  constructor(opts: ExecutorOpts) {
    this.cache = opts.cache;
    this.resolver = opts.resolver;
    this.runner = opts.runner;
    this.logger = opts.logger;
    this.stdout = opts.stdout;
    this.terminal = opts.terminal ?? (() => guardTerminal());
  }

  /** Expands the chain's templates. Leftover tokens are shell-quoted and appended. */
  async buildCommand(chain: readonly ChainNode[], vars: Readonly<BoundVars>, remaining: readonly string[]): Promise<string> {
    const template = chain.map((node) => node.command).join(" ");

    let command = await resolveAppVars(template, {
      resolveSource: (name) => this.resolver.resolveOne(name),
      contextVars: vars,
      localsLookup: (key) => this.cache.getLocal(key),
      onDiagnostic: (message) => this.logger.warn(message),
      onResolved: (placeholder, value) => this.logger.debug({ placeholder, value }, "Resolved variable"),
    });
    command = resolveUserVars(command, vars);

    if (remaining.length > 0) {
      command += " " + remaining.map((arg) => quote([arg])).join(" ");
    }
    return command;
  }

  async execute(
    chain: readonly ChainNode[],
    vars: Readonly<BoundVars>,
    remaining: readonly string[] = [],
  ): Promise<ExecutionOutcome> {
    const root = rootOf(chain);
    if (root?.strict && remaining.length > 0) {
      const error = new StrictViolationError(remaining);
      this.write(`Error: ${error.message}`);
      return { status: "rejected", error };
    }

    const command = await this.buildCommand(chain, vars, remaining);
    this.write(`Running: ${command}`);
    this.write(SEPARATOR);

    const timeoutSeconds = root?.timeout ?? 0;
    const guard = this.terminal();
    try {
      const setLocals = chain.some((node) => node.kind !== "arg" && node.setLocals);
      const result = setLocals
        ? await this.captureLocals(command, timeoutSeconds)
        : await this.runner.stream(command, { timeoutMs: timeoutSeconds * 1000 });

      if (result.timedOut) {
        this.write(`\nError: Command timed out after ${timeoutSeconds}s`);
        return { status: "timeout", command, timeoutSeconds };
      }
      if (result.signal === "SIGINT") {
        this.write("\nOperation cancelled.");
        return { status: "interrupted", command };
      }
      return { status: "completed", command, exitCode: result.exitCode };
    } catch (err) {
      this.logger.error({ err, command }, "Command execution failed");
      this.write(`Execution error: ${err instanceof Error ? err.message : String(err)}`);
      return { status: "error", command, error: err };
    } finally {
      guard.release();
      // Child processes may have written the cache file (e.g. set-locals).
      await this.cache.load();
      await this.cache.save();
    }
  }

  private async captureLocals(command: string, timeoutSeconds: number): Promise<RunResult> {
    const result = await this.runner.capture(command, { timeoutMs: timeoutSeconds * 1000 });
    if (result.timedOut || result.signal === "SIGINT") return result;

    const output = result.stdout.trim();
    try {
      const data = this.parseLocals(output);
      for (const [key, value] of Object.entries(data)) {
        await this.cache.setLocal(String(key), String(value));
        this.logger.debug({ key, value }, "Set local");
      }
      this.write(JSON.stringify(data, null, 2));
      if (result.exitCode !== 0 && result.stderr) this.write(result.stderr);
    } catch (err) {
      if (!(err instanceof SetLocalsViolationError)) throw err;
      this.logger.warn({ err }, "set-locals output rejected");
      this.write(`Error: ${err.message}`);
      this.write(`Output received: ${result.stdout}`);
      if (result.stderr) this.write(`Stderr: ${result.stderr}`);
    }
    return result;
  }

  private parseLocals(output: string): Record<string, unknown> {
    if (!output) {
      throw new SetLocalsViolationError("Empty output", output);
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(output) as unknown;
    } catch {
      throw new SetLocalsViolationError("Command output must be valid JSON when set-locals is enabled", output);
    }
    if (!isPlainObject(parsed)) {
      throw new SetLocalsViolationError("Output must be a JSON object, not a list or scalar", output);
    }
    return parsed;
  }

  private write(line: string): void {
    this.stdout.write(line + "\n");
  }
}
