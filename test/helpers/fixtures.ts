import { Writable } from "node:stream";
import { parseConfig } from "../../src/config/schema.js";
import type { AliasModel } from "../../src/config/types.js";
import { CacheStore, type CacheStoreOptions } from "../../src/cache/store.js";
import { createSilentLogger } from "../../src/logging/logger.js";
import type { RunOptions, RunResult, ShellRunner } from "../../src/process/runner.js";

export const testMachine = async (): Promise<string> => "test-machine";
export const otherMachine = async (): Promise<string> => "other-machine";

export function runResult(overrides: Partial<RunResult> = {}): RunResult {
  return {
    exitCode: 0,
    signal: null,
    stdout: "",
    stderr: "",
    timedOut: false,
    ...overrides,
  };
}

export interface RecordedRun {
  readonly mode: "capture" | "stream";
  readonly command: string;
  readonly timeoutMs: number | undefined;
}

/**
 * In-process ShellRunner. The handler receives each command line and returns
 * the fields of the result that differ from a clean exit.
 */
export class FakeRunner implements ShellRunner {
  readonly runs: RecordedRun[] = [];

  constructor(private readonly handler: (command: string) => Partial<RunResult> = () => ({})) {}

  get commands(): string[] {
    return this.runs.map((r) => r.command);
  }

  async capture(command: string, opts?: RunOptions): Promise<RunResult> {
    this.runs.push({ mode: "capture", command, timeoutMs: opts?.timeoutMs });
    return runResult(this.handler(command));
  }

  async stream(command: string, opts?: RunOptions): Promise<RunResult> {
    this.runs.push({ mode: "stream", command, timeoutMs: opts?.timeoutMs });
    return runResult(this.handler(command));
  }
}

export function makeModel(raw: unknown = {}): AliasModel {
  return parseConfig(raw);
}

export function makeCache(filePath: string, overrides: Partial<CacheStoreOptions> = {}): CacheStore {
  return new CacheStore({
    filePath,
    logger: createSilentLogger(),
    machineIdentity: testMachine,
    ...overrides,
  });
}

export function captureStdout(): { stream: Writable; output: () => string } {
  let buf = "";
  const stream = new Writable({
    write(chunk, _encoding, cb) {
      buf += String(chunk);
      cb();
    },
  });
  return { stream, output: () => buf };
}
