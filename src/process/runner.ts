import { exec, spawn } from "node:child_process";

export interface RunOptions {
  /** 0 or undefined means no limit. */
  readonly timeoutMs?: number;
}

export interface RunResult {
  readonly exitCode: number | null;
  readonly signal: NodeJS.Signals | null;
  readonly stdout: string;
  readonly stderr: string;
  readonly timedOut: boolean;
}

/**
 * The process-spawning boundary. Commands are full shell command lines.
 */
export interface ShellRunner {
  /** Runs the command with stdout and stderr captured. */
  capture(command: string, opts?: RunOptions): Promise<RunResult>;
  /** Runs the command attached to the parent's terminal. */
  stream(command: string, opts?: RunOptions): Promise<RunResult>;
}

const MAX_BUFFER = 10 * 1024 * 1024;

export class NodeShellRunner implements ShellRunner {
  capture(command: string, opts?: RunOptions): Promise<RunResult> {
    const timeout = opts?.timeoutMs ?? 0;

    return new Promise<RunResult>((resolve) => {
      exec(
        command,
        { timeout, maxBuffer: MAX_BUFFER, encoding: "utf-8" },
        (error, stdout, stderr) => {
          if (!error) {
            resolve({ exitCode: 0, signal: null, stdout, stderr, timedOut: false });
            return;
          }

          // exec reports a timeout as a kill with the default SIGTERM.
          const timedOut = timeout > 0 && error.killed === true && error.signal === "SIGTERM";
          resolve({
            exitCode: typeof error.code === "number" ? error.code : null,
            signal: error.signal ?? null,
            stdout,
            stderr: stderr || (error.code == null && !error.signal ? error.message : ""),
            timedOut,
          });
        },
      );
    });
  }

  stream(command: string, opts?: RunOptions): Promise<RunResult> {
    const timeout = opts?.timeoutMs ?? 0;

    return new Promise<RunResult>((resolve, reject) => {
      const child = spawn(command, { shell: true, stdio: "inherit" });
      let timedOut = false;
      const timer = timeout > 0
        ? setTimeout(() => {
            timedOut = true;
            child.kill("SIGTERM");
          }, timeout)
        : undefined;

      child.once("error", (err) => {
        clearTimeout(timer);
        reject(err);
      });
      child.once("close", (code, signal) => {
        clearTimeout(timer);
        resolve({ exitCode: code, signal, stdout: "", stderr: "", timedOut });
      });
    });
  }
}
