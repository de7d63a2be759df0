/**
 * Parent-side terminal handling around a foreground child process.
 *
 * While the child runs, Ctrl+C reaches it directly through the process
 * group; the parent only has to stay alive so it can restore the terminal
 * and persist the cache afterwards.
 */
export interface TerminalGuard {
  release(): void;
}

export interface GuardTarget {
  readonly stdin: NodeJS.ReadStream;
  readonly process: Pick<NodeJS.Process, "on" | "off">;
}

const ignoreSigint = (): void => {};

export function guardTerminal(
  target: GuardTarget = { stdin: process.stdin, process },
): TerminalGuard {
  const { stdin } = target;
  const wasRaw = stdin.isTTY ? stdin.isRaw : undefined;
  if (wasRaw) stdin.setRawMode(false);
  target.process.on("SIGINT", ignoreSigint);

  let released = false;
  return {
    release() {
      if (released) return;
      released = true;
      target.process.off("SIGINT", ignoreSigint);
      if (wasRaw !== undefined && stdin.isTTY) stdin.setRawMode(wasRaw);
    },
  };
}
