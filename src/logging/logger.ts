import pino from "pino";
import type { LoggingConfig } from "../config/types.js";

export type Logger = pino.Logger;

const STDERR_FD = 2;

export function createLogger(config?: Partial<LoggingConfig>): Logger {
  const level = config?.verbose ? "debug" : (config?.level ?? "warn");
  const isJson = config?.json ?? process.env["NODE_ENV"] === "production";

  // Command output owns stdout; diagnostics go to stderr or a file.
  const transport = isJson || config?.file
    ? undefined
    : {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "HH:MM:ss",
          ignore: "pid,hostname",
          destination: STDERR_FD,
        },
      };

  const options: pino.LoggerOptions = {
    level,
    ...(transport ? { transport } : {}),
  };

  if (transport) {
    return pino(options);
  }

  return pino(options, pino.destination(config?.file ?? STDERR_FD));
}

export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
