import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { ZodError } from "zod";
import type { AliasModel } from "./types.js";
import { getConfigPath } from "./paths.js";
import { aliasConfigSchema, buildModel, type RawAliasConfig } from "./schema.js";
import { ConfigLoadError } from "../errors.js";

const ENV_PATTERN = /\$\{env:([A-Z_][A-Z0-9_]*)\}/g;

export function substituteEnv(raw: string): string {
  return raw.replace(ENV_PATTERN, (match, varName: string) => {
    const value = process.env[varName];
    if (value === undefined) {
      throw new Error(`Missing environment variable: ${varName} (referenced as ${match})`);
    }
    return value;
  });
}

function describeZodError(err: ZodError): string {
  return err.issues
    .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
    .join("; ");
}

/** Reads, env-substitutes and schema-checks a config file without building the model. */
export function readRawConfig(path: string): RawAliasConfig {
  let content: string;
  try {
    // Strip a BOM some editors write.
    content = readFileSync(path, "utf-8").replace(/^\uFEFF/, "");
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      throw new ConfigLoadError(path, "file not found", { cause: err });
    }
    throw new ConfigLoadError(path, err instanceof Error ? err.message : String(err), { cause: err });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(substituteEnv(content)) as unknown;
  } catch (err) {
    throw new ConfigLoadError(path, err instanceof Error ? err.message : String(err), { cause: err });
  }

  try {
    return aliasConfigSchema.parse(raw);
  } catch (err) {
    if (err instanceof ZodError) {
      throw new ConfigLoadError(path, describeZodError(err), { cause: err });
    }
    throw err;
  }
}

export function loadConfig(path?: string): AliasModel {
  const configPath = resolve(path ?? getConfigPath());
  return buildModel(readRawConfig(configPath));
}
