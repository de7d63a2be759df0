import { z } from "zod";
import type {
  AliasModel,
  ArgNode,
  DynamicSource,
  RootCommandNode,
  StaticSource,
  SubCommandNode,
} from "./types.js";

export const HISTORY_SIZE_CAP = 1000;

const settingsSchema = z.object({
  historySize: z
    .number()
    .int()
    .nonnegative()
    .default(20)
    .transform((n) => Math.min(n, HISTORY_SIZE_CAP)),
  verbose: z.boolean().default(false),
});

const loggingSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error", "silent"]).default("warn"),
  file: z.string().optional(),
  json: z.boolean().optional(),
});

const sourceNameSchema = z.string().regex(/^\w+$/, "source names may only contain word characters");

const dictSchema = z.object({
  name: sourceNameSchema,
  data: z.array(z.record(z.unknown())).default([]),
});

const dynamicDictSchema = z.object({
  name: sourceNameSchema,
  command: z.string().min(1),
  mapping: z.record(z.string()),
  priority: z.number().int().default(1),
  timeout: z.number().positive().default(10),
  cacheTtl: z.number().nonnegative().default(300),
});

const argSchema = z.object({
  alias: z.union([z.string().min(1), z.array(z.string().min(1)).min(1)]),
  command: z.string(),
  helper: z.string().optional(),
});

interface RawSubCommand {
  alias: string;
  command: string;
  helper?: string;
  setLocals: boolean;
  sub: RawSubCommand[];
  args: z.infer<typeof argSchema>[];
}

const subCommandSchema: z.ZodType<RawSubCommand, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.object({
    alias: z.string().min(1),
    command: z.string(),
    helper: z.string().optional(),
    setLocals: z.boolean().default(false),
    sub: z.array(subCommandSchema).default([]),
    args: z.array(argSchema).default([]),
  }),
);

const commandSchema = z.object({
  name: z.string().min(1),
  alias: z.string().min(1),
  command: z.string(),
  helper: z.string().optional(),
  helperType: z.enum(["auto", "custom"]).default("auto"),
  timeout: z.number().nonnegative().default(0),
  strict: z.boolean().default(false),
  setLocals: z.boolean().default(false),
  sub: z.array(subCommandSchema).default([]),
  args: z.array(argSchema).default([]),
});

export const aliasConfigSchema = z.object({
  settings: settingsSchema.default({}),
  logging: loggingSchema.default({}),
  dicts: z.array(dictSchema).default([]),
  dynamicDicts: z.array(dynamicDictSchema).default([]),
  commands: z.array(commandSchema).default([]),
});

export type RawAliasConfig = z.infer<typeof aliasConfigSchema>;

function toArg(raw: z.infer<typeof argSchema>): ArgNode {
  return {
    kind: "arg",
    alias: typeof raw.alias === "string" ? [raw.alias] : raw.alias,
    command: raw.command,
    helper: raw.helper,
  };
}

function toSub(raw: RawSubCommand): SubCommandNode {
  return {
    kind: "sub",
    alias: raw.alias,
    command: raw.command,
    helper: raw.helper,
    setLocals: raw.setLocals,
    sub: raw.sub.map(toSub),
    args: raw.args.map(toArg),
  };
}

function toCommand(raw: z.infer<typeof commandSchema>): RootCommandNode {
  return {
    kind: "command",
    name: raw.name,
    alias: raw.alias,
    command: raw.command,
    helper: raw.helper,
    helperType: raw.helperType,
    timeout: raw.timeout,
    strict: raw.strict,
    setLocals: raw.setLocals,
    sub: raw.sub.map(toSub),
    args: raw.args.map(toArg),
  };
}

export function buildModel(config: RawAliasConfig): AliasModel {
  const staticSources = new Map<string, StaticSource>();
  for (const dict of config.dicts) {
    staticSources.set(dict.name, { kind: "static", name: dict.name, rows: dict.data });
  }

  // Stable sort keeps declaration order among equal priorities.
  const dynamicSources = new Map<string, DynamicSource>();
  const byPriority = [...config.dynamicDicts].sort((a, b) => a.priority - b.priority);
  for (const dd of byPriority) {
    dynamicSources.set(dd.name, { kind: "dynamic", ...dd });
  }

  return {
    settings: config.settings,
    logging: { ...config.logging, verbose: config.settings.verbose },
    staticSources,
    dynamicSources,
    commands: config.commands.map(toCommand),
  };
}

export function parseConfig(raw: unknown): AliasModel {
  return buildModel(aliasConfigSchema.parse(raw));
}
