export type Row = Readonly<Record<string, unknown>>;

export type HelperType = "auto" | "custom";

export interface StaticSource {
  readonly kind: "static";
  readonly name: string;
  readonly rows: readonly Row[];
}

export interface DynamicSource {
  readonly kind: "dynamic";
  readonly name: string;
  /** Shell command template; may reference other sources with `$${name.key}`. */
  readonly command: string;
  /** Internal key -> key in the command's JSON output. */
  readonly mapping: Readonly<Record<string, string>>;
  readonly priority: number;
  /** Seconds. */
  readonly timeout: number;
  /** Seconds a fetched result stays valid in the cache. */
  readonly cacheTtl: number;
}

export type Source = StaticSource | DynamicSource;

export interface ArgNode {
  readonly kind: "arg";
  /** Synonym variants, e.g. `-o ${file}` and `--output ${file}`. */
  readonly alias: readonly string[];
  readonly command: string;
  readonly helper?: string;
}

interface NodeBase {
  readonly alias: string;
  readonly command: string;
  readonly helper?: string;
  readonly sub: readonly SubCommandNode[];
  readonly args: readonly ArgNode[];
  readonly setLocals: boolean;
}

export interface RootCommandNode extends NodeBase {
  readonly kind: "command";
  readonly name: string;
  /** Seconds; 0 means unbounded. */
  readonly timeout: number;
  readonly strict: boolean;
  readonly helperType: HelperType;
}

export interface SubCommandNode extends NodeBase {
  readonly kind: "sub";
}

export type CommandNode = RootCommandNode | SubCommandNode;

/** A node of a matched chain: the root first, then subs and args in match order. */
export type ChainNode = CommandNode | ArgNode;

export interface Settings {
  readonly historySize: number;
  readonly verbose: boolean;
}

export interface LoggingConfig {
  readonly level: "debug" | "info" | "warn" | "error" | "silent";
  readonly file?: string;
  readonly json?: boolean;
  readonly verbose?: boolean;
}

/** The command/source model, built once per process and read-only afterwards. */
export interface AliasModel {
  readonly settings: Settings;
  readonly logging: LoggingConfig;
  readonly staticSources: ReadonlyMap<string, StaticSource>;
  /** Ascending priority order. */
  readonly dynamicSources: ReadonlyMap<string, DynamicSource>;
  readonly commands: readonly RootCommandNode[];
}
