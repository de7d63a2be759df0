import type { Row } from "../config/types.js";

/** `$${source.key}` or `$${source[N].key}` */
const APP_VAR_SOURCE = String.raw`\$\$\{(\w+)(?:\[(\d+)\])?\.(\w+)\}`;
/** `${name}`, never the tail of an app variable */
const USER_VAR_SOURCE = String.raw`(?<!\$)\$\{(\w+)\}`;

export const LOCALS_SOURCE = "locals";

export interface AppVarRef {
  readonly source: string;
  /** Undefined when the reference has no explicit `[N]`. */
  readonly index: number | undefined;
  readonly key: string;
}

export type TokenKind =
  | { readonly kind: "app"; readonly ref: AppVarRef }
  | { readonly kind: "user"; readonly name: string }
  | { readonly kind: "static"; readonly text: string };

/** Variables bound while matching: rows for app variables, strings for user variables. */
export type BoundVars = Record<string, Row | string>;

export type SourceResolver = (name: string) => Promise<readonly Row[]>;

export interface AppVarContext {
  readonly resolveSource: SourceResolver;
  readonly contextVars?: Readonly<BoundVars>;
  readonly localsLookup?: (key: string) => string | undefined;
  readonly onDiagnostic?: (message: string) => void;
  readonly onResolved?: (placeholder: string, value: string) => void;
}

function toRef(source: string, index: string | undefined, key: string): AppVarRef {
  return { source, index: index === undefined ? undefined : Number(index), key };
}

export function parseAppVar(token: string): AppVarRef | undefined {
  const m = new RegExp(`^${APP_VAR_SOURCE}$`).exec(token);
  if (!m?.[1] || !m[3]) return undefined;
  return toRef(m[1], m[2], m[3]);
}

export function parseUserVar(token: string): string | undefined {
  const m = new RegExp(`^${USER_VAR_SOURCE}$`).exec(token);
  return m?.[1];
}

export function classifyToken(token: string): TokenKind {
  const ref = parseAppVar(token);
  if (ref) return { kind: "app", ref };
  const name = parseUserVar(token);
  if (name !== undefined) return { kind: "user", name };
  return { kind: "static", text: token };
}

export function extractAppVars(text: string): AppVarRef[] {
  const refs: AppVarRef[] = [];
  for (const m of text.matchAll(new RegExp(APP_VAR_SOURCE, "g"))) {
    if (m[1] && m[3]) refs.push(toRef(m[1], m[2], m[3]));
  }
  return refs;
}

function isRow(value: Row | string | undefined): value is Row {
  return typeof value === "object";
}

function stringify(value: unknown): string {
  if (typeof value === "string") return value;
  if (typeof value === "object" && value !== null) return JSON.stringify(value);
  return String(value);
}

/**
 * Expands app variables. Priority per reference: locals, then the row bound
 * during matching (only without an explicit index), then the source's row at
 * the given index (default 0). Anything unresolvable is left in place.
 */
export async function resolveAppVars(template: string, ctx: AppVarContext): Promise<string> {
  const pattern = new RegExp(APP_VAR_SOURCE, "g");
  let out = "";
  let last = 0;

  for (const m of template.matchAll(pattern)) {
    const placeholder = m[0];
    const start = m.index ?? 0;
    out += template.slice(last, start);
    last = start + placeholder.length;

    if (!m[1] || !m[3]) {
      out += placeholder;
      continue;
    }
    const ref = toRef(m[1], m[2], m[3]);
    const value = await resolveRef(ref, ctx);
    if (value === undefined) {
      out += placeholder;
    } else {
      ctx.onResolved?.(placeholder, value);
      out += value;
    }
  }

  return out + template.slice(last);
}

async function resolveRef(ref: AppVarRef, ctx: AppVarContext): Promise<string | undefined> {
  if (ref.source === LOCALS_SOURCE) {
    return ctx.localsLookup?.(ref.key);
  }

  const bound = ctx.contextVars?.[ref.source];
  if (ref.index === undefined && isRow(bound)) {
    return Object.hasOwn(bound, ref.key) ? stringify(bound[ref.key]) : undefined;
  }

  const rows = await ctx.resolveSource(ref.source);
  if (rows.length === 0) return undefined;

  const index = ref.index ?? 0;
  const row = rows[index];
  if (!row) {
    ctx.onDiagnostic?.(`Index ${index} out of bounds for '${ref.source}' (size: ${rows.length})`);
    return undefined;
  }
  return Object.hasOwn(row, ref.key) ? stringify(row[ref.key]) : undefined;
}

export function resolveUserVars(template: string, vars: Readonly<BoundVars>): string {
  return template.replace(new RegExp(USER_VAR_SOURCE, "g"), (match, name: string) => {
    const value = vars[name];
    return typeof value === "string" ? value : match;
  });
}
