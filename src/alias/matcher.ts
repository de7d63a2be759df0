import type { ArgNode, ChainNode, CommandNode, RootCommandNode } from "../config/types.js";
import { classifyToken, type BoundVars, type SourceResolver } from "../template/variables.js";

export const HELP_FLAGS: ReadonlySet<string> = new Set(["-h", "--help"]);

export function isHelpFlag(token: string | undefined): boolean {
  return token !== undefined && HELP_FLAGS.has(token);
}

export interface AliasPartsMatch {
  readonly matched: boolean;
  readonly vars: BoundVars;
  readonly isHelp: boolean;
}

/**
 * Terminal states of matching. `matched` carries the tokens no node consumed.
 */
export type MatchResult =
  | { readonly state: "matched"; readonly chain: ChainNode[]; readonly vars: BoundVars; readonly remaining: string[] }
  | { readonly state: "help"; readonly chain: ChainNode[]; readonly vars: BoundVars }
  | { readonly state: "failed" };

/** Intermediate phases of `tryMatch`, exposed for tracing. */
export type MatchPhase = "Matching" | "MatchingArgs" | "MatchingSub" | "HelpRequested" | "Matched" | "Failed";

const FAILED: MatchResult = { state: "failed" };
const NO_MATCH: AliasPartsMatch = { matched: false, vars: {}, isHelp: false };

export function splitAlias(alias: string): string[] {
  return alias.split(/\s+/).filter((t) => t.length > 0);
}

export interface AliasMatcherOpts {
  resolveSource: SourceResolver;
  onPhase?: (phase: MatchPhase, node: ChainNode) => void;
}

/**
 * Matches typed tokens against the command tree.
 *
 * Roots, args and subs are tried strictly in declaration order and the first
 * success wins; consumed args are never given back.
 */
export class AliasMatcher {
  private readonly resolveSource: SourceResolver;
  private readonly onPhase: (phase: MatchPhase, node: ChainNode) => void;

  constructor(opts: AliasMatcherOpts) {
    this.resolveSource = opts.resolveSource;
    this.onPhase = opts.onPhase ?? (() => {});
  }

  async matchAliasParts(aliasTokens: readonly string[], inputTokens: readonly string[]): Promise<AliasPartsMatch> {
    const vars: BoundVars = {};
    const paired = Math.min(aliasTokens.length, inputTokens.length);

    for (let i = 0; i < paired; i++) {
      const aliasToken = aliasTokens[i] ?? "";
      const input = inputTokens[i] ?? "";
      const token = classifyToken(aliasToken);

      switch (token.kind) {
        case "app": {
          if (isHelpFlag(input)) return { matched: true, vars, isHelp: true };
          const rows = await this.resolveSource(token.ref.source);
          const found = rows.find((row) => String(row[token.ref.key]) === input);
          if (!found) return NO_MATCH;
          vars[token.ref.source] = found;
          break;
        }
        case "user": {
          if (isHelpFlag(input)) return { matched: true, vars, isHelp: true };
          vars[token.name] = input;
          break;
        }
        case "static": {
          if (token.text !== input) return NO_MATCH;
          break;
        }
      }
    }

    if (inputTokens.length < aliasTokens.length) return NO_MATCH;
    return { matched: true, vars, isHelp: false };
  }

  async tryMatch(node: CommandNode, args: readonly string[]): Promise<MatchResult> {
    this.onPhase("Matching", node);
    const aliasTokens = splitAlias(node.alias);
    const head = await this.matchAliasParts(aliasTokens, args.slice(0, aliasTokens.length));

    if (head.isHelp) {
      this.onPhase("HelpRequested", node);
      return { state: "help", chain: [node], vars: head.vars };
    }
    if (!head.matched) {
      this.onPhase("Failed", node);
      return FAILED;
    }

    const vars: BoundVars = { ...head.vars };
    const chain: ChainNode[] = [node];
    let remaining = args.slice(aliasTokens.length);

    // Greedy, first-success arg consumption.
    while (remaining.length > 0 && node.args.length > 0) {
      this.onPhase("MatchingArgs", node);
      const hit = await this.matchArg(node.args, remaining);
      if (!hit) break;

      Object.assign(vars, hit.vars);
      chain.push(hit.arg);
      if (hit.isHelp) {
        this.onPhase("HelpRequested", hit.arg);
        return { state: "help", chain, vars };
      }
      remaining = remaining.slice(hit.consumed);
    }

    if (remaining.length > 0 && node.sub.length > 0) {
      this.onPhase("MatchingSub", node);
      for (const child of node.sub) {
        const result = await this.tryMatch(child, remaining);
        if (result.state === "failed") continue;

        const merged = { ...vars, ...result.vars };
        return result.state === "help"
          ? { state: "help", chain: [...chain, ...result.chain], vars: merged }
          : { state: "matched", chain: [...chain, ...result.chain], vars: merged, remaining: result.remaining };
      }
    }

    if (isHelpFlag(remaining[0])) {
      this.onPhase("HelpRequested", node);
      return { state: "help", chain, vars };
    }

    this.onPhase("Matched", node);
    return { state: "matched", chain, vars, remaining };
  }

  async findCommand(commands: readonly RootCommandNode[], args: readonly string[]): Promise<MatchResult> {
    for (const command of commands) {
      const result = await this.tryMatch(command, args);
      if (result.state !== "failed") return result;
    }
    return FAILED;
  }

  private async matchArg(
    argNodes: readonly ArgNode[],
    remaining: readonly string[],
  ): Promise<{ arg: ArgNode; vars: BoundVars; isHelp: boolean; consumed: number } | undefined> {
    for (const arg of argNodes) {
      for (const variant of arg.alias) {
        const tokens = splitAlias(variant);
        const result = await this.matchAliasParts(tokens, remaining.slice(0, tokens.length));
        if (result.isHelp || result.matched) {
          return { arg, vars: result.vars, isHelp: result.isHelp, consumed: tokens.length };
        }
      }
    }
    return undefined;
  }
}

