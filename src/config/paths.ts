import { existsSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";

export const SHORTCUT = "dyal";

const CONFIG_CANDIDATES = [
  `.${SHORTCUT}.json`,
  `${SHORTCUT}.json`,
  `~/.${SHORTCUT}.json`,
  `~/${SHORTCUT}.json`,
];

const CACHE_CANDIDATES = [
  `.${SHORTCUT}-cache.json`,
  `${SHORTCUT}-cache.json`,
  `~/.${SHORTCUT}-cache.json`,
  `~/${SHORTCUT}-cache.json`,
];

export function expandHome(path: string): string {
  if (path === "~") return homedir();
  if (path.startsWith("~/")) return join(homedir(), path.slice(2));
  return path;
}

/** First candidate that exists on disk, otherwise the expanded default. */
export function resolveFirstExisting(candidates: readonly string[], fallback: string): string {
  for (const candidate of candidates) {
    const expanded = expandHome(candidate);
    if (existsSync(expanded)) return expanded;
  }
  return expandHome(fallback);
}

export function getConfigPath(override?: string): string {
  const explicit = override ?? process.env["DYNALIAS_CONFIG_PATH"];
  if (explicit) return expandHome(explicit);
  return resolveFirstExisting(CONFIG_CANDIDATES, `~/.${SHORTCUT}.json`);
}

export function getCachePath(override?: string): string {
  const explicit = override ?? process.env["DYNALIAS_CACHE_PATH"];
  if (explicit) return expandHome(explicit);
  return resolveFirstExisting(CACHE_CANDIDATES, `~/.${SHORTCUT}-cache.json`);
}
