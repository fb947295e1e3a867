import { homedir } from "node:os";
import path from "node:path";

export function userHome(): string {
  return homedir() || process.cwd();
}

// Only a bare "~" or "~/..." is expanded; "~alice/..." stays literal.
const LEADING_TILDE = /^~(?=$|[\\/])/;

function withHome(input: string, home: string): string {
  return LEADING_TILDE.test(input) ? path.join(home, input.slice(1)) : input;
}

/**
 * Resolve TOOLGATE_HOME for this process.
 *
 * Precedence:
 * 1) $TOOLGATE_HOME (if set)
 * 2) ~/.toolgate
 */
export function resolveToolgateHome(): string {
  const home = userHome();
  const fromEnv = process.env.TOOLGATE_HOME?.trim();
  return path.resolve(withHome(fromEnv || path.join(home, ".toolgate"), home));
}

/** Resolve a user-provided path-like string (supports leading ~). */
export function resolvePathLike(p: string): string {
  return path.resolve(withHome(p, userHome()));
}

export function defaultConfigPath(): string {
  return path.join(resolveToolgateHome(), "toolgate.yaml");
}

export function defaultLedgerDir(): string {
  return path.join(resolveToolgateHome(), "ledgers");
}

/** File name for one context's ledger; anything outside [A-Za-z0-9_-] becomes "-". */
export function ledgerFileName(contextId: string): string {
  const safe = contextId.replace(/[^A-Za-z0-9_-]+/g, "-").replace(/^-+|-+$/g, "");
  return `${safe || "context"}.jsonl`;
}
