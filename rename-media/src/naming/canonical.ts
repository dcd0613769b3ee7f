import { DEFAULT_PREFIXES, VARIANTS } from "../config/defaults.js";

const DEFAULT_TOKENS = Object.values(DEFAULT_PREFIXES);
const DEFAULT_EXTENSIONS = Object.keys(VARIANTS.media.extensions);

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Pattern for YYYYMMDD-HHMMSS-<token>.<ext>, case-insensitive
 */
export function canonicalPattern(
  tokens: readonly string[] = DEFAULT_TOKENS,
  extensions: readonly string[] = DEFAULT_EXTENSIONS
): RegExp {
  const tokenGroup = tokens.map(escapeRegExp).join("|");
  const extGroup = extensions.map((e) => escapeRegExp(e.replace(/^\./, ""))).join("|");
  return new RegExp(`^\\d{8}-\\d{6}-(?:${tokenGroup})\\.(?:${extGroup})$`, "i");
}

const DEFAULT_PATTERN = canonicalPattern();

/**
 * Whether a file name is already in canonical form.
 * With no arguments only the default iphone/android tokens are recognized.
 */
export function isAlreadyRenamed(fileName: string, pattern: RegExp = DEFAULT_PATTERN): boolean {
  return pattern.test(fileName);
}
