import fs from "node:fs/promises";
import path from "node:path";
import type { RenameOptions, Variant } from "./types.js";
import { DEFAULT_PREFIXES, DEFAULT_TIME_ZONE, DEFAULT_TOOLS } from "./defaults.js";

/**
 * Raised when command-line input cannot be turned into a runnable configuration
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export interface RenameInput {
  directory: string;
  variant: Variant;
  dryRun?: boolean;
  iphonePrefix?: string;
  androidPrefix?: string;
}

/**
 * Builds run options from command-line input, merged with defaults
 * @throws ConfigError if the directory is missing or a prefix is unusable
 */
export async function resolveOptions(input: RenameInput): Promise<RenameOptions> {
  const directory = path.resolve(input.directory);

  const options: RenameOptions = {
    directory,
    variant: input.variant,
    dryRun: input.dryRun ?? false,
    prefixes: {
      iphone: input.iphonePrefix ?? DEFAULT_PREFIXES.iphone,
      android: input.androidPrefix ?? DEFAULT_PREFIXES.android,
    },
    timeZone: DEFAULT_TIME_ZONE,
    tools: { ...DEFAULT_TOOLS },
  };

  validatePrefix("iphone-prefix", options.prefixes.iphone);
  validatePrefix("android-prefix", options.prefixes.android);

  if (!(await isDirectory(directory))) {
    throw new ConfigError(`Not a directory: ${directory}`);
  }

  return options;
}

function validatePrefix(flag: string, value: string): void {
  if (value.trim() === "") {
    throw new ConfigError(`Configuration error: --${flag} must not be empty`);
  }
  if (/[\\/]/.test(value)) {
    throw new ConfigError(`Configuration error: --${flag} must not contain path separators`);
  }
}

async function isDirectory(p: string): Promise<boolean> {
  try {
    const stats = await fs.stat(p);
    return stats.isDirectory();
  } catch (error) {
    const code = (error as NodeJS.ErrnoException).code;
    if (code === "ENOENT" || code === "ENOTDIR") {
      return false;
    }
    throw error;
  }
}
