import { buildApplication, buildCommand } from "@stricli/core";
import type { CommandContext } from "@stricli/core";
import { ConfigError, resolveOptions } from "./config/config.js";
import type { RenameOptions, Variant } from "./config/types.js";
import { formatSummary, renameMedia, type RenameResult } from "./rename-media.js";
import { describeMissingTools, findMissingTools, toolsFor } from "./startup.js";
import { type CommandRunner, runCommand } from "./utils/exec.js";
import { logger } from "./utils/logger.js";

export interface RenameFlags {
  "dry-run": boolean;
  "iphone-prefix"?: string;
  "android-prefix"?: string;
  debug: boolean;
}

const APP_NAMES: Record<Variant, string> = {
  media: "rename-media",
  videos: "rename-videos",
};

const BRIEFS: Record<Variant, string> = {
  media:
    "Rename videos (.mov, .mp4) and images (.heic, .jpg, .jpeg) to YYYYMMDD-HHMMSS-<device> using metadata time (Pacific)",
  videos: "Rename videos (.mov, .mp4) to YYYYMMDD-HHMMSS-<device> using metadata time (Pacific)",
};

async function loadOptions(
  variant: Variant,
  flags: RenameFlags,
  directory: string
): Promise<RenameOptions | null> {
  try {
    return await resolveOptions({
      directory,
      variant,
      dryRun: flags["dry-run"],
      iphonePrefix: flags["iphone-prefix"],
      androidPrefix: flags["android-prefix"],
    });
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error(error.message);
      return null;
    }
    throw error;
  }
}

/**
 * Run one rename pass from parsed command-line input.
 * Returns null when the input is rejected; nothing is renamed in that case.
 */
export async function runRename(
  variant: Variant,
  flags: RenameFlags,
  directory: string,
  run: CommandRunner = runCommand
): Promise<RenameResult | null> {
  logger.setDebug(flags.debug);

  const options = await loadOptions(variant, flags, directory);
  if (!options) {
    return null;
  }

  const missing = await findMissingTools(toolsFor(options), run);
  if (missing.length > 0) {
    logger.warn(describeMissingTools(missing));
  }

  const result = await renameMedia(options, {
    run,
    onProgress: (message) => logger.info(message),
  });

  logger.info("");
  logger.info(formatSummary(result, options.dryRun));
  return result;
}

/**
 * Build the stricli application for one variant
 */
export function buildRenameApplication(variant: Variant) {
  const command = buildCommand({
    docs: {
      brief: BRIEFS[variant],
    },
    parameters: {
      positional: {
        kind: "tuple",
        parameters: [
          {
            brief: "Path to the directory containing the files",
            parse: String,
            placeholder: "directory",
          },
        ],
      },
      flags: {
        "dry-run": {
          kind: "boolean",
          brief: "Show what would happen without renaming",
          default: false,
        },
        "iphone-prefix": {
          kind: "parsed",
          brief: "Prefix for iPhone files (default: iphone)",
          parse: String,
          optional: true,
        },
        "android-prefix": {
          kind: "parsed",
          brief: "Prefix for Android files (default: android)",
          parse: String,
          optional: true,
        },
        debug: {
          kind: "boolean",
          brief: "Log how each device and timestamp was resolved",
          default: false,
        },
      },
    },
    async func(this: CommandContext, flags: RenameFlags, directory: string): Promise<void> {
      await runRename(variant, flags, directory);
    },
  });

  return buildApplication(command, {
    name: APP_NAMES[variant],
    versionInfo: {
      currentVersion: "1.0.0",
    },
  });
}
