import * as fs from "node:fs/promises";
import * as path from "node:path";
import { DEFAULT_PREFIXES, VARIANTS } from "./config/defaults.js";
import type { ProgressCallback, RenameOptions } from "./config/types.js";
import { classifyDevice, type DeviceResolution } from "./metadata/device.js";
import { resolveTimestamp, type ResolvedTimestamp } from "./metadata/timestamp.js";
import { canonicalPattern, isAlreadyRenamed } from "./naming/canonical.js";
import { uniqueTarget } from "./naming/collision.js";
import { buildBaseName } from "./naming/name-format.js";
import { type CommandRunner, runCommand } from "./utils/exec.js";
import { listMediaFiles } from "./utils/file-scanner.js";
import { logger } from "./utils/logger.js";

export type { RenameOptions } from "./config/types.js";

export type PlanAction = "rename" | "skip";

export type PlanReason = "already-renamed" | "already-named" | "renamed" | "dry-run";

export interface RenamePlan {
  source: string;
  destination: string;
  action: PlanAction;
  reason: PlanReason;
  device?: DeviceResolution;
  timestamp?: ResolvedTimestamp;
}

export interface RenameResult {
  renamed: number;
  skipped: number;
  plans: RenamePlan[];
}

export interface RenameDependencies {
  /** Runs exiftool/ffprobe; replaced in tests */
  run?: CommandRunner;
  onProgress?: ProgressCallback;
}

/**
 * Device tokens that mark a file as already renamed: the defaults plus any overrides
 */
function recognizedTokens(options: RenameOptions): string[] {
  return [
    ...new Set([
      ...Object.values(DEFAULT_PREFIXES),
      options.prefixes.iphone,
      options.prefixes.android,
    ]),
  ];
}

/**
 * Rename every in-scope file in options.directory, one at a time in name order
 */
export async function renameMedia(
  options: RenameOptions,
  deps: RenameDependencies = {}
): Promise<RenameResult> {
  const { run = runCommand, onProgress } = deps;
  const variant = VARIANTS[options.variant];
  const extensions = Object.keys(variant.extensions);
  const pattern = canonicalPattern(recognizedTokens(options), extensions);

  const result: RenameResult = { renamed: 0, skipped: 0, plans: [] };

  // Dry runs never touch the disk, so track what a real run would have changed
  const reserved = new Set<string>();
  const vacated = new Set<string>();

  const sources = await listMediaFiles(options.directory, extensions);
  logger.debug(`Found ${sources.length} candidate files in ${options.directory}`);

  for (const source of sources) {
    const name = path.basename(source);

    if (isAlreadyRenamed(name, pattern)) {
      onProgress?.(`Skip (already renamed): ${name}`);
      result.skipped++;
      result.plans.push({ source, destination: source, action: "skip", reason: "already-renamed" });
      continue;
    }

    const device = await classifyDevice(source, {
      useMetadata: variant.detectDeviceFromMetadata,
      exiftool: options.tools.exiftool,
      run,
    });
    const timestamp = await resolveTimestamp(source, { ffprobe: options.tools.ffprobe, run });
    logger.debug(
      `${name}: device=${device.device} (${device.source}), ` +
        `time=${timestamp.instant.toISOString()} (${timestamp.source})`
    );

    const base = buildBaseName(timestamp.instant, options.prefixes[device.device], options.timeZone);
    const destination = await uniqueTarget(options.directory, base, path.extname(name), {
      source,
      reserved,
      vacated,
    });

    if (destination === source) {
      onProgress?.(`Skip (already named): ${name}`);
      result.skipped++;
      result.plans.push({ source, destination, action: "skip", reason: "already-named", device, timestamp });
      continue;
    }

    const relSource = path.relative(options.directory, source);
    const relDestination = path.relative(options.directory, destination);

    if (options.dryRun) {
      reserved.add(destination);
      vacated.add(source);
      onProgress?.(`[DRY] ${relSource} -> ${relDestination}`);
    } else {
      await fs.rename(source, destination);
      onProgress?.(`${relSource} -> ${relDestination}`);
    }

    result.renamed++;
    result.plans.push({
      source,
      destination,
      action: "rename",
      reason: options.dryRun ? "dry-run" : "renamed",
      device,
      timestamp,
    });
  }

  return result;
}

/**
 * Final line printed after a run
 */
export function formatSummary(result: RenameResult, dryRun: boolean): string {
  if (dryRun) {
    return `Dry run complete. Candidates processed: ${result.renamed + result.skipped}.`;
  }
  return `Done. Renamed: ${result.renamed}, Skipped: ${result.skipped}.`;
}
