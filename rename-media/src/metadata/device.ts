import * as path from "node:path";
import type { Device, DeviceSource } from "../config/types.js";
import { type CommandRunner, errorMessage, runCommand } from "../utils/exec.js";
import { isRecord } from "../utils/json.js";
import { logger } from "../utils/logger.js";

export interface DeviceResolution {
  device: Device;
  source: DeviceSource;
}

/** The exiftool tags consulted for classification */
export interface DeviceTags {
  make: string;
  model: string;
  androidMake: string;
  androidModel: string;
}

const EXIFTOOL_TAGS = ["-Make", "-Model", "-AndroidMake", "-AndroidModel"];

/**
 * Classify from Make/Model tags. Returns null when the tags say nothing useful.
 */
export function classifyFromTags(tags: DeviceTags): Device | null {
  const make = tags.make.toLowerCase();
  const model = tags.model.toLowerCase();

  if (make === "apple" || model.includes("iphone")) {
    return "iphone";
  }

  if (tags.androidMake || tags.androidModel || make === "google" || model.includes("pixel")) {
    return "android";
  }

  return null;
}

/**
 * Extension heuristic: .mov and .heic come from iPhones, everything else from Android
 */
export function deviceFromExtension(filePath: string): Device {
  const ext = path.extname(filePath).toLowerCase();
  return ext === ".mov" || ext === ".heic" ? "iphone" : "android";
}

/**
 * Ask exiftool for Make/Model tags.
 * Returns null if exiftool is missing, fails, or prints something unexpected.
 */
export async function readDeviceTags(
  filePath: string,
  exiftool = "exiftool",
  run: CommandRunner = runCommand
): Promise<DeviceTags | null> {
  let data: unknown;
  try {
    const stdout = await run(exiftool, [...EXIFTOOL_TAGS, "-j", filePath]);
    data = JSON.parse(stdout);
  } catch (error) {
    logger.debug(`exiftool failed for ${path.basename(filePath)}: ${errorMessage(error)}`);
    return null;
  }

  const record: unknown = Array.isArray(data) ? data[0] : undefined;
  if (!isRecord(record)) {
    return null;
  }

  return {
    make: tagText(record.Make),
    model: tagText(record.Model),
    androidMake: tagText(record.AndroidMake),
    androidModel: tagText(record.AndroidModel),
  };
}

/**
 * Determine the device for a file, preferring embedded metadata when enabled
 */
export async function classifyDevice(
  filePath: string,
  options: { useMetadata: boolean; exiftool?: string; run?: CommandRunner }
): Promise<DeviceResolution> {
  if (options.useMetadata) {
    const tags = await readDeviceTags(filePath, options.exiftool, options.run);
    const device = tags ? classifyFromTags(tags) : null;
    if (device) {
      return { device, source: "embedded-metadata" };
    }
  }

  return { device: deviceFromExtension(filePath), source: "extension-heuristic" };
}

// exiftool prints numeric-looking values (e.g. Model "5") as JSON numbers
function tagText(value: unknown): string {
  if (typeof value === "string") return value;
  if (typeof value === "number") return String(value);
  return "";
}
