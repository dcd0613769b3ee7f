import * as fs from "node:fs/promises";
import * as path from "node:path";
import { isValid } from "date-fns";
import type { TimestampSource } from "../config/types.js";
import { type CommandRunner, errorMessage, runCommand } from "../utils/exec.js";
import { isRecord } from "../utils/json.js";
import { logger } from "../utils/logger.js";

export interface ResolvedTimestamp {
  /** Absolute instant */
  instant: Date;
  source: TimestampSource;
}

// YYYY-MM-DD[THH[[:]MM[[:]SS[.fraction]]][±HH[[:]MM[[:]SS]]]]
// The fraction takes any number of digits, including the 7 some encoders
// write, and is truncated to milliseconds.
const ISO_PATTERN = new RegExp(
  "^(\\d{4})-(\\d{2})-(\\d{2})" +
    "(?:T(\\d{2})(?::?(\\d{2})(?::?(\\d{2})(?:[.,](\\d+))?)?)?" +
    "(?:([+-])(\\d{2})(?::?(\\d{2})(?::?(\\d{2}))?)?)?)?$"
);

interface OffsetParts {
  sign: string;
  hours: string;
  minutes: string | undefined;
  seconds: string | undefined;
}

/**
 * Parse a creation_time tag into an absolute instant.
 * Values without an offset are taken as UTC. Returns null if nothing matches.
 *
 * Examples:
 *   "2025-08-20T18:23:45.000000Z"
 *   "2025-08-20T11:23:45.5-07:00"
 *   "2025-08-20T18:23:45+0000"
 *   "2025-08-20 18:23:45"
 */
export function parseTimestamp(value: string): Date | null {
  let s = value.trim();
  if (s.endsWith("Z")) {
    s = `${s.slice(0, -1)}+00:00`;
  }
  s = s.replace(/ /g, "T");

  const match = ISO_PATTERN.exec(s);
  if (!match) {
    return null;
  }

  const [, year, month, day, hour, minute, second, fraction, sign, offHours, offMinutes, offSeconds] =
    match;
  const offset: OffsetParts | undefined =
    sign && offHours
      ? { sign, hours: offHours, minutes: offMinutes, seconds: offSeconds }
      : undefined;
  return buildInstant(year, month, day, hour, minute, second, fraction, offset);
}

function buildInstant(
  year: string,
  month: string,
  day: string,
  hour: string | undefined,
  minute: string | undefined,
  second: string | undefined,
  fraction: string | undefined,
  offset: OffsetParts | undefined
): Date | null {
  const y = parseInt(year, 10);
  const mo = parseInt(month, 10);
  const d = parseInt(day, 10);
  const h = hour ? parseInt(hour, 10) : 0;
  const mi = minute ? parseInt(minute, 10) : 0;
  const sec = second ? parseInt(second, 10) : 0;
  const ms = fraction ? parseInt(fraction.slice(0, 3).padEnd(3, "0"), 10) : 0;

  const wall = new Date(Date.UTC(y, mo - 1, d, h, mi, sec, ms));
  // Date.UTC rolls over out-of-range fields (Feb 30 -> Mar 2); reject those
  if (
    !isValid(wall) ||
    wall.getUTCFullYear() !== y ||
    wall.getUTCMonth() !== mo - 1 ||
    wall.getUTCDate() !== d ||
    wall.getUTCHours() !== h ||
    wall.getUTCMinutes() !== mi ||
    wall.getUTCSeconds() !== sec
  ) {
    return null;
  }

  if (!offset) {
    return wall;
  }

  const offsetSeconds = parseOffset(offset);
  if (offsetSeconds === null) {
    return null;
  }
  return new Date(wall.getTime() - offsetSeconds * 1000);
}

/** Offset in seconds east of UTC; null unless strictly within ±24h */
function parseOffset(offset: OffsetParts): number | null {
  const hours = parseInt(offset.hours, 10);
  const minutes = offset.minutes ? parseInt(offset.minutes, 10) : 0;
  const seconds = offset.seconds ? parseInt(offset.seconds, 10) : 0;
  if (hours > 23 || minutes > 59 || seconds > 59) {
    return null;
  }
  const sign = offset.sign === "-" ? -1 : 1;
  return sign * (hours * 3600 + minutes * 60 + seconds);
}

/**
 * Collect creation_time tags via ffprobe, container level first, then each stream.
 * Returns an empty list if ffprobe is unavailable or its output is unusable.
 */
export async function probeCreationTimes(
  filePath: string,
  ffprobe = "ffprobe",
  run: CommandRunner = runCommand
): Promise<string[]> {
  let data: unknown;
  try {
    const stdout = await run(ffprobe, [
      "-v",
      "quiet",
      "-print_format",
      "json",
      "-show_entries",
      "format_tags=creation_time:stream_tags=creation_time",
      filePath,
    ]);
    data = JSON.parse(stdout);
  } catch (error) {
    logger.debug(`ffprobe failed for ${path.basename(filePath)}: ${errorMessage(error)}`);
    return [];
  }

  if (!isRecord(data)) return [];

  const candidates: string[] = [];

  const formatTime = creationTime(isRecord(data.format) ? data.format.tags : undefined);
  if (formatTime) candidates.push(formatTime);

  const streams: unknown[] = Array.isArray(data.streams) ? data.streams : [];
  for (const stream of streams) {
    const streamTime = creationTime(isRecord(stream) ? stream.tags : undefined);
    if (streamTime) candidates.push(streamTime);
  }

  return candidates;
}

/**
 * Capture instant from embedded metadata, else the file's modification time
 */
export async function resolveTimestamp(
  filePath: string,
  options: { ffprobe?: string; run?: CommandRunner } = {}
): Promise<ResolvedTimestamp> {
  const candidates = await probeCreationTimes(filePath, options.ffprobe, options.run);

  for (const candidate of candidates) {
    const instant = parseTimestamp(candidate);
    if (instant) {
      return { instant, source: "embedded-metadata" };
    }
    logger.debug(`Unparseable creation_time in ${path.basename(filePath)}: ${candidate}`);
  }

  const stats = await fs.stat(filePath);
  return { instant: stats.mtime, source: "filesystem-mtime" };
}

function creationTime(tags: unknown): string | undefined {
  if (!isRecord(tags)) return undefined;
  const value = tags.creation_time;
  return typeof value === "string" ? value : undefined;
}
