import { formatInTimeZone } from "date-fns-tz";
import { DEFAULT_TIME_ZONE } from "../config/defaults.js";

/**
 * Format an instant as YYYYMMDD-HHMMSS on the wall clock of a time zone
 */
export function formatStamp(instant: Date, timeZone: string = DEFAULT_TIME_ZONE): string {
  return formatInTimeZone(instant, timeZone, "yyyyMMdd-HHmmss");
}

/**
 * Candidate base name, e.g. 20250820-112345-iphone
 */
export function buildBaseName(
  instant: Date,
  deviceToken: string,
  timeZone: string = DEFAULT_TIME_ZONE
): string {
  return `${formatStamp(instant, timeZone)}-${deviceToken}`;
}
