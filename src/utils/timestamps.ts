import { DateTime } from "luxon";
import { log } from "./logger.js";

const timestampLog = log.withScope("timestamps");

/**
 * Calendar date (YYYY-MM-DD) of an ISO-8601 timestamp, read in the offset it was written with.
 * Returns null for values luxon cannot parse.
 */
export function formatPublishDate(iso: string): string | null {
  const parsed = DateTime.fromISO(iso, { setZone: true });
  if (!parsed.isValid) {
    timestampLog.debug(`Ignoring unparseable publish date: ${iso}`);
    return null;
  }
  return parsed.toISODate();
}
