import { TAGGED_NAME_PATTERN } from "./constants.js";
import { isValid } from "./grainorder.js";

/** A filename split into its grainorder, timestamp and free-text parts. */
export interface TaggedFile {
  /** Full filename as found on disk. */
  name: string;
  code: string;
  /** Timestamp exactly as written, e.g. "12025-10-28--1315-pdt". */
  stamp: string;
  /** Sortable value YYYYYMMDDHHMM; the zone label does not take part. */
  order: number;
  zone: string;
  /** Everything after the second "--", e.g. "readme.md". */
  remainder: string;
}

/**
 * Parse a filename of the form
 *   {code}-{YYYYY}-{MM}-{DD}--{HHMM}-{tz}--{remainder}
 * Returns null for anything else, including names whose code is not a
 * valid grainorder or whose date fields are out of range.
 */
export function parseTaggedName(name: string): TaggedFile | null {
  const m = name.match(TAGGED_NAME_PATTERN);
  if (!m) return null;

  const [, code, year, month, day, hour, minute, zone, remainder] = m;
  if (!isValid(code)) return null;

  const mo = Number(month);
  const d = Number(day);
  const h = Number(hour);
  const mi = Number(minute);
  if (mo < 1 || mo > 12 || d < 1 || d > 31 || h > 23 || mi > 59) return null;

  return {
    name,
    code,
    stamp: `${year}-${month}-${day}--${hour}${minute}-${zone}`,
    order: Number(`${year}${month}${day}${hour}${minute}`),
    zone,
    remainder,
  };
}

export function formatTaggedName(code: string, stamp: string, remainder: string): string {
  return `${code}-${stamp}--${remainder}`;
}

/** Same file under a different grainorder; stamp and remainder untouched. */
export function renameWithCode(file: TaggedFile, code: string): string {
  return formatTaggedName(code, file.stamp, file.remainder);
}
