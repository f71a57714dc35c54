import type { ClassifiedBatch, FetchedRecord, Uid, Year } from '../core/types.js';
import { DateParseError, MissingDateError, MissingIdentifierError } from '../core/errors.js';

// IMAP date-time: "17-Jul-1996 02:44:25 -0700", day may be space-padded.
const IMAP_DATE_PREFIX = /^\s?\d{1,2}-[A-Za-z]{3}-/;

/**
 * Year of an internal date. Strings in IMAP date-time form keep the server's
 * own calendar year; Date instances use their UTC year, which differs from the
 * server's only near New Year (see `resolveServerYears`).
 */
export function yearOf(internalDate: Date | string): Year {
  if (internalDate instanceof Date) {
    const time = internalDate.getTime();
    if (Number.isNaN(time)) throw new DateParseError(String(internalDate));
    return internalDate.getUTCFullYear();
  }

  const prefix = internalDate.match(IMAP_DATE_PREFIX);
  if (prefix) {
    const yearPart = internalDate.slice(prefix[0].length).split(/\s/, 1)[0];
    if (!/^\d+$/.test(yearPart)) throw new DateParseError(internalDate);
    return Number(yearPart);
  }

  const parsed = new Date(internalDate);
  if (Number.isNaN(parsed.getTime())) throw new DateParseError(internalDate);
  return parsed.getUTCFullYear();
}

export function currentYear(now: () => Date): Year {
  return now().getUTCFullYear();
}

/**
 * Groups a batch by year. `serverYears` holds years already settled by the
 * server and takes precedence over the date itself.
 */
export function classifyByYear(
  records: Iterable<FetchedRecord>,
  thisYear: Year,
  serverYears: ReadonlyMap<Uid, Year> = new Map(),
): ClassifiedBatch {
  const buckets = new Map<Year, Set<Uid>>();
  const skipped: Uid[] = [];

  for (const record of records) {
    if (record.internalDate === undefined) throw new MissingDateError(record.uid);
    if (record.uid === undefined) throw new MissingIdentifierError();

    const year = serverYears.get(record.uid) ?? yearOf(record.internalDate);
    if (year === thisYear) {
      skipped.push(record.uid);
      continue;
    }

    let bucket = buckets.get(year);
    if (!bucket) {
      bucket = new Set();
      buckets.set(year, bucket);
    }
    bucket.add(record.uid);
  }

  const groups = new Map<Year, Uid[]>();
  for (const [year, uids] of buckets) {
    groups.set(year, [...uids]);
  }
  return { groups, skipped };
}
