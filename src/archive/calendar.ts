import type { FetchedRecord, MailboxSession, Uid, Year } from '../core/types.js';
import { createUidSet } from '../core/utils.js';

const HOUR_MS = 60 * 60 * 1000;

// UTC offsets in use run from -12:00 to +14:00.
const MAX_BEHIND_UTC_MS = 12 * HOUR_MS;
const MAX_AHEAD_UTC_MS = 14 * HOUR_MS;

/**
 * A parsed internal date has lost the server's offset, so near New Year its
 * UTC year may not be the server's. Returns the later of the two candidate
 * years when that is the case, `undefined` when every offset agrees.
 */
export function boundaryYear(date: Date): Year | undefined {
  const time = date.getTime();
  if (Number.isNaN(time)) return undefined;

  const earliest = new Date(time - MAX_BEHIND_UTC_MS).getUTCFullYear();
  const latest = new Date(time + MAX_AHEAD_UTC_MS).getUTCFullYear();
  return earliest === latest ? undefined : latest;
}

/**
 * Asks the server which year each boundary message belongs to. SEARCH BEFORE
 * compares internal dates in the server's own calendar, so one search per
 * boundary settles every message near it. Batches with no such message cost
 * no round trip.
 */
export async function resolveServerYears(
  records: Iterable<FetchedRecord>,
  session: Pick<MailboxSession, 'searchBefore'>,
): Promise<Map<Uid, Year>> {
  const pending = new Map<Year, Uid[]>();
  for (const record of records) {
    if (record.uid === undefined || !(record.internalDate instanceof Date)) continue;
    const year = boundaryYear(record.internalDate);
    if (year === undefined) continue;

    const uids = pending.get(year);
    if (uids) uids.push(record.uid);
    else pending.set(year, [record.uid]);
  }

  const years = new Map<Uid, Year>();
  for (const [year, uids] of pending) {
    const before = new Set(await session.searchBefore(createUidSet(uids), year));
    for (const uid of uids) {
      years.set(uid, before.has(uid) ? year - 1 : year);
    }
  }
  return years;
}
