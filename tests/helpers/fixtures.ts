import type { FetchedRecord } from '../../src/core/types.js';

export const NOW = new Date(Date.UTC(2024, 5, 1, 12, 0, 0));
export const fixedClock = (): Date => NOW;

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

/** An IMAP INTERNALDATE string, e.g. `15-Mar-2019 10:00:00 +0000`. */
export function imapDate(year: number, month = 3, day = 15, zone = '+0000'): string {
  const dd = String(day).padStart(2, '0');
  return `${dd}-${MONTHS[month - 1]}-${year} 10:00:00 ${zone}`;
}

export function makeRecord(uid: number, year: number, month = 3): FetchedRecord {
  return { uid, internalDate: imapDate(year, month) };
}

export function makeRecords(years: number[], firstUid = 1): FetchedRecord[] {
  return years.map((year, i) => makeRecord(firstUid + i, year));
}
