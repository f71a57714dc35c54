import { describe, it, expect } from 'vitest';
import { classifyByYear, currentYear, yearOf } from '../../../src/archive/classifier.js';
import { DateParseError, MissingDateError, MissingIdentifierError } from '../../../src/core/errors.js';
import { fixedClock, imapDate, makeRecord, makeRecords } from '../../helpers/fixtures.js';

describe('yearOf', () => {
  it('reads the year from an IMAP date-time string', () => {
    expect(yearOf('17-Jul-1996 02:44:25 -0700')).toBe(1996);
  });

  it('accepts a space-padded day', () => {
    expect(yearOf(' 7-Jul-2003 02:44:25 +0000')).toBe(2003);
  });

  it("keeps the server's calendar year at the turn of the year", () => {
    // 23:30 on Dec 31 at -0500 is already Jan 1 in UTC
    expect(yearOf('31-Dec-2019 23:30:00 -0500')).toBe(2019);
  });

  it('uses the UTC year of a Date', () => {
    expect(yearOf(new Date(Date.UTC(2018, 11, 31, 23, 59, 59)))).toBe(2018);
  });

  it('falls back to other date strings', () => {
    expect(yearOf('2021-04-02T08:00:00Z')).toBe(2021);
  });

  it('fails when the year portion is not an integer', () => {
    expect(() => yearOf('17-Jul-19x6 02:44:25 -0700')).toThrow(DateParseError);
  });

  it('fails for unparseable strings and invalid dates', () => {
    expect(() => yearOf('not a date')).toThrow(
      'Cannot parse a year from internal date: not a date',
    );
    expect(() => yearOf(new Date(Number.NaN))).toThrow(DateParseError);
  });
});

describe('currentYear', () => {
  it('reads the UTC year from the clock', () => {
    expect(currentYear(fixedClock)).toBe(2024);
  });
});

describe('classifyByYear', () => {
  it('groups UIDs by year and skips the current year', () => {
    const records = [makeRecord(1, 2019), makeRecord(2, 2019), makeRecord(3, 2021)];
    const { groups, skipped } = classifyByYear(records, 2024);
    expect(groups).toEqual(
      new Map([
        [2019, [1, 2]],
        [2021, [3]],
      ]),
    );
    expect(skipped).toEqual([]);
  });

  it('never groups current-year messages', () => {
    const records = makeRecords([2022, 2024, 2023, 2024]);
    const { groups, skipped } = classifyByYear(records, 2024);
    expect([...groups.keys()]).toEqual([2022, 2023]);
    expect([...groups.values()].flat()).toEqual([1, 3]);
    expect(skipped).toEqual([2, 4]);
  });

  it('places every other message in exactly one group', () => {
    const years = [2015, 2016, 2015, 2017, 2016, 2015];
    const { groups } = classifyByYear(makeRecords(years), 2024);
    const all = [...groups.values()].flat().sort((a, b) => a - b);
    expect(all).toEqual([1, 2, 3, 4, 5, 6]);
    expect(groups.get(2015)).toEqual([1, 3, 6]);
    expect(groups.get(2016)).toEqual([2, 5]);
    expect(groups.get(2017)).toEqual([4]);
  });

  it('prefers years settled by the server over the UTC year', () => {
    const records = [
      { uid: 1, internalDate: new Date('2023-12-31T23:30:00-05:00') },
      { uid: 2, internalDate: new Date('2024-01-01T00:30:00-05:00') },
    ];
    const { groups, skipped } = classifyByYear(
      records,
      2024,
      new Map([
        [1, 2023],
        [2, 2024],
      ]),
    );
    expect(groups).toEqual(new Map([[2023, [1]]]));
    expect(skipped).toEqual([2]);
  });

  it('de-duplicates repeated UIDs', () => {
    const records = [makeRecord(7, 2019), makeRecord(7, 2019), makeRecord(8, 2019)];
    expect(classifyByYear(records, 2024).groups.get(2019)).toEqual([7, 8]);
  });

  it('returns empty groups for an empty batch', () => {
    const { groups, skipped } = classifyByYear([], 2024);
    expect(groups.size).toBe(0);
    expect(skipped).toEqual([]);
  });

  it('fails on a record without an internal date', () => {
    expect(() => classifyByYear([makeRecord(1, 2019), { uid: 2 }], 2024)).toThrow(MissingDateError);
  });

  it('fails on a record without a UID', () => {
    expect(() => classifyByYear([{ internalDate: imapDate(2019) }], 2024)).toThrow(
      MissingIdentifierError,
    );
  });

  it('checks the date before the UID', () => {
    expect(() => classifyByYear([{}], 2024)).toThrow(MissingDateError);
  });

  it('fails on an unparseable date instead of skipping it', () => {
    const records = [makeRecord(1, 2019), { uid: 2, internalDate: '01-Jan-abcd 00:00:00 +0000' }];
    expect(() => classifyByYear(records, 2024)).toThrow(DateParseError);
  });
});
