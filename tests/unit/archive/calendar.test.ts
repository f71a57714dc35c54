import { describe, it, expect, vi } from 'vitest';
import { boundaryYear, resolveServerYears } from '../../../src/archive/calendar.js';
import { imapDate } from '../../helpers/fixtures.js';

describe('boundaryYear', () => {
  it('flags a -0500 New Year\'s Eve message that is already next year in UTC', () => {
    expect(boundaryYear(new Date('2019-12-31T23:30:00-05:00'))).toBe(2020);
  });

  it('flags the last hours UTC of a year that may be next year east of UTC', () => {
    expect(boundaryYear(new Date(Date.UTC(2019, 11, 31, 11, 0)))).toBe(2020);
    expect(boundaryYear(new Date(Date.UTC(2019, 11, 31, 9, 0)))).toBeUndefined();
  });

  it('flags the first hours UTC of a year that may be last year west of UTC', () => {
    expect(boundaryYear(new Date(Date.UTC(2020, 0, 1, 11, 0)))).toBe(2020);
    expect(boundaryYear(new Date(Date.UTC(2020, 0, 1, 12, 0)))).toBeUndefined();
  });

  it('leaves mid-year dates and invalid dates alone', () => {
    expect(boundaryYear(new Date(Date.UTC(2019, 5, 1)))).toBeUndefined();
    expect(boundaryYear(new Date(Number.NaN))).toBeUndefined();
  });
});

describe('resolveServerYears', () => {
  it('asks the server once per boundary and splits on its answer', async () => {
    const session = { searchBefore: vi.fn(async () => [1]) };
    const records = [
      { uid: 1, internalDate: new Date('2019-12-31T23:30:00-05:00') },
      { uid: 2, internalDate: new Date(Date.UTC(2020, 0, 1, 10, 0)) },
      { uid: 3, internalDate: new Date(Date.UTC(2019, 5, 1)) },
      { uid: 4, internalDate: imapDate(2019, 12, 31, '-0500') },
    ];

    const years = await resolveServerYears(records, session);

    expect(session.searchBefore).toHaveBeenCalledOnce();
    expect(session.searchBefore).toHaveBeenCalledWith('1,2', 2020);
    expect(years).toEqual(
      new Map([
        [1, 2019],
        [2, 2020],
      ]),
    );
  });

  it('makes no server call when no date is near a boundary', async () => {
    const session = { searchBefore: vi.fn(async () => []) };
    const years = await resolveServerYears(
      [{ uid: 1, internalDate: new Date(Date.UTC(2019, 5, 1)) }, { uid: 2 }, {}],
      session,
    );
    expect(years.size).toBe(0);
    expect(session.searchBefore).not.toHaveBeenCalled();
  });
});
