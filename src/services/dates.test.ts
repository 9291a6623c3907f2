import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { calculateDateRange, formatDate } from './dates.js';

describe('formatDate', () => {
  it('pads day and month', () => {
    expect(formatDate(new Date(2025, 0, 5))).toBe('05/01/2025');
  });
});

describe('calculateDateRange', () => {
  it('goes back the given number of calendar days', () => {
    const range = calculateDateRange(60, new Date(2025, 2, 15, 10, 30));
    expect(range.startDateStr).toBe('14/01/2025');
    expect(range.endDateStr).toBe('15/03/2025');
  });

  it('crosses year boundaries', () => {
    expect(calculateDateRange(30, new Date(2025, 0, 10)).startDateStr).toBe('11/12/2024');
  });

  it('starts and ends on the same day for zero days', () => {
    const range = calculateDateRange(0, new Date(2025, 5, 1));
    expect(range.startDateStr).toBe(range.endDateStr);
  });

  it('never ends before it starts', () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 0, max: 3650 }),
        fc.date({ min: new Date(2000, 0, 1), max: new Date(2099, 11, 31), noInvalidDate: true }),
        (days, now) => {
          const range = calculateDateRange(days, now);
          expect(range.startDate.getTime()).toBeLessThanOrEqual(range.endDate.getTime());
          expect(range.endDate.getTime()).toBe(now.getTime());
        }
      )
    );
  });
});
