import { describe, it, expect } from 'vitest';
import { calendarDaysBetween, isWithinDateTolerance } from '../../src/matcher/calendar-days.js';

describe('calendarDaysBetween', () => {
    it('returns 0 for same day', () => {
        expect(calendarDaysBetween('2020-12-04', '2020-12-04')).toBe(0);
    });

    it('calculates days within same month', () => {
        expect(calendarDaysBetween('2020-12-04', '2020-12-06')).toBe(2);
    });

    it('calculates days across months', () => {
        expect(calendarDaysBetween('2020-11-30', '2020-12-01')).toBe(1);
    });

    it('handles leap year boundary', () => {
        expect(calendarDaysBetween('2020-02-28', '2020-03-01')).toBe(2); // 2020 is leap year
        expect(calendarDaysBetween('2021-02-28', '2021-03-01')).toBe(1);
    });

    it('is order independent', () => {
        expect(calendarDaysBetween('2020-12-05', '2020-12-04')).toBe(1);
        expect(calendarDaysBetween('2020-12-04', '2020-12-05')).toBe(1);
    });

    it('handles year boundary', () => {
        expect(calendarDaysBetween('2020-12-31', '2021-01-01')).toBe(1);
    });

    it('handles years before 100', () => {
        expect(calendarDaysBetween('0050-12-31', '0051-01-01')).toBe(1);
    });
});

describe('isWithinDateTolerance', () => {
    it('is inclusive at the tolerance', () => {
        expect(isWithinDateTolerance('2020-12-04', '2020-12-05', 1)).toBe(true);
    });

    it('returns false beyond tolerance', () => {
        expect(isWithinDateTolerance('2020-12-04', '2020-12-06', 1)).toBe(false);
    });

    it('returns true for same day with zero tolerance', () => {
        expect(isWithinDateTolerance('2020-12-04', '2020-12-04', 0)).toBe(true);
    });
});
