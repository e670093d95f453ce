/**
 * Calendar-day arithmetic on ISO date strings (YYYY-MM-DD).
 */

const MS_PER_DAY = 24 * 60 * 60 * 1000;

// Days since 1970-01-01; exact, since both sides are UTC midnight
function dayNumber(isoDate: string): number {
    return Date.parse(`${isoDate}T00:00:00Z`) / MS_PER_DAY;
}

/**
 * Whole calendar days between two dates, in either order.
 */
export function calendarDaysBetween(date1: string, date2: string): number {
    return Math.abs(dayNumber(date1) - dayNumber(date2));
}

/**
 * True if the dates are at most `toleranceDays` calendar days apart.
 */
export function isWithinDateTolerance(
    date1: string,
    date2: string,
    toleranceDays: number
): boolean {
    return calendarDaysBetween(date1, date2) <= toleranceDays;
}
