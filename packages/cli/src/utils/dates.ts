/**
 * Month helpers. Months are 'YYYY-MM' strings, dates 'YYYY-MM-DD'.
 */

const MONTH_PATTERN = /^(\d{4})-(\d{2})$/;

export interface DateRange {
    from: string;
    to: string;
}

function pad(value: number): string {
    return String(value).padStart(2, '0');
}

/**
 * Splits a 'YYYY-MM' string, or returns null when it is not a valid month.
 */
export function parseMonth(month: string): { year: number; month: number } | null {
    const match = MONTH_PATTERN.exec(month);
    if (!match) return null;

    const m = parseInt(match[2], 10);
    if (m < 1 || m > 12) return null;

    return { year: parseInt(match[1], 10), month: m };
}

/**
 * The calendar month before the one `now` falls in.
 */
export function previousMonth(now: Date = new Date()): string {
    const year = now.getFullYear();
    const month = now.getMonth();
    return month === 0 ? `${year - 1}-12` : `${year}-${pad(month)}`;
}

/**
 * First and last day of a month.
 *
 * @throws RangeError for a malformed month
 */
export function monthDateRange(month: string): DateRange {
    const parsed = parseMonth(month);
    if (!parsed) {
        throw new RangeError(`Invalid month "${month}". Use YYYY-MM.`);
    }
    // Day 0 of the next month is the last day of this one
    const lastDay = new Date(Date.UTC(parsed.year, parsed.month, 0)).getUTCDate();
    return {
        from: `${month}-01`,
        to: `${month}-${pad(lastDay)}`,
    };
}
