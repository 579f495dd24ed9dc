/**
 * Calendar-day arithmetic using native Date.
 * No date library dependency per design decision.
 *
 * Days are the host's local calendar days: a loan returned at 01:00 the
 * morning after its due date is one day late, whatever the UTC offset.
 */

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Local midnight of the calendar day containing `date`, in epoch ms.
 */
function calendarDay(date: Date): number {
    return new Date(date.getFullYear(), date.getMonth(), date.getDate()).getTime();
}

/**
 * Signed number of calendar days from `from` to `to`.
 * Time of day is ignored: 23:59 on the 1st to 00:01 on the 2nd is one day.
 * Rounding absorbs the 23- and 25-hour days of a daylight-saving change.
 *
 * @returns Positive when `to` falls after `from`, negative when before.
 */
export function calendarDaysBetween(from: Date, to: Date): number {
    return Math.round((calendarDay(to) - calendarDay(from)) / MS_PER_DAY);
}

/**
 * Add whole calendar days to an instant, keeping its local time of day.
 */
export function addDays(date: Date, days: number): Date {
    const result = new Date(date.getTime());
    result.setDate(result.getDate() + days);
    return result;
}

export function isValidDate(date: Date): boolean {
    return !isNaN(date.getTime());
}
