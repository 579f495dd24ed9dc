/**
 * Due / overdue reminders over active loans.
 * Read-only: classifies records, never touches the stores.
 */

import { calendarDaysBetween } from '../utils/calendar.js';
import type { IssuedRecord, Reminder } from '../types/index.js';

/**
 * Classify one active loan as of `now`.
 *
 * @returns An overdue reminder when the due date has passed, a due-soon
 *          reminder when it falls within `windowDays` (0 = due today),
 *          otherwise null.
 */
export function classifyReminder(record: IssuedRecord, now: Date, windowDays: number): Reminder | null {
    const daysToDue = calendarDaysBetween(now, record.due_date);

    if (daysToDue < 0) {
        return { kind: 'overdue', record, late_by: -daysToDue };
    }
    if (daysToDue <= windowDays) {
        return { kind: 'due_soon', record, due_in: daysToDue };
    }
    return null;
}

/**
 * Reminders for every active loan that needs one, in record order.
 */
export function collectReminders(records: IssuedRecord[], now: Date, windowDays: number): Reminder[] {
    const reminders: Reminder[] = [];
    for (const record of records) {
        const reminder = classifyReminder(record, now, windowDays);
        if (reminder) reminders.push(reminder);
    }
    return reminders;
}
