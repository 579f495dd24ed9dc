/**
 * Fine and block policy.
 * Pure functions over the circulation configuration; shared by the roster
 * (block derivation) and the ledger (due dates, late days, fines).
 */

import { addDays, calendarDaysBetween } from '../utils/calendar.js';
import type { CirculationConfig } from '../types/index.js';

/**
 * Due date of a loan issued at `issueDate`: always issue date + issue_days.
 */
export function dueDateFor(issueDate: Date, config: CirculationConfig): Date {
    return addDays(issueDate, config.issue_days);
}

/**
 * Calendar days by which `on` falls after `dueDate`; 0 when on time or early.
 */
export function lateDays(dueDate: Date, on: Date): number {
    return Math.max(0, calendarDaysBetween(dueDate, on));
}

/**
 * Fine for a number of late days.
 */
export function fineFor(days: number, config: CirculationConfig): number {
    return days * config.fine_per_day;
}

/**
 * The blocking law: a member is blocked exactly when their balance
 * reaches the limit.
 */
export function isOverLimit(outstandingFine: number, config: CirculationConfig): boolean {
    return outstandingFine >= config.max_fine_limit;
}
