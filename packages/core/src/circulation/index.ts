/**
 * Circulation module: issue/return lifecycle, fines and reminders.
 */

export { CirculationLedger } from './ledger.js';
export { IssueIdSequence } from './sequence.js';
export { daysLate, isOverdue } from './records.js';
export { classifyReminder, collectReminders } from './reminders.js';
