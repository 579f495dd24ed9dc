/**
 * Issue record helpers.
 * Pure functions: records are immutable, so every transition builds a new one.
 */

import { DataIntegrityError } from '../errors.js';
import { lateDays } from '../policy/fine-policy.js';
import { describeIssues } from '../utils/validation.js';
import { IssuedRecordSchema, ReturnedRecordSchema } from '../types/index.js';
import type { IssueRecord, IssuedRecord, ReturnedRecord } from '../types/index.js';

/**
 * Late days of a loan as of `onDate`, or as of its return when it has come back.
 */
export function daysLate(record: IssueRecord, onDate: Date): number {
    const effective = record.status === 'returned' ? record.return_date : onDate;
    return lateDays(record.due_date, effective);
}

/**
 * Whether a loan is (or was, once returned) late.
 */
export function isOverdue(record: IssueRecord, onDate: Date): boolean {
    return daysLate(record, onDate) > 0;
}

/**
 * The issued -> returned transition.
 */
export function toReturned(record: IssuedRecord, returnDate: Date, fine: number): ReturnedRecord {
    return {
        issue_id: record.issue_id,
        book_id: record.book_id,
        member_id: record.member_id,
        issue_date: record.issue_date,
        due_date: record.due_date,
        status: 'returned',
        return_date: returnDate,
        fine_charged: fine,
    };
}

/**
 * Validate a freshly built record against its schema before it is stored.
 *
 * @throws {DataIntegrityError} The record does not match the schema.
 */
export function checkIssued(record: IssuedRecord): IssuedRecord {
    const parsed = IssuedRecordSchema.safeParse(record);
    if (!parsed.success) {
        throw new DataIntegrityError(`Issue record ${record.issue_id} is malformed: ${describeIssues(parsed.error)}`);
    }
    return parsed.data;
}

/**
 * @throws {DataIntegrityError} The record does not match the schema.
 */
export function checkReturned(record: ReturnedRecord): ReturnedRecord {
    const parsed = ReturnedRecordSchema.safeParse(record);
    if (!parsed.success) {
        throw new DataIntegrityError(`Issue record ${record.issue_id} is malformed: ${describeIssues(parsed.error)}`);
    }
    return parsed.data;
}

/**
 * Copy a record for a caller, including its dates, so the stored
 * record cannot be changed through what was handed out.
 */
export function cloneRecord(record: IssueRecord): IssueRecord {
    return record.status === 'returned' ? cloneReturned(record) : cloneIssued(record);
}

export function cloneIssued(record: IssuedRecord): IssuedRecord {
    return {
        ...record,
        issue_date: new Date(record.issue_date),
        due_date: new Date(record.due_date),
    };
}

export function cloneReturned(record: ReturnedRecord): ReturnedRecord {
    return {
        ...record,
        issue_date: new Date(record.issue_date),
        due_date: new Date(record.due_date),
        return_date: new Date(record.return_date),
    };
}
