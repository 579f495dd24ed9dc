/**
 * Circulation Ledger: owns IssueRecords and drives the issue/return lifecycle.
 *
 * State per record: issued -> returned (terminal).
 *
 * ARCHITECTURAL NOTE: issue and return check every precondition before the
 * first mutation. The mutations that follow cannot fail, so a caller never
 * observes a half-applied loan or return.
 */

import {
    AlreadyReturnedError,
    DataIntegrityError,
    InvalidArgumentError,
    MemberBlockedError,
    NoAvailabilityError,
    NotFoundError,
} from '../errors.js';
import type { Catalog } from '../catalog/catalog.js';
import type { Roster } from '../roster/roster.js';
import { dueDateFor, fineFor, lateDays } from '../policy/fine-policy.js';
import { isValidDate } from '../utils/calendar.js';
import { IssueIdSequence } from './sequence.js';
import {
    checkIssued,
    checkReturned,
    cloneIssued,
    cloneRecord,
    cloneReturned,
    daysLate,
    isOverdue,
    toReturned,
} from './records.js';
import { collectReminders } from './reminders.js';
import type {
    CirculationConfig,
    IssueRecord,
    IssuedRecord,
    Reminder,
    ReturnReceipt,
} from '../types/index.js';

export class CirculationLedger {
    private readonly records = new Map<number, IssueRecord>();
    private readonly ids = new IssueIdSequence();

    constructor(
        private readonly catalog: Catalog,
        private readonly roster: Roster,
        private readonly config: CirculationConfig
    ) {}

    /**
     * Lend one copy of a book to a member.
     *
     * @throws {NotFoundError} Unknown book or member.
     * @throws {MemberBlockedError} The member's balance is at or above the limit.
     * @throws {NoAvailabilityError} Every copy is out.
     */
    issue(bookId: string, memberId: string, now: Date): IssuedRecord {
        assertDate(now);

        const book = this.catalog.find(bookId);
        if (!this.roster.has(memberId)) {
            throw new NotFoundError(`Member ${memberId} not found`);
        }
        if (this.roster.isBlocked(memberId)) {
            throw new MemberBlockedError(`Member ${memberId} is BLOCKED due to high outstanding fines`);
        }
        if (book.available_copies <= 0) {
            throw new NoAvailabilityError(`No available copies of ${bookId} to issue`);
        }

        const record = checkIssued({
            issue_id: this.ids.peek(),
            book_id: bookId,
            member_id: memberId,
            issue_date: new Date(now),
            due_date: dueDateFor(now, this.config),
            status: 'issued',
        });

        this.ids.next();
        this.catalog.checkOut(bookId);
        this.roster.recordBorrow(memberId, bookId);
        this.records.set(record.issue_id, Object.freeze(record));

        return cloneIssued(record);
    }

    /**
     * Take a loan back, charge any late fine and re-derive the member's block.
     *
     * @throws {NotFoundError} Unknown issue id.
     * @throws {AlreadyReturnedError} The loan was already returned; nothing changes.
     * @throws {DataIntegrityError} The record points at a missing book or member,
     *         or the book has no copy out to take back.
     */
    return(issueId: number, now: Date): ReturnReceipt {
        assertDate(now);

        const record = this.records.get(issueId);
        if (!record) {
            throw new NotFoundError(`Issue record ${issueId} not found`);
        }
        if (record.status === 'returned') {
            throw new AlreadyReturnedError(`Issue ${issueId} was already returned`);
        }

        if (!this.catalog.has(record.book_id) || !this.roster.has(record.member_id)) {
            throw new DataIntegrityError(
                `Book or member record missing for issue ${issueId}; cannot proceed safely`
            );
        }
        const book = this.catalog.find(record.book_id);
        if (book.available_copies >= book.total_copies) {
            throw new DataIntegrityError(
                `Issue ${issueId} is active but every copy of ${record.book_id} is on the shelf`
            );
        }

        const late = lateDays(record.due_date, now);
        const fine = fineFor(late, this.config);
        const returned = Object.freeze(checkReturned(toReturned(record, new Date(now), fine)));

        this.records.set(issueId, returned);
        this.roster.applyFine(record.member_id, fine);
        this.catalog.checkIn(record.book_id);
        this.roster.recordReturn(record.member_id, record.book_id);

        return {
            record: cloneReturned(returned),
            late_days: late,
            fine,
            member: this.roster.find(record.member_id),
        };
    }

    /**
     * @throws {NotFoundError} Unknown issue id.
     */
    find(issueId: number): IssueRecord {
        const record = this.records.get(issueId);
        if (!record) {
            throw new NotFoundError(`Issue record ${issueId} not found`);
        }
        return cloneRecord(record);
    }

    /**
     * Loans still out, in creation order.
     */
    activeIssues(): IssuedRecord[] {
        const active: IssuedRecord[] = [];
        for (const record of this.records.values()) {
            if (record.status === 'issued') active.push(cloneIssued(record));
        }
        return active;
    }

    /**
     * Every record regardless of state, in creation order.
     */
    history(): IssueRecord[] {
        return [...this.records.values()].map(cloneRecord);
    }

    /**
     * Every record for one member, in creation order.
     */
    issuesForMember(memberId: string): IssueRecord[] {
        return this.history().filter(record => record.member_id === memberId);
    }

    /**
     * Active loans that are overdue or due within the window.
     *
     * @throws {InvalidArgumentError} Negative or fractional window.
     */
    overdueAndDueSoon(now: Date, dueSoonWindowDays: number = this.config.due_soon_window_days): Reminder[] {
        assertDate(now);
        if (!Number.isInteger(dueSoonWindowDays) || dueSoonWindowDays < 0) {
            throw new InvalidArgumentError(
                `Due-soon window must be a whole number of days >= 0 (got ${dueSoonWindowDays})`
            );
        }
        return collectReminders(this.activeIssues(), now, dueSoonWindowDays);
    }

    /**
     * Late days of a record as of `onDate` (its return date once returned).
     */
    daysLate(record: IssueRecord, onDate: Date): number {
        return daysLate(record, onDate);
    }

    isOverdue(record: IssueRecord, onDate: Date): boolean {
        return isOverdue(record, onDate);
    }
}

function assertDate(date: Date): void {
    if (!isValidDate(date)) {
        throw new InvalidArgumentError('Date is not valid');
    }
}
