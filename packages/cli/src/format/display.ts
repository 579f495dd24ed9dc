/**
 * Display strings for the menu. Dates are shown as DD-MM-YYYY on the
 * same local calendar the core counts late days on.
 */

import type { Book, IssueRecord, Member, Reminder } from '@library-circulation/core';

export function formatDisplayDate(date: Date): string {
    const day = String(date.getDate()).padStart(2, '0');
    const month = String(date.getMonth() + 1).padStart(2, '0');
    return `${day}-${month}-${date.getFullYear()}`;
}

export function describeBook(book: Book): string {
    return (
        `[${book.book_id}] ${book.title} by ${book.author} | ` +
        `Category: ${book.category} | ` +
        `Available: ${book.available_copies}/${book.total_copies}`
    );
}

export function memberStatus(member: Member): string {
    return member.blocked ? 'BLOCKED' : 'ACTIVE';
}

export function describeMember(member: Member): string {
    return (
        `[${member.member_id}] ${member.name} (${member.phone}) | ` +
        `Books borrowed: ${member.borrowed_books.length} | ` +
        `Outstanding fine: ${member.outstanding_fine} | Status: ${memberStatus(member)}`
    );
}

export function describeIssue(record: IssueRecord): string {
    const returned = record.status === 'returned';
    return (
        `IssueID: ${record.issue_id} | Book: ${record.book_id} | ` +
        `Member: ${record.member_id} | Issue: ${formatDisplayDate(record.issue_date)} | ` +
        `Due: ${formatDisplayDate(record.due_date)} | ` +
        `Return: ${returned ? formatDisplayDate(record.return_date) : '-'} | ` +
        `Fine: ${returned ? record.fine_charged : 0} | Status: ${returned ? 'Returned' : 'Issued'}`
    );
}

/**
 * Names to show alongside a reminder; 'Unknown' when a record
 * points at something no longer in the stores.
 */
export interface ReminderNames {
    bookTitle: string;
    memberName: string;
}

export function describeReminder(reminder: Reminder, names: ReminderNames): string {
    const { record } = reminder;
    const due = formatDisplayDate(record.due_date);
    const head = `IssueID ${record.issue_id} | Book: ${names.bookTitle} | Member: ${names.memberName}`;

    switch (reminder.kind) {
        case 'overdue':
            return `[OVERDUE] ${head} | Due: ${due} | Late by ${reminder.late_by} day(s)`;
        case 'due_soon':
            return `[DUE SOON] ${head} | Due in ${reminder.due_in} day(s) on ${due}`;
    }
}
