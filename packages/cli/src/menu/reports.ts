import { REPORT } from '@library-circulation/shared';
import type { Library } from '@library-circulation/core';
import { askText } from '../utils/prompt.js';
import { log, success, warn } from '../utils/console.js';
import { describeIssue, describeReminder, type ReminderNames } from '../format/display.js';
import { exportReport } from '../commands/export-report.js';
import type { MenuAction } from '../types.js';

export const viewActiveIssues: MenuAction = async ({ library }) => {
    log('\n--- Active Issues (Not Returned) ---');
    const active = library.ledger.activeIssues();
    if (active.length === 0) {
        log('No active issues.');
        return;
    }
    for (const record of active) {
        log(describeIssue(record));
    }
};

export const viewIssueHistory: MenuAction = async ({ library }) => {
    log('\n--- All Issue Records (History) ---');
    const history = library.ledger.history();
    if (history.length === 0) {
        log('No issue records.');
        return;
    }
    for (const record of history) {
        log(describeIssue(record));
    }
};

export const showReminders: MenuAction = async ({ library, now }) => {
    log('\n--- Due / Overdue Reminders ---');
    const reminders = library.ledger.overdueAndDueSoon(now());
    if (reminders.length === 0) {
        log('No books are due soon or overdue.');
        return;
    }
    for (const reminder of reminders) {
        log(describeReminder(reminder, namesFor(library, reminder.record.book_id, reminder.record.member_id)));
    }
};

export const exportReportAction: MenuAction = async ({ library, prompter, workspace, now }) => {
    log('\n--- Export Report ---');
    const filename = await askText(prompter, `Enter output filename (default: ${REPORT.DEFAULT_FILENAME}): `);

    const result = await exportReport(library, workspace, filename, now());
    if (result.status === 'saved') {
        success(`Report saved as '${result.path}'.`);
    } else {
        warn(`Report export unavailable: ${result.reason}`);
    }
};

function namesFor(library: Library, bookId: string, memberId: string): ReminderNames {
    return {
        bookTitle: library.catalog.has(bookId) ? library.catalog.find(bookId).title : 'Unknown',
        memberName: library.roster.has(memberId) ? library.roster.find(memberId).name : 'Unknown',
    };
}
