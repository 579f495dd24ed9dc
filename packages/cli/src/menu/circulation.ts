import { askText } from '../utils/prompt.js';
import { error, log, success, warn } from '../utils/console.js';
import { describeIssue, formatDisplayDate } from '../format/display.js';
import type { MenuAction } from '../types.js';

export const issueBook: MenuAction = async ({ library, prompter, now }) => {
    log('\n--- Issue Book ---');
    const bookId = await askText(prompter, 'Enter Book ID: ');
    const memberId = await askText(prompter, 'Enter Member ID: ');

    const record = library.ledger.issue(bookId, memberId, now());

    success('Book issued successfully.');
    log(`Due date: ${formatDisplayDate(record.due_date)}`);
    log(describeIssue(record));
};

export const returnBook: MenuAction = async ({ library, prompter, now }) => {
    log('\n--- Return Book ---');
    const input = await askText(prompter, 'Enter Issue ID: ');
    if (!/^\d+$/.test(input)) {
        error('Issue ID must be a number.');
        return;
    }

    const receipt = library.ledger.return(parseInt(input, 10), now());

    success('Book return recorded.');
    log(`Late days: ${receipt.late_days}, Fine charged: ${receipt.fine}`);
    log(`Member outstanding fine now: ${receipt.member.outstanding_fine}`);
    if (receipt.member.blocked) {
        warn('Member is now BLOCKED due to high fines.');
    }
};
