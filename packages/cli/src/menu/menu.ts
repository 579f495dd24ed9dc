import { isLibraryError } from '@library-circulation/core';
import { pause } from '../utils/prompt.js';
import { error, log, warn } from '../utils/console.js';
import { addBook, viewAllBooks, searchBooks, updateBook } from './books.js';
import { registerMember, viewAllMembers, searchMemberById, payFine } from './members.js';
import { issueBook, returnBook } from './circulation.js';
import { viewActiveIssues, viewIssueHistory, showReminders, exportReportAction } from './reports.js';
import type { MenuAction, MenuContext, MenuOptions } from '../types.js';

interface MenuItem {
    key: string;
    label: string;
    action: MenuAction;
}

export const MENU_ITEMS: readonly MenuItem[] = [
    { key: '1', label: 'Add Book', action: addBook },
    { key: '2', label: 'View All Books', action: viewAllBooks },
    { key: '3', label: 'Search Books', action: searchBooks },
    { key: '4', label: 'Update Book', action: updateBook },
    { key: '5', label: 'Register Member', action: registerMember },
    { key: '6', label: 'View All Members', action: viewAllMembers },
    { key: '7', label: 'Search Member by ID', action: searchMemberById },
    { key: '8', label: 'Issue Book', action: issueBook },
    { key: '9', label: 'Return Book', action: returnBook },
    { key: '10', label: 'View Active Issues', action: viewActiveIssues },
    { key: '11', label: 'View Issue History', action: viewIssueHistory },
    { key: '12', label: 'Show Due/Overdue Reminders', action: showReminders },
    { key: '13', label: 'Export Report', action: exportReportAction },
    { key: '14', label: 'Pay Fine', action: payFine },
];

const EXIT_KEY = '0';

export function showMenu(): void {
    log('\n========== Library Circulation & Fine System ==========');
    for (const item of MENU_ITEMS) {
        log(`${`${item.key}.`.padEnd(4)}${item.label}`);
    }
    log(`${`${EXIT_KEY}.`.padEnd(4)}Exit`);
}

/**
 * Runs one menu action. Circulation errors are reported and the loop
 * carries on; anything else is a bug and propagates.
 */
export async function runAction(action: MenuAction, ctx: MenuContext): Promise<void> {
    try {
        await action(ctx);
    } catch (err) {
        if (!isLibraryError(err)) throw err;
        error(err.message);
    }
}

/**
 * Reads choices until Exit or end of input.
 */
export async function runMenu(ctx: MenuContext, options: MenuOptions): Promise<void> {
    while (true) {
        showMenu();
        const choice = await ctx.prompter.ask('Enter choice: ');
        if (choice === null || choice.trim() === EXIT_KEY) {
            log('Exiting Library Circulation. Goodbye!');
            return;
        }

        const item = MENU_ITEMS.find(i => i.key === choice.trim());
        if (item) {
            await runAction(item.action, ctx);
        } else {
            warn('Invalid choice. Please try again.');
        }

        if (options.pause) {
            await pause(ctx.prompter);
        }
    }
}
