import { askInt, askText } from '../utils/prompt.js';
import { info, log, success, warn } from '../utils/console.js';
import { describeMember } from '../format/display.js';
import type { MenuAction } from '../types.js';

export const registerMember: MenuAction = async ({ library, prompter }) => {
    log('\n--- Register Member ---');
    const memberId = await askText(prompter, 'Enter Member ID: ');
    if (library.roster.has(memberId)) {
        warn('Member ID already exists.');
        return;
    }
    const name = await askText(prompter, 'Enter Name: ');
    const phone = await askText(prompter, 'Enter Phone: ');

    library.roster.register({ member_id: memberId, name, phone });
    success('Member registered successfully.');
};

export const viewAllMembers: MenuAction = async ({ library }) => {
    log('\n--- All Members ---');
    const members = library.roster.all();
    if (members.length === 0) {
        log('No members registered.');
        return;
    }
    for (const member of members) {
        log(describeMember(member));
    }
};

export const searchMemberById: MenuAction = async ({ library, prompter }) => {
    log('\n--- Search Member ---');
    const memberId = await askText(prompter, 'Enter Member ID: ');
    const member = library.roster.find(memberId);

    log(describeMember(member));
    if (member.borrowed_books.length > 0) {
        log(`Borrowed books: ${member.borrowed_books.join(', ')}`);
    } else {
        log('No books currently borrowed.');
    }
};

export const payFine: MenuAction = async ({ library, prompter }) => {
    log('\n--- Pay Fine ---');
    const memberId = await askText(prompter, 'Enter Member ID: ');
    const before = library.roster.find(memberId);
    if (before.outstanding_fine === 0) {
        log('No outstanding fine.');
        return;
    }

    const amount = await askInt(prompter, `Amount to pay (outstanding ${before.outstanding_fine}): `, 1);
    if (amount === null) return;

    const after = library.roster.settleFine(memberId, amount);
    success(`Payment recorded. Outstanding fine now: ${after.outstanding_fine}`);
    if (before.blocked && !after.blocked) {
        info('Member is no longer blocked.');
    }
};
