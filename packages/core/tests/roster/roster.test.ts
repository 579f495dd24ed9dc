import { describe, it, expect, beforeEach } from 'vitest';
import { Roster } from '../../src/roster/roster.js';
import { DuplicateKeyError, InvalidArgumentError, NotFoundError } from '../../src/errors.js';
import { CirculationConfigSchema } from '../../src/types/index.js';

describe('Roster', () => {
    let roster: Roster;

    beforeEach(() => {
        roster = new Roster(CirculationConfigSchema.parse({}));
        roster.register({ member_id: 'M1', name: 'Asha Rao', phone: '555-0100' });
    });

    describe('register', () => {
        it('starts with no fine, no block and no books', () => {
            expect(roster.find('M1')).toEqual({
                member_id: 'M1',
                name: 'Asha Rao',
                phone: '555-0100',
                blocked: false,
                outstanding_fine: 0,
                borrowed_books: [],
            });
        });

        it('rejects a duplicate id', () => {
            expect(() => roster.register({ member_id: 'M1', name: 'Other', phone: '' })).toThrow(DuplicateKeyError);
        });

        it('rejects a blank id', () => {
            expect(() => roster.register({ member_id: '', name: 'Nobody', phone: '' })).toThrow(InvalidArgumentError);
        });
    });

    it('throws NotFound for an unknown member', () => {
        expect(() => roster.find('M9')).toThrow(NotFoundError);
        expect(() => roster.applyFine('M9', 5)).toThrow(NotFoundError);
    });

    describe('applyFine', () => {
        it('blocks when the balance reaches the limit', () => {
            roster.applyFine('M1', 495);
            expect(roster.find('M1').blocked).toBe(false);

            const member = roster.applyFine('M1', 10);
            expect(member.outstanding_fine).toBe(505);
            expect(member.blocked).toBe(true);
        });

        it('blocks at exactly the limit', () => {
            expect(roster.applyFine('M1', 500).blocked).toBe(true);
        });

        it('keeps blocked equal to the blocking law after every fine', () => {
            for (const amount of [0, 120, 200, 0, 150, 40]) {
                const member = roster.applyFine('M1', amount);
                expect(member.blocked).toBe(member.outstanding_fine >= 500);
            }
        });

        it('rejects negative and fractional amounts', () => {
            expect(() => roster.applyFine('M1', -5)).toThrow(InvalidArgumentError);
            expect(() => roster.applyFine('M1', 2.5)).toThrow(InvalidArgumentError);
            expect(roster.find('M1').outstanding_fine).toBe(0);
        });

        it('honours a configured limit', () => {
            const strict = new Roster(CirculationConfigSchema.parse({ max_fine_limit: 50 }));
            strict.register({ member_id: 'M2', name: 'Ben', phone: '' });
            expect(strict.applyFine('M2', 50).blocked).toBe(true);
        });
    });

    describe('settleFine', () => {
        it('reduces the balance and unblocks below the limit', () => {
            roster.applyFine('M1', 520);
            const member = roster.settleFine('M1', 30);
            expect(member.outstanding_fine).toBe(490);
            expect(member.blocked).toBe(false);
        });

        it('rejects paying more than is owed', () => {
            roster.applyFine('M1', 20);
            expect(() => roster.settleFine('M1', 25)).toThrow('Payment of 25 exceeds outstanding fine of 20');
        });

        it('rejects a zero payment', () => {
            roster.applyFine('M1', 20);
            expect(() => roster.settleFine('M1', 0)).toThrow(InvalidArgumentError);
        });
    });

    describe('borrowed books', () => {
        it('keeps insertion order and removes one occurrence', () => {
            roster.recordBorrow('M1', 'B1');
            roster.recordBorrow('M1', 'B2');
            roster.recordBorrow('M1', 'B1');
            roster.recordReturn('M1', 'B1');
            expect(roster.find('M1').borrowed_books).toEqual(['B2', 'B1']);
        });

        it('tolerates returning a book that is not listed', () => {
            roster.recordBorrow('M1', 'B2');
            roster.recordReturn('M1', 'B7');
            expect(roster.find('M1').borrowed_books).toEqual(['B2']);
        });

        it('hands out a copy of the list', () => {
            roster.recordBorrow('M1', 'B1');
            roster.find('M1').borrowed_books.push('B5');
            expect(roster.find('M1').borrowed_books).toEqual(['B1']);
        });
    });

    it('lists every member in registration order', () => {
        roster.register({ member_id: 'A0', name: 'Zed', phone: '' });
        expect(roster.all().map(m => m.member_id)).toEqual(['M1', 'A0']);
        expect(roster.size).toBe(2);
    });
});
