import { describe, it, expect, vi, afterEach } from 'vitest';
import { createLibrary } from '@library-circulation/core';
import { runAction, runMenu, showMenu } from '../src/menu/menu.js';
import { captureConsole, day, makeContext } from './helpers.js';

describe('menu', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('lists every action and Exit', () => {
        const output = captureConsole();
        showMenu();
        const logs = output.logs();
        expect(logs[1]).toBe('1.  Add Book');
        expect(logs).toContain('14. Pay Fine');
        expect(logs[logs.length - 1]).toBe('0.  Exit');
    });

    it('runs an add / register / issue / return session with a late fine', async () => {
        const output = captureConsole();
        const now = vi.fn<() => Date>()
            .mockReturnValueOnce(day(0))
            .mockReturnValueOnce(day(20));
        const ctx = makeContext([
            '1', 'B1', 'Dune', 'Frank Herbert', 'Fiction', '1',
            '5', 'M1', 'Asha Rao', '555-0100',
            '8', 'B1', 'M1',
            '9', '1',
            '0',
        ], createLibrary(), now);

        await runMenu(ctx, { pause: false });

        const logs = output.logs();
        expect(logs).toContain('✓ Book added successfully.');
        expect(logs).toContain('✓ Member registered successfully.');
        expect(logs).toContain('✓ Book issued successfully.');
        expect(logs).toContain('Due date: 15-01-2026');
        expect(logs).toContain(
            'IssueID: 1 | Book: B1 | Member: M1 | Issue: 01-01-2026 | Due: 15-01-2026 | Return: - | Fine: 0 | Status: Issued'
        );
        expect(logs).toContain('✓ Book return recorded.');
        expect(logs).toContain('Late days: 6, Fine charged: 30');
        expect(logs).toContain('Member outstanding fine now: 30');
        expect(logs[logs.length - 1]).toBe('Exiting Library Circulation. Goodbye!');

        expect(ctx.library.catalog.find('B1').available_copies).toBe(1);
        expect(ctx.library.roster.find('M1').outstanding_fine).toBe(30);
        expect(output.errors()).toEqual([]);
    });

    it('reports circulation errors and keeps going', async () => {
        const output = captureConsole();
        const ctx = makeContext(['8', 'B9', 'M1', '3', '   ', '0']);

        await runMenu(ctx, { pause: false });

        expect(output.errors()).toEqual(['✖ Book B9 not found', '✖ Keyword cannot be empty']);
        expect(output.logs()[output.logs().length - 1]).toBe('Exiting Library Circulation. Goodbye!');
    });

    it('warns on an unknown choice', async () => {
        const output = captureConsole();
        await runMenu(makeContext(['99', '0']), { pause: false });
        expect(output.warnings()).toEqual(['⚠️  Invalid choice. Please try again.']);
    });

    it('exits when input ends', async () => {
        const output = captureConsole();
        await runMenu(makeContext([]), { pause: false });
        expect(output.logs()[output.logs().length - 1]).toBe('Exiting Library Circulation. Goodbye!');
    });

    it('waits for ENTER after each action when pausing', async () => {
        captureConsole();
        const ctx = makeContext(['2', '', '0']);
        await runMenu(ctx, { pause: true });
        expect(ctx.prompter).toMatchObject({
            questions: ['Enter choice: ', '\nPress ENTER to continue...', 'Enter choice: '],
        });
    });

    it('propagates errors that are not circulation errors', async () => {
        captureConsole();
        const broken = async (): Promise<void> => {
            throw new Error('disk on fire');
        };
        await expect(runAction(broken, makeContext([]))).rejects.toThrow('disk on fire');
    });
});
