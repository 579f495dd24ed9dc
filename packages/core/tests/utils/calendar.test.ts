import { describe, it, expect } from 'vitest';
import { calendarDaysBetween, addDays, isValidDate } from '../../src/utils/calendar.js';

describe('calendarDaysBetween', () => {
    it('returns 0 for the same day regardless of time', () => {
        expect(calendarDaysBetween(
            new Date(2026, 0, 15, 0, 0),
            new Date(2026, 0, 15, 23, 59, 59)
        )).toBe(0);
    });

    it('counts a late-evening to early-morning step as one day', () => {
        expect(calendarDaysBetween(
            new Date(2026, 0, 1, 23, 59),
            new Date(2026, 0, 2, 0, 1)
        )).toBe(1);
    });

    it('uses local midnight, not UTC midnight', () => {
        // 00:30 and 04:00 on 16 March fall on 15 March in UTC under a positive offset.
        expect(calendarDaysBetween(new Date(2024, 2, 15, 10), new Date(2024, 2, 16, 0, 30))).toBe(1);
        expect(calendarDaysBetween(new Date(2024, 2, 15, 23, 30), new Date(2024, 2, 16, 4))).toBe(1);
        expect(calendarDaysBetween(new Date(2024, 2, 16, 1), new Date(2024, 2, 16, 23))).toBe(0);
    });

    it('is signed', () => {
        const a = new Date(2026, 0, 15, 12);
        const b = new Date(2026, 0, 20, 8);
        expect(calendarDaysBetween(a, b)).toBe(5);
        expect(calendarDaysBetween(b, a)).toBe(-5);
    });

    it('handles leap year boundary', () => {
        expect(calendarDaysBetween(new Date(2024, 1, 28), new Date(2024, 2, 1))).toBe(2);
        expect(calendarDaysBetween(new Date(2025, 1, 28), new Date(2025, 2, 1))).toBe(1);
    });

    it('handles year boundary', () => {
        expect(calendarDaysBetween(new Date(2025, 11, 30), new Date(2026, 0, 4))).toBe(5);
    });
});

describe('addDays', () => {
    it('keeps the local time of day', () => {
        const due = addDays(new Date(2026, 0, 1, 9, 30), 14);
        expect([due.getFullYear(), due.getMonth(), due.getDate(), due.getHours(), due.getMinutes()])
            .toEqual([2026, 0, 15, 9, 30]);
    });

    it('crosses a month end', () => {
        expect(addDays(new Date(2026, 0, 25, 3), 14)).toEqual(new Date(2026, 1, 8, 3));
    });

    it('does not mutate its input', () => {
        const start = new Date(2026, 0, 1);
        addDays(start, 3);
        expect(start).toEqual(new Date(2026, 0, 1));
    });
});

describe('isValidDate', () => {
    it('rejects an invalid date', () => {
        expect(isValidDate(new Date('not a date'))).toBe(false);
        expect(isValidDate(new Date(2026, 0, 1))).toBe(true);
    });
});
