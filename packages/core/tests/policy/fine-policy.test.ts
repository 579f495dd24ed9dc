import { describe, it, expect } from 'vitest';
import { dueDateFor, lateDays, fineFor, isOverLimit } from '../../src/policy/fine-policy.js';
import { CirculationConfigSchema } from '../../src/types/index.js';

const config = CirculationConfigSchema.parse({});

describe('dueDateFor', () => {
    it('adds the issue period', () => {
        expect(dueDateFor(new Date(2026, 2, 1, 10), config)).toEqual(new Date(2026, 2, 15, 10));
    });

    it('uses a configured issue period', () => {
        const weekly = CirculationConfigSchema.parse({ issue_days: 7 });
        expect(dueDateFor(new Date(2026, 2, 1, 10), weekly)).toEqual(new Date(2026, 2, 8, 10));
    });
});

describe('lateDays', () => {
    const due = new Date(2026, 2, 15, 10);

    it('is 0 when returned before the due date', () => {
        expect(lateDays(due, new Date(2026, 2, 10, 10))).toBe(0);
    });

    it('is 0 later on the due day itself', () => {
        expect(lateDays(due, new Date(2026, 2, 15, 23))).toBe(0);
    });

    it('counts calendar days, not elapsed hours', () => {
        expect(lateDays(due, new Date(2026, 2, 16, 1))).toBe(1);
    });
});

describe('fineFor', () => {
    it('charges the per-day rate', () => {
        expect(fineFor(6, config)).toBe(30);
        expect(fineFor(0, config)).toBe(0);
    });
});

describe('isOverLimit', () => {
    it('blocks at the limit, not above it only', () => {
        expect(isOverLimit(499, config)).toBe(false);
        expect(isOverLimit(500, config)).toBe(true);
        expect(isOverLimit(505, config)).toBe(true);
    });
});
