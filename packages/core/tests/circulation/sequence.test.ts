import { describe, it, expect } from 'vitest';
import { IssueIdSequence } from '../../src/circulation/sequence.js';

describe('IssueIdSequence', () => {
    it('starts at 1 and never repeats', () => {
        const ids = new IssueIdSequence();
        expect(ids.peek()).toBe(1);
        expect([ids.next(), ids.next(), ids.next()]).toEqual([1, 2, 3]);
        expect(ids.peek()).toBe(4);
    });

    it('is independent per instance', () => {
        const a = new IssueIdSequence();
        const b = new IssueIdSequence();
        a.next();
        expect(b.next()).toBe(1);
    });
});
