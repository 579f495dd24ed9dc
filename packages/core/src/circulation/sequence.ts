import { FIRST_ISSUE_ID } from '../types/index.js';

/**
 * Owned issue-id counter. Ids are strictly increasing and never reused.
 */
export class IssueIdSequence {
    private nextId = FIRST_ISSUE_ID;

    /**
     * Allocate the next id.
     */
    next(): number {
        const id = this.nextId;
        this.nextId += 1;
        return id;
    }

    /**
     * The id the next allocation will return.
     */
    peek(): number {
        return this.nextId;
    }
}
