/**
 * Roster: owns Member records, fine balances and block status.
 *
 * blocked is never set on its own; it is re-derived from outstanding_fine
 * by the policy's blocking law after every balance change and on every check.
 */

import { DuplicateKeyError, InvalidArgumentError, NotFoundError } from '../errors.js';
import { isOverLimit } from '../policy/fine-policy.js';
import { describeIssues } from '../utils/validation.js';
import { NewMemberSchema } from '../types/index.js';
import type { CirculationConfig, Member, NewMember } from '../types/index.js';

export class Roster {
    private readonly members = new Map<string, Member>();

    constructor(private readonly config: CirculationConfig) {}

    get size(): number {
        return this.members.size;
    }

    /**
     * @throws {InvalidArgumentError} Blank member id.
     * @throws {DuplicateKeyError} The id is already registered.
     */
    register(input: NewMember): Member {
        const parsed = NewMemberSchema.safeParse(input);
        if (!parsed.success) {
            throw new InvalidArgumentError(describeIssues(parsed.error));
        }
        const { member_id, name, phone } = parsed.data;

        if (this.members.has(member_id)) {
            throw new DuplicateKeyError(`Member ID ${member_id} already exists`);
        }

        const member: Member = {
            member_id,
            name,
            phone,
            blocked: false,
            outstanding_fine: 0,
            borrowed_books: [],
        };
        this.members.set(member_id, member);
        return snapshot(member);
    }

    /**
     * @throws {NotFoundError} Unknown member id.
     */
    find(memberId: string): Member {
        return snapshot(this.require(memberId));
    }

    has(memberId: string): boolean {
        return this.members.has(memberId);
    }

    /**
     * Every member, in registration order.
     */
    all(): Member[] {
        return [...this.members.values()].map(snapshot);
    }

    /**
     * Charge a fine and re-derive the block status.
     *
     * @throws {InvalidArgumentError} Negative or fractional amount.
     */
    applyFine(memberId: string, amount: number): Member {
        const member = this.require(memberId);
        if (!Number.isInteger(amount) || amount < 0) {
            throw new InvalidArgumentError(`Fine amount must be a whole number >= 0 (got ${amount})`);
        }
        member.outstanding_fine += amount;
        this.rederive(member);
        return snapshot(member);
    }

    /**
     * Record a payment against the balance. Paying below the limit unblocks.
     *
     * @throws {InvalidArgumentError} Amount below 1 or above the balance.
     */
    settleFine(memberId: string, amount: number): Member {
        const member = this.require(memberId);
        if (!Number.isInteger(amount) || amount < 1) {
            throw new InvalidArgumentError(`Payment must be a whole number >= 1 (got ${amount})`);
        }
        if (amount > member.outstanding_fine) {
            throw new InvalidArgumentError(
                `Payment of ${amount} exceeds outstanding fine of ${member.outstanding_fine}`
            );
        }
        member.outstanding_fine -= amount;
        this.rederive(member);
        return snapshot(member);
    }

    /**
     * Current block status, re-derived from the balance rather than trusted.
     */
    isBlocked(memberId: string): boolean {
        return this.rederive(this.require(memberId));
    }

    /**
     * @internal Called by the ledger on issue.
     */
    recordBorrow(memberId: string, bookId: string): void {
        this.require(memberId).borrowed_books.push(bookId);
    }

    /**
     * Drop one occurrence of the book id. A missing id is tolerated:
     * borrowed_books is a convenience list, not the copy accounting.
     * @internal Called by the ledger on return.
     */
    recordReturn(memberId: string, bookId: string): void {
        const borrowed = this.require(memberId).borrowed_books;
        const index = borrowed.indexOf(bookId);
        if (index !== -1) {
            borrowed.splice(index, 1);
        }
    }

    private rederive(member: Member): boolean {
        member.blocked = isOverLimit(member.outstanding_fine, this.config);
        return member.blocked;
    }

    private require(memberId: string): Member {
        const member = this.members.get(memberId);
        if (!member) {
            throw new NotFoundError(`Member ${memberId} not found`);
        }
        return member;
    }
}

function snapshot(member: Member): Member {
    return { ...member, borrowed_books: [...member.borrowed_books] };
}
