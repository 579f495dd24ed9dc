/**
 * Error kinds raised by the circulation core.
 *
 * ARCHITECTURAL NOTE: The core never prints. Every failed operation throws
 * exactly one LibraryError and leaves the stores as they were.
 */

export type LibraryErrorKind =
    | 'NOT_FOUND'
    | 'DUPLICATE_KEY'
    | 'INVALID_ARGUMENT'
    | 'INVALID_OPERATION'
    | 'MEMBER_BLOCKED'
    | 'NO_AVAILABILITY'
    | 'ALREADY_RETURNED'
    | 'DATA_INTEGRITY';

/**
 * Base circulation error with a machine-readable kind.
 */
export class LibraryError extends Error {
    readonly kind: LibraryErrorKind;

    /**
     * @param message Human readable message.
     * @param kind Discriminant the calling layer can switch on.
     */
    constructor(message: string, kind: LibraryErrorKind) {
        super(message);
        this.name = new.target.name;
        this.kind = kind;
    }
}

/**
 * A book, member or issue id did not resolve.
 */
export class NotFoundError extends LibraryError {
    constructor(message: string) {
        super(message, 'NOT_FOUND');
    }
}

/**
 * An id collided on create.
 */
export class DuplicateKeyError extends LibraryError {
    constructor(message: string) {
        super(message, 'DUPLICATE_KEY');
    }
}

/**
 * Bad caller input: blank keyword, non-positive copy count, and so on.
 */
export class InvalidArgumentError extends LibraryError {
    constructor(message: string) {
        super(message, 'INVALID_ARGUMENT');
    }
}

/**
 * Well-formed input the current state does not allow.
 */
export class InvalidOperationError extends LibraryError {
    constructor(message: string) {
        super(message, 'INVALID_OPERATION');
    }
}

export class MemberBlockedError extends LibraryError {
    constructor(message: string) {
        super(message, 'MEMBER_BLOCKED');
    }
}

export class NoAvailabilityError extends LibraryError {
    constructor(message: string) {
        super(message, 'NO_AVAILABILITY');
    }
}

export class AlreadyReturnedError extends LibraryError {
    constructor(message: string) {
        super(message, 'ALREADY_RETURNED');
    }
}

/**
 * An issue record points at a book or member the stores do not hold.
 * Signals corruption outside the ledger; the operation is aborted, not repaired.
 */
export class DataIntegrityError extends LibraryError {
    constructor(message: string) {
        super(message, 'DATA_INTEGRITY');
    }
}

export function isLibraryError(value: unknown): value is LibraryError {
    return value instanceof LibraryError;
}
