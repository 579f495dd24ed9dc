// Types (re-exported from shared)
export type {
    CirculationConfig,
    CirculationConfigInput,
    Book,
    NewBook,
    BookUpdate,
    Member,
    NewMember,
    IssuedRecord,
    ReturnedRecord,
    IssueRecord,
    IssueStatus,
    ReturnReceipt,
    OverdueReminder,
    DueSoonReminder,
    Reminder,
} from './types/index.js';

export {
    CirculationConfigSchema,
    CIRCULATION_DEFAULTS,
    FIRST_ISSUE_ID,
} from './types/index.js';

// Errors
export {
    LibraryError,
    NotFoundError,
    DuplicateKeyError,
    InvalidArgumentError,
    InvalidOperationError,
    MemberBlockedError,
    NoAvailabilityError,
    AlreadyReturnedError,
    DataIntegrityError,
    isLibraryError,
} from './errors.js';
export type { LibraryErrorKind } from './errors.js';

// Utils
export { calendarDaysBetween, addDays, isValidDate } from './utils/index.js';

// Policy
export { dueDateFor, lateDays, fineFor, isOverLimit } from './policy/index.js';

// Stores
export { Catalog } from './catalog/index.js';
export { Roster } from './roster/index.js';
export { CirculationLedger, daysLate, isOverdue, classifyReminder, collectReminders } from './circulation/index.js';

// Composition root
export { createLibrary } from './library.js';
export type { Library } from './library.js';
