/**
 * Re-export all types from shared package.
 * Core package uses these types but doesn't define them.
 */
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
} from '@library-circulation/shared';

export {
    CirculationConfigSchema,
    NewBookSchema,
    BookUpdateSchema,
    NewMemberSchema,
    IssuedRecordSchema,
    ReturnedRecordSchema,
    CIRCULATION_DEFAULTS,
    FIRST_ISSUE_ID,
} from '@library-circulation/shared';
