// Schemas
export {
    CirculationConfigSchema,
    BookSchema,
    NewBookSchema,
    BookUpdateSchema,
    MemberSchema,
    NewMemberSchema,
    IssuedRecordSchema,
    ReturnedRecordSchema,
    IssueRecordSchema,
    OverdueReminderSchema,
    DueSoonReminderSchema,
    ReminderSchema,
} from './schemas.js';

// Types
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
} from './schemas.js';

// Constants
export {
    CIRCULATION_DEFAULTS,
    FIRST_ISSUE_ID,
    REPORT,
    WORKSPACE_CONFIG_PATH,
} from './constants.js';
