/**
 * Zod schemas for circulation data structures.
 *
 * IMPORTANT: Fines are whole currency units (integers). There is no
 * currency formatting anywhere in the core.
 */

import { z } from 'zod';
import { CIRCULATION_DEFAULTS, FIRST_ISSUE_ID } from './constants.js';

// ============================================================================
// Primitive Validators
// ============================================================================

/**
 * Book and member identifiers: free text, but never blank.
 */
const recordId = z.string().trim().min(1, 'Id cannot be empty');

/**
 * Copy counts and fine amounts are whole numbers.
 */
const count = z.number().int().min(0);

const issueId = z.number().int().min(FIRST_ISSUE_ID);

// ============================================================================
// Configuration
// ============================================================================

/**
 * Circulation policy, as read from config/library.yaml.
 * Missing keys take the defaults.
 */
export const CirculationConfigSchema = z.object({
    fine_per_day: count.default(CIRCULATION_DEFAULTS.FINE_PER_DAY),
    max_fine_limit: z.number().int().min(1).default(CIRCULATION_DEFAULTS.MAX_FINE_LIMIT),
    issue_days: z.number().int().min(1).default(CIRCULATION_DEFAULTS.ISSUE_DAYS),
    due_soon_window_days: count.default(CIRCULATION_DEFAULTS.DUE_SOON_WINDOW_DAYS),
});

export type CirculationConfig = z.infer<typeof CirculationConfigSchema>;
export type CirculationConfigInput = z.input<typeof CirculationConfigSchema>;

// ============================================================================
// Catalog Schemas
// ============================================================================

/**
 * A catalogued title and its copy counts.
 * available_copies never exceeds total_copies.
 */
export const BookSchema = z.object({
    book_id: recordId,
    title: z.string(),
    author: z.string(),
    category: z.string(),
    total_copies: z.number().int().min(1),
    available_copies: count,
}).refine(b => b.available_copies <= b.total_copies, {
    message: 'available_copies cannot exceed total_copies',
    path: ['available_copies'],
});

export type Book = z.infer<typeof BookSchema>;

/**
 * Input to Catalog.addBook. Available copies always start at the total.
 */
export const NewBookSchema = z.object({
    book_id: recordId,
    title: z.string().trim(),
    author: z.string().trim(),
    category: z.string().trim(),
    total_copies: z.number().int('Total copies must be a whole number').min(1, 'Total copies must be at least 1'),
});

export type NewBook = z.infer<typeof NewBookSchema>;

/**
 * Input to Catalog.updateBook. Omitted or blank text fields keep their value.
 * total_copies is range-checked by the catalog, which knows the issued count.
 */
export const BookUpdateSchema = z.object({
    title: z.string().trim().optional(),
    author: z.string().trim().optional(),
    category: z.string().trim().optional(),
    total_copies: z.number().int('Total copies must be a whole number').optional(),
});

export type BookUpdate = z.infer<typeof BookUpdateSchema>;

// ============================================================================
// Roster Schemas
// ============================================================================

/**
 * A registered member.
 * blocked is derived from outstanding_fine and never set on its own.
 */
export const MemberSchema = z.object({
    member_id: recordId,
    name: z.string(),
    phone: z.string(),
    blocked: z.boolean(),
    outstanding_fine: count,
    borrowed_books: z.array(z.string()),
});

export type Member = z.infer<typeof MemberSchema>;

/**
 * Input to Roster.register.
 */
export const NewMemberSchema = z.object({
    member_id: recordId,
    name: z.string().trim(),
    phone: z.string().trim(),
});

export type NewMember = z.infer<typeof NewMemberSchema>;

// ============================================================================
// Issue Record Schemas
// ============================================================================

const IssueRecordBaseSchema = z.object({
    issue_id: issueId,
    book_id: z.string(),
    member_id: z.string(),
    issue_date: z.date(),
    due_date: z.date(),
});

/**
 * A loan that is still out.
 */
export const IssuedRecordSchema = IssueRecordBaseSchema.extend({
    status: z.literal('issued'),
});

export type IssuedRecord = z.infer<typeof IssuedRecordSchema>;

/**
 * A loan that has come back. Terminal: return_date and fine_charged
 * are fixed once this record exists.
 */
export const ReturnedRecordSchema = IssueRecordBaseSchema.extend({
    status: z.literal('returned'),
    return_date: z.date(),
    fine_charged: count,
});

export type ReturnedRecord = z.infer<typeof ReturnedRecordSchema>;

export const IssueRecordSchema = z.discriminatedUnion('status', [
    IssuedRecordSchema,
    ReturnedRecordSchema,
]);

export type IssueRecord = z.infer<typeof IssueRecordSchema>;
export type IssueStatus = IssueRecord['status'];

/**
 * What Ledger.return hands back: the terminal record plus the figures
 * a caller needs to tell the member what happened.
 */
export interface ReturnReceipt {
    record: ReturnedRecord;
    late_days: number;
    fine: number;
    member: Member;
}

// ============================================================================
// Reminder Schemas
// ============================================================================

/**
 * An active loan past its due date.
 */
export const OverdueReminderSchema = z.object({
    kind: z.literal('overdue'),
    record: IssuedRecordSchema,
    late_by: z.number().int().min(1),
});

/**
 * An active loan due within the reminder window (0 = due today).
 */
export const DueSoonReminderSchema = z.object({
    kind: z.literal('due_soon'),
    record: IssuedRecordSchema,
    due_in: count,
});

export const ReminderSchema = z.discriminatedUnion('kind', [
    OverdueReminderSchema,
    DueSoonReminderSchema,
]);

export type OverdueReminder = z.infer<typeof OverdueReminderSchema>;
export type DueSoonReminder = z.infer<typeof DueSoonReminderSchema>;
export type Reminder = z.infer<typeof ReminderSchema>;
