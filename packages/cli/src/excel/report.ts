import type { Workbook } from 'exceljs';
import type { IssuedRecord, Member } from '@library-circulation/core';
import { formatDisplayDate, memberStatus } from '../format/display.js';
import { createWorkbook, formatHeaderRow, autoFitColumns, formatAmountColumn, setupPrintLayout } from './utils.js';

/**
 * Read-only copy of what the report shows, taken before rendering starts.
 */
export interface ReportSnapshot {
    generatedOn: Date;
    activeIssues: ActiveIssueRow[];
    members: Member[];
}

export interface ActiveIssueRow {
    record: IssuedRecord;
    bookTitle: string;
    memberName: string;
}

export const REPORT_TITLE = 'Library Borrowing Summary & Fines';

/**
 * Generates the borrowing summary workbook: one sheet of active issues,
 * one of members and their outstanding fines.
 */
export async function generateLibraryReport(snapshot: ReportSnapshot): Promise<Workbook> {
    const workbook = await createWorkbook(snapshot.generatedOn);
    const generatedOn = formatDisplayDate(snapshot.generatedOn);

    const issues = workbook.addWorksheet('Active Issues');
    issues.columns = [
        { header: 'issue_id', key: 'issue_id' },
        { header: 'book', key: 'book' },
        { header: 'member', key: 'member' },
        { header: 'issue_date', key: 'issue_date' },
        { header: 'due_date', key: 'due_date' },
    ];

    if (snapshot.activeIssues.length === 0) {
        issues.addRow({ book: 'No active issues.' });
    }
    for (const row of snapshot.activeIssues) {
        issues.addRow({
            issue_id: row.record.issue_id,
            book: row.bookTitle,
            member: row.memberName,
            issue_date: formatDisplayDate(row.record.issue_date),
            due_date: formatDisplayDate(row.record.due_date),
        });
    }

    formatHeaderRow(issues);
    autoFitColumns(issues);
    setupPrintLayout(issues, REPORT_TITLE, generatedOn);

    const members = workbook.addWorksheet('Members & Fines');
    members.columns = [
        { header: 'member_id', key: 'member_id' },
        { header: 'name', key: 'name' },
        { header: 'phone', key: 'phone' },
        { header: 'outstanding_fine', key: 'outstanding_fine' },
        { header: 'status', key: 'status' },
    ];

    if (snapshot.members.length === 0) {
        members.addRow({ name: 'No members.' });
    }
    for (const member of snapshot.members) {
        const row = members.addRow({
            member_id: member.member_id,
            name: member.name,
            phone: member.phone,
            outstanding_fine: member.outstanding_fine,
            status: memberStatus(member),
        });
        if (member.blocked) {
            row.font = { color: { argb: 'FFC00000' } };
        }
    }

    formatHeaderRow(members);
    formatAmountColumn(members, 'outstanding_fine');
    autoFitColumns(members);
    setupPrintLayout(members, `${REPORT_TITLE} - Members`, generatedOn);

    return workbook;
}
