import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { Library } from '@library-circulation/core';
import { generateLibraryReport, type ReportSnapshot } from '../excel/report.js';
import { getReportPath } from '../workspace/paths.js';
import type { Workspace } from '../types.js';

export type ExportResult =
    | { status: 'saved'; path: string }
    | { status: 'unavailable'; reason: string };

/**
 * Copies what the report needs out of the library. Unknown books and
 * members fall back to their ids.
 */
export function takeReportSnapshot(library: Library, generatedOn: Date): ReportSnapshot {
    const { catalog, roster, ledger } = library;

    return {
        generatedOn,
        activeIssues: ledger.activeIssues().map(record => ({
            record,
            bookTitle: catalog.has(record.book_id) ? catalog.find(record.book_id).title : record.book_id,
            memberName: roster.has(record.member_id) ? roster.find(record.member_id).name : record.member_id,
        })),
        members: roster.all(),
    };
}

/**
 * Renders and saves the report under the workspace outputs directory.
 * Never throws: any rendering or write failure comes back as 'unavailable',
 * and the library is only read.
 */
export async function exportReport(
    library: Library,
    workspace: Workspace,
    filename: string,
    now: Date
): Promise<ExportResult> {
    const path = getReportPath(workspace, filename);
    const snapshot = takeReportSnapshot(library, now);

    try {
        const workbook = await generateLibraryReport(snapshot);
        await mkdir(dirname(path), { recursive: true });
        await workbook.xlsx.writeFile(path);
        return { status: 'saved', path };
    } catch (err) {
        return { status: 'unavailable', reason: err instanceof Error ? err.message : String(err) };
    }
}
