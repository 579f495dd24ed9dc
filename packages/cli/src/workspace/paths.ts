import { join } from 'node:path';
import { REPORT, WORKSPACE_CONFIG_PATH } from '@library-circulation/shared';
import type { Workspace } from '../types.js';

/**
 * Constructs a Workspace object from a root path.
 */
export function resolveWorkspace(root: string): Workspace {
    return {
        root,
        outputs: join(root, REPORT.OUTPUT_DIR),
        configPath: join(root, ...WORKSPACE_CONFIG_PATH),
    };
}

/**
 * Normalizes a report file name: blank means the default, and the
 * spreadsheet extension is appended when missing.
 */
export function normalizeReportName(filename: string): string {
    const name = filename.trim();
    if (name === '') return REPORT.DEFAULT_FILENAME;
    return name.toLowerCase().endsWith(REPORT.EXTENSION) ? name : `${name}${REPORT.EXTENSION}`;
}

export function getReportPath(workspace: Workspace, filename: string): string {
    return join(workspace.outputs, normalizeReportName(filename));
}
