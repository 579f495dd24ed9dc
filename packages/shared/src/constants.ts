/**
 * Constants for the circulation packages.
 */

/**
 * Default circulation policy.
 * Every value can be overridden from config/library.yaml at startup;
 * after that the configuration is frozen for the life of the process.
 */
export const CIRCULATION_DEFAULTS = {
    FINE_PER_DAY: 5,
    MAX_FINE_LIMIT: 500,
    ISSUE_DAYS: 14,
    DUE_SOON_WINDOW_DAYS: 2,
} as const;

/**
 * Issue ids start here and only ever increase.
 */
export const FIRST_ISSUE_ID = 1;

/**
 * Report export defaults.
 */
export const REPORT = {
    DEFAULT_FILENAME: 'library_report.xlsx',
    EXTENSION: '.xlsx',
    OUTPUT_DIR: 'outputs',
} as const;

/**
 * Workspace layout: the CLI looks upward for this file to find its root.
 */
export const WORKSPACE_CONFIG_PATH = ['config', 'library.yaml'] as const;
