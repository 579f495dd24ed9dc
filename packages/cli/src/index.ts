#!/usr/bin/env node
/**
 * Library Circulation CLI
 *
 * The headless core owns every rule; this package only does I/O:
 * - reads config/library.yaml (node:fs + yaml)
 * - drives the interactive menu over stdin/stdout
 * - writes spreadsheet reports to outputs/
 */

import { createLibrary, type CirculationConfig } from '@library-circulation/core';
import { parseCliArgs, USAGE } from './args.js';
import { detectWorkspaceRoot } from './workspace/detect.js';
import { resolveWorkspace } from './workspace/paths.js';
import { loadCirculationConfig } from './workspace/config.js';
import { createPrompter } from './utils/prompt.js';
import { arrow, error, log } from './utils/console.js';
import { runMenu } from './menu/menu.js';

async function main(): Promise<void> {
    const parsed = parseCliArgs(process.argv.slice(2));
    if (!parsed.ok) {
        error(parsed.message);
        console.error(USAGE);
        process.exit(1);
    }
    if (parsed.options.help) {
        log(USAGE);
        process.exit(0);
    }

    const root = parsed.options.workspace ?? detectWorkspaceRoot() ?? process.cwd();
    const workspace = resolveWorkspace(root);

    let config: CirculationConfig;
    try {
        config = loadCirculationConfig(workspace);
    } catch (err) {
        error(`Error: ${err instanceof Error ? err.message : String(err)}`);
        process.exit(1);
    }

    arrow(`Workspace: ${workspace.root}`);
    arrow(`Fine per day: ${config.fine_per_day} | Fine limit: ${config.max_fine_limit} | Issue period: ${config.issue_days} days`);

    const library = createLibrary(config);
    const prompter = createPrompter();
    try {
        await runMenu(
            { library, prompter, workspace, now: () => new Date() },
            { pause: process.stdin.isTTY === true }
        );
    } finally {
        prompter.close();
    }
}

main().catch((err: unknown) => {
    console.error('Unexpected error:', err instanceof Error ? err.message : err);
    process.exit(1);
});
