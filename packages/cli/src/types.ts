/**
 * Library Circulation CLI - Core Types
 */

import type { Library } from '@library-circulation/core';

export interface CliOptions {
    help: boolean;
    workspace?: string;
}

export interface Workspace {
    root: string;
    outputs: string;
    configPath: string;
}

/**
 * Line-oriented input. `ask` resolves null once input has closed.
 */
export interface Prompter {
    ask(question: string): Promise<string | null>;
    close(): void;
}

/**
 * Everything a menu action needs. The clock is injected so actions
 * never read the system time themselves.
 */
export interface MenuContext {
    library: Library;
    prompter: Prompter;
    workspace: Workspace;
    now: () => Date;
}

export interface MenuOptions {
    /** Wait for ENTER after each action (interactive terminals only). */
    pause: boolean;
}

export type MenuAction = (ctx: MenuContext) => Promise<void>;
