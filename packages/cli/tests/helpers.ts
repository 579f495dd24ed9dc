import { vi } from 'vitest';
import { createLibrary, type Library } from '@library-circulation/core';
import type { MenuContext, Prompter } from '../src/types.js';
import { resolveWorkspace } from '../src/workspace/paths.js';

/**
 * Prompter that answers from a fixed script, then reports closed input.
 */
export function scriptedPrompter(answers: string[]): Prompter & { questions: string[] } {
    const queue = [...answers];
    const questions: string[] = [];
    return {
        questions,
        ask(question: string): Promise<string | null> {
            questions.push(question);
            return Promise.resolve(queue.shift() ?? null);
        },
        close(): void {},
    };
}

/**
 * Day N of the test calendar, at 10:00 UTC.
 */
export function day(n: number): Date {
    return new Date(2026, 0, 1 + n, 10);
}

export function makeContext(answers: string[], library: Library = createLibrary(), now: () => Date = () => day(0)): MenuContext {
    return {
        library,
        prompter: scriptedPrompter(answers),
        workspace: resolveWorkspace('/fake/library'),
        now,
    };
}

/**
 * Silences the console and records every line printed, per stream.
 */
export function captureConsole() {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const lines = (spy: typeof logSpy): unknown[] => spy.mock.calls.map(call => call[0]);

    return {
        logs: () => lines(logSpy),
        warnings: () => lines(warnSpy),
        errors: () => lines(errorSpy),
        infos: () => lines(infoSpy),
        restore: () => vi.restoreAllMocks(),
    };
}
