import { describe, it, expect, afterEach, vi } from 'vitest';
import { PassThrough } from 'node:stream';
import { askInt, askText, createPrompter } from '../src/utils/prompt.js';
import { captureConsole, scriptedPrompter } from './helpers.js';

describe('askInt', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('re-asks until it gets a whole number at or above the minimum', async () => {
        const output = captureConsole();
        const prompter = scriptedPrompter(['abc', '0', '2.5', '3']);

        await expect(askInt(prompter, 'Copies: ', 1)).resolves.toBe(3);
        expect(prompter.questions).toHaveLength(4);
        expect(output.logs()).toEqual([
            'Please enter a valid integer.',
            'Value must be >= 1',
            'Please enter a valid integer.',
        ]);
    });

    it('resolves null when input closes', async () => {
        await expect(askInt(scriptedPrompter([]), 'Copies: ')).resolves.toBeNull();
    });
});

describe('askText', () => {
    it('trims and treats closed input as blank', async () => {
        await expect(askText(scriptedPrompter(['  B1  ']), 'Id: ')).resolves.toBe('B1');
        await expect(askText(scriptedPrompter([]), 'Id: ')).resolves.toBe('');
    });
});

describe('createPrompter', () => {
    it('answers from the input stream, then null once it ends', async () => {
        const input = new PassThrough();
        const output = new PassThrough();
        const prompter = createPrompter(input, output);

        const first = prompter.ask('Choice: ');
        input.write('8\n');
        await expect(first).resolves.toBe('8');

        const second = prompter.ask('Choice: ');
        input.end();
        await expect(second).resolves.toBeNull();
        await expect(prompter.ask('Choice: ')).resolves.toBeNull();
    });
});
