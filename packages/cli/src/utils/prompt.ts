import { createInterface } from 'node:readline';
import type { Prompter } from '../types.js';
import { log } from './console.js';

/**
 * Prompter over a readline interface (stdin/stdout by default).
 * Once the input stream ends, every pending and later question resolves null.
 */
export function createPrompter(
    input: NodeJS.ReadableStream = process.stdin,
    output: NodeJS.WritableStream = process.stdout
): Prompter {
    const rl = createInterface({ input, output });
    let closed = false;
    rl.on('close', () => {
        closed = true;
    });

    return {
        ask(question: string): Promise<string | null> {
            if (closed) return Promise.resolve(null);

            return new Promise((resolve) => {
                const onClose = (): void => resolve(null);
                rl.once('close', onClose);
                rl.question(question, (answer) => {
                    rl.off('close', onClose);
                    resolve(answer);
                });
            });
        },
        close(): void {
            rl.close();
        },
    };
}

/**
 * Ask for free text. Closed input reads as an empty answer.
 */
export async function askText(prompter: Prompter, question: string): Promise<string> {
    const answer = await prompter.ask(question);
    return (answer ?? '').trim();
}

/**
 * Ask until the answer is a whole number >= minimum.
 * Resolves null if input closes first.
 */
export async function askInt(prompter: Prompter, question: string, minimum = 0): Promise<number | null> {
    while (true) {
        const answer = await prompter.ask(question);
        if (answer === null) return null;

        const trimmed = answer.trim();
        if (!/^-?\d+$/.test(trimmed)) {
            log('Please enter a valid integer.');
            continue;
        }
        const value = parseInt(trimmed, 10);
        if (value < minimum) {
            log(`Value must be >= ${minimum}`);
            continue;
        }
        return value;
    }
}

/**
 * Wait for ENTER before redrawing the menu.
 */
export async function pause(prompter: Prompter): Promise<void> {
    await prompter.ask('\nPress ENTER to continue...');
}
