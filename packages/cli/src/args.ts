import type { CliOptions } from './types.js';

export type ParsedArgs =
    | { ok: true; options: CliOptions }
    | { ok: false; message: string };

/**
 * Parses `[--workspace <dir>] [--help]`.
 */
export function parseCliArgs(args: string[]): ParsedArgs {
    const options: CliOptions = { help: false };

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (arg === '--help' || arg === '-h') {
            options.help = true;
        } else if (arg === '--workspace' || arg === '-w') {
            const value = args[i + 1];
            if (value === undefined || value.startsWith('-')) {
                return { ok: false, message: `${arg} requires a directory` };
            }
            options.workspace = value;
            i++;
        } else {
            return { ok: false, message: `Unknown argument: ${arg}` };
        }
    }

    return { ok: true, options };
}

export const USAGE = [
    'Library Circulation CLI v1.0.0',
    '',
    'Usage: libcirc [--workspace <dir>]',
    '',
    'Options:',
    '  -w, --workspace <dir>  Workspace root (default: nearest directory with config/library.yaml)',
    '  -h, --help             Show this help',
].join('\n');
