import { readFileSync, existsSync } from 'node:fs';
import { parse } from 'yaml';
import { CirculationConfigSchema, type CirculationConfig } from '@library-circulation/shared';
import type { Workspace } from '../types.js';

/**
 * Loads the circulation policy (config/library.yaml).
 * A missing or empty file means the defaults.
 *
 * @throws {Error} The file is not valid YAML or fails the schema.
 */
export function loadCirculationConfig(workspace: Workspace): CirculationConfig {
    const path = workspace.configPath;
    if (!existsSync(path)) {
        return CirculationConfigSchema.parse({});
    }

    const content = readFileSync(path, 'utf-8');
    const data: unknown = parse(content);
    if (data === null || data === undefined) {
        return CirculationConfigSchema.parse({});
    }

    const result = CirculationConfigSchema.safeParse(data);
    if (!result.success) {
        const issues = result.error.issues
            .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        throw new Error(`Invalid configuration in ${path}: ${issues}`);
    }
    return result.data;
}
