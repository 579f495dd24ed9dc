/**
 * Composition root: one isolated set of stores sharing a frozen configuration.
 */

import { Catalog } from './catalog/catalog.js';
import { Roster } from './roster/roster.js';
import { CirculationLedger } from './circulation/ledger.js';
import { InvalidArgumentError } from './errors.js';
import { describeIssues } from './utils/validation.js';
import { CirculationConfigSchema } from './types/index.js';
import type { CirculationConfig, CirculationConfigInput } from './types/index.js';

export interface Library {
    config: Readonly<CirculationConfig>;
    catalog: Catalog;
    roster: Roster;
    ledger: CirculationLedger;
}

/**
 * Build a fresh library. Missing configuration keys take the defaults.
 *
 * @throws {InvalidArgumentError} The configuration fails validation.
 */
export function createLibrary(config: CirculationConfigInput = {}): Library {
    const parsed = CirculationConfigSchema.safeParse(config);
    if (!parsed.success) {
        throw new InvalidArgumentError(`Invalid configuration: ${describeIssues(parsed.error)}`);
    }
    const frozen = Object.freeze(parsed.data);

    const catalog = new Catalog();
    const roster = new Roster(frozen);
    const ledger = new CirculationLedger(catalog, roster, frozen);

    return { config: frozen, catalog, roster, ledger };
}
