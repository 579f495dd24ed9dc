/**
 * Catalog module: Book records and copy availability.
 */

export { Catalog } from './catalog.js';
