/**
 * Roster module: Member records, fine balances and block status.
 */

export { Roster } from './roster.js';
