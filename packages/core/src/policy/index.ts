/**
 * Policy module: due dates, late days, fines and the blocking law.
 */

export { dueDateFor, lateDays, fineFor, isOverLimit } from './fine-policy.js';
