export { calendarDaysBetween, addDays, isValidDate } from './calendar.js';
export { describeIssues } from './validation.js';
