export { tokenize, MAX_LINE_LENGTH } from './tokenizer.js';
export type { ArgToken, TokenizedLine } from './tokenizer.js';
export {
  parseDueDate,
  formatDueDate,
  formatTimestamp,
  toEpochSeconds,
  isLeapYear,
  daysInMonth,
  NO_DATE,
} from './date-parser.js';
