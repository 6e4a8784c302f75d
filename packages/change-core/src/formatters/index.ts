export { formatChangeSummary, formatProcessingResult } from './change-formatter.js';
export { formatCountList } from './utils.js';
