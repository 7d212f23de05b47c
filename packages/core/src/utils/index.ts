export { serializeForLog, truncateString, sanitizeHeadersForLog, sanitizeUrlForLog, errorToLog } from './logging.js';
