export * from './modules/visualize/index.js';
export { parseArchiveTimestamp } from './utils/timestamp.js';
export { escapeHtml, escapeScriptString } from './utils/html.js';
export { loadConfig, type Config } from './config.js';
