export { renderDigestMarkdown, groupByTopic, UNTAGGED, MAX_TRIALS_PER_TOPIC } from './markdown.js';
export type { DigestOptions } from './markdown.js';
export { renderCsv, flattenRow, escapeCSV, PREFERRED_COLUMNS } from './csv.js';
export { trialUrl, firstContactEmail, compareForDigest, TRIAL_URL_BASE } from './format.js';
