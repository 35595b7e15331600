/**
 * trial-watch
 *
 * Syncs clinical-trial records from the public registry, scores them for
 * editorial priority, links them to literature citations and writes digests.
 *
 * @module index
 */

export * from './models/index.js';
export * from './config/index.js';
export { extractTrialRecord, inferModality } from './services/normalize/normalizer.js';
export { parsePartialDate } from './services/normalize/dates.js';
export * from './services/scoring/index.js';
export { RegistryClient, type RegistryClientConfig, type QueryParams } from './services/registry/client.js';
export { LiteratureClient, extractDoi, type LiteratureClientConfig } from './services/literature/client.js';
export { ApiError, RegistryAPIError, LiteratureAPIError } from './services/api-errors.js';
export * from './services/storage/index.js';
export * from './services/pipeline/index.js';
export { renderDigestMarkdown, renderCsv, trialUrl } from './services/report/index.js';
export { ValidationError, validateInput } from './utils/validation.js';
export { main } from './cli.js';
