/**
 * Trial Watch - Data Models
 *
 * Barrel export for all model interfaces.
 */

// Raw registry documents
export * from './study.js';

// Canonical trial records
export * from './trial.js';

// Scores
export * from './score.js';

// Literature citations
export * from './citation.js';
