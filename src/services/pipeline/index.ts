export { syncRegistry, createRegistryClient } from './sync.js';
export type { SyncOptions, SyncDeps, SyncResult, TopicSyncResult } from './sync.js';
export { linkLiterature, createLiteratureClient, latestPublicationDate } from './literature.js';
export type { LiteratureOptions, LiteratureDeps, LiteratureResult } from './literature.js';
export { generateDigest, fetchDigestRows, withExtension } from './digest.js';
export type { DigestRunOptions, DigestResult } from './digest.js';
export { selectTopics, matchesTagKeywords } from './topics.js';
