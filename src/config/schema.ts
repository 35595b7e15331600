/**
 * Configuration schema
 *
 * One JSON file configures the pipeline windows, both external clients and
 * the topics to sync. Every field except `topics` has a default.
 *
 * @module config/schema
 */

import { z } from 'zod';
import { DEFAULT_KEYWORD_WEIGHT } from '../services/scoring/interesting.js';

export const PipelineConfigSchema = z
  .object({
    /** Upcoming window: 0..N days to primary completion */
    readoutWindowDays: z.number().int().min(0).default(180),
    /** Recently completed window: -N..-1 days */
    recentlyCompletedDays: z.number().int().min(0).default(120),
    maxPagesPerTopic: z.number().int().min(1).default(10),
    pageSize: z.number().int().min(1).max(1000).default(200),
    registrySleepSeconds: z.number().min(0).default(0.25),
    exportCsv: z.boolean().default(true),
    storeRawJson: z.boolean().default(false),
  })
  .strict();

export const LiteratureConfigSchema = z
  .object({
    enabled: z.boolean().default(true),
    tool: z.string().min(1).default('trial-watch'),
    email: z.string().default(''),
    apiKey: z.string().min(1).optional(),
    sleepSeconds: z.number().min(0).default(0.4),
    /** Only link trials inside the actionable windows */
    actionableOnly: z.boolean().default(true),
    maxTrialsPerRun: z.number().int().min(1).default(200),
    retmax: z.number().int().min(1).max(10000).default(200),
  })
  .strict();

export const RegistryConfigSchema = z
  .object({
    baseUrl: z.string().url().default('https://clinicaltrials.gov/api/v2'),
    timeoutSeconds: z.number().positive().default(30),
    userAgent: z.string().min(1).default('trial-watch/0.1'),
  })
  .strict();

const InterestKeywordSchema = z.union([
  z.string().min(1).transform((keyword) => ({ keyword, weight: DEFAULT_KEYWORD_WEIGHT })),
  z
    .object({
      keyword: z.string().min(1),
      weight: z.number().int().default(DEFAULT_KEYWORD_WEIGHT),
    })
    .strict(),
]);

export const TopicConfigSchema = z
  .object({
    name: z.string().trim().min(1, 'topic name is required'),
    /** Registry search parameters, passed through as query string values */
    registryParams: z.record(z.union([z.string(), z.number(), z.boolean()])).default({}),
    tagKeywords: z.array(z.string()).default([]),
    interestingKeywords: z.array(InterestKeywordSchema).default([]),
  })
  .strict();

export const TrialWatchConfigSchema = z
  .object({
    pipeline: PipelineConfigSchema.default({}),
    literature: LiteratureConfigSchema.default({}),
    registry: RegistryConfigSchema.default({}),
    topics: z
      .array(TopicConfigSchema)
      .min(1, 'config must define at least one topic')
      .refine((topics) => new Set(topics.map((t) => t.name)).size === topics.length, {
        message: 'topic names must be unique',
      }),
  })
  .strict();

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type LiteratureConfig = z.infer<typeof LiteratureConfigSchema>;
export type RegistryConfig = z.infer<typeof RegistryConfigSchema>;
export type TopicConfig = z.infer<typeof TopicConfigSchema>;
export type TrialWatchConfig = z.infer<typeof TrialWatchConfigSchema>;
export type TrialWatchConfigInput = z.input<typeof TrialWatchConfigSchema>;
