/**
 * Pipeline configuration.
 * Defaults live in DEFAULTS; callers pass a partial object which is merged
 * and validated by PipelineConfigSchema. Nothing is read from the environment.
 */

import { z } from 'zod';
import { InvalidArgumentError } from './errors.js';

export const INAT_API_URL = 'https://api.inaturalist.org/v1';
export const OPEN_TREE_API_URL = 'https://api.opentreeoflife.org/v3';

export const DEFAULTS = {
  retrieval: {
    baseUrl: INAT_API_URL,
    /** Largest page the observation search serves. */
    perPage: 200,
    /** 50 × 200 = 10,000 results, the provider's recommended ceiling. */
    maxRequests: 50,
    /** The provider asks for at most 1 req/s; we stay at half of that. */
    requestsPerSecond: 0.5,
    timeoutMs: 30_000,
    maxRetries: 0,
    retryBackoffMs: 5_000,
    pageFailure: 'warn',
    strict: true,
  },
  resolution: {
    baseUrl: OPEN_TREE_API_URL,
    /** Matches must score strictly above this. */
    minScore: 0.9,
    /** TNRS rejects requests with more names than this. */
    chunkSize: 250,
    timeoutMs: 60_000,
  },
  subtree: {
    baseUrl: OPEN_TREE_API_URL,
    labelFormat: 'name_and_id',
    treeFile: 'output/tree.tre',
    collapseSingles: false,
    timeoutMs: 120_000,
  },
  render: {
    outDir: 'output',
    name: 'tree',
    size: 1200,
    formats: ['svg', 'png'],
    showTipLabels: true,
    stripOttIds: true,
    highlights: {},
  },
} as const;

const PageFailurePolicySchema = z.enum(['silent', 'warn']);

export const RetrievalConfigSchema = z.object({
  baseUrl: z.string().url().default(DEFAULTS.retrieval.baseUrl),
  perPage: z.number().int().min(1).max(200).default(DEFAULTS.retrieval.perPage),
  maxRequests: z.number().int().positive().default(DEFAULTS.retrieval.maxRequests),
  requestsPerSecond: z.number().positive().default(DEFAULTS.retrieval.requestsPerSecond),
  timeoutMs: z.number().int().positive().default(DEFAULTS.retrieval.timeoutMs),
  maxRetries: z.number().int().nonnegative().default(DEFAULTS.retrieval.maxRetries),
  retryBackoffMs: z.number().int().nonnegative().default(DEFAULTS.retrieval.retryBackoffMs),
  pageFailure: PageFailurePolicySchema.default(DEFAULTS.retrieval.pageFailure),
  /** Throw when every request failed instead of returning an empty table. */
  strict: z.boolean().default(DEFAULTS.retrieval.strict),
});

export const ResolutionConfigSchema = z.object({
  baseUrl: z.string().url().default(DEFAULTS.resolution.baseUrl),
  minScore: z.number().min(0).max(1).default(DEFAULTS.resolution.minScore),
  chunkSize: z.number().int().positive().default(DEFAULTS.resolution.chunkSize),
  timeoutMs: z.number().int().positive().default(DEFAULTS.resolution.timeoutMs),
});

export const SubtreeConfigSchema = z.object({
  baseUrl: z.string().url().default(DEFAULTS.subtree.baseUrl),
  labelFormat: z.enum(['name', 'id', 'name_and_id']).default(DEFAULTS.subtree.labelFormat),
  treeFile: z.string().min(1).default(DEFAULTS.subtree.treeFile),
  /** Drop unary internal nodes (and their labels) after parsing. */
  collapseSingles: z.boolean().default(DEFAULTS.subtree.collapseSingles),
  timeoutMs: z.number().int().positive().default(DEFAULTS.subtree.timeoutMs),
});

export const RenderConfigSchema = z.object({
  outDir: z.string().min(1).default(DEFAULTS.render.outDir),
  name: z.string().min(1).default(DEFAULTS.render.name),
  size: z.number().int().min(200).default(DEFAULTS.render.size),
  formats: z
    .array(z.enum(['svg', 'png']))
    .min(1)
    .default(() => [...DEFAULTS.render.formats]),
  showTipLabels: z.boolean().default(DEFAULTS.render.showTipLabels),
  stripOttIds: z.boolean().default(DEFAULTS.render.stripOttIds),
  /** Clade label → CSS colour. */
  highlights: z.record(z.string()).default(() => ({ ...DEFAULTS.render.highlights })),
  /** Tip label → image href drawn beside the tip. */
  images: z.record(z.string()).default(() => ({})),
});

export const PipelineConfigSchema = z.object({
  retrieval: RetrievalConfigSchema.default({}),
  resolution: ResolutionConfigSchema.default({}),
  subtree: SubtreeConfigSchema.default({}),
  render: RenderConfigSchema.default({}),
});

export type PageFailurePolicy = z.infer<typeof PageFailurePolicySchema>;
export type RetrievalConfig = z.infer<typeof RetrievalConfigSchema>;
export type ResolutionConfig = z.infer<typeof ResolutionConfigSchema>;
export type SubtreeConfig = z.infer<typeof SubtreeConfigSchema>;
export type RenderConfig = z.infer<typeof RenderConfigSchema>;
export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>;

/** Merge `input` over DEFAULTS and validate it. */
export function loadConfig(input: PipelineConfigInput = {}): PipelineConfig {
  const parsed = PipelineConfigSchema.safeParse(input);
  if (!parsed.success) {
    const fields = parsed.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`
    );
    throw new InvalidArgumentError(`Invalid configuration: ${fields.join('; ')}`, { fields });
  }
  return parsed.data;
}

/** Minimum wait between two requests for a requests-per-second ceiling. */
export function minIntervalMs(requestsPerSecond: number): number {
  return Math.ceil(1000 / requestsPerSecond);
}
