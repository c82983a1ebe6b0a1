/**
 * External API payload schemas.
 * Only the fields the pipeline reads are declared; zod strips the rest, so
 * a provider adding fields is harmless while one renaming or retyping a
 * field we rely on fails validation instead of producing silent nulls.
 */

import { z } from 'zod';

// ── iNaturalist: GET /v1/observations ──

export const InatTaxonSchema = z.object({
  id: z.number().int(),
  name: z.string().min(1),
  iconic_taxon_name: z.string().nullish(),
  iconic_taxon_id: z.number().int().nullish(),
});

export const InatObservationSchema = z.object({
  id: z.number().int().optional(),
  /** Null or missing for observations nobody has identified yet. */
  taxon: InatTaxonSchema.nullish(),
});

export const InatObservationPageSchema = z.object({
  total_results: z.number().int().nonnegative(),
  page: z.number().int().positive().optional(),
  per_page: z.number().int().positive(),
  results: z.array(InatObservationSchema),
});

export type InatTaxon = z.infer<typeof InatTaxonSchema>;
export type InatObservation = z.infer<typeof InatObservationSchema>;
export type InatObservationPage = z.infer<typeof InatObservationPageSchema>;

// ── Open Tree of Life: POST /v3/tnrs/match_names ──

export const TnrsMatchSchema = z.object({
  score: z.number(),
  matched_name: z.string(),
  is_approximate_match: z.boolean().optional(),
  is_synonym: z.boolean().optional(),
  taxon: z.object({
    ott_id: z.number().int(),
    name: z.string(),
    unique_name: z.string().optional(),
    is_suppressed_from_synth: z.boolean().optional(),
    flags: z.array(z.string()).optional(),
  }),
});

export const TnrsResponseSchema = z.object({
  context: z.string().optional(),
  results: z.array(
    z.object({
      name: z.string(),
      matches: z.array(TnrsMatchSchema),
    })
  ),
  unmatched_names: z.array(z.string()).default([]),
});

export type TnrsMatch = z.infer<typeof TnrsMatchSchema>;
export type TnrsResponse = z.infer<typeof TnrsResponseSchema>;

// ── Open Tree of Life: POST /v3/tree_of_life/induced_subtree ──

export const InducedSubtreeResponseSchema = z.object({
  newick: z.string().min(1),
  broken: z.record(z.string()).optional(),
});

export type InducedSubtreeResponse = z.infer<typeof InducedSubtreeResponseSchema>;

/** Shape of the error body both APIs return on 4xx. */
export const ApiErrorBodySchema = z
  .object({
    message: z.string().optional(),
    error: z.string().optional(),
  })
  .passthrough();
