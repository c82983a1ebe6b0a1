/**
 * Open Tree of Life TNRS (POST /v3/tnrs/match_names).
 * Exact matching only; approximate matches would let misspellings in
 * observation data resolve to unrelated taxa.
 */

import { DEFAULTS } from '../config.js';
import { TnrsResponseSchema, type TnrsMatch } from '../types/api.js';
import type { NameMatch, NameResolution } from '../types/models.js';
import type { INameResolver } from './INameResolver.js';
import { requestJson } from './http.js';

const SERVICE = 'Open Tree TNRS';

export class OpenTreeNameResolver implements INameResolver {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(opts?: { baseUrl?: string; timeoutMs?: number }) {
    this.baseUrl = (opts?.baseUrl ?? DEFAULTS.resolution.baseUrl).replace(/\/+$/, '');
    this.timeoutMs = opts?.timeoutMs ?? DEFAULTS.resolution.timeoutMs;
  }

  async matchNames(names: string[], context: string): Promise<NameResolution[]> {
    if (names.length === 0) return [];

    const { data } = await requestJson(
      {
        service: SERVICE,
        url: `${this.baseUrl}/tnrs/match_names`,
        method: 'POST',
        body: {
          names,
          context_name: context,
          do_approximate_matching: false,
        },
        timeoutMs: this.timeoutMs,
      },
      TnrsResponseSchema
    );

    // TNRS echoes the submitted name in `name`; results may come back in any order.
    const byName = new Map(data.results.map((r) => [r.name, r.matches.map(toNameMatch)]));

    return names.map((searchName) => ({
      searchName,
      matches: byName.get(searchName) ?? [],
    }));
  }
}

export function toNameMatch(match: TnrsMatch): NameMatch {
  return {
    matchedName: match.taxon.name,
    ottId: match.taxon.ott_id,
    score: match.score,
    inSynthesisTree: !(match.taxon.is_suppressed_from_synth ?? false),
  };
}
