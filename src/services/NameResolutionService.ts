/**
 * Resolves observed taxon names to Open Tree taxa.
 * Names are deduplicated per context and sent in chunks; only confident
 * matches present in the synthetic tree are kept. Everything else is
 * dropped and shows up only as a count in the log.
 */

import { DEFAULTS } from '../config.js';
import { ServiceUnavailableError, errorMessage } from '../errors.js';
import type { INameResolver } from '../providers/INameResolver.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { NameMatch, ResolvedTaxon, TaggedRecord } from '../types/models.js';

export interface ResolutionResult {
  taxa: ResolvedTaxon[];
  /** Distinct (context, name) pairs submitted. */
  requested: number;
  /** Names with no qualifying match. */
  unresolved: string[];
  /** Resolver calls that failed; their names count as unresolved. */
  failedCalls: number;
}

export class NameResolutionService {
  private readonly minScore: number;
  private readonly chunkSize: number;

  constructor(
    private readonly resolver: INameResolver,
    private readonly logger: ILogProvider,
    opts?: { minScore?: number; chunkSize?: number }
  ) {
    this.minScore = opts?.minScore ?? DEFAULTS.resolution.minScore;
    this.chunkSize = opts?.chunkSize ?? DEFAULTS.resolution.chunkSize;
  }

  async resolve(records: readonly TaggedRecord[]): Promise<ResolutionResult> {
    const byContext = groupNamesByContext(records);
    const taxa: ResolvedTaxon[] = [];
    const unresolved: string[] = [];
    let requested = 0;
    let calls = 0;
    let failedCalls = 0;

    for (const [context, names] of byContext) {
      requested += names.length;

      for (const chunk of chunks(names, this.chunkSize)) {
        calls++;
        try {
          const resolutions = await this.resolver.matchNames(chunk, context);
          for (const { searchName, matches } of resolutions) {
            const best = this.bestMatch(matches);
            if (best) {
              taxa.push({
                searchName,
                matchedName: best.matchedName,
                ottId: best.ottId,
                score: best.score,
                context,
              });
            } else {
              unresolved.push(searchName);
            }
          }
        } catch (err) {
          failedCalls++;
          unresolved.push(...chunk);
          this.logger.warn('Name resolution call failed', {
            context,
            names: chunk.length,
            error: errorMessage(err),
          });
        }
      }
    }

    if (calls > 0 && failedCalls === calls) {
      throw new ServiceUnavailableError('Open Tree TNRS', 'every name resolution call failed', {
        calls,
      });
    }

    this.logger.info('Names resolved', {
      requested,
      resolved: taxa.length,
      dropped: requested - taxa.length,
    });

    return { taxa, requested, unresolved, failedCalls };
  }

  /** Highest-scoring match above the threshold that is in the tree; first wins ties. */
  bestMatch(matches: readonly NameMatch[]): NameMatch | null {
    let best: NameMatch | null = null;
    for (const m of matches) {
      if (m.score <= this.minScore || !m.inSynthesisTree) continue;
      if (!best || m.score > best.score) best = m;
    }
    return best;
  }
}

/** Distinct names per context, in order of first appearance. */
export function groupNamesByContext(records: readonly TaggedRecord[]): Map<string, string[]> {
  const seen = new Map<string, Set<string>>();
  for (const r of records) {
    let names = seen.get(r.context);
    if (!names) {
      names = new Set();
      seen.set(r.context, names);
    }
    names.add(r.taxonName);
  }
  return new Map([...seen].map(([context, names]) => [context, [...names]]));
}

function chunks<T>(items: readonly T[], size: number): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    out.push(items.slice(i, i + size));
  }
  return out;
}
