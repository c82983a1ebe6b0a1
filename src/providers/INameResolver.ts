import type { NameResolution } from '../types/models.js';

/**
 * Taxonomic name resolution against a reference taxonomy.
 * Returns one entry per input name, in input order; a name with no
 * candidates has an empty `matches` array.
 */
export interface INameResolver {
  matchNames(names: string[], context: string): Promise<NameResolution[]>;
}
