import type { LabelFormat } from '../types/models.js';

export interface InducedSubtree {
  newick: string;
  /**
   * Requested taxa with no node of their own in the reference tree, keyed
   * `ott<id>`, each mapped to the node that stands in for it.
   */
  broken: Record<string, string>;
}

/**
 * Induced subtree extraction from a reference tree.
 * Resolves to the Newick text of the minimal tree connecting `ottIds`, with
 * non-branching internal nodes kept and labelled per `labelFormat`.
 */
export interface ISubtreeProvider {
  inducedSubtree(ottIds: number[], labelFormat: LabelFormat): Promise<InducedSubtree>;
}
