/**
 * Induced subtree extraction.
 * The Newick text is written to disk and the tree is parsed back from the
 * file, which keeps non-branching internal nodes and their clade labels.
 * `collapseSingles` reproduces the simplified form and drops those labels.
 */

import { DEFAULTS } from '../config.js';
import { InvalidArgumentError, ServiceUnavailableError, errorMessage } from '../errors.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { InducedSubtree, ISubtreeProvider } from '../providers/ISubtreeProvider.js';
import { PhyloTree, collapseSingles } from '../tree/PhyloTree.js';
import { readNewickFile, writeNewickFile } from '../tree/io.js';
import { ottIdOf } from '../tree/labels.js';
import type { LabelFormat, ResolvedTaxon } from '../types/models.js';

export interface SubtreeServiceOptions {
  labelFormat?: LabelFormat;
  treeFile?: string;
  collapseSingles?: boolean;
}

export interface SubtreeResult {
  tree: PhyloTree;
  ottIds: number[];
  /** Requested ott ids the reference tree has no node for; they are not tips. */
  broken: number[];
  /** Path the Newick text was persisted to. */
  file: string;
}

export class SubtreeService {
  private readonly labelFormat: LabelFormat;
  private readonly treeFile: string;
  private readonly collapse: boolean;

  constructor(
    private readonly provider: ISubtreeProvider,
    private readonly logger: ILogProvider,
    opts?: SubtreeServiceOptions
  ) {
    this.labelFormat = opts?.labelFormat ?? DEFAULTS.subtree.labelFormat;
    this.treeFile = opts?.treeFile ?? DEFAULTS.subtree.treeFile;
    this.collapse = opts?.collapseSingles ?? DEFAULTS.subtree.collapseSingles;
  }

  async extract(taxa: readonly ResolvedTaxon[]): Promise<SubtreeResult> {
    const ottIds = [...new Set(taxa.map((t) => t.ottId))];
    if (ottIds.length < 2) {
      throw new InvalidArgumentError('An induced subtree needs at least two distinct taxa', {
        taxa: ottIds.length,
      });
    }

    let subtree: InducedSubtree;
    try {
      subtree = await this.provider.inducedSubtree(ottIds, this.labelFormat);
    } catch (err) {
      throw new ServiceUnavailableError('Open Tree synthetic tree', errorMessage(err), {
        taxa: ottIds.length,
      });
    }

    const broken = brokenOttIds(subtree.broken);
    if (broken.length > 0) {
      this.logger.warn('Taxa without their own node in the synthetic tree were dropped', {
        dropped: broken.length,
        ottIds: broken,
      });
    }

    await writeNewickFile(this.treeFile, subtree.newick);
    let tree = await readNewickFile(this.treeFile);

    if (this.collapse) {
      const before = tree.nodeLabels.filter((l) => l !== '').length;
      tree = new PhyloTree(collapseSingles(tree.root));
      const lost = before - tree.nodeLabels.filter((l) => l !== '').length;
      this.logger.warn('Collapsed single-child nodes; their clade labels are gone', { lost });
    }

    this.logger.info('Induced subtree extracted', {
      requested: ottIds.length,
      broken: broken.length,
      tips: tree.tipCount,
      internalNodes: tree.internalCount,
      file: this.treeFile,
    });

    return { tree, ottIds, broken, file: this.treeFile };
  }
}

function brokenOttIds(broken: Record<string, string>): number[] {
  const ids: number[] = [];
  for (const key of Object.keys(broken)) {
    const id = ottIdOf(key);
    if (id !== null) ids.push(id);
  }
  return ids;
}
