/**
 * Builds rendering directives for a tree: which clades to colour and what
 * text (and image) goes beside each tip. Clades are looked up by label
 * through the unified node index; labels not in the tree are reported and
 * skipped.
 */

import { DEFAULTS } from '../config.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import { displayLabel, isMrcaLabel } from '../tree/labels.js';
import type { PhyloTree } from '../tree/PhyloTree.js';
import type { HighlightDirective, LabelDirective, NodeAnnotation } from '../types/models.js';

export interface AnnotationOptions {
  /** Clade label → colour. */
  highlights?: Record<string, string>;
  /** Tip label (raw or display form) → image href. */
  images?: Record<string, string>;
  showTipLabels?: boolean;
  stripOttIds?: boolean;
}

export interface AnnotationResult {
  annotation: NodeAnnotation;
  /** Highlight labels that matched no node. */
  missing: string[];
}

export class AnnotationService {
  private readonly highlights: Record<string, string>;
  private readonly images: Record<string, string>;
  private readonly showTipLabels: boolean;
  private readonly stripOttIds: boolean;

  constructor(
    private readonly logger: ILogProvider,
    opts?: AnnotationOptions
  ) {
    this.highlights = opts?.highlights ?? {};
    this.images = opts?.images ?? {};
    this.showTipLabels = opts?.showTipLabels ?? DEFAULTS.render.showTipLabels;
    this.stripOttIds = opts?.stripOttIds ?? DEFAULTS.render.stripOttIds;
  }

  annotate(tree: PhyloTree): AnnotationResult {
    const highlights: HighlightDirective[] = [];
    const missing: string[] = [];

    for (const [group, colour] of Object.entries(this.highlights)) {
      const node = tree.tryFindNodeIndex(group);
      if (node === null) {
        missing.push(group);
        continue;
      }
      highlights.push({ node, group, colour });
    }

    if (missing.length > 0) {
      this.logger.warn('Highlighted clades not found in tree', { missing });
    }

    const labels: LabelDirective[] = [];
    if (this.showTipLabels) {
      tree.tipLabels.forEach((raw, node) => {
        // stand-ins for broken taxa carry no name
        if (isMrcaLabel(raw)) return;
        const text = this.stripOttIds ? displayLabel(raw) : raw;
        const image = this.images[raw] ?? this.images[displayLabel(raw)];
        labels.push(image ? { node, text, image } : { node, text });
      });
    }

    return { annotation: { highlights, labels }, missing };
  }
}
