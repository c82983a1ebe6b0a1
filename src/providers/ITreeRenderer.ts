import type { PhyloTree } from '../tree/PhyloTree.js';
import type { NodeAnnotation, RenderedFigure } from '../types/models.js';

/**
 * Draws an annotated tree. Presentation only: the same tree and annotation
 * always give byte-identical output.
 */
export interface ITreeRenderer {
  readonly format: RenderedFigure['format'];
  render(tree: PhyloTree, annotation: NodeAnnotation): Promise<RenderedFigure>;
}
