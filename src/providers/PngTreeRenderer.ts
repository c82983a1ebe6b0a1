/**
 * Raster version of the circular figure: the SVG drawing rasterised by sharp.
 */

import sharp from 'sharp';
import type { PhyloTree } from '../tree/PhyloTree.js';
import type { NodeAnnotation, RenderedFigure } from '../types/models.js';
import type { ITreeRenderer } from './ITreeRenderer.js';
import { SvgTreeRenderer } from './SvgTreeRenderer.js';

export class PngTreeRenderer implements ITreeRenderer {
  readonly format = 'png' as const;

  constructor(
    private readonly svg: SvgTreeRenderer = new SvgTreeRenderer(),
    /** Rasterisation density in DPI; 72 keeps one SVG unit per pixel. */
    private readonly density = 144
  ) {}

  async render(tree: PhyloTree, annotation: NodeAnnotation): Promise<RenderedFigure> {
    const vector = await this.svg.render(tree, annotation);
    const data = await sharp(vector.data, { density: this.density }).png().toBuffer();
    return { format: 'png', mimeType: 'image/png', data };
  }
}
