import { describe, it, expect } from 'vitest';
import { PngTreeRenderer } from '../../src/providers/PngTreeRenderer.js';
import { SvgTreeRenderer } from '../../src/providers/SvgTreeRenderer.js';
import { PhyloTree } from '../../src/tree/PhyloTree.js';

describe('PngTreeRenderer', () => {
  it('should rasterise the circular drawing to PNG', async () => {
    const tree = PhyloTree.fromNewick('((A,B)X,(C,D)Y)R;');
    const renderer = new PngTreeRenderer(new SvgTreeRenderer({ size: 200 }), 72);

    const figure = await renderer.render(tree, { highlights: [], labels: [] });

    expect(renderer.format).toBe('png');
    expect(figure.format).toBe('png');
    expect(figure.mimeType).toBe('image/png');
    expect([...figure.data.subarray(0, 8)]).toEqual([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);
  });
});
