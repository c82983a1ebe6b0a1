import { describe, it, expect } from 'vitest';
import { SvgTreeRenderer, branchColours, escapeXml } from '../../src/providers/SvgTreeRenderer.js';
import { PhyloTree } from '../../src/tree/PhyloTree.js';
import type { NodeAnnotation } from '../../src/types/models.js';

// tips A0 B1 C2 D3; internals R4 X5 Y6
const tree = PhyloTree.fromNewick('((A,B)X,(C,D)Y)R;');
const bare: NodeAnnotation = { highlights: [], labels: [] };

function count(haystack: string, needle: string): number {
  return haystack.split(needle).length - 1;
}

describe('SvgTreeRenderer', () => {
  it('should draw one branch per non-root node', () => {
    const svg = new SvgTreeRenderer().toSvg(tree, bare);
    expect(count(svg, '<path ')).toBe(tree.nodeCount - 1);
  });

  it('should size the figure from the options', () => {
    const svg = new SvgTreeRenderer({ size: 400 }).toSvg(tree, bare);
    expect(svg.split('\n')[0]).toBe(
      '<svg xmlns="http://www.w3.org/2000/svg" width="400" height="400" viewBox="-200 -200 400 400">'
    );
    expect(svg.endsWith('</svg>')).toBe(true);
  });

  it('should produce identical output for identical input', async () => {
    const renderer = new SvgTreeRenderer();
    const a = await renderer.render(tree, bare);
    const b = await renderer.render(tree, bare);
    expect(a.mimeType).toBe('image/svg+xml');
    expect(a.data.equals(b.data)).toBe(true);
  });

  it('should colour the branches of a highlighted clade', () => {
    const annotation: NodeAnnotation = {
      highlights: [{ node: 5, group: 'X', colour: '#ff0000' }],
      labels: [],
    };
    const svg = new SvgTreeRenderer().toSvg(tree, annotation);
    // X itself plus tips A and B
    expect(count(svg, 'stroke="#ff0000"')).toBe(3);
    expect(count(svg, 'stroke="#555555"')).toBe(3);
  });

  it('should draw a legend row per highlight with escaped names', () => {
    const annotation: NodeAnnotation = {
      highlights: [{ node: 6, group: 'C & D', colour: '#00aa00' }],
      labels: [],
    };
    const svg = new SvgTreeRenderer().toSvg(tree, annotation);
    expect(svg).toContain('>C &amp; D</text>');
    expect(svg).toContain('fill="#00aa00"');
  });

  it('should write tip labels and images', () => {
    const annotation: NodeAnnotation = {
      highlights: [],
      labels: [
        { node: 0, text: 'Apis <mellifera>', image: 'img/a.png' },
        { node: 3, text: 'D' },
      ],
    };
    const svg = new SvgTreeRenderer().toSvg(tree, annotation);
    expect(count(svg, '<text ')).toBe(2);
    expect(svg).toContain('>Apis &lt;mellifera&gt;</text>');
    expect(count(svg, '<image href="img/a.png"')).toBe(1);
  });

  it('should skip labels for nodes that are not tips', () => {
    const annotation: NodeAnnotation = { highlights: [], labels: [{ node: 5, text: 'X' }] };
    const svg = new SvgTreeRenderer().toSvg(tree, annotation);
    expect(count(svg, '<text ')).toBe(0);
  });
});

describe('branchColours', () => {
  it('should let nested highlights override outer ones', () => {
    const colours = branchColours(tree, {
      highlights: [
        { node: 5, group: 'X', colour: 'blue' },
        { node: 4, group: 'R', colour: 'red' },
      ],
      labels: [],
    });
    expect([0, 1, 2, 3, 4, 5, 6].map((i) => colours.get(i))).toEqual([
      'blue',
      'blue',
      'red',
      'red',
      'red',
      'blue',
      'red',
    ]);
  });

  it('should leave nodes outside every highlight uncoloured', () => {
    const colours = branchColours(tree, {
      highlights: [{ node: 6, group: 'Y', colour: 'green' }],
      labels: [],
    });
    expect([...colours.keys()].sort()).toEqual([2, 3, 6]);
  });
});

describe('escapeXml', () => {
  it('should escape markup characters', () => {
    expect(escapeXml(`<a href="x">'&'</a>`)).toBe('&lt;a href=&quot;x&quot;&gt;&apos;&amp;&apos;&lt;/a&gt;');
  });
});
