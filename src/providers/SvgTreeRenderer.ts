/**
 * Circular cladogram as SVG.
 * Layout comes from d3-hierarchy's cluster layout mapped onto polar
 * coordinates: angle in [0, 2π) clockwise from 12 o'clock, tips on the
 * outer ring. Branches are drawn as an arc at the parent's radius followed
 * by a radial segment out to the child.
 */

import { cluster, hierarchy, type HierarchyPointNode } from 'd3-hierarchy';
import type { PhyloTree } from '../tree/PhyloTree.js';
import type { NodeAnnotation, RenderedFigure, TreeNode } from '../types/models.js';
import type { ITreeRenderer } from './ITreeRenderer.js';

export interface SvgTreeRendererOptions {
  /** Width and height of the square figure in px. Default: 1200. */
  size?: number;
  branchColour?: string;
  background?: string;
  fontFamily?: string;
  fontSize?: number;
  strokeWidth?: number;
}

const DEFAULT_OPTIONS: Required<SvgTreeRendererOptions> = {
  size: 1200,
  branchColour: '#555555',
  background: '#ffffff',
  fontFamily: 'sans-serif',
  fontSize: 10,
  strokeWidth: 1.5,
};

const IMAGE_SIZE = 16;

export class SvgTreeRenderer implements ITreeRenderer {
  readonly format = 'svg' as const;
  private readonly opts: Required<SvgTreeRendererOptions>;

  constructor(opts?: SvgTreeRendererOptions) {
    this.opts = { ...DEFAULT_OPTIONS, ...opts };
  }

  async render(tree: PhyloTree, annotation: NodeAnnotation): Promise<RenderedFigure> {
    return {
      format: 'svg',
      mimeType: 'image/svg+xml',
      data: Buffer.from(this.toSvg(tree, annotation), 'utf8'),
    };
  }

  toSvg(tree: PhyloTree, annotation: NodeAnnotation): string {
    const { size, fontSize } = this.opts;
    const half = size / 2;
    const hasLabels = annotation.labels.length > 0;
    const radius = hasLabels ? half * 0.7 : half * 0.92;

    const root = cluster<TreeNode>()
      .size([2 * Math.PI, radius])
      .separation(() => 1)(hierarchy(tree.root, (d) => d.children));

    const colours = branchColours(tree, annotation);
    const colourOf = (node: HierarchyPointNode<TreeNode>) =>
      colours.get(tree.indexOf(node.data)) ?? this.opts.branchColour;

    const out: string[] = [];
    out.push(
      `<svg xmlns="http://www.w3.org/2000/svg" width="${size}" height="${size}" viewBox="${-half} ${-half} ${size} ${size}">`
    );
    out.push(`<rect x="${-half}" y="${-half}" width="${size}" height="${size}" fill="${escapeXml(this.opts.background)}"/>`);

    out.push(`<g fill="none" stroke-width="${this.opts.strokeWidth}">`);
    for (const node of root.descendants()) {
      const parent = node.parent;
      if (!parent) continue;
      out.push(`<path d="${linkPath(parent, node)}" stroke="${escapeXml(colourOf(node))}"/>`);
    }
    out.push('</g>');

    if (hasLabels) {
      const byIndex = new Map<number, HierarchyPointNode<TreeNode>>();
      for (const leaf of root.leaves()) byIndex.set(tree.indexOf(leaf.data), leaf);

      out.push(`<g font-family="${escapeXml(this.opts.fontFamily)}" font-size="${fontSize}">`);
      for (const label of annotation.labels) {
        const node = byIndex.get(label.node);
        if (!node) continue;
        out.push(this.tipLabel(node, label.text, colourOf(node), label.image));
      }
      out.push('</g>');
    }

    if (annotation.highlights.length > 0) {
      out.push(this.legend(annotation, half));
    }

    out.push('</svg>');
    return out.join('\n');
  }

  private tipLabel(
    node: HierarchyPointNode<TreeNode>,
    text: string,
    colour: string,
    image: string | undefined
  ): string {
    const degrees = (node.x * 180) / Math.PI - 90;
    const flipped = node.x > Math.PI;
    const offset = 4 + (image ? IMAGE_SIZE + 2 : 0);
    const rotate = `rotate(${fmt(degrees)}) translate(${fmt(node.y)},0)`;

    const parts = [`<g transform="${rotate}">`];
    if (image) {
      parts.push(
        `<image href="${escapeXml(image)}" x="4" y="${-IMAGE_SIZE / 2}" width="${IMAGE_SIZE}" height="${IMAGE_SIZE}"${flipped ? ` transform="rotate(180,${4 + IMAGE_SIZE / 2},0)"` : ''}/>`
      );
    }
    parts.push(
      flipped
        ? `<text x="${-offset}" dy="0.32em" text-anchor="end" transform="rotate(180)" fill="${escapeXml(colour)}">${escapeXml(text)}</text>`
        : `<text x="${offset}" dy="0.32em" fill="${escapeXml(colour)}">${escapeXml(text)}</text>`
    );
    parts.push('</g>');
    return parts.join('');
  }

  private legend(annotation: NodeAnnotation, half: number): string {
    const { fontSize } = this.opts;
    const rowHeight = fontSize * 1.6;
    const x = -half + 16;
    const rows = annotation.highlights.map((h, i) => {
      const y = -half + 16 + i * rowHeight;
      return (
        `<rect x="${x}" y="${fmt(y)}" width="${fontSize}" height="${fontSize}" fill="${escapeXml(h.colour)}"/>` +
        `<text x="${x + fontSize * 1.5}" y="${fmt(y + fontSize * 0.85)}">${escapeXml(h.group)}</text>`
      );
    });
    return `<g font-family="${escapeXml(this.opts.fontFamily)}" font-size="${fontSize}">${rows.join('')}</g>`;
  }
}

/**
 * Colour per unified node index. A node takes the colour of its nearest
 * highlighted ancestor-or-self, so nested highlights override outer ones.
 */
export function branchColours(tree: PhyloTree, annotation: NodeAnnotation): Map<number, string> {
  const depth = (index: number) => {
    let d = 0;
    for (let p = tree.parentOf(index); p !== -1; p = tree.parentOf(p)) d++;
    return d;
  };

  const ordered = [...annotation.highlights].sort((a, b) => depth(a.node) - depth(b.node));
  const colours = new Map<number, string>();
  for (const h of ordered) {
    const stack = [h.node];
    while (stack.length > 0) {
      const index = stack.pop();
      if (index === undefined) break;
      colours.set(index, h.colour);
      for (const child of tree.nodeAt(index).children) stack.push(tree.indexOf(child));
    }
  }
  return colours;
}

function linkPath(parent: HierarchyPointNode<TreeNode>, child: HierarchyPointNode<TreeNode>): string {
  const start = polar(parent.x, parent.y);
  const corner = polar(child.x, parent.y);
  const end = polar(child.x, child.y);
  if (parent.y === 0) {
    return `M${start}L${end}`;
  }
  const largeArc = Math.abs(child.x - parent.x) > Math.PI ? 1 : 0;
  const sweep = child.x > parent.x ? 1 : 0;
  return `M${start}A${fmt(parent.y)},${fmt(parent.y)} 0 ${largeArc} ${sweep} ${corner}L${end}`;
}

function polar(angle: number, r: number): string {
  return `${fmt(r * Math.sin(angle))},${fmt(-r * Math.cos(angle))}`;
}

function fmt(n: number): string {
  const rounded = Math.round(n * 100) / 100;
  return Object.is(rounded, -0) ? '0' : String(rounded);
}

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}
