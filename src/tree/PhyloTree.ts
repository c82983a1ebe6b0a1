/**
 * Parsed tree with a unified node index.
 *
 * Tips take indices 0…T-1 in left-to-right order; internal nodes follow at
 * T…T+I-1 in pre-order, so the root is always T. `nodeLabels[k]` is the
 * label of internal node T+k ('' when unlabelled).
 */

import { NotFoundError } from '../errors.js';
import type { TreeNode } from '../types/models.js';
import { displayLabel } from './labels.js';
import { parseNewick, toNewick } from './newick.js';

export interface FindNodeOptions {
  /** Also match labels after stripping `_ott…` suffixes and underscores. Default: true. */
  loose?: boolean;
}

export class PhyloTree {
  readonly tipLabels: string[] = [];
  readonly nodeLabels: string[] = [];
  /** [parent, child] pairs in unified indices, in pre-order. */
  readonly edges: Array<[number, number]> = [];

  private readonly nodes: TreeNode[];
  private readonly indexByNode = new Map<TreeNode, number>();
  private readonly parents: number[];

  constructor(readonly root: TreeNode) {
    const tips: TreeNode[] = [];
    const internals: TreeNode[] = [];
    walk(root, (node) => (node.children.length === 0 ? tips : internals).push(node));

    this.nodes = [...tips, ...internals];
    this.nodes.forEach((node, i) => this.indexByNode.set(node, i));
    for (const tip of tips) this.tipLabels.push(tip.label ?? '');
    for (const node of internals) this.nodeLabels.push(node.label ?? '');

    this.parents = new Array<number>(this.nodes.length).fill(-1);
    walk(root, (node) => {
      const parent = this.indexOf(node);
      for (const child of node.children) {
        const childIndex = this.indexOf(child);
        this.parents[childIndex] = parent;
        this.edges.push([parent, childIndex]);
      }
    });
  }

  static fromNewick(text: string): PhyloTree {
    return new PhyloTree(parseNewick(text));
  }

  toNewick(): string {
    return toNewick(this.root);
  }

  get tipCount(): number {
    return this.tipLabels.length;
  }

  get internalCount(): number {
    return this.nodeLabels.length;
  }

  get nodeCount(): number {
    return this.nodes.length;
  }

  indexOf(node: TreeNode): number {
    const index = this.indexByNode.get(node);
    if (index === undefined) {
      throw new NotFoundError('Node does not belong to this tree');
    }
    return index;
  }

  nodeAt(index: number): TreeNode {
    const node = this.nodes[index];
    if (!node) {
      throw new NotFoundError(`No node with index ${index}`);
    }
    return node;
  }

  /** Parent index, or -1 for the root. */
  parentOf(index: number): number {
    this.nodeAt(index);
    return this.parents[index];
  }

  /**
   * Unified index of the node carrying `label`. Internal labels are searched
   * first (giving T + k), then tips. Throws NotFoundError when absent.
   */
  findNodeIndex(label: string, opts?: FindNodeOptions): number {
    const index = this.tryFindNodeIndex(label, opts);
    if (index === null) {
      throw new NotFoundError(`No node labelled "${label}"`);
    }
    return index;
  }

  tryFindNodeIndex(label: string, opts?: FindNodeOptions): number | null {
    const loose = opts?.loose ?? true;
    const wanted = displayLabel(label);
    const matches = (candidate: string) =>
      candidate === label || (loose && candidate !== '' && displayLabel(candidate) === wanted);

    const k = this.nodeLabels.findIndex(matches);
    if (k !== -1) return this.tipCount + k;

    const t = this.tipLabels.findIndex(matches);
    return t !== -1 ? t : null;
  }
}

/** Pre-order traversal. */
export function walk(node: TreeNode, visit: (node: TreeNode) => void): void {
  const stack: TreeNode[] = [node];
  while (stack.length > 0) {
    const current = stack.pop();
    if (!current) break;
    visit(current);
    for (let i = current.children.length - 1; i >= 0; i--) {
      stack.push(current.children[i]);
    }
  }
}

/**
 * Copy of `root` with every single-child internal node removed; its child
 * takes its place and branch lengths add up. The removed labels are lost.
 */
export function collapseSingles(root: TreeNode): TreeNode {
  let node = root;
  let extra: number | null = null;
  while (node.children.length === 1) {
    extra = addLengths(extra, node.branchLength);
    node = node.children[0];
  }
  return {
    label: node.label,
    branchLength: addLengths(extra, node.branchLength),
    children: node.children.map(collapseSingles),
  };
}

function addLengths(a: number | null, b: number | null): number | null {
  if (a === null) return b;
  if (b === null) return a;
  return a + b;
}
