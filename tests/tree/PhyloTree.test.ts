import { describe, it, expect } from 'vitest';
import { PhyloTree, collapseSingles } from '../../src/tree/PhyloTree.js';
import { parseNewick, toNewick } from '../../src/tree/newick.js';
import { NotFoundError } from '../../src/errors.js';

const TEXT = '((A,B)Hymenoptera,((C)Pieridae,D)Insecta)root;';

describe('PhyloTree', () => {
  const tree = PhyloTree.fromNewick(TEXT);

  it('should index tips first, left to right', () => {
    expect(tree.tipLabels).toEqual(['A', 'B', 'C', 'D']);
    expect(tree.tipCount).toBe(4);
    expect(tree.nodeAt(3).children).toEqual([]);
  });

  it('should index internal nodes after the tips in pre-order', () => {
    expect(tree.nodeLabels).toEqual(['root', 'Hymenoptera', 'Insecta', 'Pieridae']);
    expect(tree.internalCount).toBe(4);
    expect(tree.nodeCount).toBe(8);
    expect(tree.nodeAt(4)).toBe(tree.root);
  });

  it('should find an internal node at tip count plus its label position', () => {
    const k = tree.nodeLabels.indexOf('Insecta');
    expect(k).toBe(2);
    expect(tree.findNodeIndex('Insecta')).toBe(tree.tipCount + k);
    expect(tree.findNodeIndex('Insecta')).toBe(6);
  });

  it('should find tips by label', () => {
    expect(tree.findNodeIndex('C')).toBe(2);
  });

  it('should throw NotFoundError for an unknown label', () => {
    expect(() => tree.findNodeIndex('Aves')).toThrow(NotFoundError);
    expect(tree.tryFindNodeIndex('Aves')).toBeNull();
  });

  it('should list edges in unified indices', () => {
    expect(tree.edges).toEqual([
      [4, 5],
      [4, 6],
      [5, 0],
      [5, 1],
      [6, 7],
      [6, 3],
      [7, 2],
    ]);
  });

  it('should report parents', () => {
    expect(tree.parentOf(2)).toBe(7);
    expect(tree.parentOf(4)).toBe(-1);
  });

  it('should reject out-of-range indices', () => {
    expect(() => tree.nodeAt(8)).toThrow(NotFoundError);
  });

  describe('Open Tree labels', () => {
    const otl = PhyloTree.fromNewick(
      '((Apis_mellifera_ott7073,Bombus_ott2)Apidae_ott3,Pieris_ott4)Insecta_ott5;'
    );

    it('should match names without the ott suffix', () => {
      expect(otl.findNodeIndex('Insecta')).toBe(3);
      expect(otl.findNodeIndex('Apidae')).toBe(4);
      expect(otl.findNodeIndex('Apis mellifera')).toBe(0);
    });

    it('should match exact labels only when loose matching is off', () => {
      expect(otl.findNodeIndex('Insecta_ott5', { loose: false })).toBe(3);
      expect(otl.tryFindNodeIndex('Insecta', { loose: false })).toBeNull();
    });
  });
});

describe('collapseSingles', () => {
  it('should drop single-child nodes and their labels', () => {
    const collapsed = new PhyloTree(collapseSingles(parseNewick(TEXT)));
    expect(collapsed.toNewick()).toBe('((A,B)Hymenoptera,(C,D)Insecta)root;');
    expect(collapsed.nodeLabels).not.toContain('Pieridae');
    expect(collapsed.tipCount).toBe(4);
  });

  it('should add up branch lengths along a collapsed chain', () => {
    expect(toNewick(collapseSingles(parseNewick('((((A:1)x:2)y:3,B:1)r);')))).toBe('(A:6,B:1)r;');
  });

  it('should collapse a single-child root', () => {
    expect(toNewick(collapseSingles(parseNewick('((A,B)Apidae)Insecta;')))).toBe('(A,B)Apidae;');
  });
});
