import { describe, expect, it } from 'vitest';

import { ExpansionState } from '../src/infographic/expansion.js';
import { findPath, indexNodes, walkTree } from '../src/infographic/tree.js';
import type { InfographicNode, RepoNode } from '../src/infographic/types.js';

function chain(depth: number): RepoNode {
  let node: InfographicNode = { id: `n${depth}`, variant: 'step', label: `n${depth}`, children: [] };
  for (let i = depth - 1; i >= 1; i -= 1) {
    node = { id: `n${i}`, variant: 'step', label: `n${i}`, children: [node] };
  }
  return { id: 'root', variant: 'repo', label: 'root', children: [node] };
}

describe('ExpansionState', () => {
  it('toggles back to the starting state', () => {
    const state = new ExpansionState();
    expect(state.toggle('a')).toBe(true);
    expect(state.isExpanded('a')).toBe(true);
    expect(state.toggle('a')).toBe(false);
    expect(state.isExpanded('a')).toBe(false);
    expect(state.size).toBe(0);
  });

  it('expands every node of a deep tree', () => {
    const root = chain(8);
    const state = new ExpansionState();
    state.expandAll(root);
    expect(state.size).toBe(9);
    expect(state.isExpanded('n8')).toBe(true);
  });

  it('collapses everything', () => {
    const state = new ExpansionState(['a', 'b']);
    state.collapseAll();
    expect(state.ids()).toEqual([]);
  });

  it('collapses every node after toggles and expand-all', () => {
    const root = chain(10);
    const state = new ExpansionState();
    state.toggle('n3');
    state.expandAll(root);
    state.toggle('n7');
    state.toggle('elsewhere');
    state.collapseAll();

    const ids: string[] = [];
    walkTree(root, (node) => ids.push(node.id));
    expect(ids).toHaveLength(11);
    expect(ids.filter((id) => state.isExpanded(id))).toEqual([]);
    expect(state.isExpanded('elsewhere')).toBe(false);
  });

  it('accepts ids that are not in any document', () => {
    const state = new ExpansionState();
    state.expand('gone');
    state.collapse('never-there');
    expect(state.ids()).toEqual(['gone']);
  });

  it('reveals a node by expanding only its ancestors', () => {
    const root = chain(4);
    const state = new ExpansionState();
    expect(state.reveal(root, 'n3')).toBe(true);
    expect(state.ids().sort()).toEqual(['n1', 'n2', 'root']);
    expect(state.isExpanded('n3')).toBe(false);
  });

  it('leaves the state alone for a dangling id', () => {
    const state = new ExpansionState(['root']);
    expect(state.reveal(chain(2), 'missing')).toBe(false);
    expect(state.ids()).toEqual(['root']);
  });
});

describe('tree helpers', () => {
  it('indexes the first node for a repeated id', () => {
    const root: RepoNode = {
      id: 'root',
      variant: 'repo',
      label: 'r',
      children: [
        { id: 'dup', variant: 'phase', label: 'first', children: [] },
        { id: 'dup', variant: 'phase', label: 'second', children: [] },
      ],
    };
    expect(indexNodes(root).get('dup')?.label).toBe('first');
  });

  it('finds the path from the root', () => {
    expect(findPath(chain(3), 'n3')).toEqual(['root', 'n1', 'n2', 'n3']);
    expect(findPath(chain(3), 'zzz')).toBeNull();
  });

  it('finds the path at the bottom of a very deep chain', () => {
    const path = findPath(chain(20_000), 'n20000');
    expect(path).toHaveLength(20_001);
    expect(path?.slice(0, 3)).toEqual(['root', 'n1', 'n2']);
    expect(path?.at(-1)).toBe('n20000');
  });

  it('stops at the first node in pre-order when ids repeat', () => {
    const root: RepoNode = {
      id: 'root',
      variant: 'repo',
      label: 'root',
      children: [
        { id: 'a', variant: 'phase', label: 'a', children: [{ id: 'dup', variant: 'step', label: 'under a', children: [] }] },
        { id: 'dup', variant: 'phase', label: 'top level', children: [] },
      ],
    };
    expect(findPath(root, 'dup')).toEqual(['root', 'a', 'dup']);
  });
});
