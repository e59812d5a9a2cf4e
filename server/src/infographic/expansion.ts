import { findPath, walkTree } from './tree.js';
import type { InfographicNode } from './types.js';

/**
 * The set of node ids shown open. Absence means collapsed; ids are never
 * checked against a document, so a stale id is harmless.
 */
export class ExpansionState {
  private expanded: Set<string>;

  constructor(initial: Iterable<string> = []) {
    this.expanded = new Set(initial);
  }

  get size(): number {
    return this.expanded.size;
  }

  isExpanded(nodeId: string): boolean {
    return this.expanded.has(nodeId);
  }

  /** Returns the new state of `nodeId`. */
  toggle(nodeId: string): boolean {
    if (this.expanded.delete(nodeId)) return false;
    this.expanded.add(nodeId);
    return true;
  }

  expand(nodeId: string): void {
    this.expanded.add(nodeId);
  }

  collapse(nodeId: string): void {
    this.expanded.delete(nodeId);
  }

  expandAll(root: InfographicNode): void {
    walkTree(root, (node) => {
      this.expanded.add(node.id);
    });
  }

  collapseAll(): void {
    this.expanded.clear();
  }

  /** Expands every ancestor of `nodeId`; false (and no change) when the id is not in the tree. */
  reveal(root: InfographicNode, nodeId: string): boolean {
    const path = findPath(root, nodeId);
    if (!path) return false;
    for (const id of path.slice(0, -1)) this.expanded.add(id);
    return true;
  }

  ids(): string[] {
    return [...this.expanded];
  }
}
