import type { InfographicNode } from './types.js';

export type NodeIndex = ReadonlyMap<string, InfographicNode>;

/** Pre-order walk with an explicit stack; `visit` sees each node with its depth (root = 0). */
export function walkTree(root: InfographicNode, visit: (node: InfographicNode, depth: number) => void): void {
  const stack: Array<{ node: InfographicNode; depth: number }> = [{ node: root, depth: 0 }];
  while (stack.length > 0) {
    const frame = stack.pop();
    if (!frame) break;
    visit(frame.node, frame.depth);
    for (let i = frame.node.children.length - 1; i >= 0; i -= 1) {
      const child = frame.node.children[i];
      if (child) stack.push({ node: child, depth: frame.depth + 1 });
    }
  }
}

/** id -> node; when ids collide the first node in pre-order wins. */
export function indexNodes(root: InfographicNode): NodeIndex {
  const index = new Map<string, InfographicNode>();
  walkTree(root, (node) => {
    if (!index.has(node.id)) index.set(node.id, node);
  });
  return index;
}

export function countNodes(root: InfographicNode): number {
  let count = 0;
  walkTree(root, () => {
    count += 1;
  });
  return count;
}

export function maxDepth(root: InfographicNode): number {
  let deepest = 0;
  walkTree(root, (_node, depth) => {
    if (depth > deepest) deepest = depth;
  });
  return deepest;
}

/** Ids from the root down to the first node with `targetId`, or null when it is not in the tree. */
export function findPath(root: InfographicNode, targetId: string): string[] | null {
  // Keyed by node object, since ids may repeat.
  const parents = new Map<InfographicNode, InfographicNode>();
  const stack: InfographicNode[] = [root];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;
    if (node.id === targetId) {
      const path: string[] = [];
      for (let at: InfographicNode | undefined = node; at; at = parents.get(at)) path.push(at.id);
      return path.reverse();
    }
    for (let i = node.children.length - 1; i >= 0; i -= 1) {
      const child = node.children[i];
      if (child) {
        parents.set(child, node);
        stack.push(child);
      }
    }
  }
  return null;
}
