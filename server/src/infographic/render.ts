import type { ExpansionState } from './expansion.js';
import { indexNodes, type NodeIndex } from './tree.js';
import {
  VARIANT_DISPLAY_NAMES,
  type CodeAnnotation,
  type InfographicDocument,
  type InfographicNode,
  type NodeVariant,
  type VisualHint,
} from './types.js';

/** A cross-reference; `resolved` is false for ids that are not in the document. */
export type ReferenceView = {
  id: string;
  label: string;
  resolved: boolean;
};

export type ConnectionView = ReferenceView & {
  edgeLabel?: string;
  isOutgoing: boolean;
};

export type DetailRow =
  | { kind: 'text'; label: string; value: string }
  | { kind: 'link'; label: string; href: string }
  | { kind: 'references'; label: string; references: ReferenceView[] }
  | { kind: 'connections'; connections: ConnectionView[] };

export type RenderedContent =
  | { kind: 'children'; children: RenderedNode[] }
  | {
      kind: 'code';
      code?: string;
      language?: string;
      lineStart?: number;
      sourceUrl?: string;
      annotations: CodeAnnotation[];
    };

export type RenderedNode = {
  id: string;
  variant: NodeVariant;
  typeLabel: string;
  label: string;
  description?: string;
  depth: number;
  expandable: boolean;
  expanded: boolean;
  childCount: number;
  visualHint?: VisualHint;
  /** Metadata rows; only filled for expanded nodes. */
  details: DetailRow[];
  /** null while collapsed. */
  content: RenderedContent | null;
};

function resolveReference(id: string, index: NodeIndex): ReferenceView {
  const target = index.get(id);
  return target ? { id, label: target.label, resolved: true } : { id, label: id, resolved: false };
}

function textRow(rows: DetailRow[], label: string, value: string | number | undefined): void {
  if (value === undefined || value === '') return;
  rows.push({ kind: 'text', label, value: String(value) });
}

function linkRow(rows: DetailRow[], label: string, href: string | undefined): void {
  if (!href) return;
  rows.push({ kind: 'link', label, href });
}

function lineRange(start: number | undefined, end: number | undefined): string | undefined {
  if (start === undefined) return undefined;
  return end === undefined ? String(start) : `${start}-${end}`;
}

function buildDetails(node: InfographicNode, index: NodeIndex): DetailRow[] {
  const rows: DetailRow[] = [];

  switch (node.variant) {
    case 'phase':
      textRow(rows, 'Purpose', node.metadata?.phasePurpose);
      break;
    case 'step': {
      const meta = node.metadata;
      if (meta?.sourceNodeIds?.length) {
        rows.push({ kind: 'references', label: 'Inputs', references: meta.sourceNodeIds.map((id) => resolveReference(id, index)) });
      }
      if (meta?.targetNodeIds?.length) {
        rows.push({ kind: 'references', label: 'Outputs', references: meta.targetNodeIds.map((id) => resolveReference(id, index)) });
      }
      textRow(rows, 'Script', meta?.processScript);
      textRow(rows, 'Note', meta?.notes);
      break;
    }
    case 'file':
      textRow(rows, 'Path', node.metadata?.filePath);
      textRow(rows, 'Language', node.metadata?.language);
      textRow(rows, 'Lines', node.metadata?.lineCount);
      linkRow(rows, 'View source', node.metadata?.sourceUrl);
      break;
    case 'function':
      textRow(rows, 'Signature', node.metadata?.signature);
      textRow(rows, 'Lines', lineRange(node.metadata?.lineStart, node.metadata?.lineEnd));
      textRow(rows, 'Docstring', node.metadata?.docstring);
      linkRow(rows, 'View source', node.metadata?.sourceUrl);
      break;
    case 'code_block':
      textRow(rows, 'Language', node.metadata?.language);
      textRow(rows, 'File', node.metadata?.filePath);
      textRow(rows, 'Lines', lineRange(node.metadata?.lineStart, node.metadata?.lineEnd));
      linkRow(rows, 'View source', node.metadata?.sourceUrl);
      break;
    case 'unknown':
      textRow(rows, 'Type', node.wireVariant);
      break;
    case 'repo':
      break;
  }

  if (node.connections?.length) {
    rows.push({
      kind: 'connections',
      connections: node.connections.map((c) => ({
        ...resolveReference(c.targetId, index),
        edgeLabel: c.label,
        isOutgoing: c.isOutgoing,
      })),
    });
  }

  return rows;
}

function renderShell(node: InfographicNode, depth: number, expansion: ExpansionState, index: NodeIndex): RenderedNode {
  const isCodeBlock = node.variant === 'code_block';
  const expanded = expansion.isExpanded(node.id);

  let content: RenderedContent | null = null;
  if (expanded && node.variant === 'code_block') {
    content = {
      kind: 'code',
      code: node.metadata?.code,
      language: node.metadata?.language,
      lineStart: node.metadata?.lineStart,
      sourceUrl: node.metadata?.sourceUrl,
      annotations: node.metadata?.annotations ?? [],
    };
  } else if (expanded) {
    content = { kind: 'children', children: [] };
  }

  return {
    id: node.id,
    variant: node.variant,
    typeLabel: VARIANT_DISPLAY_NAMES[node.variant],
    label: node.label,
    description: node.description,
    depth,
    expandable: node.children.length > 0 || isCodeBlock,
    expanded,
    childCount: node.children.length,
    visualHint: node.visualHint,
    details: expanded ? buildDetails(node, index) : [],
    content,
  };
}

/**
 * Projects `node` and every visible descendant. A node's children appear only
 * while it is expanded; an expanded code block shows its code instead of its
 * children.
 */
export function renderTree(
  node: InfographicNode,
  expansion: ExpansionState,
  index: NodeIndex = indexNodes(node),
  depth = 0,
): RenderedNode {
  const rendered = renderShell(node, depth, expansion, index);
  const stack: Array<{ node: InfographicNode; rendered: RenderedNode }> = [{ node, rendered }];

  while (stack.length > 0) {
    const frame = stack.pop();
    if (!frame) break;
    const content = frame.rendered.content;
    if (content?.kind !== 'children') continue;
    for (const child of frame.node.children) {
      const childRendered = renderShell(child, frame.rendered.depth + 1, expansion, index);
      content.children.push(childRendered);
      stack.push({ node: child, rendered: childRendered });
    }
  }

  return rendered;
}

/** The root's children, always visible under the repository header. */
export function renderDocumentBody(document: InfographicDocument, expansion: ExpansionState): RenderedNode[] {
  const index = indexNodes(document.root);
  return document.root.children.map((child) => renderTree(child, expansion, index));
}

/** Pre-order list of every rendered node, parents before their children. */
export function flattenRenderedTree(roots: readonly RenderedNode[]): RenderedNode[] {
  const out: RenderedNode[] = [];
  const stack: RenderedNode[] = [...roots].reverse();

  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;
    out.push(node);
    const content = node.content;
    if (content?.kind !== 'children') continue;
    for (let i = content.children.length - 1; i >= 0; i -= 1) {
      const child = content.children[i];
      if (child) stack.push(child);
    }
  }

  return out;
}
