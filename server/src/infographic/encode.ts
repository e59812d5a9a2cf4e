import type { InfographicDocument, InfographicNode, VisualHint } from './types.js';

export type WireObject = { [key: string]: unknown };

function encodeVisualHint(hint: VisualHint | undefined): WireObject | undefined {
  if (!hint) return undefined;
  return { icon: hint.icon, color: hint.colorHex, badge: hint.badge };
}

function encodeMetadata(node: InfographicNode): WireObject {
  switch (node.variant) {
    case 'phase':
      return { phaseMetadata: node.metadata };
    case 'step':
      return {
        stepMetadata: node.metadata && {
          sourceNodes: node.metadata.sourceNodeIds,
          targetNodes: node.metadata.targetNodeIds,
          processScript: node.metadata.processScript,
          notes: node.metadata.notes,
        },
      };
    case 'file':
      return {
        fileMetadata: node.metadata && {
          filePath: node.metadata.filePath,
          language: node.metadata.language,
          githubUrl: node.metadata.sourceUrl,
          lineCount: node.metadata.lineCount,
        },
      };
    case 'function':
      return {
        functionMetadata: node.metadata && {
          signature: node.metadata.signature,
          lineStart: node.metadata.lineStart,
          lineEnd: node.metadata.lineEnd,
          docstring: node.metadata.docstring,
          githubUrl: node.metadata.sourceUrl,
        },
      };
    case 'code_block':
      return {
        codeMetadata: node.metadata && {
          code: node.metadata.code,
          language: node.metadata.language,
          githubUrl: node.metadata.sourceUrl,
          filePath: node.metadata.filePath,
          lineStart: node.metadata.lineStart,
          lineEnd: node.metadata.lineEnd,
          annotations: node.metadata.annotations,
        },
      };
    default:
      return {};
  }
}

function encodeNodeShell(node: InfographicNode, children: WireObject[]): WireObject {
  return {
    id: node.id,
    type: node.variant === 'unknown' ? node.wireVariant : node.variant,
    label: node.label,
    description: node.description,
    children,
    visualHint: encodeVisualHint(node.visualHint),
    ...encodeMetadata(node),
    connections: node.connections,
  };
}

/** Wire form of a node tree; absent fields are left undefined so JSON.stringify omits them. */
export function encodeNode(root: InfographicNode): WireObject {
  const rootChildren: WireObject[] = [];
  const wireRoot = encodeNodeShell(root, rootChildren);
  const stack: Array<{ node: InfographicNode; children: WireObject[] }> = [{ node: root, children: rootChildren }];

  while (stack.length > 0) {
    const frame = stack.pop();
    if (!frame) break;
    for (const child of frame.node.children) {
      const childChildren: WireObject[] = [];
      frame.children.push(encodeNodeShell(child, childChildren));
      stack.push({ node: child, children: childChildren });
    }
  }

  return wireRoot;
}

export function encodeInfographic(document: InfographicDocument): WireObject {
  return {
    version: document.formatVersion,
    schema: document.schemaName,
    repoUrl: document.sourceLocator,
    repoName: document.displayName,
    repoSummary: document.summary,
    pipelineOverview: document.pipelineOverview,
    generatedAt: document.generatedAt,
    root: encodeNode(document.root),
  };
}

export function serializeInfographic(document: InfographicDocument, space?: number): string {
  return JSON.stringify(encodeInfographic(document), null, space);
}
