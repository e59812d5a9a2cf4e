import { decodeInfographic, type DecodeIssue } from './decode.js';
import { countNodes, maxDepth } from './tree.js';
import type { InfographicDocument } from './types.js';

export type LoadOptions = {
  onIssues?: (issues: DecodeIssue[]) => void;
};

/** null when the data cannot be decoded; partial-data issues go to `onIssues`. */
export function loadFromBytes(
  data: Uint8Array | ArrayBuffer | string,
  options: LoadOptions = {},
): InfographicDocument | null {
  const result = decodeInfographic(data);
  if (!result.ok) return null;
  if (result.issues.length > 0) options.onIssues?.(result.issues);
  return result.document;
}

export type DocumentSummary = {
  displayName: string;
  sourceLocator: string;
  phaseCount: number;
  nodeCount: number;
  depth: number;
  pipelineOverview?: string;
};

export function summarizeDocument(document: InfographicDocument): DocumentSummary {
  return {
    displayName: document.displayName,
    sourceLocator: document.sourceLocator,
    phaseCount: document.root.children.length,
    nodeCount: countNodes(document.root),
    depth: maxDepth(document.root),
    pipelineOverview: document.pipelineOverview,
  };
}
