export const NODE_VARIANTS = ['repo', 'phase', 'step', 'file', 'function', 'code_block'] as const;

export type KnownNodeVariant = (typeof NODE_VARIANTS)[number];
export type NodeVariant = KnownNodeVariant | 'unknown';

export type VisualHint = {
  icon?: string;
  colorHex?: string;
  badge?: string;
};

export type Connection = {
  targetId: string;
  label?: string;
  isOutgoing: boolean;
};

export type PhaseMetadata = {
  phaseId: string;
  phasePurpose?: string;
};

export type StepMetadata = {
  sourceNodeIds?: string[];
  targetNodeIds?: string[];
  processScript?: string;
  notes?: string;
};

export type FileMetadata = {
  filePath?: string;
  language?: string;
  sourceUrl?: string;
  lineCount?: number;
};

export type FunctionMetadata = {
  signature?: string;
  lineStart?: number;
  lineEnd?: number;
  docstring?: string;
  sourceUrl?: string;
};

export type CodeAnnotation = {
  line: number;
  comment: string;
};

export type CodeMetadata = {
  code?: string;
  language?: string;
  sourceUrl?: string;
  filePath?: string;
  lineStart?: number;
  lineEnd?: number;
  annotations?: CodeAnnotation[];
};

type NodeBase = {
  id: string;
  label: string;
  description?: string;
  children: InfographicNode[];
  visualHint?: VisualHint;
  connections?: Connection[];
};

export type RepoNode = NodeBase & { variant: 'repo' };
export type PhaseNode = NodeBase & { variant: 'phase'; metadata?: PhaseMetadata };
export type StepNode = NodeBase & { variant: 'step'; metadata?: StepMetadata };
export type FileNode = NodeBase & { variant: 'file'; metadata?: FileMetadata };
export type FunctionNode = NodeBase & { variant: 'function'; metadata?: FunctionMetadata };
export type CodeBlockNode = NodeBase & { variant: 'code_block'; metadata?: CodeMetadata };
// Keeps id/label/children of a node whose wire variant was not recognised.
export type UnknownNode = NodeBase & { variant: 'unknown'; wireVariant: string };

export type InfographicNode = RepoNode | PhaseNode | StepNode | FileNode | FunctionNode | CodeBlockNode | UnknownNode;

export type InfographicDocument = {
  formatVersion: string;
  schemaName: string;
  sourceLocator: string;
  displayName: string;
  summary?: string;
  pipelineOverview?: string;
  /** ISO-8601, kept as the producer wrote it. */
  generatedAt: string;
  root: RepoNode;
};

export const DEFAULT_SCHEMA_NAME = 'interactive-infographic';

export const VARIANT_DISPLAY_NAMES: Record<NodeVariant, string> = {
  repo: 'REPOSITORY',
  phase: 'PHASE',
  step: 'STEP',
  file: 'FILE',
  function: 'FUNCTION',
  code_block: 'CODE',
  unknown: 'NODE',
};

export function isKnownVariant(value: string): value is KnownNodeVariant {
  return (NODE_VARIANTS as readonly string[]).includes(value);
}
