import {
  DEFAULT_SCHEMA_NAME,
  isKnownVariant,
  type CodeAnnotation,
  type CodeMetadata,
  type Connection,
  type FileMetadata,
  type FunctionMetadata,
  type InfographicDocument,
  type InfographicNode,
  type PhaseMetadata,
  type RepoNode,
  type StepMetadata,
  type VisualHint,
} from './types.js';

export type DecodeIssueKind = 'dropped-node' | 'unknown-variant' | 'root-variant' | 'defaulted-field' | 'duplicate-id';

/** A partial-data condition absorbed during decoding. */
export type DecodeIssue = {
  kind: DecodeIssueKind;
  path: string;
  message: string;
};

export class DecodeError extends Error {
  path?: string;

  constructor(message: string, path?: string) {
    super(message);
    this.name = 'DecodeError';
    this.path = path;
  }
}

export type DecodeResult =
  | { ok: true; document: InfographicDocument; issues: DecodeIssue[] }
  | { ok: false; error: DecodeError };

export type JsonParseResult = { ok: true; value: unknown } | { ok: false; error: DecodeError };

type JsonRecord = Record<string, unknown>;

// Wire spellings accepted for each field, canonical name first.
const DOCUMENT_KEYS = {
  version: ['version', 'formatVersion', 'format_version'],
  schema: ['schema', 'schemaName', 'schema_name'],
  locator: ['repoUrl', 'repo_url', 'sourceLocator', 'source_locator'],
  name: ['repoName', 'repo_name', 'displayName', 'display_name'],
  summary: ['repoSummary', 'repo_summary', 'summary'],
  overview: ['pipelineOverview', 'pipeline_overview'],
  generatedAt: ['generatedAt', 'generated_at', 'generatedAtTimestamp'],
} as const;

const NODE_KEYS = {
  id: ['id'],
  variant: ['type', 'variant', 'nodeType', 'node_type'],
  label: ['label'],
  description: ['description'],
  visualHint: ['visualHint', 'visual_hint'],
  connections: ['connections'],
  phase: ['phaseMetadata', 'phase_metadata'],
  step: ['stepMetadata', 'step_metadata'],
  file: ['fileMetadata', 'file_metadata'],
  function: ['functionMetadata', 'function_metadata'],
  code: ['codeMetadata', 'code_metadata'],
} as const;

const SOURCE_URL_KEYS = ['githubUrl', 'github_url', 'sourceUrl', 'source_url'] as const;
const FILE_PATH_KEYS = ['filePath', 'file_path'] as const;
const LINE_START_KEYS = ['lineStart', 'line_start'] as const;
const LINE_END_KEYS = ['lineEnd', 'line_end'] as const;

const VARIANT_ALIASES: Record<string, string> = {
  repository: 'repo',
  codeblock: 'code_block',
  code: 'code_block',
};

export function isRecord(v: unknown): v is JsonRecord {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function pick(record: JsonRecord, keys: readonly string[]): unknown {
  for (const key of keys) {
    const value = record[key];
    if (value !== undefined && value !== null) return value;
  }
  return undefined;
}

function asString(v: unknown): string | undefined {
  if (typeof v === 'string') return v;
  if (typeof v === 'number' && Number.isFinite(v)) return String(v);
  if (typeof v === 'boolean') return String(v);
  return undefined;
}

function asInt(v: unknown): number | undefined {
  const n = typeof v === 'number' ? v : typeof v === 'string' && v.trim() ? Number(v) : NaN;
  if (!Number.isFinite(n)) return undefined;
  return Math.trunc(n);
}

function asBoolean(v: unknown): boolean | undefined {
  if (typeof v === 'boolean') return v;
  if (v === 'true') return true;
  if (v === 'false') return false;
  return undefined;
}

function asStringList(v: unknown): string[] | undefined {
  if (typeof v === 'string') return [v];
  if (!Array.isArray(v)) return undefined;
  const out: string[] = [];
  for (const item of v) {
    const s = asString(item);
    if (s !== undefined) out.push(s);
  }
  return out;
}

function normalizeVariant(wire: string): string {
  const key = wire.trim().toLowerCase().replace(/[\s-]+/gu, '_');
  return VARIANT_ALIASES[key] ?? key;
}

function decodeVisualHint(raw: unknown): VisualHint | undefined {
  if (!isRecord(raw)) return undefined;
  return {
    icon: asString(pick(raw, ['icon'])),
    colorHex: asString(pick(raw, ['color', 'colorHex', 'color_hex'])),
    badge: asString(pick(raw, ['badge'])),
  };
}

function decodeConnections(raw: unknown): Connection[] | undefined {
  if (!Array.isArray(raw)) return undefined;
  const out: Connection[] = [];
  for (const item of raw) {
    if (!isRecord(item)) continue;
    const targetId = asString(pick(item, ['targetId', 'target_id', 'target']));
    if (!targetId) continue;
    out.push({
      targetId,
      label: asString(pick(item, ['label'])),
      isOutgoing: asBoolean(pick(item, ['isOutgoing', 'is_outgoing'])) ?? true,
    });
  }
  return out;
}

function decodePhaseMetadata(raw: unknown): PhaseMetadata | undefined {
  if (!isRecord(raw)) return undefined;
  const phaseId = asString(pick(raw, ['phaseId', 'phase_id']));
  if (phaseId === undefined) return undefined;
  return { phaseId, phasePurpose: asString(pick(raw, ['phasePurpose', 'phase_purpose'])) };
}

function decodeStepMetadata(raw: unknown): StepMetadata | undefined {
  if (!isRecord(raw)) return undefined;
  return {
    sourceNodeIds: asStringList(pick(raw, ['sourceNodes', 'source_nodes', 'sourceNodeIds', 'source_node_ids'])),
    targetNodeIds: asStringList(pick(raw, ['targetNodes', 'target_nodes', 'targetNodeIds', 'target_node_ids'])),
    processScript: asString(pick(raw, ['processScript', 'process_script'])),
    notes: asString(pick(raw, ['notes'])),
  };
}

function decodeFileMetadata(raw: unknown): FileMetadata | undefined {
  if (!isRecord(raw)) return undefined;
  return {
    filePath: asString(pick(raw, FILE_PATH_KEYS)),
    language: asString(pick(raw, ['language'])),
    sourceUrl: asString(pick(raw, SOURCE_URL_KEYS)),
    lineCount: asInt(pick(raw, ['lineCount', 'line_count'])),
  };
}

function decodeFunctionMetadata(raw: unknown): FunctionMetadata | undefined {
  if (!isRecord(raw)) return undefined;
  return {
    signature: asString(pick(raw, ['signature'])),
    lineStart: asInt(pick(raw, LINE_START_KEYS)),
    lineEnd: asInt(pick(raw, LINE_END_KEYS)),
    docstring: asString(pick(raw, ['docstring'])),
    sourceUrl: asString(pick(raw, SOURCE_URL_KEYS)),
  };
}

function decodeAnnotations(raw: unknown): CodeAnnotation[] | undefined {
  if (!Array.isArray(raw)) return undefined;
  const out: CodeAnnotation[] = [];
  for (const item of raw) {
    if (!isRecord(item)) continue;
    const line = asInt(pick(item, ['line']));
    const comment = asString(pick(item, ['comment']));
    if (line === undefined || comment === undefined) continue;
    out.push({ line, comment });
  }
  return out;
}

function decodeCodeMetadata(raw: unknown): CodeMetadata | undefined {
  if (!isRecord(raw)) return undefined;
  return {
    code: asString(pick(raw, ['code'])),
    language: asString(pick(raw, ['language'])),
    sourceUrl: asString(pick(raw, SOURCE_URL_KEYS)),
    filePath: asString(pick(raw, FILE_PATH_KEYS)),
    lineStart: asInt(pick(raw, LINE_START_KEYS)),
    lineEnd: asInt(pick(raw, LINE_END_KEYS)),
    annotations: decodeAnnotations(pick(raw, ['annotations'])),
  };
}

type ShellResult = { ok: true; node: InfographicNode } | { ok: false; reason: string };

/** Decodes a node without its children. */
function decodeNodeShell(raw: JsonRecord, path: string, issues: DecodeIssue[]): ShellResult {
  const id = asString(pick(raw, NODE_KEYS.id));
  if (!id) return { ok: false, reason: 'missing id' };
  const wireVariant = asString(pick(raw, NODE_KEYS.variant));
  if (wireVariant === undefined) return { ok: false, reason: 'missing type' };
  const label = asString(pick(raw, NODE_KEYS.label));
  if (label === undefined) return { ok: false, reason: 'missing label' };

  const children: InfographicNode[] = [];
  const base = {
    id,
    label,
    description: asString(pick(raw, NODE_KEYS.description)),
    children,
    visualHint: decodeVisualHint(pick(raw, NODE_KEYS.visualHint)),
    connections: decodeConnections(pick(raw, NODE_KEYS.connections)),
  };

  const variant = normalizeVariant(wireVariant);
  if (!isKnownVariant(variant)) {
    issues.push({ kind: 'unknown-variant', path, message: `Unknown node type "${wireVariant}" on node ${id}` });
    return { ok: true, node: { ...base, variant: 'unknown', wireVariant } };
  }

  switch (variant) {
    case 'repo':
      return { ok: true, node: { ...base, variant } };
    case 'phase':
      return { ok: true, node: { ...base, variant, metadata: decodePhaseMetadata(pick(raw, NODE_KEYS.phase)) } };
    case 'step':
      return { ok: true, node: { ...base, variant, metadata: decodeStepMetadata(pick(raw, NODE_KEYS.step)) } };
    case 'file':
      return { ok: true, node: { ...base, variant, metadata: decodeFileMetadata(pick(raw, NODE_KEYS.file)) } };
    case 'function':
      return { ok: true, node: { ...base, variant, metadata: decodeFunctionMetadata(pick(raw, NODE_KEYS.function)) } };
    case 'code_block':
      return { ok: true, node: { ...base, variant, metadata: decodeCodeMetadata(pick(raw, NODE_KEYS.code)) } };
  }
}

type TreeResult = { ok: true; root: InfographicNode } | { ok: false; error: DecodeError };

function decodeTree(rawRoot: JsonRecord, issues: DecodeIssue[]): TreeResult {
  const rootShell = decodeNodeShell(rawRoot, 'root', issues);
  if (!rootShell.ok) return { ok: false, error: new DecodeError(`Root node is invalid: ${rootShell.reason}`, 'root') };

  const stack: Array<{ node: InfographicNode; raw: JsonRecord; path: string }> = [
    { node: rootShell.node, raw: rawRoot, path: 'root' },
  ];
  const seenIds = new Set<string>();

  while (stack.length > 0) {
    const frame = stack.pop();
    if (!frame) break;

    if (seenIds.has(frame.node.id)) {
      issues.push({ kind: 'duplicate-id', path: frame.path, message: `Node id "${frame.node.id}" is used more than once` });
    } else {
      seenIds.add(frame.node.id);
    }

    const rawChildren = pick(frame.raw, ['children']);
    if (rawChildren === undefined) continue;
    if (!Array.isArray(rawChildren)) {
      return { ok: false, error: new DecodeError(`children of ${frame.path} is not an array`, frame.path) };
    }

    const pending: Array<{ node: InfographicNode; raw: JsonRecord; path: string }> = [];
    for (let index = 0; index < rawChildren.length; index += 1) {
      const rawChild: unknown = rawChildren[index];
      const childPath = `${frame.path}.children[${index}]`;
      if (!isRecord(rawChild)) {
        return { ok: false, error: new DecodeError(`${childPath} is not a node object`, childPath) };
      }
      const shell = decodeNodeShell(rawChild, childPath, issues);
      if (!shell.ok) {
        issues.push({ kind: 'dropped-node', path: childPath, message: `Dropped node: ${shell.reason}` });
        continue;
      }
      frame.node.children.push(shell.node);
      pending.push({ node: shell.node, raw: rawChild, path: childPath });
    }

    for (let i = pending.length - 1; i >= 0; i -= 1) {
      const next = pending[i];
      if (next) stack.push(next);
    }
  }

  return { ok: true, root: rootShell.node };
}

function toRepoRoot(node: InfographicNode, issues: DecodeIssue[]): RepoNode {
  if (node.variant === 'repo') return node;
  const wire = node.variant === 'unknown' ? node.wireVariant : node.variant;
  issues.push({ kind: 'root-variant', path: 'root', message: `Root node type "${wire}" treated as repo` });
  return {
    id: node.id,
    label: node.label,
    description: node.description,
    children: node.children,
    visualHint: node.visualHint,
    connections: node.connections,
    variant: 'repo',
  };
}

function readDocumentString(
  raw: JsonRecord,
  keys: readonly string[],
  fallback: string,
  issues: DecodeIssue[],
): string {
  const value = asString(pick(raw, keys));
  if (value !== undefined) return value;
  issues.push({ kind: 'defaulted-field', path: keys[0] ?? '', message: `Missing ${keys[0]}, using "${fallback}"` });
  return fallback;
}

export function decodeInfographicValue(value: unknown): DecodeResult {
  if (!isRecord(value)) return { ok: false, error: new DecodeError('Document is not a JSON object') };

  const rawRoot = pick(value, ['root']);
  if (rawRoot === undefined) return { ok: false, error: new DecodeError('Document has no root node', 'root') };
  if (!isRecord(rawRoot)) return { ok: false, error: new DecodeError('root is not a node object', 'root') };

  const issues: DecodeIssue[] = [];
  const tree = decodeTree(rawRoot, issues);
  if (!tree.ok) return tree;
  const root = toRepoRoot(tree.root, issues);

  const document: InfographicDocument = {
    formatVersion: readDocumentString(value, DOCUMENT_KEYS.version, '', issues),
    schemaName: readDocumentString(value, DOCUMENT_KEYS.schema, DEFAULT_SCHEMA_NAME, issues),
    sourceLocator: readDocumentString(value, DOCUMENT_KEYS.locator, '', issues),
    displayName: readDocumentString(value, DOCUMENT_KEYS.name, root.label, issues),
    summary: asString(pick(value, DOCUMENT_KEYS.summary)),
    pipelineOverview: asString(pick(value, DOCUMENT_KEYS.overview)),
    generatedAt: readDocumentString(value, DOCUMENT_KEYS.generatedAt, '', issues),
    root,
  };
  return { ok: true, document, issues };
}

function parseJsonText(text: string): JsonParseResult {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    return { ok: false, error: new DecodeError(`Invalid JSON: ${message}`) };
  }
}

/** Parses JSON text, ignoring a leading byte order mark. */
export function parseJsonStrict(text: string): JsonParseResult {
  return parseJsonText(text.replace(/^\uFEFF/u, ''));
}

/**
 * Like parseJsonStrict, but text that fails to parse is retried on the slice
 * between the first "{" and the last "}". Generator replies sometimes wrap the
 * object in prose or markdown fences.
 */
export function parseJsonLenient(text: string): JsonParseResult {
  const trimmed = text.replace(/^\uFEFF/u, '');
  const direct = parseJsonText(trimmed);
  if (direct.ok) return direct;
  const start = trimmed.indexOf('{');
  const end = trimmed.lastIndexOf('}');
  if (start < 0 || end <= start) return direct;
  const sliced = parseJsonText(trimmed.slice(start, end + 1));
  return sliced.ok ? sliced : direct;
}

export function bytesToText(data: Uint8Array | ArrayBuffer): string | null {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(data);
  } catch {
    return null;
  }
}

export function decodeInfographic(data: Uint8Array | ArrayBuffer | string): DecodeResult {
  const text = typeof data === 'string' ? data : bytesToText(data);
  if (text === null) return { ok: false, error: new DecodeError('Data is not valid UTF-8 text') };
  const parsed = parseJsonStrict(text);
  if (!parsed.ok) return parsed;
  return decodeInfographicValue(parsed.value);
}
