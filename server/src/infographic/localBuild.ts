import { DEFAULT_SCHEMA_NAME, type FileNode, type InfographicDocument, type InfographicNode } from './types.js';

export type LocalFile = {
  path: string;
  content: string;
};

export type BuildLocalOptions = {
  now?: () => Date;
  /** Extra children for the file node built from `file`; ids must be unique across the document. */
  outline?: (file: LocalFile, fileNodeId: string) => InfographicNode[];
};

const LANGUAGE_BY_EXTENSION: Record<string, string> = {
  swift: 'Swift',
  ts: 'TypeScript',
  tsx: 'TypeScript',
  js: 'JavaScript',
  jsx: 'JavaScript',
  py: 'Python',
  rb: 'Ruby',
  go: 'Go',
  rs: 'Rust',
  java: 'Java',
  kt: 'Kotlin',
  cpp: 'C++',
  cc: 'C++',
  cxx: 'C++',
  c: 'C',
  h: 'Header',
  hpp: 'Header',
  json: 'JSON',
  yaml: 'YAML',
  yml: 'YAML',
  md: 'Markdown',
  css: 'CSS',
  html: 'HTML',
};

export function fileExtension(filePath: string): string {
  const base = filePath.split(/[\\/]/u).pop() ?? '';
  const dot = base.lastIndexOf('.');
  if (dot <= 0) return '';
  return base.slice(dot + 1).toLowerCase();
}

export function detectLanguage(filePath: string): string {
  const ext = fileExtension(filePath);
  if (!ext) return 'Unknown';
  return LANGUAGE_BY_EXTENSION[ext] ?? ext.toUpperCase();
}

export function countLines(content: string): number {
  return content.split('\n').length;
}

function buildFileNode(file: LocalFile, index: number, options: BuildLocalOptions): FileNode {
  const id = `file-${index}`;
  return {
    id,
    variant: 'file',
    label: file.path,
    description: 'Source file',
    children: options.outline ? options.outline(file, id) : [],
    visualHint: { icon: 'doc.text', colorHex: '#D29922' },
    metadata: {
      filePath: file.path,
      language: detectLanguage(file.path),
      lineCount: countLines(file.content),
    },
  };
}

/** One "Source Files" phase with a file node per input, in input order. */
export function buildLocal(
  projectName: string,
  files: readonly LocalFile[],
  options: BuildLocalOptions = {},
): InfographicDocument {
  const now = options.now ?? (() => new Date());
  const fileNodes = files.map((file, index) => buildFileNode(file, index, options));

  return {
    formatVersion: '2.0',
    schemaName: DEFAULT_SCHEMA_NAME,
    sourceLocator: `local://${projectName}`,
    displayName: projectName,
    summary: 'Locally generated infographic',
    pipelineOverview: 'Simple file listing',
    generatedAt: now().toISOString(),
    root: {
      id: 'root',
      variant: 'repo',
      label: projectName,
      description: 'Project structure',
      visualHint: { icon: 'folder.fill', colorHex: '#58A6FF' },
      children: [
        {
          id: 'phase-1',
          variant: 'phase',
          label: 'Source Files',
          description: 'All project files',
          visualHint: { icon: 'folder', colorHex: '#A371F7' },
          metadata: { phaseId: '1', phasePurpose: 'Contains all source files' },
          children: fileNodes,
        },
      ],
    },
  };
}
