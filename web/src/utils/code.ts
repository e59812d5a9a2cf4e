import type { CodeAnnotation } from '@repo-infographic/server/infographic';

export type CodeLine = {
  /** 1-based line number as displayed. */
  number: number;
  text: string;
  notes: string[];
};

/**
 * Splits `code` into numbered lines starting at `firstLine`. Annotation lines
 * count from 1 inside the block; notes for lines past the end are dropped.
 */
export function annotateCode(code: string, annotations: readonly CodeAnnotation[], firstLine = 1): CodeLine[] {
  const lines = code.replace(/\r\n/gu, '\n').split('\n');
  const notesByIndex = new Map<number, string[]>();
  for (const a of annotations) {
    const index = a.line - 1;
    if (index < 0 || index >= lines.length) continue;
    const list = notesByIndex.get(index) ?? [];
    list.push(a.comment);
    notesByIndex.set(index, list);
  }
  return lines.map((text, index) => ({ number: firstLine + index, text, notes: notesByIndex.get(index) ?? [] }));
}
