import { describe, expect, it } from 'vitest';

import { ExpansionState } from '../src/infographic/expansion.js';
import { flattenRenderedTree, renderDocumentBody } from '../src/infographic/render.js';
import type { InfographicDocument } from '../src/infographic/types.js';

function pipeline(): InfographicDocument {
  return {
    formatVersion: '2.0',
    schemaName: 'interactive-infographic',
    sourceLocator: 'https://github.com/acme/widgets',
    displayName: 'widgets',
    generatedAt: '',
    root: {
      id: 'root',
      variant: 'repo',
      label: 'widgets',
      children: [
        {
          id: 'p1',
          variant: 'phase',
          label: 'Load',
          metadata: { phaseId: '1', phasePurpose: 'Read input' },
          children: [
            {
              id: 's1',
              variant: 'step',
              label: 'Parse',
              metadata: { sourceNodeIds: ['f1', 'ghost'] },
              connections: [{ targetId: 'f1', label: 'reads', isOutgoing: true }],
              children: [],
            },
            {
              id: 'f1',
              variant: 'file',
              label: 'a.ts',
              metadata: { filePath: 'src/a.ts', lineCount: 12, sourceUrl: 'https://github.com/acme/widgets/blob/main/src/a.ts' },
              children: [
                {
                  id: 'c1',
                  variant: 'code_block',
                  label: 'snippet',
                  metadata: { code: 'load();', language: 'TypeScript', lineStart: 4, lineEnd: 4, annotations: [{ line: 1, comment: 'entry' }] },
                  children: [{ id: 'hidden', variant: 'step', label: 'never shown', children: [] }],
                },
              ],
            },
          ],
        },
        { id: 'p2', variant: 'phase', label: 'Empty', children: [] },
      ],
    },
  };
}

describe('renderDocumentBody', () => {
  it('renders the same rows after toggling an id that is not in the document', () => {
    const doc = pipeline();
    const state = new ExpansionState(['p1']);
    const before = renderDocumentBody(doc, state);
    state.toggle('ghost');
    expect(renderDocumentBody(doc, state)).toEqual(before);
  });

  it('shows only the root children while collapsed', () => {
    const body = renderDocumentBody(pipeline(), new ExpansionState());
    expect(body.map((n) => [n.id, n.depth, n.expandable, n.expanded, n.childCount])).toEqual([
      ['p1', 0, true, false, 2],
      ['p2', 0, false, false, 0],
    ]);
    expect(body[0]?.typeLabel).toBe('PHASE');
    expect(body[0]?.details).toEqual([]);
    expect(body[0]?.content).toBeNull();
  });

  it('shows metadata and children of expanded nodes', () => {
    const body = renderDocumentBody(pipeline(), new ExpansionState(['p1', 's1']));
    const p1 = body[0];
    expect(p1?.details).toEqual([{ kind: 'text', label: 'Purpose', value: 'Read input' }]);
    expect(flattenRenderedTree(body).map((n) => `${n.id}@${n.depth}`)).toEqual(['p1@0', 's1@1', 'f1@1', 'p2@0']);

    const s1 = flattenRenderedTree(body).find((n) => n.id === 's1');
    expect(s1?.details).toEqual([
      {
        kind: 'references',
        label: 'Inputs',
        references: [
          { id: 'f1', label: 'a.ts', resolved: true },
          { id: 'ghost', label: 'ghost', resolved: false },
        ],
      },
      {
        kind: 'connections',
        connections: [{ id: 'f1', label: 'a.ts', resolved: true, edgeLabel: 'reads', isOutgoing: true }],
      },
    ]);
  });

  it('keeps descendants hidden under a collapsed ancestor', () => {
    const body = renderDocumentBody(pipeline(), new ExpansionState(['p1', 'c1']));
    expect(flattenRenderedTree(body).map((n) => n.id)).toEqual(['p1', 's1', 'f1', 'p2']);
  });

  it('shows code instead of children for an expanded code block', () => {
    const body = renderDocumentBody(pipeline(), new ExpansionState(['p1', 'f1', 'c1']));
    const rows = flattenRenderedTree(body);
    expect(rows.map((n) => n.id)).toEqual(['p1', 's1', 'f1', 'c1', 'p2']);

    const f1 = rows.find((n) => n.id === 'f1');
    expect(f1?.details).toEqual([
      { kind: 'text', label: 'Path', value: 'src/a.ts' },
      { kind: 'text', label: 'Lines', value: '12' },
      { kind: 'link', label: 'View source', href: 'https://github.com/acme/widgets/blob/main/src/a.ts' },
    ]);

    const c1 = rows.find((n) => n.id === 'c1');
    expect(c1?.depth).toBe(2);
    expect(c1?.typeLabel).toBe('CODE');
    expect(c1?.content).toEqual({
      kind: 'code',
      code: 'load();',
      language: 'TypeScript',
      lineStart: 4,
      sourceUrl: undefined,
      annotations: [{ line: 1, comment: 'entry' }],
    });
    expect(c1?.details).toEqual([
      { kind: 'text', label: 'Language', value: 'TypeScript' },
      { kind: 'text', label: 'Lines', value: '4-4' },
    ]);
  });

  it('marks an empty code block as expandable', () => {
    const doc = pipeline();
    doc.root.children.push({ id: 'bare', variant: 'code_block', label: 'bare', children: [] });
    const body = renderDocumentBody(doc, new ExpansionState(['bare']));
    expect(body[2]?.expandable).toBe(true);
    expect(body[2]?.content).toEqual({
      kind: 'code',
      code: undefined,
      language: undefined,
      lineStart: undefined,
      sourceUrl: undefined,
      annotations: [],
    });
  });
});
