import { buildLocal, GenerationError, type GenerateResult, type InfographicDocument } from '@repo-infographic/server/infographic';
import { describe, expect, it } from 'vitest';

import { InfographicSession, type GenerateRunner } from '../src/session';

const now = () => new Date('2026-01-01T00:00:00.000Z');
const loaded = buildLocal('Loaded', [{ path: 'a.ts', content: 'x' }], { now });
const generated = buildLocal('Generated', [{ path: 'b.ts', content: 'y' }], { now });

function ok(document: InfographicDocument): GenerateResult {
  return { ok: true, document, issues: [] };
}

// A runner whose reply the test hands out later.
function manualRunner() {
  const calls: Array<{ locator: string; signal: AbortSignal; onStage: (stage: string) => void; reply: (r: GenerateResult) => void }> = [];
  const runner: GenerateRunner = (locator, signal, onStage) =>
    new Promise<GenerateResult>((resolve) => {
      calls.push({ locator, signal, onStage, reply: resolve });
    });
  return { runner, calls };
}

describe('InfographicSession', () => {
  it('loads a document collapsed and toggles rows', () => {
    const session = new InfographicSession();
    let notified = 0;
    session.subscribe(() => {
      notified += 1;
    });

    session.load(loaded);
    const first = session.getSnapshot();
    expect(first.document).toBe(loaded);
    expect(first.body.map((r) => [r.id, r.expanded])).toEqual([['phase-1', false]]);

    expect(session.toggle('phase-1')).toBe(true);
    const second = session.getSnapshot();
    expect(second.expandedCount).toBe(1);
    expect(second.body[0]?.content).toMatchObject({ kind: 'children' });
    expect(notified).toBe(2);
    expect(first).not.toBe(second);
  });

  it('expands everything and reveals a nested node', () => {
    const session = new InfographicSession();
    session.load(loaded);
    session.expandAll();
    expect(session.getSnapshot().expandedCount).toBe(3);
    session.collapseAll();
    expect(session.reveal('file-0')).toBe(true);
    expect(session.isExpanded('phase-1')).toBe(true);
    expect(session.isExpanded('file-0')).toBe(false);
    expect(session.reveal('nowhere')).toBe(false);
  });

  it('applies a generated document and reports progress', async () => {
    const { runner, calls } = manualRunner();
    const session = new InfographicSession(runner);

    const outcome = session.generate('github.com/acme/widgets');
    expect(session.getSnapshot().pending).toEqual({ token: 1, locator: 'github.com/acme/widgets', stage: 'Starting' });
    calls[0]?.onStage('Analyzing');
    expect(session.getSnapshot().pending?.stage).toBe('Analyzing');

    calls[0]?.reply(ok(generated));
    expect(await outcome).toBe('applied');
    expect(session.getSnapshot().document).toBe(generated);
    expect(session.getSnapshot().pending).toBeNull();
  });

  it('keeps the current document when generation fails', async () => {
    const session = new InfographicSession(async () => ({ ok: false, error: new GenerationError('ServerError', 'boom') }));
    session.load(loaded);
    expect(await session.generate('github.com/acme/widgets')).toBe('failed');
    const snapshot = session.getSnapshot();
    expect(snapshot.document).toBe(loaded);
    expect(snapshot.error).toEqual({ message: 'Server error: boom', kind: 'ServerError' });

    session.dismissError();
    expect(session.getSnapshot().error).toBeNull();
  });

  it('reports a throwing runner as a transport failure', async () => {
    const session = new InfographicSession(() => Promise.reject(new Error('offline')));
    expect(await session.generate('github.com/acme/widgets')).toBe('failed');
    expect(session.getSnapshot().error).toEqual({ message: 'Network error: offline', kind: 'TransportFailure' });
  });

  it('ignores the reply of a superseded request', async () => {
    const { runner, calls } = manualRunner();
    const session = new InfographicSession(runner);

    const first = session.generate('github.com/acme/one');
    const second = session.generate('github.com/acme/two');
    expect(calls[0]?.signal.aborted).toBe(true);

    calls[1]?.reply(ok(generated));
    calls[0]?.reply(ok(loaded));
    expect(await second).toBe('applied');
    expect(await first).toBe('stale');
    expect(session.getSnapshot().document).toBe(generated);
  });

  it('drops a late reply after loading another document', async () => {
    const { runner, calls } = manualRunner();
    const session = new InfographicSession(runner);

    const pending = session.generate('github.com/acme/widgets');
    session.load(loaded);
    expect(calls[0]?.signal.aborted).toBe(true);
    expect(session.getSnapshot().pending).toBeNull();

    calls[0]?.reply(ok(generated));
    expect(await pending).toBe('stale');
    expect(session.getSnapshot().document).toBe(loaded);
  });

  it('cancels the running generation', async () => {
    const { runner, calls } = manualRunner();
    const session = new InfographicSession(runner);
    expect(session.cancelGeneration()).toBe(false);

    const pending = session.generate('github.com/acme/widgets');
    expect(session.cancelGeneration()).toBe(true);
    expect(calls[0]?.signal.aborted).toBe(true);

    calls[0]?.reply({ ok: false, error: new GenerationError('Cancelled') });
    expect(await pending).toBe('stale');
    expect(session.getSnapshot().error).toBeNull();
    expect(session.getSnapshot().document).toBeNull();
  });

  it('treats a cancelled result for the current request as quiet', () => {
    const session = new InfographicSession();
    const { token } = session.beginGeneration('github.com/acme/widgets');
    expect(session.completeGeneration(token, { ok: false, error: new GenerationError('Cancelled') })).toBe('cancelled');
    expect(session.getSnapshot().error).toBeNull();
    expect(session.completeGeneration(token, ok(generated))).toBe('stale');
  });

  it('needs a runner to generate', async () => {
    await expect(new InfographicSession().generate('github.com/acme/widgets')).rejects.toThrow(
      'InfographicSession has no generation runner',
    );
  });
});
