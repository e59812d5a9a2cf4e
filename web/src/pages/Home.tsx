import { useEffect, useState } from 'react';
import { useNavigate } from 'react-router-dom';
import { buildLocal, loadFromBytes, summarizeDocument, type DecodeIssue, type LocalFile } from '@repo-infographic/server/infographic';

import {
  buildServerDirectory,
  errorKindOf,
  fetchHealth,
  fetchLocalDirs,
  fetchSample,
  fetchSamples,
  type GeneratorHealthView,
  type LocalDirEntry,
  type SampleEntry,
} from '../api';
import { useInfographicSession } from '../infographicContext';

type SamplesState =
  | { state: 'loading' }
  | { state: 'ready'; samples: SampleEntry[] }
  | { state: 'error'; message: string };

type HealthState = { state: 'loading' } | { state: 'ready'; health: GeneratorHealthView } | { state: 'error'; message: string };

type DirPickerState = { open: false } | { open: true; cwd: string };

type DirPickerDirsState =
  | { state: 'idle' }
  | { state: 'loading' }
  | { state: 'ready'; entries: LocalDirEntry[] }
  | { state: 'error'; message: string };

function errorText(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

function healthText(health: HealthState): string {
  if (health.state === 'loading') return 'Checking generator…';
  if (health.state === 'error') return `Gateway unreachable: ${health.message}`;
  const h = health.health;
  if (h.state === 'ok') return `Generator ready (${h.url})`;
  if (h.state === 'unconfigured') return `Generator has no API key configured (${h.url})`;
  return `Generator unreachable${h.message ? `: ${h.message}` : ''}`;
}

export function HomePage() {
  const navigate = useNavigate();
  const { session, snapshot } = useInfographicSession();

  const [repoUrl, setRepoUrl] = useState('');
  const [projectName, setProjectName] = useState('');
  const [outline, setOutline] = useState(true);
  const [notice, setNotice] = useState('');
  const [samples, setSamples] = useState<SamplesState>({ state: 'loading' });
  const [health, setHealth] = useState<HealthState>({ state: 'loading' });
  const [dirPicker, setDirPicker] = useState<DirPickerState>({ open: false });
  const [dirPickerDirs, setDirPickerDirs] = useState<DirPickerDirsState>({ state: 'idle' });

  useEffect(() => {
    let cancelled = false;
    fetchSamples().then(
      (list) => {
        if (!cancelled) setSamples({ state: 'ready', samples: list });
      },
      (e: unknown) => {
        if (!cancelled) setSamples({ state: 'error', message: errorText(e) });
      },
    );
    fetchHealth().then(
      (h) => {
        if (!cancelled) setHealth({ state: 'ready', health: h });
      },
      (e: unknown) => {
        if (!cancelled) setHealth({ state: 'error', message: errorText(e) });
      },
    );
    return () => {
      cancelled = true;
    };
  }, []);

  useEffect(() => {
    if (!dirPicker.open) return;
    let cancelled = false;
    setDirPickerDirs({ state: 'loading' });
    fetchLocalDirs(dirPicker.cwd).then(
      (res) => {
        if (!cancelled) setDirPickerDirs({ state: 'ready', entries: res.entries });
      },
      (e: unknown) => {
        if (!cancelled) setDirPickerDirs({ state: 'error', message: errorText(e) });
      },
    );
    return () => {
      cancelled = true;
    };
  }, [dirPicker]);

  function reportIssues(issues: DecodeIssue[]) {
    setNotice(issues.length > 0 ? `Loaded with ${issues.length} skipped or adjusted entries` : '');
  }

  async function onOpenSample(name: string) {
    try {
      const loaded = await fetchSample(name);
      session.load(loaded.document, loaded.issues);
      reportIssues(loaded.issues);
      navigate('/viewer');
    } catch (e) {
      session.fail(errorText(e), errorKindOf(e));
    }
  }

  async function onImportJson(files: FileList | null) {
    const file = files?.[0];
    if (!file) return;
    let data: ArrayBuffer;
    try {
      data = await file.arrayBuffer();
    } catch (e) {
      session.fail(`Cannot read ${file.name}: ${errorText(e)}`);
      return;
    }
    let issues: DecodeIssue[] = [];
    const document = loadFromBytes(data, {
      onIssues: (found) => {
        issues = found;
      },
    });
    if (!document) {
      session.fail(`${file.name} is not a valid infographic`, 'DecodeError');
      return;
    }
    session.load(document, issues);
    reportIssues(issues);
    navigate('/viewer');
  }

  async function onImportLocalFiles(files: FileList | null) {
    if (!files || files.length === 0) return;
    const picked: LocalFile[] = [];
    try {
      for (const file of Array.from(files)) {
        picked.push({ path: file.webkitRelativePath || file.name, content: await file.text() });
      }
    } catch (e) {
      session.fail(`Cannot read local files: ${errorText(e)}`);
      return;
    }
    const name = projectName.trim() || 'Local project';
    session.load(buildLocal(name, picked));
    setNotice('');
    navigate('/viewer');
  }

  async function onBuildServerDirectory(relPath: string) {
    setDirPicker({ open: false });
    try {
      const built = await buildServerDirectory({ path: relPath, name: projectName.trim() || undefined, outline });
      session.load(built.document, built.issues);
      setNotice(
        built.skipped.length > 0 || built.truncated
          ? `Built from ${built.fileCount} files (${built.skipped.length} skipped${built.truncated ? ', listing truncated' : ''})`
          : '',
      );
      navigate('/viewer');
    } catch (e) {
      session.fail(errorText(e));
    }
  }

  async function onGenerate() {
    const outcome = await session.generate(repoUrl);
    if (outcome === 'applied') {
      setNotice('');
      navigate('/viewer');
    }
  }

  const summary = snapshot.document ? summarizeDocument(snapshot.document) : null;
  const pending = snapshot.pending;

  return (
    <div className="page">
      <h1 className="title">Repository Infographics</h1>

      <div className="form">
        <label className="field">
          <div className="label" title="Repository URL, e.g. https://github.com/owner/repo">
            Repository URL
          </div>
          <div className="pathRow">
            <input
              className="input"
              value={repoUrl}
              placeholder="https://github.com/owner/repo"
              onChange={(e) => setRepoUrl(e.target.value)}
            />
            <button className="button primary" type="button" onClick={() => void onGenerate()} disabled={!repoUrl.trim()}>
              Generate
            </button>
            {pending && (
              <button className="button" type="button" onClick={() => session.cancelGeneration()}>
                Cancel
              </button>
            )}
          </div>
          <div className="status">{healthText(health)}</div>
        </label>

        {pending && (
          <div className="status" aria-live="polite">
            {pending.locator}: {pending.stage}
          </div>
        )}
        {snapshot.error && (
          <div className="status error" role="alert">
            {snapshot.error.message}{' '}
            <button className="linkButton" type="button" onClick={() => session.dismissError()}>
              Dismiss
            </button>
          </div>
        )}
        {notice && <div className="status warning">{notice}</div>}

        <div className="field">
          <div className="label">Samples</div>
          {samples.state === 'loading' && <div className="status">Loading samples…</div>}
          {samples.state === 'error' && <div className="status error">Cannot load samples: {samples.message}</div>}
          {samples.state === 'ready' && samples.samples.length === 0 && <div className="status">(no samples)</div>}
          {samples.state === 'ready' && samples.samples.length > 0 && (
            <div className="dirList">
              {samples.samples.map((s) => (
                <button key={s.name} className="dirItem" type="button" onClick={() => void onOpenSample(s.name)} title={s.sourceLocator}>
                  {s.displayName}
                </button>
              ))}
            </div>
          )}
        </div>

        <label className="field">
          <div className="label">Import infographic JSON</div>
          <input className="input" type="file" accept=".json,application/json" onChange={(e) => void onImportJson(e.target.files)} />
        </label>

        <label className="field">
          <div className="label" title="Used for local builds; defaults to the folder name">
            Project name
          </div>
          <input className="input" value={projectName} onChange={(e) => setProjectName(e.target.value)} />
        </label>

        <label className="field">
          <div className="label">Build from local files</div>
          <input className="input" type="file" multiple onChange={(e) => void onImportLocalFiles(e.target.files)} />
        </label>

        <div className="actions">
          <button className="button" type="button" onClick={() => setDirPicker({ open: true, cwd: '' })}>
            Build from server directory
          </button>
          <label className="checkbox">
            <input type="checkbox" checked={outline} onChange={(e) => setOutline(e.target.checked)} /> Outline functions
          </label>
        </div>

        {summary && (
          <div className="card">
            <div className="cardTitle">{summary.displayName}</div>
            <div className="cardMeta">{summary.sourceLocator}</div>
            <div className="cardMeta">
              {summary.phaseCount} phases · {summary.nodeCount} nodes · depth {summary.depth}
            </div>
            {summary.pipelineOverview && <p>{summary.pipelineOverview}</p>}
            <button className="button primary" type="button" onClick={() => navigate('/viewer')}>
              Open viewer
            </button>
          </div>
        )}
      </div>

      {dirPicker.open && (
        <div
          className="modalOverlay"
          role="presentation"
          onMouseDown={(e) => {
            if (e.target === e.currentTarget) setDirPicker({ open: false });
          }}
        >
          <div className="modal" role="dialog" aria-modal="true" aria-label="Choose directory">
            <div className="modalHeader">
              <div className="modalTitle">Choose a directory</div>
              <button className="button" type="button" onClick={() => setDirPicker({ open: false })}>
                Close
              </button>
            </div>

            <div className="modalBody">
              <div className="pickerBar">
                <button
                  className="button"
                  type="button"
                  disabled={!dirPicker.cwd}
                  onClick={() => {
                    const parts = dirPicker.cwd.split('/').filter(Boolean);
                    parts.pop();
                    setDirPicker({ open: true, cwd: parts.join('/') });
                  }}
                >
                  Up
                </button>
                <div className="pickerPath">/{dirPicker.cwd}</div>
              </div>

              {dirPickerDirs.state === 'loading' && <div className="status">Loading…</div>}
              {dirPickerDirs.state === 'error' && <div className="status error">Cannot list directory: {dirPickerDirs.message}</div>}
              {dirPickerDirs.state === 'ready' && dirPickerDirs.entries.length === 0 && (
                <div className="status">(no subdirectories)</div>
              )}
              {dirPickerDirs.state === 'ready' && dirPickerDirs.entries.length > 0 && (
                <div className="dirList">
                  {dirPickerDirs.entries.map((d) => (
                    <button
                      key={d.relPath}
                      className="dirItem"
                      type="button"
                      onClick={() => setDirPicker({ open: true, cwd: d.relPath })}
                      title={d.relPath}
                    >
                      {d.name}/
                    </button>
                  ))}
                </div>
              )}
            </div>

            <div className="modalFooter">
              <button className="button primary" type="button" onClick={() => void onBuildServerDirectory(dirPicker.cwd)}>
                Build this directory
              </button>
              <button className="button" type="button" onClick={() => setDirPicker({ open: false })}>
                Cancel
              </button>
            </div>
          </div>
        </div>
      )}
    </div>
  );
}
