import {
  decodeInfographicValue,
  GenerationError,
  isGenerationErrorKind,
  isRecord,
  type DecodeIssue,
  type GenerateResult,
  type GenerationErrorKind,
  type InfographicDocument,
} from '@repo-infographic/server/infographic';

export type SampleEntry = {
  name: string;
  displayName: string;
  sourceLocator: string;
};

export type LoadedDocument = {
  document: InfographicDocument;
  issues: DecodeIssue[];
};

export type LocalBuildResponse = LoadedDocument & {
  fileCount: number;
  skipped: string[];
  truncated: boolean;
};

export type LocalDirEntry = {
  name: string;
  relPath: string;
};

export type GeneratorHealthView = {
  state: 'ok' | 'unconfigured' | 'unreachable';
  url: string;
  message?: string;
};

export type GenerationJobStatus = 'running' | 'done' | 'error' | 'cancelled';

export type GenerationJobSnapshot = {
  jobId: string;
  status: GenerationJobStatus;
  stage: string;
  repoUrl: string;
  result?: unknown;
  error?: { kind: GenerationErrorKind; message: string; detail?: string };
};

/** Error carrying the gateway's `kind`, when it sent one. */
export class ApiError extends Error {
  status: number;
  kind?: string;

  constructor(message: string, status: number, kind?: string) {
    super(message);
    this.name = 'ApiError';
    this.status = status;
    this.kind = kind;
  }
}

/** The gateway's error kind when it is a known one; anything else failed in transit. */
export function errorKindOf(error: unknown): GenerationErrorKind {
  if (error instanceof ApiError && isGenerationErrorKind(error.kind)) return error.kind;
  return 'TransportFailure';
}

/**
 * Unwraps a gateway reply: `{ ok: true, ... }` is returned as a record,
 * anything else becomes an `ApiError`.
 */
export function readApiPayload(raw: string, status: number, what: string): Record<string, unknown> {
  let data: unknown;
  try {
    data = raw ? (JSON.parse(raw) as unknown) : null;
  } catch {
    throw new ApiError(status >= 400 ? raw || `HTTP ${status}` : `${what} returned malformed JSON`, status);
  }

  if (!isRecord(data)) throw new ApiError(`${what} returned an unexpected shape`, status);
  if (data.ok !== true) {
    const message = typeof data.error === 'string' ? data.error : `${what} failed (HTTP ${status})`;
    throw new ApiError(message, status, typeof data.kind === 'string' ? data.kind : undefined);
  }
  return data;
}

async function requestJson(url: string, what: string, init?: RequestInit): Promise<Record<string, unknown>> {
  const res = await fetch(url, init);
  const raw = await res.text();
  return readApiPayload(raw, res.status, what);
}

export function decodeDocumentPayload(value: unknown, what: string): LoadedDocument {
  const decoded = decodeInfographicValue(value);
  if (!decoded.ok) throw new ApiError(`${what}: ${decoded.error.message}`, 200, 'DecodeError');
  return { document: decoded.document, issues: decoded.issues };
}

export async function fetchSamples(): Promise<SampleEntry[]> {
  const data = await requestJson('/api/samples', 'samples');
  const samples = Array.isArray(data.samples) ? data.samples : [];
  const out: SampleEntry[] = [];
  for (const item of samples) {
    if (!isRecord(item) || typeof item.name !== 'string') continue;
    out.push({
      name: item.name,
      displayName: typeof item.displayName === 'string' ? item.displayName : item.name,
      sourceLocator: typeof item.sourceLocator === 'string' ? item.sourceLocator : '',
    });
  }
  return out;
}

export async function fetchSample(name: string): Promise<LoadedDocument> {
  const data = await requestJson(`/api/samples/${encodeURIComponent(name)}`, `sample ${name}`);
  return decodeDocumentPayload(data.document, `sample ${name}`);
}

export async function fetchLocalDirs(relPath?: string): Promise<{ cwd: string; entries: LocalDirEntry[] }> {
  const qs = new URLSearchParams();
  if (relPath) qs.set('path', relPath);
  const data = await requestJson(`/api/local/dirs${qs.toString() ? `?${qs.toString()}` : ''}`, 'local/dirs');
  const entries: LocalDirEntry[] = [];
  for (const item of Array.isArray(data.entries) ? data.entries : []) {
    if (isRecord(item) && typeof item.name === 'string' && typeof item.relPath === 'string') {
      entries.push({ name: item.name, relPath: item.relPath });
    }
  }
  return { cwd: typeof data.cwd === 'string' ? data.cwd : '', entries };
}

export async function buildServerDirectory(params: { path: string; name?: string; outline?: boolean }): Promise<LocalBuildResponse> {
  const data = await requestJson('/api/local', 'local build', {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(params),
  });
  const loaded = decodeDocumentPayload(data.document, 'local build');
  return {
    ...loaded,
    fileCount: typeof data.fileCount === 'number' ? data.fileCount : loaded.document.root.children.length,
    skipped: Array.isArray(data.skipped) ? data.skipped.filter((s): s is string => typeof s === 'string') : [],
    truncated: data.truncated === true,
  };
}

export function parseGeneratorHealth(data: Record<string, unknown>): GeneratorHealthView {
  const gen = isRecord(data.generator) ? data.generator : {};
  const state = gen.state === 'ok' || gen.state === 'unconfigured' ? gen.state : 'unreachable';
  return {
    state,
    url: typeof gen.url === 'string' ? gen.url : '',
    message: typeof gen.message === 'string' ? gen.message : undefined,
  };
}

export async function fetchHealth(): Promise<GeneratorHealthView> {
  return parseGeneratorHealth(await requestJson('/api/health', 'health'));
}

export function parseJobSnapshot(value: unknown): GenerationJobSnapshot | null {
  if (!isRecord(value)) return null;
  const { jobId, status, stage, repoUrl } = value;
  if (typeof jobId !== 'string') return null;
  if (status !== 'running' && status !== 'done' && status !== 'error' && status !== 'cancelled') return null;

  let error: GenerationJobSnapshot['error'];
  if (isRecord(value.error)) {
    const kind = isGenerationErrorKind(value.error.kind) ? value.error.kind : 'ServerError';
    error = {
      kind,
      message: typeof value.error.message === 'string' ? value.error.message : 'Generation failed',
      detail: typeof value.error.detail === 'string' ? value.error.detail : undefined,
    };
  }

  return {
    jobId,
    status,
    stage: typeof stage === 'string' ? stage : '',
    repoUrl: typeof repoUrl === 'string' ? repoUrl : '',
    result: value.result,
    error,
  };
}

/** Terminal snapshot to the generation result it carries; null while running. */
export function jobSnapshotToResult(snapshot: GenerationJobSnapshot): GenerateResult | null {
  if (snapshot.status === 'running') return null;
  if (snapshot.status === 'cancelled') return { ok: false, error: new GenerationError('Cancelled') };
  if (snapshot.status === 'error') {
    const kind = snapshot.error?.kind ?? 'ServerError';
    return { ok: false, error: new GenerationError(kind, snapshot.error?.detail) };
  }
  const decoded = decodeInfographicValue(snapshot.result);
  if (!decoded.ok) return { ok: false, error: new GenerationError('DecodeError', decoded.error.message) };
  return { ok: true, document: decoded.document, issues: decoded.issues };
}

export async function startGenerationJob(repoUrl: string): Promise<{ jobId: string }> {
  const data = await requestJson('/api/infographic/jobs', 'infographic/jobs', {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify({ repo_url: repoUrl }),
  });
  const jobId = typeof data.jobId === 'string' ? data.jobId : '';
  if (!jobId) throw new ApiError('infographic/jobs returned an empty jobId', 200);
  return { jobId };
}

export async function cancelGenerationJob(jobId: string): Promise<void> {
  await requestJson(`/api/infographic/jobs/${encodeURIComponent(jobId)}`, 'cancel job', { method: 'DELETE' });
}

export function openGenerationJobEvents(
  jobId: string,
  onSnapshot: (s: GenerationJobSnapshot) => void,
  onFatalError: (message: string) => void,
): EventSource {
  const es = new EventSource(`/api/infographic/jobs/${encodeURIComponent(jobId)}/events`);
  let closed = false;

  const close = () => {
    if (closed) return;
    closed = true;
    es.close();
  };

  es.onmessage = (evt: MessageEvent<string>) => {
    let parsed: unknown;
    try {
      parsed = JSON.parse(evt.data) as unknown;
    } catch (error) {
      close();
      onFatalError(`progress event is not JSON: ${error instanceof Error ? error.message : String(error)}`);
      return;
    }
    const snapshot = parseJobSnapshot(parsed);
    if (!snapshot) return;
    if (snapshot.status !== 'running') close();
    onSnapshot(snapshot);
  };

  es.onerror = () => {
    if (closed) return;
    close();
    onFatalError('progress connection failed or was interrupted');
  };

  return es;
}

/**
 * Runs one generation through the gateway's job API and resolves with its
 * result. Aborting `signal` cancels the job on the gateway.
 */
export function runGenerationJob(
  repoUrl: string,
  signal: AbortSignal,
  onStage: (stage: string) => void,
): Promise<GenerateResult> {
  return new Promise<GenerateResult>((resolve) => {
    let es: EventSource | null = null;
    let jobId: string | null = null;
    let settled = false;

    const finish = (result: GenerateResult) => {
      if (settled) return;
      settled = true;
      es?.close();
      signal.removeEventListener('abort', onAbort);
      resolve(result);
    };

    const onAbort = () => {
      if (jobId) {
        cancelGenerationJob(jobId).catch((error: unknown) => {
          console.warn(`[generate] cancel failed: ${error instanceof Error ? error.message : String(error)}`);
        });
      }
      finish({ ok: false, error: new GenerationError('Cancelled') });
    };

    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });

    startGenerationJob(repoUrl).then(
      (started) => {
        jobId = started.jobId;
        if (settled) {
          onAbort();
          return;
        }
        es = openGenerationJobEvents(
          started.jobId,
          (snapshot) => {
            onStage(snapshot.stage);
            const result = jobSnapshotToResult(snapshot);
            if (result) finish(result);
          },
          (message) => finish({ ok: false, error: new GenerationError('TransportFailure', message) }),
        );
      },
      (error: unknown) => {
        if (error instanceof ApiError && error.kind && isGenerationErrorKind(error.kind)) {
          finish({ ok: false, error: new GenerationError(error.kind, error.message) });
          return;
        }
        finish({ ok: false, error: new GenerationError('TransportFailure', error instanceof Error ? error.message : String(error)) });
      },
    );
  });
}
