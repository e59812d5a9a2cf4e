import { randomUUID } from 'node:crypto';

import {
  encodeInfographic,
  GenerationError,
  type GenerateResult,
  type GenerationErrorKind,
  type WireObject,
} from './infographic/index.js';

export type GenerationJobStatus = 'running' | 'done' | 'error' | 'cancelled';

export type GenerationJobSnapshot = {
  jobId: string;
  status: GenerationJobStatus;
  stage: string;
  repoUrl: string;
  startedAt: string;
  finishedAt?: string;
  /** Wire form of the generated document. */
  result?: WireObject;
  issueCount?: number;
  error?: { kind: GenerationErrorKind; message: string; detail?: string };
};

/** The part of an SSE response the manager writes to. */
export type JobSubscriber = {
  write(chunk: string): unknown;
  end(): unknown;
};

export type GenerateFn = (repoUrl: string, signal: AbortSignal) => Promise<GenerateResult>;

type GenerationJobInternal = {
  snapshot: GenerationJobSnapshot;
  subscribers: Set<JobSubscriber>;
  controller: AbortController;
  updatedAt: number;
};

export const JOB_TTL_MS = 60 * 60 * 1000;

export function toSseDataLine(snapshot: GenerationJobSnapshot): string {
  return `data: ${JSON.stringify(snapshot)}\n\n`;
}

export type GenerationJobManagerOptions = {
  ttlMs?: number;
  now?: () => number;
  /** 0 disables the periodic sweep; tests call `cleanup()` directly. */
  sweepIntervalMs?: number;
};

export class GenerationJobManager {
  private jobs = new Map<string, GenerationJobInternal>();
  private pending = new Map<string, Promise<void>>();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(
    private readonly generate: GenerateFn,
    options: GenerationJobManagerOptions = {},
  ) {
    this.ttlMs = options.ttlMs ?? JOB_TTL_MS;
    this.now = options.now ?? Date.now;
    const sweep = options.sweepIntervalMs ?? 5 * 60 * 1000;
    if (sweep > 0) setInterval(() => this.cleanup(), sweep).unref();
  }

  get size(): number {
    return this.jobs.size;
  }

  /** Starts generating in the background; the returned snapshot is `running`. */
  startJob(repoUrl: string): GenerationJobSnapshot {
    const jobId = randomUUID();
    const snapshot: GenerationJobSnapshot = {
      jobId,
      status: 'running',
      stage: 'Generating infographic',
      repoUrl,
      startedAt: new Date(this.now()).toISOString(),
    };
    const controller = new AbortController();
    this.jobs.set(jobId, { snapshot, subscribers: new Set(), controller, updatedAt: this.now() });
    console.log(`[jobs] ${jobId} started for ${repoUrl}`);

    void this.run(jobId, repoUrl, controller.signal);
    return { ...snapshot };
  }

  /** Settles when the job leaves `running`; resolves immediately for an unknown id. */
  async waitFor(jobId: string): Promise<GenerationJobSnapshot | null> {
    const pending = this.pending.get(jobId);
    if (pending) await pending;
    return this.getJob(jobId);
  }

  private run(jobId: string, repoUrl: string, signal: AbortSignal): Promise<void> {
    const task = this.generate(repoUrl, signal)
      .then(
        (result) => this.settle(jobId, result),
        (error: unknown) => {
          const message = error instanceof Error ? error.message : String(error);
          this.settle(jobId, { ok: false, error: new GenerationError('TransportFailure', message) });
        },
      )
      .finally(() => {
        this.pending.delete(jobId);
      });
    this.pending.set(jobId, task);
    return task;
  }

  private settle(jobId: string, result: GenerateResult): void {
    const job = this.jobs.get(jobId);
    // Cancelled jobs keep their status; a late result is dropped.
    if (!job || job.snapshot.status !== 'running') return;

    if (result.ok) {
      this.finish(job, {
        status: 'done',
        stage: 'Done',
        result: encodeInfographic(result.document),
        issueCount: result.issues.length,
      });
      console.log(`[jobs] ${jobId} done (${result.issues.length} decode issues)`);
      return;
    }

    const cancelled = result.error.kind === 'Cancelled';
    this.finish(job, {
      status: cancelled ? 'cancelled' : 'error',
      stage: cancelled ? 'Cancelled' : 'Failed',
      error: { kind: result.error.kind, message: result.error.message, detail: result.error.detail },
    });
    console.error(`[jobs] ${jobId} failed: ${result.error.message}`);
  }

  getJob(jobId: string): GenerationJobSnapshot | null {
    const job = this.jobs.get(jobId);
    return job ? { ...job.snapshot } : null;
  }

  /** false when the job is unknown or already finished. */
  cancelJob(jobId: string): boolean {
    const job = this.jobs.get(jobId);
    if (!job || job.snapshot.status !== 'running') return false;
    job.controller.abort();
    const error = new GenerationError('Cancelled');
    this.finish(job, {
      status: 'cancelled',
      stage: 'Cancelled',
      error: { kind: error.kind, message: error.message },
    });
    console.log(`[jobs] ${jobId} cancelled`);
    return true;
  }

  addSubscriber(jobId: string, subscriber: JobSubscriber): (() => void) | null {
    const job = this.jobs.get(jobId);
    if (!job) return null;
    job.subscribers.add(subscriber);
    return () => {
      job.subscribers.delete(subscriber);
    };
  }

  private finish(job: GenerationJobInternal, patch: Partial<Omit<GenerationJobSnapshot, 'jobId'>>): void {
    job.snapshot = { ...job.snapshot, ...patch, finishedAt: new Date(this.now()).toISOString() };
    job.updatedAt = this.now();
    this.broadcast(job);
    this.endAllSubscribers(job);
  }

  private broadcast(job: GenerationJobInternal): void {
    const payload = toSseDataLine(job.snapshot);
    for (const subscriber of job.subscribers) {
      try {
        subscriber.write(payload);
      } catch (error) {
        console.warn(`[jobs] drop subscriber: ${error instanceof Error ? error.message : String(error)}`);
        job.subscribers.delete(subscriber);
      }
    }
  }

  private endAllSubscribers(job: GenerationJobInternal): void {
    for (const subscriber of job.subscribers) {
      try {
        subscriber.end();
      } catch (error) {
        console.warn(`[jobs] end subscriber: ${error instanceof Error ? error.message : String(error)}`);
      }
    }
    job.subscribers.clear();
  }

  /** Drops finished jobs idle for longer than the TTL. */
  cleanup(): number {
    const now = this.now();
    let removed = 0;
    for (const [jobId, job] of this.jobs.entries()) {
      if (job.snapshot.status === 'running') continue;
      if (now - job.updatedAt < this.ttlMs) continue;
      this.jobs.delete(jobId);
      removed += 1;
    }
    return removed;
  }
}
