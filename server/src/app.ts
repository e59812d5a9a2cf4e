import cors from 'cors';
import express, { type Response } from 'express';
import fs from 'node:fs/promises';

import type { ServerConfig } from './config.js';
import { generateInfographic, type FetchLike } from './generator/client.js';
import { checkGeneratorHealth } from './generator/health.js';
import { GenerationJobManager } from './generationJobManager.js';
import { encodeInfographic, isRecord, type GenerationErrorKind } from './infographic/index.js';
import { buildFromDirectory, resolveUnderRoot } from './local/buildDirectory.js';
import { errorCode, listNamedResources, loadFromNamedResource } from './resources.js';

export type AppDeps = {
  config: ServerConfig;
  /** Transport to the generator; defaults to global fetch. */
  fetch?: FetchLike;
};

const STATUS_BY_KIND: Record<GenerationErrorKind, number> = {
  InvalidLocator: 400,
  TransportFailure: 502,
  RateLimited: 429,
  ServiceUnavailable: 503,
  ServerError: 502,
  InvalidResponse: 502,
  DecodeError: 502,
  ResourceNotFound: 404,
  Cancelled: 499,
};

export function statusForKind(kind: GenerationErrorKind): number {
  return STATUS_BY_KIND[kind];
}

function asErrorText(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

function bodyOf(req: express.Request): Record<string, unknown> {
  return isRecord(req.body) ? req.body : {};
}

function readRepoUrl(body: Record<string, unknown>): string {
  const value = body.repo_url ?? body.repoUrl;
  return typeof value === 'string' ? value : '';
}

function sendError(res: Response, status: number, error: string, extra: Record<string, unknown> = {}): void {
  res.status(status).json({ ok: false, error, ...extra });
}

export function createApp(deps: AppDeps): { app: express.Express; jobs: GenerationJobManager } {
  const { config } = deps;
  const app = express();

  const generate = (repoUrl: string, signal?: AbortSignal, model?: string) =>
    generateInfographic(repoUrl, {
      endpoint: config.generatorUrl,
      model: model ?? config.generatorModel,
      timeoutMs: config.generatorTimeoutMs,
      allowedHosts: config.allowedHosts,
      signal,
      fetch: deps.fetch,
    });

  const jobs = new GenerationJobManager((repoUrl, signal) => generate(repoUrl, signal));

  app.use(cors());
  app.use(express.json({ limit: '5mb' }));

  app.get('/api/health', async (_req, res) => {
    const generator = await checkGeneratorHealth(config.generatorUrl, { fetch: deps.fetch });
    res.json({ ok: true, generator });
  });

  app.get('/api/samples', async (_req, res) => {
    try {
      const samples = await listNamedResources({ samplesDir: config.samplesDir });
      res.json({ ok: true, samples });
    } catch (error) {
      console.error(`[samples] list failed: ${asErrorText(error)}`);
      sendError(res, 500, asErrorText(error));
    }
  });

  app.get('/api/samples/:name', async (req, res) => {
    const name = typeof req.params.name === 'string' ? req.params.name : '';
    const document = await loadFromNamedResource(name, { samplesDir: config.samplesDir });
    if (!document) {
      sendError(res, 404, `sample not found: ${name}`, { kind: 'ResourceNotFound' });
      return;
    }
    res.json({ ok: true, document: encodeInfographic(document) });
  });

  app.get('/api/local/dirs', async (req, res) => {
    try {
      const rawRel = typeof req.query.path === 'string' ? req.query.path : '';
      const targetDirAbs = resolveUnderRoot(config.localRoot, rawRel);
      const cwd = rawRel.replace(/\\/gu, '/').replace(/^\/+/u, '').replace(/\/+$/u, '');

      const dirents = await fs.readdir(targetDirAbs, { withFileTypes: true });
      const entries = dirents
        .filter((d) => d.isDirectory() && !d.name.startsWith('.'))
        .map((d) => d.name)
        .sort((a, b) => a.localeCompare(b));

      res.json({
        ok: true,
        cwd,
        entries: entries.map((name) => ({ name, relPath: cwd ? `${cwd}/${name}` : name })),
      });
    } catch (error) {
      const status = errorCode(error) === 'ENOENT' ? 404 : 400;
      sendError(res, status, asErrorText(error));
    }
  });

  app.post('/api/local', async (req, res) => {
    try {
      const body = bodyOf(req);
      const rawRel = typeof body.path === 'string' ? body.path : '';
      const dirAbs = resolveUnderRoot(config.localRoot, rawRel);
      const result = await buildFromDirectory(dirAbs, {
        name: typeof body.name === 'string' ? body.name : undefined,
        outline: body.outline === true,
      });
      console.log(`[local] built ${result.document.displayName}: ${result.fileCount} files, ${result.skipped.length} skipped`);
      res.json({
        ok: true,
        document: encodeInfographic(result.document),
        fileCount: result.fileCount,
        skipped: result.skipped,
        truncated: result.truncated,
      });
    } catch (error) {
      const status = errorCode(error) === 'ENOENT' ? 404 : 400;
      sendError(res, status, asErrorText(error));
    }
  });

  app.post('/api/infographic/generate', async (req, res) => {
    const body = bodyOf(req);
    const model = typeof body.model === 'string' && body.model.trim() ? body.model.trim() : undefined;

    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableEnded) controller.abort();
    });

    const result = await generate(readRepoUrl(body), controller.signal, model);
    if (!result.ok) {
      console.error(`[generate] ${result.error.message}`);
      if (res.writableEnded || controller.signal.aborted) return;
      sendError(res, statusForKind(result.error.kind), result.error.message, {
        kind: result.error.kind,
        detail: result.error.detail,
      });
      return;
    }

    for (const issue of result.issues) console.warn(`[generate] ${issue.path}: ${issue.message}`);
    res.json({ ok: true, document: encodeInfographic(result.document), issueCount: result.issues.length });
  });

  app.post('/api/infographic/jobs', (req, res) => {
    const repoUrl = readRepoUrl(bodyOf(req)).trim();
    if (!repoUrl) {
      sendError(res, 400, 'repo_url is required', { kind: 'InvalidLocator' });
      return;
    }
    const snapshot = jobs.startJob(repoUrl);
    res.json({ ok: true, jobId: snapshot.jobId });
  });

  app.get('/api/infographic/jobs/:jobId', (req, res) => {
    const jobId = typeof req.params.jobId === 'string' ? req.params.jobId : '';
    const job = jobs.getJob(jobId);
    if (!job) {
      sendError(res, 404, `unknown jobId=${jobId}`);
      return;
    }
    res.json({ ok: true, job });
  });

  app.delete('/api/infographic/jobs/:jobId', (req, res) => {
    const jobId = typeof req.params.jobId === 'string' ? req.params.jobId : '';
    if (!jobs.getJob(jobId)) {
      sendError(res, 404, `unknown jobId=${jobId}`);
      return;
    }
    const cancelled = jobs.cancelJob(jobId);
    res.json({ ok: true, cancelled, job: jobs.getJob(jobId) });
  });

  app.get('/api/infographic/jobs/:jobId/events', (req, res) => {
    const jobId = typeof req.params.jobId === 'string' ? req.params.jobId : '';
    if (!jobs.getJob(jobId)) {
      sendError(res, 404, `unknown jobId=${jobId}`);
      return;
    }

    res.status(200);
    res.setHeader('Content-Type', 'text/event-stream; charset=utf-8');
    res.setHeader('Cache-Control', 'no-cache, no-transform');
    res.setHeader('Connection', 'keep-alive');
    res.flushHeaders();

    const unsubscribe = jobs.addSubscriber(jobId, res);
    const latest = jobs.getJob(jobId);
    if (!unsubscribe || !latest) {
      res.end();
      return;
    }

    res.write(`data: ${JSON.stringify(latest)}\n\n`);
    if (latest.status !== 'running') {
      unsubscribe();
      res.end();
      return;
    }

    const ping = setInterval(() => {
      res.write(': ping\n\n');
    }, 15_000);
    ping.unref();

    req.on('close', () => {
      clearInterval(ping);
      unsubscribe();
    });
  });

  return { app, jobs };
}
