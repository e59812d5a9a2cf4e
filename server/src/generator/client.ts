import {
  GenerationError,
  interpretGeneratorResponse,
  validateRepositoryLocator,
  type GenerateResult,
} from '../infographic/index.js';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type GeneratorClientOptions = {
  endpoint: string;
  model?: string;
  timeoutMs?: number;
  allowedHosts?: readonly string[];
  signal?: AbortSignal;
  fetch?: FetchLike;
};

export const DEFAULT_GENERATION_TIMEOUT_MS = 5 * 60 * 1000;

function asErrorText(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/**
 * Posts `{ repo_url, model? }` to the generator and decodes the reply.
 * Never throws: every failure comes back as a `GenerationError`.
 */
export async function generateInfographic(
  repoLocator: string,
  options: GeneratorClientOptions,
): Promise<GenerateResult> {
  const locator = validateRepositoryLocator(repoLocator, options.allowedHosts);
  if (!locator.ok) return locator;
  if (options.signal?.aborted) return { ok: false, error: new GenerationError('Cancelled') };

  const timeoutMs = options.timeoutMs ?? DEFAULT_GENERATION_TIMEOUT_MS;
  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);
  const onAbort = (): void => controller.abort();
  options.signal?.addEventListener('abort', onAbort, { once: true });

  const failure = (e: unknown): GenerateResult => {
    if (timedOut) return { ok: false, error: new GenerationError('TransportFailure', `timed out after ${timeoutMs}ms`) };
    if (options.signal?.aborted) return { ok: false, error: new GenerationError('Cancelled') };
    return { ok: false, error: new GenerationError('TransportFailure', asErrorText(e)) };
  };

  const body: Record<string, unknown> = { repo_url: locator.url };
  if (options.model) body.model = options.model;

  const fetchImpl: FetchLike = options.fetch ?? fetch;
  try {
    let res: Response;
    try {
      res = await fetchImpl(options.endpoint, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Accept: 'application/json',
        },
        body: JSON.stringify(body),
        signal: controller.signal,
      });
    } catch (e) {
      return failure(e);
    }

    let text: string;
    try {
      text = await res.text();
    } catch (e) {
      return failure(e);
    }

    return interpretGeneratorResponse(res.status, text);
  } finally {
    clearTimeout(timer);
    options.signal?.removeEventListener('abort', onAbort);
  }
}
