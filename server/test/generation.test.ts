import { describe, expect, it } from 'vitest';

import { generateInfographic, type FetchLike } from '../src/generator/client.js';
import { checkGeneratorHealth, healthUrlFor } from '../src/generator/health.js';
import {
  GenerationError,
  interpretGeneratorResponse,
  validateRepositoryLocator,
} from '../src/infographic/generation.js';

const ENDPOINT = 'http://generator.test/api/infographic/generate';

const widgetsDocument = {
  version: '2.0',
  schema: 'interactive-infographic',
  repoUrl: 'https://github.com/acme/widgets',
  repoName: 'widgets',
  generatedAt: '2026-02-02T00:00:00Z',
  root: {
    id: 'root',
    type: 'repo',
    label: 'widgets',
    children: [{ id: 'p1', type: 'phase', label: 'Build', phaseMetadata: { phaseId: '1' } }],
  },
};

type Call = { url: string; init?: RequestInit };

function stubFetch(status: number, body: string, calls: Call[] = []): FetchLike {
  return async (url, init) => {
    calls.push({ url, init });
    return new Response(body, { status });
  };
}

// Rejects once the request signal aborts, like a fetch that never gets a reply.
const hangingFetch: FetchLike = (_url, init) =>
  new Promise<Response>((_resolve, reject) => {
    init?.signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
  });

describe('validateRepositoryLocator', () => {
  it('adds a scheme to a bare locator', () => {
    expect(validateRepositoryLocator('github.com/acme/widgets')).toEqual({
      ok: true,
      url: 'https://github.com/acme/widgets',
      host: 'github.com',
    });
  });

  it('accepts subdomains of an allowed host', () => {
    const result = validateRepositoryLocator('https://www.GitHub.com/acme/widgets');
    expect(result.ok && result.host).toBe('www.github.com');
  });

  it.each([
    ['   ', 'Invalid repository URL: empty'],
    ['ftp://github.com/acme/widgets', 'Invalid repository URL: unsupported scheme ftp:'],
    ['https://gitlab.com/acme/widgets', 'Invalid repository URL: unsupported host gitlab.com'],
    ['evilgithub.com/acme/widgets', 'Invalid repository URL: unsupported host evilgithub.com'],
    ['https://github.com/', 'Invalid repository URL: missing repository path'],
  ])('rejects %j', (locator, message) => {
    const result = validateRepositoryLocator(locator);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('InvalidLocator');
    expect(result.error.message).toBe(message);
  });

  it('honours a configured host list', () => {
    expect(validateRepositoryLocator('git.example.org/team/tool', ['git.example.org']).ok).toBe(true);
    expect(validateRepositoryLocator('github.com/acme/widgets', ['git.example.org']).ok).toBe(false);
  });
});

describe('interpretGeneratorResponse', () => {
  it('maps status codes to error kinds', () => {
    const kinds = [429, 502, 503, 500].map((status) => {
      const result = interpretGeneratorResponse(status, '');
      return result.ok ? 'ok' : result.error.kind;
    });
    expect(kinds).toEqual(['RateLimited', 'ServiceUnavailable', 'ServiceUnavailable', 'ServerError']);
  });

  it('uses the message from an error body', () => {
    const result = interpretGeneratorResponse(400, '{"error":{"message":"bad repo"}}');
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(GenerationError);
    expect(result.error.kind).toBe('ServerError');
    expect(result.error.detail).toBe('bad repo');
    expect(result.error.message).toBe('Server error: bad repo');
  });

  it('falls back to the status when the error body is empty', () => {
    const result = interpretGeneratorResponse(418, 'teapot');
    expect(!result.ok && result.error.message).toBe('Server error: HTTP 418');
  });

  it('accepts a bare document', () => {
    const result = interpretGeneratorResponse(200, JSON.stringify(widgetsDocument));
    expect(result.ok && result.document.displayName).toBe('widgets');
  });

  it('unwraps a document carried as a JSON string', () => {
    const wrapped = { success: true, infographic: `\`\`\`json\n${JSON.stringify(widgetsDocument)}\n\`\`\`` };
    const result = interpretGeneratorResponse(200, JSON.stringify(wrapped));
    expect(result.ok && result.document.root.children[0]?.id).toBe('p1');
  });

  it('reports an unsuccessful wrapper as a server error', () => {
    const result = interpretGeneratorResponse(200, '{"success":false,"error":"repository is private"}');
    expect(!result.ok && result.error.message).toBe('Server error: repository is private');
  });

  it('rejects a body that is neither a document nor a wrapper', () => {
    const result = interpretGeneratorResponse(200, '{"hello":"world"}');
    expect(!result.ok && result.error.kind).toBe('InvalidResponse');
    const notJson = interpretGeneratorResponse(200, '<html></html>');
    expect(!notJson.ok && notJson.error.kind).toBe('InvalidResponse');
  });

  it('reports a payload that does not decode as a parsing error', () => {
    const result = interpretGeneratorResponse(200, '{"success":true,"data":{"root":{"id":"r"}}}');
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('DecodeError');
    expect(result.error.detail).toBe('Root node is invalid: missing type');
  });
});

describe('generateInfographic', () => {
  it('posts the locator and decodes the wrapped reply', async () => {
    const calls: Call[] = [];
    const fetchImpl = stubFetch(200, JSON.stringify({ success: true, data: widgetsDocument }), calls);

    const result = await generateInfographic('https://github.com/acme/widgets', {
      endpoint: ENDPOINT,
      model: 'test-model',
      fetch: fetchImpl,
    });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.document.sourceLocator).toBe('https://github.com/acme/widgets');
    expect(result.document.root.children.map((c) => c.label)).toEqual(['Build']);
    expect(calls).toHaveLength(1);
    expect(calls[0]?.url).toBe(ENDPOINT);
    expect(calls[0]?.init?.method).toBe('POST');
    expect(calls[0]?.init?.body).toBe('{"repo_url":"https://github.com/acme/widgets","model":"test-model"}');
  });

  it('does not call the generator for an invalid locator', async () => {
    const calls: Call[] = [];
    const result = await generateInfographic('not a url', { endpoint: ENDPOINT, fetch: stubFetch(200, '{}', calls) });
    expect(!result.ok && result.error.kind).toBe('InvalidLocator');
    expect(calls).toEqual([]);
  });

  it('maps rate limiting and outages', async () => {
    const limited = await generateInfographic('github.com/acme/widgets', { endpoint: ENDPOINT, fetch: stubFetch(429, '') });
    expect(!limited.ok && limited.error.kind).toBe('RateLimited');
    const down = await generateInfographic('github.com/acme/widgets', { endpoint: ENDPOINT, fetch: stubFetch(503, '') });
    expect(!down.ok && down.error.kind).toBe('ServiceUnavailable');
  });

  it('reports transport errors', async () => {
    const result = await generateInfographic('github.com/acme/widgets', {
      endpoint: ENDPOINT,
      fetch: async () => {
        throw new Error('connect ECONNREFUSED');
      },
    });
    expect(!result.ok && result.error.message).toBe('Network error: connect ECONNREFUSED');
  });

  it('gives up after the timeout', async () => {
    const result = await generateInfographic('github.com/acme/widgets', {
      endpoint: ENDPOINT,
      timeoutMs: 20,
      fetch: hangingFetch,
    });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('TransportFailure');
    expect(result.error.detail).toBe('timed out after 20ms');
  });

  it('reports cancellation by the caller', async () => {
    const controller = new AbortController();
    const pending = generateInfographic('github.com/acme/widgets', {
      endpoint: ENDPOINT,
      signal: controller.signal,
      fetch: hangingFetch,
    });
    controller.abort();
    const result = await pending;
    expect(!result.ok && result.error.kind).toBe('Cancelled');
  });

  it('reports cancellation before the request starts', async () => {
    const controller = new AbortController();
    controller.abort();
    const calls: Call[] = [];
    const result = await generateInfographic('github.com/acme/widgets', {
      endpoint: ENDPOINT,
      signal: controller.signal,
      fetch: stubFetch(200, '{}', calls),
    });
    expect(!result.ok && result.error.message).toBe('Generation cancelled');
    expect(calls).toEqual([]);
  });
});

describe('checkGeneratorHealth', () => {
  it('derives the health url from the generate endpoint', () => {
    expect(healthUrlFor(ENDPOINT)).toBe('http://generator.test/api/infographic/health');
    expect(healthUrlFor('http://generator.test/')).toBe('http://generator.test/health');
  });

  it('reports a generator without an API key', async () => {
    const health = await checkGeneratorHealth(ENDPOINT, { fetch: stubFetch(200, '{"status":"ok","api_key_configured":false}') });
    expect(health).toEqual({
      state: 'unconfigured',
      url: 'http://generator.test/api/infographic/health',
      message: 'generator has no API key configured',
    });
  });

  it('reports ok, HTTP failures and non-JSON replies', async () => {
    expect((await checkGeneratorHealth(ENDPOINT, { fetch: stubFetch(200, '{"status":"ok"}') })).state).toBe('ok');
    expect(await checkGeneratorHealth(ENDPOINT, { fetch: stubFetch(500, '') })).toMatchObject({
      state: 'unreachable',
      message: 'HTTP 500',
    });
    expect(await checkGeneratorHealth(ENDPOINT, { fetch: stubFetch(200, 'up') })).toMatchObject({
      state: 'unreachable',
      message: 'health endpoint returned non-JSON',
    });
  });
});
