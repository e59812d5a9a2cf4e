import { isRecord } from '../infographic/index.js';
import type { FetchLike } from './client.js';

export type GeneratorHealth =
  | { state: 'ok'; url: string }
  | { state: 'unconfigured'; url: string; message: string }
  | { state: 'unreachable'; url: string; message: string };

export function healthUrlFor(endpoint: string): string {
  const replaced = endpoint.replace(/\/generate\/?$/u, '/health');
  if (replaced !== endpoint) return replaced;
  return `${endpoint.replace(/\/+$/u, '')}/health`;
}

export async function checkGeneratorHealth(
  endpoint: string,
  options: { fetch?: FetchLike; timeoutMs?: number } = {},
): Promise<GeneratorHealth> {
  const url = healthUrlFor(endpoint);
  const fetchImpl: FetchLike = options.fetch ?? fetch;

  let res: Response;
  try {
    res = await fetchImpl(url, {
      method: 'GET',
      headers: { Accept: 'application/json' },
      signal: AbortSignal.timeout(options.timeoutMs ?? 5000),
    });
  } catch (e) {
    return { state: 'unreachable', url, message: e instanceof Error ? e.message : String(e) };
  }

  if (!res.ok) return { state: 'unreachable', url, message: `HTTP ${res.status}` };

  let json: unknown;
  try {
    json = await res.json();
  } catch {
    return { state: 'unreachable', url, message: 'health endpoint returned non-JSON' };
  }

  if (isRecord(json) && json.api_key_configured === false) {
    return { state: 'unconfigured', url, message: 'generator has no API key configured' };
  }
  return { state: 'ok', url };
}
