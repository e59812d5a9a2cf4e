import { decodeInfographicValue, isRecord, parseJsonLenient, type DecodeIssue } from './decode.js';
import type { InfographicDocument } from './types.js';

export const GENERATION_ERROR_KINDS = [
  'InvalidLocator',
  'TransportFailure',
  'RateLimited',
  'ServiceUnavailable',
  'ServerError',
  'InvalidResponse',
  'DecodeError',
  'ResourceNotFound',
  'Cancelled',
] as const;

export type GenerationErrorKind = (typeof GENERATION_ERROR_KINDS)[number];

const ERROR_TITLES: Record<GenerationErrorKind, string> = {
  InvalidLocator: 'Invalid repository URL',
  TransportFailure: 'Network error',
  RateLimited: 'Rate limited, try again later',
  ServiceUnavailable: 'Generator unavailable',
  ServerError: 'Server error',
  InvalidResponse: 'Invalid response from server',
  DecodeError: 'Failed to parse response',
  ResourceNotFound: 'Not found',
  Cancelled: 'Generation cancelled',
};

export function isGenerationErrorKind(value: unknown): value is GenerationErrorKind {
  return typeof value === 'string' && GENERATION_ERROR_KINDS.some((kind) => kind === value);
}

export class GenerationError extends Error {
  kind: GenerationErrorKind;
  detail?: string;

  constructor(kind: GenerationErrorKind, detail?: string) {
    super(detail ? `${ERROR_TITLES[kind]}: ${detail}` : ERROR_TITLES[kind]);
    this.name = 'GenerationError';
    this.kind = kind;
    this.detail = detail;
  }
}

export type GenerateResult =
  | { ok: true; document: InfographicDocument; issues: DecodeIssue[] }
  | { ok: false; error: GenerationError };

export type LocatorResult = { ok: true; url: string; host: string } | { ok: false; error: GenerationError };

export const DEFAULT_ALLOWED_HOSTS: readonly string[] = ['github.com'];

function fail(kind: GenerationErrorKind, detail?: string): { ok: false; error: GenerationError } {
  return { ok: false, error: new GenerationError(kind, detail) };
}

/**
 * Accepts `https://host/owner/repo`, `http://...` or a bare `host/owner/repo`.
 * The host (or one of its subdomains) must be allowed and the path must name
 * something below the host.
 */
export function validateRepositoryLocator(
  locator: string,
  allowedHosts: readonly string[] = DEFAULT_ALLOWED_HOSTS,
): LocatorResult {
  const trimmed = locator.trim();
  if (!trimmed) return fail('InvalidLocator', 'empty');

  const candidate = /^[a-z][a-z0-9+.-]*:\/\//iu.test(trimmed) ? trimmed : `https://${trimmed}`;
  let url: URL;
  try {
    url = new URL(candidate);
  } catch {
    return fail('InvalidLocator', trimmed);
  }

  if (url.protocol !== 'https:' && url.protocol !== 'http:') return fail('InvalidLocator', `unsupported scheme ${url.protocol}`);

  const host = url.hostname.toLowerCase();
  const allowed = allowedHosts.some((h) => {
    const want = h.toLowerCase();
    return host === want || host.endsWith(`.${want}`);
  });
  if (!allowed) return fail('InvalidLocator', `unsupported host ${host}`);

  const segments = url.pathname.split('/').filter(Boolean);
  if (segments.length === 0) return fail('InvalidLocator', 'missing repository path');

  return { ok: true, url: candidate, host };
}

function errorMessageOf(value: unknown): string | undefined {
  if (!isRecord(value)) return undefined;
  const err = value.error;
  if (typeof err === 'string' && err) return err;
  if (isRecord(err) && typeof err.message === 'string' && err.message) return err.message;
  if (typeof value.message === 'string' && value.message) return value.message;
  return undefined;
}

function hasWrapperShape(value: Record<string, unknown>): boolean {
  return 'success' in value || 'data' in value || 'infographic' in value || 'error' in value;
}

function decodePayload(payload: unknown): GenerateResult {
  let value = payload;
  if (typeof payload === 'string') {
    const parsed = parseJsonLenient(payload);
    if (!parsed.ok) return fail('DecodeError', parsed.error.message);
    value = parsed.value;
  }
  const decoded = decodeInfographicValue(value);
  if (!decoded.ok) return fail('DecodeError', decoded.error.message);
  return { ok: true, document: decoded.document, issues: decoded.issues };
}

/**
 * Classifies a generator reply. The body is either a bare document or a
 * `{ success, data | infographic, error }` wrapper around one.
 */
export function interpretGeneratorResponse(status: number, bodyText: string): GenerateResult {
  if (status === 429) return fail('RateLimited');
  if (status === 502 || status === 503) return fail('ServiceUnavailable');

  if (status !== 200) {
    const parsed = parseJsonLenient(bodyText);
    const message = parsed.ok ? errorMessageOf(parsed.value) : undefined;
    return fail('ServerError', message ?? `HTTP ${status}`);
  }

  const parsed = parseJsonLenient(bodyText);
  if (!parsed.ok || !isRecord(parsed.value)) return fail('InvalidResponse');
  const value = parsed.value;

  if ('root' in value) {
    const direct = decodeInfographicValue(value);
    if (direct.ok) return { ok: true, document: direct.document, issues: direct.issues };
    if (!hasWrapperShape(value)) return fail('DecodeError', direct.error.message);
  }

  if (!hasWrapperShape(value)) return fail('InvalidResponse');

  const payload = value.data ?? value.infographic;
  if (value.success === false || payload === undefined || payload === null) {
    return fail('ServerError', errorMessageOf(value) ?? 'Generation failed');
  }

  return decodePayload(payload);
}
