import path from 'node:path';

import { DEFAULT_ALLOWED_HOSTS } from './infographic/index.js';
import { DEFAULT_GENERATION_TIMEOUT_MS } from './generator/client.js';

export const DEFAULT_PORT = 3000;
export const DEFAULT_GENERATOR_URL = 'http://localhost:3001/api/infographic/generate';
export const DEFAULT_SAMPLES_DIR = path.join('server', 'samples');
export const DEFAULT_LOCAL_ROOT = 'input';

export type ServerConfig = {
  port: number;
  generatorUrl: string;
  generatorModel?: string;
  generatorTimeoutMs: number;
  allowedHosts: string[];
  samplesDir: string;
  localRoot: string;
};

type Env = Record<string, string | undefined>;

function readString(env: Env, key: string): string | undefined {
  const raw = env[key];
  if (typeof raw !== 'string') return undefined;
  const trimmed = raw.trim();
  return trimmed ? trimmed : undefined;
}

function readPositiveInt(env: Env, key: string, fallback: number): number {
  const raw = readString(env, key);
  if (raw === undefined) return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n) || n <= 0) return fallback;
  return Math.floor(n);
}

function toAbs(repoRoot: string, maybeRelativePath: string): string {
  return path.isAbsolute(maybeRelativePath) ? maybeRelativePath : path.resolve(repoRoot, maybeRelativePath);
}

/** Relative directories resolve against `repoRoot`. */
export function loadConfig(env: Env, repoRoot: string): ServerConfig {
  const hosts = readString(env, 'INFOGRAPHIC_ALLOWED_HOSTS')
    ?.split(',')
    .map((h) => h.trim().toLowerCase())
    .filter(Boolean);

  return {
    port: readPositiveInt(env, 'PORT', DEFAULT_PORT),
    generatorUrl: readString(env, 'INFOGRAPHIC_GENERATOR_URL') ?? DEFAULT_GENERATOR_URL,
    generatorModel: readString(env, 'INFOGRAPHIC_GENERATOR_MODEL'),
    generatorTimeoutMs: readPositiveInt(env, 'INFOGRAPHIC_GENERATOR_TIMEOUT_MS', DEFAULT_GENERATION_TIMEOUT_MS),
    allowedHosts: hosts && hosts.length > 0 ? hosts : [...DEFAULT_ALLOWED_HOSTS],
    samplesDir: toAbs(repoRoot, readString(env, 'INFOGRAPHIC_SAMPLES_DIR') ?? DEFAULT_SAMPLES_DIR),
    localRoot: toAbs(repoRoot, readString(env, 'INFOGRAPHIC_LOCAL_ROOT') ?? DEFAULT_LOCAL_ROOT),
  };
}
