import path from 'node:path';
import { describe, expect, it } from 'vitest';

import { loadConfig } from '../src/config.js';

const repoRoot = path.resolve('/srv/infographic');

describe('loadConfig', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadConfig({}, repoRoot)).toEqual({
      port: 3000,
      generatorUrl: 'http://localhost:3001/api/infographic/generate',
      generatorModel: undefined,
      generatorTimeoutMs: 300000,
      allowedHosts: ['github.com'],
      samplesDir: path.join(repoRoot, 'server', 'samples'),
      localRoot: path.join(repoRoot, 'input'),
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig(
      {
        PORT: '8080',
        INFOGRAPHIC_GENERATOR_URL: 'http://gen.internal:9000/generate',
        INFOGRAPHIC_GENERATOR_MODEL: ' test-model ',
        INFOGRAPHIC_GENERATOR_TIMEOUT_MS: '1500',
        INFOGRAPHIC_ALLOWED_HOSTS: 'GitHub.com, git.example.org,,',
        INFOGRAPHIC_SAMPLES_DIR: 'fixtures',
        INFOGRAPHIC_LOCAL_ROOT: path.resolve('/data/projects'),
      },
      repoRoot,
    );

    expect(config.port).toBe(8080);
    expect(config.generatorUrl).toBe('http://gen.internal:9000/generate');
    expect(config.generatorModel).toBe('test-model');
    expect(config.generatorTimeoutMs).toBe(1500);
    expect(config.allowedHosts).toEqual(['github.com', 'git.example.org']);
    expect(config.samplesDir).toBe(path.join(repoRoot, 'fixtures'));
    expect(config.localRoot).toBe(path.resolve('/data/projects'));
  });

  it('falls back when numbers are invalid', () => {
    const config = loadConfig({ PORT: 'abc', INFOGRAPHIC_GENERATOR_TIMEOUT_MS: '-5', INFOGRAPHIC_ALLOWED_HOSTS: ' , ' }, repoRoot);
    expect(config.port).toBe(3000);
    expect(config.generatorTimeoutMs).toBe(300000);
    expect(config.allowedHosts).toEqual(['github.com']);
  });
});
