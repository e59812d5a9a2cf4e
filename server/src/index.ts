import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { createApp } from './app.js';
import { loadConfig } from './config.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const repoRoot = path.resolve(__dirname, '..', '..');
const config = loadConfig(process.env, repoRoot);
const { app } = createApp({ config });

app.listen(config.port, () => {
  // eslint-disable-next-line no-console
  console.log(`API server listening on http://localhost:${config.port}`);
  console.log(`[generate] generator endpoint ${config.generatorUrl}`);
  console.log(`[samples] reading samples from ${config.samplesDir}`);
});
