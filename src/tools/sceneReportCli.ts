/**
 * Print the scene report for a config file
 *
 *   tsx src/tools/sceneReportCli.ts [--config config/scene.json] [--texture-root public/textures] [--stub]
 *
 * Without --stub the images are decoded from disk with sharp. --stub serves a
 * flat gray image for every path.
 */

import path from 'path';
import { fileURLToPath } from 'url';
import { parseArgs } from 'util';
import { loadSceneConfig } from '../core/config/loadSceneConfig';
import { SharpImageDecoder } from '../core/textures/SharpImageDecoder';
import { StubImageDecoder, solidImage } from '../core/testing';
import { formatSceneReport, runSceneReport } from './sceneReport';

const __filename = fileURLToPath(import.meta.url);
const PROJECT_ROOT = path.resolve(path.dirname(__filename), '../..');
const DEFAULT_CONFIG = path.join(PROJECT_ROOT, 'config', 'scene.json');
const PUBLIC_PATH = path.join(PROJECT_ROOT, 'public');

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      config: { type: 'string', default: DEFAULT_CONFIG },
      'texture-root': { type: 'string' },
      stub: { type: 'boolean', default: false },
    },
  });

  const config = await loadSceneConfig(values.config ?? DEFAULT_CONFIG);
  const textureRoot = values['texture-root'] ?? path.join(PUBLIC_PATH, config.textureRoot);
  const decoder = values.stub ? new StubImageDecoder({}, solidImage(4, 4, 3)) : new SharpImageDecoder();

  const report = await runSceneReport({ config, decoder, textureRoot });
  console.log(formatSceneReport(report));
  if (report.prepare.failed.length > 0 || report.orderViolations.length > 0) {
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  console.error('[sceneReport]', error);
  process.exitCode = 1;
});
