import { parseArgs } from 'util';
import { resolve } from 'path';
import { loadSceneFile, loadServerConfig } from './config';
import { generateScene } from './generator/scene';
import { createSeed } from './generator/random';
import { writeSceneSvg } from './output';

/** One-shot: generate a single landscape and write it as SVG */
async function main() {
  const config = loadServerConfig();
  const { values } = parseArgs({
    options: {
      seed: { type: 'string' },
      config: { type: 'string' },
      out: { type: 'string' },
    },
  });

  const { params, seed: fileSeed } = await loadSceneFile(resolve(values.config ?? config.configPath));
  const seed = values.seed ?? fileSeed ?? createSeed();
  const scene = generateScene(params, seed);
  await writeSceneSvg(scene, resolve(values.out ?? config.outputDir));
  console.log('[render] done');
}

main().catch((err: unknown) => {
  console.error('[render] failed:', err instanceof Error ? err.message : err);
  process.exit(1);
});
