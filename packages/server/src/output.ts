import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import type { SceneDocument } from '@ridgeline/shared';
import { sceneToSvg } from './render/svgSurface';

/** Filename-safe form of a seed */
export function sceneFileName(seed: string): string {
  const safe = seed.replace(/[^A-Za-z0-9_-]/g, '_') || 'scene';
  return `landscape-${safe}.svg`;
}

/** Render a scene to SVG and write it into outputDir. Returns the file path. */
export async function writeSceneSvg(document: SceneDocument, outputDir: string): Promise<string> {
  await mkdir(outputDir, { recursive: true });
  const filePath = join(outputDir, sceneFileName(document.seed));
  await writeFile(filePath, sceneToSvg(document), 'utf-8');
  console.log(`[render] wrote ${filePath}`);
  return filePath;
}
