import { readFile } from 'fs/promises';
import { resolve } from 'path';
import type { SceneParameters } from '@ridgeline/shared';
import { SceneConfigError } from './generator/errors';
import { applySceneOverrides, isRecord, parseSceneOverrides, validateSceneParameters } from './validation';

export const DEFAULT_SCENE_PARAMETERS: SceneParameters = Object.freeze({
  width: 3840,
  height: 2160,

  sunHeight: 0.85,
  sunSize: 0.1,

  fogHeight: 0.8,
  fogThickness: 1,

  mountainRangeCount: 8,
  mountainPosition: Object.freeze({ start: 0.15, end: 0.7 }),
  mountainPeaks: Object.freeze({ min: 9, max: 22 }),
  mountainRoughness: 0.2,
  mountainPeakiness: 4,
});

export interface ServerConfig {
  port: number;
  /** JSON scene file, optional on disk */
  configPath: string;
  outputDir: string;
}

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return {
    port: parseInt(env.PORT || '3001', 10),
    configPath: resolve(env.RIDGELINE_CONFIG || 'scene.json'),
    outputDir: resolve(env.RIDGELINE_OUTPUT_DIR || 'output'),
  };
}

export interface SceneFile {
  params: SceneParameters;
  /** Fixed seed from the file, if any */
  seed?: string;
}

/**
 * Parse scene file contents: partial SceneParameters plus an optional `seed`,
 * merged over the defaults. Throws SceneConfigError on anything invalid.
 */
export function parseSceneFile(text: string, base: SceneParameters = DEFAULT_SCENE_PARAMETERS): SceneFile {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new SceneConfigError(`Scene file is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (!isRecord(json)) {
    throw new SceneConfigError('Scene file must contain a JSON object');
  }

  const { seed, ...rest } = json;
  const overrides = parseSceneOverrides(rest);
  if (!overrides.ok) {
    throw new SceneConfigError(overrides.error);
  }
  const params = applySceneOverrides(base, overrides.value);
  const error = validateSceneParameters(params);
  if (error) {
    throw new SceneConfigError(error);
  }
  if (seed === undefined) {
    return { params };
  }
  if (typeof seed !== 'string') {
    throw new SceneConfigError('seed must be a string');
  }
  return { params, seed };
}

/** Read the scene file; a missing file means the defaults */
export async function loadSceneFile(filePath: string): Promise<SceneFile> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      console.log(`[config] ${filePath} not found, using default scene parameters`);
      return { params: DEFAULT_SCENE_PARAMETERS };
    }
    throw err;
  }
  return parseSceneFile(text);
}
