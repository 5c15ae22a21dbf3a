import chokidar from 'chokidar';
import { loadSceneFile } from './config';
import type { SceneStore } from './sceneStore';

/** Delay before reloading, so editors that write twice trigger one reload */
const RELOAD_DEBOUNCE_MS = 150;

/**
 * Reload the scene file into the store. An invalid file is logged and
 * reported to clients; the previous parameters stay active.
 */
export async function reloadSceneFile(store: SceneStore, filePath: string): Promise<boolean> {
  try {
    const { params, seed } = await loadSceneFile(filePath);
    store.setParams(params, seed);
    console.log(`[watcher] reloaded ${filePath}`);
    return true;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.warn(`[watcher] keeping previous scene, ${filePath} is invalid:`, message);
    store.reportError(message);
    return false;
  }
}

/**
 * Watch the scene config file and regenerate whenever it changes.
 * Deleting the file falls back to the default parameters.
 */
export function startWatcher(store: SceneStore, filePath: string) {
  let timer: ReturnType<typeof setTimeout> | undefined;

  const schedule = () => {
    clearTimeout(timer);
    timer = setTimeout(() => {
      timer = undefined;
      void reloadSceneFile(store, filePath);
    }, RELOAD_DEBOUNCE_MS);
  };

  const watcher = chokidar.watch(filePath, { ignoreInitial: true });
  watcher.on('add', schedule);
  watcher.on('change', schedule);
  watcher.on('unlink', schedule);
  watcher.on('error', (err) => {
    console.warn('[watcher] error:', err instanceof Error ? err.message : err);
  });
  console.log(`[watcher] watching ${filePath}`);

  const ready = new Promise<void>((resolve) => {
    watcher.once('ready', () => resolve());
  });

  return {
    ready,
    close: async () => {
      clearTimeout(timer);
      await watcher.close();
    },
  };
}
