import type { SceneDocument, SceneParameters, WSMessage } from '@ridgeline/shared';
import { SceneConfigError } from './generator/errors';
import { generateScene } from './generator/scene';
import { createSeed } from './generator/random';
import { validateSceneParameters } from './validation';

type Listener = (msg: WSMessage) => void;

/**
 * Holds the active scene parameters and the last generated scene, and
 * notifies subscribers (WebSocket clients) whenever either changes.
 */
export class SceneStore {
  private params: SceneParameters;
  private scene: SceneDocument;
  private listeners: Set<Listener> = new Set();

  constructor(params: SceneParameters, seed: string = createSeed()) {
    this.params = params;
    this.scene = generateScene(params, seed);
  }

  subscribe(listener: Listener) {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  private broadcast(msg: WSMessage) {
    for (const listener of this.listeners) {
      try {
        listener(msg);
      } catch (err) {
        console.warn('[scene] Listener error:', err instanceof Error ? err.message : err);
      }
    }
  }

  getParams(): SceneParameters {
    return this.params;
  }

  getScene(): SceneDocument {
    return this.scene;
  }

  /** Generate a new scene with the current parameters and broadcast it */
  regenerate(seed: string = createSeed()): SceneDocument {
    this.scene = generateScene(this.params, seed);
    console.log(`[scene] generated seed=${seed} instructions=${this.scene.instructions.length}`);
    this.broadcast({ type: 'scene', data: this.scene });
    return this.scene;
  }

  /** Replace the parameters (validated first), then regenerate */
  setParams(params: SceneParameters, seed?: string): SceneDocument {
    const error = validateSceneParameters(params);
    if (error) {
      throw new SceneConfigError(error);
    }
    this.params = params;
    this.broadcast({ type: 'params', data: params });
    return this.regenerate(seed);
  }

  /** Tell clients a reload failed while the previous scene stays up */
  reportError(error: string) {
    this.broadcast({ type: 'scene_error', data: { error } });
  }
}
