/** Thrown when scene parameters cannot produce a scene. Never clamped or recovered. */
export class SceneConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SceneConfigError';
  }
}
