import express, { type Request, type Response } from 'express';
import type { Server } from 'http';
import { WebSocketServer, WebSocket } from 'ws';
import type { ClientMessage, SceneDocument } from '@ridgeline/shared';
import { SceneConfigError } from './generator/errors';
import { generateScene } from './generator/scene';
import { createSeed } from './generator/random';
import { writeSceneSvg } from './output';
import { sceneToSvg } from './render/svgSurface';
import type { SceneStore } from './sceneStore';
import { applySceneOverrides, isRecord, parseQueryOverrides, validateSceneParameters } from './validation';

export interface AppOptions {
  outputDir: string;
}

/**
 * Resolve the scene a request asks for: the stored scene when the query is
 * empty, otherwise a fresh one from the query's seed and overrides.
 * Returns an error message for invalid queries.
 */
function sceneForQuery(store: SceneStore, query: Request['query']): SceneDocument | string {
  const { seed, ...rest } = query;
  if (seed === undefined && Object.keys(rest).length === 0) {
    return store.getScene();
  }
  if (seed !== undefined && typeof seed !== 'string') {
    return 'seed must be given once';
  }

  const overrides = parseQueryOverrides(rest);
  if (!overrides.ok) return overrides.error;

  const params = applySceneOverrides(store.getParams(), overrides.value);
  const error = validateSceneParameters(params);
  if (error) return error;

  return generateScene(params, seed ?? createSeed());
}

function sendSceneError(res: Response, err: unknown) {
  if (err instanceof SceneConfigError) {
    res.status(400).json({ ok: false, error: err.message });
    return;
  }
  console.warn('[server] Error generating scene:', err instanceof Error ? err.message : err);
  res.status(500).json({ ok: false, error: 'Scene generation failed' });
}

export function createApp(store: SceneStore, options: AppOptions) {
  const app = express();

  // Security headers
  app.disable('x-powered-by');
  app.use((_req, res, next) => {
    res.setHeader('X-Content-Type-Options', 'nosniff');
    res.setHeader('X-Frame-Options', 'DENY');
    res.setHeader('Referrer-Policy', 'no-referrer');
    next();
  });

  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: Date.now() });
  });

  app.use(express.json({ limit: '64kb' }));

  app.get('/api/params', (_req, res) => {
    res.json(store.getParams());
  });

  app.get('/api/scene', (req, res) => {
    try {
      const scene = sceneForQuery(store, req.query);
      if (typeof scene === 'string') {
        res.status(400).json({ ok: false, error: scene });
        return;
      }
      res.json(scene);
    } catch (err) {
      sendSceneError(res, err);
    }
  });

  app.get('/api/scene.svg', (req, res) => {
    try {
      const scene = sceneForQuery(store, req.query);
      if (typeof scene === 'string') {
        res.status(400).json({ ok: false, error: scene });
        return;
      }
      res.type('image/svg+xml').send(sceneToSvg(scene));
    } catch (err) {
      sendSceneError(res, err);
    }
  });

  // Persist the current scene to the output directory
  app.post('/api/render', async (_req, res) => {
    try {
      const path = await writeSceneSvg(store.getScene(), options.outputDir);
      res.json({ ok: true, path });
    } catch (err) {
      console.warn('[server] Error writing scene:', err instanceof Error ? err.message : err);
      res.status(500).json({ ok: false, error: 'Could not write scene' });
    }
  });

  return app;
}

/** Parse a client message; anything unrecognised is null */
export function parseClientMessage(raw: string): ClientMessage | null {
  let msg: unknown;
  try {
    msg = JSON.parse(raw);
  } catch {
    return null;
  }
  if (!isRecord(msg) || msg.type !== 'regenerate') return null;
  if (msg.seed === undefined) return { type: 'regenerate' };
  if (typeof msg.seed !== 'string' || msg.seed.length === 0 || msg.seed.length > 64) return null;
  return { type: 'regenerate', seed: msg.seed };
}

/** WebSocket endpoint: pushes every scene to every client, accepts regenerate requests */
export function attachSocketServer(server: Server, store: SceneStore) {
  const wss = new WebSocketServer({ server, path: '/ws' });

  wss.on('connection', (ws: WebSocket) => {
    console.log('[ws] client connected');
    ws.send(JSON.stringify({ type: 'params', data: store.getParams() }));
    ws.send(JSON.stringify({ type: 'scene', data: store.getScene() }));

    const unsubscribe = store.subscribe((msg) => {
      if (ws.readyState !== WebSocket.OPEN) return;
      ws.send(JSON.stringify(msg));
    });

    ws.on('message', (raw) => {
      const msg = parseClientMessage(raw.toString());
      if (!msg) return; // Ignore invalid messages
      try {
        store.regenerate(msg.seed);
      } catch (err) {
        console.warn('[ws] regenerate failed:', err instanceof Error ? err.message : err);
      }
    });

    ws.on('close', () => {
      console.log('[ws] client disconnected');
      unsubscribe();
    });

    ws.on('error', () => {
      unsubscribe();
    });
  });

  return wss;
}
