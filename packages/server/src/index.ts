import { createServer } from 'http';
import { createApp, attachSocketServer } from './app';
import { loadServerConfig, loadSceneFile } from './config';
import { SceneStore } from './sceneStore';
import { startWatcher } from './watcher';

const config = loadServerConfig();

const { params, seed } = await loadSceneFile(config.configPath);
const store = new SceneStore(params, seed);

const app = createApp(store, { outputDir: config.outputDir });
const server = createServer(app);
const wss = attachSocketServer(server, store);

// Start config file watcher
const watcher = startWatcher(store, config.configPath);

// Graceful shutdown
process.on('SIGINT', () => {
  console.log('\n[server] shutting down...');
  wss.close();
  server.close();
  watcher.close().then(
    () => process.exit(0),
    (err: unknown) => {
      console.error('[server] error closing watcher:', err instanceof Error ? err.message : err);
      process.exit(1);
    },
  );
});

server.listen(config.port, '127.0.0.1', () => {
  console.log(`[server] listening on http://127.0.0.1:${config.port}`);
  console.log(`[server] WebSocket on ws://127.0.0.1:${config.port}/ws`);
});
