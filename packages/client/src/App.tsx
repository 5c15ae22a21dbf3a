import { LandscapeScene } from './components/LandscapeScene';
import { useSceneSocket } from './hooks/useSceneSocket';
import type { ConnectionStatus } from './hooks/useSceneSocket';

function socketUrl(): string {
  const protocol = window.location.protocol === 'https:' ? 'wss' : 'ws';
  return `${protocol}://${window.location.host}/ws`;
}

function ConnectionDot({ status }: { status: ConnectionStatus }) {
  const label =
    status === 'connected' ? 'Connected' :
    status === 'reconnecting' ? 'Reconnecting...' :
    'Disconnected';

  return (
    <span className={`connection-dot ${status}`} title={label}>
      <span className="connection-dot-circle" />
      <span className="connection-dot-label">{label}</span>
    </span>
  );
}

export default function App() {
  const { scene, params, error, connectionStatus, regenerate } = useSceneSocket(socketUrl());

  return (
    <div className="app-wrapper">
      <header className="app-header">
        <div className="header-left">
          <ConnectionDot status={connectionStatus} />
          <span className="header-title">Ridgeline</span>
          {scene && <span className="badge badge-seed" title="Seed">{scene.seed}</span>}
          {params && (
            <span className="badge">
              {params.width}×{params.height} · {params.mountainRangeCount} ridges
            </span>
          )}
        </div>
        <div className="header-right">
          {scene && (
            <a className="header-link" href={`/api/scene.svg?seed=${encodeURIComponent(scene.seed)}`} download={`landscape-${scene.seed}.svg`}>
              Download SVG
            </a>
          )}
          <button
            type="button"
            className="header-button"
            onClick={() => regenerate()}
            disabled={connectionStatus !== 'connected'}
          >
            New landscape
          </button>
        </div>
      </header>

      {error && <div className="alert-bar" role="alert">{error}</div>}

      <main className="scene-container">
        {scene ? <LandscapeScene scene={scene} /> : <div className="scene-placeholder">Waiting for the first scene...</div>}
      </main>
    </div>
  );
}
