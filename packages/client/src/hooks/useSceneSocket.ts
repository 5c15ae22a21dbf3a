import { useState, useEffect, useRef, useCallback } from 'react';
import type { ClientMessage, SceneDocument, SceneParameters, WSMessage } from '@ridgeline/shared';

export type ConnectionStatus = 'connected' | 'disconnected' | 'reconnecting';

export interface SceneViewState {
  scene: SceneDocument | null;
  params: SceneParameters | null;
  /** Last reload error from the server, cleared by the next scene */
  error: string | null;
}

export const EMPTY_VIEW: SceneViewState = {
  scene: null,
  params: null,
  error: null,
};

export interface SceneSocketState extends SceneViewState {
  connectionStatus: ConnectionStatus;
  regenerate: (seed?: string) => void;
}

const RECONNECT_DELAY_MS = 2000;

export function useSceneSocket(url: string): SceneSocketState {
  const [view, setView] = useState<SceneViewState>(EMPTY_VIEW);
  const [connectionStatus, setConnectionStatus] = useState<ConnectionStatus>('disconnected');
  const wsRef = useRef<WebSocket | null>(null);
  const reconnectTimer = useRef<ReturnType<typeof setTimeout> | undefined>(undefined);
  const hasConnectedOnce = useRef(false);
  const closedByUnmount = useRef(false);

  const regenerate = useCallback((seed?: string) => {
    const ws = wsRef.current;
    if (!ws || ws.readyState !== WebSocket.OPEN) return;
    const msg: ClientMessage = seed ? { type: 'regenerate', seed } : { type: 'regenerate' };
    ws.send(JSON.stringify(msg));
  }, []);

  const connect = useCallback(() => {
    const ws = new WebSocket(url);
    wsRef.current = ws;

    ws.onopen = () => {
      console.log('[ws] connected');
      setConnectionStatus('connected');
      hasConnectedOnce.current = true;
    };

    ws.onmessage = (event) => {
      const msg = parseServerMessage(String(event.data));
      if (!msg) {
        console.error('[ws] unrecognised message', event.data);
        return;
      }
      try {
        if (msg.type === 'scene') {
          console.log(`[ws] scene: seed=${msg.data.seed} instructions=${msg.data.instructions.length}`);
        }
        setView((prev) => applyMessage(prev, msg));
      } catch (e) {
        console.error('[ws] message error', e);
      }
    };

    ws.onclose = () => {
      if (closedByUnmount.current) return;
      console.log('[ws] disconnected, reconnecting in 2s...');
      setConnectionStatus(hasConnectedOnce.current ? 'reconnecting' : 'disconnected');
      reconnectTimer.current = setTimeout(connect, RECONNECT_DELAY_MS);
    };

    ws.onerror = () => {
      ws.close();
    };
  }, [url]);

  useEffect(() => {
    closedByUnmount.current = false;
    connect();
    return () => {
      closedByUnmount.current = true;
      clearTimeout(reconnectTimer.current);
      wsRef.current?.close();
    };
  }, [connect]);

  return { ...view, connectionStatus, regenerate };
}

const MESSAGE_TYPES: ReadonlySet<string> = new Set(['scene', 'params', 'scene_error']);

/** Parse a server frame; anything that is not a known message is null */
export function parseServerMessage(raw: string): WSMessage | null {
  try {
    const msg: WSMessage = JSON.parse(raw);
    if (!MESSAGE_TYPES.has(msg?.type)) return null;
    return typeof msg.data === 'object' && msg.data !== null && !Array.isArray(msg.data) ? msg : null;
  } catch {
    return null;
  }
}

export function applyMessage(state: SceneViewState, msg: WSMessage): SceneViewState {
  switch (msg.type) {
    case 'scene':
      return { ...state, scene: msg.data, error: null };

    case 'params':
      return { ...state, params: msg.data };

    case 'scene_error':
      return { ...state, error: msg.data.error };

    default:
      return state;
  }
}
