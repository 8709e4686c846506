import { WebSocketServer, WebSocket } from 'ws';
import type { Server } from 'http';
import { logger } from '../logger';
import type { SessionOrchestrator } from '../services/sessionOrchestrator';
import type { SessionSnapshot } from '../types';

const PING_INTERVAL_MS = 10000;

export interface EventStreamMessage {
  type: 'snapshot';
  data: SessionSnapshot;
}

/**
 * Pushes a session snapshot to every client on connect and on every
 * session change. Returns a function that detaches the stream.
 */
export function attachEventStream(
  server: Server,
  session: Pick<SessionOrchestrator, 'snapshot' | 'onChange'>,
): () => Promise<void> {
  const wss = new WebSocketServer({ server, path: '/ws/events' });

  const send = (ws: WebSocket, snapshot: SessionSnapshot) => {
    if (ws.readyState !== WebSocket.OPEN) return;
    const message: EventStreamMessage = { type: 'snapshot', data: snapshot };
    ws.send(JSON.stringify(message));
  };

  wss.on('connection', (ws: WebSocket, req) => {
    const clientIp = req.socket.remoteAddress || 'unknown';
    logger.info({ module: 'ws.events', client_ip: clientIp, clients: wss.clients.size }, 'WS client connected');

    const pingInterval = setInterval(() => {
      if (ws.readyState === WebSocket.OPEN) {
        ws.ping();
      }
    }, PING_INTERVAL_MS);

    ws.on('close', (code) => {
      clearInterval(pingInterval);
      logger.info({ module: 'ws.events', client_ip: clientIp, close_code: code }, 'WS client disconnected');
    });

    ws.on('error', (err) => {
      logger.warn({ module: 'ws.events', client_ip: clientIp, error_detail: err.message }, 'WS client error');
    });

    send(ws, session.snapshot());
  });

  const unsubscribe = session.onChange((snapshot) => {
    wss.clients.forEach((ws) => send(ws, snapshot));
  });

  return () => {
    unsubscribe();
    wss.clients.forEach((ws) => ws.terminate());
    return new Promise((resolve, reject) => {
      wss.close((err) => (err ? reject(err) : resolve()));
    });
  };
}
