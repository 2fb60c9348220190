// ============================================================================
// flexwatch: Live feed over WebSocket
// ============================================================================
import type { IncomingMessage, Server } from 'http';
import { WebSocketServer, WebSocket } from 'ws';
import type { AlertFilter, FeedFrame } from '@flexwatch/shared';
import { errorMessage } from '../errors.js';
import { parseFilterQuery } from '../hub/filter.js';
import type { BroadcastHub } from '../hub/service.js';
import type { Subscriber } from '../hub/subscriber.js';
import { logDebug, logInfo, logWarn } from '../logger.js';

/** The parts of a ws socket the pump relies on. */
export interface FeedSocket {
  readonly readyState: number;
  readonly bufferedAmount: number;
  send(data: string): void;
  close(code?: number, reason?: string): void;
  on(event: 'close' | 'error', listener: () => void): unknown;
}

export interface FeedOptions {
  /** Stop writing while this many bytes sit unsent in the socket. */
  highWaterBytes?: number;
  retryMs?: number;
}

const DEFAULT_HIGH_WATER = 1 << 20;
const DEFAULT_RETRY_MS = 50;

/**
 * Connect one socket to the hub: send the snapshot, then pump the
 * subscriber's queue into the socket whenever the socket can take more.
 * While the socket is backed up, alerts wait in the bounded queue.
 */
export function attachFeed(hub: BroadcastHub, socket: FeedSocket, filter: AlertFilter, opts: FeedOptions = {}): Subscriber {
  const highWater = opts.highWaterBytes ?? DEFAULT_HIGH_WATER;
  const retryMs = opts.retryMs ?? DEFAULT_RETRY_MS;
  const { subscriber, snapshot } = hub.subscribe(filter);
  let retry: ReturnType<typeof setTimeout> | null = null;
  let pumping = false;

  const send = (frame: FeedFrame) => socket.send(JSON.stringify(frame));

  const closeSocket = () => {
    if (socket.readyState === WebSocket.OPEN) socket.close(1001, 'feed closed');
  };

  const pump = () => {
    retry = null;
    if (socket.readyState !== WebSocket.OPEN) return;
    pumping = true;
    while (subscriber.queued > 0) {
      if (socket.bufferedAmount >= highWater) {
        retry = setTimeout(pump, retryMs);
        break;
      }
      for (const alert of subscriber.take(1)) send({ type: 'alert', alert });
    }
    pumping = false;
    // Taking the last alert of a draining subscriber closes it mid-loop.
    if (subscriber.state === 'closed') closeSocket();
  };

  const release = () => {
    if (retry) { clearTimeout(retry); retry = null; }
    hub.unsubscribe(subscriber);
  };

  subscriber.on('ready', () => {
    if (!retry) pump();
  });
  subscriber.once('closed', () => {
    if (retry) { clearTimeout(retry); retry = null; }
    if (!pumping) closeSocket();
  });
  socket.on('close', release);
  socket.on('error', release);

  send({ type: 'snapshot', subscriberId: subscriber.id, filter, alerts: snapshot });
  return subscriber;
}

function filterFromRequest(req: IncomingMessage): AlertFilter {
  const url = new URL(req.url ?? '/', 'http://localhost');
  const query: Record<string, string[]> = {};
  for (const [key, value] of url.searchParams) (query[key] ??= []).push(value);
  return parseFilterQuery(query);
}

export function createFeedServer(server: Server, hub: BroadcastHub, opts: FeedOptions = {}): WebSocketServer {
  const wss = new WebSocketServer({ server, path: '/ws' });

  wss.on('connection', (ws: WebSocket, req: IncomingMessage) => {
    let filter: AlertFilter;
    try {
      filter = filterFromRequest(req);
    } catch (err) {
      logWarn(`⚡ Rejected feed connection: ${errorMessage(err)}`);
      ws.close(1008, 'invalid filter');
      return;
    }
    const subscriber = attachFeed(hub, ws, filter, opts);
    logInfo(`⚡ Client connected (${subscriber.id}, ${hub.size} active)`);

    // The filter is fixed for the connection; inbound frames are ignored.
    ws.on('message', () => logDebug(`⚡ Ignoring message from ${subscriber.id}`));
    ws.on('close', () => logInfo(`⚡ Client disconnected (${subscriber.id})`));
  });

  return wss;
}
