import express from 'express';
import cors from 'cors';
import { createServer, type Server } from 'http';
import type { WebSocketServer } from 'ws';
import { createApiRouter, type ApiDeps } from './api/routes.js';
import { createFeedServer, type FeedOptions } from './feed/websocket.js';

export interface HttpSurface {
  app: express.Express;
  server: Server;
  wss: WebSocketServer;
}

/** Express API under /api and the live feed at /ws on one HTTP server. */
export function createHttpSurface(deps: ApiDeps, feed: FeedOptions = {}): HttpSurface {
  const app = express();
  app.use(cors());
  app.use(express.json());
  app.use('/api', createApiRouter(deps));

  const server = createServer(app);
  const wss = createFeedServer(server, deps.hub, feed);
  return { app, server, wss };
}

export function listen(server: Server, port: number, host: string): Promise<number> {
  return new Promise((resolve, reject) => {
    const onError = (err: Error) => reject(err);
    server.once('error', onError);
    server.listen(port, host, () => {
      server.off('error', onError);
      const address = server.address();
      resolve(typeof address === 'object' && address ? address.port : port);
    });
  });
}

export function closeSurface(surface: HttpSurface): Promise<void> {
  for (const client of surface.wss.clients) client.terminate();
  return new Promise((resolve, reject) => {
    surface.wss.close(() => {
      surface.server.close((err) => (err ? reject(err) : resolve()));
    });
  });
}
