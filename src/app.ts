/**
 * Express application for a RelayServer
 */

import express, { type Express, type Request, type Response } from 'express';
import type { ListenNetwork } from './config';
import type { CorrelationRegistry } from './core/correlation-registry';
import type { WebhookDispatcher } from './core/webhook-dispatcher';
import { createCallbackRouter } from './http/callback-handler';
import { errorHandler } from './http/responses';
import { createWebhookRouter } from './http/webhook-handler';
import type { RoundTripResult } from './types';

export interface AppDependencies {
  registry: CorrelationRegistry<RoundTripResult>;
  dispatcher: WebhookDispatcher;
  /** Listen address shown on the info page */
  describe: () => { host: string; port: number; network: ListenNetwork };
}

export function createApp({ registry, dispatcher, describe }: AppDependencies): Express {
  const app = express();

  app.use(express.json({ limit: '1mb' }));

  app.use(createCallbackRouter(registry));
  app.use(createWebhookRouter(dispatcher));

  /**
   * GET /health
   */
  app.get('/health', (req: Request, res: Response) => {
    res.status(200).json({
      status: 'healthy',
      uptime: process.uptime(),
      pendingRoundTrips: registry.size(),
      queuedWebhooks: dispatcher.queuedCount(),
      timestamp: new Date().toISOString(),
    });
  });

  /**
   * GET / - plain-text server info
   */
  app.get('/', (req: Request, res: Response) => {
    const { host, port, network } = describe();
    res
      .status(200)
      .type('text/plain')
      .send(`roundtrip relay server\nListening on: ${host}:${port}\nNetwork: ${network}\nPath: ${req.path}\n`);
  });

  app.use(errorHandler);

  return app;
}
