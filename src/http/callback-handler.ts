/**
 * POST /roundtrip - callback delivery endpoint
 *
 * Moves a peer's answer from the wire into the correlation registry.
 * The payload is handed over as received.
 *
 * 200 delivered, 400 bad body, 404 unknown request_id,
 * 405 wrong method, 410 already resolved
 */

import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import type { CorrelationRegistry } from '../core/correlation-registry';
import { CALLBACK_PATH } from '../core/round-trip';
import type { RoundTripResult } from '../types';
import { methodNotAllowed } from './responses';

export const callbackMessageSchema = z.object({
  request_id: z.string(),
  payload: z.unknown(),
  tailnet_key: z.string().optional(),
});

export function createCallbackRouter(registry: CorrelationRegistry<RoundTripResult>): Router {
  const router = Router();

  router
    .route(CALLBACK_PATH)
    .post((req: Request, res: Response) => {
      const parsed = callbackMessageSchema.safeParse(req.body);
      if (!parsed.success) {
        console.log('[CALLBACK] Rejected malformed callback body');
        return res.status(400).json({ success: false, error: 'request_id (string) is required' });
      }

      const { request_id: requestId, payload } = parsed.data;
      const outcome = registry.deliver(requestId, {
        payload: payload ?? null,
        success: true,
        error: '',
        timedOut: false,
        requestId,
      });

      switch (outcome) {
        case 'delivered':
          console.log(`[CALLBACK] Delivered response for ${requestId}`);
          return res.status(200).type('text/plain').send('Response received');
        case 'not_found':
          console.log(`[CALLBACK] No round trip waiting for ${requestId} (pending: ${registry.size()})`);
          return res.status(404).json({ success: false, error: 'unknown request_id' });
        case 'gone':
          console.log(`[CALLBACK] Round trip ${requestId} already resolved`);
          return res.status(410).json({ success: false, error: 'request already resolved' });
      }
    })
    .all(methodNotAllowed);

  return router;
}
