/**
 * POST /webhook - accept an envelope, process and answer in the background
 *
 * Always answers before any processing: 200 when the job is queued,
 * 429 when the queue is full, 400 for a malformed body.
 */

import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import type { WebhookDispatcher } from '../core/webhook-dispatcher';
import { methodNotAllowed } from './responses';

export const WEBHOOK_PATH = '/webhook';

export const webhookEnvelopeSchema = z.object({
  url: z.union([z.string().url(), z.literal('')]).default(''),
  payload: z.unknown(),
  request_id: z.string().optional(),
  tailnet_key: z.string().optional(),
});

export function createWebhookRouter(dispatcher: WebhookDispatcher): Router {
  const router = Router();

  router
    .route(WEBHOOK_PATH)
    .post((req: Request, res: Response) => {
      const parsed = webhookEnvelopeSchema.safeParse(req.body);
      if (!parsed.success) {
        console.log('[WEBHOOK] Rejected malformed envelope');
        return res.status(400).json({ status: 'rejected', message: 'invalid webhook envelope' });
      }

      const { url, payload, request_id, tailnet_key } = parsed.data;
      const job = dispatcher.submit({ url, payload: payload ?? null, request_id, tailnet_key });
      if (!job) {
        return res.status(429).json({ status: 'rejected', message: 'Webhook queue full' });
      }

      return res.status(200).json({ status: 'received', message: 'Processing request' });
    })
    .all(methodNotAllowed);

  return router;
}
