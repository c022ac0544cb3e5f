/**
 * WebhookDispatcher - Background processing and callback delivery for POST /webhook
 *
 * The handler acknowledges each accepted request right away; the job then
 * waits in a BoundedQueue until one of a fixed number of workers picks it
 * up, runs the processor and POSTs the result to the envelope's url.
 *
 * Job states: received -> acknowledged -> processing -> delivering -> done
 * (or failed). Jobs belong to the dispatcher: stop() aborts the ones in
 * flight, drops the queued ones and waits for the workers to finish.
 */

import { TransportError, errorMessage } from '../errors';
import type {
  CallbackMessage,
  PayloadProcessor,
  RoundTripEnvelope,
  WebhookJobState,
} from '../types';
import { postJson, type TransportSelector } from '../transport/transport-selector';
import { BoundedQueue } from './bounded-queue';
import { retryWithBackoff, sleep, untilAborted } from './retry-manager';

export interface WebhookJob {
  id: number;
  envelope: RoundTripEnvelope;
  receivedAt: Date;
  state: WebhookJobState;
}

export interface WebhookDispatcherOptions {
  capacity: number;
  workers: number;
  callbackMaxRetries: number;
  callbackInitialRetryDelayMs: number;
  callbackMaxRetryDelayMs: number;
  callbackDelayMs: number;
  transports: TransportSelector;
  /** Read per job, so a processor swapped at runtime applies to the next job */
  getProcessor: () => PayloadProcessor | undefined;
}

export class WebhookDispatcher {
  private readonly queue: BoundedQueue<WebhookJob>;
  private readonly active = new Set<Promise<void>>();
  private idleWaiters: Array<() => void> = [];
  private controller = new AbortController();
  private stopped = false;
  private running = 0;
  private nextJobId = 1;

  constructor(private readonly options: WebhookDispatcherOptions) {
    if (!Number.isInteger(options.workers) || options.workers <= 0) {
      throw new Error('Worker count must be a positive integer');
    }
    this.queue = new BoundedQueue<WebhookJob>(options.capacity);
  }

  /**
   * Queue an inbound envelope
   *
   * @returns the acknowledged job, or null when the queue is full or the dispatcher is stopped
   */
  submit(envelope: RoundTripEnvelope): WebhookJob | null {
    const job: WebhookJob = {
      id: this.nextJobId++,
      envelope,
      receivedAt: new Date(),
      state: 'received',
    };

    if (this.stopped || !this.queue.enqueue(job)) {
      console.log(`[WEBHOOK] Rejected job ${job.id}: queue ${this.stopped ? 'stopped' : 'full'}`);
      return null;
    }

    job.state = 'acknowledged';
    console.log(`[WEBHOOK] Accepted job ${job.id}`, {
      requestId: envelope.request_id ?? '',
      queueSize: this.queue.size(),
      queueUtilization: `${this.queue.getUtilization().toFixed(1)}%`,
    });

    // Let the handler send its acknowledgement before any processing starts
    setImmediate(() => this.pump());
    return job;
  }

  /**
   * Jobs queued or running
   */
  pending(): number {
    return this.queue.size() + this.running;
  }

  queuedCount(): number {
    return this.queue.size();
  }

  /**
   * Resolves once no job is queued or running
   */
  whenIdle(): Promise<void> {
    if (this.pending() === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  /**
   * Accept jobs again after stop()
   */
  start(): void {
    if (!this.stopped) {
      return;
    }
    this.stopped = false;
    this.controller = new AbortController();
  }

  /**
   * Abort running jobs, drop queued ones, wait for workers to wind down
   */
  async stop(): Promise<void> {
    this.stopped = true;
    this.controller.abort();

    const dropped = this.queue.drain();
    for (const item of dropped) {
      item.data.state = 'failed';
    }
    if (dropped.length > 0) {
      console.log(`[WEBHOOK] Dropped ${dropped.length} queued job(s) on shutdown`);
    }

    await Promise.allSettled([...this.active]);
    this.notifyIfIdle();
  }

  private pump(): void {
    while (!this.stopped && this.running < this.options.workers) {
      const item = this.queue.dequeue();
      if (!item) {
        break;
      }

      this.running += 1;
      const task: Promise<void> = this.runJob(item.data, Date.now() - item.enqueuedAt).finally(() => {
        this.running -= 1;
        this.active.delete(task);
        this.pump();
        this.notifyIfIdle();
      });
      this.active.add(task);
    }
    this.notifyIfIdle();
  }

  private notifyIfIdle(): void {
    if (this.pending() !== 0) {
      return;
    }
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }

  private async runJob(job: WebhookJob, queuedMs: number): Promise<void> {
    const signal = this.controller.signal;
    const { url, request_id: requestId = '', tailnet_key: tailnetKey } = job.envelope;

    try {
      job.state = 'processing';
      const result = await this.processPayload(job, signal);
      if (signal.aborted) {
        job.state = 'failed';
        console.log(`[WEBHOOK] Job ${job.id} aborted during processing`);
        return;
      }

      if (!url) {
        job.state = 'done';
        console.log(`[WEBHOOK] Job ${job.id} processed, no callback URL`);
        return;
      }

      if (this.options.callbackDelayMs > 0) {
        await sleep(this.options.callbackDelayMs, signal);
      }
      if (signal.aborted) {
        job.state = 'failed';
        console.log(`[WEBHOOK] Job ${job.id} aborted before delivery`);
        return;
      }

      job.state = 'delivering';
      const message: CallbackMessage = { request_id: requestId, payload: result };
      if (tailnetKey) {
        message.tailnet_key = tailnetKey;
      }

      const delivery = await retryWithBackoff(
        async () => {
          const client = await this.options.transports.selectTransport(tailnetKey);
          return postJson(client, url, message, signal);
        },
        {
          maxRetries: this.options.callbackMaxRetries,
          initialDelayMs: this.options.callbackInitialRetryDelayMs,
          maxDelayMs: this.options.callbackMaxRetryDelayMs,
          shouldRetry: (error) => error instanceof TransportError && error.isRetryable(),
          signal,
          label: 'WEBHOOK',
        }
      );

      job.state = delivery.success ? 'done' : 'failed';
      console.log(
        `[WEBHOOK] Job ${job.id} ${job.state} after ${delivery.attempts} attempt(s)`,
        {
          requestId,
          queuedMs,
          totalMs: Date.now() - job.receivedAt.getTime(),
          error: delivery.error,
        }
      );
    } catch (error) {
      job.state = 'failed';
      console.error(`[WEBHOOK] Job ${job.id} failed unexpectedly:`, error);
    }
  }

  /**
   * Run the configured processor; a failure becomes an error payload.
   * Stopping the dispatcher stops the wait, not the processor itself.
   */
  private async processPayload(job: WebhookJob, signal: AbortSignal): Promise<unknown> {
    const { payload, url, request_id: requestId = '', tailnet_key: tailnetKey = '' } = job.envelope;
    const processor = this.options.getProcessor();

    if (!processor) {
      return payload;
    }

    try {
      const work = Promise.resolve().then(() =>
        processor.processWithContext
          ? processor.processWithContext(payload, {
              requestId,
              url,
              tailnetKey,
              receivedAt: job.receivedAt,
              signal,
            })
          : processor.process(payload, requestId)
      );
      return await untilAborted(work, signal);
    } catch (error) {
      const message = errorMessage(error);
      console.log(`[WEBHOOK] Processor ${processor.name} failed for job ${job.id}: ${message}`);

      return {
        error: `Processing error: ${message}`,
        request_id: requestId,
        processor: processor.name,
        failed: true,
      };
    }
  }
}
