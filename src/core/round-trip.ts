/**
 * RoundTripOrchestrator - Send an envelope and wait for its correlated callback
 *
 * roundTripPost():
 * 1. check a destination is configured and the local server is running
 * 2. pick the request ID (caller's, or a generated one)
 * 3. register it and get a delivery slot
 * 4. POST { url: <base>/roundtrip, payload, request_id, tailnet_key }
 * 5. on a failed send, return at once: no callback can be expected
 * 6. otherwise wait on the slot until the timeout
 * 7. unregister in every case
 *
 * roundTripPost never rejects; every failure is a RoundTripResult.
 */

import { ConfigurationError, errorMessage } from '../errors';
import type { RoundTripEnvelope, RoundTripOptions, RoundTripResult } from '../types';
import { postJson, type TransportSelector } from '../transport/transport-selector';
import type { CorrelationRegistry, DeliverySlot } from './correlation-registry';

export const CALLBACK_PATH = '/roundtrip';

/**
 * What the orchestrator needs to know about the server it belongs to
 */
export interface OrchestratorHost {
  getPostURL(): string;
  getURL(): string;
  isRunning(): boolean;
  getDefaultTimeoutMs(): number;
}

let idCounter = 0;

/**
 * Process-unique request ID: high-resolution clock plus a counter
 */
export function generateRequestId(): string {
  idCounter += 1;
  return `req_${process.hrtime.bigint()}_${idCounter}`;
}

export class RoundTripOrchestrator {
  constructor(
    private readonly host: OrchestratorHost,
    private readonly registry: CorrelationRegistry<RoundTripResult>,
    private readonly transports: TransportSelector
  ) {}

  /**
   * Post a payload and wait for the peer to call /roundtrip with the same request ID
   */
  async roundTripPost(payload: unknown, options: RoundTripOptions = {}): Promise<RoundTripResult> {
    const requestId = options.requestId || generateRequestId();

    try {
      this.checkReady();
    } catch (error) {
      return failure(requestId, errorMessage(error));
    }

    let slot: DeliverySlot<RoundTripResult>;
    try {
      slot = this.registry.register(requestId);
    } catch (error) {
      // Someone else owns this ID; leave their entry alone
      console.log(`[ROUNDTRIP] Rejected ${requestId}: ${errorMessage(error)}`);
      return failure(requestId, errorMessage(error));
    }

    console.log(`[ROUNDTRIP] Registered ${requestId} (pending: ${this.registry.size()})`);

    try {
      const envelope: RoundTripEnvelope = {
        url: `${this.host.getURL()}${CALLBACK_PATH}`,
        payload,
        request_id: requestId,
      };
      if (options.tailnetKey) {
        envelope.tailnet_key = options.tailnetKey;
      }

      const destination = this.host.getPostURL();
      try {
        const client = await this.transports.selectTransport(options.tailnetKey);
        const status = await postJson(client, destination, envelope);
        console.log(`[ROUNDTRIP] Sent ${requestId} to ${destination} (${status}), waiting for callback`);
      } catch (error) {
        console.log(`[ROUNDTRIP] Send failed for ${requestId}: ${errorMessage(error)}`);
        return failure(requestId, errorMessage(error));
      }

      const timeoutMs = options.timeoutMs ?? this.host.getDefaultTimeoutMs();
      const outcome = await slot.wait(timeoutMs);

      switch (outcome.status) {
        case 'delivered':
          console.log(`[ROUNDTRIP] Callback received for ${requestId}`);
          return outcome.value;
        case 'timeout':
          console.log(`[ROUNDTRIP] Timed out after ${timeoutMs}ms waiting for ${requestId}`);
          return {
            payload: null,
            success: false,
            error: 'timeout waiting for response',
            timedOut: true,
            requestId,
          };
        case 'closed':
          return failure(requestId, 'round trip cancelled: server stopped');
      }
    } finally {
      this.registry.unregister(requestId);
      console.log(`[ROUNDTRIP] Cleaned up ${requestId} (pending: ${this.registry.size()})`);
    }
  }

  /**
   * Fire-and-forget send: { url: <base>, payload, tailnet_key }
   *
   * @throws ConfigurationError when not ready to send
   * @throws TransportError when the POST fails or returns a non-2xx status
   */
  async postJSON(payload: unknown, tailnetKey?: string): Promise<void> {
    this.checkReady();

    const envelope: RoundTripEnvelope = { url: this.host.getURL(), payload };
    if (tailnetKey) {
      envelope.tailnet_key = tailnetKey;
    }

    const client = await this.transports.selectTransport(tailnetKey);
    await postJson(client, this.host.getPostURL(), envelope);
  }

  private checkReady(): void {
    if (!this.host.getPostURL()) {
      throw new ConfigurationError('post URL not configured');
    }
    if (!this.host.isRunning()) {
      throw new ConfigurationError('server is not running');
    }
  }
}

function failure(requestId: string, error: string): RoundTripResult {
  return { payload: null, success: false, error, timedOut: false, requestId };
}
