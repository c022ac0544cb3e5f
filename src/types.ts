/**
 * Core types for the Round-Trip Relay
 */

/**
 * Envelope sent to the remote peer (and accepted by POST /webhook)
 *
 * Field names are the wire names.
 */
export interface RoundTripEnvelope {
  /** Where the peer should POST its answer */
  url: string;
  payload: unknown;
  request_id?: string;
  /** Credential the peer may use to choose a secure transport for its answer */
  tailnet_key?: string;
}

/**
 * Body a peer POSTs to /roundtrip
 */
export interface CallbackMessage {
  request_id: string;
  payload: unknown;
  tailnet_key?: string;
}

/**
 * Outcome of a round trip, returned to the caller
 */
export interface RoundTripResult {
  /** What the peer delivered; null when nothing arrived */
  payload: unknown;
  success: boolean;
  /** Empty on success */
  error: string;
  /** Only ever true together with success === false */
  timedOut: boolean;
  requestId: string;
}

export interface RoundTripOptions {
  /** Secure transport credential, also forwarded to the peer */
  tailnetKey?: string;
  /** Overrides the server's default round-trip timeout */
  timeoutMs?: number;
  /**
   * Reuse a caller-chosen correlation key instead of generating one.
   * Two concurrent calls with the same key collide: the second fails.
   */
  requestId?: string;
}

export type DeliveryOutcome = 'delivered' | 'not_found' | 'gone';

/**
 * Information a context-aware processor receives about the inbound request
 */
export interface ProcessorContext {
  requestId: string;
  /** Callback URL from the inbound envelope */
  url: string;
  tailnetKey: string;
  receivedAt: Date;
  /** Aborted when the server stops; long-running processors may stop early */
  signal?: AbortSignal;
}

/**
 * Pluggable payload transform used by POST /webhook
 *
 * Implementations are stateless, or keep their state consistent under
 * concurrent jobs.
 */
export interface PayloadProcessor {
  readonly name: string;
  process(payload: unknown, requestId: string): unknown | Promise<unknown>;
  processWithContext?(payload: unknown, context: ProcessorContext): unknown | Promise<unknown>;
}

/**
 * Lifecycle of one inbound webhook request
 */
export type WebhookJobState =
  | 'received'
  | 'acknowledged'
  | 'processing'
  | 'delivering'
  | 'done'
  | 'failed';
