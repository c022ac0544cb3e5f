/**
 * Configuration for the Round-Trip Relay
 *
 * A RelayConfig is passed explicitly to each RelayServer. defaultConfig
 * holds the documented defaults; loadConfig() overlays environment
 * variables on top of them.
 */

import { z } from 'zod';
import { ConfigurationError } from './errors';

/** Address family to listen on; plain tcp takes both where the OS allows */
export type ListenNetwork = 'tcp' | 'tcp4' | 'tcp6';

export interface RelayConfig {
  /** Interface to bind; empty string means all interfaces of the network */
  host: string;
  network: ListenNetwork;
  /** 0 picks an ephemeral port */
  port: number;
  /** Remote webhook that receives outbound envelopes */
  destinationUrl: string;
  /** How long roundTripPost waits for the callback */
  roundTripTimeoutMs: number;
  /** Per-request timeout of the plain HTTP client */
  httpTimeoutMs: number;
  /** How long a secure transport gets to come up before we fall back */
  secureSetupTimeoutMs: number;
  /** Pending webhook jobs before /webhook answers 429 */
  webhookQueueCapacity: number;
  /** Webhook jobs processed concurrently */
  webhookWorkers: number;
  /** Extra attempts for a failed callback delivery */
  callbackMaxRetries: number;
  callbackInitialRetryDelayMs: number;
  callbackMaxRetryDelayMs: number;
  /** Pause before a webhook result is posted back */
  callbackDelayMs: number;
}

export const defaultConfig: RelayConfig = {
  // Server
  host: '',
  network: 'tcp',
  port: 0,

  // Outbound
  destinationUrl: '',
  httpTimeoutMs: 30000,         // Plain client, applies to each POST on its own
  secureSetupTimeoutMs: 5000,

  // Round trips
  roundTripTimeoutMs: 30000,    // Overridable per call

  // Webhook processing
  webhookQueueCapacity: 100,
  webhookWorkers: 5,

  // Callback delivery retries (transport errors and 5xx only)
  callbackMaxRetries: 2,
  callbackInitialRetryDelayMs: 100,
  callbackMaxRetryDelayMs: 2000,
  callbackDelayMs: 0,
};

const intFrom = (name: string) =>
  z.coerce
    .number({ invalid_type_error: `${name} must be a number` })
    .int(`${name} must be an integer`)
    .nonnegative(`${name} must not be negative`);

const envSchema = z.object({
  HOST: z.string().optional(),
  NETWORK: z
    .enum(['tcp', 'tcp4', 'tcp6'], { errorMap: () => ({ message: 'NETWORK must be tcp, tcp4 or tcp6' }) })
    .optional(),
  PORT: intFrom('PORT').max(65535, 'PORT must be at most 65535').optional(),
  DESTINATION_URL: z.string().url('DESTINATION_URL must be an absolute URL').optional(),
  ROUND_TRIP_TIMEOUT_MS: intFrom('ROUND_TRIP_TIMEOUT_MS').optional(),
  HTTP_TIMEOUT_MS: intFrom('HTTP_TIMEOUT_MS').optional(),
  SECURE_SETUP_TIMEOUT_MS: intFrom('SECURE_SETUP_TIMEOUT_MS').optional(),
  WEBHOOK_QUEUE_CAPACITY: intFrom('WEBHOOK_QUEUE_CAPACITY').min(1, 'WEBHOOK_QUEUE_CAPACITY must be positive').optional(),
  WEBHOOK_WORKERS: intFrom('WEBHOOK_WORKERS').min(1, 'WEBHOOK_WORKERS must be positive').optional(),
  CALLBACK_MAX_RETRIES: intFrom('CALLBACK_MAX_RETRIES').optional(),
  CALLBACK_DELAY_MS: intFrom('CALLBACK_DELAY_MS').optional(),
});

/**
 * Build a config from environment variables
 *
 * Empty variables are treated as unset.
 *
 * @throws ConfigurationError when a variable does not parse
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  base: RelayConfig = defaultConfig
): RelayConfig {
  const present: Record<string, string> = {};
  for (const key of Object.keys(envSchema.shape)) {
    const value = env[key];
    if (value !== undefined && value.trim() !== '') {
      present[key] = value.trim();
    }
  }

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => issue.message).join('; ');
    throw new ConfigurationError(`Invalid configuration: ${issues}`);
  }

  const vars = parsed.data;
  return {
    ...base,
    host: vars.HOST ?? base.host,
    network: vars.NETWORK ?? base.network,
    port: vars.PORT ?? base.port,
    destinationUrl: vars.DESTINATION_URL ?? base.destinationUrl,
    roundTripTimeoutMs: vars.ROUND_TRIP_TIMEOUT_MS ?? base.roundTripTimeoutMs,
    httpTimeoutMs: vars.HTTP_TIMEOUT_MS ?? base.httpTimeoutMs,
    secureSetupTimeoutMs: vars.SECURE_SETUP_TIMEOUT_MS ?? base.secureSetupTimeoutMs,
    webhookQueueCapacity: vars.WEBHOOK_QUEUE_CAPACITY ?? base.webhookQueueCapacity,
    webhookWorkers: vars.WEBHOOK_WORKERS ?? base.webhookWorkers,
    callbackMaxRetries: vars.CALLBACK_MAX_RETRIES ?? base.callbackMaxRetries,
    callbackDelayMs: vars.CALLBACK_DELAY_MS ?? base.callbackDelayMs,
  };
}
