/**
 * Round-Trip Relay - standalone server
 *
 * Serves /roundtrip and /webhook with settings from the environment
 * (and .env). PROCESSOR picks the webhook processor, a comma-separated
 * list builds a chain; PROCESSOR_REQUIRED_FIELDS feeds the validator.
 */

import 'dotenv/config';
import { loadConfig } from './config';
import { errorMessage } from './errors';
import { createProcessor } from './processors';
import { RelayServer } from './relay-server';

async function main(): Promise<void> {
  const config = loadConfig();
  const processor = createProcessor(process.env.PROCESSOR ?? '', {
    requiredFields: (process.env.PROCESSOR_REQUIRED_FIELDS ?? '')
      .split(',')
      .map((field) => field.trim())
      .filter((field) => field !== ''),
    serviceName: process.env.SERVICE_NAME,
  });

  const relay = new RelayServer(config, { processor });
  await relay.start();

  console.log(`
Round-Trip Relay Server Started
------------------------------------
  URL: ${relay.getURL()} (${relay.getNetwork()})
  Destination: ${relay.getPostURL() || '(none)'}
  Processor: ${processor?.name ?? 'none (echo payload)'}
  Round-trip timeout: ${config.roundTripTimeoutMs}ms

  Endpoints:
    POST /roundtrip - Deliver a callback for a waiting round trip
    POST /webhook   - Process a payload and post the result to its url
    GET  /health    - Health check

  Try it:
    curl -X POST ${relay.getURL()}/webhook \\
      -H "Content-Type: application/json" \\
      -d '{"url": "http://localhost:9000/roundtrip", "request_id": "req_1", "payload": {"test": "data"}}'
------------------------------------
  `);

  const shutdown = (signal: string) => {
    console.log(`[SERVER] ${signal} received, shutting down gracefully`);
    relay.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error('[SERVER] Shutdown failed:', errorMessage(error));
        process.exit(1);
      }
    );
  };

  process.once('SIGTERM', () => shutdown('SIGTERM'));
  process.once('SIGINT', () => shutdown('SIGINT'));
}

main().catch((error: unknown) => {
  console.error('[SERVER] Failed to start:', errorMessage(error));
  process.exit(1);
});
