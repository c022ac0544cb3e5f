/**
 * RelayServer - local HTTP server plus the outbound side of the round trip
 *
 * One instance owns its registry, transport selector, webhook dispatcher
 * and listening socket. Nothing is shared between instances, so a test
 * can run a caller and a peer in the same process.
 *
 * ```typescript
 * const relay = new RelayServer({ ...defaultConfig, destinationUrl: 'http://peer:8080/webhook' });
 * await relay.start();
 * const result = await relay.roundTripPost({ hello: 'world' }, { timeoutMs: 5000 });
 * await relay.stop();
 * ```
 */

import { createServer, type Server } from 'node:http';
import type { ListenOptions } from 'node:net';
import { createApp } from './app';
import { defaultConfig, type ListenNetwork, type RelayConfig } from './config';
import { CorrelationRegistry } from './core/correlation-registry';
import { RoundTripOrchestrator } from './core/round-trip';
import { WebhookDispatcher } from './core/webhook-dispatcher';
import { ConfigurationError } from './errors';
import type { SecureTransportProvider } from './transport/secure-transport';
import { TransportSelector } from './transport/transport-selector';
import type { PayloadProcessor, RoundTripOptions, RoundTripResult } from './types';

export interface RelayServerDependencies {
  processor?: PayloadProcessor;
  secureTransport?: SecureTransportProvider;
}

export class RelayServer {
  private readonly config: RelayConfig;
  private readonly registry = new CorrelationRegistry<RoundTripResult>();
  private readonly transports: TransportSelector;
  private readonly dispatcher: WebhookDispatcher;
  private readonly orchestrator: RoundTripOrchestrator;
  private server?: Server;
  private running = false;
  private port: number;
  private processor?: PayloadProcessor;

  constructor(config: Partial<RelayConfig> = {}, deps: RelayServerDependencies = {}) {
    this.config = { ...defaultConfig, ...config };
    this.port = this.config.port;
    this.processor = deps.processor;

    this.transports = new TransportSelector({
      httpTimeoutMs: this.config.httpTimeoutMs,
      secureSetupTimeoutMs: this.config.secureSetupTimeoutMs,
      provider: deps.secureTransport,
    });

    this.dispatcher = new WebhookDispatcher({
      capacity: this.config.webhookQueueCapacity,
      workers: this.config.webhookWorkers,
      callbackMaxRetries: this.config.callbackMaxRetries,
      callbackInitialRetryDelayMs: this.config.callbackInitialRetryDelayMs,
      callbackMaxRetryDelayMs: this.config.callbackMaxRetryDelayMs,
      callbackDelayMs: this.config.callbackDelayMs,
      transports: this.transports,
      getProcessor: () => this.processor,
    });

    this.orchestrator = new RoundTripOrchestrator(this, this.registry, this.transports);
  }

  withPostURL(url: string): this {
    this.config.destinationUrl = url;
    return this;
  }

  /**
   * Default wait for roundTripPost
   */
  withTimeout(timeoutMs: number): this {
    this.config.roundTripTimeoutMs = timeoutMs;
    return this;
  }

  /**
   * Address family for the next start()
   */
  withNetwork(network: ListenNetwork): this {
    this.config.network = network;
    return this;
  }

  withProcessor(processor: PayloadProcessor | undefined): this {
    this.processor = processor;
    return this;
  }

  withSecureTransport(provider: SecureTransportProvider): this {
    this.transports.setProvider(provider);
    return this;
  }

  /**
   * Bind and serve; with port 0 the OS picks the port (see getPort)
   */
  async start(): Promise<void> {
    if (this.running) {
      throw new ConfigurationError('server is already running');
    }

    const app = createApp({
      registry: this.registry,
      dispatcher: this.dispatcher,
      describe: () => ({ host: this.getHost(), port: this.port, network: this.getNetwork() }),
    });
    this.dispatcher.start();

    const server = createServer(app);
    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.listenOptions(), () => {
        server.off('error', reject);
        resolve();
      });
    });

    const address = server.address();
    if (address !== null && typeof address === 'object') {
      this.port = address.port;
    }
    this.server = server;
    this.running = true;

    console.log(
      `[SERVER] Listening on ${this.getURL()} (${this.getNetwork()}, routes: /, /health, /roundtrip, /webhook)`
    );
  }

  /**
   * Stop serving. Waiting round trips resolve as cancelled, webhook jobs
   * in flight are aborted.
   */
  async stop(): Promise<void> {
    if (!this.running) {
      throw new ConfigurationError('server is not running');
    }
    this.running = false;

    this.registry.closeAll();
    await this.dispatcher.stop();

    const server = this.server;
    this.server = undefined;
    if (server) {
      await new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
        server.closeAllConnections();
      });
    }

    this.transports.reset();
    console.log('[SERVER] Server closed');
  }

  /**
   * Post a payload to the destination and wait for the correlated callback
   */
  roundTripPost(payload: unknown, options: RoundTripOptions = {}): Promise<RoundTripResult> {
    return this.orchestrator.roundTripPost(payload, options);
  }

  /**
   * Post a payload to the destination without waiting for an answer
   */
  postJSON(payload: unknown, tailnetKey?: string): Promise<void> {
    return this.orchestrator.postJSON(payload, tailnetKey);
  }

  isRunning(): boolean {
    return this.running;
  }

  getPort(): number {
    return this.port;
  }

  /**
   * Bound interface, or the loopback address of the network when bound to all of them
   */
  getHost(): string {
    if (this.config.host) {
      return this.config.host;
    }
    switch (this.config.network) {
      case 'tcp4':
        return '127.0.0.1';
      case 'tcp6':
        return '::1';
      case 'tcp':
        return 'localhost';
    }
  }

  getNetwork(): ListenNetwork {
    return this.config.network;
  }

  getURL(): string {
    const host = this.getHost().includes(':') ? `[${this.getHost()}]` : this.getHost();
    return `http://${host}:${this.port}`;
  }

  getPostURL(): string {
    return this.config.destinationUrl;
  }

  getDefaultTimeoutMs(): number {
    return this.config.roundTripTimeoutMs;
  }

  /**
   * In-flight round trips
   */
  pendingRoundTrips(): number {
    return this.registry.size();
  }

  /**
   * Resolves once every accepted webhook job has finished
   */
  webhooksIdle(): Promise<void> {
    return this.dispatcher.whenIdle();
  }

  private listenOptions(): ListenOptions {
    const { host, port, network } = this.config;
    switch (network) {
      case 'tcp4':
        return { port, host: host || '0.0.0.0' };
      case 'tcp6':
        return { port, host: host || '::', ipv6Only: true };
      case 'tcp':
        return { port, host: host || undefined };
    }
  }
}
