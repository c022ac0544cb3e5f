export { RelayServer } from './relay-server';
export type { RelayServerDependencies } from './relay-server';
export { createApp } from './app';
export { defaultConfig, loadConfig } from './config';
export type { ListenNetwork, RelayConfig } from './config';
export { CorrelationRegistry, DeliverySlot } from './core/correlation-registry';
export type { WaitOutcome } from './core/correlation-registry';
export { RoundTripOrchestrator, generateRequestId, CALLBACK_PATH } from './core/round-trip';
export { WebhookDispatcher } from './core/webhook-dispatcher';
export type { WebhookJob } from './core/webhook-dispatcher';
export { TransportSelector, createHttpClient, postJson } from './transport/transport-selector';
export { UnavailableSecureTransport } from './transport/secure-transport';
export type { SecureTransportProvider } from './transport/secure-transport';
export * from './processors';
export * from './errors';
export type * from './types';
