import { describe, it, expect } from 'vitest';
import { defaultConfig, loadConfig } from './config';
import { ConfigurationError } from './errors';

describe('loadConfig', () => {
  it('returns the defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual(defaultConfig);
  });

  it('reads and coerces environment variables', () => {
    const config = loadConfig({
      HOST: '127.0.0.1',
      NETWORK: 'tcp4',
      PORT: '8080',
      DESTINATION_URL: 'http://peer.test:9000/webhook',
      ROUND_TRIP_TIMEOUT_MS: '1500',
      WEBHOOK_WORKERS: '2',
      CALLBACK_MAX_RETRIES: '0',
    });

    expect(config).toMatchObject({
      host: '127.0.0.1',
      network: 'tcp4',
      port: 8080,
      destinationUrl: 'http://peer.test:9000/webhook',
      roundTripTimeoutMs: 1500,
      webhookWorkers: 2,
      callbackMaxRetries: 0,
      httpTimeoutMs: defaultConfig.httpTimeoutMs,
    });
  });

  it('treats blank variables as unset', () => {
    expect(loadConfig({ PORT: '  ', DESTINATION_URL: '' })).toEqual(defaultConfig);
  });

  it('rejects values that do not parse', () => {
    expect(() => loadConfig({ PORT: 'eighty' })).toThrow(ConfigurationError);
    expect(() => loadConfig({ DESTINATION_URL: 'not a url' })).toThrow(
      'Invalid configuration: DESTINATION_URL must be an absolute URL'
    );
    expect(() => loadConfig({ WEBHOOK_WORKERS: '0' })).toThrow('WEBHOOK_WORKERS must be positive');
    expect(() => loadConfig({ NETWORK: 'udp' })).toThrow(
      'Invalid configuration: NETWORK must be tcp, tcp4 or tcp6'
    );
  });
});
