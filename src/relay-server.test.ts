/**
 * Round trips between two RelayServers in one process
 *
 * The caller posts to the peer's /webhook; the peer's dispatcher answers
 * on the caller's /roundtrip.
 */

import { describe, it, expect, afterEach } from 'vitest';
import type { AxiosInstance } from 'axios';
import request from 'supertest';
import { TransportError } from './errors';
import { CounterProcessor } from './processors';
import { isPlainObject } from './processors/transform';
import { RelayServer } from './relay-server';
import { startPeer, unusedUrl, waitFor, type TestPeer } from './testing/peer';
import { createHttpClient } from './transport/transport-selector';
import type { SecureTransportProvider } from './transport/secure-transport';
import type { PayloadProcessor, RoundTripEnvelope } from './types';

const localConfig = { host: '127.0.0.1', port: 0, roundTripTimeoutMs: 2000, callbackMaxRetries: 0 };

describe('RelayServer', () => {
  const servers: RelayServer[] = [];
  const peers: TestPeer[] = [];

  afterEach(async () => {
    for (const server of servers.splice(0)) {
      if (server.isRunning()) {
        await server.stop();
      }
    }
    for (const peer of peers.splice(0)) {
      await peer.close();
    }
  });

  async function startRelay(...args: ConstructorParameters<typeof RelayServer>): Promise<RelayServer> {
    const relay = new RelayServer(...args);
    servers.push(relay);
    await relay.start();
    return relay;
  }

  async function startTestPeer(...args: Parameters<typeof startPeer>): Promise<TestPeer> {
    const peer = await startPeer(...args);
    peers.push(peer);
    return peer;
  }

  /**
   * A caller wired to a second relay's /webhook
   */
  async function startPair(processor?: PayloadProcessor): Promise<{ caller: RelayServer; remote: RelayServer }> {
    const remote = await startRelay(localConfig, { processor });
    const caller = await startRelay({ ...localConfig, destinationUrl: `${remote.getURL()}/webhook` });
    return { caller, remote };
  }

  describe('lifecycle', () => {
    it('reports the bound port and URL once started', async () => {
      const relay = await startRelay(localConfig);

      expect(relay.isRunning()).toBe(true);
      expect(relay.getPort()).toBeGreaterThan(0);
      expect(relay.getURL()).toBe(`http://127.0.0.1:${relay.getPort()}`);
    });

    it('refuses to start twice or stop twice', async () => {
      const relay = await startRelay(localConfig);

      await expect(relay.start()).rejects.toThrow('server is already running');
      await relay.stop();
      await expect(relay.stop()).rejects.toThrow('server is not running');
    });

    it('reports localhost when bound to every interface', () => {
      const relay = new RelayServer({ port: 0 });

      expect(relay.getHost()).toBe('localhost');
    });

    it('listens on IPv4 only with tcp4 and reports it', async () => {
      const relay = await startRelay({ port: 0, network: 'tcp4' });

      const res = await request(relay.getURL()).get('/');

      expect(relay.getHost()).toBe('127.0.0.1');
      expect(res.text).toBe(
        `roundtrip relay server\nListening on: 127.0.0.1:${relay.getPort()}\nNetwork: tcp4\nPath: /\n`
      );
    });

    it('reports the IPv6 loopback for tcp6 without a host', () => {
      const relay = new RelayServer({ port: 0 }).withNetwork('tcp6');

      expect(relay.getNetwork()).toBe('tcp6');
      expect(relay.getHost()).toBe('::1');
      expect(relay.getURL()).toBe('http://[::1]:0');
    });

    it('applies builder settings', () => {
      const relay = new RelayServer().withPostURL('http://peer.test/webhook').withTimeout(1234);

      expect(relay.getPostURL()).toBe('http://peer.test/webhook');
      expect(relay.getDefaultTimeoutMs()).toBe(1234);
    });
  });

  describe('roundTripPost', () => {
    it('returns the payload the peer echoes back', async () => {
      const { caller } = await startPair();

      const result = await caller.roundTripPost({ a: 1 });

      expect(result).toMatchObject({ success: true, payload: { a: 1 }, error: '', timedOut: false });
      expect(result.requestId).toMatch(/^req_\d+_\d+$/);
      expect(caller.pendingRoundTrips()).toBe(0);
    });

    it('sends the callback URL and request ID in the envelope', async () => {
      const peer = await startTestPeer();
      const caller = await startRelay({ ...localConfig, destinationUrl: peer.url });

      const result = await caller.roundTripPost({ a: 1 }, { timeoutMs: 50, requestId: 'order-7' });

      expect(result.timedOut).toBe(true);
      expect(peer.received).toEqual([
        { url: `${caller.getURL()}/roundtrip`, payload: { a: 1 }, request_id: 'order-7' },
      ]);
    });

    it('routes each concurrent caller its own answer', async () => {
      const tagger: PayloadProcessor = {
        name: 'tagger',
        process: (payload, requestId) => ({
          marker: isPlainObject(payload) ? payload.marker : undefined,
          request_id: requestId,
        }),
      };
      const { caller } = await startPair(tagger);

      const results = await Promise.all(
        Array.from({ length: 10 }, (_, i) => caller.roundTripPost({ marker: `m${i}` }))
      );

      results.forEach((result, i) => {
        expect(result.success).toBe(true);
        expect(result.payload).toEqual({ marker: `m${i}`, request_id: result.requestId });
      });
      expect(new Set(results.map((result) => result.requestId)).size).toBe(10);
      expect(caller.pendingRoundTrips()).toBe(0);
    });

    it('times out cleanly when the peer acknowledges but never answers', async () => {
      const peer = await startTestPeer();
      const caller = await startRelay({ ...localConfig, destinationUrl: peer.url });

      const started = Date.now();
      const result = await caller.roundTripPost({ a: 1 }, { timeoutMs: 200 });
      const elapsed = Date.now() - started;

      expect(result).toEqual({
        payload: null,
        success: false,
        error: 'timeout waiting for response',
        timedOut: true,
        requestId: result.requestId,
      });
      expect(elapsed).toBeGreaterThanOrEqual(190);
      expect(elapsed).toBeLessThan(1000);
      expect(caller.pendingRoundTrips()).toBe(0);
    });

    it('answers a callback after the timeout with 404', async () => {
      const peer = await startTestPeer();
      const caller = await startRelay({ ...localConfig, destinationUrl: peer.url });

      const result = await caller.roundTripPost({}, { timeoutMs: 50 });
      const late = await request(caller.getURL())
        .post('/roundtrip')
        .send({ request_id: result.requestId, payload: 'too late' });

      expect(late.status).toBe(404);
    });

    it('uses the server default timeout when none is given', async () => {
      const peer = await startTestPeer();
      const caller = await startRelay({ ...localConfig, destinationUrl: peer.url, roundTripTimeoutMs: 100 });

      const result = await caller.roundTripPost({});

      expect(result.timedOut).toBe(true);
    });

    it('fails fast on a non-2xx send without waiting', async () => {
      const peer = await startTestPeer((_req, res) => {
        res.status(500).end();
      });
      const caller = await startRelay({ ...localConfig, destinationUrl: peer.url });

      const started = Date.now();
      const result = await caller.roundTripPost({}, { timeoutMs: 5000 });

      expect(result).toMatchObject({
        success: false,
        timedOut: false,
        error: 'post request failed with status: 500',
      });
      expect(Date.now() - started).toBeLessThan(2000);
      expect(caller.pendingRoundTrips()).toBe(0);
    });

    it('fails fast when the destination is unreachable', async () => {
      const caller = await startRelay({ ...localConfig, destinationUrl: await unusedUrl() });

      const result = await caller.roundTripPost({});

      expect(result.success).toBe(false);
      expect(result.timedOut).toBe(false);
      expect(result.error).toMatch(/^failed to post JSON: /);
      expect(caller.pendingRoundTrips()).toBe(0);
    });

    it('keeps the registry size unchanged over mixed outcomes', async () => {
      const { caller, remote } = await startPair();
      const silent = await startTestPeer();
      const before = caller.pendingRoundTrips();

      await caller.roundTripPost({ ok: true });
      caller.withPostURL(silent.url);
      await Promise.all([caller.roundTripPost({}, { timeoutMs: 50 }), caller.roundTripPost({}, { timeoutMs: 50 })]);
      caller.withPostURL(`${remote.getURL()}/missing`);
      await caller.roundTripPost({});

      expect(caller.pendingRoundTrips()).toBe(before);
    });

    it('refuses to run without a destination', async () => {
      const caller = await startRelay(localConfig);

      const result = await caller.roundTripPost({});

      expect(result).toMatchObject({ success: false, timedOut: false, error: 'post URL not configured' });
    });

    it('refuses to run before the server starts', async () => {
      const peer = await startTestPeer();
      const caller = new RelayServer({ ...localConfig, destinationUrl: peer.url });

      const result = await caller.roundTripPost({});

      expect(result).toMatchObject({ success: false, error: 'server is not running' });
      expect(peer.received).toEqual([]);
    });

    it('rejects a second concurrent call with the same request ID', async () => {
      const peer = await startTestPeer();
      const caller = await startRelay({ ...localConfig, destinationUrl: peer.url });

      const first = caller.roundTripPost({}, { requestId: 'dup', timeoutMs: 200 });
      await waitFor(() => caller.pendingRoundTrips() === 1);
      const second = await caller.roundTripPost({}, { requestId: 'dup' });

      expect(second).toMatchObject({ success: false, error: 'request ID already registered: dup' });
      expect(caller.pendingRoundTrips()).toBe(1);
      await expect(first).resolves.toMatchObject({ timedOut: true, requestId: 'dup' });
    });

    it('resolves waiting calls as cancelled when the server stops', async () => {
      const peer = await startTestPeer();
      const caller = await startRelay({ ...localConfig, destinationUrl: peer.url });

      const pending = caller.roundTripPost({}, { timeoutMs: 5000 });
      await waitFor(() => peer.received.length === 1);
      await caller.stop();

      await expect(pending).resolves.toMatchObject({
        success: false,
        timedOut: false,
        error: 'round trip cancelled: server stopped',
      });
      expect(caller.pendingRoundTrips()).toBe(0);
    });

    it('falls back to plain HTTP for an unusable tailnet key', async () => {
      const { caller } = await startPair();

      const result = await caller.roundTripPost({ a: 1 }, { tailnetKey: 'tskey-test' });

      expect(result).toMatchObject({ success: true, payload: { a: 1 } });
    });

    it('sends through the secure client when the provider supplies one', async () => {
      const { caller } = await startPair();
      let secureUses = 0;
      const secure = createHttpClient(1000);
      secure.interceptors.request.use((config) => {
        secureUses += 1;
        return config;
      });
      const provider: SecureTransportProvider = {
        name: 'test-mesh',
        establishSecureClient: async (): Promise<AxiosInstance> => secure,
      };
      caller.withSecureTransport(provider);

      const result = await caller.roundTripPost({ a: 1 }, { tailnetKey: 'tskey-test' });

      expect(result.success).toBe(true);
      expect(secureUses).toBe(1);
    });
  });

  describe('webhooks', () => {
    it('runs an accepted webhook without a callback URL', async () => {
      const counter = new CounterProcessor();
      const relay = await startRelay(localConfig, { processor: counter });

      const res = await request(relay.getURL()).post('/webhook').send({ payload: { a: 1 } });
      await relay.webhooksIdle();

      expect(res.status).toBe(200);
      expect(counter.getCount()).toBe(1);
    });

    it('stops promptly while a processor never settles', async () => {
      let started = false;
      const stuck: PayloadProcessor = {
        name: 'stuck',
        process: () => {
          started = true;
          return new Promise<never>(() => undefined);
        },
      };
      const relay = await startRelay(localConfig, { processor: stuck });

      await request(relay.getURL()).post('/webhook').send({ payload: {} });
      await waitFor(() => started);
      const stopping = Date.now();
      await relay.stop();

      expect(Date.now() - stopping).toBeLessThan(1000);
      await expect(relay.webhooksIdle()).resolves.toBeUndefined();
    });
  });

  describe('postJSON', () => {
    it('posts the base URL and payload', async () => {
      const peer = await startTestPeer();
      const caller = await startRelay({ ...localConfig, destinationUrl: peer.url });

      await caller.postJSON({ hello: 'world' }, 'tskey-test');

      const expected: RoundTripEnvelope = {
        url: caller.getURL(),
        payload: { hello: 'world' },
        tailnet_key: 'tskey-test',
      };
      expect(peer.received).toEqual([expected]);
    });

    it('rejects with a TransportError on an error status', async () => {
      const peer = await startTestPeer((_req, res) => {
        res.status(404).end();
      });
      const caller = await startRelay({ ...localConfig, destinationUrl: peer.url });

      await expect(caller.postJSON({})).rejects.toBeInstanceOf(TransportError);
    });

    it('rejects without a destination', async () => {
      const caller = await startRelay(localConfig);

      await expect(caller.postJSON({})).rejects.toThrow('post URL not configured');
    });
  });
});
