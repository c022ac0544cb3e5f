/**
 * Transport selection for outbound POSTs
 *
 * Without a tailnet key every POST uses the plain client. With one, the
 * configured SecureTransportProvider is asked for a mesh-routed client;
 * when that fails for any reason (bad key, slow setup, no provider) the
 * failure is logged and the plain client is used instead.
 */

import axios, { type AxiosInstance } from 'axios';
import { TransportError, errorMessage } from '../errors';
import {
  maskCredential,
  UnavailableSecureTransport,
  type SecureTransportProvider,
} from './secure-transport';

export interface TransportSelectorOptions {
  httpTimeoutMs: number;
  secureSetupTimeoutMs: number;
  provider?: SecureTransportProvider;
  /** Keep one secure client per credential instead of setting one up per POST */
  cacheSecureClients?: boolean;
}

/**
 * Plain JSON client. Statuses are checked by postJson, not by axios.
 */
export function createHttpClient(timeoutMs: number): AxiosInstance {
  return axios.create({
    timeout: timeoutMs,
    headers: { 'Content-Type': 'application/json' },
    validateStatus: () => true,
  });
}

export class TransportSelector {
  private readonly plainClient: AxiosInstance;
  private provider: SecureTransportProvider;
  private readonly secureClients = new Map<string, AxiosInstance>();

  constructor(private readonly options: TransportSelectorOptions) {
    this.plainClient = createHttpClient(options.httpTimeoutMs);
    this.provider = options.provider ?? new UnavailableSecureTransport();
  }

  getPlainClient(): AxiosInstance {
    return this.plainClient;
  }

  getProviderName(): string {
    return this.provider.name;
  }

  /**
   * Client for one outbound POST
   */
  async selectTransport(tailnetKey?: string): Promise<AxiosInstance> {
    if (!tailnetKey) {
      return this.plainClient;
    }

    const cached = this.secureClients.get(tailnetKey);
    if (cached) {
      return cached;
    }

    try {
      const client = await this.establishWithTimeout(tailnetKey);
      if (this.options.cacheSecureClients) {
        this.secureClients.set(tailnetKey, client);
      }
      console.log(`[TRANSPORT] Using secure transport (${this.provider.name}) for key ${maskCredential(tailnetKey)}`);
      return client;
    } catch (error) {
      console.warn(
        `[TRANSPORT] Secure transport unavailable for key ${maskCredential(tailnetKey)}, falling back to plain HTTP: ${errorMessage(error)}`
      );
      return this.plainClient;
    }
  }

  /**
   * Swap the secure transport collaborator; cached clients are dropped
   */
  setProvider(provider: SecureTransportProvider): void {
    this.provider = provider;
    this.secureClients.clear();
  }

  /**
   * Forget cached secure clients
   */
  reset(): void {
    this.secureClients.clear();
  }

  private establishWithTimeout(tailnetKey: string): Promise<AxiosInstance> {
    const controller = new AbortController();
    const timeoutMs = this.options.secureSetupTimeoutMs;

    return new Promise<AxiosInstance>((resolve, reject) => {
      const timer = setTimeout(() => {
        controller.abort();
        reject(new Error(`secure transport setup timed out after ${timeoutMs}ms`));
      }, timeoutMs);

      // A provider that throws instead of rejecting still clears the timer
      Promise.resolve()
        .then(() => this.provider.establishSecureClient(tailnetKey, controller.signal))
        .then(
          (client) => {
            clearTimeout(timer);
            resolve(client);
          },
          (error: unknown) => {
            clearTimeout(timer);
            reject(error);
          }
        );
    });
  }
}

/**
 * POST a JSON body and require a 2xx answer
 *
 * @returns The response status
 * @throws TransportError on network failure or any other status
 */
export async function postJson(
  client: AxiosInstance,
  url: string,
  body: unknown,
  signal?: AbortSignal
): Promise<number> {
  let status: number;
  try {
    const response = await client.post(url, body, { signal });
    status = response.status;
  } catch (error) {
    throw new TransportError(`failed to post JSON: ${errorMessage(error)}`, undefined, url);
  }

  if (status < 200 || status >= 300) {
    throw new TransportError(`post request failed with status: ${status}`, status, url);
  }
  return status;
}
