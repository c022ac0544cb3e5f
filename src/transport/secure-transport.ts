/**
 * Secure transport collaborator
 *
 * A provider turns a mesh-network credential (a tailnet key) into an HTTP
 * client whose requests travel over that network. Establishing the
 * overlay session is the provider's business; the relay only asks for a
 * client and falls back to plain HTTP when it cannot get one.
 */

import type { AxiosInstance } from 'axios';

export interface SecureTransportProvider {
  readonly name: string;
  /**
   * @param credential - Non-empty tailnet key
   * @param signal - Aborted when the relay stops waiting for the session
   */
  establishSecureClient(credential: string, signal: AbortSignal): Promise<AxiosInstance>;
}

/**
 * Provider used when no mesh integration is installed: always refuses,
 * so every keyed request goes out over the plain client.
 */
export class UnavailableSecureTransport implements SecureTransportProvider {
  readonly name = 'unavailable';

  async establishSecureClient(credential: string): Promise<AxiosInstance> {
    throw new Error(
      `no secure transport configured for key ${maskCredential(credential)}`
    );
  }
}

/**
 * First characters of a credential, for logs
 */
export function maskCredential(credential: string): string {
  return `${credential.slice(0, Math.min(credential.length, 10))}...`;
}
