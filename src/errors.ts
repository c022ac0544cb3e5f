/**
 * Structured error types for the Round-Trip Relay
 *
 * Configuration and transport errors surface to the caller of
 * postJSON/roundTripPost. Correlation errors surface to the inbound
 * peer as HTTP statuses. Processing errors are turned into an error
 * payload and delivered to the callback URL.
 */

/**
 * Missing destination URL, server not started, invalid env values
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }

  toJSON(): Record<string, unknown> {
    return { name: this.name, message: this.message };
  }
}

/**
 * Network failure or non-2xx status on an outbound POST
 */
export class TransportError extends Error {
  /**
   * @param message - Human-readable error message
   * @param status - HTTP status of the response, when one was received
   * @param url - Target of the failed POST
   */
  constructor(
    message: string,
    public readonly status?: number,
    public readonly url?: string
  ) {
    super(message);
    this.name = 'TransportError';
  }

  /**
   * Whether another attempt could succeed (no response, or a 5xx)
   */
  isRetryable(): boolean {
    return this.status === undefined || this.status >= 500;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      status: this.status,
      url: this.url,
    };
  }
}

/**
 * A request ID is already waiting in the correlation registry
 */
export class DuplicateRequestError extends Error {
  constructor(public readonly requestId: string) {
    super(`request ID already registered: ${requestId}`);
    this.name = 'DuplicateRequestError';
  }

  toJSON(): Record<string, unknown> {
    return { name: this.name, message: this.message, requestId: this.requestId };
  }
}

/**
 * A payload processor rejected its input
 */
export class ProcessingError extends Error {
  constructor(
    message: string,
    public readonly options: {
      /** Processor that failed */
      processor?: string;
      /** Index of the failing stage inside a chain */
      stage?: number;
      /** Original error */
      cause?: unknown;
    } = {}
  ) {
    super(message);
    this.name = 'ProcessingError';
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      processor: this.options.processor,
      stage: this.options.stage,
      cause: this.options.cause instanceof Error ? this.options.cause.message : undefined,
    };
  }
}

/**
 * Message of any thrown value, for logs and result payloads
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
