/**
 * Stateless and counting payload processors
 */

import type { PayloadProcessor, ProcessorContext } from '../types';
import { maskCredential } from '../transport/secure-transport';

/**
 * Ignores the payload and greets
 */
export class HelloWorldProcessor implements PayloadProcessor {
  readonly name = 'hello';

  process(_payload: unknown, requestId: string): unknown {
    return {
      message: 'Hello World',
      request_id: requestId,
      timestamp: new Date().toISOString(),
    };
  }
}

/**
 * Returns the payload untouched under original_payload, with metadata
 */
export class EchoProcessor implements PayloadProcessor {
  readonly name = 'echo';

  process(payload: unknown, requestId: string): unknown {
    return {
      original_payload: payload,
      request_id: requestId,
      processed_at: new Date().toISOString(),
      processor: this.name,
      status: 'echoed',
    };
  }
}

export class TimestampProcessor implements PayloadProcessor {
  readonly name = 'timestamp';

  process(payload: unknown, requestId: string): unknown {
    const now = new Date();
    return {
      data: payload,
      request_id: requestId,
      processed_at: now.toISOString(),
      unix_time: Math.floor(now.getTime() / 1000),
      day_of_week: now.toLocaleDateString('en-US', { weekday: 'long', timeZone: 'UTC' }),
      processor: this.name,
    };
  }
}

/**
 * Numbers each request it sees
 *
 * The increment and the read happen in one synchronous step, so
 * concurrent webhook jobs each get a distinct number.
 */
export class CounterProcessor implements PayloadProcessor {
  readonly name = 'counter';
  private count = 0;

  process(payload: unknown, requestId: string): unknown {
    this.count += 1;
    const count = this.count;
    return {
      payload,
      request_id: requestId,
      count,
      processed_at: new Date().toISOString(),
      processor: this.name,
      message: `This is request number ${count}`,
    };
  }

  getCount(): number {
    return this.count;
  }
}

/**
 * Reports the inbound request's context next to the payload
 */
export class ContextProcessor implements PayloadProcessor {
  readonly name = 'context';

  constructor(private readonly serviceName: string) {}

  process(payload: unknown, requestId: string): unknown {
    return this.processWithContext(payload, {
      requestId,
      url: '',
      tailnetKey: '',
      receivedAt: new Date(),
    });
  }

  processWithContext(payload: unknown, context: ProcessorContext): unknown {
    const response: Record<string, unknown> = {
      service_name: this.serviceName,
      original_payload: payload,
      context: {
        request_id: context.requestId,
        callback_url: context.url,
        received_at: context.receivedAt.toISOString(),
        processing_ms: Date.now() - context.receivedAt.getTime(),
      },
      processed_at: new Date().toISOString(),
      processor: this.name,
      status: 'processed_with_context',
    };

    if (context.tailnetKey) {
      response.secure_transport = {
        enabled: true,
        key_prefix: maskCredential(context.tailnetKey),
      };
    }

    return response;
  }
}
