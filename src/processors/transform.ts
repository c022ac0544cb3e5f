import type { PayloadProcessor } from '../types';

/**
 * Uppercases a string payload, or the top-level string values of an object
 */
export class TransformProcessor implements PayloadProcessor {
  readonly name = 'transform';

  process(payload: unknown, requestId: string): unknown {
    const response: Record<string, unknown> = {
      request_id: requestId,
      processed_at: new Date().toISOString(),
      processor: this.name,
      original: payload,
    };

    if (typeof payload === 'string') {
      response.transformed = payload.toUpperCase();
      response.transformation = 'uppercase';
    } else if (isPlainObject(payload)) {
      const transformed: Record<string, unknown> = {};
      for (const [key, value] of Object.entries(payload)) {
        transformed[key] = typeof value === 'string' ? value.toUpperCase() : value;
      }
      response.transformed = transformed;
      response.transformation = 'uppercase_strings';
    } else {
      response.transformed = payload;
      response.transformation = 'no_transformation';
      response.message = 'Only strings and objects with string values are transformed';
    }

    return response;
  }
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
