import { ProcessingError } from '../errors';
import type { PayloadProcessor } from '../types';
import { isPlainObject } from './transform';

export interface ValidatorOptions {
  /** Throw instead of returning a report when the payload is invalid */
  rejectInvalid?: boolean;
}

/**
 * Checks that an object payload carries the required fields
 *
 * By default the result is a validation report. With rejectInvalid an
 * invalid payload throws a ProcessingError, which stops a chain.
 */
export class ValidatorProcessor implements PayloadProcessor {
  readonly name = 'validator';

  constructor(
    private readonly requiredFields: string[],
    private readonly options: ValidatorOptions = {}
  ) {}

  process(payload: unknown, requestId: string): unknown {
    const response: Record<string, unknown> = {
      request_id: requestId,
      processed_at: new Date().toISOString(),
      processor: this.name,
      original: payload,
    };

    if (!isPlainObject(payload)) {
      if (this.options.rejectInvalid) {
        throw new ProcessingError('Payload is not a JSON object', { processor: this.name });
      }
      response.validation = { valid: false, message: 'Payload must be a JSON object for validation' };
      response.status = 'invalid';
      response.message = 'Payload is not a JSON object';
      return response;
    }

    const present = this.requiredFields.filter((field) => field in payload);
    const missing = this.requiredFields.filter((field) => !(field in payload));

    if (missing.length > 0 && this.options.rejectInvalid) {
      throw new ProcessingError(`Missing required fields: ${missing.join(', ')}`, {
        processor: this.name,
      });
    }

    response.validation = {
      valid: missing.length === 0,
      required_fields: this.requiredFields,
      present_fields: present,
      missing_fields: missing,
    };
    if (missing.length === 0) {
      response.status = 'valid';
      response.message = 'All required fields are present';
    } else {
      response.status = 'invalid';
      response.message = `Missing required fields: ${missing.join(', ')}`;
    }

    return response;
  }
}
