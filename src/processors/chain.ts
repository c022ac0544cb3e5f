import { ProcessingError, errorMessage } from '../errors';
import type { PayloadProcessor } from '../types';

/**
 * Runs processors in order, feeding each one the previous result
 *
 * The first failing stage ends the chain; the result then names the
 * stage index in failed_at and later stages never run.
 */
export class ChainProcessor implements PayloadProcessor {
  readonly name = 'chain';
  private readonly stages: PayloadProcessor[];

  constructor(...stages: PayloadProcessor[]) {
    this.stages = stages;
  }

  async process(payload: unknown, requestId: string): Promise<unknown> {
    let current = payload;

    for (const [index, stage] of this.stages.entries()) {
      try {
        current = await stage.process(current, requestId);
      } catch (error) {
        const failure = new ProcessingError(errorMessage(error), {
          processor: stage.name,
          stage: index,
          cause: error,
        });
        console.log(`[WEBHOOK] Chain stage failed for ${requestId}`, failure.toJSON());
        return {
          error: `Processor ${index} failed: ${failure.message}`,
          request_id: requestId,
          processor: this.name,
          failed_at: index,
          failed_processor: stage.name,
          processed_at: new Date().toISOString(),
        };
      }
    }

    return {
      result: current,
      request_id: requestId,
      processor: this.name,
      chain_length: this.stages.length,
      processed_at: new Date().toISOString(),
    };
  }
}
