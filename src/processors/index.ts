import { ConfigurationError } from '../errors';
import type { PayloadProcessor } from '../types';
import {
  ContextProcessor,
  CounterProcessor,
  EchoProcessor,
  HelloWorldProcessor,
  TimestampProcessor,
} from './basic';
import { ChainProcessor } from './chain';
import { TransformProcessor } from './transform';
import { ValidatorProcessor } from './validator';

export {
  ChainProcessor,
  ContextProcessor,
  CounterProcessor,
  EchoProcessor,
  HelloWorldProcessor,
  TimestampProcessor,
  TransformProcessor,
  ValidatorProcessor,
};
export type { ValidatorOptions } from './validator';

export const PROCESSOR_NAMES = [
  'none',
  'hello',
  'echo',
  'timestamp',
  'counter',
  'context',
  'transform',
  'validator',
] as const;

export type ProcessorName = (typeof PROCESSOR_NAMES)[number];

function isProcessorName(name: string): name is ProcessorName {
  return PROCESSOR_NAMES.some((known) => known === name);
}

export interface ProcessorFactoryOptions {
  /** Fields the validator requires */
  requiredFields?: string[];
  /** Reported by the context processor */
  serviceName?: string;
}

/**
 * Build a processor by name, for the PROCESSOR environment variable
 *
 * A comma-separated list builds a chain; inside a chain the validator
 * rejects invalid payloads so the chain stops there. 'none' (or an empty
 * name) means echo the payload back unchanged.
 *
 * @throws ConfigurationError for an unknown name
 */
export function createProcessor(
  selection: string,
  options: ProcessorFactoryOptions = {}
): PayloadProcessor | undefined {
  const names = selection
    .split(',')
    .map((name) => name.trim())
    .filter((name) => name !== '');

  if (names.length === 0) {
    return undefined;
  }
  if (names.length === 1) {
    return buildProcessor(names[0], options, false);
  }

  const stages = names.map((name) => {
    const stage = buildProcessor(name, options, true);
    if (!stage) {
      throw new ConfigurationError(`processor 'none' cannot be a chain stage`);
    }
    return stage;
  });
  return new ChainProcessor(...stages);
}

function buildProcessor(
  name: string,
  options: ProcessorFactoryOptions,
  inChain: boolean
): PayloadProcessor | undefined {
  if (!isProcessorName(name)) {
    throw new ConfigurationError(
      `unknown processor '${name}' (expected one of: ${PROCESSOR_NAMES.join(', ')})`
    );
  }

  switch (name) {
    case 'none':
      return undefined;
    case 'hello':
      return new HelloWorldProcessor();
    case 'echo':
      return new EchoProcessor();
    case 'timestamp':
      return new TimestampProcessor();
    case 'counter':
      return new CounterProcessor();
    case 'context':
      return new ContextProcessor(options.serviceName ?? 'roundtrip-relay');
    case 'transform':
      return new TransformProcessor();
    case 'validator':
      return new ValidatorProcessor(options.requiredFields ?? [], { rejectInvalid: inChain });
  }
}
