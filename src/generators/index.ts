import { TrafficGenError } from '../errors.js';
import type { ITrafficGenerator } from '../trafficgen.js';
import { DummyTrafficGenerator } from './dummy.js';
import type { GeneratorOptions } from './dummy.js';

export { DummyTrafficGenerator };
export type { GeneratorOptions };

type GeneratorFactory = (options: GeneratorOptions) => ITrafficGenerator;

const generators = new Map<string, GeneratorFactory>([
  ['dummy', (options) => new DummyTrafficGenerator(options)],
]);

export const availableGenerators: string[] = [...generators.keys()];

export function createGenerator(name: string, options: GeneratorOptions): ITrafficGenerator {
  const factory = generators.get(name.trim().toLowerCase());

  if (!factory) {
    throw new TrafficGenError(
      `Unknown traffic generator '${name}'. Available: ${availableGenerators.join(', ')}`,
      'UNKNOWN_GENERATOR'
    );
  }
  return factory(options);
}
