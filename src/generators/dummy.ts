import { silentLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import { BURST_STATS, THROUGHPUT_STATS, buildBurstResults, buildThroughputResults } from '../metrics.js';
import { getUserTraffic } from '../prompt.js';
import type { OperatorConsole } from '../prompt.js';
import type { ThroughputResultRecord } from '../results-constants.js';
import { cloneSpec, getFrameSize, mergeSpec, requirePositiveDuration } from '../trafficgen.js';
import type {
  BurstResult,
  BurstTrafficOptions,
  ContTrafficOptions,
  ITrafficGenerator,
  Rfc2544ThroughputOptions,
  TrafficSpec,
} from '../trafficgen.js';

export interface GeneratorOptions {
  trafficDefaults: TrafficSpec;
  console: OperatorConsole;
  logger?: Logger;
}

/**
 * A traffic generator whose results come from a person.
 *
 * Useful when nobody has written a driver for the generator at hand: the
 * operator is told what traffic to send, sends it with whatever tool they
 * like, and types the counters back in. Setting up the flows on the real
 * generator is entirely up to them.
 */
export class DummyTrafficGenerator implements ITrafficGenerator {
  readonly trafficDefaults: TrafficSpec;
  private io: OperatorConsole;
  private logger: Logger;

  constructor(options: GeneratorOptions) {
    this.trafficDefaults = cloneSpec(options.trafficDefaults);
    this.io = options.console;
    this.logger = options.logger ?? silentLogger;
  }

  async connect(): Promise<this> {
    this.logger.debug('connect: nothing to do for a manual generator');
    return this;
  }

  async disconnect(): Promise<void> {
    this.logger.debug('disconnect: nothing to do for a manual generator');
  }

  async sendBurstTraffic(options: BurstTrafficOptions = {}): Promise<BurstResult> {
    const { traffic, numpkts = 100, time = 20, framerate = 100 } = options;
    const spec = this.resolveTraffic(traffic);
    const framesize = getFrameSize(spec);
    this.logger.debug(`burst: ${numpkts} packets at ${framerate} fps`);

    const answers = await getUserTraffic(
      this.io,
      'burst',
      `${numpkts}pkts, ${time}mS`,
      spec,
      BURST_STATS
    );

    const results = buildBurstResults(numpkts, framesize, answers);
    const [framesRx, payloadErrors, sequenceErrors] = answers;

    return { framesRx, payloadErrors, sequenceErrors, results };
  }

  async sendContTraffic(options: ContTrafficOptions = {}): Promise<ThroughputResultRecord> {
    const { traffic, time = 20, framerate = 0, multistream = false } = options;
    requirePositiveDuration(time);
    const spec = this.resolveTraffic(traffic);
    const framesize = getFrameSize(spec);

    const answers = await getUserTraffic(
      this.io,
      'continuous',
      `${time}mS, ${framerate}mpps, multistream ${multistream}`,
      spec,
      THROUGHPUT_STATS
    );

    return buildThroughputResults(answers, framesize, time);
  }

  async sendRfc2544Throughput(options: Rfc2544ThroughputOptions = {}): Promise<ThroughputResultRecord> {
    const { traffic, trials = 3, duration = 20, lossrate = 0.0, multistream = false } = options;
    requirePositiveDuration(duration);
    const spec = this.resolveTraffic(traffic);
    const framesize = getFrameSize(spec);

    const answers = await getUserTraffic(
      this.io,
      'throughput',
      `${trials} trials, ${duration} seconds iterations, ${lossrate.toFixed(6)} packet loss, ` +
        `multistream ${multistream ? 'enabled' : 'disabled'}`,
      spec,
      THROUGHPUT_STATS
    );

    return buildThroughputResults(answers, framesize, duration);
  }

  private resolveTraffic(traffic?: TrafficSpec): TrafficSpec {
    const merged = traffic ? mergeSpec(this.trafficDefaults, traffic) : cloneSpec(this.trafficDefaults);
    this.logger.debug('traffic config', merged);
    return merged;
  }
}
