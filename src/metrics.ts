import { TrafficGenError } from './errors.js';
import { ResultsConstants } from './results-constants.js';
import { requirePositiveDuration } from './trafficgen.js';
import type { BurstResultRecord, ThroughputResultRecord } from './results-constants.js';

// Answer order is the order the operator is asked in; the builders below
// read answers by position.
export const BURST_STATS = ['frames rx', 'payload errors', 'sequence errors'] as const;

export const THROUGHPUT_STATS = [
  'frames tx',
  'frames rx',
  'min latency',
  'max latency',
  'avg latency',
] as const;

function expectAnswers(answers: readonly number[], stats: readonly string[]): void {
  if (answers.length !== stats.length) {
    throw new TrafficGenError(
      `Expected ${stats.length} answers (${stats.join(', ')}), got ${answers.length}`,
      'STAT_COUNT_MISMATCH'
    );
  }
}

export function buildBurstResults(
  numpkts: number,
  framesize: number,
  answers: readonly number[]
): BurstResultRecord {
  expectAnswers(answers, BURST_STATS);
  const [framesRx, payloadErr, seqErr] = answers;

  return {
    [ResultsConstants.TX_FRAMES]: numpkts,
    [ResultsConstants.RX_FRAMES]: framesRx,
    [ResultsConstants.TX_BYTES]: framesize * numpkts,
    [ResultsConstants.RX_BYTES]: framesize * framesRx,
    [ResultsConstants.PAYLOAD_ERR]: payloadErr,
    [ResultsConstants.SEQ_ERR]: seqErr,
  };
}

/**
 * Throughput figures for continuous and RFC 2544 runs. Line-rate percentages
 * are not known to a manual generator and are always reported as 0.
 */
export function buildThroughputResults(
  answers: readonly number[],
  framesize: number,
  duration: number
): ThroughputResultRecord {
  expectAnswers(answers, THROUGHPUT_STATS);
  requirePositiveDuration(duration);
  const [framesTx, framesRx, minLatency, maxLatency, avgLatency] = answers;

  return {
    [ResultsConstants.THROUGHPUT_TX_FPS]: framesTx / duration,
    [ResultsConstants.THROUGHPUT_RX_FPS]: framesRx / duration,
    [ResultsConstants.THROUGHPUT_TX_MBPS]: (framesTx * framesize) / duration,
    [ResultsConstants.THROUGHPUT_RX_MBPS]: (framesRx * framesize) / duration,
    [ResultsConstants.THROUGHPUT_TX_PERCENT]: 0.0,
    [ResultsConstants.THROUGHPUT_RX_PERCENT]: 0.0,
    [ResultsConstants.MIN_LATENCY_NS]: minLatency,
    [ResultsConstants.MAX_LATENCY_NS]: maxLatency,
    [ResultsConstants.AVG_LATENCY_NS]: avgLatency,
  };
}
