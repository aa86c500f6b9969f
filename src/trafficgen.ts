import { ConfigMergeError, TrafficConfigError } from './errors.js';
import type { BurstResultRecord, ThroughputResultRecord } from './results-constants.js';

export type TrafficScalar = string | number | boolean | null;

export type TrafficValue = TrafficScalar | TrafficSpec;

/**
 * Packet construction parameters, e.g. `l2.framesize` or `l3.srcip`.
 */
export interface TrafficSpec {
  [key: string]: TrafficValue;
}

export function isTrafficSpec(value: unknown): value is TrafficSpec {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  return Object.values(value).every(isTrafficValue);
}

function isTrafficValue(value: unknown): value is TrafficValue {
  return (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    isTrafficSpec(value)
  );
}

function isMapping(value: TrafficValue): value is TrafficSpec {
  return typeof value === 'object' && value !== null;
}

export function cloneSpec(spec: TrafficSpec): TrafficSpec {
  const copy: TrafficSpec = {};
  for (const [key, value] of Object.entries(spec)) {
    copy[key] = isMapping(value) ? cloneSpec(value) : value;
  }
  return copy;
}

/**
 * Deep-merge `override` into a copy of `defaults`. Override keys win at every
 * level; keys only present in the defaults are kept. Neither input is touched.
 */
export function mergeSpec(defaults: TrafficSpec, override: TrafficSpec, path = ''): TrafficSpec {
  const merged = cloneSpec(defaults);

  for (const [key, value] of Object.entries(override)) {
    const keyPath = path ? `${path}.${key}` : key;
    const current = merged[key];

    if (current !== undefined && isMapping(current)) {
      if (!isMapping(value)) {
        throw new ConfigMergeError(keyPath);
      }
      merged[key] = mergeSpec(current, value, keyPath);
    } else {
      merged[key] = isMapping(value) ? cloneSpec(value) : value;
    }
  }

  return merged;
}

export function getFrameSize(spec: TrafficSpec): number {
  const l2 = spec.l2;
  if (l2 === undefined || !isMapping(l2)) {
    throw new TrafficConfigError("Traffic configuration has no 'l2' section");
  }

  const framesize = l2.framesize;
  if (typeof framesize !== 'number' || !Number.isFinite(framesize)) {
    throw new TrafficConfigError("Traffic configuration 'l2.framesize' must be a number");
  }
  return framesize;
}

export function requirePositiveDuration(duration: number): number {
  if (!Number.isFinite(duration) || duration <= 0) {
    throw new TrafficConfigError(`Test duration must be greater than 0, got ${duration}`);
  }
  return duration;
}

export interface BurstTrafficOptions {
  traffic?: TrafficSpec;
  numpkts?: number;
  /** Burst duration in milliseconds */
  time?: number;
  framerate?: number;
}

export interface ContTrafficOptions {
  traffic?: TrafficSpec;
  time?: number;
  framerate?: number;
  multistream?: boolean;
}

export interface Rfc2544ThroughputOptions {
  traffic?: TrafficSpec;
  trials?: number;
  /** Seconds per trial */
  duration?: number;
  lossrate?: number;
  multistream?: boolean;
}

export interface BurstResult {
  framesRx: number;
  payloadErrors: number;
  sequenceErrors: number;
  results: BurstResultRecord;
}

/**
 * Contract every traffic generator driver implements. The benchmark framework
 * picks a driver by name and only talks to it through these calls.
 */
export interface ITrafficGenerator {
  readonly trafficDefaults: TrafficSpec;

  connect(): Promise<this>;
  disconnect(): Promise<void>;
  sendBurstTraffic(options?: BurstTrafficOptions): Promise<BurstResult>;
  sendContTraffic(options?: ContTrafficOptions): Promise<ThroughputResultRecord>;
  sendRfc2544Throughput(options?: Rfc2544ThroughputOptions): Promise<ThroughputResultRecord>;
}

/**
 * Connect, run `fn`, and disconnect whether or not `fn` succeeded.
 */
export async function withGenerator<G extends ITrafficGenerator, T>(
  generator: G,
  fn: (generator: G) => Promise<T>
): Promise<T> {
  const connected = await generator.connect();
  try {
    return await fn(connected);
  } finally {
    await generator.disconnect();
  }
}
