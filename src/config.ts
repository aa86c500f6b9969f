import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { config } from 'dotenv';
import { TrafficConfigError } from './errors.js';
import { isLogLevel } from './logger.js';
import type { LogLevel } from './logger.js';
import { isTrafficSpec, mergeSpec } from './trafficgen.js';
import type { TrafficSpec } from './trafficgen.js';

config();

export const DEFAULT_TRAFFIC_FILE = fileURLToPath(new URL('../config/traffic-defaults.json', import.meta.url));

export interface TrafficGenConfig {
  defaultsFile: string;
  trafficDefaults: TrafficSpec;
  logLevel: LogLevel;
}

export function loadTrafficDefaults(file: string): TrafficSpec {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(file, 'utf8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new TrafficConfigError(`Cannot read traffic defaults from ${file}: ${reason}`);
  }

  if (!isTrafficSpec(parsed)) {
    throw new TrafficConfigError(`Traffic defaults in ${file} must be a JSON object of scalars and objects`);
  }
  return parsed;
}

export function loadConfig(): TrafficGenConfig {
  const defaultsFile = process.env.TRAFFICGEN_DEFAULTS_FILE || DEFAULT_TRAFFIC_FILE;
  let trafficDefaults = loadTrafficDefaults(defaultsFile);

  const framesize = process.env.TRAFFICGEN_FRAMESIZE;
  if (framesize) {
    if (!/^\d+$/.test(framesize.trim())) {
      throw new TrafficConfigError(`TRAFFICGEN_FRAMESIZE must be an integer, got '${framesize}'`);
    }
    trafficDefaults = mergeSpec(trafficDefaults, { l2: { framesize: parseInt(framesize, 10) } });
  }

  const logLevel = (process.env.TRAFFICGEN_LOG_LEVEL || 'info').toLowerCase();
  if (!isLogLevel(logLevel)) {
    throw new TrafficConfigError(`TRAFFICGEN_LOG_LEVEL must be one of debug, info, warn, error; got '${logLevel}'`);
  }

  return {
    defaultsFile,
    trafficDefaults,
    logLevel,
  };
}
