#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import { loadConfig } from './config.js';
import { availableGenerators, createGenerator } from './generators/index.js';
import { ChalkLogger } from './logger.js';
import { ReadlineConsole } from './prompt.js';
import { isOutputFormat, printResults } from './reporter.js';
import type { OutputFormat } from './reporter.js';
import { isTrafficSpec, mergeSpec, withGenerator } from './trafficgen.js';
import type { ITrafficGenerator, TrafficSpec } from './trafficgen.js';

interface CommonOptions {
  generator: string;
  traffic?: TrafficSpec;
  framesize?: number;
  output: OutputFormat;
}

function parseInteger(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parseInt(value, 10);
}

function parsePositiveInteger(value: string): number {
  const parsed = parseInteger(value);
  if (parsed === 0) {
    throw new InvalidArgumentError('Must be greater than 0.');
  }
  return parsed;
}

function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

function parseTraffic(value: string): TrafficSpec {
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch {
    throw new InvalidArgumentError('Not valid JSON.');
  }
  if (!isTrafficSpec(parsed)) {
    throw new InvalidArgumentError('Must be a JSON object of scalars and objects.');
  }
  return parsed;
}

function parseFormat(value: string): OutputFormat {
  if (!isOutputFormat(value)) {
    throw new InvalidArgumentError('Expected pretty, json or csv.');
  }
  return value;
}

function withCommonOptions(command: Command): Command {
  return command
    .option('-g, --generator <name>', `Traffic generator driver (${availableGenerators.join(', ')})`, 'dummy')
    .option('--traffic <json>', 'Traffic config override, e.g. \'{"l3":{"proto":"tcp"}}\'', parseTraffic)
    .option('--framesize <bytes>', 'Shorthand for {"l2":{"framesize":N}}', parseInteger)
    .option('-o, --output <format>', 'Output format: pretty, json, csv', parseFormat, 'pretty');
}

function trafficOverride(options: CommonOptions): TrafficSpec | undefined {
  if (options.framesize === undefined) {
    return options.traffic;
  }
  return mergeSpec(options.traffic ?? {}, { l2: { framesize: options.framesize } });
}

async function run(options: CommonOptions, fn: (generator: ITrafficGenerator) => Promise<void>): Promise<void> {
  const io = new ReadlineConsole();

  try {
    const cfg = loadConfig();
    const logger = new ChalkLogger(cfg.logLevel);
    logger.debug(`traffic defaults loaded from ${cfg.defaultsFile}`);

    const generator = createGenerator(options.generator, {
      trafficDefaults: cfg.trafficDefaults,
      console: io,
      logger,
    });

    await withGenerator(generator, fn);
    io.close();
    process.exit(0);
  } catch (error) {
    io.close();
    if (error instanceof Error) {
      console.error(`Error: ${error.message}`);
    } else {
      console.error('An unknown error occurred');
    }
    process.exit(2);
  }
}

const program = new Command();

program
  .name('trafficgen-dummy')
  .description('Manual traffic generator: you send the traffic, it records the results')
  .version('1.0.0');

withCommonOptions(
  program
    .command('burst')
    .description('Send a fixed-size burst of traffic')
    .option('-n, --numpkts <count>', 'Number of packets', parseInteger, 100)
    .option('-t, --time <ms>', 'Burst duration in milliseconds', parseInteger, 20)
    .option('-r, --framerate <fps>', 'Frame rate', parseInteger, 100)
).action(async (options: CommonOptions & { numpkts: number; time: number; framerate: number }) => {
  await run(options, async (generator) => {
    const result = await generator.sendBurstTraffic({
      traffic: trafficOverride(options),
      numpkts: options.numpkts,
      time: options.time,
      framerate: options.framerate,
    });
    printResults('burst', result.results, { format: options.output });
  });
});

withCommonOptions(
  program
    .command('continuous')
    .description('Send a continuous flow of traffic')
    .option('-t, --time <duration>', 'Test duration', parsePositiveInteger, 20)
    .option('-r, --framerate <rate>', 'Frame rate', parseInteger, 0)
    .option('--multistream', 'Use multiple streams', false)
).action(async (options: CommonOptions & { time: number; framerate: number; multistream: boolean }) => {
  await run(options, async (generator) => {
    const result = await generator.sendContTraffic({
      traffic: trafficOverride(options),
      time: options.time,
      framerate: options.framerate,
      multistream: options.multistream,
    });
    printResults('continuous', result, { format: options.output });
  });
});

withCommonOptions(
  program
    .command('throughput')
    .description('Run an RFC 2544 throughput test')
    .option('--trials <count>', 'Number of trials', parseInteger, 3)
    .option('-d, --duration <seconds>', 'Duration of each trial in seconds', parsePositiveInteger, 20)
    .option('--lossrate <percent>', 'Acceptable packet loss', parseNumber, 0)
    .option('--multistream', 'Use multiple streams', false)
).action(async (options: CommonOptions & { trials: number; duration: number; lossrate: number; multistream: boolean }) => {
  await run(options, async (generator) => {
    const result = await generator.sendRfc2544Throughput({
      traffic: trafficOverride(options),
      trials: options.trials,
      duration: options.duration,
      lossrate: options.lossrate,
      multistream: options.multistream,
    });
    printResults('throughput', result, { format: options.output });
  });
});

withCommonOptions(
  program
    .command('all')
    .description('Run burst, continuous and throughput tests with their defaults')
).action(async (options: CommonOptions) => {
  await run(options, async (generator) => {
    const traffic = trafficOverride(options);

    const burst = await generator.sendBurstTraffic({ traffic });
    printResults('burst', burst.results, { format: options.output });

    const continuous = await generator.sendContTraffic({ traffic });
    printResults('continuous', continuous, { format: options.output });

    const throughput = await generator.sendRfc2544Throughput({ traffic });
    printResults('throughput', throughput, { format: options.output });
  });
});

program.parseAsync().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`Error: ${message}`);
  process.exit(2);
});
