import * as readline from 'node:readline';
import { OperatorInputClosedError } from './errors.js';
import type { TrafficSpec } from './trafficgen.js';

/**
 * The operator's side of the conversation.
 */
export interface OperatorConsole {
  /** Show `question` and resolve with the operator's answer, without its line break. */
  ask(question: string): Promise<string>;
  print(text: string): void;
  /** Like `print` but without a trailing line break. */
  write(text: string): void;
  close(): void;
}

export class ReadlineConsole implements OperatorConsole {
  private rl: readline.Interface;
  private lines: AsyncIterator<string>;
  private output: NodeJS.WritableStream;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    output: NodeJS.WritableStream = process.stdout
  ) {
    this.output = output;
    this.rl = readline.createInterface({ input, terminal: false });
    // Created up front so lines arriving before the next question are buffered
    this.lines = this.rl[Symbol.asyncIterator]();
  }

  async ask(question: string): Promise<string> {
    this.output.write(question);
    const next = await this.lines.next();
    if (next.done) {
      throw new OperatorInputClosedError();
    }
    return next.value;
  }

  print(text: string): void {
    this.output.write(`${text}\n`);
  }

  write(text: string): void {
    this.output.write(text);
  }

  close(): void {
    this.rl.close();
  }
}

const ACCEPT = ['', 'yes', 'y', 'ye'];
const REJECT = ['no', 'n'];

const INTEGER = /^[+-]?\d+$/;

export function parseInteger(text: string): number | undefined {
  const trimmed = text.trim();
  if (!INTEGER.test(trimmed)) return undefined;

  const value = parseInt(trimmed, 10);
  return Number.isSafeInteger(value) ? value : undefined;
}

/**
 * Ask the operator for one statistic until they enter an integer and
 * confirm it.
 */
export async function getUserTrafficStat(io: OperatorConsole, statType: string): Promise<number> {
  for (;;) {
    const result = parseInteger(await io.ask(`What was the result for '${statType}'? `));

    if (result === undefined) {
      io.print('That was not a valid integer result. Try again.');
      continue;
    }

    for (;;) {
      const choice = (await io.ask(`Is '${result}' correct? `)).toLowerCase();
      if (ACCEPT.includes(choice)) {
        return result;
      }
      if (REJECT.includes(choice)) {
        break;
      }
      io.write("Please respond with 'yes' or 'no' ");
    }
  }
}

/**
 * Tell the operator what to send, then collect one value per entry of
 * `trafficStats`, in the same order.
 */
export async function getUserTraffic(
  io: OperatorConsole,
  trafficType: string,
  trafficConf: string,
  flowConf: TrafficSpec,
  trafficStats: readonly string[]
): Promise<number[]> {
  const results: number[] = [];

  io.print(
    `Please send '${trafficType}' traffic with the following stream config:\n${trafficConf}\n` +
    `and the following flow config:\n${JSON.stringify(flowConf, null, 4)}`
  );

  for (const stat of trafficStats) {
    results.push(await getUserTrafficStat(io, stat));
  }

  return results;
}
