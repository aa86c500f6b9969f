/**
 * Unit Tests: readline-backed operator console over in-memory streams.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { PassThrough, Writable } from 'node:stream';
import { OperatorInputClosedError } from '../../src/errors.js';
import { ReadlineConsole, getUserTraffic, getUserTrafficStat } from '../../src/prompt.js';

describe('ReadlineConsole', () => {
  let input: PassThrough;
  let written: string;
  let io: ReadlineConsole;

  beforeEach(() => {
    input = new PassThrough();
    written = '';
    const output = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        written += chunk.toString();
        callback();
      },
    });
    io = new ReadlineConsole(input, output);
  });

  afterEach(() => {
    io.close();
  });

  it('answers questions from input lines', async () => {
    input.write('42\n\n');

    await expect(getUserTrafficStat(io, 'frames rx')).resolves.toBe(42);
    expect(written).toBe("What was the result for 'frames rx'? Is '42' correct? ");
  });

  it('keeps lines that arrive before they are asked for', async () => {
    input.write('1\ny\n2\ny\n');
    input.end();

    await expect(getUserTraffic(io, 'burst', '1pkts, 1mS', {}, ['a', 'b'])).resolves.toEqual([1, 2]);
  });

  it('handles CRLF line endings', async () => {
    input.write('7\r\nyes\r\n');

    await expect(getUserTrafficStat(io, 'frames tx')).resolves.toBe(7);
  });

  it('fails when the input ends', async () => {
    input.end('5\n');

    await expect(getUserTrafficStat(io, 'frames rx')).rejects.toThrow(OperatorInputClosedError);
  });

  it('prints with and without a line break', () => {
    io.print('hello');
    io.write('prompt> ');

    expect(written).toBe('hello\nprompt> ');
  });
});
