/**
 * Unit Tests: error classes, names and codes.
 */
import { describe, it, expect } from 'vitest';
import {
  ConfigMergeError,
  OperatorInputClosedError,
  TrafficConfigError,
  TrafficGenError,
} from '../../src/errors.js';

describe('TrafficGenError', () => {
  it('is instanceof Error', () => {
    expect(new TrafficGenError('test')).toBeInstanceOf(Error);
  });

  it('has name "TrafficGenError"', () => {
    expect(new TrafficGenError('test').name).toBe('TrafficGenError');
  });

  it('has optional code property', () => {
    expect(new TrafficGenError('test', 'SOME_CODE').code).toBe('SOME_CODE');
    expect(new TrafficGenError('test').code).toBeUndefined();
  });
});

describe('subclasses', () => {
  it('ConfigMergeError carries the path', () => {
    const err = new ConfigMergeError('l2.framesize');
    expect(err).toBeInstanceOf(TrafficGenError);
    expect(err.name).toBe('ConfigMergeError');
    expect(err.code).toBe('MERGE_TYPE_MISMATCH');
    expect(err.path).toBe('l2.framesize');
  });

  it('TrafficConfigError has its own code', () => {
    const err = new TrafficConfigError('bad');
    expect(err).toBeInstanceOf(TrafficGenError);
    expect(err.name).toBe('TrafficConfigError');
    expect(err.code).toBe('INVALID_TRAFFIC_CONFIG');
    expect(err.message).toBe('bad');
  });

  it('OperatorInputClosedError has its own code', () => {
    const err = new OperatorInputClosedError();
    expect(err).toBeInstanceOf(TrafficGenError);
    expect(err.name).toBe('OperatorInputClosedError');
    expect(err.code).toBe('INPUT_CLOSED');
  });
});
