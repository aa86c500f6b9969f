/**
 * Smoke Tests: every module loads and exports its documented API.
 */
import { describe, it, expect } from 'vitest';

describe('module exports', () => {
  it('trafficgen exports the merge helpers', async () => {
    const mod = await import('../../src/trafficgen.js');
    expect(typeof mod.mergeSpec).toBe('function');
    expect(typeof mod.getFrameSize).toBe('function');
    expect(typeof mod.withGenerator).toBe('function');
  });

  it('generators exports the registry and the manual driver', async () => {
    const mod = await import('../../src/generators/index.js');
    expect(typeof mod.createGenerator).toBe('function');
    expect(typeof mod.DummyTrafficGenerator).toBe('function');
  });

  it('results-constants exports every result key', async () => {
    const { ResultsConstants } = await import('../../src/results-constants.js');
    expect(Object.keys(ResultsConstants)).toHaveLength(15);
    expect(ResultsConstants.TX_FRAMES).toBe('tx_frames');
    expect(ResultsConstants.AVG_LATENCY_NS).toBe('avg_latency_ns');
  });

  it('prompt exports the console and prompts', async () => {
    const mod = await import('../../src/prompt.js');
    expect(typeof mod.ReadlineConsole).toBe('function');
    expect(typeof mod.getUserTraffic).toBe('function');
    expect(typeof mod.getUserTrafficStat).toBe('function');
  });
});
