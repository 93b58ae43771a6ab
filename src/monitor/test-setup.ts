/**
 * Property-Based Testing Setup
 *
 * Shared fast-check generators and fixtures for the monitor tests.
 */

import * as fc from 'fast-check';
import { createDefaultMonitorConfig } from './config/configuration.js';
import type { CpuCounters } from './sampler/parsers.js';
import type { MonitorConfig, Snapshot, ThresholdConfig } from './types/index.js';

export const percentArbitrary: fc.Arbitrary<number> = fc.integer({ min: 0, max: 100 });

export const cpuCountersArbitrary: fc.Arbitrary<CpuCounters> = fc.record({
  user: fc.integer({ min: 0, max: 10_000_000 }),
  nice: fc.integer({ min: 0, max: 100_000 }),
  system: fc.integer({ min: 0, max: 5_000_000 }),
  idle: fc.integer({ min: 0, max: 100_000_000 }),
  iowait: fc.integer({ min: 0, max: 1_000_000 }),
  irq: fc.integer({ min: 0, max: 10_000 }),
  softirq: fc.integer({ min: 0, max: 10_000 }),
  steal: fc.integer({ min: 0, max: 10_000 }),
});

export const thresholdConfigArbitrary: fc.Arbitrary<ThresholdConfig> = fc.record({
  cpuLimit: fc.integer({ min: 0, max: 99 }),
  ramLimit: fc.integer({ min: 0, max: 99 }),
  diskLimit: fc.integer({ min: 0, max: 99 }),
  swapWarnLimit: fc.integer({ min: 0, max: 99 }),
});

export const snapshotArbitrary: fc.Arbitrary<Snapshot> = fc.record({
  cpuPct: percentArbitrary,
  ramPct: percentArbitrary,
  swapPct: percentArbitrary,
  diskPct: percentArbitrary,
  temperature: fc.oneof(fc.integer({ min: 0, max: 110 }), fc.constant('unavailable' as const)),
  timestamp: fc.date({ min: new Date('2020-01-01T00:00:00Z'), max: new Date('2030-01-01T00:00:00Z') }),
  unreadable: fc.constant([]),
});

export const propertyTestConfig = {
  numRuns: 100,
};

/**
 * Default configuration with a zero-length CPU window and a scratch log path
 */
export function createTestConfig(overrides: Partial<MonitorConfig> = {}): MonitorConfig {
  return {
    ...createDefaultMonitorConfig('/home/tester'),
    cpuSampleWindowMs: 0,
    logFile: '/tmp/host-monitor-test/monitor.log',
    ...overrides,
  };
}

export function createSnapshot(overrides: Partial<Snapshot> = {}): Snapshot {
  return {
    cpuPct: 10,
    ramPct: 40,
    swapPct: 0,
    diskPct: 30,
    temperature: 45,
    timestamp: new Date(2026, 9, 19, 14, 5, 9),
    unreadable: [],
    ...overrides,
  };
}

/**
 * Renders counters as the aggregate line of /proc/stat
 */
export function procStatContent(counters: CpuCounters): string {
  const { user, nice, system, idle, iowait, irq, softirq, steal } = counters;
  return [
    `cpu  ${user} ${nice} ${system} ${idle} ${iowait} ${irq} ${softirq} ${steal} 0 0`,
    'cpu0 1 0 1 1 0 0 0 0 0 0',
    'intr 0',
  ].join('\n') + '\n';
}
