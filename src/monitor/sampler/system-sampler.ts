/**
 * System Sampler
 *
 * Converts raw OS state into a Snapshot: CPU from two /proc/stat readings a
 * fixed window apart, RAM and swap from `free`, root disk usage from `df`, and
 * temperature through the fallback chain. A source that cannot be read
 * degrades its metric to the unknown value and is listed in
 * `Snapshot.unreadable`; sampling itself never throws.
 */

import { existsSync, readFileSync } from 'node:fs';
import { createSubsystemLogger } from '../../logging/subsystem.js';
import { UnreadableSourceError, describeError } from '../errors.js';
import { runCommand } from '../system/commands.js';
import {
  cpuUsageBetween,
  parseCpuCounters,
  parseDfPercent,
  parseFreeOutput,
  usagePercent,
  type CpuCounters,
} from './parsers.js';
import { defaultTemperatureSources, resolveTemperature, type TemperatureSource } from './temperature.js';
import type { MetricReading, MonitorConfig, SampledMetric, Snapshot } from '../types/index.js';

const PROC_STAT = '/proc/stat';

export interface MemoryReadings {
  ram: MetricReading;
  swap: MetricReading;
}

function ok(value: number): MetricReading {
  return { ok: true, value };
}

function unreadable(error: UnreadableSourceError): MetricReading {
  return { ok: false, value: 0, reason: error.message };
}

export class SystemSampler {
  private readonly config: MonitorConfig;
  private readonly temperatureSources: readonly TemperatureSource[];
  private readonly logger = createSubsystemLogger('monitor/sampler');

  constructor(config: MonitorConfig, temperatureSources?: readonly TemperatureSource[]) {
    this.config = config;
    this.temperatureSources = temperatureSources ?? defaultTemperatureSources(config.thermalZonePath);
  }

  /**
   * Takes one snapshot. Holds for the CPU sampling window.
   */
  async sample(): Promise<Snapshot> {
    const cpu = await this.sampleCpu();
    const { ram, swap } = this.sampleMemory();
    const disk = this.sampleDisk();
    const temperature = resolveTemperature(this.temperatureSources);

    const failed: SampledMetric[] = [];
    const readings: Array<[SampledMetric, MetricReading]> = [
      ['cpu', cpu],
      ['ram', ram],
      ['swap', swap],
      ['disk', disk],
    ];
    for (const [metric, reading] of readings) {
      if (!reading.ok) {
        failed.push(metric);
        this.logger.warn('Metric unreadable, reporting unknown value', { metric, reason: reading.reason });
      }
    }

    return Object.freeze({
      cpuPct: cpu.value,
      ramPct: ram.value,
      swapPct: swap.value,
      diskPct: disk.value,
      temperature: temperature.temperature,
      timestamp: new Date(),
      unreadable: Object.freeze(failed),
    });
  }

  /**
   * CPU utilization from the delta of two /proc/stat readings
   */
  async sampleCpu(): Promise<MetricReading> {
    try {
      const first = this.readCpuCounters();
      await new Promise(resolve => setTimeout(resolve, this.config.cpuSampleWindowMs));
      const second = this.readCpuCounters();

      const usage = cpuUsageBetween(first, second);
      if (usage === undefined) {
        throw new UnreadableSourceError(PROC_STAT, 'no CPU ticks elapsed in the sampling window');
      }
      return ok(usage);
    } catch (error) {
      return unreadable(this.asUnreadable(PROC_STAT, error));
    }
  }

  /**
   * RAM and swap utilization from `free`; no swap space means 0% swap
   */
  sampleMemory(): MemoryReadings {
    const output = runCommand('free');
    const accounting = output === undefined ? undefined : parseFreeOutput(output);

    if (!accounting) {
      const error = new UnreadableSourceError('free', 'no parsable Mem: row');
      return { ram: unreadable(error), swap: unreadable(error) };
    }

    return {
      ram: ok(usagePercent(accounting.memory)),
      swap: ok(accounting.swap ? usagePercent(accounting.swap) : 0),
    };
  }

  /**
   * Percent full of the root filesystem
   */
  sampleDisk(): MetricReading {
    const output = runCommand('df -P /');
    const percent = output === undefined ? undefined : parseDfPercent(output);

    if (percent === undefined) {
      return unreadable(new UnreadableSourceError('df', 'no parsable usage for /'));
    }
    return ok(percent);
  }

  private readCpuCounters(): CpuCounters {
    if (!existsSync(PROC_STAT)) {
      throw new UnreadableSourceError(PROC_STAT, 'not present');
    }
    const counters = parseCpuCounters(readFileSync(PROC_STAT, 'utf8'));
    if (!counters) {
      throw new UnreadableSourceError(PROC_STAT, 'aggregate cpu line missing or not numeric');
    }
    return counters;
  }

  private asUnreadable(source: string, error: unknown): UnreadableSourceError {
    return error instanceof UnreadableSourceError
      ? error
      : new UnreadableSourceError(source, describeError(error), { cause: error });
  }
}
