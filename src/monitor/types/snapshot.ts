/**
 * Snapshot
 *
 * One consistent set of resource-utilization measurements taken during a
 * single sampling cycle. Built once, frozen, and discarded after the cycle.
 */

/** Sentinel for a temperature no source could provide */
export const TEMPERATURE_UNAVAILABLE = 'unavailable' as const;

export type Temperature = number | typeof TEMPERATURE_UNAVAILABLE;

/** Metrics the sampler may fail to read; a missing temperature source is not a failure */
export type SampledMetric = 'cpu' | 'ram' | 'swap' | 'disk';

export interface Snapshot {
  /** CPU utilization over the sampling window (0-100) */
  readonly cpuPct: number;
  /** RAM utilization (0-100) */
  readonly ramPct: number;
  /** Swap utilization (0-100), 0 when no swap space exists */
  readonly swapPct: number;
  /** Percent full of the root filesystem (0-100) */
  readonly diskPct: number;
  /** Whole degrees Celsius, or the unavailable sentinel */
  readonly temperature: Temperature;
  readonly timestamp: Date;
  /** Metrics whose source could not be read; their values are the unknown value */
  readonly unreadable: readonly SampledMetric[];
}

/**
 * Result of a single metric read. A failed read still carries the metric's
 * unknown value so the cycle can complete.
 */
export type MetricReading =
  | { readonly ok: true; readonly value: number }
  | { readonly ok: false; readonly value: 0; readonly reason: string };

export function formatTemperature(temperature: Temperature): string {
  return temperature === TEMPERATURE_UNAVAILABLE ? 'N/A°C' : `${temperature}°C`;
}
