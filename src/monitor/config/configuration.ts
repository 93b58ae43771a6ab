/**
 * Monitor Configuration
 *
 * Builds the immutable MonitorConfig from defaults and optional environment
 * overrides.
 */

import { homedir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import { ConfigurationError } from '../errors.js';
import type { MonitorConfig, ThresholdConfig } from '../types/index.js';

export const DEFAULT_THRESHOLDS: ThresholdConfig = Object.freeze({
  cpuLimit: 80,
  ramLimit: 85,
  diskLimit: 90,
  swapWarnLimit: 50,
});

/**
 * Creates the default configuration for the given home directory
 */
export function createDefaultMonitorConfig(home: string = homedir()): MonitorConfig {
  return freezeConfig({
    thresholds: DEFAULT_THRESHOLDS,
    logFile: join(home, '.host-monitor', 'monitor.log'),
    cpuSampleWindowMs: 1000,
    defaultIntervalSeconds: 60,
    topProcessCount: 5,
    commandWidth: 50,
    thermalZonePath: '/sys/class/thermal/thermal_zone0/temp',
    syslogPath: '/var/log/syslog',
    syslogTailLines: 30,
    requiredCommands: ['ps', 'free', 'df'],
  });
}

const percent = z.coerce.number().int().min(0).max(100);

const envSchema = z.object({
  HOST_MONITOR_CPU_LIMIT: percent.optional(),
  HOST_MONITOR_RAM_LIMIT: percent.optional(),
  HOST_MONITOR_DISK_LIMIT: percent.optional(),
  HOST_MONITOR_SWAP_WARN_LIMIT: percent.optional(),
  HOST_MONITOR_LOG_FILE: z.string().trim().min(1).optional(),
  HOST_MONITOR_CPU_WINDOW_MS: z.coerce.number().int().min(0).max(60_000).optional(),
});

/**
 * Loads the configuration, applying any HOST_MONITOR_* overrides.
 * Empty variables are treated as unset.
 */
export function loadMonitorConfig(env: NodeJS.ProcessEnv = process.env, home: string = homedir()): MonitorConfig {
  const defaults = createDefaultMonitorConfig(home);

  const present = Object.fromEntries(
    Object.entries(env).filter(([key, value]) => key.startsWith('HOST_MONITOR_') && value !== undefined && value.trim() !== ''),
  );
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  const overrides = parsed.data;
  const config = freezeConfig({
    ...defaults,
    thresholds: {
      cpuLimit: overrides.HOST_MONITOR_CPU_LIMIT ?? defaults.thresholds.cpuLimit,
      ramLimit: overrides.HOST_MONITOR_RAM_LIMIT ?? defaults.thresholds.ramLimit,
      diskLimit: overrides.HOST_MONITOR_DISK_LIMIT ?? defaults.thresholds.diskLimit,
      swapWarnLimit: overrides.HOST_MONITOR_SWAP_WARN_LIMIT ?? defaults.thresholds.swapWarnLimit,
    },
    logFile: overrides.HOST_MONITOR_LOG_FILE ?? defaults.logFile,
    cpuSampleWindowMs: overrides.HOST_MONITOR_CPU_WINDOW_MS ?? defaults.cpuSampleWindowMs,
  });

  const errors = validateMonitorConfig(config);
  if (errors.length > 0) {
    throw new ConfigurationError(errors);
  }
  return config;
}

/**
 * Validates a configuration for consistency
 */
export function validateMonitorConfig(config: MonitorConfig): string[] {
  const errors: string[] = [];
  const { thresholds } = config;

  for (const [name, value] of Object.entries(thresholds)) {
    if (!Number.isInteger(value) || value < 0 || value > 100) {
      errors.push(`Threshold ${name} must be an integer percentage`);
    }
  }

  if (config.topProcessCount < 1) {
    errors.push('At least one process must be ranked');
  }

  // Room for at least one character plus the ellipsis
  if (config.commandWidth < 4) {
    errors.push('Command width must be at least 4 characters');
  }

  if (config.defaultIntervalSeconds < 1) {
    errors.push('Default interval must be at least one second');
  }

  return errors;
}

function freezeConfig(config: MonitorConfig): MonitorConfig {
  return Object.freeze({
    ...config,
    thresholds: Object.freeze({ ...config.thresholds }),
    requiredCommands: Object.freeze([...config.requiredCommands]),
  });
}
