/**
 * MonitorConfig
 *
 * Process-wide configuration, constructed once at startup and passed to every
 * component. Never mutated after construction.
 */

export interface ThresholdConfig {
  /** CPU usage percent above which a critical alert is raised */
  readonly cpuLimit: number;
  /** RAM usage percent above which a warning is raised */
  readonly ramLimit: number;
  /** Root disk usage percent above which a critical alert is raised */
  readonly diskLimit: number;
  /** Swap usage percent above which a warning is raised */
  readonly swapWarnLimit: number;
}

export interface MonitorConfig {
  readonly thresholds: ThresholdConfig;
  /** Append-only alert log */
  readonly logFile: string;
  /** Time between the two /proc/stat reads */
  readonly cpuSampleWindowMs: number;
  /** Continuous-mode interval used when none is given */
  readonly defaultIntervalSeconds: number;
  /** Rows per process ranking */
  readonly topProcessCount: number;
  /** Maximum displayed command length, ellipsis included */
  readonly commandWidth: number;
  readonly thermalZonePath: string;
  readonly syslogPath: string;
  readonly syslogTailLines: number;
  /** OS utilities that must exist before any sampling */
  readonly requiredCommands: readonly string[];
}
