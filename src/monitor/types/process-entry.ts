/**
 * ProcessEntry
 *
 * One row of a top-N process ranking, read fresh from the process table.
 */

/** Metric the process table is ranked by */
export type RankingMetric = 'cpu' | 'mem' | 'rss';

/** Display classification; presentation metadata only, never alerting input */
export type ProcessLevel = 'critical' | 'elevated' | 'normal';

export interface ProcessEntry {
  readonly user: string;
  readonly pid: number;
  readonly cpuPct: number;
  readonly memPct: number;
  /** Virtual size in whole megabytes */
  readonly vszMb: number;
  /** Resident size in whole megabytes */
  readonly rssMb: number;
  /** Resident size as reported, in kilobytes */
  readonly rssKb: number;
  readonly command: string;
  readonly level: ProcessLevel;
}
