/**
 * Process Ranker
 *
 * Produces the top-N rows of the process table ranked by CPU, memory or
 * resident size. Rows come fresh from `ps aux` on every call; fewer processes
 * than N simply yields fewer rows.
 */

import { createSubsystemLogger } from '../../logging/subsystem.js';
import { runCommand } from '../system/commands.js';
import type { MonitorConfig, ProcessEntry, ProcessLevel, RankingMetric } from '../types/index.js';

/** `ps` sort keys per ranking metric */
export const PS_SORT_KEYS: Readonly<Record<RankingMetric, string>> = {
  cpu: '%cpu',
  mem: '%mem',
  rss: 'rss',
};

export const COMMAND_PLACEHOLDER = '<none>';
const ELLIPSIS = '...';

/** USER PID %CPU %MEM VSZ RSS TTY STAT START TIME precede the command */
const FIXED_FIELDS = 10;

/**
 * Shortens a command to `width` characters, the last three being an ellipsis
 */
export function truncateCommand(command: string, width = 50): string {
  if (command === '') return COMMAND_PLACEHOLDER;
  if (command.length <= width) return command;
  return command.slice(0, width - ELLIPSIS.length) + ELLIPSIS;
}

export function classifyProcess(metric: RankingMetric, cpuPct: number, memPct: number): ProcessLevel {
  switch (metric) {
    case 'cpu':
      if (cpuPct > 50) return 'critical';
      if (cpuPct > 20) return 'elevated';
      return 'normal';
    case 'mem':
      return memPct > 20 ? 'elevated' : 'normal';
    case 'rss':
      return 'normal';
  }
}

export function metricValue(entry: ProcessEntry, metric: RankingMetric): number {
  switch (metric) {
    case 'cpu':
      return entry.cpuPct;
    case 'mem':
      return entry.memPct;
    case 'rss':
      return entry.rssKb;
  }
}

const isDecimal = (text: string | undefined): text is string => text !== undefined && /^\d+(\.\d+)?$/.test(text);
const isInteger = (text: string | undefined): text is string => text !== undefined && /^\d+$/.test(text);

/**
 * Parses one data row of `ps aux`; returns undefined for malformed rows
 */
export function parseProcessRow(
  row: string,
  metric: RankingMetric,
  commandWidth = 50,
): ProcessEntry | undefined {
  const fields = row.trim().split(/\s+/);
  if (fields.length < FIXED_FIELDS) return undefined;

  const [user, pid, cpu, mem, vsz, rss] = fields;
  if (!isInteger(pid) || !isDecimal(cpu) || !isDecimal(mem) || !isInteger(vsz) || !isInteger(rss)) {
    return undefined;
  }

  const cpuPct = Number(cpu);
  const memPct = Number(mem);
  const rssKb = Number(rss);

  return {
    user,
    pid: Number(pid),
    cpuPct,
    memPct,
    vszMb: Math.floor(Number(vsz) / 1024),
    rssMb: Math.floor(rssKb / 1024),
    rssKb,
    command: truncateCommand(fields.slice(FIXED_FIELDS).join(' ').trimStart(), commandWidth),
    level: classifyProcess(metric, cpuPct, memPct),
  };
}

/**
 * Ranks `ps aux` output: header dropped, rows sorted descending by the metric
 * (ties keep table order), first `limit` kept
 */
export function rankProcessTable(
  output: string,
  metric: RankingMetric,
  limit = 5,
  commandWidth = 50,
): ProcessEntry[] {
  const rows = output.split('\n').slice(1).filter(line => line.trim() !== '');
  const entries: ProcessEntry[] = [];
  for (const row of rows) {
    const entry = parseProcessRow(row, metric, commandWidth);
    if (entry) entries.push(entry);
  }

  return entries
    .map((entry, index) => ({ entry, index }))
    .sort((a, b) => metricValue(b.entry, metric) - metricValue(a.entry, metric) || a.index - b.index)
    .slice(0, limit)
    .map(({ entry }) => entry);
}

export class ProcessRanker {
  private readonly config: MonitorConfig;
  private readonly logger = createSubsystemLogger('monitor/process-ranker');

  constructor(config: MonitorConfig) {
    this.config = config;
  }

  /**
   * Top processes by the given metric; empty when the table is unreadable
   */
  rank(metric: RankingMetric): ProcessEntry[] {
    const output = runCommand(`ps aux --sort=-${PS_SORT_KEYS[metric]}`);
    if (output === undefined) {
      this.logger.warn('Process table unavailable', { metric });
      return [];
    }
    return rankProcessTable(output, metric, this.config.topProcessCount, this.config.commandWidth);
  }

  /**
   * Number of processes in the table, header excluded
   */
  countProcesses(): number | undefined {
    const output = runCommand('ps aux');
    if (output === undefined) return undefined;
    const lines = output.split('\n').filter(line => line.trim() !== '');
    return Math.max(0, lines.length - 1);
  }
}
