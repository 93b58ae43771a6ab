/**
 * Report Renderer
 *
 * Builds the full console report for a snapshot: host header, resource lines
 * flagged against the thresholds, temperature, the two top-process tables and
 * the auxiliary counts. Rendering is split into a data-gathering step
 * (`ReportRenderer.render`) and a pure formatter (`formatReport`).
 */

import { hostname, uptime } from 'node:os';
import { colors as defaultColors, type Colors } from '../../logger.js';
import { isBreach } from '../alerting/threshold-evaluator.js';
import { PS_SORT_KEYS, metricValue, type ProcessRanker } from '../process-ranker/process-ranker.js';
import {
  countSyslogErrors,
  readDefaultInterface,
  readInterfaceTraffic,
  type AuxiliaryCounts,
} from './auxiliary.js';
import {
  formatTemperature,
  type MonitorConfig,
  type ProcessEntry,
  type ProcessLevel,
  type RankingMetric,
  type Snapshot,
  type ThresholdConfig,
} from '../types/index.js';

export interface HostInfo {
  hostname: string;
  uptimeSeconds: number;
  now: Date;
}

export interface ProcessTable {
  metric: RankingMetric;
  title: string;
  limit: number;
  entries: ProcessEntry[];
}

export interface ReportData {
  snapshot: Snapshot;
  thresholds: ThresholdConfig;
  host: HostInfo;
  tables: ProcessTable[];
  auxiliary: AuxiliaryCounts;
  syslogTailLines: number;
}

const RULE = '================================';

export function formatUptime(totalSeconds: number): string {
  const minutesTotal = Math.floor(Math.max(0, totalSeconds) / 60);
  const days = Math.floor(minutesTotal / 1440);
  const hours = Math.floor((minutesTotal % 1440) / 60);
  const minutes = minutesTotal % 60;

  const unit = (value: number, name: string) => `${value} ${name}${value === 1 ? '' : 's'}`;
  const parts: string[] = [];
  if (days > 0) parts.push(unit(days, 'day'));
  if (hours > 0) parts.push(unit(hours, 'hour'));
  if (minutes > 0 || parts.length === 0) parts.push(unit(minutes, 'minute'));
  return `up ${parts.join(', ')}`;
}

export function formatBytes(bytes: number): string {
  const units = ['B', 'KiB', 'MiB', 'GiB', 'TiB'];
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${value} ${units[unit]}` : `${value.toFixed(1)} ${units[unit]}`;
}

function levelColor(level: ProcessLevel, colors: Colors): (text: string) => string {
  switch (level) {
    case 'critical':
      return text => colors.bold(colors.red(text));
    case 'elevated':
      return text => colors.bold(colors.yellow(text));
    case 'normal':
      return colors.green;
  }
}

function columns(values: Array<[string, number]>): string {
  return values.map(([text, width]) => text.padEnd(width)).join(' ').trimEnd();
}

export function formatProcessTable(table: ProcessTable, colors: Colors): string[] {
  const key = PS_SORT_KEYS[table.metric];
  const lines = [
    colors.yellow(`=== Top ${table.limit} processes by ${table.title} ===`),
    '',
    colors.blue(columns([['USER', 10], ['PID', 8], [key, 8], ['VSZ (MB)', 10], ['RSS (MB)', 12], ['COMMAND', 0]])),
    colors.blue(columns([['-'.repeat(10), 10], ['-'.repeat(8), 8], ['-'.repeat(8), 8], ['-'.repeat(10), 10], ['-'.repeat(12), 12], ['-'.repeat(50), 0]])),
  ];

  for (const entry of table.entries) {
    const value = levelColor(entry.level, colors)(metricValue(entry, table.metric).toFixed(1).padEnd(8));
    lines.push([
      entry.user.padEnd(10),
      String(entry.pid).padEnd(8),
      value,
      String(entry.vszMb).padEnd(10),
      String(entry.rssMb).padEnd(12),
      entry.command,
    ].join(' '));
  }
  return lines;
}

function resourceLine(
  label: string,
  value: number,
  limit: number,
  tag: string,
  colors: Colors,
  tone: 'red' | 'yellow' = 'red',
): string {
  const paint = tone === 'red' ? colors.red : colors.yellow;
  if (isBreach(value, limit)) {
    return `${paint(`${label}:`)} ${value}% ${paint(`[${tag}]`)}`;
  }
  return `${colors.green(`${label}:`)} ${value}%`;
}

/**
 * Formats a complete report as lines of text
 */
export function formatReport(data: ReportData, colors: Colors = defaultColors): string[] {
  const { snapshot, thresholds, host, auxiliary } = data;
  const lines: string[] = [
    colors.blue(RULE),
    colors.blue('    SYSTEM MONITOR'),
    colors.blue(RULE),
    '',
    `${colors.green('Host:')} ${host.hostname}`,
    `${colors.green('Time:')} ${host.now.toString()}`,
    `${colors.green('Uptime:')} ${formatUptime(host.uptimeSeconds)}`,
    '',
    colors.yellow('=== Resource usage ==='),
    resourceLine('CPU', snapshot.cpuPct, thresholds.cpuLimit, 'HIGH LOAD', colors),
    resourceLine('RAM', snapshot.ramPct, thresholds.ramLimit, 'HIGH USAGE', colors),
    resourceLine('Disk', snapshot.diskPct, thresholds.diskLimit, 'LOW SPACE', colors),
    resourceLine('Swap', snapshot.swapPct, thresholds.swapWarnLimit, 'ACTIVE', colors, 'yellow'),
    `${colors.green('Temperature:')} ${formatTemperature(snapshot.temperature)}`,
  ];

  if (snapshot.unreadable.length > 0) {
    lines.push(colors.yellow(`Unreadable: ${snapshot.unreadable.join(', ')}`));
  }

  for (const table of data.tables) {
    lines.push('', ...formatProcessTable(table, colors));
  }

  lines.push(
    '',
    colors.blue(RULE),
    colors.blue('    Additional information'),
    colors.blue(RULE),
    `${colors.green('Active processes:')} ${auxiliary.processCount ?? 'N/A'}`,
  );

  if (auxiliary.traffic) {
    const { interfaceName, rxBytes, txBytes } = auxiliary.traffic;
    lines.push(
      `${colors.green(`Traffic (${interfaceName}):`)}`,
      `  RX: ${formatBytes(rxBytes)}   TX: ${formatBytes(txBytes)}`,
    );
  }

  if (auxiliary.syslogErrors !== undefined && auxiliary.syslogErrors > 0) {
    lines.push(
      `${colors.red('Errors in system log:')} ${auxiliary.syslogErrors} (last ${data.syslogTailLines} lines)`,
    );
  }

  return lines;
}

export class ReportRenderer {
  private readonly config: MonitorConfig;
  private readonly ranker: ProcessRanker;
  private readonly colors: Colors;

  constructor(config: MonitorConfig, ranker: ProcessRanker, colors: Colors = defaultColors) {
    this.config = config;
    this.ranker = ranker;
    this.colors = colors;
  }

  /**
   * Gathers rankings and auxiliary counts, then formats the report
   */
  render(snapshot: Snapshot): string {
    const interfaceName = readDefaultInterface();
    const data: ReportData = {
      snapshot,
      thresholds: this.config.thresholds,
      host: { hostname: hostname(), uptimeSeconds: uptime(), now: snapshot.timestamp },
      tables: [
        { metric: 'cpu', title: 'CPU', limit: this.config.topProcessCount, entries: this.ranker.rank('cpu') },
        { metric: 'mem', title: 'RAM', limit: this.config.topProcessCount, entries: this.ranker.rank('mem') },
      ],
      auxiliary: {
        processCount: this.ranker.countProcesses(),
        traffic: interfaceName === undefined ? undefined : readInterfaceTraffic(interfaceName),
        syslogErrors: countSyslogErrors(this.config.syslogPath, this.config.syslogTailLines),
      },
      syslogTailLines: this.config.syslogTailLines,
    };
    return formatReport(data, this.colors).join('\n');
  }
}
