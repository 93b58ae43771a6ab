/**
 * Auxiliary probes
 *
 * Optional extras shown under the report: network traffic of the default-route
 * interface and the number of recent syslog lines that look like problems.
 * Each probe returns undefined when its source is unavailable.
 */

import { accessSync, constants, existsSync, readFileSync } from 'node:fs';
import { createSubsystemLogger } from '../../logging/subsystem.js';
import { runCommand, shellQuote } from '../system/commands.js';
import { isNumeric } from '../sampler/parsers.js';

const log = createSubsystemLogger('monitor/auxiliary');

export const SYSLOG_PROBLEM_PATTERN = /error|critical|fail|warn/i;

export interface InterfaceTraffic {
  interfaceName: string;
  rxBytes: number;
  txBytes: number;
}

export interface AuxiliaryCounts {
  processCount?: number;
  traffic?: InterfaceTraffic;
  /** Problem lines among the last syslog lines; only set when readable */
  syslogErrors?: number;
}

/**
 * Extracts the interface of the default route from `ip route` output
 */
export function parseDefaultInterface(routeOutput: string): string | undefined {
  const line = routeOutput.split('\n').find(l => l.startsWith('default'));
  return line?.match(/\bdev\s+(\S+)/)?.[1];
}

export function readDefaultInterface(): string | undefined {
  const output = runCommand('ip route show default');
  return output === undefined ? undefined : parseDefaultInterface(output);
}

function readCounter(path: string): number | undefined {
  if (!existsSync(path)) return undefined;
  const raw = readFileSync(path, 'utf8').trim();
  return isNumeric(raw) ? Number(raw) : undefined;
}

/**
 * Reads cumulative RX/TX byte counters of an interface from sysfs
 */
export function readInterfaceTraffic(interfaceName: string): InterfaceTraffic | undefined {
  if (!/^[\w.@-]+$/.test(interfaceName)) return undefined;

  const base = `/sys/class/net/${interfaceName}/statistics`;
  try {
    const rxBytes = readCounter(`${base}/rx_bytes`);
    const txBytes = readCounter(`${base}/tx_bytes`);
    if (rxBytes === undefined || txBytes === undefined) return undefined;
    return { interfaceName, rxBytes, txBytes };
  } catch (error) {
    log.debug('Failed to read interface counters', { interfaceName, error: String(error) });
    return undefined;
  }
}

export function countProblemLines(lines: readonly string[]): number {
  return lines.filter(line => SYSLOG_PROBLEM_PATTERN.test(line)).length;
}

/**
 * Counts problem lines among the last `tailLines` lines of the system log.
 * Undefined when the log is not readable by this user.
 */
export function countSyslogErrors(path: string, tailLines: number): number | undefined {
  try {
    accessSync(path, constants.R_OK);
  } catch {
    return undefined;
  }

  const output = runCommand(`tail -n ${Math.max(1, Math.floor(tailLines))} ${shellQuote(path)}`);
  if (output === undefined) return undefined;
  return countProblemLines(output.split('\n').filter(line => line !== ''));
}
