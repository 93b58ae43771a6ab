/**
 * Raw counter parsing
 *
 * Pure functions turning OS text (/proc/stat, `free`, `df`) into numbers.
 * Every extracted field must be purely numeric before it is used in
 * arithmetic; anything else yields `undefined`.
 */

export interface CpuCounters {
  user: number;
  nice: number;
  system: number;
  idle: number;
  iowait: number;
  irq: number;
  softirq: number;
  steal: number;
}

export interface UsagePair {
  total: number;
  used: number;
}

export interface MemoryAccounting {
  memory: UsagePair;
  /** Absent when the source has no Swap row */
  swap?: UsagePair;
}

const CPU_FIELDS = ['user', 'nice', 'system', 'idle', 'iowait', 'irq', 'softirq', 'steal'] as const;

export const ZERO_CPU_COUNTERS: Readonly<CpuCounters> = Object.freeze({
  user: 0,
  nice: 0,
  system: 0,
  idle: 0,
  iowait: 0,
  irq: 0,
  softirq: 0,
  steal: 0,
});

export function isNumeric(text: string | undefined): text is string {
  return text !== undefined && /^\d+$/.test(text);
}

export function clampPercent(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.max(0, Math.min(100, value));
}

/**
 * Extracts the aggregate `cpu` line counters from /proc/stat content
 */
export function parseCpuCounters(statContent: string): CpuCounters | undefined {
  const line = statContent.split('\n').find(l => l.startsWith('cpu '));
  if (!line) return undefined;

  const fields = line.trim().split(/\s+/).slice(1, 1 + CPU_FIELDS.length);
  if (fields.length < CPU_FIELDS.length || !fields.every(isNumeric)) {
    return undefined;
  }

  const values = fields.map(Number);
  return {
    user: values[0],
    nice: values[1],
    system: values[2],
    idle: values[3],
    iowait: values[4],
    irq: values[5],
    softirq: values[6],
    steal: values[7],
  };
}

function totalTicks(counters: CpuCounters): number {
  return CPU_FIELDS.reduce((sum, field) => sum + counters[field], 0);
}

function idleTicks(counters: CpuCounters): number {
  return counters.idle + counters.iowait;
}

/**
 * CPU utilization between two readings:
 * `100 - round(100 * Δidle_total / Δtotal)`, clamped to [0,100].
 * Returns undefined when no ticks elapsed or a counter went backwards.
 */
export function cpuUsageBetween(first: CpuCounters, second: CpuCounters): number | undefined {
  const totalDelta = totalTicks(second) - totalTicks(first);
  const idleDelta = idleTicks(second) - idleTicks(first);

  if (totalDelta <= 0 || idleDelta < 0) {
    return undefined;
  }

  return clampPercent(100 - Math.round((100 * idleDelta) / totalDelta));
}

/**
 * CPU utilization since boot for a single counter tuple
 */
export function cpuUsageFromCounters(counters: CpuCounters): number | undefined {
  return cpuUsageBetween(ZERO_CPU_COUNTERS, counters);
}

/**
 * `round(100 * used / total)`, 0 when total is 0
 */
export function usagePercent(pair: UsagePair): number {
  if (pair.total <= 0) return 0;
  return clampPercent(Math.round((100 * pair.used) / pair.total));
}

function parseFreeRow(lines: string[], label: string): UsagePair | undefined {
  const row = lines.find(l => l.startsWith(label));
  if (!row) return undefined;

  const [, total, used] = row.trim().split(/\s+/);
  if (!isNumeric(total) || !isNumeric(used)) return undefined;

  return { total: Number(total), used: Number(used) };
}

/**
 * Parses the Mem: and Swap: rows of `free` output
 */
export function parseFreeOutput(output: string): MemoryAccounting | undefined {
  const lines = output.split('\n');
  const memory = parseFreeRow(lines, 'Mem:');
  if (!memory) return undefined;

  const swap = parseFreeRow(lines, 'Swap:');
  return swap ? { memory, swap } : { memory };
}

/**
 * Reads the Use% column of the first data row of `df -P` output
 */
export function parseDfPercent(output: string): number | undefined {
  const row = output.split('\n')[1];
  if (!row) return undefined;

  const usedField = row.trim().split(/\s+/)[4];
  const digits = usedField?.replace(/%$/, '');
  if (!isNumeric(digits)) return undefined;

  return clampPercent(Number(digits));
}
