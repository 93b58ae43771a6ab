/**
 * Report Renderer tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import pc from 'picocolors';
import { countSyslogErrors, readDefaultInterface, readInterfaceTraffic } from './auxiliary.js';
import { ProcessRanker } from '../process-ranker/index.js';
import {
  ReportRenderer,
  formatBytes,
  formatProcessTable,
  formatReport,
  formatUptime,
  type ReportData,
} from './report-renderer.js';
import { DEFAULT_THRESHOLDS } from '../config/index.js';
import { createSnapshot, createTestConfig } from '../test-setup.js';
import type { ProcessEntry } from '../types/index.js';

vi.mock('./auxiliary.js');
vi.mock('node:os', async importOriginal => ({
  ...(await importOriginal<typeof import('node:os')>()),
  hostname: () => 'testbox',
  uptime: () => 7200,
}));

const plain = pc.createColors(false);

const firefox: ProcessEntry = {
  user: 'alice',
  pid: 2301,
  cpuPct: 75,
  memPct: 12.5,
  vszMb: 4096,
  rssMb: 2048,
  rssKb: 2097152,
  command: '/usr/lib/firefox/firefox',
  level: 'critical',
};

function reportData(overrides: Partial<ReportData> = {}): ReportData {
  return {
    snapshot: createSnapshot(),
    thresholds: DEFAULT_THRESHOLDS,
    host: { hostname: 'testbox', uptimeSeconds: 93_900, now: new Date(2026, 9, 19, 14, 5, 9) },
    tables: [],
    auxiliary: { processCount: 212 },
    syslogTailLines: 30,
    ...overrides,
  };
}

describe('ReportRenderer', () => {
  describe('formatUptime', () => {
    it('spells out days, hours and minutes', () => {
      expect(formatUptime(93_900)).toBe('up 1 day, 2 hours, 5 minutes');
    });

    it('omits zero units', () => {
      expect(formatUptime(3600)).toBe('up 1 hour');
      expect(formatUptime(59)).toBe('up 0 minutes');
    });
  });

  describe('formatBytes', () => {
    it('scales to binary units', () => {
      expect(formatBytes(512)).toBe('512 B');
      expect(formatBytes(1536)).toBe('1.5 KiB');
      expect(formatBytes(5 * 1024 ** 3)).toBe('5.0 GiB');
    });
  });

  describe('formatProcessTable', () => {
    it('lays out the header and one row per entry', () => {
      const lines = formatProcessTable({ metric: 'cpu', title: 'CPU', limit: 5, entries: [firefox] }, plain);

      expect(lines[0]).toBe('=== Top 5 processes by CPU ===');
      expect(lines[1]).toBe('');
      expect(lines[2]).toBe('USER       PID      %cpu     VSZ (MB)   RSS (MB)     COMMAND');
      expect(lines[4]).toBe('alice      2301     75.0     4096       2048         /usr/lib/firefox/firefox');
      expect(lines).toHaveLength(5);
    });

    it('shows resident size in kilobytes for the rss ranking', () => {
      const lines = formatProcessTable({ metric: 'rss', title: 'resident size', limit: 5, entries: [firefox] }, plain);

      expect(lines[4]).toContain(' 2097152.0 ');
    });
  });

  describe('formatReport', () => {
    it('renders the header and resource lines', () => {
      const lines = formatReport(reportData(), plain);

      expect(lines.slice(0, 4)).toEqual([
        '================================',
        '    SYSTEM MONITOR',
        '================================',
        '',
      ]);
      expect(lines).toContain('Host: testbox');
      expect(lines).toContain('Uptime: up 1 day, 2 hours, 5 minutes');
      expect(lines).toContain('CPU: 10%');
      expect(lines).toContain('RAM: 40%');
      expect(lines).toContain('Disk: 30%');
      expect(lines).toContain('Swap: 0%');
      expect(lines).toContain('Temperature: 45°C');
      expect(lines).toContain('Active processes: 212');
    });

    it('flags breached resources', () => {
      const snapshot = createSnapshot({ cpuPct: 95, ramPct: 90, diskPct: 91, swapPct: 60 });

      const lines = formatReport(reportData({ snapshot }), plain);

      expect(lines).toContain('CPU: 95% [HIGH LOAD]');
      expect(lines).toContain('RAM: 90% [HIGH USAGE]');
      expect(lines).toContain('Disk: 91% [LOW SPACE]');
      expect(lines).toContain('Swap: 60% [ACTIVE]');
    });

    it('does not flag a value at its limit', () => {
      const lines = formatReport(reportData({ snapshot: createSnapshot({ cpuPct: 80 }) }), plain);

      expect(lines).toContain('CPU: 80%');
    });

    it('shows unknown temperature and unreadable metrics', () => {
      const snapshot = createSnapshot({ temperature: 'unavailable', unreadable: ['cpu', 'disk'] });

      const lines = formatReport(reportData({ snapshot }), plain);

      expect(lines).toContain('Temperature: N/A°C');
      expect(lines).toContain('Unreadable: cpu, disk');
    });

    it('shows an unknown temperature without an unreadable line', () => {
      const lines = formatReport(reportData({ snapshot: createSnapshot({ temperature: 'unavailable' }) }), plain);

      expect(lines).toContain('Temperature: N/A°C');
      expect(lines.some(line => line.startsWith('Unreadable:'))).toBe(false);
    });

    it('reports traffic and syslog problems when present', () => {
      const lines = formatReport(reportData({
        auxiliary: {
          processCount: undefined,
          traffic: { interfaceName: 'eth0', rxBytes: 1536, txBytes: 512 },
          syslogErrors: 4,
        },
      }), plain);

      expect(lines.slice(-4)).toEqual([
        'Active processes: N/A',
        'Traffic (eth0):',
        '  RX: 1.5 KiB   TX: 512 B',
        'Errors in system log: 4 (last 30 lines)',
      ]);
    });

    it('omits the syslog line when there are no problems', () => {
      const lines = formatReport(reportData({ auxiliary: { processCount: 3, syslogErrors: 0 } }), plain);

      expect(lines[lines.length - 1]).toBe('Active processes: 3');
    });
  });

  describe('render', () => {
    beforeEach(() => {
      vi.resetAllMocks();
    });

    it('gathers rankings and probes into one report', () => {
      vi.mocked(readDefaultInterface).mockReturnValue('eth0');
      vi.mocked(readInterfaceTraffic).mockReturnValue({ interfaceName: 'eth0', rxBytes: 2048, txBytes: 1024 });
      vi.mocked(countSyslogErrors).mockReturnValue(undefined);
      const config = createTestConfig();
      const ranker = new ProcessRanker(config);
      const rank = vi.spyOn(ranker, 'rank').mockReturnValue([firefox]);
      vi.spyOn(ranker, 'countProcesses').mockReturnValue(42);

      const report = new ReportRenderer(config, ranker, plain).render(createSnapshot());

      expect(rank).toHaveBeenNthCalledWith(1, 'cpu');
      expect(rank).toHaveBeenNthCalledWith(2, 'mem');
      expect(countSyslogErrors).toHaveBeenCalledWith('/var/log/syslog', 30);
      const lines = report.split('\n');
      expect(lines).toContain('Host: testbox');
      expect(lines).toContain('Uptime: up 2 hours');
      expect(lines).toContain('=== Top 5 processes by CPU ===');
      expect(lines).toContain('=== Top 5 processes by RAM ===');
      expect(lines).toContain('Active processes: 42');
      expect(lines).toContain('  RX: 2.0 KiB   TX: 1.0 KiB');
    });
  });
});
