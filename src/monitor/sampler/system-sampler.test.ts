/**
 * System Sampler tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { existsSync, readFileSync } from 'node:fs';
import { commandExists, runCommand } from '../system/commands.js';
import { SystemSampler } from './system-sampler.js';
import { createTestConfig, procStatContent } from '../test-setup.js';

vi.mock('node:fs');
vi.mock('../system/commands.js');

const mockExistsSync = vi.mocked(existsSync);
const mockReadFileSync = vi.mocked(readFileSync);
const mockCommandExists = vi.mocked(commandExists);
const mockRunCommand = vi.mocked(runCommand);

const FIRST_STAT = procStatContent({
  user: 1000, nice: 0, system: 500, idle: 8000, iowait: 500, irq: 0, softirq: 0, steal: 0,
});
const SECOND_STAT = procStatContent({
  user: 1060, nice: 0, system: 520, idle: 8100, iowait: 520, irq: 0, softirq: 0, steal: 0,
});

const FREE_OUTPUT = [
  '               total        used        free      shared  buff/cache   available',
  'Mem:            1000         850         100          10          50         120',
  'Swap:           2000         500        1500',
  '',
].join('\n');

const DF_OUTPUT = [
  'Filesystem     1024-blocks     Used Available Capacity Mounted on',
  '/dev/sda1        100000000 90000000  10000000      90% /',
  '',
].join('\n');

function commandOutputs(outputs: Record<string, string | undefined>): void {
  mockRunCommand.mockImplementation(command => outputs[command]);
}

describe('SystemSampler', () => {
  let sampler: SystemSampler;

  beforeEach(() => {
    vi.resetAllMocks();
    sampler = new SystemSampler(createTestConfig(), [{ kind: 'thermal-zone', path: '/tmp/zone/temp' }]);
  });

  describe('sampleCpu', () => {
    it('computes utilization from two readings', async () => {
      mockExistsSync.mockReturnValue(true);
      mockReadFileSync.mockReturnValueOnce(FIRST_STAT).mockReturnValueOnce(SECOND_STAT);

      await expect(sampler.sampleCpu()).resolves.toEqual({ ok: true, value: 40 });
      expect(mockReadFileSync).toHaveBeenCalledWith('/proc/stat', 'utf8');
    });

    it('reports unreadable when /proc/stat is absent', async () => {
      mockExistsSync.mockReturnValue(false);

      await expect(sampler.sampleCpu()).resolves.toEqual({
        ok: false,
        value: 0,
        reason: '/proc/stat: not present',
      });
    });

    it('reports unreadable when no ticks elapse', async () => {
      mockExistsSync.mockReturnValue(true);
      mockReadFileSync.mockReturnValue(FIRST_STAT);

      const reading = await sampler.sampleCpu();

      expect(reading.ok).toBe(false);
      expect(reading.value).toBe(0);
    });

    it('wraps unexpected read errors', async () => {
      mockExistsSync.mockReturnValue(true);
      mockReadFileSync.mockImplementation(() => {
        throw new Error('EIO');
      });

      await expect(sampler.sampleCpu()).resolves.toEqual({
        ok: false,
        value: 0,
        reason: '/proc/stat: EIO',
      });
    });
  });

  describe('sampleMemory', () => {
    it('derives RAM and swap percentages', () => {
      commandOutputs({ free: FREE_OUTPUT });

      expect(sampler.sampleMemory()).toEqual({
        ram: { ok: true, value: 85 },
        swap: { ok: true, value: 25 },
      });
    });

    it('treats a host without swap space as 0% swap', () => {
      commandOutputs({ free: FREE_OUTPUT.replace('Swap:           2000         500', 'Swap:              0           0') });

      expect(sampler.sampleMemory().swap).toEqual({ ok: true, value: 0 });
    });

    it('marks both unreadable when free fails', () => {
      commandOutputs({});

      const readings = sampler.sampleMemory();

      expect(readings.ram.ok).toBe(false);
      expect(readings.swap.ok).toBe(false);
    });
  });

  describe('sampleDisk', () => {
    it('reads the root filesystem usage', () => {
      commandOutputs({ 'df -P /': DF_OUTPUT });

      expect(sampler.sampleDisk()).toEqual({ ok: true, value: 90 });
    });

    it('marks the disk unreadable on garbage output', () => {
      commandOutputs({ 'df -P /': 'nothing useful\n' });

      expect(sampler.sampleDisk()).toEqual({ ok: false, value: 0, reason: 'df: no parsable usage for /' });
    });
  });

  describe('sample', () => {
    it('assembles a frozen snapshot', async () => {
      mockExistsSync.mockReturnValue(true);
      mockReadFileSync
        .mockReturnValueOnce(FIRST_STAT)
        .mockReturnValueOnce(SECOND_STAT)
        .mockReturnValueOnce('52000\n');
      commandOutputs({ free: FREE_OUTPUT, 'df -P /': DF_OUTPUT });

      const snapshot = await sampler.sample();

      expect(snapshot).toMatchObject({
        cpuPct: 40,
        ramPct: 85,
        swapPct: 25,
        diskPct: 90,
        temperature: 52,
        unreadable: [],
      });
      expect(snapshot.timestamp).toBeInstanceOf(Date);
      expect(Object.isFrozen(snapshot)).toBe(true);
    });

    it('does not count a host without temperature sources as a failure', async () => {
      mockExistsSync.mockImplementation(path => path === '/proc/stat');
      mockReadFileSync.mockReturnValueOnce(FIRST_STAT).mockReturnValueOnce(SECOND_STAT);
      mockCommandExists.mockReturnValue(false);
      commandOutputs({ free: FREE_OUTPUT, 'df -P /': DF_OUTPUT });

      const snapshot = await sampler.sample();

      expect(snapshot.temperature).toBe('unavailable');
      expect(snapshot.unreadable).toEqual([]);
    });

    it('lists every unreadable metric and keeps going', async () => {
      mockExistsSync.mockReturnValue(false);
      mockCommandExists.mockReturnValue(false);
      commandOutputs({ 'df -P /': DF_OUTPUT });

      const snapshot = await sampler.sample();

      expect(snapshot.unreadable).toEqual(['cpu', 'ram', 'swap']);
      expect(snapshot.cpuPct).toBe(0);
      expect(snapshot.ramPct).toBe(0);
      expect(snapshot.diskPct).toBe(90);
      expect(snapshot.temperature).toBe('unavailable');
    });
  });
});
