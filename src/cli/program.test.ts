/**
 * CLI tests
 */

import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import { main, resolveRunMode, formatThresholdHelp, listenForTermination, type CliDeps } from './program.js';
import { ConfigurationError, MissingDependencyError } from '../monitor/errors.js';
import { createTestConfig } from '../monitor/test-setup.js';
import type { RunMode, RunResult } from '../monitor/loop-controller/index.js';

const argv = (...args: string[]) => ['node', 'host-monitor', ...args];

describe('CLI', () => {
  const config = createTestConfig();
  let out: string[];
  let err: string[];
  let run: Mock<(mode: RunMode, signal?: AbortSignal) => Promise<RunResult>>;
  let removeHandler: Mock<() => void>;
  let terminate: (() => void) | undefined;
  let deps: Partial<CliDeps>;

  beforeEach(() => {
    out = [];
    err = [];
    terminate = undefined;
    run = vi.fn(async (mode: RunMode, _signal?: AbortSignal): Promise<RunResult> => ({ mode: mode.kind, cycles: 1, cancelled: false }));
    removeHandler = vi.fn();
    deps = {
      loadConfig: () => config,
      checkDependencies: vi.fn(),
      createController: () => ({ run }),
      onTerminate: handler => {
        terminate = handler;
        return removeHandler;
      },
      stdout: text => out.push(text),
      stderr: text => err.push(text),
    };
  });

  describe('resolveRunMode', () => {
    it('defaults to a snapshot', () => {
      expect(resolveRunMode({}, config)).toEqual({ kind: 'snapshot' });
    });

    it('uses the default interval for a bare --continuous', () => {
      expect(resolveRunMode({ continuous: true }, config)).toEqual({ kind: 'continuous', intervalSeconds: 60 });
    });

    it('accepts the short spellings', () => {
      expect(resolveRunMode({ c: 15 }, config)).toEqual({ kind: 'continuous', intervalSeconds: 15 });
      expect(resolveRunMode({ l: true }, config)).toEqual({ kind: 'log' });
    });

    it('prefers log mode over continuous mode', () => {
      expect(resolveRunMode({ log: true, continuous: 5 }, config)).toEqual({ kind: 'log' });
    });
  });

  it('runs a snapshot by default', async () => {
    await expect(main(argv(), deps)).resolves.toBe(0);

    expect(run).toHaveBeenCalledWith({ kind: 'snapshot' });
  });

  it('runs log mode', async () => {
    await expect(main(argv('--log'), deps)).resolves.toBe(0);

    expect(run).toHaveBeenCalledWith({ kind: 'log' });
  });

  it('runs continuous mode until the controller returns', async () => {
    run.mockImplementation(async (mode, signal) => {
      expect(signal?.aborted).toBe(false);
      terminate?.();
      expect(signal?.aborted).toBe(true);
      return { mode: mode.kind, cycles: 2, cancelled: true };
    });

    await expect(main(argv('--continuous', '5'), deps)).resolves.toBe(0);

    expect(run).toHaveBeenCalledWith({ kind: 'continuous', intervalSeconds: 5 }, expect.any(AbortSignal));
    expect(out[0]).toBe('Continuous monitoring every 5 seconds. Press Ctrl+C to stop.\n');
    expect(out[1]).toContain('Stopping monitoring...');
    expect(removeHandler).toHaveBeenCalledTimes(1);
  });

  it('uses the default interval with --c', async () => {
    await expect(main(argv('--c'), deps)).resolves.toBe(0);

    expect(run).toHaveBeenCalledWith({ kind: 'continuous', intervalSeconds: 60 }, expect.any(AbortSignal));
  });

  it.each(['abc', '0', '-1', '2200000'])('rejects the interval %j without sampling', async interval => {
    await expect(main(argv('--continuous', interval), deps)).resolves.toBe(1);

    expect(run).not.toHaveBeenCalled();
    expect(deps.checkDependencies).not.toHaveBeenCalled();
    expect(err.join('')).not.toBe('');
  });

  it('explains an invalid interval', async () => {
    await main(argv('--continuous', 'abc'), deps);

    expect(err.join('')).toContain('Invalid interval: abc');
  });

  it('prints help with thresholds and the log path', async () => {
    await expect(main(argv('--help'), deps)).resolves.toBe(0);

    const help = out.join('');
    expect(help).toContain('--continuous [seconds]');
    expect(help).toContain('  CPU:  80%');
    expect(help).toContain('  Swap: 50% (warning only)');
    expect(help).toContain('Log file: /tmp/host-monitor-test/monitor.log');
    expect(run).not.toHaveBeenCalled();
  });

  it('rejects unknown options', async () => {
    await expect(main(argv('--bogus'), deps)).resolves.toBe(1);

    expect(run).not.toHaveBeenCalled();
  });

  it('stops before sampling when a dependency is missing', async () => {
    deps.checkDependencies = () => {
      throw new MissingDependencyError(['free']);
    };

    await expect(main(argv(), deps)).resolves.toBe(1);

    expect(err.join('')).toContain('Missing required commands: free');
    expect(run).not.toHaveBeenCalled();
  });

  it('reports invalid configuration', async () => {
    deps.loadConfig = () => {
      throw new ConfigurationError(['HOST_MONITOR_CPU_LIMIT: Number must be less than or equal to 100']);
    };

    await expect(main(argv(), deps)).resolves.toBe(1);

    expect(err.join('')).toContain('Invalid configuration: HOST_MONITOR_CPU_LIMIT');
  });

  it('handles every termination signal until the handler is removed', () => {
    const handler = vi.fn();
    const baseline = process.listenerCount('SIGINT');
    const termBaseline = process.listenerCount('SIGTERM');

    const remove = listenForTermination(handler);
    process.emit('SIGINT', 'SIGINT');
    process.emit('SIGINT', 'SIGINT');
    process.emit('SIGTERM', 'SIGTERM');

    expect(handler).toHaveBeenCalledTimes(3);
    expect(process.listenerCount('SIGINT')).toBe(baseline + 1);

    remove();
    expect(process.listenerCount('SIGINT')).toBe(baseline);
    expect(process.listenerCount('SIGTERM')).toBe(termBaseline);
  });

  it('formats the threshold block', () => {
    expect(formatThresholdHelp(config)).toBe([
      '',
      'Thresholds:',
      '  CPU:  80%',
      '  RAM:  85%',
      '  Disk: 90%',
      '  Swap: 50% (warning only)',
      '',
      'Log file: /tmp/host-monitor-test/monitor.log',
    ].join('\n'));
  });
});
