/**
 * Command surface
 *
 *   host-monitor                    one snapshot report
 *   host-monitor --continuous [N]   report every N seconds (default 60)
 *   host-monitor --log              evaluate and log alerts only
 */

import { Command, CommanderError, InvalidArgumentError as CommanderArgumentError, Option } from 'commander';
import { colors } from '../logger.js';
import {
  LoopController,
  MonitorError,
  assertDependencies,
  describeError,
  loadMonitorConfig,
  parseIntervalSeconds,
  type MonitorConfig,
  type RunMode,
  type RunResult,
} from '../monitor/index.js';

export type CliOptions = {
  continuous?: number | true;
  c?: number | true;
  log?: true;
  l?: true;
};

export interface CliDeps {
  loadConfig: () => MonitorConfig;
  checkDependencies: (required: readonly string[]) => void;
  createController: (config: MonitorConfig) => { run(mode: RunMode, signal?: AbortSignal): Promise<RunResult> };
  /** Installs the cancellation handler; returns a function removing it */
  onTerminate: (handler: () => void) => () => void;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

/**
 * Keeps the handler installed until removed, so repeated signals during the
 * final cycle do not fall through to the default exit
 */
export function listenForTermination(handler: () => void): () => void {
  process.on('SIGINT', handler);
  process.on('SIGTERM', handler);
  return () => {
    process.removeListener('SIGINT', handler);
    process.removeListener('SIGTERM', handler);
  };
}

const defaultDeps: CliDeps = {
  loadConfig: () => loadMonitorConfig(),
  checkDependencies: assertDependencies,
  createController: config => new LoopController(config),
  onTerminate: listenForTermination,
  stdout: text => process.stdout.write(text),
  stderr: text => process.stderr.write(text),
};

export function parseIntervalOption(value: string): number {
  try {
    return parseIntervalSeconds(value, 0);
  } catch (error) {
    throw new CommanderArgumentError(describeError(error));
  }
}

/**
 * Resolves the run mode; --log wins over --continuous
 */
export function resolveRunMode(options: CliOptions, config: MonitorConfig): RunMode {
  if (options.log || options.l) {
    return { kind: 'log' };
  }
  const continuous = options.continuous ?? options.c;
  if (continuous !== undefined) {
    return {
      kind: 'continuous',
      intervalSeconds: continuous === true ? config.defaultIntervalSeconds : continuous,
    };
  }
  return { kind: 'snapshot' };
}

export function formatThresholdHelp(config: MonitorConfig): string {
  const { thresholds } = config;
  return [
    '',
    'Thresholds:',
    `  CPU:  ${thresholds.cpuLimit}%`,
    `  RAM:  ${thresholds.ramLimit}%`,
    `  Disk: ${thresholds.diskLimit}%`,
    `  Swap: ${thresholds.swapWarnLimit}% (warning only)`,
    '',
    `Log file: ${config.logFile}`,
  ].join('\n');
}

export function createProgram(config: MonitorConfig, deps: Pick<CliDeps, 'stdout' | 'stderr'>): Command {
  const program = new Command();

  program
    .name('host-monitor')
    .description('Show CPU, memory, swap, disk and temperature usage and alert on thresholds')
    .option('--continuous [seconds]', `monitor continuously every N seconds (default ${config.defaultIntervalSeconds})`, parseIntervalOption)
    .addOption(new Option('--c [seconds]').hideHelp().argParser(parseIntervalOption))
    .option('--log', 'evaluate thresholds and log alerts without a report')
    .addOption(new Option('--l').hideHelp())
    .helpOption('-h, --help', 'show this help')
    .addHelpText('after', formatThresholdHelp(config))
    .configureOutput({
      writeOut: deps.stdout,
      writeErr: deps.stderr,
      outputError: (text, write) => write(colors.red(text)),
    })
    .exitOverride();

  return program;
}

/**
 * Runs the CLI and returns the process exit code
 */
export async function main(argv: readonly string[], overrides: Partial<CliDeps> = {}): Promise<number> {
  const deps: CliDeps = { ...defaultDeps, ...overrides };

  let config: MonitorConfig;
  try {
    config = deps.loadConfig();
  } catch (error) {
    deps.stderr(`${colors.red(`Error: ${describeError(error)}`)}\n`);
    return 1;
  }

  const program = createProgram(config, deps);
  try {
    program.parse([...argv]);
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  const mode = resolveRunMode(program.opts<CliOptions>(), config);

  try {
    deps.checkDependencies(config.requiredCommands);
  } catch (error) {
    if (error instanceof MonitorError && error.fatal) {
      deps.stderr(`${colors.red(`Error: ${error.message}`)}\n`);
      return 1;
    }
    throw error;
  }

  const controller = deps.createController(config);

  if (mode.kind !== 'continuous') {
    await controller.run(mode);
    return 0;
  }

  const abort = new AbortController();
  const removeHandler = deps.onTerminate(() => abort.abort());
  try {
    deps.stdout(`Continuous monitoring every ${mode.intervalSeconds} seconds. Press Ctrl+C to stop.\n`);
    await controller.run(mode, abort.signal);
  } finally {
    removeHandler();
  }
  deps.stdout(`\n${colors.yellow('Stopping monitoring...')}\n`);
  return 0;
}
