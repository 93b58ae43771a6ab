/**
 * Loop Controller
 *
 * Drives the three run modes:
 *  - snapshot: sample, evaluate and dispatch, render the full report, stop
 *  - log: sample, evaluate and dispatch, no report
 *  - continuous: repeat snapshot mode every interval until cancelled
 *
 * States: idle -> sampling -> evaluating -> rendering -> (stopped | sleeping),
 * sleeping -> sampling. Sleeping is the only place cancellation is observed,
 * so a cycle that has started always completes.
 */

import { EventEmitter } from 'node:events';
import { createSubsystemLogger } from '../../logging/subsystem.js';
import { InvalidArgumentError } from '../errors.js';
import { SystemSampler } from '../sampler/system-sampler.js';
import { ThresholdEvaluator } from '../alerting/threshold-evaluator.js';
import { AlertDispatcher, createDefaultSinks, type DispatchReport } from '../alerting/alert-dispatcher.js';
import { ProcessRanker } from '../process-ranker/process-ranker.js';
import { ReportRenderer } from '../report/report-renderer.js';
import type { Alert, MonitorConfig, Snapshot } from '../types/index.js';

export type RunMode =
  | { kind: 'snapshot' }
  | { kind: 'log' }
  | { kind: 'continuous'; intervalSeconds: number };

export type LoopState = 'idle' | 'sampling' | 'evaluating' | 'rendering' | 'sleeping' | 'stopped';

export interface StateChange {
  from: LoopState;
  to: LoopState;
}

export interface CycleResult {
  snapshot: Snapshot;
  alerts: Alert[];
  dispatch: DispatchReport;
}

export interface RunResult {
  mode: RunMode['kind'];
  cycles: number;
  cancelled: boolean;
}

export interface LoopControllerDeps {
  sampler: Pick<SystemSampler, 'sample'>;
  evaluator: Pick<ThresholdEvaluator, 'evaluate'>;
  dispatcher: Pick<AlertDispatcher, 'dispatch'>;
  renderer: Pick<ReportRenderer, 'render'>;
  /** Writes a rendered report */
  output: (text: string) => void;
  /** Clears previous output at the start of a continuous-mode cycle */
  clear: () => void;
  /** Appends an informational line to the persistent log */
  note: (text: string) => void;
}

/** Longest interval a single timer can wait (2^31 - 1 ms) */
export const MAX_INTERVAL_SECONDS = Math.floor((2 ** 31 - 1) / 1000);

/**
 * Validates a continuous-mode interval: a whole number of seconds between 1
 * and MAX_INTERVAL_SECONDS
 */
export function parseIntervalSeconds(raw: string | number | undefined, fallback: number): number {
  if (raw === undefined) return fallback;

  const text = String(raw).trim();
  if (!/^\d+$/.test(text) || Number(text) < 1) {
    throw new InvalidArgumentError(`Invalid interval: ${String(raw)} (expected a positive whole number of seconds)`);
  }
  if (Number(text) > MAX_INTERVAL_SECONDS) {
    throw new InvalidArgumentError(`Invalid interval: ${String(raw)} (at most ${MAX_INTERVAL_SECONDS} seconds)`);
  }
  return Number(text);
}

/**
 * Waits for `ms`, resolving true when the wait completed and false when the
 * signal aborted it
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) {
    return Promise.resolve(false);
  }

  return new Promise(resolve => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve(true);
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

function clearTerminal(): void {
  if (process.stdout.isTTY) {
    console.clear();
  }
}

export class LoopController extends EventEmitter {
  private readonly config: MonitorConfig;
  private readonly deps: LoopControllerDeps;
  private readonly logger = createSubsystemLogger('monitor/loop');
  private state: LoopState = 'idle';

  constructor(config: MonitorConfig, deps: Partial<LoopControllerDeps> = {}) {
    super();
    this.config = config;

    const dispatcher = deps.dispatcher ?? new AlertDispatcher(createDefaultSinks(config));
    const logSink = dispatcher instanceof AlertDispatcher ? dispatcher.getLogSink() : undefined;

    this.deps = {
      sampler: deps.sampler ?? new SystemSampler(config),
      evaluator: deps.evaluator ?? new ThresholdEvaluator(config.thresholds),
      dispatcher,
      renderer: deps.renderer ?? new ReportRenderer(config, new ProcessRanker(config)),
      output: deps.output ?? (text => console.log(text)),
      clear: deps.clear ?? clearTerminal,
      note: deps.note ?? (text => logSink?.appendInfo(text)),
    };
  }

  getState(): LoopState {
    return this.state;
  }

  /**
   * Runs the given mode to completion, or until the signal aborts a
   * continuous run
   */
  async run(mode: RunMode, signal?: AbortSignal): Promise<RunResult> {
    this.logger.info('Monitor run starting', { mode: mode.kind });

    switch (mode.kind) {
      case 'snapshot':
        await this.runCycle({ report: true, clear: false });
        this.transition('stopped');
        return { mode: mode.kind, cycles: 1, cancelled: false };

      case 'log':
        await this.runCycle({ report: false, clear: false });
        this.transition('stopped');
        return { mode: mode.kind, cycles: 1, cancelled: false };

      case 'continuous':
        return this.runContinuous(mode.intervalSeconds, signal);
    }
  }

  /**
   * One sampling cycle: sample, evaluate and dispatch, optionally render
   */
  async runCycle(options: { report: boolean; clear: boolean }): Promise<CycleResult> {
    // Console alerts land after the clear
    if (options.clear) {
      this.deps.clear();
    }

    this.transition('sampling');
    const snapshot = await this.deps.sampler.sample();

    this.transition('evaluating');
    const alerts = this.deps.evaluator.evaluate(snapshot);
    const dispatch = this.deps.dispatcher.dispatch(alerts);

    if (snapshot.unreadable.length > 0 && !options.report) {
      this.deps.note(`Unreadable metrics reported as unknown: ${snapshot.unreadable.join(', ')}`);
    }

    if (options.report) {
      this.transition('rendering');
      this.deps.output(this.deps.renderer.render(snapshot));
    }

    this.emit('cycle', { snapshot, alerts, dispatch });
    return { snapshot, alerts, dispatch };
  }

  private async runContinuous(intervalSeconds: number, signal?: AbortSignal): Promise<RunResult> {
    const interval = parseIntervalSeconds(intervalSeconds, this.config.defaultIntervalSeconds);
    let cycles = 0;

    for (;;) {
      await this.runCycle({ report: true, clear: true });
      cycles++;

      this.transition('sleeping');
      const completed = await sleep(interval * 1000, signal);
      if (!completed) {
        break;
      }
    }

    this.transition('stopped');
    this.logger.info('Continuous monitoring cancelled', { cycles });
    return { mode: 'continuous', cycles, cancelled: true };
  }

  private transition(to: LoopState): void {
    const from = this.state;
    if (from === to) return;
    this.state = to;
    this.emit('stateChange', { from, to } satisfies StateChange);
  }
}
