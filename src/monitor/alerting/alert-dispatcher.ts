/**
 * Alert Dispatcher
 *
 * Delivers every alert to every configured sink. A sink that throws is
 * recorded and skipped; the remaining sinks still receive the alert.
 */

import { EventEmitter } from 'node:events';
import { createSubsystemLogger } from '../../logging/subsystem.js';
import { SinkFailureError } from '../errors.js';
import { ConsoleSink, type LineWriter } from './console-sink.js';
import { DesktopSink } from './desktop-sink.js';
import { LogSink } from './log-sink.js';
import { canSendDesktopNotifications } from '../system/detection.js';
import type { NotificationSink } from './notification-sink.js';
import type { Alert, MonitorConfig } from '../types/index.js';

export interface SinkFailure {
  sink: string;
  alert: Alert;
  error: SinkFailureError;
}

export interface DispatchReport {
  alerts: number;
  deliveries: number;
  failures: SinkFailure[];
}

export interface DefaultSinkOptions {
  /** Where console alerts are written */
  write?: LineWriter;
  /** Overrides desktop-session detection */
  desktop?: boolean;
}

/**
 * Builds the log and console sinks, plus the desktop sink when a desktop
 * session with a notifier is detected
 */
export function createDefaultSinks(config: MonitorConfig, options: DefaultSinkOptions = {}): NotificationSink[] {
  const sinks: NotificationSink[] = [
    new LogSink(config.logFile),
    new ConsoleSink(options.write),
  ];
  if (options.desktop ?? canSendDesktopNotifications()) {
    sinks.push(new DesktopSink());
  }
  return sinks;
}

export class AlertDispatcher extends EventEmitter {
  private readonly sinks: readonly NotificationSink[];
  private readonly logger = createSubsystemLogger('monitor/dispatcher');

  constructor(sinks: readonly NotificationSink[]) {
    super();
    this.sinks = sinks;
  }

  getSinkNames(): string[] {
    return this.sinks.map(sink => sink.name);
  }

  /**
   * Finds the log sink, if one is configured
   */
  getLogSink(): LogSink | undefined {
    return this.sinks.find((sink): sink is LogSink => sink instanceof LogSink);
  }

  dispatch(alerts: readonly Alert[]): DispatchReport {
    const report: DispatchReport = { alerts: alerts.length, deliveries: 0, failures: [] };

    for (const alert of alerts) {
      for (const sink of this.sinks) {
        try {
          sink.deliver(alert);
          report.deliveries++;
        } catch (error) {
          const failure: SinkFailure = {
            sink: sink.name,
            alert,
            error: new SinkFailureError(sink.name, { cause: error }),
          };
          report.failures.push(failure);
          this.logger.debug('Sink delivery failed', {
            sink: sink.name,
            metric: alert.metric,
            error: String(error),
          });
          this.emit('sinkFailure', failure);
        }
      }
      this.emit('alertDispatched', alert);
    }

    return report;
  }
}
