/**
 * Log Sink
 *
 * Appends alerts to a persistent log file, one line each:
 * `YYYY-MM-DD HH:MM:SS - [severity] Title: Message`.
 * The file is opened, appended and released on every write. Write failures
 * are dropped after one attempt to create the containing directory.
 */

import { appendFileSync, existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { createSubsystemLogger } from '../../logging/subsystem.js';
import { SinkFailureError } from '../errors.js';
import type { NotificationSink } from './notification-sink.js';
import type { Alert } from '../types/index.js';

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * Formats a date as local `YYYY-MM-DD HH:MM:SS`
 */
export function formatLogTimestamp(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} `
    + `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

export function formatAlertLine(alert: Alert, date: Date): string {
  return `${formatLogTimestamp(date)} - [${alert.severity}] ${alert.title}: ${alert.message}`;
}

export class LogSink implements NotificationSink {
  readonly name = 'log';
  private readonly logger = createSubsystemLogger('monitor/log-sink');

  constructor(
    readonly filePath: string,
    private readonly now: () => Date = () => new Date(),
  ) {}

  deliver(alert: Alert): void {
    this.append(formatAlertLine(alert, this.now()));
  }

  /**
   * Appends an unstructured informational line
   */
  appendInfo(text: string): void {
    this.append(`${formatLogTimestamp(this.now())} - ${text}`);
  }

  private append(line: string): void {
    try {
      const directory = dirname(this.filePath);
      if (!existsSync(directory)) {
        mkdirSync(directory, { recursive: true });
      }
      appendFileSync(this.filePath, `${line}\n`, { encoding: 'utf8', flag: 'a' });
    } catch (error) {
      const failure = new SinkFailureError(this.name, { cause: error });
      this.logger.debug(failure.message, { filePath: this.filePath, error: String(error) });
    }
  }
}
