/**
 * Console Sink
 *
 * Prints alerts with a severity-coloured tag.
 */

import { colors as defaultColors, type Colors } from '../../logger.js';
import type { NotificationSink } from './notification-sink.js';
import type { Alert, NotificationLevel } from '../types/index.js';

export type LineWriter = (line: string) => void;

export function formatConsoleLine(level: NotificationLevel, title: string, message: string, colors: Colors): string {
  const text = `${title}: ${message}`;
  switch (level) {
    case 'critical':
      return colors.red(`[CRITICAL] ${text}`);
    case 'warning':
      return colors.yellow(`[WARNING] ${text}`);
    case 'info':
      return colors.green(`[INFO] ${text}`);
  }
}

export class ConsoleSink implements NotificationSink {
  readonly name = 'console';

  constructor(
    private readonly write: LineWriter = line => console.log(line),
    private readonly colors: Colors = defaultColors,
  ) {}

  deliver(alert: Alert): void {
    this.write(formatConsoleLine(alert.severity, alert.title, alert.message, this.colors));
  }
}
