/**
 * Desktop Sink
 *
 * Raises a desktop notification through `notify-send`. Critical alerts use the
 * most urgent, longest-lived variant.
 */

import { execFileSync } from 'node:child_process';
import type { NotificationSink } from './notification-sink.js';
import type { Alert, NotificationLevel } from '../types/index.js';

export interface DesktopNotificationVariant {
  urgency: 'critical' | 'normal' | 'low';
  timeoutMs: number;
}

export const DESKTOP_VARIANTS: Readonly<Record<NotificationLevel, DesktopNotificationVariant>> = {
  critical: { urgency: 'critical', timeoutMs: 5000 },
  warning: { urgency: 'normal', timeoutMs: 3000 },
  info: { urgency: 'low', timeoutMs: 2000 },
};

export function notifySendArgs(level: NotificationLevel, title: string, message: string): string[] {
  const variant = DESKTOP_VARIANTS[level];
  return ['-u', variant.urgency, '-t', String(variant.timeoutMs), title, message];
}

export class DesktopSink implements NotificationSink {
  readonly name = 'desktop';

  deliver(alert: Alert): void {
    execFileSync('notify-send', notifySendArgs(alert.severity, alert.title, alert.message), {
      stdio: 'ignore',
      timeout: 5000,
    });
  }
}
