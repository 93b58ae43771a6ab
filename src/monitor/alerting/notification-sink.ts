import type { Alert } from '../types/index.js';

/**
 * A delivery channel for alerts. Each sink is independently optional and
 * independently failable; `deliver` may throw and the dispatcher absorbs it.
 */
export interface NotificationSink {
  readonly name: string;
  deliver(alert: Alert): void;
}
