/**
 * Alert
 *
 * A discrete event produced when a metric crosses its threshold.
 */

export type AlertMetric = 'cpu' | 'ram' | 'disk' | 'swap';

export type AlertSeverity = 'warning' | 'critical';

/** Severity levels a sink can present; `info` is used for non-alert notices */
export type NotificationLevel = AlertSeverity | 'info';

export interface Alert {
  readonly metric: AlertMetric;
  readonly severity: AlertSeverity;
  readonly observedValue: number;
  readonly limit: number;
  readonly title: string;
  readonly message: string;
}
