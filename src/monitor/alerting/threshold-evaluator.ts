/**
 * Threshold Evaluator
 *
 * Compares a Snapshot against the configured limits. Every rule is evaluated
 * independently with a strict greater-than; a breach of each produces its own
 * Alert, in rule order (CPU, RAM, disk, swap).
 */

import type { Alert, AlertMetric, AlertSeverity, Snapshot, ThresholdConfig } from '../types/index.js';

export interface AlertRule {
  metric: AlertMetric;
  severity: AlertSeverity;
  title: string;
  label: string;
  value: (snapshot: Snapshot) => number;
  limit: (thresholds: ThresholdConfig) => number;
}

export const ALERT_RULES: readonly AlertRule[] = [
  {
    metric: 'cpu',
    severity: 'critical',
    title: 'High CPU load',
    label: 'CPU usage',
    value: snapshot => snapshot.cpuPct,
    limit: thresholds => thresholds.cpuLimit,
  },
  {
    metric: 'ram',
    severity: 'warning',
    title: 'High RAM usage',
    label: 'RAM usage',
    value: snapshot => snapshot.ramPct,
    limit: thresholds => thresholds.ramLimit,
  },
  {
    metric: 'disk',
    severity: 'critical',
    title: 'Low disk space',
    label: 'Disk usage',
    value: snapshot => snapshot.diskPct,
    limit: thresholds => thresholds.diskLimit,
  },
  {
    // Swap is informational and never escalates past a warning
    metric: 'swap',
    severity: 'warning',
    title: 'Swap in use',
    label: 'Swap usage',
    value: snapshot => snapshot.swapPct,
    limit: thresholds => thresholds.swapWarnLimit,
  },
];

export function isBreach(value: number, limit: number): boolean {
  return value > limit;
}

export class ThresholdEvaluator {
  private readonly thresholds: ThresholdConfig;
  private readonly rules: readonly AlertRule[];

  constructor(thresholds: ThresholdConfig, rules: readonly AlertRule[] = ALERT_RULES) {
    this.thresholds = thresholds;
    this.rules = rules;
  }

  evaluate(snapshot: Snapshot): Alert[] {
    const alerts: Alert[] = [];

    for (const rule of this.rules) {
      const observedValue = rule.value(snapshot);
      const limit = rule.limit(this.thresholds);
      if (!isBreach(observedValue, limit)) continue;

      alerts.push(Object.freeze({
        metric: rule.metric,
        severity: rule.severity,
        observedValue,
        limit,
        title: rule.title,
        message: `${rule.label}: ${observedValue}%`,
      }));
    }

    return alerts;
  }
}
