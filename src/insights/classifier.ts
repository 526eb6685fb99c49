/**
 * Fixed classification thresholds for usage severity, trend and variance.
 * Pure functions; the thresholds are constants, not configuration.
 */

import type { Severity } from '../shared/types.js';

/** How close a quota is to its limit. */
export type SeverityLevel = 'healthy' | 'warning' | 'danger' | 'critical';

export interface SeverityClassification {
  level: SeverityLevel;
  severity: Severity;
}

export type TrendDirection = 'rising' | 'falling' | 'stable';

export interface TrendClassification {
  direction: TrendDirection;
  severity: Severity;
  /** (recent - older) / older * 100 */
  changePercent: number;
}

export type VarianceLevel = 'high' | 'moderate' | 'consistent';

export interface VarianceClassification {
  level: VarianceLevel;
  severity: Severity;
  /** (peak - average) / average * 100 */
  spreadPercent: number;
}

const SEVERITY_LADDER: readonly SeverityClassification[] = [
  { level: 'healthy', severity: 'positive' },
  { level: 'warning', severity: 'info' },
  { level: 'danger', severity: 'warning' },
  { level: 'critical', severity: 'negative' },
];

const TREND_THRESHOLD_PERCENT = 15;
const HIGH_VARIANCE_PERCENT = 50;
const MODERATE_VARIANCE_PERCENT = 10;

function ladderStep(index: number): SeverityClassification {
  const step = SEVERITY_LADDER[Math.min(Math.max(index, 0), SEVERITY_LADDER.length - 1)];
  return step ?? { level: 'critical', severity: 'negative' };
}

/** Map a usage percentage to a severity: <50 healthy, <80 warning, <95 danger, else critical. */
export function classifySeverity(percent: number): SeverityClassification {
  if (percent >= 95) return ladderStep(3);
  if (percent >= 80) return ladderStep(2);
  if (percent >= 50) return ladderStep(1);
  return ladderStep(0);
}

/** One step up the ladder; used when a quota will run out before it resets. */
export function escalateSeverity(current: SeverityClassification): SeverityClassification {
  const index = SEVERITY_LADDER.findIndex((s) => s.level === current.level);
  return ladderStep(index + 1);
}

/** Compare recent and older averages. Null when the older average is not positive. */
export function classifyTrend(recentAverage: number, olderAverage: number): TrendClassification | null {
  if (!(olderAverage > 0) || !Number.isFinite(recentAverage)) {
    return null;
  }
  const changePercent = ((recentAverage - olderAverage) / olderAverage) * 100;

  if (changePercent > TREND_THRESHOLD_PERCENT) {
    return { direction: 'rising', severity: 'warning', changePercent };
  }
  if (changePercent < -TREND_THRESHOLD_PERCENT) {
    return { direction: 'falling', severity: 'positive', changePercent };
  }
  return { direction: 'stable', severity: 'positive', changePercent };
}

/** Compare the peak period with the average. Null when the average is not positive. */
export function classifyVariance(peak: number, average: number): VarianceClassification | null {
  if (!(average > 0) || !Number.isFinite(peak)) {
    return null;
  }
  const spreadPercent = ((peak - average) / average) * 100;

  if (spreadPercent > HIGH_VARIANCE_PERCENT) {
    return { level: 'high', severity: 'warning', spreadPercent };
  }
  if (spreadPercent > MODERATE_VARIANCE_PERCENT) {
    return { level: 'moderate', severity: 'info', spreadPercent };
  }
  return { level: 'consistent', severity: 'positive', spreadPercent };
}
