/**
 * Builds human-readable insight items for one quota from its forecast
 * and billing-period rollups.
 */

import { BillingPeriodSummary } from '../analytics/billing-periods.js';
import { classifyTrend, classifyVariance, type SeverityLevel } from './classifier.js';
import { compactNumber, formatHours, signedPercent } from './format.js';
import type { InsightKey } from '../config/types.js';
import type { CounterKind, Severity } from '../shared/types.js';
import type { BillingReport, QuotaForecast } from '../tracking/types.js';

/** Variance needs more than one period, trend at least this many. */
export const MIN_PERIODS_FOR_TREND = 4;

export type InsightType = 'forecast' | 'trend' | 'factual' | 'info';

export interface Insight {
  key: InsightKey | 'getting_started';
  type: InsightType;
  severity: Severity;
  title: string;
  metric: string;
  sublabel: string;
  description: string;
}

export interface InsightInput {
  forecast: QuotaForecast;
  billing: BillingReport;
  hidden?: ReadonlySet<InsightKey>;
}

const FORECAST_TITLES: Record<SeverityLevel, string> = {
  healthy: 'On Track',
  warning: 'Moderate Pace',
  danger: 'Heavy Usage',
  critical: 'Near Limit',
};

function formatValue(value: number, kind: CounterKind): string {
  return kind === 'percent' ? `${value.toFixed(1)}%` : compactNumber(value);
}

function formatRate(rate: number, kind: CounterKind): string {
  return kind === 'percent' ? `${rate.toFixed(1)}%/hr` : `${compactNumber(rate)}/hr`;
}

function forecastInsight(forecast: QuotaForecast): Insight | null {
  const { rate, kind } = forecast;
  if (rate === null) {
    return null;
  }

  const resetLabel =
    forecast.hoursUntilReset === null
      ? 'no reset reported'
      : `resets in ${formatHours(forecast.hoursUntilReset)}`;

  if (forecast.exhaustsFirst && forecast.exhaustionHours !== null && forecast.hoursUntilReset !== null) {
    return {
      key: 'forecast',
      type: 'forecast',
      severity: 'negative',
      title: 'Exhausts Before Reset',
      metric: formatHours(forecast.exhaustionHours),
      sublabel: resetLabel,
      description:
        `At ${formatRate(rate, kind)} the limit is reached in ${formatHours(forecast.exhaustionHours)}, ` +
        `before the reset in ${formatHours(forecast.hoursUntilReset)}.`,
    };
  }

  if (rate === 0) {
    return {
      key: 'forecast',
      type: 'forecast',
      severity: forecast.severity?.severity ?? 'positive',
      title: 'Idle',
      metric: formatRate(0, kind),
      sublabel: resetLabel,
      description: 'No consumption in the recent window.',
    };
  }

  const projection =
    forecast.projected === null ? '' : ` Projected ~${formatValue(forecast.projected, kind)} at reset.`;

  return {
    key: 'forecast',
    type: 'forecast',
    severity: forecast.severity?.severity ?? 'info',
    title: forecast.severity === null ? 'Consumption Rate' : FORECAST_TITLES[forecast.severity.level],
    metric: formatRate(rate, kind),
    sublabel: resetLabel,
    description: `Consuming at ${formatRate(rate, kind)}.${projection}`,
  };
}

function weeklyPaceInsight(billing: BillingReport, kind: CounterKind): Insight | null {
  if (billing.count === 0 || billing.sum <= 0) {
    return null;
  }
  const share = (billing.last7Days / billing.sum) * 100;
  return {
    key: 'weekly_pace',
    type: 'trend',
    severity: 'info',
    title: 'Weekly Pace',
    metric: formatValue(billing.last7Days, kind),
    sublabel: 'last 7 days',
    description:
      `${formatValue(billing.last7Days, kind)} consumed in the last 7 days ` +
      `(${share.toFixed(0)}% of the ${billing.lookbackDays}-day total).`,
  };
}

function varianceInsight(billing: BillingReport, kind: CounterKind): Insight | null {
  if (billing.count < 2) {
    return null;
  }
  const variance = classifyVariance(billing.max, billing.average);
  if (variance === null) {
    return null;
  }

  const peak = formatValue(billing.max, kind);
  const average = formatValue(billing.average, kind);
  const base = { key: 'variance' as const, type: 'factual' as const, severity: variance.severity };

  switch (variance.level) {
    case 'high':
      return {
        ...base,
        title: 'High Variance',
        metric: signedPercent(variance.spreadPercent),
        sublabel: 'peak above avg',
        description: `Peak period hit ${peak} against an average of ${average}. Usage varies significantly.`,
      };
    case 'moderate':
      return {
        ...base,
        title: 'Usage Spread',
        metric: signedPercent(variance.spreadPercent),
        sublabel: 'peak above avg',
        description: `Peak: ${peak}, average: ${average}. Moderately consistent.`,
      };
    case 'consistent':
      return {
        ...base,
        title: 'Consistent',
        metric: `~${average}`,
        sublabel: 'steady usage',
        description: `Peak (${peak}) is close to average (${average}). Predictable consumption.`,
      };
  }
}

function trendInsight(billing: BillingReport, kind: CounterKind): Insight | null {
  if (billing.count < MIN_PERIODS_FOR_TREND) {
    return null;
  }
  const halves = new BillingPeriodSummary(billing.periods).trendHalves();
  if (halves === null) {
    return null;
  }
  const trend = classifyTrend(halves.recentAverage, halves.olderAverage);
  if (trend === null) {
    return null;
  }

  const recent = formatValue(halves.recentAverage, kind);
  const older = formatValue(halves.olderAverage, kind);
  const base = {
    key: 'trend' as const,
    type: 'trend' as const,
    severity: trend.severity,
    title: 'Trend',
    sublabel: 'recent vs earlier',
  };

  switch (trend.direction) {
    case 'rising':
      return {
        ...base,
        metric: signedPercent(trend.changePercent),
        description: `Recent periods avg ${recent} vs earlier ${older}. Usage is increasing.`,
      };
    case 'falling':
      return {
        ...base,
        metric: signedPercent(trend.changePercent),
        description: `Recent periods avg ${recent} vs earlier ${older}. Usage is decreasing.`,
      };
    case 'stable':
      return {
        ...base,
        metric: 'Stable',
        description: `Recent periods avg ${recent} vs earlier ${older}. Steady usage pattern.`,
      };
  }
}

/**
 * Assemble the insight list for one quota.
 * Falls back to a single "getting started" item when there is not enough data.
 */
export function buildInsights(input: InsightInput): Insight[] {
  const { forecast, billing } = input;
  const hidden = input.hidden ?? new Set<InsightKey>();

  const candidates: Array<[InsightKey, Insight | null]> = [
    ['forecast', forecastInsight(forecast)],
    ['weekly_pace', weeklyPaceInsight(billing, forecast.kind)],
    ['variance', varianceInsight(billing, forecast.kind)],
    ['trend', trendInsight(billing, forecast.kind)],
  ];

  const insights: Insight[] = [];
  for (const [key, insight] of candidates) {
    if (insight !== null && !hidden.has(key)) {
      insights.push(insight);
    }
  }

  if (insights.length === 0) {
    insights.push({
      key: 'getting_started',
      type: 'info',
      severity: 'info',
      title: 'Getting Started',
      metric: '',
      sublabel: forecast.displayName,
      description: 'Keep samples flowing to build up usage data. Deeper insights appear after a few cycles.',
    });
  }

  return insights;
}
