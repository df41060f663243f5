/**
 * Analysis Engine - Health verdicts for a version over a time window
 *
 * Features:
 * - Built-in error rate and P99 latency checks
 * - Custom metric checks with explicit comparison direction
 * - Minimum sample count gating (never passes on thin data)
 * - Provider failures downgrade to inconclusive, never to pass
 *
 * evaluateMeasurements() is pure; AnalysisEngine.analyze() only adds the
 * provider queries in front of it. Neither touches rollout state.
 *
 * @module rollout/analysis-engine
 */

import type { Logger } from 'pino';
import type { MetricsProvider } from '../platform/types.js';
import type {
  AnalysisResult,
  AnalysisThresholds,
  AnalysisWindow,
  MetricCheckResult,
  MetricComparison,
} from '../types/rollout.js';
import { toRolloutError } from './errors.js';
import { ERROR_RATE_METRIC, LATENCY_P99_METRIC } from './rollout-spec.js';

/**
 * A single threshold to evaluate
 */
export interface MetricCheck {
  metric: string;
  comparison: MetricComparison;
  threshold: number;
  minSampleCount: number;
}

/**
 * Observed value for a check, or the provider error that prevented it
 */
export type Measurement =
  | { metric: string; value: number; sampleCount: number }
  | { metric: string; error: string };

const COMPARATORS: Record<MetricComparison, (value: number, threshold: number) => boolean> = {
  lte: (value, threshold) => value <= threshold,
  lt: (value, threshold) => value < threshold,
  gte: (value, threshold) => value >= threshold,
  gt: (value, threshold) => value > threshold,
};

const COMPARISON_SYMBOLS: Record<MetricComparison, string> = {
  lte: '<=',
  lt: '<',
  gte: '>=',
  gt: '>',
};

/**
 * Expand spec thresholds into the list of checks to run
 */
export function buildMetricChecks(thresholds: AnalysisThresholds): MetricCheck[] {
  return [
    {
      metric: ERROR_RATE_METRIC,
      comparison: 'lte',
      threshold: thresholds.maxErrorRate,
      minSampleCount: thresholds.minSampleCount,
    },
    {
      metric: LATENCY_P99_METRIC,
      comparison: 'lte',
      threshold: thresholds.maxP99LatencyMs,
      minSampleCount: thresholds.minSampleCount,
    },
    ...thresholds.metrics.map((custom) => ({
      metric: custom.name,
      comparison: custom.comparison,
      threshold: custom.threshold,
      minSampleCount: custom.minSampleCount ?? thresholds.minSampleCount,
    })),
  ];
}

function evaluateCheck(check: MetricCheck, measurement: Measurement | undefined): MetricCheckResult {
  const base = {
    metric: check.metric,
    comparison: check.comparison,
    threshold: check.threshold,
    minSampleCount: check.minSampleCount,
  };

  if (!measurement) {
    return { ...base, value: null, sampleCount: 0, outcome: 'insufficient', error: 'No measurement' };
  }

  if ('error' in measurement) {
    return { ...base, value: null, sampleCount: 0, outcome: 'insufficient', error: measurement.error };
  }

  const { value, sampleCount } = measurement;

  if (!Number.isFinite(value) || !Number.isFinite(sampleCount) || sampleCount < check.minSampleCount) {
    return {
      ...base,
      value: Number.isFinite(value) ? value : null,
      sampleCount: Number.isFinite(sampleCount) ? sampleCount : 0,
      outcome: 'insufficient',
    };
  }

  return {
    ...base,
    value,
    sampleCount,
    outcome: COMPARATORS[check.comparison](value, check.threshold) ? 'satisfied' : 'violated',
  };
}

function describeCheck(result: MetricCheckResult): string {
  const symbol = COMPARISON_SYMBOLS[result.comparison];
  if (result.outcome === 'insufficient') {
    return result.error
      ? `${result.metric} unavailable (${result.error})`
      : `${result.metric} has ${result.sampleCount}/${result.minSampleCount} samples`;
  }
  return `${result.metric}=${result.value} (want ${symbol} ${result.threshold})`;
}

/**
 * Turn measurements into a verdict
 *
 * `fail` if any check is violated with enough samples, otherwise
 * `inconclusive` if any check lacks samples, otherwise `pass`.
 */
export function evaluateMeasurements(
  version: string,
  window: AnalysisWindow,
  checks: MetricCheck[],
  measurements: Measurement[]
): AnalysisResult {
  const byMetric = new Map(measurements.map((m) => [m.metric, m]));
  const results = checks.map((check) => evaluateCheck(check, byMetric.get(check.metric)));

  const violated = results.filter((r) => r.outcome === 'violated');
  const insufficient = results.filter((r) => r.outcome === 'insufficient');

  if (results.length === 0) {
    return { verdict: 'inconclusive', version, window, checks: results, reason: 'No metrics configured' };
  }

  if (violated.length > 0) {
    return {
      verdict: 'fail',
      version,
      window,
      checks: results,
      reason: `Threshold violated: ${violated.map(describeCheck).join('; ')}`,
    };
  }

  if (insufficient.length > 0) {
    return {
      verdict: 'inconclusive',
      version,
      window,
      checks: results,
      reason: `Insufficient data: ${insufficient.map(describeCheck).join('; ')}`,
    };
  }

  return {
    verdict: 'pass',
    version,
    window,
    checks: results,
    reason: 'All thresholds satisfied',
  };
}

/**
 * Analysis Engine - Queries the metrics provider and evaluates thresholds
 */
export class AnalysisEngine {
  private readonly provider: MetricsProvider;
  private readonly logger?: Logger;

  constructor(provider: MetricsProvider, logger?: Logger) {
    this.provider = provider;
    this.logger = logger;
  }

  /**
   * Evaluate a version's health over a window
   *
   * @param version - Version identifier to query
   * @param window - Time window to query
   * @param thresholds - Spec thresholds
   */
  async analyze(
    version: string,
    window: AnalysisWindow,
    thresholds: AnalysisThresholds
  ): Promise<AnalysisResult> {
    const checks = buildMetricChecks(thresholds);

    const measurements = await Promise.all(
      checks.map(async (check): Promise<Measurement> => {
        try {
          const { value, sampleCount } = await this.provider.query(version, check.metric, window);
          return { metric: check.metric, value, sampleCount };
        } catch (error) {
          const wrapped = toRolloutError(error, 'ProviderUnavailable', {
            version,
            metric: check.metric,
          });
          this.logger?.warn(
            { version, metric: check.metric, error: wrapped.message },
            'Metrics provider query failed'
          );
          return { metric: check.metric, error: wrapped.message };
        }
      })
    );

    const result = evaluateMeasurements(version, window, checks, measurements);

    this.logger?.debug(
      { version, verdict: result.verdict, reason: result.reason },
      'Analysis completed'
    );

    return result;
  }
}
