/**
 * Rollout Spec - Validation and normalization of submitted rollout specs
 *
 * Validates shape with Zod, then checks the rules that span fields
 * (monotonic canary weights, the blue/green switch step, metric names) and
 * returns a deep-frozen RolloutSpec.
 *
 * @module rollout/rollout-spec
 */

import { RolloutSpecInputSchema, type RolloutSpecInput } from '../types/schemas/rollout.js';
import type { RolloutSpec, RolloutStep } from '../types/rollout.js';
import { RolloutError, zodErrorToRolloutError } from './errors.js';

/** Built-in metric names queried for every analysis */
export const ERROR_RATE_METRIC = 'error_rate';
export const LATENCY_P99_METRIC = 'latency_p99';

const BUILT_IN_METRICS: readonly string[] = [ERROR_RATE_METRIC, LATENCY_P99_METRIC];

export interface RolloutSpecDefaults {
  /** Bake time used for blue/green specs that do not declare the switch step */
  defaultBakeDurationMs: number;
}

export const DEFAULT_SPEC_DEFAULTS: RolloutSpecDefaults = {
  defaultBakeDurationMs: 60_000,
};

function invalid(message: string, details?: Record<string, unknown>): RolloutError {
  return new RolloutError('InvalidSpec', message, details);
}

function validateCanarySteps(steps: RolloutStep[]): void {
  if (steps.length === 0) {
    throw invalid('Canary spec must declare at least one step');
  }

  for (let i = 1; i < steps.length; i++) {
    if (steps[i].weight < steps[i - 1].weight) {
      throw invalid(
        `Canary step weights must be non-decreasing: step ${i} (${steps[i].weight}) < step ${i - 1} (${steps[i - 1].weight})`,
        { stepIndex: i }
      );
    }
  }
}

function normalizeBlueGreenSteps(steps: RolloutStep[], defaults: RolloutSpecDefaults): RolloutStep[] {
  if (steps.length > 1) {
    throw invalid(
      `Blue/green spec may declare at most one step (the switch), got ${steps.length}`,
      { stepCount: steps.length }
    );
  }

  if (steps.length === 0) {
    return [{ weight: 100, pauseDurationMs: defaults.defaultBakeDurationMs, requiredAnalysis: true }];
  }

  if (steps[0].weight !== 100) {
    throw invalid(`Blue/green switch step must use weight 100, got ${steps[0].weight}`, {
      stepIndex: 0,
    });
  }

  return [{ ...steps[0] }];
}

function validateMetricNames(spec: RolloutSpec): void {
  const seen = new Set<string>(BUILT_IN_METRICS);
  for (const metric of spec.analysis.metrics) {
    if (seen.has(metric.name)) {
      throw invalid(`Duplicate analysis metric: ${metric.name}`, { metric: metric.name });
    }
    seen.add(metric.name);
  }
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object') {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Validate a submitted spec and produce an immutable RolloutSpec
 *
 * @throws {RolloutError} InvalidSpec when any rule is violated
 *
 * @example
 * ```typescript
 * const spec = createRolloutSpec({
 *   strategy: 'canary',
 *   steps: [{ weight: 20, pauseDurationMs: 30_000 }, { weight: 100 }],
 *   analysis: { maxErrorRate: 0.01, maxP99LatencyMs: 500, minSampleCount: 100 },
 * });
 * ```
 */
export function createRolloutSpec(
  input: RolloutSpecInput,
  defaults: RolloutSpecDefaults = DEFAULT_SPEC_DEFAULTS
): RolloutSpec {
  const parsed = RolloutSpecInputSchema.safeParse(input);
  if (!parsed.success) {
    throw zodErrorToRolloutError(parsed.error);
  }

  const { strategy, analysis, promotionMode, rollbackPolicy } = parsed.data;
  let steps: RolloutStep[] = parsed.data.steps.map((step) => ({ ...step }));

  if (strategy === 'canary') {
    validateCanarySteps(steps);
  } else {
    steps = normalizeBlueGreenSteps(steps, defaults);
  }

  const spec: RolloutSpec = {
    strategy,
    steps,
    analysis: {
      maxErrorRate: analysis.maxErrorRate,
      maxP99LatencyMs: analysis.maxP99LatencyMs,
      minSampleCount: analysis.minSampleCount,
      metrics: analysis.metrics.map((metric) => ({ ...metric })),
    },
    promotionMode,
    rollbackPolicy,
  };

  validateMetricNames(spec);

  return deepFreeze(spec);
}
