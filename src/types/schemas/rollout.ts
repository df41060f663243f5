/**
 * Rollout Schemas
 *
 * Zod schemas for rollout spec submissions and for persisted rollout
 * records read back from the store.
 *
 * @module schemas/rollout
 */

import { z } from 'zod';
import { NonEmptyString, NonNegativeInteger, NonNegativeNumber } from './common.js';

export const RolloutStrategySchema = z.enum(['canary', 'blue_green']);
export const PromotionModeSchema = z.enum(['automatic', 'manual_gate']);
export const RollbackPolicySchema = z.enum(['auto_on_failure', 'hold_for_operator']);
export const MetricComparisonSchema = z.enum(['lte', 'lt', 'gte', 'gt']);

export const RolloutPhaseSchema = z.enum([
  'Initializing',
  'Progressing',
  'Analyzing',
  'Paused',
  'Promoting',
  'Succeeded',
  'Aborting',
  'RolledBack',
]);

/**
 * Traffic weight (integer percentage)
 */
export const WeightSchema = z
  .number()
  .int('Weight must be an integer')
  .min(0, 'Weight must be within [0, 100]')
  .max(100, 'Weight must be within [0, 100]');

export const RolloutStepSchema = z.object({
  weight: WeightSchema,
  pauseDurationMs: z
    .number()
    .finite('pauseDurationMs must be finite')
    .min(0, 'pauseDurationMs cannot be negative'),
  requiredAnalysis: z.boolean(),
});

export const RolloutStepInputSchema = RolloutStepSchema.extend({
  pauseDurationMs: RolloutStepSchema.shape.pauseDurationMs.default(0),
  requiredAnalysis: z.boolean().default(true),
});

export const CustomMetricCheckSchema = z.object({
  name: NonEmptyString,
  threshold: z.number().finite('Threshold must be finite'),
  comparison: MetricComparisonSchema,
  minSampleCount: z.number().int().min(1, 'minSampleCount must be >= 1').optional(),
});

export const AnalysisThresholdsSchema = z.object({
  maxErrorRate: z
    .number()
    .min(0, 'maxErrorRate must be within [0, 1]')
    .max(1, 'maxErrorRate must be within [0, 1]'),
  maxP99LatencyMs: NonNegativeNumber,
  minSampleCount: z.number().int().min(1, 'minSampleCount must be >= 1'),
  metrics: z.array(CustomMetricCheckSchema),
});

/**
 * Spec as submitted by a caller (defaults applied during parsing)
 */
export const RolloutSpecInputSchema = z.object({
  strategy: RolloutStrategySchema,
  steps: z.array(RolloutStepInputSchema).default([]),
  analysis: AnalysisThresholdsSchema.extend({
    metrics: z.array(CustomMetricCheckSchema).default([]),
  }),
  promotionMode: PromotionModeSchema.default('automatic'),
  rollbackPolicy: RollbackPolicySchema.default('auto_on_failure'),
});

export type RolloutSpecInput = z.input<typeof RolloutSpecInputSchema>;

/**
 * Normalized spec as stored alongside the rollout state
 */
export const RolloutSpecSchema = z.object({
  strategy: RolloutStrategySchema,
  steps: z.array(RolloutStepSchema).min(1),
  analysis: AnalysisThresholdsSchema,
  promotionMode: PromotionModeSchema,
  rollbackPolicy: RollbackPolicySchema,
});

const VersionStateSchema = z.object({
  id: NonEmptyString,
  desiredReplicas: NonNegativeInteger,
  readyReplicas: NonNegativeInteger,
  weight: WeightSchema,
});

const MetricCheckResultSchema = z.object({
  metric: z.string(),
  comparison: MetricComparisonSchema,
  threshold: z.number(),
  value: z.number().nullable(),
  sampleCount: z.number(),
  minSampleCount: z.number(),
  outcome: z.enum(['satisfied', 'violated', 'insufficient']),
  error: z.string().optional(),
});

const AnalysisRecordSchema = z.object({
  timestamp: z.number(),
  stepIndex: NonNegativeInteger,
  verdict: z.enum(['pass', 'fail', 'inconclusive']),
  reason: z.string(),
  checks: z.array(MetricCheckResultSchema),
});

export const RolloutStateSchema = z
  .object({
    rolloutId: NonEmptyString,
    phase: RolloutPhaseSchema,
    currentStepIndex: NonNegativeInteger,
    stableVersion: VersionStateSchema,
    candidateVersion: VersionStateSchema,
    activeVersion: NonEmptyString,
    analysisHistory: z.array(AnalysisRecordSchema),
    transitions: z.array(
      z.object({
        timestamp: z.number(),
        from: RolloutPhaseSchema,
        to: RolloutPhaseSchema,
        reason: z.string(),
      })
    ),
    stepHistory: z.array(
      z.object({
        timestamp: z.number(),
        stepIndex: NonNegativeInteger,
        weight: WeightSchema,
      })
    ),
    createdAt: z.number(),
    lastTransitionTime: z.number(),
    stepStartedAt: z.number(),
    inconclusiveCount: NonNegativeInteger,
    nextAnalysisAt: z.number().optional(),
    pauseReason: z.enum(['manual_gate', 'analysis_failed']).optional(),
    abortRequested: z.boolean(),
    abortReason: z.string().optional(),
    resumeRequested: z.boolean(),
    consecutiveApplyFailures: NonNegativeInteger,
    nextApplyAttemptAt: z.number().optional(),
    message: z.string().optional(),
  })
  .refine(
    (state) => state.stableVersion.weight + state.candidateVersion.weight === 100,
    { message: 'Version weights must sum to 100', path: ['candidateVersion', 'weight'] }
  );

export const RolloutRecordSchema = z
  .object({
    schemaVersion: z.literal(1),
    spec: RolloutSpecSchema,
    state: RolloutStateSchema,
  })
  .refine((record) => record.state.currentStepIndex < record.spec.steps.length, {
    message: 'currentStepIndex is out of range for the spec steps',
    path: ['state', 'currentStepIndex'],
  });
