/**
 * Rollout domain types
 *
 * Shared by the spec validator, the state machine, the analysis engine and
 * the controller loop. Everything here is plain data so records can be
 * persisted as JSON and restored after a restart.
 *
 * @module types/rollout
 */

/**
 * Release strategy
 */
export type RolloutStrategy = 'canary' | 'blue_green';

/**
 * How the controller moves past a healthy step
 */
export type PromotionMode = 'automatic' | 'manual_gate';

/**
 * What the controller does when analysis fails
 */
export type RollbackPolicy = 'auto_on_failure' | 'hold_for_operator';

/**
 * Rollout lifecycle phase
 */
export type RolloutPhase =
  | 'Initializing'
  | 'Progressing'
  | 'Analyzing'
  | 'Paused'
  | 'Promoting'
  | 'Succeeded'
  | 'Aborting'
  | 'RolledBack';

export const TERMINAL_PHASES: readonly RolloutPhase[] = ['Succeeded', 'RolledBack'];

export function isTerminalPhase(phase: RolloutPhase): boolean {
  return TERMINAL_PHASES.includes(phase);
}

/**
 * One element of a canary progression
 */
export interface RolloutStep {
  /** Candidate traffic weight (0-100) */
  weight: number;

  /** Minimum dwell time before analysis is trusted (ms) */
  pauseDurationMs: number;

  /** Whether a passing analysis is needed to advance */
  requiredAnalysis: boolean;
}

/**
 * Comparison direction for a metric threshold
 */
export type MetricComparison = 'lte' | 'lt' | 'gte' | 'gt';

/**
 * Threshold on a custom metric query
 */
export interface CustomMetricCheck {
  name: string;
  threshold: number;
  comparison: MetricComparison;
  /** Overrides the spec-wide minimum sample count */
  minSampleCount?: number;
}

export interface AnalysisThresholds {
  /** Error rate ceiling (0.0-1.0) */
  maxErrorRate: number;

  /** P99 latency ceiling (ms) */
  maxP99LatencyMs: number;

  /** Samples needed before a metric is trusted */
  minSampleCount: number;

  /** Additional custom checks */
  metrics: CustomMetricCheck[];
}

/**
 * Validated, immutable rollout specification
 */
export interface RolloutSpec {
  strategy: RolloutStrategy;
  steps: RolloutStep[];
  analysis: AnalysisThresholds;
  promotionMode: PromotionMode;
  rollbackPolicy: RollbackPolicy;
}

/**
 * Per-version view held by the rollout state
 */
export interface VersionState {
  id: string;
  desiredReplicas: number;
  readyReplicas: number;
  /** Traffic weight (0-100), always complementary to the other version */
  weight: number;
}

export type AnalysisVerdict = 'pass' | 'fail' | 'inconclusive';

export type MetricOutcome = 'satisfied' | 'violated' | 'insufficient';

/**
 * Result of a single metric check
 */
export interface MetricCheckResult {
  metric: string;
  comparison: MetricComparison;
  threshold: number;
  value: number | null;
  sampleCount: number;
  minSampleCount: number;
  outcome: MetricOutcome;
  /** Provider error message when the query failed */
  error?: string;
}

/**
 * Time window passed to the metrics provider
 */
export interface AnalysisWindow {
  startMs: number;
  endMs: number;
}

/**
 * Analysis Engine output
 */
export interface AnalysisResult {
  verdict: AnalysisVerdict;
  version: string;
  window: AnalysisWindow;
  checks: MetricCheckResult[];
  reason: string;
}

/**
 * Verdict recorded in the rollout's analysis history
 */
export interface AnalysisRecord {
  timestamp: number;
  stepIndex: number;
  verdict: AnalysisVerdict;
  reason: string;
  checks: MetricCheckResult[];
}

export type PauseReason = 'manual_gate' | 'analysis_failed';

/**
 * Phase change log entry
 */
export interface PhaseTransition {
  timestamp: number;
  from: RolloutPhase;
  to: RolloutPhase;
  reason: string;
}

/**
 * Recorded every time a step's weight becomes the target
 */
export interface StepRecord {
  timestamp: number;
  stepIndex: number;
  weight: number;
}

/**
 * Mutable rollout record
 */
export interface RolloutState {
  rolloutId: string;
  phase: RolloutPhase;
  currentStepIndex: number;
  stableVersion: VersionState;
  candidateVersion: VersionState;
  /** Version currently designated stable */
  activeVersion: string;
  analysisHistory: AnalysisRecord[];
  transitions: PhaseTransition[];
  stepHistory: StepRecord[];
  createdAt: number;
  lastTransitionTime: number;
  /** When the current step's weight was committed (dwell timer start) */
  stepStartedAt: number;
  inconclusiveCount: number;
  nextAnalysisAt?: number;
  pauseReason?: PauseReason;
  abortRequested: boolean;
  abortReason?: string;
  resumeRequested: boolean;
  consecutiveApplyFailures: number;
  nextApplyAttemptAt?: number;
  message?: string;
}

/**
 * Persisted unit: one per rollout
 */
export interface RolloutRecord {
  schemaVersion: 1;
  spec: RolloutSpec;
  state: RolloutState;
}

/**
 * Desired platform state computed by the state machine
 */
export interface PlatformTargets {
  weights: Record<string, number>;
  replicas: Record<string, number>;
}

/**
 * Derived traffic split keyed by version id
 */
export function currentWeights(state: RolloutState): Record<string, number> {
  return {
    [state.stableVersion.id]: state.stableVersion.weight,
    [state.candidateVersion.id]: state.candidateVersion.weight,
  };
}
