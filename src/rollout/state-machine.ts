/**
 * Rollout State Machine - Phase transitions for a single rollout
 *
 * Initializing → Progressing ⇄ Analyzing → (Paused) → Promoting → Succeeded
 * Any non-terminal phase → Aborting → RolledBack
 *
 * reconcileRollout() is synchronous and pure: it takes the committed record
 * plus what the controller observed this tick and returns the next state,
 * the platform targets that state implies, and the events it produced.
 * The controller applies the targets and only then commits the state.
 *
 * @module rollout/state-machine
 */

import {
  currentWeights,
  isTerminalPhase,
  type AnalysisRecord,
  type AnalysisResult,
  type AnalysisWindow,
  type PlatformTargets,
  type RolloutPhase,
  type RolloutRecord,
  type RolloutSpec,
  type RolloutState,
} from '../types/rollout.js';

export interface StateMachineOptions {
  /** Platform minimum of ready replicas for a freshly registered candidate */
  minReadyReplicas: number;

  /** How long the candidate may take to become ready (ms) */
  readinessTimeoutMs: number;

  /** Delay before re-polling after an inconclusive verdict (ms) */
  analysisRetryIntervalMs: number;

  /** Inconclusive re-polls allowed before the verdict counts as fail */
  maxInconclusiveRetries: number;
}

export const DEFAULT_STATE_MACHINE_OPTIONS: StateMachineOptions = {
  minReadyReplicas: 1,
  readinessTimeoutMs: 300_000, // 5 minutes
  analysisRetryIntervalMs: 30_000,
  maxInconclusiveRetries: 5,
};

/**
 * What the controller saw this tick
 */
export interface RolloutObservation {
  now: number;
  stableReadyReplicas: number;
  candidateReadyReplicas: number;
  /** Present only when analysis was due and has been run */
  analysis?: AnalysisResult;
}

export type RolloutEvent =
  | { type: 'phaseChanged'; from: RolloutPhase; to: RolloutPhase; reason: string }
  | { type: 'stepStarted'; stepIndex: number; weight: number }
  | { type: 'analysisRecorded'; record: AnalysisRecord };

export interface ReconcileDecision {
  state: RolloutState;
  targets: PlatformTargets;
  events: RolloutEvent[];
}

/**
 * Fresh state for a newly submitted rollout
 */
export function createInitialState(params: {
  rolloutId: string;
  stableVersion: string;
  candidateVersion: string;
  now: number;
}): RolloutState {
  return {
    rolloutId: params.rolloutId,
    phase: 'Initializing',
    currentStepIndex: 0,
    stableVersion: { id: params.stableVersion, desiredReplicas: 0, readyReplicas: 0, weight: 100 },
    candidateVersion: { id: params.candidateVersion, desiredReplicas: 0, readyReplicas: 0, weight: 0 },
    activeVersion: params.stableVersion,
    analysisHistory: [],
    transitions: [],
    stepHistory: [],
    createdAt: params.now,
    lastTransitionTime: params.now,
    stepStartedAt: params.now,
    inconclusiveCount: 0,
    abortRequested: false,
    resumeRequested: false,
    consecutiveApplyFailures: 0,
  };
}

const PROMOTION_PHASES: readonly RolloutPhase[] = ['Promoting', 'Succeeded'];
const ROLLBACK_PHASES: readonly RolloutPhase[] = ['Aborting', 'RolledBack'];

/**
 * Platform targets implied by a state
 *
 * The stable version's replicas are only touched once promotion scales it
 * down, or when an abort restores them.
 */
export function computeTargets(state: RolloutState): PlatformTargets {
  const replicas: Record<string, number> = {
    [state.candidateVersion.id]: state.candidateVersion.desiredReplicas,
  };

  // A baseline of 0 means it was never captured; nothing to restore then
  if (
    PROMOTION_PHASES.includes(state.phase) ||
    (ROLLBACK_PHASES.includes(state.phase) && state.stableVersion.desiredReplicas > 0)
  ) {
    replicas[state.stableVersion.id] = state.stableVersion.desiredReplicas;
  }

  return { weights: currentWeights(state), replicas };
}

export function isAnalysisDue(state: RolloutState, now: number): boolean {
  return state.phase === 'Analyzing' && (state.nextAnalysisAt ?? 0) <= now;
}

/**
 * Window analysed for the current step: from when its weight took effect until now
 */
export function analysisWindow(state: RolloutState, now: number): AnalysisWindow {
  return { startMs: state.stepStartedAt, endMs: now };
}

/**
 * Observation built from the last values recorded on the state
 */
export function lastKnownObservation(state: RolloutState, now: number): RolloutObservation {
  return {
    now,
    stableReadyReplicas: state.stableVersion.readyReplicas,
    candidateReadyReplicas: state.candidateVersion.readyReplicas,
  };
}

/**
 * Candidate replicas for a canary weight, proportional to the stable baseline
 */
export function canaryReplicas(stableReplicas: number, weight: number, minReplicas: number): number {
  return Math.max(minReplicas, Math.ceil((stableReplicas * weight) / 100));
}

class Transitioner {
  readonly events: RolloutEvent[] = [];

  constructor(
    readonly spec: RolloutSpec,
    readonly state: RolloutState,
    readonly options: StateMachineOptions,
    readonly now: number
  ) {}

  moveTo(to: RolloutPhase, reason: string): void {
    const from = this.state.phase;
    if (from === to) {
      return;
    }
    this.state.phase = to;
    this.state.lastTransitionTime = this.now;
    this.state.transitions.push({ timestamp: this.now, from, to, reason });
    this.events.push({ type: 'phaseChanged', from, to, reason });
  }

  /** Only writer of version weights; keeps the pair summing to 100 */
  setCandidateWeight(weight: number): void {
    this.state.candidateVersion.weight = weight;
    this.state.stableVersion.weight = 100 - weight;
  }

  enterStep(index: number): void {
    const step = this.spec.steps[index];
    const baseline = this.state.stableVersion.desiredReplicas;

    this.state.currentStepIndex = index;
    this.setCandidateWeight(step.weight);
    this.state.candidateVersion.desiredReplicas =
      this.spec.strategy === 'canary'
        ? canaryReplicas(baseline, step.weight, this.options.minReadyReplicas)
        : Math.max(baseline, this.options.minReadyReplicas);
    this.state.stepStartedAt = this.now;
    this.state.inconclusiveCount = 0;
    this.state.nextAnalysisAt = undefined;
    this.state.stepHistory.push({ timestamp: this.now, stepIndex: index, weight: step.weight });
    this.events.push({ type: 'stepStarted', stepIndex: index, weight: step.weight });
  }

  enterAnalyzing(reason: string): void {
    this.state.inconclusiveCount = 0;
    this.state.nextAnalysisAt = this.now;
    this.moveTo('Analyzing', reason);
  }

  enterPaused(reason: string, pauseReason: RolloutState['pauseReason']): void {
    this.state.pauseReason = pauseReason;
    this.state.message = reason;
    this.moveTo('Paused', reason);
  }

  enterPromoting(): void {
    this.setCandidateWeight(100);
    this.state.candidateVersion.desiredReplicas = Math.max(
      this.state.stableVersion.desiredReplicas,
      this.options.minReadyReplicas
    );
    this.state.stableVersion.desiredReplicas = 0;
    this.state.nextAnalysisAt = undefined;
    this.moveTo('Promoting', 'All steps completed');
  }

  enterAborting(reason: string): void {
    if (this.state.phase === 'Promoting') {
      // Promotion sized the candidate to the stable baseline and released the stable replicas
      this.state.stableVersion.desiredReplicas = this.state.candidateVersion.desiredReplicas;
    }
    this.setCandidateWeight(0);
    this.state.candidateVersion.desiredReplicas = 0;
    this.state.pauseReason = undefined;
    this.state.resumeRequested = false;
    this.state.nextAnalysisAt = undefined;
    this.state.message = reason;
    this.moveTo('Aborting', reason);
  }

  /**
   * Advance rule: gate, promote after the last step, or move to the next step
   */
  advance(bypassGate: boolean): void {
    if (this.spec.promotionMode === 'manual_gate' && !bypassGate) {
      this.enterPaused(
        `Step ${this.state.currentStepIndex} healthy, waiting for operator`,
        'manual_gate'
      );
      return;
    }

    this.state.pauseReason = undefined;

    const nextIndex = this.state.currentStepIndex + 1;
    if (nextIndex >= this.spec.steps.length) {
      this.enterPromoting();
      return;
    }

    this.enterStep(nextIndex);
    this.moveTo('Progressing', `Advanced to step ${nextIndex}`);
  }

  fail(reason: string): void {
    if (this.spec.rollbackPolicy === 'hold_for_operator') {
      this.enterPaused(reason, 'analysis_failed');
      return;
    }
    this.enterAborting(reason);
  }

  record(record: AnalysisRecord): void {
    this.state.analysisHistory.push(record);
    this.events.push({ type: 'analysisRecorded', record });
  }
}

function onInitializing(t: Transitioner, obs: RolloutObservation): void {
  const { state, spec, options } = t;

  if (state.stableVersion.desiredReplicas === 0) {
    state.stableVersion.desiredReplicas = Math.max(obs.stableReadyReplicas, options.minReadyReplicas);
  }

  const required =
    spec.strategy === 'blue_green'
      ? Math.max(state.stableVersion.desiredReplicas, options.minReadyReplicas)
      : options.minReadyReplicas;
  state.candidateVersion.desiredReplicas = Math.max(state.candidateVersion.desiredReplicas, required);

  if (obs.candidateReadyReplicas >= required) {
    t.enterStep(0);
    t.moveTo(
      'Progressing',
      spec.strategy === 'blue_green' ? 'Candidate ready, traffic switched' : 'Candidate ready'
    );
    return;
  }

  if (obs.now - state.lastTransitionTime >= options.readinessTimeoutMs) {
    t.enterAborting(
      `Candidate not ready within ${options.readinessTimeoutMs}ms (${obs.candidateReadyReplicas}/${required} ready replicas)`
    );
  }
}

function onProgressing(t: Transitioner, obs: RolloutObservation): void {
  const step = t.spec.steps[t.state.currentStepIndex];
  if (obs.now - t.state.stepStartedAt < step.pauseDurationMs) {
    return;
  }

  if (step.requiredAnalysis) {
    t.enterAnalyzing(`Step ${t.state.currentStepIndex} dwell elapsed`);
    return;
  }

  t.advance(false);
}

function onAnalyzing(t: Transitioner, obs: RolloutObservation): void {
  const { state, options } = t;
  const analysis = obs.analysis;
  if (!analysis) {
    return;
  }

  t.record({
    timestamp: obs.now,
    stepIndex: state.currentStepIndex,
    verdict: analysis.verdict,
    reason: analysis.reason,
    checks: analysis.checks,
  });

  switch (analysis.verdict) {
    case 'pass':
      t.advance(false);
      return;
    case 'fail':
      t.fail(`Analysis failed: ${analysis.reason}`);
      return;
    case 'inconclusive': {
      state.inconclusiveCount++;
      if (state.inconclusiveCount <= options.maxInconclusiveRetries) {
        state.nextAnalysisAt = obs.now + options.analysisRetryIntervalMs;
        return;
      }

      const reason = `Analysis inconclusive after ${state.inconclusiveCount} attempts: ${analysis.reason}`;
      t.record({
        timestamp: obs.now,
        stepIndex: state.currentStepIndex,
        verdict: 'fail',
        reason,
        checks: [],
      });
      t.fail(reason);
      return;
    }
  }
}

function onPaused(t: Transitioner): void {
  const { state } = t;
  if (!state.resumeRequested) {
    return;
  }

  state.resumeRequested = false;

  if (state.pauseReason === 'analysis_failed') {
    // Fresh budget and a fresh window that opens at resume time
    const step = t.spec.steps[state.currentStepIndex];
    state.pauseReason = undefined;
    state.stepStartedAt = t.now;
    state.inconclusiveCount = 0;
    state.nextAnalysisAt = t.now + step.pauseDurationMs;
    t.moveTo('Analyzing', `Re-analyzing step ${state.currentStepIndex} after operator resume`);
    return;
  }

  t.advance(true);
}

function onPromoting(t: Transitioner, obs: RolloutObservation): void {
  const { state } = t;
  if (
    obs.stableReadyReplicas === 0 &&
    obs.candidateReadyReplicas >= state.candidateVersion.desiredReplicas
  ) {
    state.activeVersion = state.candidateVersion.id;
    state.message = `${state.candidateVersion.id} promoted to stable`;
    t.moveTo('Succeeded', 'Promotion completed');
  }
}

function onAborting(t: Transitioner, obs: RolloutObservation): void {
  if (obs.candidateReadyReplicas === 0) {
    t.moveTo('RolledBack', t.state.message ?? 'Rollback completed');
  }
}

/**
 * Compute the next state for a rollout
 *
 * @param record - Committed rollout record (not mutated)
 * @param obs - Observation for this tick
 * @param options - Timing and readiness options
 */
export function reconcileRollout(
  record: RolloutRecord,
  obs: RolloutObservation,
  options: StateMachineOptions = DEFAULT_STATE_MACHINE_OPTIONS
): ReconcileDecision {
  const state = structuredClone(record.state);
  const t = new Transitioner(record.spec, state, options, obs.now);

  if (isTerminalPhase(state.phase)) {
    return { state, targets: computeTargets(state), events: [] };
  }

  state.stableVersion.readyReplicas = obs.stableReadyReplicas;
  state.candidateVersion.readyReplicas = obs.candidateReadyReplicas;

  if (state.abortRequested && state.phase !== 'Aborting') {
    t.enterAborting(state.abortReason ?? 'Abort requested');
    return { state, targets: computeTargets(state), events: t.events };
  }

  switch (state.phase) {
    case 'Initializing':
      onInitializing(t, obs);
      break;
    case 'Progressing':
      onProgressing(t, obs);
      break;
    case 'Analyzing':
      onAnalyzing(t, obs);
      break;
    case 'Paused':
      onPaused(t);
      break;
    case 'Promoting':
      onPromoting(t, obs);
      break;
    case 'Aborting':
      onAborting(t, obs);
      break;
  }

  return { state, targets: computeTargets(state), events: t.events };
}
