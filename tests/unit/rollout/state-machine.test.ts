import { describe, it, expect } from 'vitest';
import { createRolloutSpec } from '../../../src/rollout/rollout-spec.js';
import {
  canaryReplicas,
  computeTargets,
  createInitialState,
  reconcileRollout,
  type RolloutObservation,
  type StateMachineOptions,
} from '../../../src/rollout/state-machine.js';
import type { AnalysisResult, AnalysisVerdict, RolloutRecord, RolloutState } from '../../../src/types/rollout.js';
import type { RolloutSpecInput } from '../../../src/types/schemas/rollout.js';

const OPTIONS: StateMachineOptions = {
  minReadyReplicas: 1,
  readinessTimeoutMs: 10_000,
  analysisRetryIntervalMs: 1_000,
  maxInconclusiveRetries: 1,
};

const analysis = { maxErrorRate: 0.01, maxP99LatencyMs: 300, minSampleCount: 100 };

function makeRecord(input: Partial<RolloutSpecInput> = {}): RolloutRecord {
  return {
    schemaVersion: 1,
    spec: createRolloutSpec({
      strategy: 'canary',
      steps: [
        { weight: 10, pauseDurationMs: 5_000 },
        { weight: 100, pauseDurationMs: 5_000 },
      ],
      analysis,
      ...input,
    }),
    state: createInitialState({ rolloutId: 'r1', stableVersion: 'v1', candidateVersion: 'v2', now: 0 }),
  };
}

function observe(now: number, stable: number, candidate: number, verdict?: AnalysisVerdict): RolloutObservation {
  const result: AnalysisResult | undefined = verdict
    ? { verdict, version: 'v2', window: { startMs: 0, endMs: now }, checks: [], reason: `verdict ${verdict}` }
    : undefined;
  return { now, stableReadyReplicas: stable, candidateReadyReplicas: candidate, analysis: result };
}

/** Apply a decision's state to the record, as the controller does after a successful apply */
function step(record: RolloutRecord, obs: RolloutObservation): RolloutRecord {
  const decision = reconcileRollout(record, obs, OPTIONS);
  return { ...record, state: decision.state };
}

function withState(record: RolloutRecord, patch: Partial<RolloutState>): RolloutRecord {
  return { ...record, state: { ...record.state, ...patch } };
}

describe('canaryReplicas', () => {
  it('scales with the stable baseline and never drops below the minimum', () => {
    expect(canaryReplicas(10, 25, 1)).toBe(3);
    expect(canaryReplicas(10, 100, 1)).toBe(10);
    expect(canaryReplicas(2, 10, 1)).toBe(1);
    expect(canaryReplicas(0, 50, 2)).toBe(2);
  });
});

describe('computeTargets', () => {
  it('leaves stable replicas alone until promotion', () => {
    const state = createInitialState({ rolloutId: 'r1', stableVersion: 'v1', candidateVersion: 'v2', now: 0 });

    expect(computeTargets(state)).toEqual({ weights: { v1: 100, v2: 0 }, replicas: { v2: 0 } });
    expect(computeTargets({ ...state, phase: 'Promoting' }).replicas).toEqual({ v2: 0, v1: 0 });
  });
});

describe('reconcileRollout', () => {
  it('does not mutate the committed record', () => {
    const record = makeRecord();
    const before = structuredClone(record.state);

    reconcileRollout(record, observe(1_000, 4, 1), OPTIONS);

    expect(record.state).toEqual(before);
  });

  describe('Initializing', () => {
    it('captures the stable baseline and waits for the candidate', () => {
      const decision = reconcileRollout(makeRecord(), observe(1_000, 4, 0), OPTIONS);

      expect(decision.state.phase).toBe('Initializing');
      expect(decision.state.stableVersion.desiredReplicas).toBe(4);
      expect(decision.targets).toEqual({ weights: { v1: 100, v2: 0 }, replicas: { v2: 1 } });
      expect(decision.events).toEqual([]);
    });

    it('enters the first step once the candidate is ready', () => {
      const decision = reconcileRollout(makeRecord(), observe(1_000, 4, 1), OPTIONS);

      expect(decision.state.phase).toBe('Progressing');
      expect(decision.state.stepStartedAt).toBe(1_000);
      expect(decision.targets).toEqual({ weights: { v1: 90, v2: 10 }, replicas: { v2: 1 } });
      expect(decision.events).toEqual([
        { type: 'stepStarted', stepIndex: 0, weight: 10 },
        { type: 'phaseChanged', from: 'Initializing', to: 'Progressing', reason: 'Candidate ready' },
      ]);
    });

    it('requires a full replica set for blue/green', () => {
      const record = makeRecord({ strategy: 'blue_green', steps: [{ weight: 100, pauseDurationMs: 1_000 }] });

      const waiting = reconcileRollout(record, observe(1_000, 3, 2), OPTIONS);
      expect(waiting.state.phase).toBe('Initializing');
      expect(waiting.targets.replicas).toEqual({ v2: 3 });

      const switched = reconcileRollout(record, observe(1_000, 3, 3), OPTIONS);
      expect(switched.state.phase).toBe('Progressing');
      expect(switched.targets.weights).toEqual({ v1: 0, v2: 100 });
      expect(switched.state.transitions[0].reason).toBe('Candidate ready, traffic switched');
    });

    it('aborts when readiness times out', () => {
      const decision = reconcileRollout(makeRecord(), observe(10_000, 4, 0), OPTIONS);

      expect(decision.state.phase).toBe('Aborting');
      expect(decision.state.message).toBe('Candidate not ready within 10000ms (0/1 ready replicas)');
      expect(decision.targets).toEqual({ weights: { v1: 100, v2: 0 }, replicas: { v2: 0, v1: 4 } });
    });
  });

  describe('Progressing and Analyzing', () => {
    const progressing = (): RolloutRecord => step(makeRecord(), observe(1_000, 4, 1));

    it('waits for the step dwell before analysing', () => {
      expect(reconcileRollout(progressing(), observe(5_999, 4, 1), OPTIONS).state.phase).toBe('Progressing');

      const decision = reconcileRollout(progressing(), observe(6_000, 4, 1), OPTIONS);
      expect(decision.state.phase).toBe('Analyzing');
      expect(decision.state.nextAnalysisAt).toBe(6_000);
    });

    it('waits in Analyzing until a result arrives', () => {
      const analyzing = step(progressing(), observe(6_000, 4, 1));

      const decision = reconcileRollout(analyzing, observe(7_000, 4, 1), OPTIONS);

      expect(decision.state.phase).toBe('Analyzing');
      expect(decision.events).toEqual([]);
    });

    it('advances to the next step on pass', () => {
      const analyzing = step(progressing(), observe(6_000, 4, 1));

      const decision = reconcileRollout(analyzing, observe(7_000, 4, 1, 'pass'), OPTIONS);

      expect(decision.state.phase).toBe('Progressing');
      expect(decision.state.currentStepIndex).toBe(1);
      expect(decision.targets).toEqual({ weights: { v1: 0, v2: 100 }, replicas: { v2: 4 } });
      expect(decision.state.analysisHistory).toEqual([
        { timestamp: 7_000, stepIndex: 0, verdict: 'pass', reason: 'verdict pass', checks: [] },
      ]);
    });

    it('promotes after the last step passes', () => {
      let record = step(progressing(), observe(6_000, 4, 1));
      record = step(record, observe(7_000, 4, 1, 'pass'));
      record = step(record, observe(12_000, 4, 4));

      const decision = reconcileRollout(record, observe(13_000, 4, 4, 'pass'), OPTIONS);

      expect(decision.state.phase).toBe('Promoting');
      expect(decision.targets).toEqual({ weights: { v1: 0, v2: 100 }, replicas: { v2: 4, v1: 0 } });
    });

    it('retries inconclusive verdicts, then fails once the budget is spent', () => {
      let record = step(progressing(), observe(6_000, 4, 1));
      record = step(record, observe(6_000, 4, 1, 'inconclusive'));

      expect(record.state.phase).toBe('Analyzing');
      expect(record.state.inconclusiveCount).toBe(1);
      expect(record.state.nextAnalysisAt).toBe(7_000);

      const decision = reconcileRollout(record, observe(7_000, 4, 1, 'inconclusive'), OPTIONS);

      expect(decision.state.phase).toBe('Aborting');
      expect(decision.state.analysisHistory.map((entry) => entry.verdict)).toEqual([
        'inconclusive',
        'inconclusive',
        'fail',
      ]);
      expect(decision.state.message).toBe('Analysis inconclusive after 2 attempts: verdict inconclusive');
    });

    it('aborts on fail and returns all traffic to stable', () => {
      const analyzing = step(progressing(), observe(6_000, 4, 1));

      const decision = reconcileRollout(analyzing, observe(6_000, 4, 1, 'fail'), OPTIONS);

      expect(decision.state.phase).toBe('Aborting');
      expect(decision.state.message).toBe('Analysis failed: verdict fail');
      expect(decision.targets).toEqual({ weights: { v1: 100, v2: 0 }, replicas: { v2: 0, v1: 4 } });
    });

    it('pauses on fail when holding for the operator', () => {
      let record = makeRecord({ rollbackPolicy: 'hold_for_operator' });
      record = step(record, observe(1_000, 4, 1));
      record = step(record, observe(6_000, 4, 1));

      const decision = reconcileRollout(record, observe(6_000, 4, 1, 'fail'), OPTIONS);

      expect(decision.state.phase).toBe('Paused');
      expect(decision.state.pauseReason).toBe('analysis_failed');
      expect(decision.targets.weights).toEqual({ v1: 90, v2: 10 });
    });

    it('advances straight through steps without required analysis', () => {
      let record = makeRecord({
        steps: [
          { weight: 10, pauseDurationMs: 5_000, requiredAnalysis: false },
          { weight: 100, pauseDurationMs: 5_000 },
        ],
      });
      record = step(record, observe(1_000, 4, 1));

      const decision = reconcileRollout(record, observe(6_000, 4, 1), OPTIONS);

      expect(decision.state.phase).toBe('Progressing');
      expect(decision.state.currentStepIndex).toBe(1);
      expect(decision.state.stepStartedAt).toBe(6_000);
    });
  });

  describe('Paused', () => {
    it('stays paused until resumed', () => {
      const record = withState(makeRecord({ promotionMode: 'manual_gate' }), {
        phase: 'Paused',
        pauseReason: 'manual_gate',
      });

      expect(reconcileRollout(record, observe(999_999, 4, 1), OPTIONS).state.phase).toBe('Paused');
    });

    it('advances past a manual gate on resume', () => {
      const record = withState(makeRecord({ promotionMode: 'manual_gate' }), {
        phase: 'Paused',
        pauseReason: 'manual_gate',
        resumeRequested: true,
      });

      const decision = reconcileRollout(record, observe(20_000, 4, 1), OPTIONS);

      expect(decision.state.phase).toBe('Progressing');
      expect(decision.state.currentStepIndex).toBe(1);
      expect(decision.state.resumeRequested).toBe(false);
      expect(decision.state.pauseReason).toBeUndefined();
    });

    it('re-analyzes with a fresh window after a failed-analysis hold', () => {
      const record = withState(makeRecord({ rollbackPolicy: 'hold_for_operator' }), {
        phase: 'Paused',
        pauseReason: 'analysis_failed',
        resumeRequested: true,
        inconclusiveCount: 1,
      });

      const decision = reconcileRollout(record, observe(20_000, 4, 1), OPTIONS);

      expect(decision.state.phase).toBe('Analyzing');
      expect(decision.state.stepStartedAt).toBe(20_000);
      expect(decision.state.nextAnalysisAt).toBe(25_000);
      expect(decision.state.inconclusiveCount).toBe(0);
    });
  });

  describe('Promoting', () => {
    it('completes only once stable has drained and the candidate is fully ready', () => {
      const promoting = withState(makeRecord(), {
        phase: 'Promoting',
        currentStepIndex: 1,
        stableVersion: { id: 'v1', desiredReplicas: 0, readyReplicas: 4, weight: 0 },
        candidateVersion: { id: 'v2', desiredReplicas: 4, readyReplicas: 4, weight: 100 },
      });

      expect(reconcileRollout(promoting, observe(1_000, 1, 4), OPTIONS).state.phase).toBe('Promoting');
      expect(reconcileRollout(promoting, observe(1_000, 0, 3), OPTIONS).state.phase).toBe('Promoting');

      const done = reconcileRollout(promoting, observe(1_000, 0, 4), OPTIONS);
      expect(done.state.phase).toBe('Succeeded');
      expect(done.state.activeVersion).toBe('v2');
    });
  });

  describe('abort', () => {
    it('takes priority over any pending result', () => {
      let record = step(makeRecord(), observe(1_000, 4, 1));
      record = step(record, observe(6_000, 4, 1));
      record = withState(record, { abortRequested: true, abortReason: 'manual stop' });

      const decision = reconcileRollout(record, observe(7_000, 4, 1, 'pass'), OPTIONS);

      expect(decision.state.phase).toBe('Aborting');
      expect(decision.state.analysisHistory).toEqual([]);
      expect(decision.state.transitions.at(-1)?.reason).toBe('manual stop');
    });

    it('restores the stable replicas released by promotion', () => {
      const promoting = withState(makeRecord(), {
        phase: 'Promoting',
        currentStepIndex: 1,
        stableVersion: { id: 'v1', desiredReplicas: 0, readyReplicas: 2, weight: 0 },
        candidateVersion: { id: 'v2', desiredReplicas: 4, readyReplicas: 4, weight: 100 },
        abortRequested: true,
        abortReason: 'manual stop',
      });

      const decision = reconcileRollout(promoting, observe(1_000, 2, 4), OPTIONS);

      expect(decision.state.phase).toBe('Aborting');
      expect(decision.targets).toEqual({ weights: { v1: 100, v2: 0 }, replicas: { v2: 0, v1: 4 } });
    });

    it('leaves an uncaptured stable baseline alone', () => {
      const record = withState(makeRecord(), { abortRequested: true });

      const decision = reconcileRollout(record, observe(0, 4, 0), OPTIONS);

      expect(decision.state.phase).toBe('Aborting');
      expect(decision.state.transitions.at(-1)?.reason).toBe('Abort requested');
      expect(decision.targets.replicas).toEqual({ v2: 0 });
    });

    it('finishes once the candidate has no ready replicas', () => {
      let record = withState(makeRecord(), { abortRequested: true, abortReason: 'manual stop' });
      record = step(record, observe(1_000, 4, 1));

      expect(reconcileRollout(record, observe(2_000, 4, 1), OPTIONS).state.phase).toBe('Aborting');

      const done = reconcileRollout(record, observe(2_000, 4, 0), OPTIONS);
      expect(done.state.phase).toBe('RolledBack');
      expect(done.state.activeVersion).toBe('v1');
      expect(done.state.transitions.at(-1)).toEqual({
        timestamp: 2_000,
        from: 'Aborting',
        to: 'RolledBack',
        reason: 'manual stop',
      });
    });
  });

  it('leaves terminal rollouts untouched', () => {
    const record = withState(makeRecord(), { phase: 'Succeeded' });

    const decision = reconcileRollout(record, observe(1_000, 0, 4), OPTIONS);

    expect(decision.state).toEqual(record.state);
    expect(decision.events).toEqual([]);
  });

  it('keeps weights summing to 100 across a full run', () => {
    let record = makeRecord();
    const observations = [
      observe(1_000, 4, 1),
      observe(6_000, 4, 1),
      observe(6_000, 4, 1, 'pass'),
      observe(11_000, 4, 4),
      observe(11_000, 4, 4, 'pass'),
      observe(12_000, 0, 4),
    ];

    for (const obs of observations) {
      record = step(record, obs);
      expect(record.state.stableVersion.weight + record.state.candidateVersion.weight).toBe(100);
    }
    expect(record.state.phase).toBe('Succeeded');
  });
});
