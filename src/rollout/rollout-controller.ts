/**
 * Rollout Controller - Reconciliation loop for progressive rollouts
 *
 * Features:
 * - Drives every active rollout through the state machine once per tick
 * - Bounded parallelism across rollouts, strict serialization per rollout
 * - Applies platform targets before committing the state that implies them
 * - Abort requests pre-empt any in-flight step or analysis
 * - Persists every transition so a restart resumes where it left off
 *
 * Example:
 * ```typescript
 * const controller = new RolloutController({
 *   store: new FileRolloutStore('./var/rollouts'),
 *   workloadManager,
 *   trafficRouter,
 *   metricsProvider,
 *   logger,
 * });
 *
 * controller.start();
 * const rolloutId = await controller.startRollout(spec, 'v1', 'v2');
 * ```
 *
 * @module rollout/rollout-controller
 */

import { randomUUID } from 'node:crypto';
import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import type { MetricsProvider, TrafficRouter, WorkloadManager } from '../platform/types.js';
import type { RolloutStore } from '../storage/rollout-store.js';
import { createRolloutMetrics, type RolloutMetrics } from '../telemetry/otel.js';
import type { RolloutSpecInput } from '../types/schemas/rollout.js';
import {
  currentWeights,
  isTerminalPhase,
  type AnalysisResult,
  type PlatformTargets,
  type RolloutPhase,
  type RolloutRecord,
  type RolloutState,
} from '../types/rollout.js';
import { mapWithConcurrency } from '../utils/concurrency.js';
import { KeyedLock } from '../utils/keyed-lock.js';
import { computeBackoffDelay, retryWithBackoff, type RetryConfig } from '../utils/retry.js';
import { AnalysisEngine } from './analysis-engine.js';
import { RolloutError, isRolloutError, toRolloutError } from './errors.js';
import { createRolloutSpec } from './rollout-spec.js';
import {
  analysisWindow,
  createInitialState,
  isAnalysisDue,
  lastKnownObservation,
  reconcileRollout,
  type ReconcileDecision,
  type RolloutEvent,
  type RolloutObservation,
  type StateMachineOptions,
} from './state-machine.js';

export type ApplyRetrySettings = Pick<
  RetryConfig,
  'maxAttempts' | 'initialDelayMs' | 'maxDelayMs' | 'backoffMultiplier' | 'jitter'
>;

/**
 * Controller tuning (camelCase view of config/controller.yaml)
 */
export interface RolloutControllerConfig {
  tickIntervalMs: number;
  maxConcurrentReconciles: number;
  minReadyReplicas: number;
  readinessTimeoutMs: number;
  analysisRetryIntervalMs: number;
  maxInconclusiveRetries: number;
  defaultBakeDurationMs: number;
  /** Retries within a tick when applying targets */
  applyRetry: ApplyRetrySettings;
  /** Retries within a tick when applying abort targets */
  abortRetry: ApplyRetrySettings;
  /** Ceiling for the cross-tick backoff after failed applies */
  applyMaxBackoffMs: number;
}

export const DEFAULT_CONTROLLER_CONFIG: RolloutControllerConfig = {
  tickIntervalMs: 10_000,
  maxConcurrentReconciles: 4,
  minReadyReplicas: 1,
  readinessTimeoutMs: 300_000,
  analysisRetryIntervalMs: 30_000,
  maxInconclusiveRetries: 5,
  defaultBakeDurationMs: 60_000,
  applyRetry: { maxAttempts: 3, initialDelayMs: 200, maxDelayMs: 2_000, backoffMultiplier: 2 },
  abortRetry: { maxAttempts: 5, initialDelayMs: 100, maxDelayMs: 1_000, backoffMultiplier: 2 },
  applyMaxBackoffMs: 120_000,
};

export interface RolloutControllerOptions {
  store: RolloutStore;
  workloadManager: WorkloadManager;
  trafficRouter: TrafficRouter;
  metricsProvider: MetricsProvider;
  config?: Partial<RolloutControllerConfig>;
  logger?: Logger;
  metrics?: RolloutMetrics;
  /** Millisecond clock (default: Date.now) */
  clock?: () => number;
}

/**
 * Summary returned by listRollouts()
 */
export interface RolloutSummary {
  rolloutId: string;
  phase: RolloutPhase;
  strategy: RolloutRecord['spec']['strategy'];
  stableVersion: string;
  candidateVersion: string;
  currentStepIndex: number;
  candidateWeight: number;
  archived: boolean;
}

/**
 * Controller events
 */
export interface RolloutControllerEvents {
  rolloutStarted: (rolloutId: string, record: RolloutRecord) => void;
  phaseChanged: (rolloutId: string, from: RolloutPhase, to: RolloutPhase, reason: string) => void;
  weightsApplied: (rolloutId: string, weights: Record<string, number>) => void;
  analysisCompleted: (rolloutId: string, result: AnalysisResult) => void;
  applyFailed: (rolloutId: string, error: RolloutError, consecutiveFailures: number) => void;
  rolloutCompleted: (rolloutId: string, state: RolloutState) => void;
  alert: (rolloutId: string, error: RolloutError) => void;
}

/**
 * Rollout Controller
 */
export class RolloutController extends EventEmitter<RolloutControllerEvents> {
  private readonly store: RolloutStore;
  private readonly workloadManager: WorkloadManager;
  private readonly trafficRouter: TrafficRouter;
  private readonly analysisEngine: AnalysisEngine;
  private readonly config: RolloutControllerConfig;
  private readonly logger?: Logger;
  private readonly metrics: RolloutMetrics;
  private readonly clock: () => number;
  private readonly locks = new KeyedLock();

  /** Rollouts whose stored record could not be read; never reconciled again */
  private readonly halted = new Map<string, RolloutError>();

  private timer: NodeJS.Timeout | null = null;
  private running = false;
  private inflightTick: Promise<void> | null = null;

  constructor(options: RolloutControllerOptions) {
    super();
    this.store = options.store;
    this.workloadManager = options.workloadManager;
    this.trafficRouter = options.trafficRouter;
    this.logger = options.logger;
    this.config = { ...DEFAULT_CONTROLLER_CONFIG, ...options.config };
    this.metrics = options.metrics ?? createRolloutMetrics();
    this.clock = options.clock ?? Date.now;
    this.analysisEngine = new AnalysisEngine(options.metricsProvider, options.logger);

    if (!Number.isInteger(this.config.maxConcurrentReconciles) || this.config.maxConcurrentReconciles < 1) {
      throw new Error('maxConcurrentReconciles must be a positive integer');
    }
    if (this.config.tickIntervalMs <= 0) {
      throw new Error('tickIntervalMs must be positive');
    }
  }

  /**
   * Start the periodic reconcile loop
   */
  public start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.logger?.info({ tickIntervalMs: this.config.tickIntervalMs }, 'Rollout controller started');
    this.scheduleTick(0);
  }

  /**
   * Stop the loop and wait for an in-flight tick to finish
   */
  public async stop(): Promise<void> {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.inflightTick) {
      await this.inflightTick;
    }
    this.logger?.info('Rollout controller stopped');
  }

  public isRunning(): boolean {
    return this.running;
  }

  /**
   * Submit a new rollout
   *
   * @returns The rollout id
   * @throws {RolloutError} InvalidSpec when the spec or versions are invalid
   */
  public async startRollout(
    specInput: RolloutSpecInput,
    stableVersion: string,
    candidateVersion: string
  ): Promise<string> {
    const spec = createRolloutSpec(specInput, {
      defaultBakeDurationMs: this.config.defaultBakeDurationMs,
    });

    if (!stableVersion || !candidateVersion) {
      throw new RolloutError('InvalidSpec', 'Stable and candidate versions are required');
    }
    if (stableVersion === candidateVersion) {
      throw new RolloutError('InvalidSpec', `Candidate version must differ from stable (${stableVersion})`, {
        stableVersion,
        candidateVersion,
      });
    }

    const rolloutId = randomUUID();
    const record: RolloutRecord = {
      schemaVersion: 1,
      spec,
      state: createInitialState({ rolloutId, stableVersion, candidateVersion, now: this.clock() }),
    };

    await this.store.save(record);

    this.metrics.rolloutsStarted.add(1, { strategy: spec.strategy });
    this.logger?.info(
      { rolloutId, strategy: spec.strategy, stableVersion, candidateVersion, steps: spec.steps.length },
      'Rollout started'
    );
    this.emit('rolloutStarted', rolloutId, record);

    return rolloutId;
  }

  /**
   * Current state of a rollout (active or archived)
   *
   * @throws {RolloutError} NotFound for unknown ids, StateCorrupted for unreadable records
   */
  public async getRolloutState(rolloutId: string): Promise<RolloutState> {
    const record = await this.loadRecord(rolloutId);
    return record.state;
  }

  /**
   * Full record (spec and state) of a rollout
   */
  public async getRollout(rolloutId: string): Promise<RolloutRecord> {
    return this.loadRecord(rolloutId);
  }

  /**
   * Resume a paused rollout
   *
   * @throws {RolloutError} InvalidTransition unless the rollout is Paused
   */
  public async resume(rolloutId: string): Promise<void> {
    await this.locks.runExclusive(rolloutId, async () => {
      const record = await this.loadRecord(rolloutId);
      if (record.state.phase !== 'Paused') {
        throw new RolloutError(
          'InvalidTransition',
          `Cannot resume rollout ${rolloutId} in phase ${record.state.phase}`,
          { rolloutId, phase: record.state.phase }
        );
      }

      record.state.resumeRequested = true;
      await this.store.save(record);
      this.logger?.info({ rolloutId, pauseReason: record.state.pauseReason }, 'Resume requested');

      await this.processRecord(record);
    });
  }

  /**
   * Abort a rollout and return all traffic to the stable version
   *
   * Idempotent while the rollout is already aborting.
   *
   * @throws {RolloutError} InvalidTransition when the rollout already finished
   */
  public async abort(rolloutId: string, reason = 'Aborted by operator'): Promise<void> {
    await this.locks.runExclusive(rolloutId, async () => {
      const record = await this.loadRecord(rolloutId);
      const { phase } = record.state;

      if (isTerminalPhase(phase)) {
        throw new RolloutError('InvalidTransition', `Cannot abort rollout ${rolloutId} in phase ${phase}`, {
          rolloutId,
          phase,
        });
      }
      if (phase === 'Aborting' || record.state.abortRequested) {
        return;
      }

      record.state.abortRequested = true;
      record.state.abortReason = reason;
      await this.store.save(record);
      this.logger?.warn({ rolloutId, phase, reason }, 'Abort requested');

      await this.processRecord(record);
    });
  }

  /**
   * Summaries of all known rollouts
   */
  public async listRollouts(options: { includeArchived?: boolean } = {}): Promise<RolloutSummary[]> {
    const active = await this.store.listActive();
    const archived = options.includeArchived ? await this.store.listArchived() : [];

    const summaries: RolloutSummary[] = [];
    for (const [ids, isArchived] of [
      [active, false],
      [archived, true],
    ] as const) {
      for (const rolloutId of ids) {
        if (this.halted.has(rolloutId)) {
          continue;
        }
        const record = await this.store.load(rolloutId);
        if (!record) {
          continue;
        }
        summaries.push({
          rolloutId,
          phase: record.state.phase,
          strategy: record.spec.strategy,
          stableVersion: record.state.stableVersion.id,
          candidateVersion: record.state.candidateVersion.id,
          currentStepIndex: record.state.currentStepIndex,
          candidateWeight: record.state.candidateVersion.weight,
          archived: isArchived,
        });
      }
    }
    return summaries;
  }

  /**
   * Ids of rollouts halted because their stored record is corrupted
   */
  public haltedRollouts(): string[] {
    return [...this.halted.keys()];
  }

  /**
   * Reconcile every active rollout once
   *
   * Rollouts already being reconciled (or resumed/aborted) are skipped.
   */
  public async tick(): Promise<void> {
    const ids = (await this.store.listActive()).filter((id) => !this.halted.has(id));
    if (ids.length === 0) {
      return;
    }

    const results = await mapWithConcurrency(ids, this.config.maxConcurrentReconciles, async (rolloutId) => {
      const outcome = await this.locks.tryRunExclusive(rolloutId, () => this.reconcileUnlocked(rolloutId));
      if (!outcome.acquired) {
        this.logger?.debug({ rolloutId }, 'Rollout busy, skipping this tick');
      }
    });

    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        this.logger?.error(
          { rolloutId: ids[index], error: toRolloutError(result.reason, 'ApplyFailure').message },
          'Reconcile failed'
        );
      }
    });
  }

  /**
   * Reconcile a single rollout now, waiting for any in-flight work on it
   */
  public async reconcile(rolloutId: string): Promise<void> {
    await this.locks.runExclusive(rolloutId, () => this.reconcileUnlocked(rolloutId));
  }

  private scheduleTick(delayMs: number): void {
    if (!this.running) {
      return;
    }
    this.timer = setTimeout(() => {
      this.timer = null;
      this.inflightTick = this.tick()
        .catch((error: unknown) => {
          this.logger?.error({ error }, 'Controller tick failed');
        })
        .finally(() => {
          this.inflightTick = null;
          this.scheduleTick(this.config.tickIntervalMs);
        });
    }, delayMs);
  }

  private async loadRecord(rolloutId: string): Promise<RolloutRecord> {
    const halted = this.halted.get(rolloutId);
    if (halted) {
      throw halted;
    }

    const record = await this.store.load(rolloutId);
    if (!record) {
      throw new RolloutError('NotFound', `Rollout not found: ${rolloutId}`, { rolloutId });
    }
    return record;
  }

  private async reconcileUnlocked(rolloutId: string): Promise<void> {
    let record: RolloutRecord | undefined;
    try {
      record = await this.store.load(rolloutId);
    } catch (error) {
      if (isRolloutError(error, 'StateCorrupted')) {
        this.halt(rolloutId, error);
        return;
      }
      throw error;
    }

    if (!record) {
      return;
    }

    await this.processRecord(record);
  }

  private halt(rolloutId: string, error: RolloutError): void {
    this.halted.set(rolloutId, error);
    this.logger?.fatal({ rolloutId, error: error.message }, 'Rollout state corrupted, halting rollout');
    this.emit('alert', rolloutId, error);
  }

  /**
   * One reconcile pass over a loaded record (caller holds the rollout's lock)
   */
  private async processRecord(initial: RolloutRecord): Promise<void> {
    const startedAt = Date.now();
    let record = initial;
    const { rolloutId } = record.state;

    if (isTerminalPhase(record.state.phase)) {
      // Committed as terminal but never archived (interrupted between the two writes)
      if ((await this.store.listActive()).includes(rolloutId)) {
        await this.finish(record);
      }
      return;
    }

    // Abort pre-empts everything else and is committed before any platform call
    if (record.state.abortRequested && record.state.phase !== 'Aborting') {
      const decision = reconcileRollout(record, lastKnownObservation(record.state, this.clock()), this.machineOptions());
      record = await this.commit(record, decision, { resetFailures: true });
    }

    const now = this.clock();
    if (record.state.nextApplyAttemptAt !== undefined && now < record.state.nextApplyAttemptAt) {
      this.logger?.debug(
        { rolloutId, retryInMs: record.state.nextApplyAttemptAt - now },
        'Waiting for apply backoff'
      );
      return;
    }

    let previousWeight = initial.state.candidateVersion.weight;

    // Traffic goes back to stable before anything else is asked of the platform
    if (record.state.phase === 'Aborting') {
      try {
        await this.restoreStableTraffic(record.state);
      } catch (error) {
        await this.registerApplyFailure(record, toRolloutError(error, 'ApplyFailure', { rolloutId }), now);
        return;
      }
      if (initial.state.phase !== 'Aborting' || initial.state.consecutiveApplyFailures > 0) {
        this.emit('weightsApplied', rolloutId, currentWeights(record.state));
      }
      previousWeight = record.state.candidateVersion.weight;
    }

    let observation: RolloutObservation;
    try {
      observation = await this.observe(record, now);
    } catch (error) {
      await this.registerApplyFailure(record, toRolloutError(error, 'ApplyFailure', { rolloutId }), now);
      return;
    }

    const decision = reconcileRollout(record, observation, this.machineOptions());
    const enteringAbort = decision.state.phase === 'Aborting' && record.state.phase !== 'Aborting';

    if (enteringAbort) {
      record = await this.commit(record, decision, { resetFailures: true });
    }

    try {
      await this.applyTargets(decision.state, decision.targets);
    } catch (error) {
      await this.registerApplyFailure(record, toRolloutError(error, 'ApplyFailure', { rolloutId }), now);
      return;
    }

    if (!enteringAbort) {
      record = await this.commit(record, decision, { resetFailures: true });
    }
    if (decision.state.candidateVersion.weight !== previousWeight) {
      this.emit('weightsApplied', rolloutId, decision.targets.weights);
    }

    this.metrics.reconcileDuration.record(Date.now() - startedAt, { phase: record.state.phase });

    if (isTerminalPhase(record.state.phase)) {
      await this.finish(record);
    }
  }

  private machineOptions(): StateMachineOptions {
    return {
      minReadyReplicas: this.config.minReadyReplicas,
      readinessTimeoutMs: this.config.readinessTimeoutMs,
      analysisRetryIntervalMs: this.config.analysisRetryIntervalMs,
      maxInconclusiveRetries: this.config.maxInconclusiveRetries,
    };
  }

  private async observe(record: RolloutRecord, now: number): Promise<RolloutObservation> {
    const { state, spec } = record;
    const [stableReadyReplicas, candidateReadyReplicas] = await Promise.all([
      this.workloadManager.getReadyReplicas(state.stableVersion.id),
      this.workloadManager.getReadyReplicas(state.candidateVersion.id),
    ]);

    const observation: RolloutObservation = { now, stableReadyReplicas, candidateReadyReplicas };

    if (!state.abortRequested && isAnalysisDue(state, now)) {
      const result = await this.analysisEngine.analyze(
        state.candidateVersion.id,
        analysisWindow(state, now),
        spec.analysis
      );
      this.metrics.analysisVerdicts.add(1, { verdict: result.verdict });
      this.logger?.info(
        { rolloutId: state.rolloutId, stepIndex: state.currentStepIndex, verdict: result.verdict, reason: result.reason },
        'Analysis completed'
      );
      this.emit('analysisCompleted', state.rolloutId, result);
      observation.analysis = result;
    }

    return observation;
  }

  private async restoreStableTraffic(state: RolloutState): Promise<void> {
    await retryWithBackoff(() => this.trafficRouter.setWeights(currentWeights(state)), {
      ...this.config.abortRetry,
      onRetry: ({ attempt, delayMs, error }) => {
        this.logger?.warn(
          { rolloutId: state.rolloutId, attempt, delayMs, error: toRolloutError(error, 'ApplyFailure').message },
          'Retrying traffic restore to stable'
        );
      },
    });
  }

  /**
   * Push targets to the platform
   *
   * Scale-ups happen before the traffic shift and scale-downs after it, so a
   * version never receives traffic it has no replicas for. On the way back to
   * stable the traffic shift goes first and replica changes cannot hold it up.
   *
   * @param next - State the targets were computed from (carries this tick's readiness)
   */
  private async applyTargets(next: RolloutState, targets: PlatformTargets): Promise<void> {
    const ready: Record<string, number> = {
      [next.stableVersion.id]: next.stableVersion.readyReplicas,
      [next.candidateVersion.id]: next.candidateVersion.readyReplicas,
    };

    const scaleUps: Array<[string, number]> = [];
    const scaleDowns: Array<[string, number]> = [];
    for (const [version, count] of Object.entries(targets.replicas)) {
      if (count < (ready[version] ?? 0)) {
        scaleDowns.push([version, count]);
      } else {
        scaleUps.push([version, count]);
      }
    }

    const rollingBack = next.phase === 'Aborting' || next.phase === 'RolledBack';
    const retry = rollingBack ? this.config.abortRetry : this.config.applyRetry;

    if (rollingBack) {
      await this.restoreStableTraffic(next);
    }

    await retryWithBackoff(
      async () => {
        for (const [version, count] of scaleUps) {
          await this.workloadManager.setReplicas(version, count);
        }
        if (!rollingBack) {
          await this.trafficRouter.setWeights(targets.weights);
        }
        for (const [version, count] of scaleDowns) {
          await this.workloadManager.setReplicas(version, count);
        }
      },
      {
        ...retry,
        onRetry: ({ attempt, delayMs, error }) => {
          this.logger?.warn(
            { rolloutId: next.rolloutId, attempt, delayMs, error: toRolloutError(error, 'ApplyFailure').message },
            'Retrying platform apply'
          );
        },
      }
    );
  }

  private async registerApplyFailure(record: RolloutRecord, error: RolloutError, now: number): Promise<void> {
    const failures = record.state.consecutiveApplyFailures + 1;
    const backoffMs = computeBackoffDelay(failures, {
      initialDelayMs: this.config.tickIntervalMs,
      maxDelayMs: Math.max(this.config.applyMaxBackoffMs, this.config.tickIntervalMs),
      backoffMultiplier: 2,
    });

    await this.save(record, {
      ...record.state,
      consecutiveApplyFailures: failures,
      nextApplyAttemptAt: now + backoffMs,
    });

    this.metrics.applyFailures.add(1, { phase: record.state.phase });
    this.logger?.warn(
      { rolloutId: record.state.rolloutId, phase: record.state.phase, failures, backoffMs, error: error.message },
      'Platform apply failed, phase unchanged'
    );
    this.emit('applyFailed', record.state.rolloutId, error, failures);
  }

  private async commit(
    record: RolloutRecord,
    decision: ReconcileDecision,
    options: { resetFailures?: boolean } = {}
  ): Promise<RolloutRecord> {
    const state: RolloutState = options.resetFailures
      ? { ...decision.state, consecutiveApplyFailures: 0, nextApplyAttemptAt: undefined }
      : decision.state;

    const committed = await this.save(record, state);
    for (const event of decision.events) {
      this.publish(committed, event);
    }
    return committed;
  }

  private async save(record: RolloutRecord, state: RolloutState): Promise<RolloutRecord> {
    const next: RolloutRecord = { ...record, state };
    await this.store.save(next);
    return next;
  }

  private publish(record: RolloutRecord, event: RolloutEvent): void {
    const { rolloutId } = record.state;
    switch (event.type) {
      case 'phaseChanged':
        this.metrics.phaseTransitions.add(1, { from: event.from, to: event.to, strategy: record.spec.strategy });
        this.logger?.info({ rolloutId, from: event.from, to: event.to, reason: event.reason }, 'Rollout phase changed');
        this.emit('phaseChanged', rolloutId, event.from, event.to, event.reason);
        break;
      case 'stepStarted':
        this.logger?.info({ rolloutId, stepIndex: event.stepIndex, weight: event.weight }, 'Rollout step started');
        break;
      case 'analysisRecorded':
        this.logger?.debug(
          { rolloutId, stepIndex: event.record.stepIndex, verdict: event.record.verdict },
          'Analysis recorded'
        );
        break;
    }
  }

  private async finish(record: RolloutRecord): Promise<void> {
    await this.store.archive(record);
    this.metrics.rolloutsCompleted.add(1, { phase: record.state.phase, strategy: record.spec.strategy });
    this.logger?.info(
      { rolloutId: record.state.rolloutId, phase: record.state.phase, activeVersion: record.state.activeVersion },
      'Rollout finished'
    );
    this.emit('rolloutCompleted', record.state.rolloutId, record.state);
  }
}
