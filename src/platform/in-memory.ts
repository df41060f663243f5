/**
 * In-process workload platform
 *
 * Replica counts become ready after a configurable number of readiness
 * polls, traffic splits are kept in a history, and failures can be injected
 * per operation. Metric samples are served from a fixed table. Used by the
 * test suites and by local dry runs.
 *
 * @module platform/in-memory
 */

import type { Logger } from 'pino';
import type { AnalysisWindow } from '../types/rollout.js';
import {
  assertValidWeights,
  type MetricSample,
  type MetricsProvider,
  type TrafficRouter,
  type WorkloadManager,
} from './types.js';

interface WorkloadEntry {
  desired: number;
  ready: number;
}

export interface InMemoryWorkloadOptions {
  /**
   * Readiness polls before ready replicas reach the desired count
   * (0 = ready immediately after scaling)
   */
  readinessDelayPolls?: number;
  /** Existing versions and their ready replicas */
  initial?: Record<string, number>;
  logger?: Logger;
}

/**
 * Workload manager that converges replicas in memory
 */
export class InMemoryWorkloadManager implements WorkloadManager {
  private readonly workloads = new Map<string, WorkloadEntry>();
  private readonly pending = new Map<string, number>();
  private readonly readinessDelayPolls: number;
  private readonly logger?: Logger;
  private failuresRemaining = 0;
  private readonly stuck = new Set<string>();

  /** Every setReplicas call, in order */
  readonly calls: Array<{ version: string; count: number }> = [];

  constructor(options: InMemoryWorkloadOptions = {}) {
    this.readinessDelayPolls = options.readinessDelayPolls ?? 0;
    this.logger = options.logger;
    for (const [version, ready] of Object.entries(options.initial ?? {})) {
      this.workloads.set(version, { desired: ready, ready });
    }
  }

  async setReplicas(version: string, count: number): Promise<void> {
    if (this.failuresRemaining > 0) {
      this.failuresRemaining--;
      throw new Error(`Injected scaling failure for ${version}`);
    }

    if (!Number.isInteger(count) || count < 0) {
      throw new Error(`Invalid replica count for ${version}: ${count}`);
    }

    this.calls.push({ version, count });
    const entry = this.workloads.get(version) ?? { desired: 0, ready: 0 };
    if (entry.desired !== count) {
      this.pending.set(version, this.readinessDelayPolls);
    }
    entry.desired = count;
    this.workloads.set(version, entry);
    this.converge(version, entry);

    this.logger?.debug({ version, count }, 'Replicas set');
  }

  async getReadyReplicas(version: string): Promise<number> {
    const entry = this.workloads.get(version);
    if (!entry) {
      return 0;
    }

    const remaining = this.pending.get(version) ?? 0;
    if (remaining > 0) {
      this.pending.set(version, remaining - 1);
    }
    this.converge(version, entry);

    return entry.ready;
  }

  /** Make the next `count` setReplicas calls throw */
  failNext(count = 1): void {
    this.failuresRemaining = count;
  }

  /** Keep a version at its current ready count regardless of desired replicas */
  holdReadiness(version: string, held = true): void {
    if (held) {
      this.stuck.add(version);
    } else {
      this.stuck.delete(version);
    }
  }

  desiredReplicas(version: string): number {
    return this.workloads.get(version)?.desired ?? 0;
  }

  private converge(version: string, entry: WorkloadEntry): void {
    if (this.stuck.has(version) || (this.pending.get(version) ?? 0) > 0) {
      return;
    }
    entry.ready = entry.desired;
  }
}

/**
 * Traffic router that keeps the active split in memory
 *
 * Re-applying the current split is a no-op and does not grow the history.
 */
export class InMemoryTrafficRouter implements TrafficRouter {
  private current: Record<string, number> = {};
  private failuresRemaining = 0;
  private readonly logger?: Logger;

  /** Distinct splits in the order they became active */
  readonly history: Array<Record<string, number>> = [];

  constructor(logger?: Logger) {
    this.logger = logger;
  }

  async setWeights(weights: Record<string, number>): Promise<void> {
    if (this.failuresRemaining > 0) {
      this.failuresRemaining--;
      throw new Error('Injected routing failure');
    }

    assertValidWeights(weights);

    if (sameSplit(this.current, weights)) {
      return;
    }

    this.current = { ...weights };
    this.history.push({ ...weights });
    this.logger?.debug({ weights }, 'Traffic split updated');
  }

  /** Make the next `count` setWeights calls throw */
  failNext(count = 1): void {
    this.failuresRemaining = count;
  }

  getWeights(): Record<string, number> {
    return { ...this.current };
  }
}

function sameSplit(a: Record<string, number>, b: Record<string, number>): boolean {
  const keys = new Set([...Object.keys(a), ...Object.keys(b)]);
  for (const key of keys) {
    if ((a[key] ?? 0) !== (b[key] ?? 0)) {
      return false;
    }
  }
  return true;
}

/**
 * Metrics provider answering from a fixed table
 *
 * Samples are keyed by metric name, optionally narrowed to one version with
 * a `version:metric` key. Unknown metrics have no samples.
 */
export class StaticMetricsProvider implements MetricsProvider {
  private readonly samples = new Map<string, MetricSample>();

  /** Every query received, in order */
  readonly queries: Array<{ version: string; metricName: string; window: AnalysisWindow }> = [];

  constructor(samples: Record<string, MetricSample> = {}) {
    for (const [key, sample] of Object.entries(samples)) {
      this.samples.set(key, sample);
    }
  }

  set(metricName: string, sample: MetricSample, version?: string): void {
    this.samples.set(version ? `${version}:${metricName}` : metricName, sample);
  }

  async query(version: string, metricName: string, window: AnalysisWindow): Promise<MetricSample> {
    this.queries.push({ version, metricName, window });
    return (
      this.samples.get(`${version}:${metricName}`) ??
      this.samples.get(metricName) ?? { value: Number.NaN, sampleCount: 0 }
    );
  }
}
