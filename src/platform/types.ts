/**
 * Workload platform contracts
 *
 * The controller never talks to an orchestrator directly; it drives these
 * three collaborators. Every call may fail, and the controller treats the
 * targets it sends as idempotent.
 *
 * @module platform/types
 */

import type { AnalysisWindow } from '../types/rollout.js';

/**
 * Scales replicas for a version and reports readiness
 */
export interface WorkloadManager {
  setReplicas(version: string, count: number): Promise<void>;
  getReadyReplicas(version: string): Promise<number>;
}

/**
 * Splits live traffic between versions.
 *
 * `setWeights` receives integer weights summing to 100 and resolves only once
 * the new split is active.
 */
export interface TrafficRouter {
  setWeights(weights: Record<string, number>): Promise<void>;
}

export interface MetricSample {
  value: number;
  sampleCount: number;
}

/**
 * Supplies health signals for a version over a time window
 */
export interface MetricsProvider {
  query(version: string, metricName: string, window: AnalysisWindow): Promise<MetricSample>;
}

/**
 * Collaborators bundled for the controller
 */
export interface WorkloadPlatform {
  workloadManager: WorkloadManager;
  trafficRouter: TrafficRouter;
  metricsProvider: MetricsProvider;
}

/**
 * Reject weight maps that are not integer percentages summing to 100
 */
export function assertValidWeights(weights: Record<string, number>): void {
  const entries = Object.entries(weights);
  if (entries.length === 0) {
    throw new Error('Traffic weights cannot be empty');
  }

  let total = 0;
  for (const [version, weight] of entries) {
    if (!Number.isInteger(weight) || weight < 0 || weight > 100) {
      throw new Error(`Invalid weight for ${version}: ${weight}. Must be an integer in [0, 100].`);
    }
    total += weight;
  }

  if (total !== 100) {
    throw new Error(`Traffic weights must sum to 100, got ${total}`);
  }
}
