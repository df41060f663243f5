#!/usr/bin/env tsx
/**
 * Canary Rollout Example
 *
 * Runs a three-step canary against the in-memory platform and prints every
 * phase change and traffic shift until the candidate is promoted.
 *
 * Usage:
 *   tsx examples/canary-rollout.ts
 */

import {
  InMemoryRolloutStore,
  InMemoryTrafficRouter,
  InMemoryWorkloadManager,
  RolloutController,
  StaticMetricsProvider,
  createLogger,
} from '../src/index.js';

async function main(): Promise<void> {
  const logger = createLogger({ name: 'canary-example', level: 'warn' });

  const workloadManager = new InMemoryWorkloadManager({ initial: { 'v1.4.0': 4 }, readinessDelayPolls: 1 });
  const trafficRouter = new InMemoryTrafficRouter();
  const metricsProvider = new StaticMetricsProvider({
    error_rate: { value: 0.002, sampleCount: 1_000 },
    latency_p99: { value: 180, sampleCount: 1_000 },
  });

  const controller = new RolloutController({
    store: new InMemoryRolloutStore(),
    workloadManager,
    trafficRouter,
    metricsProvider,
    logger,
    config: { tickIntervalMs: 100, applyRetry: { maxAttempts: 1, initialDelayMs: 0, maxDelayMs: 0, backoffMultiplier: 1 } },
  });

  controller.on('phaseChanged', (rolloutId, from, to, reason) => {
    console.log(`[${rolloutId.slice(0, 8)}] ${from} -> ${to} (${reason})`);
  });
  controller.on('weightsApplied', (_rolloutId, weights) => {
    console.log(`  traffic: ${JSON.stringify(weights)}`);
  });

  const finished = new Promise<void>((resolve) => {
    controller.once('rolloutCompleted', (_rolloutId, state) => {
      console.log(`\nRollout finished in ${state.phase}; active version is ${state.activeVersion}`);
      resolve();
    });
  });

  await controller.startRollout(
    {
      strategy: 'canary',
      steps: [
        { weight: 10, pauseDurationMs: 200 },
        { weight: 50, pauseDurationMs: 200 },
        { weight: 100, pauseDurationMs: 200 },
      ],
      analysis: { maxErrorRate: 0.01, maxP99LatencyMs: 300, minSampleCount: 100 },
    },
    'v1.4.0',
    'v1.5.0'
  );

  controller.start();
  await finished;
  await controller.stop();
}

main().catch((error: unknown) => {
  console.error('Example failed:', error);
  process.exit(1);
});
