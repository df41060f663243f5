export * from './rollout/index.js';
export type * from './types/rollout.js';
export { currentWeights, isTerminalPhase, TERMINAL_PHASES } from './types/rollout.js';
export type { RolloutSpecInput } from './types/schemas/rollout.js';

// Platform adapters
export type {
  WorkloadManager,
  TrafficRouter,
  MetricsProvider,
  MetricSample,
  WorkloadPlatform,
} from './platform/types.js';
export { assertValidWeights } from './platform/types.js';
export {
  InMemoryWorkloadManager,
  InMemoryTrafficRouter,
  StaticMetricsProvider,
  type InMemoryWorkloadOptions,
} from './platform/in-memory.js';
export {
  KubectlWorkloadManager,
  KubectlTrafficRouter,
  execaRunner,
  type KubectlOptions,
  type CommandRunner,
} from './platform/kubectl.js';
export {
  PrometheusMetricsProvider,
  renderQuery,
  type PrometheusMetricsProviderOptions,
  type PrometheusQueryTemplate,
} from './platform/prometheus-metrics-provider.js';

// Persistence
export { FileRolloutStore, InMemoryRolloutStore, type RolloutStore } from './storage/rollout-store.js';

// Configuration, logging & telemetry
export {
  loadConfig,
  validateConfig,
  initializeConfig,
  getConfig,
  resetConfig,
  getControllerConfig,
  getKubectlOptions,
  getPrometheusOptions,
  type Config,
  type Environment,
} from './config/loader.js';
export { createLogger, type LoggerOptions } from './utils/logger.js';
export { TelemetryManager, createRolloutMetrics, type TelemetryConfig, type RolloutMetrics } from './telemetry/otel.js';
