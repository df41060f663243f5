/**
 * Progressive Rollout - Canary and blue/green releases with automated analysis
 *
 * @module rollout
 * @packageDocumentation
 */

// Controller loop and public API
export {
  RolloutController,
  DEFAULT_CONTROLLER_CONFIG,
  type RolloutControllerConfig,
  type RolloutControllerOptions,
  type RolloutControllerEvents,
  type RolloutSummary,
  type ApplyRetrySettings,
} from './rollout-controller.js';

// Spec validation
export {
  createRolloutSpec,
  DEFAULT_SPEC_DEFAULTS,
  ERROR_RATE_METRIC,
  LATENCY_P99_METRIC,
  type RolloutSpecDefaults,
} from './rollout-spec.js';

// State machine
export {
  reconcileRollout,
  createInitialState,
  computeTargets,
  canaryReplicas,
  DEFAULT_STATE_MACHINE_OPTIONS,
  type StateMachineOptions,
  type RolloutObservation,
  type RolloutEvent,
  type ReconcileDecision,
} from './state-machine.js';

// Analysis
export {
  AnalysisEngine,
  buildMetricChecks,
  evaluateMeasurements,
  type MetricCheck,
  type Measurement,
} from './analysis-engine.js';

// Errors
export {
  RolloutError,
  isRolloutError,
  toRolloutError,
  zodErrorToRolloutError,
  type RolloutErrorKind,
} from './errors.js';
