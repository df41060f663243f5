/**
 * OpenTelemetry infrastructure for the rollout controller.
 *
 * Provides the controller's metric instruments and a manager that wires
 * them to a Prometheus scrape endpoint.
 *
 * @module telemetry/otel
 */

import { metrics, type Meter, type Counter, type Histogram } from '@opentelemetry/api';
import { MeterProvider } from '@opentelemetry/sdk-metrics';
import { PrometheusExporter } from '@opentelemetry/exporter-prometheus';
import type { Logger } from 'pino';

export const DEFAULT_SERVICE_NAME = 'progressive-rollout';

/**
 * Configuration options for OpenTelemetry metrics.
 */
export interface TelemetryConfig {
  /**
   * Enable metrics collection (default: false).
   */
  enabled: boolean;
  /**
   * Service name for metrics (default: 'progressive-rollout').
   */
  serviceName?: string;
  /**
   * Prometheus exporter port (default: 9464).
   */
  prometheusPort?: number;
  /**
   * Optional logger for telemetry events.
   */
  logger?: Logger;
}

/**
 * Metrics recorded by the rollout controller.
 */
export interface RolloutMetrics {
  // Lifecycle
  rolloutsStarted: Counter;
  rolloutsCompleted: Counter;
  phaseTransitions: Counter;

  // Reconcile loop
  reconcileDuration: Histogram;
  applyFailures: Counter;

  // Analysis
  analysisVerdicts: Counter;
}

/**
 * Create the controller's instruments on a meter.
 *
 * Without a meter the global one is used; it is a no-op until a provider
 * has been registered (see TelemetryManager.start()).
 */
export function createRolloutMetrics(meter: Meter = metrics.getMeter(DEFAULT_SERVICE_NAME)): RolloutMetrics {
  return {
    rolloutsStarted: meter.createCounter('rollout_started_total', {
      description: 'Total number of rollouts submitted',
      unit: '1',
    }),
    rolloutsCompleted: meter.createCounter('rollout_completed_total', {
      description: 'Total number of rollouts reaching a terminal phase',
      unit: '1',
    }),
    phaseTransitions: meter.createCounter('rollout_phase_transitions_total', {
      description: 'Total number of rollout phase transitions',
      unit: '1',
    }),
    reconcileDuration: meter.createHistogram('rollout_reconcile_duration_ms', {
      description: 'Time taken to reconcile one rollout',
      unit: 'ms',
    }),
    applyFailures: meter.createCounter('rollout_apply_failures_total', {
      description: 'Total number of failed platform target applications',
      unit: '1',
    }),
    analysisVerdicts: meter.createCounter('rollout_analysis_verdicts_total', {
      description: 'Total number of analysis verdicts by outcome',
      unit: '1',
    }),
  };
}

/**
 * OpenTelemetry telemetry manager.
 *
 * @example
 * ```typescript
 * const telemetry = new TelemetryManager({ enabled: true, prometheusPort: 9464 });
 * await telemetry.start();
 *
 * const controller = new RolloutController({ ...deps, metrics: telemetry.metrics });
 *
 * await telemetry.shutdown();
 * ```
 */
export class TelemetryManager {
  private readonly config: Required<Omit<TelemetryConfig, 'logger'>> & { logger?: Logger };
  private meterProvider: MeterProvider | null = null;
  private prometheusExporter: PrometheusExporter | null = null;
  private _metrics: RolloutMetrics | null = null;
  private started = false;

  constructor(config: TelemetryConfig) {
    this.config = {
      enabled: config.enabled,
      serviceName: config.serviceName || DEFAULT_SERVICE_NAME,
      prometheusPort: config.prometheusPort ?? 9464,
      logger: config.logger,
    };
  }

  /**
   * Get the initialized metrics. Throws if not started.
   */
  public get metrics(): RolloutMetrics {
    if (!this._metrics) {
      throw new Error('TelemetryManager not started. Call start() first.');
    }
    return this._metrics;
  }

  /**
   * Start the Prometheus exporter and register the global meter provider.
   *
   * @throws {Error} if telemetry is disabled.
   */
  public async start(): Promise<void> {
    if (!this.config.enabled) {
      throw new Error('Telemetry is disabled. Set enabled: true in config.');
    }

    if (this.started) {
      this.config.logger?.warn('TelemetryManager already started');
      return;
    }

    try {
      // The exporter is a pull-based reader serving /metrics
      this.prometheusExporter = new PrometheusExporter({
        port: this.config.prometheusPort,
      });

      this.meterProvider = new MeterProvider({
        readers: [this.prometheusExporter],
      });

      metrics.setGlobalMeterProvider(this.meterProvider);

      this._metrics = createRolloutMetrics(metrics.getMeter(this.config.serviceName));
      this.started = true;

      this.config.logger?.info(
        {
          serviceName: this.config.serviceName,
          endpoint: `http://localhost:${this.config.prometheusPort}/metrics`,
        },
        'OpenTelemetry metrics started'
      );
    } catch (error) {
      this.config.logger?.error({ error }, 'Failed to start telemetry');
      throw error;
    }
  }

  /**
   * Shutdown the telemetry manager and stop serving metrics.
   */
  public async shutdown(): Promise<void> {
    if (!this.started) {
      return;
    }

    try {
      await this.meterProvider?.shutdown();
      await this.prometheusExporter?.shutdown();

      metrics.disable();
      this.started = false;
      this._metrics = null;
      this.meterProvider = null;
      this.prometheusExporter = null;

      this.config.logger?.info('OpenTelemetry metrics shut down');
    } catch (error) {
      this.config.logger?.error({ error }, 'Failed to shutdown telemetry');
      throw error;
    }
  }

  public isStarted(): boolean {
    return this.started;
  }
}
