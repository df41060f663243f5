/**
 * Controller Startup Script
 *
 * Launches the rollout controller against Kubernetes (kubectl + Istio) and
 * Prometheus, persisting rollouts under the configured state directory.
 *
 * Usage:
 *   ROLLOUT_ENV=production node dist/scripts/start-controller.js [config.yaml]
 */

import { resolve } from 'node:path';
import { initializeConfig, getControllerConfig, getKubectlOptions, getPrometheusOptions } from '../src/config/loader.js';
import { KubectlTrafficRouter, KubectlWorkloadManager, execaRunner } from '../src/platform/kubectl.js';
import { PrometheusMetricsProvider } from '../src/platform/prometheus-metrics-provider.js';
import { RolloutController } from '../src/rollout/rollout-controller.js';
import { FileRolloutStore } from '../src/storage/rollout-store.js';
import { TelemetryManager } from '../src/telemetry/otel.js';
import { createLogger } from '../src/utils/logger.js';

async function main(): Promise<void> {
  const config = initializeConfig(process.argv[2]);
  const logger = createLogger({ name: 'rollout-controller', level: config.logging.level });

  logger.info('Controller starting...');

  // Telemetry must be registered before the controller creates its instruments
  const telemetry = new TelemetryManager({
    enabled: config.telemetry.enabled,
    serviceName: config.telemetry.service_name,
    prometheusPort: config.telemetry.prometheus_port,
    logger,
  });
  if (config.telemetry.enabled) {
    await telemetry.start();
  }

  const kubectl = getKubectlOptions(config);
  const stateDir = resolve(config.controller.state_dir);

  const controller = new RolloutController({
    store: new FileRolloutStore(stateDir, logger),
    workloadManager: new KubectlWorkloadManager(kubectl, execaRunner, logger),
    trafficRouter: new KubectlTrafficRouter(kubectl, execaRunner, logger),
    metricsProvider: new PrometheusMetricsProvider({ ...getPrometheusOptions(config), logger }),
    config: getControllerConfig(config),
    logger,
    metrics: telemetry.isStarted() ? telemetry.metrics : undefined,
  });

  controller.on('alert', (rolloutId, error) => {
    logger.fatal({ rolloutId, error: error.toJSON() }, 'Rollout requires operator attention');
  });

  let isShuttingDown = false;

  const shutdown = async (signal: string): Promise<void> => {
    if (isShuttingDown) {
      logger.warn('Already shutting down, please wait...');
      return;
    }

    isShuttingDown = true;
    logger.info({ signal }, 'Shutting down gracefully...');

    try {
      await controller.stop();
      await telemetry.shutdown();
      logger.info('Controller stopped successfully');
      process.exit(0);
    } catch (error) {
      logger.error({ error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  controller.start();

  const active = await controller.listRollouts();
  logger.info(
    {
      stateDir,
      namespace: kubectl.namespace,
      virtualService: kubectl.virtualService,
      activeRollouts: active.length,
    },
    'Controller is ready'
  );
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
