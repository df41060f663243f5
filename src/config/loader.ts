/**
 * Configuration Loader
 *
 * Loads configuration from YAML files with environment-specific overrides
 */

import { readFileSync, existsSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import * as yaml from 'js-yaml';
import type { KubectlOptions } from '../platform/kubectl.js';
import type { PrometheusQueryTemplate } from '../platform/prometheus-metrics-provider.js';
import type { RolloutControllerConfig } from '../rollout/rollout-controller.js';
import {
  ControllerRuntimeConfigSchema,
  type Config,
  type RetrySettings,
} from '../types/schemas/config.js';

export type { Config } from '../types/schemas/config.js';

export type Environment = 'production' | 'development' | 'test';

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects (arrays and scalars from source replace target)
 */
export function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const output: PlainObject = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = output[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      output[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      output[key] = sourceValue;
    }
  }

  return output;
}

/**
 * Find the package root directory by looking for package.json
 */
function findPackageRoot(): string {
  let currentDir = dirname(fileURLToPath(import.meta.url));

  while (currentDir !== dirname(currentDir)) {
    if (existsSync(join(currentDir, 'package.json'))) {
      return currentDir;
    }
    currentDir = dirname(currentDir);
  }

  return process.cwd();
}

export function defaultConfigPath(): string {
  return join(findPackageRoot(), 'config', 'controller.yaml');
}

function resolveEnvironment(environment?: Environment): Environment {
  const env = environment ?? process.env.ROLLOUT_ENV ?? process.env.NODE_ENV;
  return env === 'production' || env === 'test' ? env : 'development';
}

/**
 * Read a YAML file and apply the overrides for one environment
 *
 * The result is not validated yet.
 */
export function loadRawConfig(configPath?: string, environment?: Environment): PlainObject {
  const finalPath = configPath || defaultConfigPath();

  let fileContents: string;
  try {
    fileContents = readFileSync(finalPath, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new Error(
        `Configuration file not found: ${finalPath}. ` +
          `Please ensure config/controller.yaml exists in the project root.`
      );
    }
    throw new Error(`Failed to load configuration: ${String(error)}`);
  }

  let document: unknown;
  try {
    document = yaml.load(fileContents);
  } catch (error) {
    throw new Error(`Failed to parse configuration ${finalPath}: ${String(error)}`);
  }

  if (!isPlainObject(document)) {
    throw new Error(`Configuration ${finalPath} must be a YAML mapping`);
  }

  const { environments, ...base } = document;
  const env = resolveEnvironment(environment);
  const overrides = isPlainObject(environments) ? environments[env] : undefined;

  return isPlainObject(overrides) ? deepMerge(base, overrides) : base;
}

/**
 * Validate configuration values
 *
 * @throws {Error} listing every invalid field
 */
export function validateConfig(config: unknown): Config {
  const parseResult = ControllerRuntimeConfigSchema.safeParse(config);
  if (!parseResult.success) {
    const errors = parseResult.error.issues.map((issue) => {
      const field = issue.path.length > 0 ? issue.path.join('.') : 'root';
      return `${field} ${issue.message}`;
    });

    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
  }
  return parseResult.data;
}

/**
 * Load and validate configuration from YAML file
 */
export function loadConfig(configPath?: string, environment?: Environment): Config {
  return validateConfig(loadRawConfig(configPath, environment));
}

/**
 * Global configuration instance
 */
let globalConfig: Config | null = null;

/**
 * Initialize global configuration
 */
export function initializeConfig(configPath?: string, environment?: Environment): Config {
  globalConfig = loadConfig(configPath, environment);
  return globalConfig;
}

/**
 * Get global configuration
 */
export function getConfig(): Config {
  if (!globalConfig) {
    globalConfig = initializeConfig();
  }
  return globalConfig;
}

/**
 * Reset global configuration (for testing)
 */
export function resetConfig(): void {
  globalConfig = null;
}

function toRetrySettings(retry: RetrySettings): RolloutControllerConfig['applyRetry'] {
  return {
    maxAttempts: retry.max_attempts,
    initialDelayMs: retry.initial_delay_ms,
    maxDelayMs: retry.max_delay_ms,
    backoffMultiplier: retry.backoff_multiplier,
    jitter: retry.jitter,
  };
}

/**
 * Convert YAML controller config (snake_case) to RolloutControllerConfig (camelCase)
 */
export function getControllerConfig(config: Config = getConfig()): RolloutControllerConfig {
  return {
    tickIntervalMs: config.controller.tick_interval_ms,
    maxConcurrentReconciles: config.controller.max_concurrent_reconciles,
    minReadyReplicas: config.initialization.min_ready_replicas,
    readinessTimeoutMs: config.initialization.readiness_timeout_ms,
    analysisRetryIntervalMs: config.analysis.retry_interval_ms,
    maxInconclusiveRetries: config.analysis.max_inconclusive_retries,
    defaultBakeDurationMs: config.analysis.default_bake_duration_ms,
    applyRetry: toRetrySettings(config.apply.retry),
    abortRetry: toRetrySettings(config.abort.retry),
    applyMaxBackoffMs: config.apply.max_backoff_ms,
  };
}

export function getKubectlOptions(config: Config = getConfig()): KubectlOptions {
  const kubectl = config.platform.kubectl;
  return {
    binary: kubectl.binary,
    namespace: kubectl.namespace,
    context: kubectl.context,
    deploymentTemplate: kubectl.deployment_template,
    virtualService: kubectl.virtual_service,
    serviceHost: kubectl.service_host,
    timeoutMs: kubectl.timeout_ms,
  };
}

export function getPrometheusOptions(config: Config = getConfig()): {
  url: string;
  timeoutMs: number;
  queries: Record<string, PrometheusQueryTemplate>;
} {
  const prometheus = config.platform.prometheus;
  return {
    url: prometheus.url,
    timeoutMs: prometheus.timeout_ms,
    queries: prometheus.queries,
  };
}
