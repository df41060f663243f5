/**
 * Controller Configuration Schemas
 *
 * Zod schemas for validating config/controller.yaml, with cross-field
 * validation on retry settings.
 *
 * @module schemas/config
 */

import { z } from 'zod';
import { LogLevel, NonEmptyString } from './common.js';

/**
 * Retry Configuration (shared by apply and abort paths)
 */
export const RetryConfigSchema = z
  .object({
    max_attempts: z.number().int().min(1, 'must be >= 1'),
    initial_delay_ms: z.number().int().min(0, 'must be >= 0'),
    max_delay_ms: z.number().int().positive('must be positive'),
    backoff_multiplier: z.number().min(1, 'must be >= 1'),
    jitter: z.number().min(0).max(1).optional(),
  })
  .refine((data) => data.max_delay_ms >= data.initial_delay_ms, {
    message: 'must be >= initial_delay_ms',
    path: ['max_delay_ms'],
  });

/**
 * Controller Loop Configuration
 */
export const ControllerLoopConfigSchema = z.object({
  tick_interval_ms: z.number().int().positive('Tick interval must be positive'),
  max_concurrent_reconciles: z.number().int().min(1, 'must be >= 1'),
  state_dir: z.string().min(1, 'State dir cannot be empty'),
});

/**
 * Candidate Initialization Configuration
 */
export const InitializationConfigSchema = z.object({
  min_ready_replicas: z.number().int().min(0, 'must be >= 0'),
  readiness_timeout_ms: z.number().int().positive('must be positive'),
});

/**
 * Analysis Configuration
 */
export const AnalysisConfigSchema = z.object({
  retry_interval_ms: z.number().int().positive('must be positive'),
  max_inconclusive_retries: z.number().int().min(0, 'must be >= 0'),
  default_bake_duration_ms: z.number().int().min(0, 'must be >= 0'),
});

/**
 * Apply Configuration
 */
export const ApplyConfigSchema = z.object({
  max_backoff_ms: z.number().int().positive('must be positive'),
  retry: RetryConfigSchema,
});

/**
 * Abort Configuration
 */
export const AbortConfigSchema = z.object({
  retry: RetryConfigSchema,
});

/**
 * Kubectl Platform Configuration
 */
export const KubectlConfigSchema = z.object({
  binary: NonEmptyString,
  namespace: NonEmptyString,
  context: z.string().optional(),
  deployment_template: z
    .string()
    .refine((value) => value.includes('{{version}}'), 'must contain {{version}}'),
  virtual_service: NonEmptyString,
  service_host: NonEmptyString,
  timeout_ms: z.number().int().positive('must be positive'),
});

const PrometheusQuerySchema = z.object({
  value: NonEmptyString,
  samples: NonEmptyString,
});

/**
 * Prometheus Metrics Provider Configuration
 */
export const PrometheusConfigSchema = z.object({
  url: z.string().url('Prometheus url must be a valid URL'),
  timeout_ms: z.number().int().positive('must be positive'),
  queries: z.record(PrometheusQuerySchema),
});

export const PlatformConfigSchema = z.object({
  kubectl: KubectlConfigSchema,
  prometheus: PrometheusConfigSchema,
});

/**
 * Telemetry Configuration
 */
export const TelemetryConfigSchema = z.object({
  enabled: z.boolean(),
  service_name: z.string().min(1, 'Service name cannot be empty'),
  prometheus_port: z
    .number()
    .int()
    .min(1024, 'Prometheus port must be >= 1024')
    .max(65535, 'Prometheus port must be <= 65535'),
});

export const LoggingConfigSchema = z.object({
  level: LogLevel,
});

/**
 * Complete Controller Configuration
 */
export const ControllerRuntimeConfigSchema = z.object({
  controller: ControllerLoopConfigSchema,
  initialization: InitializationConfigSchema,
  analysis: AnalysisConfigSchema,
  apply: ApplyConfigSchema,
  abort: AbortConfigSchema,
  platform: PlatformConfigSchema,
  telemetry: TelemetryConfigSchema,
  logging: LoggingConfigSchema,
});

export type Config = z.infer<typeof ControllerRuntimeConfigSchema>;
export type RetrySettings = z.infer<typeof RetryConfigSchema>;
