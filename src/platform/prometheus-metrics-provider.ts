/**
 * Prometheus Metrics Provider
 *
 * Each metric name maps to two PromQL templates: one for the value and one
 * for the number of samples behind it. Templates may reference
 * `{{version}}` and `{{window}}` (the window length as a duration such as
 * `300s`); both are evaluated as instant queries at the window's end.
 *
 * @module platform/prometheus-metrics-provider
 */

import type { Logger } from 'pino';
import { z } from 'zod';
import type { AnalysisWindow } from '../types/rollout.js';
import type { MetricSample, MetricsProvider } from './types.js';

export interface PrometheusQueryTemplate {
  value: string;
  samples: string;
}

export interface PrometheusMetricsProviderOptions {
  /** Base URL of the Prometheus server */
  url: string;
  timeoutMs: number;
  queries: Record<string, PrometheusQueryTemplate>;
  logger?: Logger;
  /** Overrides the global fetch (tests) */
  fetch?: typeof fetch;
}

const InstantQueryResponseSchema = z.discriminatedUnion('status', [
  z.object({
    status: z.literal('success'),
    data: z.object({
      resultType: z.string(),
      result: z.array(
        z.object({
          metric: z.record(z.string()).optional(),
          value: z.tuple([z.number(), z.string()]),
        })
      ),
    }),
  }),
  z.object({
    status: z.literal('error'),
    errorType: z.string().optional(),
    error: z.string(),
  }),
]);

/**
 * Substitute `{{version}}` and `{{window}}` in a PromQL template
 */
export function renderQuery(template: string, version: string, window: AnalysisWindow): string {
  const seconds = Math.max(1, Math.ceil((window.endMs - window.startMs) / 1000));
  return template.split('{{version}}').join(version).split('{{window}}').join(`${seconds}s`);
}

export class PrometheusMetricsProvider implements MetricsProvider {
  private readonly options: PrometheusMetricsProviderOptions;
  private readonly fetchImpl: typeof fetch;
  private readonly logger?: Logger;

  constructor(options: PrometheusMetricsProviderOptions) {
    this.options = options;
    this.fetchImpl = options.fetch ?? fetch;
    this.logger = options.logger;
  }

  async query(version: string, metricName: string, window: AnalysisWindow): Promise<MetricSample> {
    const template = this.options.queries[metricName];
    if (!template) {
      throw new Error(`No Prometheus query configured for metric: ${metricName}`);
    }

    const evaluationTime = window.endMs / 1000;
    const [value, sampleCount] = await Promise.all([
      this.instantQuery(renderQuery(template.value, version, window), evaluationTime),
      this.instantQuery(renderQuery(template.samples, version, window), evaluationTime),
    ]);

    this.logger?.debug({ version, metric: metricName, value, sampleCount }, 'Metric sampled');

    // An empty result vector means no traffic reached the version yet
    return {
      value: value ?? Number.NaN,
      sampleCount: sampleCount ?? 0,
    };
  }

  /**
   * Run an instant query and return the first sample, if any
   */
  private async instantQuery(query: string, time: number): Promise<number | undefined> {
    // Relative to a slash-terminated base so a path prefix such as /prometheus is kept
    const base = this.options.url.endsWith('/') ? this.options.url : `${this.options.url}/`;
    const url = new URL('api/v1/query', base);
    url.searchParams.set('query', query);
    url.searchParams.set('time', time.toFixed(3));

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.options.timeoutMs);

    let body: unknown;
    try {
      const response = await this.fetchImpl(url, {
        method: 'GET',
        headers: { Accept: 'application/json' },
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new Error(`Prometheus returned HTTP ${response.status} for query: ${query}`);
      }

      body = await response.json();
    } finally {
      clearTimeout(timeoutId);
    }

    const parsed = InstantQueryResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new Error(`Unexpected Prometheus response: ${parsed.error.issues[0]?.message}`);
    }

    if (parsed.data.status === 'error') {
      throw new Error(`Prometheus query failed: ${parsed.data.error}`);
    }

    const first = parsed.data.data.result[0];
    return first ? Number.parseFloat(first.value[1]) : undefined;
  }
}
