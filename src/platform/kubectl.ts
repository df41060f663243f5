/**
 * Kubernetes adapters driven through kubectl
 *
 * - KubectlWorkloadManager scales one Deployment per version
 * - KubectlTrafficRouter rewrites the weighted route of an Istio
 *   VirtualService (one subset per version) and reads it back before
 *   resolving, so a resolved setWeights() means the split is active
 *
 * @module platform/kubectl
 */

import { execa } from 'execa';
import type { Logger } from 'pino';
import { z } from 'zod';
import { assertValidWeights, type TrafficRouter, type WorkloadManager } from './types.js';

export interface KubectlOptions {
  binary: string;
  namespace: string;
  context?: string;
  /** Deployment name for a version; `{{version}}` is substituted */
  deploymentTemplate: string;
  virtualService: string;
  /** Destination host of the weighted route */
  serviceHost: string;
  timeoutMs: number;
}

export interface CommandResult {
  stdout: string;
}

/**
 * Runs a command and resolves with its stdout, rejecting on a non-zero exit
 */
export type CommandRunner = (
  file: string,
  args: string[],
  options: { timeoutMs: number }
) => Promise<CommandResult>;

export const execaRunner: CommandRunner = async (file, args, options) => {
  const { stdout } = await execa(file, args, { timeout: options.timeoutMs });
  return { stdout };
};

const DeploymentStatusSchema = z.object({
  status: z
    .object({
      readyReplicas: z.number().int().min(0).optional(),
    })
    .default({}),
});

const RouteDestinationSchema = z.object({
  destination: z.object({
    host: z.string(),
    subset: z.string().optional(),
  }),
  weight: z.number().optional(),
});

const VirtualServiceSchema = z.object({
  spec: z.object({
    http: z
      .array(
        z.object({
          route: z.array(RouteDestinationSchema).default([]),
        })
      )
      .min(1, 'VirtualService has no http routes'),
  }),
});

function isNotFound(error: unknown): boolean {
  return error instanceof Error && /NotFound|not found/.test(error.message);
}

/**
 * Base for both adapters: common kubectl flags and invocation
 */
class KubectlClient {
  protected readonly options: KubectlOptions;
  protected readonly logger?: Logger;
  private readonly run: CommandRunner;

  constructor(options: KubectlOptions, run: CommandRunner = execaRunner, logger?: Logger) {
    this.options = options;
    this.run = run;
    this.logger = logger;
  }

  protected async kubectl(args: string[]): Promise<string> {
    const globalArgs = ['--namespace', this.options.namespace];
    if (this.options.context) {
      globalArgs.push('--context', this.options.context);
    }

    const fullArgs = [...globalArgs, ...args];
    this.logger?.debug({ args: fullArgs }, 'Running kubectl');

    const { stdout } = await this.run(this.options.binary, fullArgs, {
      timeoutMs: this.options.timeoutMs,
    });
    return stdout;
  }

  protected async getJson(resource: string): Promise<unknown> {
    const stdout = await this.kubectl(['get', resource, '--output', 'json']);
    return JSON.parse(stdout);
  }
}

/**
 * Scales Deployments named after each version
 */
export class KubectlWorkloadManager extends KubectlClient implements WorkloadManager {
  deploymentName(version: string): string {
    return this.options.deploymentTemplate.split('{{version}}').join(version);
  }

  async setReplicas(version: string, count: number): Promise<void> {
    if (!Number.isInteger(count) || count < 0) {
      throw new Error(`Invalid replica count for ${version}: ${count}`);
    }

    await this.kubectl(['scale', `deployment/${this.deploymentName(version)}`, `--replicas=${count}`]);
    this.logger?.info({ version, count }, 'Deployment scaled');
  }

  async getReadyReplicas(version: string): Promise<number> {
    let raw: unknown;
    try {
      raw = await this.getJson(`deployment/${this.deploymentName(version)}`);
    } catch (error) {
      if (isNotFound(error)) {
        return 0;
      }
      throw error;
    }

    const parsed = DeploymentStatusSchema.safeParse(raw);
    if (!parsed.success) {
      throw new Error(`Unexpected deployment status for ${version}: ${parsed.error.issues[0]?.message}`);
    }
    return parsed.data.status.readyReplicas ?? 0;
  }
}

/**
 * Sets weighted routes on an Istio VirtualService
 */
export class KubectlTrafficRouter extends KubectlClient implements TrafficRouter {
  async setWeights(weights: Record<string, number>): Promise<void> {
    assertValidWeights(weights);

    const route = Object.entries(weights).map(([version, weight]) => ({
      destination: { host: this.options.serviceHost, subset: version },
      weight,
    }));
    const patch = [{ op: 'replace', path: '/spec/http/0/route', value: route }];

    await this.kubectl([
      'patch',
      `virtualservice/${this.options.virtualService}`,
      '--type=json',
      `--patch=${JSON.stringify(patch)}`,
    ]);

    const active = await this.readWeights();
    for (const [version, weight] of Object.entries(weights)) {
      if ((active[version] ?? 0) !== weight) {
        throw new Error(
          `VirtualService ${this.options.virtualService} reports ${version}=${active[version] ?? 0}, expected ${weight}`
        );
      }
    }

    this.logger?.info({ virtualService: this.options.virtualService, weights }, 'Traffic split applied');
  }

  /**
   * Weights currently configured on the first http route, keyed by subset
   */
  async readWeights(): Promise<Record<string, number>> {
    const parsed = VirtualServiceSchema.safeParse(
      await this.getJson(`virtualservice/${this.options.virtualService}`)
    );
    if (!parsed.success) {
      throw new Error(
        `Unexpected VirtualService ${this.options.virtualService}: ${parsed.error.issues[0]?.message}`
      );
    }

    const weights: Record<string, number> = {};
    const route = parsed.data.spec.http[0].route;
    for (const entry of route) {
      if (entry.destination.subset !== undefined) {
        // A lone destination without a weight receives all traffic
        weights[entry.destination.subset] = entry.weight ?? (route.length === 1 ? 100 : 0);
      }
    }
    return weights;
  }
}
