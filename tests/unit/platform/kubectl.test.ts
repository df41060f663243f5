import { describe, it, expect } from 'vitest';
import {
  KubectlTrafficRouter,
  KubectlWorkloadManager,
  type CommandRunner,
  type KubectlOptions,
} from '../../../src/platform/kubectl.js';

const OPTIONS: KubectlOptions = {
  binary: 'kubectl',
  namespace: 'shop',
  deploymentTemplate: 'checkout-{{version}}',
  virtualService: 'checkout',
  serviceHost: 'checkout.shop.svc.cluster.local',
  timeoutMs: 5_000,
};

interface Call {
  file: string;
  args: string[];
}

/**
 * Fake kubectl: records invocations and answers `get` from a table
 */
function fakeKubectl(responses: Record<string, string | Error>): { run: CommandRunner; calls: Call[] } {
  const calls: Call[] = [];
  const run: CommandRunner = async (file, args) => {
    calls.push({ file, args });
    if (args.includes('get')) {
      const resource = args[args.indexOf('get') + 1];
      const response = responses[resource];
      if (response instanceof Error) {
        throw response;
      }
      if (response === undefined) {
        throw new Error(`no fake response for ${resource}`);
      }
      return { stdout: response };
    }
    return { stdout: '' };
  };
  return { run, calls };
}

function virtualService(route: unknown[]): string {
  return JSON.stringify({ spec: { http: [{ route }] } });
}

describe('KubectlWorkloadManager', () => {
  it('scales the deployment named after the version', async () => {
    const { run, calls } = fakeKubectl({});
    const manager = new KubectlWorkloadManager({ ...OPTIONS, context: 'staging' }, run);

    await manager.setReplicas('v2', 3);

    expect(calls).toEqual([
      {
        file: 'kubectl',
        args: ['--namespace', 'shop', '--context', 'staging', 'scale', 'deployment/checkout-v2', '--replicas=3'],
      },
    ]);
  });

  it('rejects invalid replica counts without calling kubectl', async () => {
    const { run, calls } = fakeKubectl({});
    const manager = new KubectlWorkloadManager(OPTIONS, run);

    await expect(manager.setReplicas('v2', -1)).rejects.toThrow('Invalid replica count for v2: -1');
    expect(calls).toEqual([]);
  });

  it('reads ready replicas from the deployment status', async () => {
    const { run } = fakeKubectl({
      'deployment/checkout-v1': JSON.stringify({ status: { readyReplicas: 4, replicas: 4 } }),
      'deployment/checkout-v2': JSON.stringify({ status: {} }),
    });
    const manager = new KubectlWorkloadManager(OPTIONS, run);

    expect(await manager.getReadyReplicas('v1')).toBe(4);
    expect(await manager.getReadyReplicas('v2')).toBe(0);
  });

  it('reports zero ready replicas for a missing deployment', async () => {
    const { run } = fakeKubectl({
      'deployment/checkout-v3': new Error('Error from server (NotFound): deployments.apps "checkout-v3" not found'),
    });
    const manager = new KubectlWorkloadManager(OPTIONS, run);

    expect(await manager.getReadyReplicas('v3')).toBe(0);
  });

  it('propagates other kubectl failures', async () => {
    const { run } = fakeKubectl({ 'deployment/checkout-v1': new Error('Unable to connect to the server') });
    const manager = new KubectlWorkloadManager(OPTIONS, run);

    await expect(manager.getReadyReplicas('v1')).rejects.toThrow('Unable to connect to the server');
  });
});

describe('KubectlTrafficRouter', () => {
  it('patches the weighted route and verifies it', async () => {
    const { run, calls } = fakeKubectl({
      'virtualservice/checkout': virtualService([
        { destination: { host: OPTIONS.serviceHost, subset: 'v1' }, weight: 80 },
        { destination: { host: OPTIONS.serviceHost, subset: 'v2' }, weight: 20 },
      ]),
    });
    const router = new KubectlTrafficRouter(OPTIONS, run);

    await router.setWeights({ v1: 80, v2: 20 });

    expect(calls[0].args).toEqual([
      '--namespace',
      'shop',
      'patch',
      'virtualservice/checkout',
      '--type=json',
      `--patch=${JSON.stringify([
        {
          op: 'replace',
          path: '/spec/http/0/route',
          value: [
            { destination: { host: OPTIONS.serviceHost, subset: 'v1' }, weight: 80 },
            { destination: { host: OPTIONS.serviceHost, subset: 'v2' }, weight: 20 },
          ],
        },
      ])}`,
    ]);
    expect(calls[1].args).toEqual(['--namespace', 'shop', 'get', 'virtualservice/checkout', '--output', 'json']);
  });

  it('fails when the route does not reflect the requested split', async () => {
    const { run } = fakeKubectl({
      'virtualservice/checkout': virtualService([
        { destination: { host: OPTIONS.serviceHost, subset: 'v1' }, weight: 100 },
        { destination: { host: OPTIONS.serviceHost, subset: 'v2' }, weight: 0 },
      ]),
    });
    const router = new KubectlTrafficRouter(OPTIONS, run);

    await expect(router.setWeights({ v1: 50, v2: 50 })).rejects.toThrow(
      'VirtualService checkout reports v1=100, expected 50'
    );
  });

  it('rejects weights that do not sum to 100 before patching', async () => {
    const { run, calls } = fakeKubectl({});
    const router = new KubectlTrafficRouter(OPTIONS, run);

    await expect(router.setWeights({ v1: 60, v2: 30 })).rejects.toThrow('Traffic weights must sum to 100, got 90');
    expect(calls).toEqual([]);
  });

  it('treats a lone unweighted destination as receiving all traffic', async () => {
    const { run } = fakeKubectl({
      'virtualservice/checkout': virtualService([{ destination: { host: OPTIONS.serviceHost, subset: 'v1' } }]),
    });
    const router = new KubectlTrafficRouter(OPTIONS, run);

    expect(await router.readWeights()).toEqual({ v1: 100 });
  });

  it('rejects a VirtualService without http routes', async () => {
    const { run } = fakeKubectl({ 'virtualservice/checkout': JSON.stringify({ spec: { http: [] } }) });
    const router = new KubectlTrafficRouter(OPTIONS, run);

    await expect(router.readWeights()).rejects.toThrow(
      'Unexpected VirtualService checkout: VirtualService has no http routes'
    );
  });
});
