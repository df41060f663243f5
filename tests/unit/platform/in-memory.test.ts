import { describe, it, expect } from 'vitest';
import {
  InMemoryTrafficRouter,
  InMemoryWorkloadManager,
  StaticMetricsProvider,
} from '../../../src/platform/in-memory.js';

describe('InMemoryWorkloadManager', () => {
  it('reports initial replicas as ready', async () => {
    const manager = new InMemoryWorkloadManager({ initial: { v1: 3 } });

    expect(await manager.getReadyReplicas('v1')).toBe(3);
    expect(await manager.getReadyReplicas('v2')).toBe(0);
  });

  it('converges after the configured number of polls', async () => {
    const manager = new InMemoryWorkloadManager({ readinessDelayPolls: 2 });

    await manager.setReplicas('v2', 2);

    expect(await manager.getReadyReplicas('v2')).toBe(0);
    expect(await manager.getReadyReplicas('v2')).toBe(2);
  });

  it('holds readiness until released', async () => {
    const manager = new InMemoryWorkloadManager();
    manager.holdReadiness('v2');

    await manager.setReplicas('v2', 2);
    expect(await manager.getReadyReplicas('v2')).toBe(0);

    manager.holdReadiness('v2', false);
    expect(await manager.getReadyReplicas('v2')).toBe(2);
  });

  it('injects failures and records successful calls only', async () => {
    const manager = new InMemoryWorkloadManager();
    manager.failNext(1);

    await expect(manager.setReplicas('v2', 1)).rejects.toThrow('Injected scaling failure for v2');
    await manager.setReplicas('v2', 1);

    expect(manager.calls).toEqual([{ version: 'v2', count: 1 }]);
    expect(manager.desiredReplicas('v2')).toBe(1);
  });
});

describe('InMemoryTrafficRouter', () => {
  it('records distinct splits only', async () => {
    const router = new InMemoryTrafficRouter();

    await router.setWeights({ v1: 100, v2: 0 });
    await router.setWeights({ v1: 100, v2: 0 });
    await router.setWeights({ v1: 70, v2: 30 });

    expect(router.history).toEqual([
      { v1: 100, v2: 0 },
      { v1: 70, v2: 30 },
    ]);
    expect(router.getWeights()).toEqual({ v1: 70, v2: 30 });
  });

  it('rejects invalid splits', async () => {
    const router = new InMemoryTrafficRouter();

    await expect(router.setWeights({ v1: 70, v2: 20 })).rejects.toThrow('Traffic weights must sum to 100, got 90');
    await expect(router.setWeights({ v1: 99.5, v2: 0.5 })).rejects.toThrow('Invalid weight for v1: 99.5');
    expect(router.history).toEqual([]);
  });
});

describe('StaticMetricsProvider', () => {
  it('prefers version-specific samples', async () => {
    const provider = new StaticMetricsProvider({ error_rate: { value: 0.001, sampleCount: 10 } });
    provider.set('error_rate', { value: 0.2, sampleCount: 10 }, 'v2');
    const window = { startMs: 0, endMs: 1_000 };

    expect(await provider.query('v2', 'error_rate', window)).toEqual({ value: 0.2, sampleCount: 10 });
    expect(await provider.query('v1', 'error_rate', window)).toEqual({ value: 0.001, sampleCount: 10 });
    expect(provider.queries).toHaveLength(2);
  });
});
