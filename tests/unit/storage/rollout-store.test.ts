import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createRolloutSpec } from '../../../src/rollout/rollout-spec.js';
import { createInitialState } from '../../../src/rollout/state-machine.js';
import {
  FileRolloutStore,
  InMemoryRolloutStore,
  type RolloutStore,
} from '../../../src/storage/rollout-store.js';
import type { RolloutRecord } from '../../../src/types/rollout.js';

function makeRecord(rolloutId: string): RolloutRecord {
  return {
    schemaVersion: 1,
    spec: createRolloutSpec({
      strategy: 'canary',
      steps: [{ weight: 25 }, { weight: 100 }],
      analysis: { maxErrorRate: 0.01, maxP99LatencyMs: 300, minSampleCount: 100 },
    }),
    state: createInitialState({ rolloutId, stableVersion: 'v1', candidateVersion: 'v2', now: 1_000 }),
  };
}

function sharedBehaviour(createStore: () => RolloutStore): void {
  it('saves and loads a record', async () => {
    const store = createStore();
    const record = makeRecord('r1');

    await store.save(record);

    expect(await store.load('r1')).toEqual(record);
    expect(await store.listActive()).toEqual(['r1']);
  });

  it('returns undefined for unknown ids', async () => {
    expect(await createStore().load('missing')).toBeUndefined();
  });

  it('replaces the stored record on save', async () => {
    const store = createStore();
    const record = makeRecord('r1');
    await store.save(record);

    await store.save({ ...record, state: { ...record.state, phase: 'Progressing' } });

    expect((await store.load('r1'))?.state.phase).toBe('Progressing');
  });

  it('moves archived records out of the active set', async () => {
    const store = createStore();
    const record = makeRecord('r1');
    await store.save(record);
    await store.save(makeRecord('r2'));

    await store.archive({ ...record, state: { ...record.state, phase: 'RolledBack' } });

    expect(await store.listActive()).toEqual(['r2']);
    expect(await store.listArchived()).toEqual(['r1']);
    expect((await store.load('r1'))?.state.phase).toBe('RolledBack');
  });

  it('does not share state with callers', async () => {
    const store = createStore();
    const record = makeRecord('r1');
    await store.save(record);

    record.state.phase = 'Aborting';

    expect((await store.load('r1'))?.state.phase).toBe('Initializing');
  });
}

describe('InMemoryRolloutStore', () => {
  sharedBehaviour(() => new InMemoryRolloutStore());
});

describe('FileRolloutStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'rollout-store-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  sharedBehaviour(() => new FileRolloutStore(dir));

  it('lists nothing before the first write', async () => {
    const store = new FileRolloutStore(join(dir, 'fresh'));

    expect(await store.listActive()).toEqual([]);
    expect(await store.listArchived()).toEqual([]);
  });

  it('leaves no temporary files behind', async () => {
    const store = new FileRolloutStore(dir);

    await store.save(makeRecord('r1'));
    await store.save(makeRecord('r1'));

    expect(await readdir(join(dir, 'active'))).toEqual(['r1.json']);
  });

  it('survives a new store instance over the same directory', async () => {
    const record = makeRecord('r1');
    await new FileRolloutStore(dir).save(record);

    expect(await new FileRolloutStore(dir).load('r1')).toEqual(record);
  });

  it('reports unreadable JSON as StateCorrupted', async () => {
    const store = new FileRolloutStore(dir);
    await store.save(makeRecord('r1'));
    await writeFile(join(dir, 'active', 'r1.json'), '{"schemaVersion": 1,');

    await expect(store.load('r1')).rejects.toMatchObject({
      kind: 'StateCorrupted',
      message: 'Rollout record r1 is not valid JSON',
    });
  });

  it('reports records that fail validation as StateCorrupted', async () => {
    const store = new FileRolloutStore(dir);
    const record = makeRecord('r1');
    await store.save(record);
    const broken = {
      ...record,
      state: { ...record.state, candidateVersion: { ...record.state.candidateVersion, weight: 30 } },
    };
    await writeFile(join(dir, 'active', 'r1.json'), JSON.stringify(broken));

    await expect(store.load('r1')).rejects.toMatchObject({
      kind: 'StateCorrupted',
      message: 'Rollout record r1 is corrupted: state.candidateVersion.weight: Version weights must sum to 100',
    });
  });

  it('rejects ids that would escape the store directory', async () => {
    const store = new FileRolloutStore(dir);

    await expect(store.load('../etc/passwd')).rejects.toMatchObject({ kind: 'NotFound' });
  });
});
