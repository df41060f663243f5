/**
 * Rollout Store - Durable rollout records
 *
 * Records survive controller restarts. Active rollouts live under
 * `<dir>/active/<id>.json`; terminal ones are moved to `<dir>/archive/`.
 * Writes go to a temp file first and are renamed into place, so a crash
 * never leaves a half-written record. Records are validated on load.
 *
 * @module storage/rollout-store
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import { RolloutError } from '../rollout/errors.js';
import { RolloutRecordSchema } from '../types/schemas/rollout.js';
import type { RolloutRecord } from '../types/rollout.js';

/**
 * Persistence contract used by the controller
 */
export interface RolloutStore {
  /** Ids of rollouts not yet archived */
  listActive(): Promise<string[]>;

  /** Ids of archived rollouts */
  listArchived(): Promise<string[]>;

  /**
   * Load an active or archived record
   *
   * @throws {RolloutError} StateCorrupted if the stored record fails validation
   */
  load(rolloutId: string): Promise<RolloutRecord | undefined>;

  /** Create or replace an active record */
  save(record: RolloutRecord): Promise<void>;

  /** Persist a terminal record into the archive and drop it from the active set */
  archive(record: RolloutRecord): Promise<void>;
}

const ID_PATTERN = /^[A-Za-z0-9._-]+$/;

function assertSafeId(rolloutId: string): void {
  if (!ID_PATTERN.test(rolloutId) || rolloutId === '.' || rolloutId === '..') {
    throw new RolloutError('NotFound', `Invalid rollout id: ${rolloutId}`, { rolloutId });
  }
}

function parseRecord(rolloutId: string, raw: unknown): RolloutRecord {
  const parsed = RolloutRecordSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new RolloutError(
      'StateCorrupted',
      `Rollout record ${rolloutId} is corrupted: ${issue?.path.join('.') || 'record'}: ${issue?.message ?? 'invalid'}`,
      { rolloutId, issues: parsed.error.issues.length }
    );
  }
  return parsed.data;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * File-backed store
 */
export class FileRolloutStore implements RolloutStore {
  private readonly activeDir: string;
  private readonly archiveDir: string;
  private readonly logger?: Logger;

  constructor(baseDir: string, logger?: Logger) {
    this.activeDir = path.join(baseDir, 'active');
    this.archiveDir = path.join(baseDir, 'archive');
    this.logger = logger;
  }

  async listActive(): Promise<string[]> {
    return this.listIds(this.activeDir);
  }

  async listArchived(): Promise<string[]> {
    return this.listIds(this.archiveDir);
  }

  async load(rolloutId: string): Promise<RolloutRecord | undefined> {
    assertSafeId(rolloutId);

    const active = await this.readRecord(this.activeDir, rolloutId);
    if (active !== undefined) {
      return active;
    }
    return this.readRecord(this.archiveDir, rolloutId);
  }

  async save(record: RolloutRecord): Promise<void> {
    assertSafeId(record.state.rolloutId);
    await this.writeAtomic(this.activeDir, record);
  }

  async archive(record: RolloutRecord): Promise<void> {
    const rolloutId = record.state.rolloutId;
    assertSafeId(rolloutId);

    await this.writeAtomic(this.archiveDir, record);
    await fs.rm(this.filePath(this.activeDir, rolloutId), { force: true });

    this.logger?.debug({ rolloutId, phase: record.state.phase }, 'Rollout record archived');
  }

  private filePath(dir: string, rolloutId: string): string {
    return path.join(dir, `${rolloutId}.json`);
  }

  private async listIds(dir: string): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(dir);
    } catch (error) {
      if (isMissingFile(error)) {
        return [];
      }
      throw error;
    }

    return entries
      .filter((name) => name.endsWith('.json'))
      .map((name) => name.slice(0, -'.json'.length))
      .sort();
  }

  private async readRecord(dir: string, rolloutId: string): Promise<RolloutRecord | undefined> {
    let data: string;
    try {
      data = await fs.readFile(this.filePath(dir, rolloutId), 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return undefined;
      }
      throw error;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(data);
    } catch (error) {
      throw new RolloutError(
        'StateCorrupted',
        `Rollout record ${rolloutId} is not valid JSON`,
        { rolloutId },
        error instanceof Error ? error : undefined
      );
    }

    return parseRecord(rolloutId, raw);
  }

  private async writeAtomic(dir: string, record: RolloutRecord): Promise<void> {
    await fs.mkdir(dir, { recursive: true });

    const target = this.filePath(dir, record.state.rolloutId);
    const temp = `${target}.${randomUUID()}.tmp`;

    try {
      await fs.writeFile(temp, JSON.stringify(record, null, 2), 'utf-8');
      await fs.rename(temp, target);
    } catch (error) {
      await fs.rm(temp, { force: true });
      throw error;
    }
  }
}

/**
 * In-process store for tests and embedding
 */
export class InMemoryRolloutStore implements RolloutStore {
  private readonly active = new Map<string, RolloutRecord>();
  private readonly archived = new Map<string, RolloutRecord>();

  async listActive(): Promise<string[]> {
    return [...this.active.keys()].sort();
  }

  async listArchived(): Promise<string[]> {
    return [...this.archived.keys()].sort();
  }

  async load(rolloutId: string): Promise<RolloutRecord | undefined> {
    const record = this.active.get(rolloutId) ?? this.archived.get(rolloutId);
    return record ? parseRecord(rolloutId, structuredClone(record)) : undefined;
  }

  async save(record: RolloutRecord): Promise<void> {
    this.active.set(record.state.rolloutId, structuredClone(record));
  }

  async archive(record: RolloutRecord): Promise<void> {
    this.archived.set(record.state.rolloutId, structuredClone(record));
    this.active.delete(record.state.rolloutId);
  }
}
