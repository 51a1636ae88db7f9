/**
 * VersionedRecordStore — keyed records with a per-key version counter.
 *
 * Every write bumps the version. A write may name the version it was based
 * on; what happens when that base is stale depends on the policy:
 *   last-write-wins  apply anyway and report the version it replaced
 *   reject-stale     refuse and report the current record
 * A write without a base version is applied under both policies.
 */

import type { ConflictPolicy } from '../core/types.js';

export interface VersionedRecord {
  key: string;
  value: unknown;
  version: number;
  updatedAt: number;
  updatedBy: string | null;
}

export type WriteOutcome =
  | { applied: true; record: VersionedRecord; overwrittenVersion: number | null; conflict: boolean }
  | { applied: false; reason: 'stale'; current: VersionedRecord | null };

export type DeleteOutcome =
  | { applied: true; removed: VersionedRecord | null; conflict: boolean }
  | { applied: false; reason: 'stale'; current: VersionedRecord | null };

export class VersionedRecordStore {
  private records: Map<string, VersionedRecord> = new Map();

  constructor(
    readonly policy: ConflictPolicy = 'last-write-wins',
    private readonly clock: () => number = Date.now,
  ) {}

  get(key: string): VersionedRecord | null {
    const record = this.records.get(key);
    return record ? { ...record } : null;
  }

  /** Records in key order, optionally limited to a key prefix. */
  list(prefix: string = ''): VersionedRecord[] {
    return [...this.records.values()]
      .filter(record => record.key.startsWith(prefix))
      .sort((a, b) => a.key.localeCompare(b.key))
      .map(record => ({ ...record }));
  }

  get size(): number {
    return this.records.size;
  }

  apply(key: string, value: unknown, baseVersion?: number, updatedBy: string | null = null): WriteOutcome {
    const current = this.records.get(key) ?? null;
    const conflict = this.isStale(current, baseVersion);

    if (conflict && this.policy === 'reject-stale') {
      return { applied: false, reason: 'stale', current: current ? { ...current } : null };
    }

    const record: VersionedRecord = {
      key,
      value,
      version: (current?.version ?? 0) + 1,
      updatedAt: this.clock(),
      updatedBy,
    };
    this.records.set(key, record);

    return {
      applied: true,
      record: { ...record },
      overwrittenVersion: current ? current.version : null,
      conflict,
    };
  }

  delete(key: string, baseVersion?: number): DeleteOutcome {
    const current = this.records.get(key) ?? null;
    const conflict = this.isStale(current, baseVersion);

    if (conflict && this.policy === 'reject-stale') {
      return { applied: false, reason: 'stale', current: current ? { ...current } : null };
    }

    this.records.delete(key);
    return { applied: true, removed: current, conflict };
  }

  private isStale(current: VersionedRecord | null, baseVersion?: number): boolean {
    if (baseVersion === undefined) return false;
    return baseVersion !== (current?.version ?? 0);
  }
}
