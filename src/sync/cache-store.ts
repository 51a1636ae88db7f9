/**
 * FileCacheStore — durable outbox on the local filesystem.
 *
 * Layout under the cache directory:
 *   index.json        every CacheItem, inline payloads included
 *   blobs/<id>.json   payload of each blob item
 *
 * All operations run under one AsyncMutex, so index rewrites never
 * interleave. A write is on disk before its promise resolves.
 */

import { join } from 'path';
import { z } from 'zod';
import { nanoid } from 'nanoid';
import type pino from 'pino';
import { componentLogger } from '../core/logger.js';
import { CacheError } from '../core/errors.js';
import { AsyncMutex } from '../core/mutex.js';
import { errorMessage, toError } from '../core/result.js';
import { readFileSafeAsync, removeFileSafe, writeFileAtomic } from '../utils/fs.js';
import {
  CacheItemSchema,
  type CacheEntryInput,
  type CacheItem,
  type CacheStats,
  type CacheStore,
  type PendingItem,
} from './types.js';

export interface FileCacheStoreOptions {
  clock?: () => number;
  idFactory?: () => string;
}

const IndexSchema = z.array(CacheItemSchema);

export class FileCacheStore implements CacheStore {
  private items: Map<string, CacheItem> | null = null;
  private mutex = new AsyncMutex();
  private readonly indexPath: string;
  private readonly blobDir: string;
  private readonly clock: () => number;
  private readonly idFactory: () => string;
  private readonly logger: pino.Logger;

  constructor(readonly dir: string, options: FileCacheStoreOptions = {}) {
    this.indexPath = join(dir, 'index.json');
    this.blobDir = join(dir, 'blobs');
    this.clock = options.clock ?? Date.now;
    this.idFactory = options.idFactory ?? (() => nanoid());
    this.logger = componentLogger('cache-store');
  }

  // ─── Writes ───────────────────────────────────────────────

  async cacheInline(entry: CacheEntryInput): Promise<string> {
    return this.mutex.withLock(async () => {
      const items = await this.load();
      const item = this.newItem(entry, 'inline');
      item.data = entry.data;

      items.set(item.id, item);
      try {
        await this.persist(items);
      } catch (err) {
        items.delete(item.id);
        throw new CacheError(`Failed to cache ${entry.dataType}: ${errorMessage(err)}`, toError(err));
      }

      this.logger.debug({ id: item.id, dataType: entry.dataType }, 'Cached inline item');
      return item.id;
    });
  }

  async cacheFile(entry: CacheEntryInput): Promise<string> {
    return this.mutex.withLock(async () => {
      const items = await this.load();
      const item = this.newItem(entry, 'blob');
      item.blobFile = `${item.id}.json`;
      const blobPath = join(this.blobDir, item.blobFile);

      items.set(item.id, item);
      try {
        await writeFileAtomic(blobPath, JSON.stringify(entry.data ?? null));
        await this.persist(items);
      } catch (err) {
        items.delete(item.id);
        await removeFileSafe(blobPath).catch((cleanupErr: unknown) => {
          this.logger.warn({ blobPath, err: errorMessage(cleanupErr) }, 'Failed to remove orphaned blob');
        });
        throw new CacheError(`Failed to cache ${entry.dataType}: ${errorMessage(err)}`, toError(err));
      }

      this.logger.debug({ id: item.id, dataType: entry.dataType }, 'Cached blob item');
      return item.id;
    });
  }

  async markSynced(id: string): Promise<void> {
    await this.mutate(id, async (item, items) => {
      item.attempts++;
      if (item.retentionPolicy === 'delete-after-sync') {
        items.delete(id);
        if (item.blobFile) {
          await removeFileSafe(join(this.blobDir, item.blobFile));
        }
        this.logger.debug({ id }, 'Synced item removed');
      } else {
        item.state = { status: 'synced', syncedAt: this.clock() };
      }
    });
  }

  async markFailed(id: string, reason: string): Promise<void> {
    await this.mutate(id, (item) => {
      item.attempts++;
      item.state = { status: 'failed', reason, failedAt: this.clock() };
      this.logger.warn({ id, attempts: item.attempts, reason }, 'Cache item failed');
    });
  }

  async requeue(id: string): Promise<boolean> {
    let requeued = false;
    await this.mutate(id, (item) => {
      if (item.state.status !== 'failed') return;
      item.state = { status: 'pending' };
      requeued = true;
    });
    return requeued;
  }

  async requeueFailed(): Promise<number> {
    return this.mutex.withLock(async () => {
      const items = await this.load();
      let count = 0;
      for (const item of items.values()) {
        if (item.state.status === 'failed') {
          item.state = { status: 'pending' };
          count++;
        }
      }
      if (count > 0) await this.persistOrThrow(items);
      return count;
    });
  }

  // ─── Reads ────────────────────────────────────────────────

  async getPending(): Promise<PendingItem[]> {
    const items = await this.snapshot();
    return items
      .filter(item => item.state.status === 'pending')
      .map(({ id, messageType, targetApp }) => ({ id, messageType, targetApp }));
  }

  async getById<T>(id: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T | null> {
    const item = await this.getItem(id);
    if (!item) return null;

    let payload: unknown = item.data;
    if (item.storage === 'blob') {
      if (!item.blobFile) return null;
      const raw = await this.readOrThrow(join(this.blobDir, item.blobFile));
      if (raw === null) return null;
      try {
        payload = JSON.parse(raw);
      } catch {
        this.logger.warn({ id }, 'Blob payload is not valid JSON');
        return null;
      }
    }

    const parsed = schema.safeParse(payload);
    return parsed.success ? parsed.data : null;
  }

  async getItem(id: string): Promise<CacheItem | null> {
    const items = await this.snapshot();
    return items.find(item => item.id === id) ?? null;
  }

  async list(): Promise<CacheItem[]> {
    return this.snapshot();
  }

  async getStats(): Promise<CacheStats> {
    const items = await this.snapshot();
    const stats: CacheStats = { pending: 0, failed: 0, synced: 0, total: items.length };
    for (const item of items) {
      stats[item.state.status]++;
    }
    return stats;
  }

  // ─── Internal ─────────────────────────────────────────────

  private newItem(entry: CacheEntryInput, storage: CacheItem['storage']): CacheItem {
    return {
      id: this.idFactory(),
      dataType: entry.dataType,
      messageType: entry.messageType,
      targetApp: entry.targetApp,
      retentionPolicy: entry.retentionPolicy,
      storage,
      state: { status: 'pending' },
      attempts: 0,
      createdAt: this.clock(),
    };
  }

  private async mutate(
    id: string,
    fn: (item: CacheItem, items: Map<string, CacheItem>) => void | Promise<void>,
  ): Promise<void> {
    await this.mutex.withLock(async () => {
      const items = await this.load();
      const item = items.get(id);
      if (!item) {
        this.logger.debug({ id }, 'Cache item not found');
        return;
      }
      await fn(item, items);
      await this.persistOrThrow(items);
    });
  }

  private async snapshot(): Promise<CacheItem[]> {
    return this.mutex.withLock(async () => {
      const items = await this.load();
      return [...items.values()].map(item => ({ ...item }));
    });
  }

  private async load(): Promise<Map<string, CacheItem>> {
    if (this.items) return this.items;

    const raw = await this.readOrThrow(this.indexPath);
    const items: Map<string, CacheItem> = new Map();
    if (raw !== null) {
      let json: unknown;
      try {
        json = JSON.parse(raw);
      } catch (err) {
        throw new CacheError(`Outbox index ${this.indexPath} is not valid JSON`, toError(err));
      }
      const parsed = IndexSchema.safeParse(json);
      if (!parsed.success) {
        throw new CacheError(`Outbox index ${this.indexPath} is corrupt`, parsed.error);
      }
      for (const item of parsed.data) {
        items.set(item.id, item);
      }
    }

    this.items = items;
    return items;
  }

  private async persist(items: Map<string, CacheItem>): Promise<void> {
    await writeFileAtomic(this.indexPath, JSON.stringify([...items.values()], null, 2));
  }

  private async persistOrThrow(items: Map<string, CacheItem>): Promise<void> {
    try {
      await this.persist(items);
    } catch (err) {
      // Memory may now be ahead of disk; reload on next access.
      this.items = null;
      throw new CacheError(`Failed to write outbox index: ${errorMessage(err)}`, toError(err));
    }
  }

  private async readOrThrow(path: string): Promise<string | null> {
    try {
      return await readFileSafeAsync(path);
    } catch (err) {
      throw new CacheError(`Failed to read ${path}: ${errorMessage(err)}`, toError(err));
    }
  }
}
