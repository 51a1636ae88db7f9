import { describe, it, expect } from 'vitest';
import { VersionedRecordStore } from '../../../src/handlers/versioned-record-store.js';

describe('VersionedRecordStore', () => {
  const clock = () => 42;

  describe('last-write-wins', () => {
    it('should create records at version 1', () => {
      const store = new VersionedRecordStore('last-write-wins', clock);

      expect(store.apply('sku-1', { qty: 3 }, undefined, 'user-7')).toEqual({
        applied: true,
        record: { key: 'sku-1', value: { qty: 3 }, version: 1, updatedAt: 42, updatedBy: 'user-7' },
        overwrittenVersion: null,
        conflict: false,
      });
    });

    it('should apply a stale write and flag the conflict', () => {
      const store = new VersionedRecordStore('last-write-wins', clock);
      store.apply('sku-1', 1);
      store.apply('sku-1', 2, 1);

      const outcome = store.apply('sku-1', 3, 1);

      expect(outcome).toMatchObject({ applied: true, overwrittenVersion: 2, conflict: true });
      expect(store.get('sku-1')).toMatchObject({ value: 3, version: 3 });
    });

    it('should not flag a write based on the current version', () => {
      const store = new VersionedRecordStore('last-write-wins', clock);
      store.apply('sku-1', 1);

      expect(store.apply('sku-1', 2, 1)).toMatchObject({ applied: true, conflict: false, overwrittenVersion: 1 });
    });
  });

  describe('reject-stale', () => {
    it('should refuse a stale write and leave the record untouched', () => {
      const store = new VersionedRecordStore('reject-stale', clock);
      store.apply('sku-1', 1);
      store.apply('sku-1', 2);

      const outcome = store.apply('sku-1', 3, 1);

      expect(outcome).toEqual({
        applied: false,
        reason: 'stale',
        current: { key: 'sku-1', value: 2, version: 2, updatedAt: 42, updatedBy: null },
      });
      expect(store.get('sku-1')?.value).toBe(2);
    });

    it('should accept blind writes without a base version', () => {
      const store = new VersionedRecordStore('reject-stale', clock);
      store.apply('sku-1', 1);

      expect(store.apply('sku-1', 2)).toMatchObject({ applied: true, conflict: false });
    });

    it('should treat base version 0 as creating a new key', () => {
      const store = new VersionedRecordStore('reject-stale', clock);

      expect(store.apply('sku-1', 1, 0).applied).toBe(true);
      expect(store.apply('sku-2', 1, 5)).toEqual({ applied: false, reason: 'stale', current: null });
    });

    it('should refuse a stale delete', () => {
      const store = new VersionedRecordStore('reject-stale', clock);
      store.apply('sku-1', 1);
      store.apply('sku-1', 2);

      expect(store.delete('sku-1', 1).applied).toBe(false);
      expect(store.size).toBe(1);
      expect(store.delete('sku-1', 2)).toMatchObject({ applied: true, conflict: false });
      expect(store.size).toBe(0);
    });
  });

  describe('reads', () => {
    it('should return copies', () => {
      const store = new VersionedRecordStore('last-write-wins', clock);
      store.apply('sku-1', 1);

      const copy = store.get('sku-1');
      if (copy) copy.version = 99;

      expect(store.get('sku-1')?.version).toBe(1);
      expect(store.get('missing')).toBeNull();
    });

    it('should list by prefix in key order', () => {
      const store = new VersionedRecordStore('last-write-wins', clock);
      store.apply('shelf/b', 1);
      store.apply('bin/a', 2);
      store.apply('shelf/a', 3);

      expect(store.list('shelf/').map(r => r.key)).toEqual(['shelf/a', 'shelf/b']);
      expect(store.list().map(r => r.key)).toEqual(['bin/a', 'shelf/a', 'shelf/b']);
    });

    it('should report a missing key on delete', () => {
      const store = new VersionedRecordStore('last-write-wins', clock);
      expect(store.delete('missing')).toEqual({ applied: true, removed: null, conflict: false });
    });
  });
});
