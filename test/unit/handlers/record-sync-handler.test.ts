import { describe, it, expect, beforeEach } from 'vitest';
import {
  RECORD_CHANGED,
  RecordSyncHandler,
  recordSyncHandlerFactory,
  type RecordSyncServices,
} from '../../../src/handlers/record-sync-handler.js';
import { VersionedRecordStore } from '../../../src/handlers/versioned-record-store.js';
import { HandlerRouter } from '../../../src/hub/handler-router.js';
import { makeConnection, makeMessage } from '../../helpers/hub-fixtures.js';

describe('RecordSyncHandler', () => {
  let handler: RecordSyncHandler;

  beforeEach(() => {
    handler = new RecordSyncHandler('Inventory', new VersionedRecordStore('last-write-wins', () => 42));
  });

  function put(key: string, value: unknown, baseVersion?: number) {
    return handler.handleMessage(
      makeMessage({ messageType: 'Put', userId: 'user-7', data: { key, value, baseVersion } }),
      'c1',
    );
  }

  it('should support the record message types', () => {
    expect(handler.supportedMessageTypes).toEqual(['Put', 'Get', 'Delete', 'List', 'Echo', 'UploadDocument']);
  });

  describe('validateMessage', () => {
    it('should check payloads of known types', () => {
      expect(handler.validateMessage(makeMessage({ messageType: 'Put', data: { key: 'a', value: 1 } }))).toBe(true);
      expect(handler.validateMessage(makeMessage({ messageType: 'Put', data: { value: 1 } }))).toBe(false);
      expect(handler.validateMessage(makeMessage({ messageType: 'List', data: undefined }))).toBe(true);
    });

    it('should let unknown types through to the type check', () => {
      expect(handler.validateMessage(makeMessage({ messageType: 'Mystery', data: 7 }))).toBe(true);
    });
  });

  describe('Put', () => {
    it('should store the record and broadcast the change', async () => {
      const result = await put('sku-1', { qty: 3 });

      expect(result).toEqual({
        success: true,
        responseData: {
          op: 'put',
          key: 'sku-1',
          record: { key: 'sku-1', value: { qty: 3 }, version: 1, updatedAt: 42, updatedBy: 'user-7' },
          overwrittenVersion: null,
          conflict: false,
        },
        shouldBroadcast: true,
        broadcastMessageType: RECORD_CHANGED,
        targetConnections: [],
      });
    });

    it('should attribute anonymous writes to the source app', async () => {
      await handler.handleMessage(
        makeMessage({ messageType: 'Put', sourceApp: 'Inventory', userId: null, data: { key: 'k', value: 1 } }),
        'c1',
      );
      await handler.handleMessage(
        makeMessage({ messageType: 'Put', sourceApp: '', userId: null, data: { key: 'j', value: 1 } }),
        'c9',
      );

      const records = await handler.handleMessage(makeMessage({ messageType: 'List', data: {} }), 'c1');
      expect(records.responseData).toMatchObject([
        { key: 'j', updatedBy: 'c9' },
        { key: 'k', updatedBy: 'Inventory' },
      ]);
    });

    it('should reject a stale write under reject-stale', async () => {
      handler = new RecordSyncHandler('Inventory', new VersionedRecordStore('reject-stale', () => 42));
      await put('sku-1', 1);

      const result = await put('sku-1', 2, 0);

      expect(result).toMatchObject({
        success: false,
        errorKind: 'validation',
        errorMessage: 'Stale write for sku-1: base version 0, current 1',
        shouldBroadcast: false,
      });
    });
  });

  describe('Get / Delete / List / Echo', () => {
    it('should return a record or null', async () => {
      await put('sku-1', { qty: 3 });

      const found = await handler.handleMessage(makeMessage({ messageType: 'Get', data: { key: 'sku-1' } }), 'c1');
      const missing = await handler.handleMessage(makeMessage({ messageType: 'Get', data: { key: 'nope' } }), 'c1');

      expect(found.responseData).toMatchObject({ key: 'sku-1', version: 1 });
      expect(missing).toMatchObject({ success: true, responseData: null });
    });

    it('should broadcast deletes of existing records', async () => {
      await put('sku-1', 1);

      const result = await handler.handleMessage(makeMessage({ messageType: 'Delete', data: { key: 'sku-1' } }), 'c1');

      expect(result).toMatchObject({
        success: true,
        shouldBroadcast: true,
        broadcastMessageType: 'RecordChanged',
        responseData: { op: 'delete', key: 'sku-1', record: null, overwrittenVersion: 1, conflict: false },
      });
    });

    it('should answer deletes of missing records without a broadcast', async () => {
      const result = await handler.handleMessage(makeMessage({ messageType: 'Delete', data: { key: 'nope' } }), 'c1');

      expect(result).toMatchObject({ success: true, shouldBroadcast: false, responseData: { key: 'nope', deleted: false } });
    });

    it('should list records by prefix', async () => {
      await put('shelf/b', 1);
      await put('bin/a', 2);
      await put('shelf/a', 3);

      const result = await handler.handleMessage(makeMessage({ messageType: 'List', data: { prefix: 'shelf/' } }), 'c1');

      expect(result.responseData).toMatchObject([{ key: 'shelf/a' }, { key: 'shelf/b' }]);
    });

    it('should echo the payload', async () => {
      const result = await handler.handleMessage(makeMessage({ messageType: 'Echo', data: { ping: 1 } }), 'c1');
      expect(result).toMatchObject({ success: true, responseData: { ping: 1 } });
    });
  });

  describe('UploadDocument', () => {
    it('should store the document under its source folder', async () => {
      const result = await handler.handleMessage(makeMessage({
        messageType: 'UploadDocument',
        userId: 'clerk',
        data: {
          sourceFolder: 'scanner-a',
          fileName: 'slip.jpg',
          imageBase64: 'aGVsbG8=',
          deviceTimestamp: 1,
          deviceId: 'device-1',
          username: 'clerk',
          fileSizeBytes: 5,
        },
      }), 'c1');

      expect(result.responseData).toMatchObject({
        success: true,
        documentId: 'documents/scanner-a/slip.jpg@1',
        storagePath: 'documents/scanner-a/slip.jpg',
        message: 'Document uploaded successfully',
      });
    });

    it('should fall back to the default folder', async () => {
      const result = await handler.handleMessage(makeMessage({
        messageType: 'UploadDocument',
        data: {
          sourceFolder: '',
          fileName: 'note.pdf',
          imageBase64: '',
          deviceTimestamp: 1,
          deviceId: 'device-1',
          username: 'clerk',
          fileSizeBytes: 0,
        },
      }), 'c1');

      expect(result.responseData).toMatchObject({ storagePath: 'documents/default/note.pdf' });
    });
  });

  describe('lifecycle', () => {
    it('should track connected instances', async () => {
      await handler.onAppConnected(makeConnection({ connectionId: 'c1' }));
      await handler.onAppConnected(makeConnection({ connectionId: 'c2' }));
      await handler.onAppDisconnected(makeConnection({ connectionId: 'c1' }));

      expect(handler.connectionCount).toBe(1);
    });

    it('should send a snapshot as initial data', async () => {
      await put('sku-1', 1);

      expect(await handler.getInitialData(makeConnection())).toEqual({
        appName: 'Inventory',
        policy: 'last-write-wins',
        records: [{ key: 'sku-1', value: 1, version: 1, updatedAt: 42, updatedBy: 'user-7' }],
      });
    });
  });

  describe('recordSyncHandlerFactory', () => {
    it('should build a handler with the configured policy behind the router', async () => {
      const router = new HandlerRouter<RecordSyncServices>({ services: { conflictPolicy: 'reject-stale' } });
      router.registerHandler('Inventory', recordSyncHandlerFactory('Inventory'));

      const first = await router.routeMessage(makeMessage({ messageType: 'Put', data: { key: 'a', value: 1 } }), 'c1');
      const stale = await router.routeMessage(makeMessage({ messageType: 'Put', data: { key: 'a', value: 2, baseVersion: 0 } }), 'c1');
      const invalid = await router.routeMessage(makeMessage({ messageType: 'Put', data: { value: 2 } }), 'c1');

      expect(first.success).toBe(true);
      expect(stale.errorMessage).toBe('Stale write for a: base version 0, current 1');
      expect(invalid.errorMessage).toBe('Invalid message format for app: Inventory');
      expect(router.supportedMessageTypes('Inventory')).toContain('UploadDocument');
    });
  });
});
