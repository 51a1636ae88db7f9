/**
 * SyncCoordinator — client-side outbox over the hub client.
 *
 * Cache-then-send: every unit of work is written to the cache store before
 * any network attempt. Replay passes walk the pending items one by one with
 * a short pause between sends. Failed items stay failed until requeued.
 * An item is sent by at most one path at a time: the immediate send of
 * `cacheAndSync` and a replay pass skip ids the other is already sending.
 */

import { z } from 'zod';
import type pino from 'pino';
import { componentLogger } from '../core/logger.js';
import { AsyncMutex } from '../core/mutex.js';
import { errorMessage } from '../core/result.js';
import { abortableDelay, sleep } from '../utils/async.js';
import type { HubPushEvents } from '../hub/types.js';
import {
  DocumentUploadResponseSchema,
  DocumentUploadResponses,
  type CacheStore,
  type DocumentUploadRequest,
  type DocumentUploadResponse,
  type RetentionPolicy,
  type SyncPassResult,
  type SyncStatus,
  type SyncTransport,
} from './types.js';

export interface SyncCoordinatorOptions {
  transport: SyncTransport;
  store: CacheStore;
  appName: string;
  appVersion?: string;
  deviceId?: string;
  deviceType?: string;
  /** URL used when an upload has to connect on demand. */
  serverUrl?: string;
  /** App that receives outbox items and document uploads. */
  targetApp?: string;
  syncThrottleMs?: number;
  replayIntervalMs?: number;
}

type ItemOutcome = 'synced' | 'failed' | 'skipped';

const BLOB_DATA_TYPES = /image|photo|receipt|document/i;

/** Payloads of these data types go to blob storage instead of the index. */
export function isBlobDataType(dataType: string): boolean {
  return BLOB_DATA_TYPES.test(dataType);
}

export class SyncCoordinator {
  private online = false;
  private syncing = false;
  private connectLock = new AsyncMutex();
  private replayController: AbortController | null = null;
  private replayLoop: Promise<void> | null = null;
  private backgroundPass: Promise<void> | null = null;
  private unsubscribeClose: (() => void) | null = null;
  private inFlight: Set<string> = new Set();
  /** Delivered, but the store could not record it; never sent again. */
  private deliveredUnrecorded: Set<string> = new Set();
  private readonly transport: SyncTransport;
  private readonly store: CacheStore;
  private readonly options: SyncCoordinatorOptions;
  private readonly targetApp: string;
  private readonly syncThrottleMs: number;
  private readonly replayIntervalMs: number;
  private readonly logger: pino.Logger;

  private readonly onRegistrationError = (reason: HubPushEvents['RegistrationError']): void => {
    this.logger.error({ reason }, 'App registration error');
    this.online = false;
  };

  private readonly onMessageResponse = (response: HubPushEvents['MessageResponse']): void => {
    this.logger.debug({ messageId: response.messageId, success: response.success }, 'Received message response');
  };

  constructor(options: SyncCoordinatorOptions) {
    this.options = options;
    this.transport = options.transport;
    this.store = options.store;
    this.targetApp = options.targetApp ?? 'Server';
    this.syncThrottleMs = options.syncThrottleMs ?? 100;
    this.replayIntervalMs = options.replayIntervalMs ?? 60_000;
    this.logger = componentLogger('sync-coordinator');
  }

  get isOnline(): boolean {
    return this.online && this.transport.isConnected;
  }

  get isSyncing(): boolean {
    return this.syncing;
  }

  // ─── Connection ───────────────────────────────────────────

  /**
   * Connect, subscribe, register, then start a background replay. Any
   * failing step leaves the coordinator offline and returns false.
   */
  async connectAndRegister(
    serverUrl: string = this.options.serverUrl ?? 'ws://localhost:5080',
    appName: string = this.options.appName,
  ): Promise<boolean> {
    try {
      this.logger.info({ serverUrl, appName }, 'Starting connection and registration');

      const connected = await this.transport.connect(serverUrl);
      if (!connected.ok) {
        this.logger.error({ detail: connected.detail }, 'Failed to connect to server');
        this.online = false;
        return false;
      }

      this.subscribe();

      const registered = await this.transport.registerApp({
        appName,
        appVersion: this.options.appVersion,
        deviceId: this.options.deviceId,
        deviceType: this.options.deviceType,
      });
      if (!registered.ok) {
        this.logger.error({ errorKind: registered.errorKind, detail: registered.detail }, 'Failed to register app');
        this.online = false;
        return false;
      }

      this.online = true;
      this.logger.info({ connectionId: registered.value.connectionId }, 'Connected and registered');

      this.backgroundPass = this.syncPendingItems().then(
        (result) => {
          this.logger.debug(result, 'Background replay finished');
        },
        (err: unknown) => {
          this.logger.error({ err: errorMessage(err) }, 'Background replay failed');
        },
      );
      return true;
    } catch (err) {
      this.logger.error({ err: errorMessage(err) }, 'Error during connection and registration');
      this.online = false;
      return false;
    }
  }

  async disconnect(): Promise<void> {
    this.online = false;
    this.unsubscribe();
    await this.transport.disconnect();
    this.logger.info('Disconnected from server');
  }

  /** Resolves once the replay started by the last connect has finished. */
  async waitForBackgroundSync(): Promise<void> {
    await this.backgroundPass;
  }

  // ─── Outbox ───────────────────────────────────────────────

  /**
   * Durably cache the payload, then send it right away when online.
   * Returns the cache item id. A cache failure rejects with CacheError.
   */
  async cacheAndSync(
    data: unknown,
    dataType: string,
    messageType: string,
    retentionPolicy: RetentionPolicy = 'delete-after-sync',
    targetApp: string = this.targetApp,
  ): Promise<string> {
    const entry = { data, dataType, messageType, targetApp, retentionPolicy };
    const id = isBlobDataType(dataType)
      ? await this.store.cacheFile(entry)
      : await this.store.cacheInline(entry);

    this.logger.info({ dataType, id }, 'Cached item');

    if (this.isOnline) {
      await this.syncSingleItem(id);
    } else {
      this.logger.info({ dataType, id }, 'Offline, item will sync when the connection is restored');
    }

    return id;
  }

  /**
   * One replay pass over every pending item. A call made while another
   * pass runs, or while offline, returns immediately with `skipped`.
   */
  async syncPendingItems(): Promise<SyncPassResult> {
    if (this.syncing || !this.isOnline) {
      this.logger.debug('Skipping sync, already syncing or offline');
      return { skipped: true, synced: 0, failed: 0 };
    }

    this.syncing = true;
    const result: SyncPassResult = { skipped: false, synced: 0, failed: 0 };
    try {
      const pending = await this.store.getPending();
      this.logger.info({ count: pending.length }, 'Starting sync of pending items');

      for (const [i, item] of pending.entries()) {
        if (!this.isOnline) {
          this.logger.warn({ remaining: pending.length - i }, 'Went offline during sync');
          break;
        }

        const outcome = await this.syncSingleItem(item.id);
        if (outcome === 'synced') result.synced++;
        if (outcome === 'failed') result.failed++;

        if (this.syncThrottleMs > 0 && i < pending.length - 1) {
          await sleep(this.syncThrottleMs);
        }
      }

      this.logger.info(result, 'Completed sync of pending items');
    } catch (err) {
      this.logger.error({ err: errorMessage(err) }, 'Error during pending items sync');
    } finally {
      this.syncing = false;
    }
    return result;
  }

  /** Failed → pending for one item. */
  async requeue(id: string): Promise<boolean> {
    return this.store.requeue(id);
  }

  /** Requeue every failed item and, when online, replay them. */
  async retryFailedItems(): Promise<number> {
    const count = await this.store.requeueFailed();
    this.logger.info({ count }, 'Requeued failed items');
    if (count > 0 && this.isOnline) {
      await this.syncPendingItems();
    }
    return count;
  }

  async getSyncStatus(): Promise<SyncStatus> {
    const stats = await this.store.getStats();
    return {
      isOnline: this.isOnline,
      isSyncing: this.syncing,
      pendingItems: stats.pending,
      failedItems: stats.failed,
      syncedItems: stats.synced,
      totalItems: stats.total,
    };
  }

  // ─── Periodic replay ──────────────────────────────────────

  startPeriodicReplay(intervalMs: number = this.replayIntervalMs): void {
    if (this.replayController) return;
    const controller = new AbortController();
    this.replayController = controller;
    this.replayLoop = this.runReplay(intervalMs, controller.signal);
  }

  async stopPeriodicReplay(): Promise<void> {
    if (!this.replayController) return;
    this.replayController.abort();
    this.replayController = null;
    const loop = this.replayLoop;
    this.replayLoop = null;
    await loop;
  }

  // ─── Document upload ──────────────────────────────────────

  /**
   * Request/response upload that bypasses the outbox. Connects on demand
   * under the connect lock.
   */
  async uploadDocument(request: DocumentUploadRequest): Promise<DocumentUploadResponse> {
    try {
      if (!this.isOnline) {
        const connected = await this.connectLock.withLock(async () => {
          // Another caller may have connected while this one waited.
          if (this.isOnline) return true;
          this.logger.info('Not connected, attempting to connect before upload');
          return this.connectAndRegister();
        });

        if (!connected) {
          this.logger.warn('Cannot upload document, failed to connect');
          return DocumentUploadResponses.error('Offline', 'Not connected to server');
        }
      }

      this.logger.info({ fileName: request.fileName, size: request.imageBase64.length }, 'Uploading document');

      const response = await this.transport.sendMessageWithResponse('UploadDocument', this.targetApp, request);
      if (!response.ok) {
        if (response.errorKind === 'timeout') {
          return DocumentUploadResponses.error('NoResponse', 'No response from server');
        }
        return DocumentUploadResponses.error('Exception', response.detail);
      }

      const declared = DocumentUploadResponseSchema.safeParse(response.value.data);
      if (declared.success) {
        if (declared.data.success) {
          this.logger.info({ documentId: declared.data.documentId }, 'Document uploaded');
        } else {
          this.logger.warn({ message: declared.data.message }, 'Document upload failed');
        }
        return declared.data;
      }

      if (!response.value.success) {
        return DocumentUploadResponses.error('Rejected', response.value.error ?? 'Upload rejected by server');
      }
      return DocumentUploadResponses.error('NoResponse', 'No response from server');
    } catch (err) {
      this.logger.error({ err: errorMessage(err) }, 'Error uploading document');
      return DocumentUploadResponses.error('Exception', errorMessage(err));
    }
  }

  /** Outbox variant of uploadDocument for poor connectivity. */
  async queueDocumentUpload(request: DocumentUploadRequest): Promise<string> {
    return this.cacheAndSync(request, 'BankSlipImage', 'UploadDocument', 'delete-after-sync');
  }

  // ─── Internal ─────────────────────────────────────────────

  private async syncSingleItem(id: string): Promise<ItemOutcome> {
    if (this.inFlight.has(id)) {
      this.logger.debug({ id }, 'Cache item already being sent, skipping');
      return 'skipped';
    }
    this.inFlight.add(id);
    try {
      if (this.deliveredUnrecorded.has(id)) {
        return await this.recordSynced(id);
      }
      return await this.sendItem(id);
    } finally {
      this.inFlight.delete(id);
    }
  }

  private async sendItem(id: string): Promise<ItemOutcome> {
    try {
      const item = await this.store.getItem(id);
      if (!item || item.state.status !== 'pending') {
        this.logger.warn({ id }, 'Cache item not pending, skipping');
        return 'skipped';
      }

      const data = await this.store.getById(id, z.unknown());
      if (data === null) {
        await this.store.markFailed(id, 'No data found');
        return 'failed';
      }

      const sent = await this.transport.sendMessage(item.messageType, item.targetApp, data);
      if (sent.ok) {
        return await this.recordSynced(id);
      }

      await this.store.markFailed(id, sent.detail);
      this.logger.warn({ id, errorKind: sent.errorKind, detail: sent.detail }, 'Failed to sync cache item');
      return 'failed';
    } catch (err) {
      this.logger.error({ id, err: errorMessage(err) }, 'Error syncing cache item');
      try {
        await this.store.markFailed(id, errorMessage(err));
      } catch (markErr) {
        this.logger.error({ id, err: errorMessage(markErr) }, 'Could not record sync failure');
      }
      return 'failed';
    }
  }

  /** A delivered item counts as synced even when the store fails to record it. */
  private async recordSynced(id: string): Promise<ItemOutcome> {
    try {
      await this.store.markSynced(id);
      this.deliveredUnrecorded.delete(id);
      this.logger.info({ id }, 'Synced cache item');
    } catch (err) {
      this.deliveredUnrecorded.add(id);
      this.logger.error({ id, err: errorMessage(err) }, 'Cache item delivered but could not be marked synced');
    }
    return 'synced';
  }

  private async runReplay(intervalMs: number, signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      const elapsed = await abortableDelay(intervalMs, signal);
      if (!elapsed) break;
      if (!this.isOnline) continue;
      await this.syncPendingItems();
    }
  }

  private subscribe(): void {
    if (this.unsubscribeClose) return;
    this.transport.on('RegistrationError', this.onRegistrationError);
    this.transport.on('MessageResponse', this.onMessageResponse);
    this.unsubscribeClose = this.transport.onClose((info) => {
      if (this.online) {
        this.logger.warn({ code: info.code }, 'Connection lost');
      }
      this.online = false;
    });
  }

  private unsubscribe(): void {
    if (!this.unsubscribeClose) return;
    this.transport.off('RegistrationError', this.onRegistrationError);
    this.transport.off('MessageResponse', this.onMessageResponse);
    this.unsubscribeClose();
    this.unsubscribeClose = null;
  }
}
