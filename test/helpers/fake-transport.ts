/**
 * In-process stand-ins for the sync coordinator's collaborators: a hub
 * transport whose outcomes each test scripts, and a memory-backed outbox.
 */

import type { z } from 'zod';
import { EventBus } from '../../src/core/events.js';
import { ok, type Result } from '../../src/core/result.js';
import type {
  AppRegistration,
  HubPushEvent,
  HubPushEvents,
  MessageAck,
  MessageResponse,
  RegistrationComplete,
} from '../../src/hub/types.js';
import type {
  CacheEntryInput,
  CacheItem,
  CacheStats,
  CacheStore,
  CloseInfo,
  PendingItem,
  SyncTransport,
} from '../../src/sync/types.js';

export interface SentMessage {
  messageType: string;
  targetApp: string;
  data: unknown;
}

type SendFn = (message: SentMessage) => Promise<Result<MessageAck>>;
type RespondFn = (message: SentMessage) => Promise<Result<MessageResponse>>;

export class FakeTransport implements SyncTransport {
  isConnected = false;
  readonly connectUrls: string[] = [];
  readonly registrations: AppRegistration[] = [];
  readonly sent: SentMessage[] = [];
  readonly requests: SentMessage[] = [];

  connectResult: Result<void> = ok(undefined);
  registerResult: Result<RegistrationComplete> = ok({
    connectionId: 'fake-conn',
    serverTime: 0,
    registeredApps: ['Server'],
    supportedMessageTypes: [],
  });
  send: SendFn = async () => ok({
    messageId: `ack-${this.sent.length}`,
    connectionId: 'fake-conn',
    success: true,
    error: null,
    processedAt: 0,
  });
  respond: RespondFn = async () => ok({ messageId: 'response-1', success: true, data: null });

  private bus = new EventBus<HubPushEvents>();
  private closeListeners: Set<(info: CloseInfo) => void> = new Set();

  async connect(serverUrl: string): Promise<Result<void>> {
    this.connectUrls.push(serverUrl);
    if (this.connectResult.ok) this.isConnected = true;
    return this.connectResult;
  }

  async disconnect(): Promise<void> {
    this.isConnected = false;
  }

  async registerApp(registration: AppRegistration): Promise<Result<RegistrationComplete>> {
    this.registrations.push(registration);
    return this.registerResult;
  }

  async sendMessage(messageType: string, targetApp: string, data: unknown): Promise<Result<MessageAck>> {
    const message = { messageType, targetApp, data };
    this.sent.push(message);
    return this.send(message);
  }

  async sendMessageWithResponse(messageType: string, targetApp: string, data: unknown): Promise<Result<MessageResponse>> {
    const message = { messageType, targetApp, data };
    this.requests.push(message);
    return this.respond(message);
  }

  on<E extends HubPushEvent>(event: E, listener: (payload: HubPushEvents[E]) => void): void {
    this.bus.on(event, listener);
  }

  off<E extends HubPushEvent>(event: E, listener: (payload: HubPushEvents[E]) => void): void {
    this.bus.off(event, listener);
  }

  onClose(listener: (info: CloseInfo) => void): () => void {
    this.closeListeners.add(listener);
    return () => {
      this.closeListeners.delete(listener);
    };
  }

  // ─── Test controls ────────────────────────────────────────

  push<E extends HubPushEvent>(event: E, payload: HubPushEvents[E]): void {
    this.bus.emit(event, payload);
  }

  drop(code = 1006, reason = ''): void {
    this.isConnected = false;
    for (const listener of [...this.closeListeners]) {
      listener({ code, reason });
    }
  }
}

export class MemoryCacheStore implements CacheStore {
  readonly items: Map<string, CacheItem> = new Map();
  readonly inlineIds: string[] = [];
  readonly blobIds: string[] = [];
  private payloads: Map<string, unknown> = new Map();
  private seq = 0;

  async cacheInline(entry: CacheEntryInput): Promise<string> {
    const id = this.put(entry, 'inline');
    this.inlineIds.push(id);
    return id;
  }

  async cacheFile(entry: CacheEntryInput): Promise<string> {
    const id = this.put(entry, 'blob');
    this.blobIds.push(id);
    return id;
  }

  async getPending(): Promise<PendingItem[]> {
    return [...this.items.values()]
      .filter(item => item.state.status === 'pending')
      .map(item => ({ id: item.id, messageType: item.messageType, targetApp: item.targetApp }));
  }

  async getById<T>(id: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T | null> {
    if (!this.payloads.has(id)) return null;
    const parsed = schema.safeParse(this.payloads.get(id));
    return parsed.success ? parsed.data : null;
  }

  async getItem(id: string): Promise<CacheItem | null> {
    const item = this.items.get(id);
    return item ? { ...item } : null;
  }

  async markSynced(id: string): Promise<void> {
    const item = this.items.get(id);
    if (!item) return;
    if (item.retentionPolicy === 'delete-after-sync') {
      this.items.delete(id);
      this.payloads.delete(id);
      return;
    }
    this.items.set(id, { ...item, attempts: item.attempts + 1, state: { status: 'synced', syncedAt: 0 } });
  }

  async markFailed(id: string, reason: string): Promise<void> {
    const item = this.items.get(id);
    if (!item) return;
    this.items.set(id, { ...item, attempts: item.attempts + 1, state: { status: 'failed', reason, failedAt: 0 } });
  }

  async requeue(id: string): Promise<boolean> {
    const item = this.items.get(id);
    if (!item || item.state.status !== 'failed') return false;
    this.items.set(id, { ...item, state: { status: 'pending' } });
    return true;
  }

  async requeueFailed(): Promise<number> {
    let moved = 0;
    for (const id of [...this.items.keys()]) {
      if (await this.requeue(id)) moved++;
    }
    return moved;
  }

  async getStats(): Promise<CacheStats> {
    const stats: CacheStats = { pending: 0, failed: 0, synced: 0, total: 0 };
    for (const item of this.items.values()) {
      stats[item.state.status]++;
      stats.total++;
    }
    return stats;
  }

  private put(entry: CacheEntryInput, storage: CacheItem['storage']): string {
    const id = `item-${++this.seq}`;
    this.items.set(id, {
      id,
      dataType: entry.dataType,
      messageType: entry.messageType,
      targetApp: entry.targetApp,
      retentionPolicy: entry.retentionPolicy,
      storage,
      state: { status: 'pending' },
      attempts: 0,
      createdAt: 0,
    });
    this.payloads.set(id, entry.data);
    return id;
  }
}
