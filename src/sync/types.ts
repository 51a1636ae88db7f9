/**
 * Sync Types — outbox items, cache store contract, transport contract and
 * document upload payloads.
 */

import { z } from 'zod';
import type { Result } from '../core/result.js';
import type {
  AppRegistration,
  HubPushEvent,
  HubPushEvents,
  MessageAck,
  MessageResponse,
  RegistrationComplete,
} from '../hub/types.js';

// ═══════════════════════════════════════════════════════════════
// CACHE ITEMS
// ═══════════════════════════════════════════════════════════════

export const RetentionPolicySchema = z.enum(['delete-after-sync', 'keep-after-sync']);
export type RetentionPolicy = z.infer<typeof RetentionPolicySchema>;

/** Pending → Synced or Pending → Failed; Failed → Pending only via requeue. */
export const SyncStateSchema = z.discriminatedUnion('status', [
  z.object({ status: z.literal('pending') }),
  z.object({ status: z.literal('synced'), syncedAt: z.number() }),
  z.object({ status: z.literal('failed'), reason: z.string(), failedAt: z.number() }),
]);
export type SyncState = z.infer<typeof SyncStateSchema>;

export const CacheItemSchema = z.object({
  id: z.string(),
  dataType: z.string(),
  messageType: z.string(),
  targetApp: z.string(),
  retentionPolicy: RetentionPolicySchema,
  storage: z.enum(['inline', 'blob']),
  state: SyncStateSchema,
  attempts: z.number().int().min(0),
  createdAt: z.number(),
  /** Payload of inline items. */
  data: z.unknown().optional(),
  /** Blob file name (relative to the blob directory) of blob items. */
  blobFile: z.string().optional(),
});
export type CacheItem = z.infer<typeof CacheItemSchema>;

export interface PendingItem {
  id: string;
  messageType: string;
  targetApp: string;
}

export interface CacheStats {
  pending: number;
  failed: number;
  synced: number;
  total: number;
}

// ═══════════════════════════════════════════════════════════════
// CACHE STORE CONTRACT
// ═══════════════════════════════════════════════════════════════

export interface CacheEntryInput {
  data: unknown;
  dataType: string;
  messageType: string;
  targetApp: string;
  retentionPolicy: RetentionPolicy;
}

/**
 * Durable outbox storage. Every write is persisted before the returned
 * promise resolves; a storage failure rejects with `CacheError`.
 */
export interface CacheStore {
  cacheInline(entry: CacheEntryInput): Promise<string>;
  cacheFile(entry: CacheEntryInput): Promise<string>;
  getPending(): Promise<PendingItem[]>;
  /** Payload of the item, validated against the schema; null when absent or invalid. */
  getById<T>(id: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T | null>;
  getItem(id: string): Promise<CacheItem | null>;
  markSynced(id: string): Promise<void>;
  markFailed(id: string, reason: string): Promise<void>;
  /** Failed → Pending. Returns false when the item is missing or not failed. */
  requeue(id: string): Promise<boolean>;
  /** Requeue every failed item; returns how many moved back to pending. */
  requeueFailed(): Promise<number>;
  getStats(): Promise<CacheStats>;
}

// ═══════════════════════════════════════════════════════════════
// TRANSPORT CONTRACT
// ═══════════════════════════════════════════════════════════════

export interface CloseInfo {
  code: number;
  reason: string;
}

/** The slice of the hub client the sync coordinator drives. */
export interface SyncTransport {
  readonly isConnected: boolean;
  connect(serverUrl: string): Promise<Result<void>>;
  disconnect(): Promise<void>;
  registerApp(registration: AppRegistration): Promise<Result<RegistrationComplete>>;
  /** Send with requiresAck; resolves ok only on a successful MessageAck. */
  sendMessage(messageType: string, targetApp: string, data: unknown): Promise<Result<MessageAck>>;
  sendMessageWithResponse(messageType: string, targetApp: string, data: unknown): Promise<Result<MessageResponse>>;
  on<E extends HubPushEvent>(event: E, listener: (payload: HubPushEvents[E]) => void): void;
  off<E extends HubPushEvent>(event: E, listener: (payload: HubPushEvents[E]) => void): void;
  /** Subscribe to connection loss; returns the unsubscribe function. */
  onClose(listener: (info: CloseInfo) => void): () => void;
}

// ═══════════════════════════════════════════════════════════════
// SYNC STATUS
// ═══════════════════════════════════════════════════════════════

export interface SyncStatus {
  isOnline: boolean;
  isSyncing: boolean;
  pendingItems: number;
  failedItems: number;
  syncedItems: number;
  totalItems: number;
}

export interface SyncPassResult {
  /** True when another pass was running or the coordinator was offline. */
  skipped: boolean;
  synced: number;
  failed: number;
}

// ═══════════════════════════════════════════════════════════════
// DOCUMENT UPLOAD
// ═══════════════════════════════════════════════════════════════

export const DocumentUploadRequestSchema = z.object({
  /** Folder that identifies the document source, e.g. "scanner-a". */
  sourceFolder: z.string(),
  fileName: z.string().min(1),
  imageBase64: z.string(),
  deviceTimestamp: z.number(),
  deviceId: z.string(),
  username: z.string(),
  fileSizeBytes: z.number().int().min(0),
  contentType: z.string().optional(),
});
export type DocumentUploadRequest = z.infer<typeof DocumentUploadRequestSchema>;

export const DocumentUploadResponseSchema = z.object({
  success: z.boolean(),
  documentId: z.string().optional(),
  message: z.string(),
  serverTimestamp: z.number(),
  storagePath: z.string().optional(),
  errorDetails: z.string().optional(),
});
export type DocumentUploadResponse = z.infer<typeof DocumentUploadResponseSchema>;

export type DocumentUploadErrorCode = 'Offline' | 'NoResponse' | 'Exception' | 'Rejected';

export const DocumentUploadResponses = {
  success(documentId: string, storagePath?: string): DocumentUploadResponse {
    return {
      success: true,
      documentId,
      message: 'Document uploaded successfully',
      serverTimestamp: Date.now(),
      storagePath,
    };
  },

  error(message: string, details?: string): DocumentUploadResponse {
    return {
      success: false,
      message,
      serverTimestamp: Date.now(),
      errorDetails: details,
    };
  },
};
