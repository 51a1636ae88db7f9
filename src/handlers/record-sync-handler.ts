/**
 * RecordSyncHandler — bundled handler that keeps keyed records per app.
 *
 * Message types: Put, Get, Delete, List, Echo and UploadDocument.
 * Successful writes are broadcast to the app as `RecordChanged`; new
 * connections receive a snapshot of every record as initial data.
 */

import { z } from 'zod';
import type pino from 'pino';
import { componentLogger } from '../core/logger.js';
import type { ConflictPolicy } from '../core/types.js';
import type { HandlerFactory } from '../hub/handler-router.js';
import {
  MessageHandlerResults,
  type AppConnection,
  type AppMessageHandler,
  type MessageHandlerResult,
  type UniversalMessage,
} from '../hub/types.js';
import { DocumentUploadRequestSchema, DocumentUploadResponses } from '../sync/types.js';
import { VersionedRecordStore, type VersionedRecord } from './versioned-record-store.js';

export const RECORD_CHANGED = 'RecordChanged';

const PutSchema = z.object({
  key: z.string().min(1),
  value: z.unknown(),
  baseVersion: z.number().int().min(0).optional(),
});

const KeySchema = z.object({
  key: z.string().min(1),
  baseVersion: z.number().int().min(0).optional(),
});

const ListSchema = z.object({ prefix: z.string().optional() }).optional();

const PAYLOAD_SCHEMAS: Record<string, z.ZodTypeAny> = {
  Put: PutSchema,
  Get: KeySchema,
  Delete: KeySchema,
  List: ListSchema,
  Echo: z.unknown(),
  UploadDocument: DocumentUploadRequestSchema,
};

export interface RecordChange {
  op: 'put' | 'delete';
  key: string;
  record: VersionedRecord | null;
  overwrittenVersion: number | null;
  conflict: boolean;
}

export interface RecordSnapshot {
  appName: string;
  policy: ConflictPolicy;
  records: VersionedRecord[];
}

export class RecordSyncHandler implements AppMessageHandler {
  readonly supportedMessageTypes: readonly string[] = Object.keys(PAYLOAD_SCHEMAS);
  private connected: Set<string> = new Set();
  private readonly logger: pino.Logger;

  constructor(
    readonly appName: string,
    private readonly store: VersionedRecordStore = new VersionedRecordStore(),
  ) {
    this.logger = componentLogger('record-sync').child({ appName });
  }

  get connectionCount(): number {
    return this.connected.size;
  }

  validateMessage(message: UniversalMessage): boolean {
    const schema = PAYLOAD_SCHEMAS[message.messageType];
    // Unknown types pass here so the router reports them as unsupported.
    if (!schema) return true;
    return schema.safeParse(message.data).success;
  }

  async handleMessage(message: UniversalMessage, connectionId: string): Promise<MessageHandlerResult> {
    const author = message.userId ?? (message.sourceApp || connectionId);

    switch (message.messageType) {
      case 'Put': {
        const { key, value, baseVersion } = PutSchema.parse(message.data);
        const outcome = this.store.apply(key, value, baseVersion, author);
        if (!outcome.applied) {
          return MessageHandlerResults.error(
            `Stale write for ${key}: base version ${baseVersion ?? 0}, current ${outcome.current?.version ?? 0}`,
            'validation',
          );
        }
        if (outcome.conflict) {
          this.logger.info({ key, overwrittenVersion: outcome.overwrittenVersion }, 'Concurrent write overwritten');
        }
        return MessageHandlerResults.broadcast(RECORD_CHANGED, {
          op: 'put',
          key,
          record: outcome.record,
          overwrittenVersion: outcome.overwrittenVersion,
          conflict: outcome.conflict,
        } satisfies RecordChange);
      }

      case 'Get': {
        const { key } = KeySchema.parse(message.data);
        return MessageHandlerResults.success(this.store.get(key));
      }

      case 'Delete': {
        const { key, baseVersion } = KeySchema.parse(message.data);
        const outcome = this.store.delete(key, baseVersion);
        if (!outcome.applied) {
          return MessageHandlerResults.error(
            `Stale delete for ${key}: base version ${baseVersion ?? 0}, current ${outcome.current?.version ?? 0}`,
            'validation',
          );
        }
        if (!outcome.removed) {
          return MessageHandlerResults.success({ key, deleted: false });
        }
        return MessageHandlerResults.broadcast(RECORD_CHANGED, {
          op: 'delete',
          key,
          record: null,
          overwrittenVersion: outcome.removed.version,
          conflict: outcome.conflict,
        } satisfies RecordChange);
      }

      case 'List': {
        const prefix = ListSchema.parse(message.data)?.prefix;
        return MessageHandlerResults.success(this.store.list(prefix));
      }

      case 'Echo':
        return MessageHandlerResults.success(message.data ?? null);

      case 'UploadDocument': {
        const request = DocumentUploadRequestSchema.parse(message.data);
        const key = `documents/${request.sourceFolder || 'default'}/${request.fileName}`;
        const outcome = this.store.apply(key, request, undefined, author);
        if (!outcome.applied) {
          return MessageHandlerResults.success(DocumentUploadResponses.error('Rejected', `Could not store ${key}`));
        }
        this.logger.info({ key, size: request.fileSizeBytes }, 'Document stored');
        return MessageHandlerResults.success(
          DocumentUploadResponses.success(`${key}@${outcome.record.version}`, key),
        );
      }

      default:
        return MessageHandlerResults.error(`Unsupported message type: ${message.messageType}`, 'validation');
    }
  }

  async onAppConnected(connection: AppConnection): Promise<void> {
    this.connected.add(connection.connectionId);
    this.logger.debug({ connectionId: connection.connectionId, connections: this.connected.size }, 'App connected');
  }

  async onAppDisconnected(connection: AppConnection): Promise<void> {
    this.connected.delete(connection.connectionId);
    this.logger.debug({ connectionId: connection.connectionId, connections: this.connected.size }, 'App disconnected');
  }

  async getInitialData(connection: AppConnection): Promise<RecordSnapshot> {
    this.logger.debug({ connectionId: connection.connectionId }, 'Sending snapshot');
    return {
      appName: this.appName,
      policy: this.store.policy,
      records: this.store.list(),
    };
  }
}

export interface RecordSyncServices {
  conflictPolicy: ConflictPolicy;
}

/** Factory binding a fresh record store to one app name. */
export function recordSyncHandlerFactory<S extends RecordSyncServices>(appName: string): HandlerFactory<S> {
  return (services) => new RecordSyncHandler(appName, new VersionedRecordStore(services.get('conflictPolicy')));
}
