/**
 * ConnectionRegistry — in-memory directory of live app connections.
 *
 * Primary index by connection id, secondary index by app name. List
 * lookups return fresh arrays, so callers can iterate while the hub keeps
 * mutating.
 * Missing keys never throw: absence is `null` or an empty list.
 */

import type pino from 'pino';
import { componentLogger } from '../core/logger.js';
import { EventBus } from '../core/events.js';
import type { AppConnection, ConnectionStatus } from './types.js';

export interface ConnectionRegistryOptions {
  bus?: EventBus;
  /** Clock in epoch ms; injectable for boundary tests. */
  clock?: () => number;
}

export class ConnectionRegistry {
  private connections: Map<string, AppConnection> = new Map();
  private appIndex: Map<string, string[]> = new Map(); // appName → connectionIds
  private readonly bus: EventBus;
  private readonly clock: () => number;
  private readonly logger: pino.Logger;

  constructor(options: ConnectionRegistryOptions = {}) {
    this.bus = options.bus ?? new EventBus();
    this.clock = options.clock ?? Date.now;
    this.logger = componentLogger('connection-registry');
  }

  // ─── Mutation ─────────────────────────────────────────────

  /**
   * Insert or overwrite by connection id. An overwrite that changes the app
   * name moves the id between app buckets.
   */
  add(connection: AppConnection): void {
    const previous = this.connections.get(connection.connectionId);
    if (previous && previous.appName !== connection.appName) {
      this.detachFromApp(previous.appName, previous.connectionId);
    }

    this.connections.set(connection.connectionId, connection);

    const ids = this.appIndex.get(connection.appName) ?? [];
    if (!ids.includes(connection.connectionId)) {
      ids.push(connection.connectionId);
    }
    this.appIndex.set(connection.appName, ids);

    this.logger.info(
      { connectionId: connection.connectionId, appName: connection.appName, appVersion: connection.appVersion },
      'Added connection',
    );
    this.bus.emit('connection:added', { connection, timestamp: this.clock() });
  }

  /** Remove from both indices. Returns the removed entry, if any. */
  remove(connectionId: string): AppConnection | null {
    const connection = this.connections.get(connectionId);
    if (!connection) return null;

    this.connections.delete(connectionId);
    this.detachFromApp(connection.appName, connectionId);

    this.logger.info({ connectionId, appName: connection.appName }, 'Removed connection');
    this.bus.emit('connection:removed', { connection, timestamp: this.clock() });
    return connection;
  }

  updateHeartbeat(connectionId: string): void {
    const connection = this.connections.get(connectionId);
    if (!connection) return;
    connection.lastHeartbeat = this.clock();
    connection.status = 'connected';
  }

  setUser(connectionId: string, userId: string): AppConnection | null {
    const connection = this.connections.get(connectionId);
    if (!connection) return null;
    connection.userId = userId;
    return connection;
  }

  updateStatus(connectionId: string, status: ConnectionStatus): void {
    const connection = this.connections.get(connectionId);
    if (!connection) return;
    connection.status = status;
    this.logger.debug({ connectionId, status }, 'Updated connection status');
  }

  // ─── Queries ──────────────────────────────────────────────

  get(connectionId: string): AppConnection | null {
    return this.connections.get(connectionId) ?? null;
  }

  connectionsForApp(appName: string): AppConnection[] {
    const result: AppConnection[] = [];
    for (const id of this.connectionIdsForApp(appName)) {
      const connection = this.connections.get(id);
      if (connection) result.push(connection);
    }
    return result;
  }

  connectionIdsForApp(appName: string): string[] {
    return [...(this.appIndex.get(appName) ?? [])];
  }

  connectionsForUser(userId: string): AppConnection[] {
    return [...this.connections.values()].filter(c => c.userId === userId);
  }

  allConnections(): AppConnection[] {
    return [...this.connections.values()];
  }

  get totalCount(): number {
    return this.connections.size;
  }

  appConnectionCounts(): Record<string, number> {
    const counts: Record<string, number> = {};
    for (const [appName, ids] of this.appIndex) {
      counts[appName] = ids.length;
    }
    return counts;
  }

  connectedApps(): string[] {
    return [...this.appIndex.keys()];
  }

  /** Connections whose last heartbeat is at least `maxAgeMs` old. */
  staleConnections(maxAgeMs: number): AppConnection[] {
    const now = this.clock();
    return [...this.connections.values()].filter(c => now - c.lastHeartbeat >= maxAgeMs);
  }

  // ─── Maintenance ──────────────────────────────────────────

  /**
   * Evict every stale connection. Evictions are published as
   * `connection:evicted` so the hub can release the ghost's subscriptions.
   */
  cleanupStale(maxAgeMs: number): number {
    const now = this.clock();
    let removed = 0;

    for (const stale of this.staleConnections(maxAgeMs)) {
      if (this.remove(stale.connectionId)) {
        removed++;
        this.bus.emit('connection:evicted', {
          connection: stale,
          idleMs: now - stale.lastHeartbeat,
          timestamp: now,
        });
      }
    }

    if (removed > 0) {
      this.logger.info({ removed }, 'Cleaned up stale connections');
    }
    return removed;
  }

  // ─── Internal ─────────────────────────────────────────────

  private detachFromApp(appName: string, connectionId: string): void {
    const ids = this.appIndex.get(appName);
    if (!ids) return;
    const remaining = ids.filter(id => id !== connectionId);
    if (remaining.length === 0) {
      this.appIndex.delete(appName);
    } else {
      this.appIndex.set(appName, remaining);
    }
  }
}
