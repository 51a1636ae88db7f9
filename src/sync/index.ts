/**
 * Sync Module — client-side outbox.
 *
 * @example
 * ```typescript
 * import { HubClient, FileCacheStore, SyncCoordinator } from 'switchyard';
 *
 * const coordinator = new SyncCoordinator({
 *   transport: new HubClient(),
 *   store: new FileCacheStore('/var/lib/app/outbox'),
 *   appName: 'Inventory',
 * });
 * await coordinator.connectAndRegister('ws://localhost:5080');
 * await coordinator.cacheAndSync({ sku: 'A-1', qty: 3 }, 'StockCount', 'Put');
 * ```
 */

export { FileCacheStore, type FileCacheStoreOptions } from './cache-store.js';
export { SyncCoordinator, type SyncCoordinatorOptions, isBlobDataType } from './sync-coordinator.js';
export * from './types.js';
