/**
 * Wiring from a loaded configuration to running components.
 */

import { EventBus } from './core/events.js';
import type { SwitchyardConfig } from './core/types.js';
import { HandlerRouter } from './hub/handler-router.js';
import { HubServer } from './hub/server.js';
import type { Authenticator } from './hub/communication-hub.js';
import { recordSyncHandlerFactory, type RecordSyncServices } from './handlers/record-sync-handler.js';
import { HubClient } from './client/hub-client.js';
import { FileCacheStore } from './sync/cache-store.js';
import { SyncCoordinator } from './sync/sync-coordinator.js';

export interface HubBootstrapOptions {
  authenticator?: Authenticator;
  bus?: EventBus;
}

/**
 * Hub server with the record-sync handler bound to every configured app.
 */
export function createHubServer(config: SwitchyardConfig, options: HubBootstrapOptions = {}): HubServer {
  const bus = options.bus ?? new EventBus();
  const router = new HandlerRouter<RecordSyncServices>({
    services: { conflictPolicy: config.handlers.conflictPolicy },
    handlerTimeoutMs: config.router.handlerTimeoutMs,
    bus,
  });

  for (const appName of config.handlers.recordSyncApps) {
    router.registerHandler(appName, recordSyncHandlerFactory(appName));
  }

  return new HubServer({
    router,
    host: config.server.host,
    port: config.server.port,
    path: config.server.path,
    maxPayloadBytes: config.server.maxPayloadBytes,
    keepAliveIntervalMs: config.server.keepAliveIntervalMs,
    clientTimeoutMs: config.server.clientTimeoutMs,
    sweeper: config.sweeper,
    authenticator: options.authenticator,
    bus,
  });
}

/**
 * Outbox coordinator over a hub client, caching under `cacheDir`.
 */
export function createSyncCoordinator(
  config: SwitchyardConfig,
  cacheDir: string,
  deviceId: string = '',
): { coordinator: SyncCoordinator; client: HubClient; store: FileCacheStore } {
  const client = new HubClient({
    path: config.server.path,
    responseTimeoutMs: config.client.responseTimeoutMs,
  });
  const store = new FileCacheStore(cacheDir);
  const coordinator = new SyncCoordinator({
    transport: client,
    store,
    appName: config.client.appName,
    appVersion: config.client.appVersion,
    deviceType: config.client.deviceType,
    deviceId,
    serverUrl: config.client.serverUrl,
    targetApp: config.client.targetApp,
    syncThrottleMs: config.client.syncThrottleMs,
    replayIntervalMs: config.client.replayIntervalMs,
  });
  return { coordinator, client, store };
}
