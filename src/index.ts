/**
 * switchyard — message hub for connected apps, with an offline-first
 * client outbox.
 * Public exports for programmatic usage
 *
 * @example
 * ```typescript
 * import { ConfigManager, createHubServer } from 'switchyard';
 *
 * const config = new ConfigManager().load({ handlers: { recordSyncApps: ['Inventory'] } });
 * const server = createHubServer(config);
 * const url = await server.start();
 * ```
 */

// Core
export { EventBus } from './core/events.js';
export { ConfigManager } from './core/config.js';
export { createLogger, getLogger, setLogger, componentLogger } from './core/logger.js';
export { AsyncMutex } from './core/mutex.js';
export {
  SwitchyardError,
  ConfigError,
  TransportError,
  RegistrationError,
  AuthenticationError,
  ValidationError,
  HandlerError,
  CacheError,
  SyncError,
  toSwitchyardError,
  unwrap,
} from './core/errors.js';
export { ok, fail, errorMessage, type Result, type Failure, type ErrorKind } from './core/result.js';
export {
  SwitchyardConfigSchema,
  ConflictPolicySchema,
  type SwitchyardConfig,
  type ConflictPolicy,
  type HubEvents,
} from './core/types.js';

// Hub
export * from './hub/index.js';

// Handlers
export * from './handlers/index.js';

// Client
export { HubClient, type HubClientOptions } from './client/hub-client.js';

// Sync
export * from './sync/index.js';

// Wiring
export { createHubServer, createSyncCoordinator, type HubBootstrapOptions } from './bootstrap.js';

export { VERSION, NAME } from './version.js';
