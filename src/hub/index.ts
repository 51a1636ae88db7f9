export * from './types.js';
export { ConnectionRegistry, type ConnectionRegistryOptions } from './connection-registry.js';
export {
  HandlerRouter,
  type HandlerFactory,
  type HandlerRouterOptions,
  type MessageRouter,
} from './handler-router.js';
export { ServiceLocator } from './service-locator.js';
export { SubscriptionSet, InProcessTopicPort, type TopicPort, type Deliver } from './topics.js';
export {
  CommunicationHub,
  type CommunicationHubOptions,
  type Authenticator,
  type AuthenticationRequest,
} from './communication-hub.js';
export {
  StaleConnectionSweeper,
  DEFAULT_CLEANUP_INTERVAL_MS,
  DEFAULT_MAX_CONNECTION_AGE_MS,
  type StaleSweeperOptions,
} from './stale-sweeper.js';
export * from './protocol.js';
export { WebSocketTransport, type WebSocketTransportOptions } from './ws-transport.js';
export { HubServer, type HubServerOptions, type HealthReport } from './server.js';
