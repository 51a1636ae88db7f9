/**
 * HandlerRouter — resolves a target app to its handler and dispatches.
 *
 * Routing steps: resolve handler → validate → check supported type → handle.
 * Each step that fails produces an error result; nothing thrown inside a
 * handler reaches the caller. Every call into handler code runs under
 * `handlerTimeoutMs`.
 */

import type pino from 'pino';
import { componentLogger } from '../core/logger.js';
import { EventBus } from '../core/events.js';
import { errorMessage } from '../core/result.js';
import { TimeoutError, withTimeout } from '../utils/async.js';
import { ServiceLocator } from './service-locator.js';
import {
  MessageHandlerResults,
  type AppConnection,
  type AppMessageHandler,
  type MessageHandlerResult,
  type UniversalMessage,
} from './types.js';

export type HandlerFactory<S extends object> = (services: ServiceLocator<S>) => AppMessageHandler;

/** The slice of the router the hub depends on. */
export interface MessageRouter {
  routeMessage(message: UniversalMessage, connectionId: string): Promise<MessageHandlerResult>;
  notifyConnection(appName: string, connection: AppConnection, isConnecting: boolean): Promise<void>;
  getInitialData(appName: string, connection: AppConnection): Promise<unknown>;
  supportedMessageTypes(appName: string): string[];
  registeredApps(): string[];
}

export interface HandlerRouterOptions<S extends object> {
  services: S;
  handlerTimeoutMs?: number;
  bus?: EventBus;
}

const DEFAULT_HANDLER_TIMEOUT_MS = 30_000;

export class HandlerRouter<S extends object = Record<string, never>> implements MessageRouter {
  private factories: Map<string, HandlerFactory<S>> = new Map();
  private instances: Map<string, AppMessageHandler> = new Map();
  private readonly services: ServiceLocator<S>;
  private readonly handlerTimeoutMs: number;
  private readonly bus: EventBus;
  private readonly logger: pino.Logger;

  constructor(options: HandlerRouterOptions<S>) {
    this.services = new ServiceLocator(options.services);
    this.handlerTimeoutMs = options.handlerTimeoutMs ?? DEFAULT_HANDLER_TIMEOUT_MS;
    this.bus = options.bus ?? new EventBus();
    this.logger = componentLogger('handler-router');
  }

  // ─── Registration ─────────────────────────────────────────

  /**
   * Bind an app name to a handler factory. Re-binding an app name replaces
   * the previous factory and drops its cached instance.
   */
  registerHandler(appName: string, factory: HandlerFactory<S>): void {
    const replaced = this.factories.has(appName);
    this.factories.set(appName, factory);
    this.instances.delete(appName);

    if (replaced) {
      this.logger.warn({ appName }, 'Handler binding replaced');
    } else {
      this.logger.info({ appName }, 'Registered message handler');
    }
    this.bus.emit('handler:registered', { appName, replaced, timestamp: Date.now() });
  }

  registeredApps(): string[] {
    return [...this.factories.keys()];
  }

  isAppRegistered(appName: string): boolean {
    return this.factories.has(appName);
  }

  supportedMessageTypes(appName: string): string[] {
    const handler = this.resolveHandler(appName);
    return handler ? [...handler.supportedMessageTypes] : [];
  }

  // ─── Routing ──────────────────────────────────────────────

  async routeMessage(message: UniversalMessage, connectionId: string): Promise<MessageHandlerResult> {
    const started = Date.now();
    const result = await this.dispatch(message, connectionId);

    this.bus.emit('message:routed', {
      messageId: message.messageId,
      targetApp: message.targetApp,
      messageType: message.messageType,
      success: result.success,
      durationMs: Date.now() - started,
      timestamp: Date.now(),
    });
    return result;
  }

  async notifyConnection(appName: string, connection: AppConnection, isConnecting: boolean): Promise<void> {
    const handler = this.resolveHandler(appName);
    if (!handler) return;

    try {
      if (isConnecting) {
        await this.bounded(handler.onAppConnected(connection), appName, 'onAppConnected');
      } else {
        await this.bounded(handler.onAppDisconnected(connection), appName, 'onAppDisconnected');
      }
      this.logger.debug({ appName, connectionId: connection.connectionId, isConnecting }, 'Notified handler');
    } catch (err) {
      this.logger.error(
        { appName, connectionId: connection.connectionId, err: errorMessage(err) },
        'Error notifying handler of connection change',
      );
    }
  }

  async getInitialData(appName: string, connection: AppConnection): Promise<unknown> {
    const handler = this.resolveHandler(appName);
    if (!handler) {
      this.logger.warn({ appName }, 'No handler found during initial data request');
      return null;
    }

    try {
      const data = await this.bounded(handler.getInitialData(connection), appName, 'getInitialData');
      return data ?? null;
    } catch (err) {
      this.logger.error({ appName, err: errorMessage(err) }, 'Error getting initial data');
      return null;
    }
  }

  // ─── Internal ─────────────────────────────────────────────

  private async dispatch(message: UniversalMessage, connectionId: string): Promise<MessageHandlerResult> {
    const { targetApp, messageType, messageId } = message;

    const handler = this.resolveHandler(targetApp);
    if (!handler) {
      this.logger.warn({ messageId, targetApp }, 'No handler for app');
      return MessageHandlerResults.error(`No handler for app: ${targetApp}`, 'validation');
    }

    try {
      const valid = await this.bounded(Promise.resolve(handler.validateMessage(message)), targetApp, 'validateMessage');
      if (!valid) {
        this.logger.warn({ messageId, targetApp }, 'Invalid message format');
        return MessageHandlerResults.error(`Invalid message format for app: ${targetApp}`, 'validation');
      }

      if (!handler.supportedMessageTypes.includes(messageType)) {
        this.logger.warn({ messageId, targetApp, messageType }, 'Unsupported message type');
        return MessageHandlerResults.error(`Unsupported message type: ${messageType}`, 'validation');
      }

      this.logger.debug({ messageId, targetApp, messageType, connectionId }, 'Routing message');
      const result = await this.bounded(handler.handleMessage(message, connectionId), targetApp, 'handleMessage');
      this.logger.debug({ messageId, success: result.success }, 'Message handled');
      return result;
    } catch (err) {
      const kind = err instanceof TimeoutError ? 'timeout' : 'handler';
      this.logger.error({ messageId, targetApp, err: errorMessage(err) }, 'Error routing message');
      return MessageHandlerResults.error(`Internal error: ${errorMessage(err)}`, kind);
    }
  }

  /**
   * Lazily create and cache the handler for an app. Factories are
   * synchronous, so create-if-absent cannot interleave on the event loop.
   */
  private resolveHandler(appName: string): AppMessageHandler | null {
    const cached = this.instances.get(appName);
    if (cached) return cached;

    const factory = this.factories.get(appName);
    if (!factory) return null;

    try {
      const handler = factory(this.services);
      this.instances.set(appName, handler);
      this.logger.debug({ appName }, 'Created handler instance');
      return handler;
    } catch (err) {
      this.logger.error({ appName, err: errorMessage(err) }, 'Failed to create handler instance');
      return null;
    }
  }

  private bounded<T>(promise: Promise<T>, appName: string, operation: string): Promise<T> {
    return withTimeout(
      promise,
      this.handlerTimeoutMs,
      `Handler for ${appName} timed out in ${operation} after ${this.handlerTimeoutMs}ms`,
    );
  }
}
