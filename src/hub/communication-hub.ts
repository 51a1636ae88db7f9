/**
 * CommunicationHub — protocol entry point.
 *
 * Connection lifecycle: Open (transport accepted) → Registered (AppConnection
 * in the registry, joined App_/Device_ topics) → Authenticated (User_ topic)
 * → Closed. Every client-facing method converts faults into an error-shaped
 * push event; none of them rejects. The hub never retries anything.
 */

import type pino from 'pino';
import { z } from 'zod';
import { componentLogger } from '../core/logger.js';
import { EventBus } from '../core/events.js';
import { errorMessage, fail, ok, type Result } from '../core/result.js';
import type { HubEvents } from '../core/types.js';
import type { ConnectionRegistry } from './connection-registry.js';
import type { MessageRouter } from './handler-router.js';
import { SubscriptionSet, type TopicPort } from './topics.js';
import {
  ALL_CONNECTIONS_TOPIC,
  AppRegistrationSchema,
  Topics,
  UniversalMessageSchema,
  type AppConnection,
  type CallContext,
  type HubMethod,
  type HubPushEvent,
  type HubPushEvents,
  type MessageHandlerResult,
  type ServerStats,
  type UniversalMessage,
} from './types.js';

export interface AuthenticationRequest {
  userId: string;
  token?: string;
  connection: AppConnection;
}

/** Credential check; the default accepts every token. */
export type Authenticator = (request: AuthenticationRequest) => boolean | Promise<boolean>;

export interface CommunicationHubOptions {
  registry: ConnectionRegistry;
  router: MessageRouter;
  topics: TopicPort;
  bus?: EventBus;
  authenticator?: Authenticator;
  clock?: () => number;
}

const AuthenticateArgsSchema = z.tuple([z.string().min(1), z.string().optional().nullable()]);
const BroadcastArgsSchema = z.tuple([z.string().min(1), z.string().min(1), z.unknown()]);

export class CommunicationHub {
  private subscriptions: Map<string, SubscriptionSet> = new Map();
  private readonly registry: ConnectionRegistry;
  private readonly router: MessageRouter;
  private readonly topics: TopicPort;
  private readonly bus: EventBus;
  private readonly authenticator: Authenticator;
  private readonly clock: () => number;
  private readonly logger: pino.Logger;
  private readonly onEvicted = (event: HubEvents['connection:evicted']): void => {
    this.releaseEvicted(event.connection).catch((err: unknown) => {
      this.logger.error({ connectionId: event.connection.connectionId, err: errorMessage(err) }, 'Eviction cleanup failed');
    });
  };

  constructor(options: CommunicationHubOptions) {
    this.registry = options.registry;
    this.router = options.router;
    this.topics = options.topics;
    this.bus = options.bus ?? new EventBus();
    this.authenticator = options.authenticator ?? (() => true);
    this.clock = options.clock ?? Date.now;
    this.logger = componentLogger('communication-hub');

    this.bus.on('connection:evicted', this.onEvicted);
  }

  // ─────────────────────────────────────────────────────────
  // CONNECTION LIFECYCLE
  // ─────────────────────────────────────────────────────────

  onConnect(ctx: CallContext): void {
    this.logger.info(
      { connectionId: ctx.connectionId, ipAddress: ctx.ipAddress, userAgent: ctx.userAgent },
      'New connection',
    );
    this.subscriptionsFor(ctx.connectionId).join(this.topics, ALL_CONNECTIONS_TOPIC);
  }

  async onDisconnect(ctx: CallContext, error?: Error): Promise<void> {
    if (error) {
      this.logger.warn({ connectionId: ctx.connectionId, err: error.message }, 'Connection closed with error');
    } else {
      this.logger.info({ connectionId: ctx.connectionId }, 'Connection closed');
    }

    try {
      const connection = this.registry.get(ctx.connectionId);
      if (connection) {
        await this.router.notifyConnection(connection.appName, connection, false);
      }

      const subscriptions = this.subscriptions.get(ctx.connectionId);
      subscriptions?.release(this.topics, topic => topic !== ALL_CONNECTIONS_TOPIC);
      this.registry.remove(ctx.connectionId);
      subscriptions?.release(this.topics);
    } catch (err) {
      this.logger.error({ connectionId: ctx.connectionId, err: errorMessage(err) }, 'Error during disconnect cleanup');
    } finally {
      this.subscriptions.delete(ctx.connectionId);
    }
  }

  // ─────────────────────────────────────────────────────────
  // REGISTRATION & AUTHENTICATION
  // ─────────────────────────────────────────────────────────

  /**
   * Register the caller as an app instance. The registry entry is added only
   * after handler notification and initial data succeeded, so a failure
   * leaves the connection Open with no half-registered entry.
   */
  async registerApp(ctx: CallContext, registration: unknown): Promise<void> {
    const parsed = AppRegistrationSchema.safeParse(registration);
    if (!parsed.success) {
      this.reply(ctx, 'RegistrationError', `Registration failed: ${formatIssues(parsed.error)}`);
      return;
    }

    const reg = parsed.data;
    const subscriptions = this.subscriptionsFor(ctx.connectionId);
    const appTopic = Topics.app(reg.appName);
    const deviceTopic = Topics.device(reg.deviceType);
    const previous = this.registry.get(ctx.connectionId);

    try {
      if (previous) {
        subscriptions.leave(this.topics, Topics.app(previous.appName));
        subscriptions.leave(this.topics, Topics.device(previous.deviceType));
      }

      const now = this.clock();
      const connection: AppConnection = {
        connectionId: ctx.connectionId,
        appName: reg.appName,
        appVersion: reg.appVersion,
        deviceId: reg.deviceId,
        deviceType: reg.deviceType,
        userId: previous?.userId ?? null,
        ipAddress: ctx.ipAddress,
        userAgent: ctx.userAgent,
        connectedAt: previous?.connectedAt ?? now,
        lastHeartbeat: now,
        status: 'connected',
      };

      subscriptions.join(this.topics, appTopic);
      subscriptions.join(this.topics, deviceTopic);

      await this.router.notifyConnection(reg.appName, connection, true);

      const initialData = await this.router.getInitialData(reg.appName, connection);
      if (initialData !== null && initialData !== undefined) {
        this.reply(ctx, 'InitialData', initialData);
      }

      this.registry.add(connection);

      this.logger.info(
        { connectionId: ctx.connectionId, appName: reg.appName, appVersion: reg.appVersion, deviceType: reg.deviceType, deviceId: reg.deviceId },
        'App registered',
      );

      this.reply(ctx, 'RegistrationComplete', {
        connectionId: ctx.connectionId,
        serverTime: this.clock(),
        registeredApps: this.router.registeredApps(),
        supportedMessageTypes: this.router.supportedMessageTypes(reg.appName),
      });
    } catch (err) {
      this.logger.error({ connectionId: ctx.connectionId, appName: reg.appName, err: errorMessage(err) }, 'Error registering app');
      if (!this.registry.get(ctx.connectionId)) {
        subscriptions.leave(this.topics, appTopic);
        subscriptions.leave(this.topics, deviceTopic);
      }
      this.reply(ctx, 'RegistrationError', `Registration failed: ${errorMessage(err)}`);
    }
  }

  async authenticateUser(ctx: CallContext, userId: unknown, token?: unknown): Promise<void> {
    try {
      const connection = this.registry.get(ctx.connectionId);
      if (!connection) {
        this.reply(ctx, 'AuthenticationError', 'Connection not registered');
        return;
      }

      const args = AuthenticateArgsSchema.safeParse([userId, token]);
      if (!args.success) {
        this.reply(ctx, 'AuthenticationError', `Authentication failed: ${formatIssues(args.error)}`);
        return;
      }
      const [id, authToken] = args.data;

      const accepted = await this.authenticator({ userId: id, token: authToken ?? undefined, connection });
      if (!accepted) {
        this.logger.warn({ connectionId: ctx.connectionId, userId: id }, 'Authentication rejected');
        this.reply(ctx, 'AuthenticationError', 'Authentication rejected');
        return;
      }

      const subscriptions = this.subscriptionsFor(ctx.connectionId);
      if (connection.userId && connection.userId !== id) {
        subscriptions.leave(this.topics, Topics.user(connection.userId));
      }

      this.registry.setUser(ctx.connectionId, id);
      subscriptions.join(this.topics, Topics.user(id));

      this.logger.info({ connectionId: ctx.connectionId, userId: id }, 'User authenticated');
      this.reply(ctx, 'AuthenticationComplete', {
        userId: id,
        connectionId: ctx.connectionId,
        serverTime: this.clock(),
      });
    } catch (err) {
      this.logger.error({ connectionId: ctx.connectionId, err: errorMessage(err) }, 'Error authenticating user');
      this.reply(ctx, 'AuthenticationError', `Authentication failed: ${errorMessage(err)}`);
    }
  }

  // ─────────────────────────────────────────────────────────
  // MESSAGING
  // ─────────────────────────────────────────────────────────

  /**
   * Route one message. The caller always gets a MessageResponse, and
   * exactly one MessageAck when the envelope asked for it.
   */
  async sendMessage(ctx: CallContext, raw: unknown): Promise<void> {
    const parsed = UniversalMessageSchema.safeParse(raw);
    if (!parsed.success) {
      const { messageId, requiresAck } = salvageEnvelope(raw);
      const error = `Invalid message format: ${formatIssues(parsed.error)}`;
      this.reply(ctx, 'MessageResponse', { messageId, success: false, error });
      if (requiresAck) this.ack(ctx, messageId, false, error);
      return;
    }

    const message: UniversalMessage = { ...parsed.data };
    let acked = false;

    try {
      const connection = this.registry.get(ctx.connectionId);
      if (connection) {
        message.sourceApp = connection.appName;
        message.userId = connection.userId;
      }

      this.logger.debug(
        { messageId: message.messageId, messageType: message.messageType, targetApp: message.targetApp },
        'Received message',
      );

      const result = await this.router.routeMessage(message, ctx.connectionId);

      if (result.success) {
        this.reply(ctx, 'MessageResponse', {
          messageId: message.messageId,
          success: true,
          data: result.responseData ?? null,
        });
        if (result.shouldBroadcast) {
          this.broadcastResult(message, result);
        }
      } else {
        this.reply(ctx, 'MessageResponse', {
          messageId: message.messageId,
          success: false,
          error: result.errorMessage ?? 'Message handling failed',
        });
      }

      if (message.requiresAck) {
        acked = true;
        this.ack(ctx, message.messageId, result.success, result.errorMessage ?? null);
      }
    } catch (err) {
      const error = `Internal error: ${errorMessage(err)}`;
      this.logger.error({ messageId: message.messageId, err: errorMessage(err) }, 'Error processing message');
      this.reply(ctx, 'MessageResponse', { messageId: message.messageId, success: false, error });
      if (message.requiresAck && !acked) {
        this.ack(ctx, message.messageId, false, error);
      }
    }
  }

  broadcastToApp(ctx: CallContext, targetApp: unknown, messageType: unknown, data: unknown): number {
    const args = BroadcastArgsSchema.safeParse([targetApp, messageType, data]);
    if (!args.success) {
      this.logger.warn({ connectionId: ctx.connectionId }, 'Rejected malformed BroadcastToApp');
      return 0;
    }
    const [app, type, payload] = args.data;
    return this.publishSafe(Topics.app(app), {
      messageType: type,
      targetApp: app,
      data: payload ?? null,
      timestamp: this.clock(),
    });
  }

  broadcastToUser(ctx: CallContext, userId: unknown, messageType: unknown, data: unknown): number {
    const args = BroadcastArgsSchema.safeParse([userId, messageType, data]);
    if (!args.success) {
      this.logger.warn({ connectionId: ctx.connectionId }, 'Rejected malformed BroadcastToUser');
      return 0;
    }
    const [user, type, payload] = args.data;
    return this.publishSafe(Topics.user(user), {
      messageType: type,
      targetUser: user,
      data: payload ?? null,
      timestamp: this.clock(),
    });
  }

  // ─────────────────────────────────────────────────────────
  // HEALTH & MONITORING
  // ─────────────────────────────────────────────────────────

  heartbeat(ctx: CallContext): void {
    this.registry.updateHeartbeat(ctx.connectionId);
    this.reply(ctx, 'HeartbeatAck', this.clock());
  }

  /** Liveness seen by the transport (a frame or a pong); refreshes the heartbeat without a reply. */
  touch(ctx: CallContext): void {
    this.registry.updateHeartbeat(ctx.connectionId);
  }

  getConnectionInfo(ctx: CallContext): void {
    const connection = this.registry.get(ctx.connectionId);
    this.reply(ctx, 'ConnectionInfo', connection ? { ...connection } : null);
  }

  getServerStats(ctx: CallContext): void {
    this.reply(ctx, 'ServerStats', this.serverStats());
  }

  serverStats(): ServerStats {
    return {
      totalConnections: this.registry.totalCount,
      appConnectionCounts: this.registry.appConnectionCounts(),
      registeredApps: this.router.registeredApps(),
      serverTime: this.clock(),
    };
  }

  // ─────────────────────────────────────────────────────────
  // WIRE DISPATCH
  // ─────────────────────────────────────────────────────────

  /** Invoke a hub method by its wire name. */
  async dispatch(ctx: CallContext, method: HubMethod | string, args: unknown[]): Promise<Result<void>> {
    switch (method) {
      case 'RegisterApp':
        await this.registerApp(ctx, args[0]);
        return ok(undefined);
      case 'AuthenticateUser':
        await this.authenticateUser(ctx, args[0], args[1]);
        return ok(undefined);
      case 'SendMessage':
        await this.sendMessage(ctx, args[0]);
        return ok(undefined);
      case 'BroadcastToApp':
        this.broadcastToApp(ctx, args[0], args[1], args[2]);
        return ok(undefined);
      case 'BroadcastToUser':
        this.broadcastToUser(ctx, args[0], args[1], args[2]);
        return ok(undefined);
      case 'Heartbeat':
        this.heartbeat(ctx);
        return ok(undefined);
      case 'GetConnectionInfo':
        this.getConnectionInfo(ctx);
        return ok(undefined);
      case 'GetServerStats':
        this.getServerStats(ctx);
        return ok(undefined);
      default:
        return fail('validation', `Unknown hub method: ${method}`);
    }
  }

  /** Topics the connection currently belongs to. */
  subscriptionsOf(connectionId: string): string[] {
    return this.subscriptions.get(connectionId)?.list() ?? [];
  }

  dispose(): void {
    this.bus.off('connection:evicted', this.onEvicted);
  }

  // ─── Internal ─────────────────────────────────────────────

  private subscriptionsFor(connectionId: string): SubscriptionSet {
    let set = this.subscriptions.get(connectionId);
    if (!set) {
      set = new SubscriptionSet(connectionId);
      this.subscriptions.set(connectionId, set);
    }
    return set;
  }

  private reply<E extends HubPushEvent>(ctx: CallContext, event: E, payload: HubPushEvents[E]): void {
    try {
      this.topics.sendTo([ctx.connectionId], event, payload);
    } catch (err) {
      this.logger.error({ connectionId: ctx.connectionId, event, err: errorMessage(err) }, 'Failed to reply to caller');
    }
  }

  private ack(ctx: CallContext, messageId: string, success: boolean, error: string | null): void {
    this.reply(ctx, 'MessageAck', {
      messageId,
      connectionId: ctx.connectionId,
      success,
      error,
      processedAt: this.clock(),
    });
  }

  private broadcastResult(message: UniversalMessage, result: MessageHandlerResult): void {
    const payload = {
      messageType: result.broadcastMessageType ?? message.messageType,
      targetApp: message.targetApp,
      data: result.responseData ?? null,
      timestamp: this.clock(),
    };

    try {
      const delivered = result.targetConnections.length > 0
        ? this.topics.sendTo(result.targetConnections, 'BroadcastMessage', payload)
        : this.topics.publish(Topics.app(message.targetApp), 'BroadcastMessage', payload);
      this.logger.debug({ messageType: payload.messageType, targetApp: message.targetApp, delivered }, 'Broadcasted message');
    } catch (err) {
      this.logger.error({ messageType: payload.messageType, targetApp: message.targetApp, err: errorMessage(err) }, 'Error broadcasting message');
    }
  }

  private publishSafe(topic: string, payload: HubPushEvents['BroadcastMessage']): number {
    try {
      return this.topics.publish(topic, 'BroadcastMessage', payload);
    } catch (err) {
      this.logger.error({ topic, err: errorMessage(err) }, 'Error broadcasting message');
      return 0;
    }
  }

  /** Ghost connection evicted by the sweeper: tell its handler, drop its topics. */
  private async releaseEvicted(connection: AppConnection): Promise<void> {
    await this.router.notifyConnection(connection.appName, connection, false);
    this.subscriptions
      .get(connection.connectionId)
      ?.release(this.topics, topic => topic !== ALL_CONNECTIONS_TOPIC);
  }
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : 'input'}: ${issue.message}`)
    .join('; ');
}

/** Best-effort recovery of ack fields from an envelope that failed validation. */
function salvageEnvelope(raw: unknown): { messageId: string; requiresAck: boolean } {
  if (typeof raw !== 'object' || raw === null) {
    return { messageId: '', requiresAck: false };
  }
  const messageId = 'messageId' in raw && typeof raw.messageId === 'string' ? raw.messageId : '';
  const requiresAck = 'requiresAck' in raw && raw.requiresAck === true;
  return { messageId, requiresAck };
}
