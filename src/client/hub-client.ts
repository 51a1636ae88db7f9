/**
 * HubClient — WebSocket client for the communication hub.
 *
 * Each hub call is an invoke frame with an invocation id; the server pushes
 * its replies as events before it sends the completion, so request/reply
 * helpers subscribe to the reply event first and then invoke.
 */

import WebSocket from 'ws';
import { nanoid } from 'nanoid';
import type pino from 'pino';
import { componentLogger } from '../core/logger.js';
import { EventBus } from '../core/events.js';
import { errorMessage, fail, ok, type Result } from '../core/result.js';
import {
  PUSH_PAYLOAD_SCHEMAS,
  encodeFrame,
  parseServerFrame,
  rawDataToString,
} from '../hub/protocol.js';
import type {
  AppConnection,
  AppRegistration,
  AuthenticationComplete,
  HubMethod,
  HubPushEvent,
  HubPushEvents,
  MessageAck,
  MessageResponse,
  RegistrationComplete,
  ServerStats,
  UniversalMessage,
} from '../hub/types.js';
import type { CloseInfo, SyncTransport } from '../sync/types.js';

export interface HubClientOptions {
  /** Hub path appended when the server URL has none. */
  path?: string;
  responseTimeoutMs?: number;
  idFactory?: () => string;
}

interface PendingInvocation {
  method: HubMethod;
  timer: ReturnType<typeof setTimeout>;
  resolve: (result: Result<void>) => void;
}

interface EventWaiter<T> {
  result: Promise<Result<T>>;
  cancel: () => void;
}

const DEFAULT_RESPONSE_TIMEOUT_MS = 30_000;

export class HubClient implements SyncTransport {
  private ws: WebSocket | null = null;
  private events = new EventBus<HubPushEvents>();
  private closeListeners: Set<(info: CloseInfo) => void> = new Set();
  private pending: Map<string, PendingInvocation> = new Map();
  private invocationSeq = 0;
  private readonly path: string;
  private readonly responseTimeoutMs: number;
  private readonly idFactory: () => string;
  private readonly logger: pino.Logger;

  constructor(options: HubClientOptions = {}) {
    this.path = options.path ?? '/hubs/universal';
    this.responseTimeoutMs = options.responseTimeoutMs ?? DEFAULT_RESPONSE_TIMEOUT_MS;
    this.idFactory = options.idFactory ?? (() => nanoid());
    this.logger = componentLogger('hub-client');
  }

  get isConnected(): boolean {
    return this.ws !== null && this.ws.readyState === WebSocket.OPEN;
  }

  // ─── Connection ───────────────────────────────────────────

  async connect(serverUrl: string): Promise<Result<void>> {
    if (this.isConnected) return ok(undefined);

    let url: string;
    try {
      url = this.resolveUrl(serverUrl);
    } catch (err) {
      return fail('transport', `Invalid server URL ${serverUrl}: ${errorMessage(err)}`);
    }

    return new Promise<Result<void>>((resolve) => {
      let ws: WebSocket;
      try {
        ws = new WebSocket(url, { handshakeTimeout: this.responseTimeoutMs });
      } catch (err) {
        resolve(fail('transport', `Failed to connect to ${url}: ${errorMessage(err)}`));
        return;
      }

      const onOpen = (): void => {
        ws.off('error', onError);
        this.attach(ws);
        this.logger.info({ url }, 'Connected to hub');
        resolve(ok(undefined));
      };
      const onError = (err: Error): void => {
        ws.off('open', onOpen);
        ws.terminate();
        this.logger.warn({ url, err: err.message }, 'Hub connection failed');
        resolve(fail('transport', `Failed to connect to ${url}: ${err.message}`));
      };

      ws.once('open', onOpen);
      ws.once('error', onError);
    });
  }

  async disconnect(): Promise<void> {
    const ws = this.ws;
    if (!ws) return;
    if (ws.readyState === WebSocket.CLOSED) {
      this.ws = null;
      return;
    }
    await new Promise<void>((resolve) => {
      ws.once('close', () => resolve());
      ws.close(1000, 'Client disconnect');
    });
  }

  on<E extends HubPushEvent>(event: E, listener: (payload: HubPushEvents[E]) => void): void {
    this.events.on(event, listener);
  }

  off<E extends HubPushEvent>(event: E, listener: (payload: HubPushEvents[E]) => void): void {
    this.events.off(event, listener);
  }

  onClose(listener: (info: CloseInfo) => void): () => void {
    this.closeListeners.add(listener);
    return () => {
      this.closeListeners.delete(listener);
    };
  }

  // ─── Hub calls ────────────────────────────────────────────

  /** Invoke a hub method and wait for its completion frame. */
  invoke(method: HubMethod, args: unknown[] = []): Promise<Result<void>> {
    const ws = this.ws;
    if (!ws || ws.readyState !== WebSocket.OPEN) {
      return Promise.resolve(fail('transport', 'Not connected'));
    }

    const invocationId = String(++this.invocationSeq);
    return new Promise<Result<void>>((resolve) => {
      const timer = setTimeout(() => {
        this.pending.delete(invocationId);
        resolve(fail('timeout', `${method} timed out after ${this.responseTimeoutMs}ms`));
      }, this.responseTimeoutMs);
      this.pending.set(invocationId, { method, timer, resolve });

      try {
        ws.send(encodeFrame({ type: 'invoke', invocationId, method, args }));
      } catch (err) {
        clearTimeout(timer);
        this.pending.delete(invocationId);
        resolve(fail('transport', errorMessage(err)));
      }
    });
  }

  async registerApp(registration: AppRegistration): Promise<Result<RegistrationComplete>> {
    return this.request('RegisterApp', [registration], 'RegistrationComplete', 'RegistrationError', 'registration');
  }

  async authenticate(userId: string, token?: string): Promise<Result<AuthenticationComplete>> {
    return this.request('AuthenticateUser', [userId, token ?? null], 'AuthenticationComplete', 'AuthenticationError', 'authentication');
  }

  async sendMessage(messageType: string, targetApp: string, data: unknown): Promise<Result<MessageAck>> {
    const message = this.envelope(messageType, targetApp, data, true);
    const ack = this.waitForEvent('MessageAck', a => a.messageId === message.messageId);

    const sent = await this.invoke('SendMessage', [message]);
    if (!sent.ok) {
      ack.cancel();
      return sent;
    }

    const result = await ack.result;
    if (!result.ok) return result;
    if (!result.value.success) {
      return fail('sync', result.value.error ?? `Message ${message.messageId} was not accepted`);
    }
    return result;
  }

  async sendMessageWithResponse(messageType: string, targetApp: string, data: unknown): Promise<Result<MessageResponse>> {
    const message = this.envelope(messageType, targetApp, data, false);
    const response = this.waitForEvent('MessageResponse', r => r.messageId === message.messageId);

    const sent = await this.invoke('SendMessage', [message]);
    if (!sent.ok) {
      response.cancel();
      return sent;
    }
    return response.result;
  }

  async broadcastToApp(targetApp: string, messageType: string, data: unknown): Promise<Result<void>> {
    return this.invoke('BroadcastToApp', [targetApp, messageType, data]);
  }

  async broadcastToUser(userId: string, messageType: string, data: unknown): Promise<Result<void>> {
    return this.invoke('BroadcastToUser', [userId, messageType, data]);
  }

  async heartbeat(): Promise<Result<number>> {
    return this.request('Heartbeat', [], 'HeartbeatAck');
  }

  async getConnectionInfo(): Promise<Result<AppConnection | null>> {
    return this.request('GetConnectionInfo', [], 'ConnectionInfo');
  }

  async getServerStats(): Promise<Result<ServerStats>> {
    return this.request('GetServerStats', [], 'ServerStats');
  }

  /**
   * Resolve with the next payload of `event` that satisfies the predicate,
   * or fail on timeout or when the connection closes.
   */
  waitForEvent<E extends HubPushEvent>(
    event: E,
    predicate: (payload: HubPushEvents[E]) => boolean = () => true,
    timeoutMs: number = this.responseTimeoutMs,
  ): EventWaiter<HubPushEvents[E]> {
    let cancel: () => void = () => {};

    const result = new Promise<Result<HubPushEvents[E]>>((resolve) => {
      const listener = (payload: HubPushEvents[E]): void => {
        if (!predicate(payload)) return;
        cleanup();
        resolve(ok(payload));
      };
      const onClosed = (): void => {
        cleanup();
        resolve(fail('transport', 'Connection closed'));
      };
      const timer = setTimeout(() => {
        cleanup();
        resolve(fail('timeout', `No ${event} within ${timeoutMs}ms`));
      }, timeoutMs);
      const unsubscribeClose = this.onClose(onClosed);
      const cleanup = (): void => {
        clearTimeout(timer);
        this.events.off(event, listener);
        unsubscribeClose();
      };

      this.events.on(event, listener);
      cancel = () => {
        cleanup();
        resolve(fail('transport', 'Cancelled'));
      };
    });

    return { result, cancel };
  }

  // ─── Internal ─────────────────────────────────────────────

  /**
   * Invoke and wait for the reply event. When an error event is named, its
   * arrival before the completion turns into a failure of `errorKind`.
   */
  private async request<E extends HubPushEvent>(
    method: HubMethod,
    args: unknown[],
    replyEvent: E,
    errorEvent?: 'RegistrationError' | 'AuthenticationError',
    errorKind: 'registration' | 'authentication' = 'registration',
  ): Promise<Result<HubPushEvents[E]>> {
    const rejection: { reason?: string } = {};
    const onError = (reason: string): void => {
      rejection.reason = reason;
    };
    if (errorEvent) this.events.on(errorEvent, onError);

    const reply = this.waitForEvent(replyEvent);
    try {
      const sent = await this.invoke(method, args);
      if (!sent.ok) {
        reply.cancel();
        return sent;
      }
      if (rejection.reason !== undefined) {
        reply.cancel();
        return fail(errorKind, rejection.reason);
      }
      return await reply.result;
    } finally {
      if (errorEvent) this.events.off(errorEvent, onError);
    }
  }

  private envelope(messageType: string, targetApp: string, data: unknown, requiresAck: boolean): UniversalMessage {
    return {
      messageId: this.idFactory(),
      messageType,
      sourceApp: '',
      targetApp,
      data,
      requiresAck,
      timestamp: Date.now(),
    };
  }

  private resolveUrl(serverUrl: string): string {
    const url = new URL(serverUrl);
    if (url.protocol === 'http:') url.protocol = 'ws:';
    if (url.protocol === 'https:') url.protocol = 'wss:';
    if (url.pathname === '/' || url.pathname === '') url.pathname = this.path;
    return url.toString();
  }

  private attach(ws: WebSocket): void {
    this.ws = ws;

    ws.on('message', (data: WebSocket.RawData) => {
      this.handleFrame(rawDataToString(data));
    });

    ws.on('error', (err: Error) => {
      this.logger.warn({ err: err.message }, 'Hub socket error');
    });

    ws.on('close', (code: number, reason: Buffer) => {
      if (this.ws === ws) this.ws = null;
      for (const [id, invocation] of this.pending) {
        clearTimeout(invocation.timer);
        invocation.resolve(fail('transport', `Connection closed during ${invocation.method}`));
        this.pending.delete(id);
      }
      this.logger.info({ code }, 'Disconnected from hub');
      const info: CloseInfo = { code, reason: reason.toString('utf-8') };
      for (const listener of [...this.closeListeners]) {
        listener(info);
      }
    });
  }

  private handleFrame(raw: string): void {
    const frame = parseServerFrame(raw);
    if (!frame.ok) {
      this.logger.warn({ detail: frame.detail }, 'Ignoring malformed frame');
      return;
    }

    const value = frame.value;
    switch (value.type) {
      case 'event':
        this.emitPush(value.event, value.payload);
        break;
      case 'completion': {
        const invocation = this.pending.get(value.invocationId);
        if (!invocation) return;
        clearTimeout(invocation.timer);
        this.pending.delete(value.invocationId);
        invocation.resolve(value.error === undefined ? ok(undefined) : fail('validation', value.error));
        break;
      }
      case 'error':
        this.logger.warn({ message: value.message }, 'Hub reported a frame error');
        break;
    }
  }

  private emitPush<E extends HubPushEvent>(event: E, payload: unknown): void {
    const parsed = PUSH_PAYLOAD_SCHEMAS[event].safeParse(payload);
    if (!parsed.success) {
      this.logger.warn({ event }, 'Ignoring push event with unexpected payload');
      return;
    }
    this.events.emit(event, parsed.data);
  }
}
