/**
 * WebSocket transport — binds the hub to `ws` connections.
 *
 * Each socket gets a generated connection id. Invocations from one socket
 * are processed in arrival order; push events go out through the
 * in-process topic port this transport owns.
 *
 * Keepalive: every `keepAliveIntervalMs` each socket is pinged. Any frame or
 * pong counts as liveness and refreshes the connection's heartbeat; a socket
 * silent for longer than `clientTimeoutMs` is terminated.
 */

import { WebSocketServer, WebSocket, type RawData } from 'ws';
import type { IncomingMessage, Server } from 'http';
import { nanoid } from 'nanoid';
import type pino from 'pino';
import { componentLogger } from '../core/logger.js';
import { TransportError } from '../core/errors.js';
import { errorMessage } from '../core/result.js';
import type { CommunicationHub } from './communication-hub.js';
import { encodeFrame, parseClientFrame, rawDataToString, type ServerFrame } from './protocol.js';
import { InProcessTopicPort } from './topics.js';
import type { CallContext, HubPushEvent } from './types.js';

export interface WebSocketTransportOptions {
  path?: string;
  maxPayloadBytes?: number;
  /** 0 disables keepalive pings. */
  keepAliveIntervalMs?: number;
  clientTimeoutMs?: number;
  idFactory?: () => string;
  clock?: () => number;
}

const CLOSE_GOING_AWAY = 1001;
const CLOSE_ABNORMAL = 1006;
const DEFAULT_KEEP_ALIVE_INTERVAL_MS = 15_000;
const DEFAULT_CLIENT_TIMEOUT_MS = 60_000;

export class WebSocketTransport {
  readonly topics: InProcessTopicPort;
  private sockets: Map<string, WebSocket> = new Map();
  private lastSeen: Map<string, number> = new Map();
  private wss: WebSocketServer | null = null;
  private keepAliveTimer: ReturnType<typeof setInterval> | null = null;
  private readonly options: WebSocketTransportOptions;
  private readonly keepAliveIntervalMs: number;
  private readonly clientTimeoutMs: number;
  private readonly idFactory: () => string;
  private readonly clock: () => number;
  private readonly logger: pino.Logger;

  constructor(options: WebSocketTransportOptions = {}) {
    this.options = options;
    this.keepAliveIntervalMs = options.keepAliveIntervalMs ?? DEFAULT_KEEP_ALIVE_INTERVAL_MS;
    this.clientTimeoutMs = options.clientTimeoutMs ?? DEFAULT_CLIENT_TIMEOUT_MS;
    this.idFactory = options.idFactory ?? (() => nanoid());
    this.clock = options.clock ?? Date.now;
    this.logger = componentLogger('ws-transport');
    this.topics = new InProcessTopicPort((connectionId, event, payload) =>
      this.deliver(connectionId, event, payload),
    );
  }

  attach(server: Server, hub: CommunicationHub): void {
    if (this.wss) {
      throw new TransportError('Transport already attached');
    }
    this.wss = new WebSocketServer({
      server,
      path: this.options.path,
      maxPayload: this.options.maxPayloadBytes,
    });
    this.wss.on('connection', (ws: WebSocket, req: IncomingMessage) => {
      this.handleConnection(ws, req, hub);
    });
    this.wss.on('error', (err: Error) => {
      this.logger.error({ err: err.message }, 'WebSocket server error');
    });

    if (this.keepAliveIntervalMs > 0) {
      this.keepAliveTimer = setInterval(() => this.checkLiveness(), this.keepAliveIntervalMs);
      this.keepAliveTimer.unref();
    }
  }

  get clientCount(): number {
    return this.sockets.size;
  }

  /** Close every socket and the WebSocket server; the HTTP server is left to its owner. */
  async close(): Promise<void> {
    if (this.keepAliveTimer) {
      clearInterval(this.keepAliveTimer);
      this.keepAliveTimer = null;
    }
    for (const ws of this.sockets.values()) {
      ws.close(CLOSE_GOING_AWAY, 'Server shutting down');
    }
    const wss = this.wss;
    this.wss = null;
    if (!wss) return;
    await new Promise<void>((resolve) => {
      wss.close(() => resolve());
    });
  }

  // ─── Connection handling ──────────────────────────────────

  private handleConnection(ws: WebSocket, req: IncomingMessage, hub: CommunicationHub): void {
    const ctx: CallContext = {
      connectionId: this.idFactory(),
      ipAddress: req.socket.remoteAddress ?? 'unknown',
      userAgent: req.headers['user-agent'] ?? 'unknown',
    };
    this.sockets.set(ctx.connectionId, ws);
    this.lastSeen.set(ctx.connectionId, this.clock());
    hub.onConnect(ctx);

    // Serialises frames of this socket; handleFrame never rejects.
    let chain: Promise<void> = Promise.resolve();

    const alive = (): void => {
      this.lastSeen.set(ctx.connectionId, this.clock());
      hub.touch(ctx);
    };

    ws.on('pong', alive);

    ws.on('message', (data: RawData) => {
      alive();
      const raw = rawDataToString(data);
      chain = chain.then(() => this.handleFrame(ws, ctx, hub, raw));
    });

    ws.on('error', (err: Error) => {
      this.logger.warn({ connectionId: ctx.connectionId, err: err.message }, 'Socket error');
    });

    ws.on('close', (code: number) => {
      this.sockets.delete(ctx.connectionId);
      this.lastSeen.delete(ctx.connectionId);
      const error = code === CLOSE_ABNORMAL
        ? new TransportError('Connection dropped without a close frame')
        : undefined;
      chain = chain.then(() => hub.onDisconnect(ctx, error));
    });
  }

  private checkLiveness(): void {
    const now = this.clock();
    for (const [connectionId, ws] of this.sockets) {
      const seen = this.lastSeen.get(connectionId) ?? now;
      if (now - seen > this.clientTimeoutMs) {
        this.logger.warn({ connectionId, silentMs: now - seen }, 'Terminating unresponsive socket');
        ws.terminate();
        continue;
      }
      if (ws.readyState === WebSocket.OPEN) {
        try {
          ws.ping();
        } catch (err) {
          this.logger.debug({ connectionId, err: errorMessage(err) }, 'Ping failed');
        }
      }
    }
  }

  private async handleFrame(ws: WebSocket, ctx: CallContext, hub: CommunicationHub, raw: string): Promise<void> {
    const frame = parseClientFrame(raw);
    if (!frame.ok) {
      this.send(ws, { type: 'error', message: frame.detail });
      return;
    }

    const { invocationId, method, args } = frame.value;
    const result = await hub.dispatch(ctx, method, args);

    if (invocationId) {
      this.send(ws, result.ok
        ? { type: 'completion', invocationId }
        : { type: 'completion', invocationId, error: result.detail });
    } else if (!result.ok) {
      this.send(ws, { type: 'error', message: result.detail });
    }
  }

  private deliver(connectionId: string, event: HubPushEvent, payload: unknown): boolean {
    const ws = this.sockets.get(connectionId);
    if (!ws) return false;
    return this.send(ws, { type: 'event', event, payload });
  }

  private send(ws: WebSocket, frame: ServerFrame): boolean {
    if (ws.readyState !== WebSocket.OPEN) return false;
    try {
      ws.send(encodeFrame(frame));
      return true;
    } catch (err) {
      this.logger.debug({ err: errorMessage(err) }, 'Send to closing socket failed');
      return false;
    }
  }
}
