/**
 * HubServer — HTTP + WebSocket host for the communication hub.
 *
 * Uses Node's `http` module for the health endpoint and `ws` for the hub
 * connection. Owns the registry, the hub and the stale-connection sweeper.
 */

import { createServer, type Server, type IncomingMessage, type ServerResponse } from 'http';
import type pino from 'pino';
import { componentLogger } from '../core/logger.js';
import { EventBus } from '../core/events.js';
import { TransportError } from '../core/errors.js';
import { ConnectionRegistry } from './connection-registry.js';
import { CommunicationHub, type Authenticator } from './communication-hub.js';
import type { MessageRouter } from './handler-router.js';
import { StaleConnectionSweeper } from './stale-sweeper.js';
import { WebSocketTransport } from './ws-transport.js';

export interface HubServerOptions {
  router: MessageRouter;
  host?: string;
  port?: number;
  path?: string;
  maxPayloadBytes?: number;
  keepAliveIntervalMs?: number;
  clientTimeoutMs?: number;
  sweeper?: {
    enabled: boolean;
    cleanupIntervalMs: number;
    maxConnectionAgeMs: number;
  };
  authenticator?: Authenticator;
  bus?: EventBus;
}

export interface HealthReport {
  status: 'ok';
  connections: number;
  registeredApps: string[];
  uptimeMs: number;
}

export class HubServer {
  readonly bus: EventBus;
  readonly registry: ConnectionRegistry;
  readonly hub: CommunicationHub;
  private server: Server | null = null;
  private transport: WebSocketTransport;
  private sweeper: StaleConnectionSweeper | null;
  private options: HubServerOptions;
  private startTime: number;
  private logger: pino.Logger;

  constructor(options: HubServerOptions) {
    this.options = options;
    this.startTime = Date.now();
    this.logger = componentLogger('hub-server');
    this.bus = options.bus ?? new EventBus();
    this.registry = new ConnectionRegistry({ bus: this.bus });
    this.transport = new WebSocketTransport({
      path: options.path ?? '/hubs/universal',
      maxPayloadBytes: options.maxPayloadBytes,
      keepAliveIntervalMs: options.keepAliveIntervalMs,
      clientTimeoutMs: options.clientTimeoutMs,
    });
    this.hub = new CommunicationHub({
      registry: this.registry,
      router: options.router,
      topics: this.transport.topics,
      bus: this.bus,
      authenticator: options.authenticator,
    });

    const sweeper = options.sweeper;
    this.sweeper = sweeper && sweeper.enabled
      ? new StaleConnectionSweeper({
        registry: this.registry,
        cleanupIntervalMs: sweeper.cleanupIntervalMs,
        maxConnectionAgeMs: sweeper.maxConnectionAgeMs,
        bus: this.bus,
      })
      : null;
  }

  /**
   * Start listening and return the hub's WebSocket URL.
   */
  async start(): Promise<string> {
    if (this.server) {
      throw new TransportError('Hub server already started');
    }

    const host = this.options.host ?? '0.0.0.0';
    const path = this.options.path ?? '/hubs/universal';

    const server = createServer((req: IncomingMessage, res: ServerResponse) => {
      this.handleHttp(req, res);
    });
    this.server = server;
    this.transport.attach(server, this.hub);

    const port = await new Promise<number>((resolve, reject) => {
      server.once('error', (err: Error) => {
        reject(new TransportError(`Failed to listen on ${host}:${this.options.port ?? 5080}`, undefined, err));
      });
      server.listen(this.options.port ?? 5080, host, () => {
        const addr = server.address();
        resolve(typeof addr === 'object' && addr ? addr.port : this.options.port ?? 5080);
      });
    });

    this.startTime = Date.now();
    this.sweeper?.start();

    const url = `ws://${host === '0.0.0.0' ? '127.0.0.1' : host}:${port}${path}`;
    this.logger.info({ url }, 'Hub server listening');
    return url;
  }

  /**
   * Stop the sweeper, close every connection and the listener.
   */
  async stop(): Promise<void> {
    await this.sweeper?.stop();
    await this.transport.close();

    const server = this.server;
    this.server = null;
    if (server) {
      await new Promise<void>((resolve) => {
        server.close(() => resolve());
      });
    }
    this.hub.dispose();
    this.logger.info('Hub server stopped');
  }

  health(): HealthReport {
    return {
      status: 'ok',
      connections: this.registry.totalCount,
      registeredApps: this.options.router.registeredApps(),
      uptimeMs: Date.now() - this.startTime,
    };
  }

  get clientCount(): number {
    return this.transport.clientCount;
  }

  private handleHttp(req: IncomingMessage, res: ServerResponse): void {
    const url = req.url || '/';

    if (req.method === 'GET' && url === '/health') {
      res.writeHead(200, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify(this.health()));
      return;
    }

    res.writeHead(404, { 'Content-Type': 'text/plain' });
    res.end('Not Found');
  }
}
