/**
 * Hub test fixtures: connection and message builders, a delivery log that
 * stands in for sockets, and a scriptable handler.
 */

import type { Deliver } from '../../src/hub/topics.js';
import {
  MessageHandlerResults,
  type AppConnection,
  type AppMessageHandler,
  type CallContext,
  type HubPushEvent,
  type MessageHandlerResult,
  type UniversalMessage,
} from '../../src/hub/types.js';

export function makeConnection(overrides: Partial<AppConnection> = {}): AppConnection {
  return {
    connectionId: 'conn-1',
    appName: 'Inventory',
    appVersion: '1.0.0',
    deviceId: 'device-1',
    deviceType: 'tablet',
    userId: null,
    ipAddress: '10.0.0.1',
    userAgent: 'test-agent',
    connectedAt: 1_000,
    lastHeartbeat: 1_000,
    status: 'connected',
    ...overrides,
  };
}

export function makeMessage(overrides: Partial<UniversalMessage> = {}): UniversalMessage {
  return {
    messageId: 'msg-1',
    messageType: 'Ping',
    sourceApp: '',
    targetApp: 'Inventory',
    userId: null,
    data: null,
    requiresAck: false,
    ...overrides,
  };
}

export function makeContext(connectionId: string): CallContext {
  return { connectionId, ipAddress: '10.0.0.1', userAgent: 'test-agent' };
}

// ─── Delivery log ───────────────────────────────────────────

export interface Delivery {
  connectionId: string;
  event: HubPushEvent;
  payload: unknown;
}

/** Records every push the hub makes; pass `deliver` to an InProcessTopicPort. */
export class DeliveryLog {
  readonly deliveries: Delivery[] = [];
  readonly closed: Set<string> = new Set();

  readonly deliver: Deliver = (connectionId, event, payload) => {
    if (this.closed.has(connectionId)) return false;
    this.deliveries.push({ connectionId, event, payload });
    return true;
  };

  to(connectionId: string): Delivery[] {
    return this.deliveries.filter(d => d.connectionId === connectionId);
  }

  events(connectionId: string): HubPushEvent[] {
    return this.to(connectionId).map(d => d.event);
  }

  /** Payloads of one event type sent to a connection, in delivery order. */
  payloads(connectionId: string, event: HubPushEvent): unknown[] {
    return this.to(connectionId).filter(d => d.event === event).map(d => d.payload);
  }

  recipients(event: HubPushEvent): string[] {
    return this.deliveries.filter(d => d.event === event).map(d => d.connectionId);
  }

  clear(): void {
    this.deliveries.length = 0;
  }
}

// ─── Scriptable handler ─────────────────────────────────────

export class StubHandler implements AppMessageHandler {
  readonly connected: AppConnection[] = [];
  readonly disconnected: AppConnection[] = [];
  readonly handled: Array<{ message: UniversalMessage; connectionId: string }> = [];
  initialData: unknown = null;
  valid = true;
  respond: (message: UniversalMessage) => Promise<MessageHandlerResult> =
    async () => MessageHandlerResults.success({ handled: true });

  constructor(
    readonly appName: string,
    readonly supportedMessageTypes: readonly string[] = ['Ping'],
  ) {}

  async handleMessage(message: UniversalMessage, connectionId: string): Promise<MessageHandlerResult> {
    this.handled.push({ message, connectionId });
    return this.respond(message);
  }

  validateMessage(): boolean {
    return this.valid;
  }

  async onAppConnected(connection: AppConnection): Promise<void> {
    this.connected.push(connection);
  }

  async onAppDisconnected(connection: AppConnection): Promise<void> {
    this.disconnected.push(connection);
  }

  async getInitialData(): Promise<unknown> {
    return this.initialData;
  }
}
