/**
 * Hub Types — connections, messages, handler contract and push payloads.
 */

import { z } from 'zod';
import type { ErrorKind } from '../core/result.js';

// ═══════════════════════════════════════════════════════════════
// CONNECTIONS
// ═══════════════════════════════════════════════════════════════

export const ConnectionStatusSchema = z.enum(['connected', 'disconnected']);
export type ConnectionStatus = z.infer<typeof ConnectionStatusSchema>;

export const AppConnectionSchema = z.object({
  connectionId: z.string(),
  appName: z.string(),
  appVersion: z.string(),
  deviceId: z.string(),
  deviceType: z.string(),
  /** Bound by AuthenticateUser; null until then. */
  userId: z.string().nullable(),
  ipAddress: z.string(),
  userAgent: z.string(),
  connectedAt: z.number(),
  lastHeartbeat: z.number(),
  status: ConnectionStatusSchema,
});

export type AppConnection = z.infer<typeof AppConnectionSchema>;

export const AppRegistrationSchema = z.object({
  appName: z.string().min(1),
  appVersion: z.string().default(''),
  deviceId: z.string().default(''),
  deviceType: z.string().default('unknown'),
  supportedMessageTypes: z.array(z.string()).default([]),
  metadata: z.record(z.unknown()).default({}),
});

export type AppRegistration = z.input<typeof AppRegistrationSchema>;

// ═══════════════════════════════════════════════════════════════
// MESSAGES
// ═══════════════════════════════════════════════════════════════

export const UniversalMessageSchema = z.object({
  messageId: z.string().min(1),
  messageType: z.string().min(1),
  sourceApp: z.string().default(''),
  targetApp: z.string().min(1),
  userId: z.string().nullable().optional(),
  data: z.unknown(),
  requiresAck: z.boolean().default(false),
  correlationId: z.string().optional(),
  timestamp: z.number().optional(),
});

/** The envelope as it travels on the wire and reaches handlers. */
export type UniversalMessage = z.infer<typeof UniversalMessageSchema>;

export interface MessageHandlerResult {
  success: boolean;
  errorMessage?: string;
  errorKind?: ErrorKind;
  responseData?: unknown;
  shouldBroadcast: boolean;
  broadcastMessageType?: string;
  /** Empty means every connection registered under the target app. */
  targetConnections: string[];
}

export const MessageHandlerResults = {
  success(responseData?: unknown): MessageHandlerResult {
    return { success: true, responseData, shouldBroadcast: false, targetConnections: [] };
  },

  error(errorMessage: string, errorKind: ErrorKind = 'handler'): MessageHandlerResult {
    return { success: false, errorMessage, errorKind, shouldBroadcast: false, targetConnections: [] };
  },

  broadcast(messageType: string, responseData: unknown, targetConnections: string[] = []): MessageHandlerResult {
    return {
      success: true,
      responseData,
      shouldBroadcast: true,
      broadcastMessageType: messageType,
      targetConnections: [...targetConnections],
    };
  },
};

// ═══════════════════════════════════════════════════════════════
// HANDLER CONTRACT
// ═══════════════════════════════════════════════════════════════

/**
 * App-specific business logic. One instance serves every connection of its
 * app, so implementations must tolerate interleaved calls.
 */
export interface AppMessageHandler {
  readonly appName: string;
  readonly supportedMessageTypes: readonly string[];
  handleMessage(message: UniversalMessage, connectionId: string): Promise<MessageHandlerResult>;
  validateMessage(message: UniversalMessage): boolean | Promise<boolean>;
  onAppConnected(connection: AppConnection): Promise<void>;
  onAppDisconnected(connection: AppConnection): Promise<void>;
  getInitialData(connection: AppConnection): Promise<unknown>;
}

// ═══════════════════════════════════════════════════════════════
// PUSH EVENTS (server → client)
// ═══════════════════════════════════════════════════════════════

export const RegistrationCompleteSchema = z.object({
  connectionId: z.string(),
  serverTime: z.number(),
  registeredApps: z.array(z.string()),
  supportedMessageTypes: z.array(z.string()),
});
export type RegistrationComplete = z.infer<typeof RegistrationCompleteSchema>;

export const AuthenticationCompleteSchema = z.object({
  userId: z.string(),
  connectionId: z.string(),
  serverTime: z.number(),
});
export type AuthenticationComplete = z.infer<typeof AuthenticationCompleteSchema>;

export const MessageResponseSchema = z.object({
  messageId: z.string(),
  success: z.boolean(),
  data: z.unknown().optional(),
  error: z.string().optional(),
});
export type MessageResponse = z.infer<typeof MessageResponseSchema>;

export const MessageAckSchema = z.object({
  messageId: z.string(),
  connectionId: z.string(),
  success: z.boolean(),
  error: z.string().nullable(),
  processedAt: z.number(),
});
export type MessageAck = z.infer<typeof MessageAckSchema>;

export const BroadcastMessageSchema = z.object({
  messageType: z.string(),
  targetApp: z.string().optional(),
  targetUser: z.string().optional(),
  data: z.unknown(),
  timestamp: z.number(),
});
export type BroadcastMessage = z.infer<typeof BroadcastMessageSchema>;

export const ServerStatsSchema = z.object({
  totalConnections: z.number(),
  appConnectionCounts: z.record(z.number()),
  registeredApps: z.array(z.string()),
  serverTime: z.number(),
});
export type ServerStats = z.infer<typeof ServerStatsSchema>;

export interface HubPushEvents {
  InitialData: unknown;
  RegistrationComplete: RegistrationComplete;
  RegistrationError: string;
  AuthenticationComplete: AuthenticationComplete;
  AuthenticationError: string;
  MessageResponse: MessageResponse;
  MessageAck: MessageAck;
  BroadcastMessage: BroadcastMessage;
  HeartbeatAck: number;
  ConnectionInfo: AppConnection | null;
  ServerStats: ServerStats;
}

export type HubPushEvent = keyof HubPushEvents;

export const HUB_PUSH_EVENTS = [
  'InitialData',
  'RegistrationComplete',
  'RegistrationError',
  'AuthenticationComplete',
  'AuthenticationError',
  'MessageResponse',
  'MessageAck',
  'BroadcastMessage',
  'HeartbeatAck',
  'ConnectionInfo',
  'ServerStats',
] as const satisfies readonly HubPushEvent[];

export const HUB_METHODS = [
  'RegisterApp',
  'AuthenticateUser',
  'SendMessage',
  'BroadcastToApp',
  'BroadcastToUser',
  'Heartbeat',
  'GetConnectionInfo',
  'GetServerStats',
] as const;

export type HubMethod = (typeof HUB_METHODS)[number];

// ═══════════════════════════════════════════════════════════════
// CALL CONTEXT
// ═══════════════════════════════════════════════════════════════

/** Transport metadata for the connection a hub call arrived on. */
export interface CallContext {
  connectionId: string;
  ipAddress: string;
  userAgent: string;
}

// ═══════════════════════════════════════════════════════════════
// GROUP NAMES
// ═══════════════════════════════════════════════════════════════

export const ALL_CONNECTIONS_TOPIC = 'AllConnections';

export const Topics = {
  app: (appName: string): string => `App_${appName}`,
  device: (deviceType: string): string => `Device_${deviceType}`,
  user: (userId: string): string => `User_${userId}`,
};
