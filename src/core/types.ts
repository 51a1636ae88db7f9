import { z } from 'zod';
import type { AppConnection } from '../hub/types.js';

// ===== Configuration =====

export const ConflictPolicySchema = z.enum(['last-write-wins', 'reject-stale']);

export const SwitchyardConfigSchema = z.object({
  server: z.object({
    host: z.string().default('0.0.0.0'),
    port: z.number().int().min(0).max(65535).default(5080),
    path: z.string().startsWith('/').default('/hubs/universal'),
    maxPayloadBytes: z.number().int().positive().default(1024 * 1024),
    /** Ping period for idle sockets; 0 disables keepalive. */
    keepAliveIntervalMs: z.number().int().min(0).default(15_000),
    /** Silence after which a socket is terminated. */
    clientTimeoutMs: z.number().int().positive().default(60_000),
  }).default({}),
  sweeper: z.object({
    enabled: z.boolean().default(true),
    cleanupIntervalMs: z.number().int().positive().default(5 * 60 * 1000),
    maxConnectionAgeMs: z.number().int().positive().default(30 * 60 * 1000),
  }).default({}),
  router: z.object({
    /** Deadline around every call into app-specific handler code. */
    handlerTimeoutMs: z.number().int().positive().default(30_000),
  }).default({}),
  handlers: z.object({
    /** Defaults to the client's default `targetApp`, so a stock server accepts outbox traffic. */
    recordSyncApps: z.array(z.string().min(1)).default(['Server']),
    conflictPolicy: ConflictPolicySchema.default('last-write-wins'),
  }).default({}),
  client: z.object({
    serverUrl: z.string().default('ws://localhost:5080'),
    appName: z.string().default('switchyard-cli'),
    appVersion: z.string().default('0.0.0'),
    deviceType: z.string().default('server'),
    /** App that receives outbox items and document uploads. */
    targetApp: z.string().min(1).default('Server'),
    cacheDir: z.string().optional(),
    syncThrottleMs: z.number().int().min(0).default(100),
    responseTimeoutMs: z.number().int().positive().default(30_000),
    replayIntervalMs: z.number().int().positive().default(60_000),
  }).default({}),
  ui: z.object({
    verbose: z.boolean().default(false),
  }).default({}),
});

export type SwitchyardConfig = z.infer<typeof SwitchyardConfigSchema>;
export type ConflictPolicy = z.infer<typeof ConflictPolicySchema>;

// ===== Hub-side Events =====

export interface HubEvents {
  'connection:added': { connection: AppConnection; timestamp: number };
  'connection:removed': { connection: AppConnection; timestamp: number };
  'connection:evicted': { connection: AppConnection; idleMs: number; timestamp: number };
  'handler:registered': { appName: string; replaced: boolean; timestamp: number };
  'message:routed': {
    messageId: string;
    targetApp: string;
    messageType: string;
    success: boolean;
    durationMs: number;
    timestamp: number;
  };
  'sweep:completed': { removed: number; remaining: number; timestamp: number };
}
