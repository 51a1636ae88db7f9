/**
 * Wire frames — JSON text frames exchanged over the WebSocket.
 *
 *   client → server  { type: 'invoke', invocationId?, method, args }
 *   server → client  { type: 'event', event, payload }
 *                    { type: 'completion', invocationId, error? }
 *                    { type: 'error', message }
 */

import { z } from 'zod';
import type { RawData } from 'ws';
import { fail, ok, type Result } from '../core/result.js';
import {
  AppConnectionSchema,
  AuthenticationCompleteSchema,
  BroadcastMessageSchema,
  HUB_PUSH_EVENTS,
  MessageAckSchema,
  MessageResponseSchema,
  RegistrationCompleteSchema,
  ServerStatsSchema,
  type HubPushEvent,
  type HubPushEvents,
} from './types.js';

export const InvokeFrameSchema = z.object({
  type: z.literal('invoke'),
  invocationId: z.string().min(1).optional(),
  method: z.string().min(1),
  args: z.array(z.unknown()).default([]),
});
export type InvokeFrame = z.infer<typeof InvokeFrameSchema>;

export const EventFrameSchema = z.object({
  type: z.literal('event'),
  event: z.enum(HUB_PUSH_EVENTS),
  payload: z.unknown(),
});

export const CompletionFrameSchema = z.object({
  type: z.literal('completion'),
  invocationId: z.string(),
  error: z.string().optional(),
});

export const ErrorFrameSchema = z.object({
  type: z.literal('error'),
  message: z.string(),
});

export const ServerFrameSchema = z.discriminatedUnion('type', [
  EventFrameSchema,
  CompletionFrameSchema,
  ErrorFrameSchema,
]);
export type ServerFrame = z.infer<typeof ServerFrameSchema>;

/** Payload validator for each push event, applied by the receiving client. */
export const PUSH_PAYLOAD_SCHEMAS: { [E in HubPushEvent]: z.ZodType<HubPushEvents[E], z.ZodTypeDef, unknown> } = {
  InitialData: z.unknown(),
  RegistrationComplete: RegistrationCompleteSchema,
  RegistrationError: z.string(),
  AuthenticationComplete: AuthenticationCompleteSchema,
  AuthenticationError: z.string(),
  MessageResponse: MessageResponseSchema,
  MessageAck: MessageAckSchema,
  BroadcastMessage: BroadcastMessageSchema,
  HeartbeatAck: z.number(),
  ConnectionInfo: AppConnectionSchema.nullable(),
  ServerStats: ServerStatsSchema,
};

export function encodeFrame(frame: InvokeFrame | ServerFrame): string {
  return JSON.stringify(frame);
}

function decode<S extends z.ZodTypeAny>(schema: S, raw: string): Result<z.infer<S>> {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return fail('validation', 'Frame is not valid JSON');
  }
  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return fail('validation', `Malformed frame: ${issue ? `${issue.path.join('.') || 'frame'}: ${issue.message}` : 'unknown'}`);
  }
  return ok(parsed.data);
}

export function parseClientFrame(raw: string): Result<InvokeFrame> {
  return decode(InvokeFrameSchema, raw);
}

export function parseServerFrame(raw: string): Result<ServerFrame> {
  return decode(ServerFrameSchema, raw);
}

/** Text of a received frame, whatever buffer shape `ws` delivered it in. */
export function rawDataToString(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf-8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf-8');
  return Buffer.from(data).toString('utf-8');
}
