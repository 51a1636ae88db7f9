/**
 * Topic fan-out — the hub's publish port.
 *
 * The hub never touches sockets. It records which topics each connection
 * belongs to in a SubscriptionSet and asks a TopicPort to deliver; the
 * transport supplies the concrete port.
 */

import type { HubPushEvent, HubPushEvents } from './types.js';

export interface TopicPort {
  subscribe(connectionId: string, topic: string): void;
  unsubscribe(connectionId: string, topic: string): void;
  /** Deliver to every subscriber of a topic; returns the recipient count. */
  publish<E extends HubPushEvent>(topic: string, event: E, payload: HubPushEvents[E]): number;
  /** Deliver to explicit connections; returns the recipient count. */
  sendTo<E extends HubPushEvent>(connectionIds: string[], event: E, payload: HubPushEvents[E]): number;
}

// ═══════════════════════════════════════════════════════════════
// SUBSCRIPTION SET
// ═══════════════════════════════════════════════════════════════

/** Topics one connection has joined, kept in join order. */
export class SubscriptionSet {
  private topics: Set<string> = new Set();

  constructor(readonly connectionId: string) {}

  join(port: TopicPort, topic: string): void {
    if (this.topics.has(topic)) return;
    this.topics.add(topic);
    port.subscribe(this.connectionId, topic);
  }

  leave(port: TopicPort, topic: string): void {
    if (!this.topics.delete(topic)) return;
    port.unsubscribe(this.connectionId, topic);
  }

  /** Leave every topic matching the predicate (all topics by default). */
  release(port: TopicPort, predicate: (topic: string) => boolean = () => true): string[] {
    const released = [...this.topics].filter(predicate);
    for (const topic of released) {
      this.leave(port, topic);
    }
    return released;
  }

  has(topic: string): boolean {
    return this.topics.has(topic);
  }

  list(): string[] {
    return [...this.topics];
  }

  get size(): number {
    return this.topics.size;
  }
}

// ═══════════════════════════════════════════════════════════════
// IN-PROCESS PORT
// ═══════════════════════════════════════════════════════════════

export type Deliver = (connectionId: string, event: HubPushEvent, payload: unknown) => boolean;

/**
 * Topic membership held in memory; delivery delegated to a callback that
 * writes to the connection. A delivery that returns false is not counted.
 */
export class InProcessTopicPort implements TopicPort {
  private members: Map<string, Set<string>> = new Map(); // topic → connectionIds

  constructor(private readonly deliver: Deliver) {}

  subscribe(connectionId: string, topic: string): void {
    let set = this.members.get(topic);
    if (!set) {
      set = new Set();
      this.members.set(topic, set);
    }
    set.add(connectionId);
  }

  unsubscribe(connectionId: string, topic: string): void {
    const set = this.members.get(topic);
    if (!set) return;
    set.delete(connectionId);
    if (set.size === 0) this.members.delete(topic);
  }

  publish<E extends HubPushEvent>(topic: string, event: E, payload: HubPushEvents[E]): number {
    return this.sendTo(this.subscribers(topic), event, payload);
  }

  sendTo<E extends HubPushEvent>(connectionIds: string[], event: E, payload: HubPushEvents[E]): number {
    let delivered = 0;
    for (const connectionId of new Set(connectionIds)) {
      if (this.deliver(connectionId, event, payload)) delivered++;
    }
    return delivered;
  }

  subscribers(topic: string): string[] {
    return [...(this.members.get(topic) ?? [])];
  }

  topicCount(): number {
    return this.members.size;
  }
}
