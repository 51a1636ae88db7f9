/**
 * StaleConnectionSweeper — periodic eviction of connections whose
 * heartbeat went quiet. Runs until stopped; a failing pass is logged and
 * the loop continues.
 */

import type pino from 'pino';
import { componentLogger } from '../core/logger.js';
import { EventBus } from '../core/events.js';
import { errorMessage } from '../core/result.js';
import { abortableDelay } from '../utils/async.js';
import type { ConnectionRegistry } from './connection-registry.js';

export interface StaleSweeperOptions {
  registry: ConnectionRegistry;
  cleanupIntervalMs?: number;
  maxConnectionAgeMs?: number;
  bus?: EventBus;
}

export const DEFAULT_CLEANUP_INTERVAL_MS = 5 * 60 * 1000;
export const DEFAULT_MAX_CONNECTION_AGE_MS = 30 * 60 * 1000;

export class StaleConnectionSweeper {
  private readonly registry: ConnectionRegistry;
  private readonly cleanupIntervalMs: number;
  private readonly maxConnectionAgeMs: number;
  private readonly bus: EventBus;
  private readonly logger: pino.Logger;
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;

  constructor(options: StaleSweeperOptions) {
    this.registry = options.registry;
    this.cleanupIntervalMs = options.cleanupIntervalMs ?? DEFAULT_CLEANUP_INTERVAL_MS;
    this.maxConnectionAgeMs = options.maxConnectionAgeMs ?? DEFAULT_MAX_CONNECTION_AGE_MS;
    this.bus = options.bus ?? new EventBus();
    this.logger = componentLogger('stale-sweeper');
  }

  get running(): boolean {
    return this.controller !== null;
  }

  start(): void {
    if (this.controller) return;
    this.controller = new AbortController();
    this.logger.info(
      { cleanupIntervalMs: this.cleanupIntervalMs, maxConnectionAgeMs: this.maxConnectionAgeMs },
      'Connection cleanup service started',
    );
    this.loop = this.run(this.controller.signal);
  }

  /** Stop the loop and wait for an in-flight pass to finish. */
  async stop(): Promise<void> {
    if (!this.controller) return;
    this.controller.abort();
    this.controller = null;
    const loop = this.loop;
    this.loop = null;
    await loop;
    this.logger.info('Connection cleanup service stopped');
  }

  /** One eviction pass; returns the number of connections removed. */
  sweepOnce(): number {
    const removed = this.registry.cleanupStale(this.maxConnectionAgeMs);
    const remaining = this.registry.totalCount;
    this.logger.debug({ removed, remaining }, 'Sweep pass completed');
    this.bus.emit('sweep:completed', { removed, remaining, timestamp: Date.now() });
    return removed;
  }

  async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      const elapsed = await abortableDelay(this.cleanupIntervalMs, signal);
      if (!elapsed) break;

      try {
        this.sweepOnce();
      } catch (err) {
        this.logger.error({ err: errorMessage(err) }, 'Error during connection cleanup');
      }
    }
  }
}
