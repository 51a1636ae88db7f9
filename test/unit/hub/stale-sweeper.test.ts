import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { StaleConnectionSweeper } from '../../../src/hub/stale-sweeper.js';
import { ConnectionRegistry } from '../../../src/hub/connection-registry.js';
import { EventBus } from '../../../src/core/events.js';
import type { HubEvents } from '../../../src/core/types.js';
import { makeConnection } from '../../helpers/hub-fixtures.js';

describe('StaleConnectionSweeper', () => {
  let now: number;
  let bus: EventBus;
  let registry: ConnectionRegistry;
  let sweeper: StaleConnectionSweeper;
  let passes: Array<HubEvents['sweep:completed']>;

  beforeEach(() => {
    vi.useFakeTimers();
    now = 0;
    bus = new EventBus();
    registry = new ConnectionRegistry({ bus, clock: () => now });
    sweeper = new StaleConnectionSweeper({ registry, bus, cleanupIntervalMs: 1_000, maxConnectionAgeMs: 5_000 });
    passes = [];
    bus.on('sweep:completed', e => passes.push(e));
  });

  afterEach(async () => {
    await sweeper.stop();
    vi.useRealTimers();
  });

  it('should evict only connections past the age limit on each tick', async () => {
    registry.add(makeConnection({ connectionId: 'c1', lastHeartbeat: 0 }));
    registry.add(makeConnection({ connectionId: 'c2', lastHeartbeat: 0 }));
    sweeper.start();

    now = 4_000;
    registry.updateHeartbeat('c2');
    await vi.advanceTimersByTimeAsync(1_000);

    expect(passes).toHaveLength(1);
    expect(passes[0]).toMatchObject({ removed: 0, remaining: 2 });

    now = 6_000;
    await vi.advanceTimersByTimeAsync(1_000);

    expect(passes[1]).toMatchObject({ removed: 1, remaining: 1 });
    expect(registry.get('c1')).toBeNull();
    expect(registry.get('c2')).not.toBeNull();
  });

  it('should keep running after a failing pass', async () => {
    const cleanup = vi.spyOn(registry, 'cleanupStale').mockImplementationOnce(() => {
      throw new Error('boom');
    });
    sweeper.start();

    await vi.advanceTimersByTimeAsync(2_000);

    expect(cleanup).toHaveBeenCalledTimes(2);
    expect(passes).toHaveLength(1);
    expect(sweeper.running).toBe(true);
  });

  it('should stop promptly without waiting for the next tick', async () => {
    sweeper.start();
    expect(sweeper.running).toBe(true);

    await sweeper.stop();

    expect(sweeper.running).toBe(false);
    await vi.advanceTimersByTimeAsync(5_000);
    expect(passes).toEqual([]);
  });

  it('should ignore a second start', async () => {
    sweeper.start();
    sweeper.start();

    await vi.advanceTimersByTimeAsync(1_000);
    expect(passes).toHaveLength(1);
  });

  it('should sweep on demand', () => {
    registry.add(makeConnection({ connectionId: 'c1', lastHeartbeat: 0 }));
    now = 5_000;

    expect(sweeper.sweepOnce()).toBe(1);
    expect(passes[0]).toMatchObject({ removed: 1, remaining: 0 });
  });
});
