import { describe, it, expect, vi, afterEach } from 'vitest';
import { abortableDelay, sleep, TimeoutError, withTimeout } from '../../../src/utils/async.js';

describe('async utilities', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  describe('sleep', () => {
    it('should resolve after the delay', async () => {
      vi.useFakeTimers();
      let done = false;
      const pending = sleep(100).then(() => {
        done = true;
      });

      await vi.advanceTimersByTimeAsync(99);
      expect(done).toBe(false);
      await vi.advanceTimersByTimeAsync(1);
      await pending;
      expect(done).toBe(true);
    });
  });

  describe('abortableDelay', () => {
    it('should resolve true when the delay elapses', async () => {
      vi.useFakeTimers();
      const controller = new AbortController();
      const pending = abortableDelay(50, controller.signal);

      await vi.advanceTimersByTimeAsync(50);
      await expect(pending).resolves.toBe(true);
    });

    it('should resolve false as soon as the signal aborts', async () => {
      const controller = new AbortController();
      const pending = abortableDelay(60_000, controller.signal);

      controller.abort();
      await expect(pending).resolves.toBe(false);
    });

    it('should resolve false for an already aborted signal', async () => {
      const controller = new AbortController();
      controller.abort();
      await expect(abortableDelay(10, controller.signal)).resolves.toBe(false);
    });
  });

  describe('withTimeout', () => {
    it('should pass through a value that arrives in time', async () => {
      await expect(withTimeout(Promise.resolve('fast'), 100)).resolves.toBe('fast');
    });

    it('should pass through a rejection that arrives in time', async () => {
      await expect(withTimeout(Promise.reject(new Error('nope')), 100)).rejects.toThrow('nope');
    });

    it('should reject with a TimeoutError carrying the deadline', async () => {
      vi.useFakeTimers();
      const pending = withTimeout(new Promise<never>(() => undefined), 250, 'too slow');
      const assertion = expect(pending).rejects.toMatchObject({
        name: 'TimeoutError',
        message: 'too slow',
        timeoutMs: 250,
      });

      await vi.advanceTimersByTimeAsync(250);
      await assertion;
    });

    it('should use a default message', async () => {
      vi.useFakeTimers();
      const pending = withTimeout(new Promise<never>(() => undefined), 30);
      const assertion = expect(pending).rejects.toBeInstanceOf(TimeoutError);

      await vi.advanceTimersByTimeAsync(30);
      await assertion;
      await expect(pending).rejects.toThrow('Operation timed out after 30ms');
    });
  });
});
