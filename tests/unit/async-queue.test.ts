import { describe, it, expect } from 'vitest';
import { getEventListeners } from 'node:events';
import { AsyncQueue } from '../../src/bus/async-queue.js';

describe('AsyncQueue', () => {
  it('should consume offered items in order', async () => {
    const q = new AsyncQueue<string>();
    q.offer('a');
    q.offer('b');
    expect(await q.consume()).toBe('a');
    expect(await q.consume()).toBe('b');
  });

  it('should refuse offers once full', () => {
    const q = new AsyncQueue<number>(2);
    expect(q.offer(1)).toBe(true);
    expect(q.offer(2)).toBe(true);
    expect(q.offer(3)).toBe(false);
    expect(q.size).toBe(2);
    expect(q.capacity).toBe(2);
  });

  it('should hand an offer directly to a waiting consumer', async () => {
    const q = new AsyncQueue<string>(1);
    const waiting = q.consume();
    expect(q.pending).toBe(1);

    expect(q.offer('direct')).toBe(true);
    expect(q.size).toBe(0);
    expect(q.pending).toBe(0);
    expect(await waiting).toBe('direct');
  });

  it('should accept a new item after a consume frees space', async () => {
    const q = new AsyncQueue<number>(1);
    q.offer(1);
    expect(q.offer(2)).toBe(false);
    await q.consume();
    expect(q.offer(2)).toBe(true);
  });

  it('should reject a waiting consume on abort', async () => {
    const q = new AsyncQueue<number>();
    const ac = new AbortController();

    const waiting = q.consume(ac.signal);
    ac.abort();

    await expect(waiting).rejects.toThrow('Aborted');
    expect(q.pending).toBe(0);
  });

  it('should throw immediately if signal already aborted', async () => {
    const q = new AsyncQueue<number>();
    const ac = new AbortController();
    ac.abort();

    await expect(q.consume(ac.signal)).rejects.toThrow();
  });

  it('should detach the abort listener once a waiting consume is served', async () => {
    const q = new AsyncQueue<number>();
    const ac = new AbortController();

    for (let i = 0; i < 20; i++) {
      const waiting = q.consume(ac.signal);
      expect(getEventListeners(ac.signal, 'abort')).toHaveLength(1);
      q.offer(i);
      expect(await waiting).toBe(i);
    }
    expect(getEventListeners(ac.signal, 'abort')).toHaveLength(0);
  });
});
