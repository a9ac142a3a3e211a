/**
 * Token Queue Tests
 * Ordering, close/fail signalling and backpressure
 */

import { describe, expect, it } from 'vitest';

import { EngineError, Token, TokenQueue } from '../../src/index.js';

const tok = (value: string): Token => new Token(1, value, 0, value.length);

describe('TokenQueue', () => {
  it('hands out tokens in FIFO order', async () => {
    const queue = new TokenQueue(4);
    queue.put(tok('a'));
    queue.put(tok('b'));

    expect((await queue.take()).token?.value).toBe('a');
    expect((await queue.take()).token?.value).toBe('b');
  });

  it('resolves a waiting consumer on put', async () => {
    const queue = new TokenQueue(1);
    const pending = queue.take();
    queue.put(tok('x'));

    const result = await pending;
    expect(result.closed).toBe(false);
    expect(result.token?.value).toBe('x');
    expect(queue.size).toBe(0);
  });

  it('drains buffered tokens before reporting closed', async () => {
    const queue = new TokenQueue(2);
    queue.put(tok('a'));
    queue.close();

    expect((await queue.take()).token?.value).toBe('a');
    expect(await queue.take()).toEqual({ token: null, closed: true });
    expect(await queue.take()).toEqual({ token: null, closed: true });
  });

  it('releases waiting consumers on close', async () => {
    const queue = new TokenQueue(1);
    const pending = queue.take();
    queue.close();

    expect(await pending).toEqual({ token: null, closed: true });
  });

  it('rejects waiting and later consumers after fail, buffered tokens first', async () => {
    const queue = new TokenQueue(2);
    queue.put(tok('a'));
    queue.fail(new Error('boom'));

    expect((await queue.take()).token?.value).toBe('a');
    await expect(queue.take()).rejects.toThrow('boom');
  });

  it('rejects a consumer already waiting when failed', async () => {
    const queue = new TokenQueue(1);
    const pending = expect(queue.take()).rejects.toThrow('boom');
    queue.fail(new Error('boom'));

    await pending;
  });

  it('refuses tokens after close', () => {
    const queue = new TokenQueue(1);
    queue.close();

    expect(() => queue.put(tok('a'))).toThrow(EngineError);
    expect(() => queue.put(tok('a'))).toThrow(
      'Token emitted after the token stream was closed'
    );
  });

  it('keeps FIFO order when the ring wraps around', async () => {
    const queue = new TokenQueue(4);
    queue.put(tok('a'));
    queue.put(tok('b'));
    queue.put(tok('c'));
    expect((await queue.take()).token?.value).toBe('a');
    queue.put(tok('d'));
    queue.put(tok('e'));

    expect(queue.slotCount).toBe(4);
    expect(queue.drain().map((t) => t.value)).toEqual(['b', 'c', 'd', 'e']);
  });

  it('grows past capacity when overfilled', () => {
    const queue = new TokenQueue(2);
    const values = Array.from({ length: 40 }, (_, i) => String(i));
    for (const value of values) queue.put(tok(value));

    expect(queue.size).toBe(40);
    expect(queue.drain().map((t) => t.value)).toEqual(values);
    expect(queue.size).toBe(0);
  });

  it('holds at most capacity slots while a producer and consumer interleave', async () => {
    const queue = new TokenQueue(8);
    let peak = 0;

    const produce = async (): Promise<void> => {
      for (let i = 0; i < 1000; i++) {
        queue.put(tok(String(i)));
        peak = Math.max(peak, queue.slotCount);
        if (queue.isFull) await queue.waitForSpace();
      }
      queue.close();
    };
    const consume = async (): Promise<string[]> => {
      const seen: string[] = [];
      for (;;) {
        const result = await queue.take();
        if (result.closed) return seen;
        seen.push(result.token.value);
      }
    };

    const [, seen] = await Promise.all([produce(), consume()]);

    expect(seen).toHaveLength(1000);
    expect(seen[0]).toBe('0');
    expect(seen[999]).toBe('999');
    expect(peak).toBeLessThanOrEqual(8);
  });

  describe('waitForSpace', () => {
    it('resolves immediately below capacity', async () => {
      const queue = new TokenQueue(2);
      queue.put(tok('a'));

      await expect(queue.waitForSpace()).resolves.toBeUndefined();
    });

    it('waits until a consumer takes a token', async () => {
      const queue = new TokenQueue(1);
      queue.put(tok('a'));
      expect(queue.isFull).toBe(true);

      let resumed = false;
      const space = queue.waitForSpace().then(() => {
        resumed = true;
      });
      await Promise.resolve();
      expect(resumed).toBe(false);

      await queue.take();
      await space;
      expect(resumed).toBe(true);
    });

    it('resumes the producer when the queue is drained', async () => {
      const queue = new TokenQueue(1);
      queue.put(tok('a'));
      const space = queue.waitForSpace();

      expect(queue.drain().map((t) => t.value)).toEqual(['a']);
      await expect(space).resolves.toBeUndefined();
    });
  });
});
