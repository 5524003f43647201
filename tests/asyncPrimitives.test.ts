/**
 * Tests for the bounded channel and the per-key mutex
 */

import { AsyncChannel } from '../src/utils/AsyncChannel.js';
import { KeyedMutex } from '../src/utils/KeyedMutex.js';

describe('AsyncChannel', () => {
  it('should deliver items in order and end on close', async () => {
    const channel = new AsyncChannel<string>(4);
    await channel.push('a');
    await channel.push('b');
    channel.close();

    const received: string[] = [];
    for await (const item of channel) {
      received.push(item);
    }
    expect(received).toEqual(['a', 'b']);
  });

  it('should hand items directly to a waiting reader', async () => {
    const channel = new AsyncChannel<number>(1);
    const pending = channel.next();

    await channel.push(1);

    await expect(pending).resolves.toEqual({ value: 1, done: false });
  });

  it('should make the producer wait while the buffer is full', async () => {
    const channel = new AsyncChannel<string>(1);
    await channel.push('a');
    let settled = false;
    const pending = channel.push('b').then((accepted) => {
      settled = true;
      return accepted;
    });

    await Promise.resolve();
    expect(settled).toBe(false);

    await expect(channel.next()).resolves.toEqual({ value: 'a', done: false });
    await expect(pending).resolves.toBe(true);
    await expect(channel.next()).resolves.toEqual({ value: 'b', done: false });
  });

  it('should deliver buffered items before the failure', async () => {
    const channel = new AsyncChannel<string>(2);
    await channel.push('a');
    channel.fail(new Error('upstream broke'));

    await expect(channel.next()).resolves.toEqual({ value: 'a', done: false });
    await expect(channel.next()).rejects.toThrow('upstream broke');
    await expect(channel.next()).resolves.toEqual({ value: undefined, done: true });
  });

  it('should reject a waiting reader on failure', async () => {
    const channel = new AsyncChannel<string>(2);
    const pending = channel.next();

    channel.fail(new Error('boom'));

    await expect(pending).rejects.toThrow('boom');
  });

  it('should drop items and release the producer on cancel', async () => {
    const onCancel = jest.fn();
    const channel = new AsyncChannel<string>(1, onCancel);
    await channel.push('a');
    const pending = channel.push('b');

    channel.cancel();
    channel.cancel();

    await expect(pending).resolves.toBe(false);
    await expect(channel.push('c')).resolves.toBe(false);
    await expect(channel.next()).resolves.toEqual({ value: undefined, done: true });
    expect(channel.isCancelled).toBe(true);
    expect(onCancel).toHaveBeenCalledTimes(1);
  });

  it('should cancel when the consumer leaves a loop early', async () => {
    const onCancel = jest.fn();
    const channel = new AsyncChannel<number>(4, onCancel);
    await channel.push(1);
    await channel.push(2);

    for await (const item of channel) {
      expect(item).toBe(1);
      break;
    }

    expect(onCancel).toHaveBeenCalledTimes(1);
    expect(channel.isClosed).toBe(true);
  });

  it('should not call onCancel after a normal close', async () => {
    const onCancel = jest.fn();
    const channel = new AsyncChannel<number>(4, onCancel);
    channel.close();

    await channel.return();

    expect(onCancel).not.toHaveBeenCalled();
    expect(channel.isCancelled).toBe(false);
  });

  it('should reject a zero capacity', () => {
    expect(() => new AsyncChannel<number>(0)).toThrow(RangeError);
  });
});

describe('KeyedMutex', () => {
  it('should run holders of the same key one at a time, in order', async () => {
    const mutex = new KeyedMutex<number>();
    const events: string[] = [];
    let open: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      open = resolve;
    });

    const first = mutex.runExclusive(1, async () => {
      events.push('first:start');
      await gate;
      events.push('first:end');
    });
    const second = mutex.runExclusive(1, async () => {
      events.push('second');
    });

    await new Promise((resolve) => setTimeout(resolve, 5));
    expect(events).toEqual(['first:start']);
    expect(mutex.isLocked(1)).toBe(true);

    open();
    await Promise.all([first, second]);
    expect(events).toEqual(['first:start', 'first:end', 'second']);
    expect(mutex.isLocked(1)).toBe(false);
  });

  it('should not block other keys', async () => {
    const mutex = new KeyedMutex<number>();
    const release = await mutex.acquire(1);

    await expect(mutex.runExclusive(2, async () => 'other')).resolves.toBe('other');

    release();
    release();
    expect(mutex.isLocked(1)).toBe(false);
  });

  it('should release the key when the holder throws', async () => {
    const mutex = new KeyedMutex<string>();

    await expect(
      mutex.runExclusive('a', async () => {
        throw new Error('holder failed');
      })
    ).rejects.toThrow('holder failed');

    await expect(mutex.runExclusive('a', async () => 'next')).resolves.toBe('next');
  });
});
