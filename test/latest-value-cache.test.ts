import {jest} from '@jest/globals';

import {Anycast} from '../src/anycast';
import {Broadcast} from '../src/broadcast';
import {ChannelsError} from '../src/errors';
import {LatestValueCache} from '../src/latest-value-cache';

const macrotask = () => new Promise(resolve => setTimeout(resolve, 0));

describe('LatestValueCache', () => {
  it('should always give out the latest value', async () => {
    const channel = new Broadcast<number>('lvc-test');
    const cache = new LatestValueCache(channel.newReceiver(), {
      uniqueId: 'cache',
    });
    const sender = channel.newSender();

    expect(cache.uniqueId).toBe('cache');
    expect(cache.hasValue()).toBe(false);
    expect(() => cache.get()).toThrow(ChannelsError);
    expect(() => cache.get()).toThrow(
      'event-channels: latest-value-cache: cache: no value has been received yet'
    );

    await sender.send(5);
    await sender.send(6);
    await macrotask();
    expect(cache.hasValue()).toBe(true);
    expect(cache.get()).toBe(6);
    expect(cache.get()).toBe(6);

    await sender.send(12);
    await macrotask();
    expect(cache.get()).toBe(12);

    for (const v of [15, 18, 19]) {
      await sender.send(v);
    }
    await macrotask();
    expect(cache.get()).toBe(19);

    await cache.stop();
  });

  it('should derive an id', () => {
    const cache = new LatestValueCache(new Anycast<number>('test').newReceiver());
    expect(cache.uniqueId).toMatch(/^latest-value-cache-\d+$/);
    expect(String(cache)).toBe(`LatestValueCache(${cache.uniqueId})`);
    return cache.stop();
  });

  it('should keep the latest value after stopping', async () => {
    const channel = new Anycast<number>('test');
    const sender = channel.newSender();
    const cache = new LatestValueCache(channel.newReceiver());

    await sender.send(1);
    await macrotask();
    await cache.stop();

    await sender.send(2);
    await macrotask();
    expect(cache.get()).toBe(1);
  });

  it('should stop quietly when the receiver stops', async () => {
    const error = jest.spyOn(console, 'error').mockImplementation(() => {});
    try {
      const channel = new Anycast<number>('test');
      const sender = channel.newSender();
      const cache = new LatestValueCache(channel.newReceiver());
      await sender.send(1);
      channel.close();
      await cache.stop();
      expect(cache.get()).toBe(1);
      expect(error).not.toHaveBeenCalled();
    } finally {
      error.mockRestore();
    }
  });

  it('should log a failing receiver', async () => {
    const error = jest.spyOn(console, 'error').mockImplementation(() => {});
    try {
      const channel = new Anycast<number>('test');
      const failure = new Error('predicate failed');
      const cache = new LatestValueCache(
        channel.newReceiver().filter(() => {
          throw failure;
        }),
        {uniqueId: 'cache'}
      );
      await channel.newSender().send(1);
      await cache.stop();
      expect(cache.hasValue()).toBe(false);
      expect(error).toHaveBeenCalledWith(
        '[event-channels:latest-value-cache] cache: receiver failed',
        failure
      );
    } finally {
      error.mockRestore();
    }
  });
});
