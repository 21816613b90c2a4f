import {Anycast} from '../src/anycast';
import {ReceiverStoppedError} from '../src/errors';
import {type Receiver} from '../src/receiver';

describe('Receiver', () => {
  describe('filter', () => {
    it('should narrow the message type with a type guard', async () => {
      const chan = new Anycast<number | string>('test');
      const sender = chan.newSender();
      const strings: Receiver<string> = chan
        .newReceiver()
        .filter((m): m is string => typeof m === 'string');

      await sender.send(1);
      await sender.send('a');
      await sender.send(2);
      await sender.send('b');

      expect(await strings.receive()).toBe('a');
      expect(await strings.receive()).toBe('b');
      expect(strings.ready()).toBe(false);
    });

    it('should stop when the upstream receiver stops', async () => {
      const chan = new Anycast<number>('test');
      const filtered = chan.newReceiver().filter(n => n > 0);
      chan.close();

      const err = await filtered.receive().then(
        () => undefined,
        (e: unknown) => e
      );
      expect(err).toBeInstanceOf(ReceiverStoppedError);
      if (err instanceof ReceiverStoppedError) {
        expect(err.receiver).toBe(filtered);
        expect(err.cause).toBeInstanceOf(ReceiverStoppedError);
      }
      expect(String(filtered)).toBe('Filter:test:receiver');
    });

    it('should record a failing predicate', async () => {
      const chan = new Anycast<number>('test');
      const failure = new Error('predicate failed');
      const filtered = chan.newReceiver().filter(() => {
        throw failure;
      });
      await chan.newSender().send(1);

      expect(filtered.ready()).toBe(false);
      expect(await filtered.wait()).toBe(false);
      expect(() => filtered.consume()).toThrow(failure);
    });
  });

  describe('map', () => {
    it('should chain with filter', async () => {
      const chan = new Anycast<number>('test');
      const sender = chan.newSender();
      const receiver = chan
        .newReceiver()
        .map(n => n * 10)
        .filter(n => n > 15);
      expect(String(receiver)).toBe('Filter:Mapper:test:receiver');

      await sender.send(1);
      await sender.send(2);
      expect(await receiver.receive()).toBe(20);
    });

    it('should close the upstream receiver', () => {
      const chan = new Anycast<number>('test');
      chan.newReceiver().map(String).close();
      expect(chan.isClosed).toBe(true);
    });
  });

  describe('async iterator', () => {
    it('should end on throw', async () => {
      const chan = new Anycast<number>('test');
      const iterator = chan.newReceiver()[Symbol.asyncIterator]();
      const reason = new Error('some reason');
      const next = iterator.next();
      expect(await iterator.throw(reason)).toStrictEqual({
        done: true,
        value: undefined,
      });
      await expect(next).rejects.toBe(reason);
    });

    it('should propagate failures', async () => {
      const chan = new Anycast<number>('test');
      const failure = new Error('predicate failed');
      const receiver = chan.newReceiver().filter(() => {
        throw failure;
      });
      await chan.newSender().send(1);

      const iterating = (async () => {
        for await (const _ of receiver) {
          // never reached
        }
      })();
      await expect(iterating).rejects.toBe(failure);
    });
  });
});
