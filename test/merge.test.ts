import {Anycast} from '../src/anycast';
import {Broadcast} from '../src/broadcast';
import {ArgumentError, ReceiverStoppedError} from '../src/errors';
import {merge} from '../src/merge';

describe('merge', () => {
  it('should require at least one receiver', () => {
    expect(() => merge()).toThrow(ArgumentError);
    expect(() => merge()).toThrow(
      'event-channels: merge: at least one receiver must be provided'
    );
  });

  it('should stop once every source is closed', async () => {
    const chan1 = new Anycast<number>('chan1');
    const chan2 = new Anycast<number>('chan2');
    const merger = merge(chan1.newReceiver(), chan2.newReceiver());

    merger.close();

    expect(chan1.isClosed).toBe(true);
    expect(chan2.isClosed).toBe(true);
    await expect(merger.receive()).rejects.toBeInstanceOf(ReceiverStoppedError);
  });

  it('should deliver every message exactly once, alternating sources', async () => {
    const numbers = new Anycast<number>('numbers');
    const letters = new Broadcast<string>('letters');
    const merger = merge(numbers.newReceiver(), letters.newReceiver());

    const numberSender = numbers.newSender();
    const letterSender = letters.newSender();
    for (const n of [1, 2, 3]) {
      await numberSender.send(n);
    }
    for (const s of ['a', 'b']) {
      await letterSender.send(s);
    }
    numberSender.close();
    letterSender.close();

    const received: (number | string)[] = [];
    for await (const message of merger) {
      received.push(message);
    }
    expect(received).toStrictEqual([1, 'a', 2, 'b', 3]);
  });

  it('should wait for whichever source is ready first', async () => {
    const numbers = new Anycast<number>('numbers');
    const letters = new Anycast<string>('letters');
    const merger = merge(numbers.newReceiver(), letters.newReceiver());

    const first = merger.receive();
    await letters.newSender().send('a');
    expect(await first).toBe('a');

    // the wait that lost the race left its source untouched
    await numbers.newSender().send(1);
    expect(await merger.receive()).toBe(1);
    expect(merger.ready()).toBe(false);
  });

  it('should raise the failure of a source', async () => {
    const chan = new Anycast<number>('test');
    const merger = merge(
      chan.newReceiver().filter(() => {
        throw new Error('predicate failed');
      })
    );
    await chan.newSender().send(1);
    await expect(merger.receive()).rejects.toThrow('predicate failed');
    expect(merger.ready()).toBe(false);
  });

  it('should forward abort to the sources', async () => {
    const chan = new Anycast<number>('test');
    const merger = merge(chan.newReceiver());
    const abort = new AbortController();
    const reason = new Error('some reason');
    const waiting = merger.wait(abort.signal);
    abort.abort(reason);
    await expect(waiting).rejects.toBe(reason);

    await chan.newSender().send(1);
    expect(await merger.receive()).toBe(1);
  });
});
