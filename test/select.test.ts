import {Anycast} from '../src/anycast';
import {Broadcast} from '../src/broadcast';
import {
  ArgumentError,
  ReceiverStoppedError,
  SelectErrorGroup,
  UnhandledSelectedError,
} from '../src/errors';
import {Receiver} from '../src/receiver';
import {select, selectedFrom} from '../src/select';

const macrotask = () => new Promise(resolve => setTimeout(resolve, 0));

// never ready, and fails to clean up when its wait is aborted
class FailingReceiver extends Receiver<number> {
  ready(): boolean {
    return false;
  }

  wait(abort?: AbortSignal): Promise<boolean> {
    return new Promise<boolean>((_resolve, reject) => {
      abort?.addEventListener(
        'abort',
        () => {
          reject(new Error('cleanup failed'));
        },
        {once: true}
      );
    });
  }

  consume(): number {
    throw new Error('not ready');
  }

  close(): void {}

  toString(): string {
    return 'failing';
  }
}

describe('select', () => {
  it('should require at least one receiver', () => {
    expect(() => select()).toThrow(ArgumentError);
  });

  it('should select messages, then stopped receivers, then end', async () => {
    const numbers = new Anycast<number>('numbers');
    const letters = new Broadcast<string>('letters');
    const a = numbers.newReceiver();
    const b = letters.newReceiver();
    const numberSender = numbers.newSender();
    const letterSender = letters.newSender();
    await numberSender.send(1);
    await letterSender.send('x');
    numberSender.close();
    letterSender.close();

    const log: string[] = [];
    for await (const selected of select(a, b)) {
      if (selectedFrom(selected, a)) {
        log.push(selected.wasStopped ? 'a:stopped' : `a:${selected.message}`);
      } else if (selectedFrom(selected, b)) {
        log.push(selected.wasStopped ? 'b:stopped' : `b:${selected.message}`);
      }
    }
    expect(log).toStrictEqual(['a:1', 'b:x', 'a:stopped', 'b:stopped']);
  });

  it('should rotate the poll order every round', async () => {
    const chanA = new Anycast<string>('a');
    const chanB = new Anycast<string>('b');
    const a = chanA.newReceiver();
    const b = chanB.newReceiver();
    const senderA = chanA.newSender();
    const senderB = chanB.newSender();
    for (let i = 1; i <= 3; i++) {
      await senderA.send(`a${i}`);
      await senderB.send(`b${i}`);
    }
    senderA.close();
    senderB.close();

    const log: string[] = [];
    for await (const selected of select(a, b)) {
      if (selectedFrom(selected, a) || selectedFrom(selected, b)) {
        log.push(selected.wasStopped ? 'stopped' : selected.message);
      }
    }
    expect(log).toStrictEqual([
      'a1',
      'b1',
      'b2',
      'a2',
      'a3',
      'b3',
      'stopped',
      'stopped',
    ]);
  });

  it('should wait until a receiver is ready', async () => {
    const chan = new Anycast<number>('test');
    const receiver = chan.newReceiver();
    const sender = chan.newSender();

    const loop = (async () => {
      for await (const selected of select(receiver)) {
        if (selectedFrom(selected, receiver)) {
          return selected.message;
        }
      }
      return undefined;
    })();
    await macrotask();
    await sender.send(42);
    expect(await loop).toBe(42);
  });

  it('should expose the outcome of a stopped receiver', async () => {
    const chan = new Anycast<number>('test');
    const receiver = chan.newReceiver();
    chan.close();

    for await (const selected of select(receiver)) {
      expect(selectedFrom(selected, receiver)).toBe(true);
      expect(selected.wasStopped).toBe(true);
      expect(selected.exception).toBeInstanceOf(ReceiverStoppedError);
      expect(() => selected.message).toThrow(ReceiverStoppedError);
      expect(String(selected)).toBe('Selected(test:receiver)');
    }
  });

  it('should throw if a selected value was not handled', async () => {
    const chan = new Anycast<number>('test');
    const receiver = chan.newReceiver();
    await chan.newSender().send(1);

    const other = new Anycast<number>('other').newReceiver();
    const loop = async () => {
      for await (const selected of select(receiver)) {
        // the wrong receiver
        selectedFrom(selected, other);
      }
    };
    const err = await loop().then(
      () => undefined,
      (e: unknown) => e
    );
    expect(err).toBeInstanceOf(UnhandledSelectedError);
    if (err instanceof UnhandledSelectedError) {
      expect(err.message).toBe(
        'event-channels: select: Selected(test:receiver) was not handled'
      );
      expect(err.selected.message).toBe(1);
    }
  });

  it('should abort waits in flight when the loop ends', async () => {
    const chanA = new Anycast<number>('a');
    const chanB = new Anycast<number>('b');
    const a = chanA.newReceiver();
    const b = chanB.newReceiver();

    const loop = (async () => {
      for await (const selected of select(a, b)) {
        if (selectedFrom(selected, a)) {
          break;
        }
      }
    })();
    await macrotask();
    await chanA.newSender().send(1);
    await loop;

    // b is no longer waiting, so the message stays available
    await chanB.newSender().send(2);
    expect(b.ready()).toBe(true);
    expect(b.consume()).toBe(2);
  });

  it('should throw every failure collected while stopping', async () => {
    const chan = new Anycast<number>('test');
    const receiver = chan.newReceiver();
    const failing = new FailingReceiver();

    const loop = (async () => {
      for await (const selected of select(failing, receiver)) {
        if (selectedFrom(selected, receiver)) {
          return selected.message;
        }
      }
      return undefined;
    })();
    await macrotask();
    await chan.newSender().send(7);

    const err = await loop.then(
      () => undefined,
      (e: unknown) => e
    );
    expect(err).toBeInstanceOf(SelectErrorGroup);
    if (err instanceof SelectErrorGroup) {
      expect(err.errors).toHaveLength(1);
      expect(err.errors[0]).toBeInstanceOf(Error);
      expect(String(err.errors[0])).toBe('Error: cleanup failed');
    }
  });

  it('should keep the error that ended the loop as the cause', async () => {
    const chan = new Anycast<number>('test');
    const receiver = chan.newReceiver();
    const failing = new FailingReceiver();

    const loop = (async () => {
      for await (const selected of select(failing, receiver)) {
        // the message from receiver is never handled
        selectedFrom(selected, failing);
      }
    })();
    await macrotask();
    await chan.newSender().send(7);

    const err = await loop.then(
      () => undefined,
      (e: unknown) => e
    );
    expect(err).toBeInstanceOf(SelectErrorGroup);
    if (err instanceof SelectErrorGroup) {
      expect(err.errors).toHaveLength(1);
      expect(String(err.errors[0])).toBe('Error: cleanup failed');
      expect(err.cause).toBeInstanceOf(UnhandledSelectedError);
    }
  });

  it('should narrow through the receiver method', async () => {
    const chan = new Anycast<number>('test');
    const receiver = chan.newReceiver();
    const sender = chan.newSender();
    await sender.send(3);
    sender.close();

    const log: string[] = [];
    for await (const selected of select(receiver)) {
      if (receiver.triggered(selected)) {
        log.push(selected.wasStopped ? 'stopped' : `got ${selected.message}`);
      }
    }
    expect(log).toStrictEqual(['got 3', 'stopped']);
  });

  it('should select a receiver whose wait failed, once', async () => {
    const chan = new Anycast<number>('test');
    const receiver = chan.newReceiver();
    const broken = chan.newReceiver();
    // a second wait on the same receiver fails
    const pending = broken.wait();

    const log: string[] = [];
    for await (const selected of select(broken)) {
      if (selectedFrom(selected, broken)) {
        log.push(String(selected.exception));
      }
    }
    expect(log).toStrictEqual([
      'ReceiverError: event-channels: anycast: receiver test:receiver is already waiting',
    ]);

    chan.close();
    expect(await pending).toBe(false);
    expect(receiver.ready()).toBe(false);
  });
});
