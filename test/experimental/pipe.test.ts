import {jest} from '@jest/globals';

import {Broadcast} from '../../src/broadcast';
import {SenderError} from '../../src/errors';
import {Pipe} from '../../src/experimental';

const macrotask = () => new Promise(resolve => setTimeout(resolve, 0));

describe('Pipe', () => {
  it('should forward messages until stopped', async () => {
    const channel1 = new Broadcast<number>('channel1');
    const channel2 = new Broadcast<number>('channel2');
    const receiver = channel1.newReceiver();
    const sender = channel2.newSender();

    const pipe = new Pipe(channel2.newReceiver(), channel1.newSender());
    expect(pipe.isRunning).toBe(false);
    pipe.start();
    pipe.start();
    expect(pipe.isRunning).toBe(true);

    await sender.send(10);
    expect(await receiver.receive()).toBe(10);
    await sender.send(20);
    expect(await receiver.receive()).toBe(20);

    await pipe.stop();
    expect(pipe.isRunning).toBe(false);

    await sender.send(30);
    await macrotask();
    expect(receiver.ready()).toBe(false);
  });

  it('should stop once the receiver stops', async () => {
    const source = new Broadcast<number>('source');
    const sink = new Broadcast<number>('sink');
    const receiver = sink.newReceiver();
    const pipe = new Pipe(source.newReceiver(), sink.newSender());
    pipe.start();

    const sender = source.newSender();
    await sender.send(1);
    sender.close();
    await macrotask();

    expect(pipe.isRunning).toBe(false);
    expect(await receiver.receive()).toBe(1);
  });

  it('should log a failed send', async () => {
    const error = jest.spyOn(console, 'error').mockImplementation(() => {});
    try {
      const source = new Broadcast<number>('source');
      const sink = new Broadcast<number>('sink');
      const pipe = new Pipe(source.newReceiver(), sink.newSender());
      sink.close();
      pipe.start();

      await source.newSender().send(1);
      await macrotask();

      expect(pipe.isRunning).toBe(false);
      expect(error).toHaveBeenCalledTimes(1);
      expect(error.mock.calls[0][0]).toBe(
        '[event-channels:pipe] Pipe(source:receiver-1 -> sink:sender): forwarding failed'
      );
      expect(error.mock.calls[0][1]).toBeInstanceOf(SenderError);
    } finally {
      error.mockRestore();
    }
  });
});
