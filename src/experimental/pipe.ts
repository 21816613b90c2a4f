import {ReceiverStoppedError} from '../errors';
import {log} from '../logger';
import {type Receiver} from '../receiver';
import {type Sender} from '../sender';

const logger = log('pipe');

/**
 * Forwards every message received from a receiver to a sender, in the
 * background, between {@link start} and {@link stop}.
 *
 * The pipe stops by itself once the receiver stops. A failed receive or send
 * is logged, and also stops it.
 *
 * @example
 * ```ts
 * const pipe = new Pipe(upstream.newReceiver(), downstream.newSender());
 * pipe.start();
 * // ...
 * await pipe.stop();
 * ```
 */
export class Pipe<T> {
  readonly #receiver: Receiver<T>;
  readonly #sender: Sender<T>;
  #abort: AbortController | undefined;
  #task: Promise<void> | undefined;

  constructor(receiver: Receiver<T>, sender: Sender<T>) {
    this.#receiver = receiver;
    this.#sender = sender;
  }

  get isRunning(): boolean {
    return this.#task !== undefined;
  }

  /**
   * Starts forwarding, if not already running.
   */
  start(): void {
    if (this.#task !== undefined) {
      return;
    }
    const abort = new AbortController();
    this.#abort = abort;
    const task = this.#run(abort.signal).finally(() => {
      if (this.#task === task) {
        this.#task = undefined;
        this.#abort = undefined;
      }
    });
    this.#task = task;
  }

  /**
   * Stops forwarding, resolving once the background task has finished. A
   * message that was received, but not yet sent, is dropped.
   */
  async stop(): Promise<void> {
    const task = this.#task;
    this.#abort?.abort(pipeStopped);
    await task;
  }

  toString(): string {
    return `Pipe(${String(this.#receiver)} -> ${String(this.#sender)})`;
  }

  async #run(signal: AbortSignal): Promise<void> {
    try {
      for (;;) {
        await this.#receiver.wait(signal);
        await this.#sender.send(this.#receiver.consume(), signal);
      }
    } catch (e: unknown) {
      if (e === pipeStopped || e instanceof ReceiverStoppedError) {
        return;
      }
      logger.error(`${String(this)}: forwarding failed`, e);
    }
  }
}

// sentinel value used as the reason for abort on Pipe.stop
const pipeStopped = Symbol('event-channels.pipeStopped');
