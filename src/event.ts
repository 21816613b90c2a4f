import {ReceiverStoppedError} from './errors';
import {Receiver, newNotReadyError} from './receiver';
import {type Settle, suspend} from './suspend';

let eventCount = 0;

/**
 * A wake-only signal: a receiver with no payload, that is ready once
 * {@link set}, until the message is consumed.
 *
 * Setting an event that is already set has no effect. Once
 * {@link stop}ped, receiving from it raises {@link ReceiverStoppedError}.
 *
 * @example
 * ```ts
 * const shutdown = new Event('shutdown');
 * process.once('SIGTERM', () => shutdown.set());
 * for await (const selected of select(shutdown, jobs)) {
 *   if (selectedFrom(selected, shutdown)) {
 *     break;
 *   }
 *   // ...
 * }
 * ```
 */
export class Event extends Receiver<undefined> {
  readonly name: string;
  #isSet = false;
  #isStopped = false;
  readonly #waiters = new Set<Settle<boolean>>();

  constructor(name?: string) {
    super();
    this.name = name ?? `event-${++eventCount}`;
  }

  get isSet(): boolean {
    return this.#isSet;
  }

  get isStopped(): boolean {
    return this.#isStopped;
  }

  /**
   * Sets the event, waking every wait. No effect once stopped.
   */
  set(): void {
    if (this.#isStopped) {
      return;
    }
    this.#isSet = true;
    this.#wake(true);
  }

  /**
   * Stops the event, waking every wait.
   */
  stop(): void {
    this.#isStopped = true;
    this.#isSet = false;
    this.#wake(false);
  }

  ready(): boolean {
    return this.#isSet;
  }

  wait(abort?: AbortSignal): Promise<boolean> {
    if (this.#isSet || this.#isStopped) {
      try {
        abort?.throwIfAborted();
      } catch (e: unknown) {
        return Promise.reject(e);
      }
      return Promise.resolve(this.#isSet);
    }
    return suspend<boolean>(
      settle => {
        this.#waiters.add(settle);
      },
      settle => {
        this.#waiters.delete(settle);
      },
      abort
    );
  }

  consume(): undefined {
    if (this.#isSet) {
      this.#isSet = false;
      return undefined;
    }
    if (this.#isStopped) {
      throw new ReceiverStoppedError(this);
    }
    throw newNotReadyError(this);
  }

  /**
   * Same as {@link stop}.
   */
  close(): void {
    this.stop();
  }

  toString(): string {
    return `Event(${this.name})`;
  }

  #wake(result: boolean): void {
    const waiters = [...this.#waiters];
    this.#waiters.clear();
    for (const settle of waiters) {
      settle(result);
    }
  }
}
