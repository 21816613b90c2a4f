import {ArgumentError, ReceiverStoppedError} from './errors';
import {Receiver, newNotReadyError} from './receiver';
import {type Slot} from './suspend';

/**
 * The message type of a receiver.
 */
export type ReceiverMessage<R> = R extends Receiver<infer T> ? T : never;

/**
 * Combines several receivers into one, which produces the messages of all of
 * them, as they arrive. The poll order rotates after every message, so that
 * one busy source cannot starve the others.
 *
 * The merged receiver stops once every source has stopped. Closing it closes
 * every source.
 *
 * @throws {ArgumentError} If no receivers are given.
 *
 * @example
 * ```ts
 * const events = merge(clicks.newReceiver(), keys.newReceiver());
 * for await (const event of events) {
 *   // event is Click | Key
 * }
 * ```
 */
export function merge<R extends Receiver<unknown>[]>(
  ...receivers: R
): Merger<ReceiverMessage<R[number]>>;
export function merge<T>(...receivers: Receiver<T>[]): Merger<T> {
  if (receivers.length === 0) {
    throw new ArgumentError(
      'event-channels: merge: at least one receiver must be provided'
    );
  }
  return new Merger(receivers);
}

/**
 * The receiver returned by {@link merge}.
 */
export class Merger<T> extends Receiver<T> {
  readonly #receivers: readonly Receiver<T>[];
  // the sources that may still produce messages
  #live: Receiver<T>[];
  // rotates the poll order
  #offset = 0;
  #next: Slot<T> | undefined;
  // set if a source failed, raised by the next consume
  #failure: {readonly error: unknown} | undefined;

  constructor(receivers: Iterable<Receiver<T>>) {
    super();
    this.#receivers = [...receivers];
    this.#live = [...this.#receivers];
  }

  ready(): boolean {
    return this.#peek() !== undefined;
  }

  async wait(abort?: AbortSignal): Promise<boolean> {
    abort?.throwIfAborted();
    while (!this.ready()) {
      if (this.#failure !== undefined || this.#live.length === 0) {
        return false;
      }
      const {receiver, ready} = await this.#race(abort);
      if (!ready) {
        // stopped or failed, consume raises which
        this.#take(receiver);
      }
    }
    return true;
  }

  consume(): T {
    const next = this.#peek();
    if (next !== undefined) {
      this.#next = undefined;
      return next.value;
    }
    if (this.#failure !== undefined) {
      throw this.#failure.error;
    }
    if (this.#live.length === 0) {
      throw new ReceiverStoppedError(this);
    }
    throw newNotReadyError(this);
  }

  close(): void {
    for (const receiver of this.#receivers) {
      receiver.close();
    }
  }

  toString(): string {
    return `Merger:${this.#receivers.map(r => String(r)).join(',')}`;
  }

  #peek(): Slot<T> | undefined {
    while (this.#next === undefined && this.#failure === undefined) {
      const live = this.#live;
      let receiver: Receiver<T> | undefined;
      for (let i = 0; i < live.length; i++) {
        const candidate = live[(this.#offset + i) % live.length];
        if (candidate.ready()) {
          receiver = candidate;
          // the next poll starts after this source
          this.#offset = (this.#offset + i + 1) % live.length;
          break;
        }
      }
      if (receiver === undefined) {
        break;
      }
      this.#take(receiver);
    }
    return this.#next;
  }

  #take(receiver: Receiver<T>): void {
    try {
      this.#next = {value: receiver.consume()};
    } catch (e: unknown) {
      this.#remove(receiver);
      if (!(e instanceof ReceiverStoppedError)) {
        this.#failure = {error: e};
      }
    }
  }

  // Waits for the first source to become ready, or stop. Losing waits are
  // aborted, which leaves their sources untouched.
  async #race(
    abort?: AbortSignal
  ): Promise<{receiver: Receiver<T>; ready: boolean}> {
    const controller = new AbortController();
    const onAbort = () => {
      controller.abort(abort?.reason);
    };
    abort?.addEventListener('abort', onAbort, {once: true});
    try {
      return await Promise.race(
        this.#live.map(receiver =>
          receiver
            .wait(controller.signal)
            .then(ready => ({receiver, ready}))
        )
      );
    } finally {
      abort?.removeEventListener('abort', onAbort);
      controller.abort(mergeRaceSettled);
    }
  }

  #remove(receiver: Receiver<T>): void {
    const i = this.#live.indexOf(receiver);
    if (i === -1) {
      return;
    }
    this.#live.splice(i, 1);
    if (i < this.#offset) {
      this.#offset--;
    }
    if (this.#offset >= this.#live.length) {
      this.#offset = 0;
    }
  }
}

// sentinel value used as the reason for aborting the waits that lost a race
const mergeRaceSettled = Symbol('event-channels.mergeRaceSettled');
