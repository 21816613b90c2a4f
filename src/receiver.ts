import {ReceiverError, ReceiverStoppedError} from './errors';
import {type Selected, selectedFrom} from './select';
import {type Slot} from './suspend';

/**
 * Receiver is the consuming end of a channel, or of anything else that
 * produces a stream of messages (timers, events, file watchers).
 *
 * Receiving happens in two steps, which is what allows {@link select} and
 * {@link merge} to wait on many receivers at once, without losing messages:
 *
 * - {@link ready} (non-blocking) or {@link wait} (blocking) report whether a
 *   message is available. Once they do, the receiver stays ready until the
 *   message is consumed.
 * - {@link consume} takes the available message, or throws the reason why
 *   there will never be one.
 *
 * {@link receive} and async iteration combine both steps.
 *
 * Receivers are exclusive to the task consuming them: they must not be waited
 * on concurrently.
 */
export abstract class Receiver<T> implements AsyncIterable<T> {
  /**
   * Returns true if a message is available to {@link consume}, without
   * suspending. Never throws, and never returns true once the receiver has
   * stopped or failed. Failures are recorded, and raised by {@link consume}.
   */
  abstract ready(): boolean;

  /**
   * Suspends until a message is available (resolves true), or until the
   * receiver stops or fails (resolves false). Rejects with the abort reason,
   * if aborted, in which case any message stays available for the next call.
   */
  abstract wait(abort?: AbortSignal): Promise<boolean>;

  /**
   * Takes the message reported by {@link ready} or {@link wait}.
   *
   * @throws {ReceiverStoppedError} If the receiver stopped.
   * @throws {ReceiverError} If the receiver failed, or was not ready.
   */
  abstract consume(): T;

  /**
   * Stops the receiver. Messages already buffered for it may still be
   * consumed, after which it reports itself stopped.
   */
  abstract close(): void;

  /**
   * Waits for, then consumes, the next message.
   *
   * @throws {ReceiverStoppedError} If the receiver stopped, which callers
   *   should treat as the end of the stream.
   */
  async receive(abort?: AbortSignal): Promise<T> {
    await this.wait(abort);
    return this.consume();
  }

  /**
   * Returns a receiver that applies `fn` to every message, as it is consumed.
   */
  map<U>(fn: (message: T) => U): Receiver<U> {
    return new Mapper(this, fn);
  }

  /**
   * Returns a receiver that only yields the messages matching `predicate`.
   * Type guards narrow the message type.
   */
  filter<S extends T>(predicate: (message: T) => message is S): Receiver<S>;
  filter(predicate: (message: T) => boolean): Receiver<T>;
  filter(predicate: (message: T) => boolean): Receiver<T> {
    return new Filter(this, predicate);
  }

  /**
   * Same as {@link selectedFrom}, as a method: checks whether `selected`
   * came from this receiver, narrowing its type, and marks it as handled if
   * so.
   */
  triggered(selected: Selected<unknown>): selected is Selected<T> {
    return selectedFrom(selected, this);
  }

  [Symbol.asyncIterator](): ReceiverAsyncIterator<T> {
    return new ReceiverAsyncIterator(this);
  }
}

/**
 * Raised when {@link Receiver.consume} is called on a receiver that is
 * neither ready nor stopped.
 */
export const newNotReadyError = <T>(receiver: Receiver<T>) =>
  new ReceiverError(
    `event-channels: receiver ${String(receiver)}: consume called before ready`,
    receiver
  );

class Mapper<T, U> extends Receiver<U> {
  readonly #receiver: Receiver<T>;
  readonly #fn: (message: T) => U;

  constructor(receiver: Receiver<T>, fn: (message: T) => U) {
    super();
    this.#receiver = receiver;
    this.#fn = fn;
  }

  ready(): boolean {
    return this.#receiver.ready();
  }

  wait(abort?: AbortSignal): Promise<boolean> {
    return this.#receiver.wait(abort);
  }

  consume(): U {
    return this.#fn(this.#receiver.consume());
  }

  close(): void {
    this.#receiver.close();
  }

  toString(): string {
    return `Mapper:${String(this.#receiver)}`;
  }
}

class Filter<T> extends Receiver<T> {
  readonly #receiver: Receiver<T>;
  readonly #predicate: (message: T) => boolean;
  // the next message that passed the predicate
  #next: Slot<T> | undefined;
  // set if the upstream receiver (or the predicate) threw
  #failure: {readonly error: unknown} | undefined;

  constructor(receiver: Receiver<T>, predicate: (message: T) => boolean) {
    super();
    this.#receiver = receiver;
    this.#predicate = predicate;
  }

  ready(): boolean {
    return this.#peek() !== undefined;
  }

  async wait(abort?: AbortSignal): Promise<boolean> {
    abort?.throwIfAborted();
    while (!this.ready()) {
      if (this.#failure !== undefined) {
        return false;
      }
      if (!(await this.#receiver.wait(abort))) {
        return false;
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
    // not ready: the upstream receiver raises the reason (stopped, or not ready)
    try {
      this.#receiver.consume();
    } catch (e: unknown) {
      if (e instanceof ReceiverStoppedError) {
        throw new ReceiverStoppedError(this, {cause: e});
      }
      throw e;
    }
    throw newNotReadyError(this);
  }

  close(): void {
    this.#receiver.close();
  }

  toString(): string {
    return `Filter:${String(this.#receiver)}`;
  }

  // pulls (and drops) upstream messages, until one passes the predicate
  #peek(): Slot<T> | undefined {
    if (this.#next !== undefined || this.#failure !== undefined) {
      return this.#next;
    }
    while (this.#receiver.ready()) {
      try {
        const message = this.#receiver.consume();
        if (this.#predicate(message)) {
          this.#next = {value: message};
          return this.#next;
        }
      } catch (e: unknown) {
        this.#failure = {error: e};
        return undefined;
      }
    }
    return undefined;
  }
}

/**
 * Iterates by receiving messages, until the receiver stops, or the
 * {@link ReceiverAsyncIterator.return} or {@link ReceiverAsyncIterator.throw}
 * methods are called. Leaving the loop early closes the receiver.
 *
 * Only the type is exported - may be initialized only by performing an async
 * iteration on a {@link Receiver} instance, or by calling
 * `receiver[Symbol.asyncIterator]()`.
 */
export class ReceiverAsyncIterator<T>
  implements AsyncIterable<T>, AsyncIterator<T>
{
  readonly #receiver: Receiver<T>;
  readonly #abort: AbortController;

  constructor(receiver: Receiver<T>) {
    this.#receiver = receiver;
    this.#abort = new AbortController();
  }

  /**
   * Returns this.
   */
  [Symbol.asyncIterator](): AsyncIterator<T> {
    return this;
  }

  /**
   * Next iteration.
   */
  async next(): Promise<IteratorResult<T>> {
    try {
      await this.#receiver.wait(this.#abort.signal);
      return {value: this.#receiver.consume()};
    } catch (e: unknown) {
      if (
        e === receiverAsyncIteratorReturned ||
        e instanceof ReceiverStoppedError
      ) {
        return {done: true, value: undefined};
      }
      throw e;
    }
  }

  /**
   * Ends the iterator, and closes the receiver, which is an idempotent
   * operation. Called when a `for await` loop exits early, so a receiver
   * abandoned by `break` or `return` no longer holds up its senders.
   */
  async return(): Promise<IteratorResult<T>> {
    this.#abort.abort(receiverAsyncIteratorReturned);
    this.#receiver.close();
    return {done: true, value: undefined};
  }

  /**
   * Ends the iterator with an error, which is an idempotent operation.
   */
  async throw(e?: unknown): Promise<IteratorResult<T>> {
    this.#abort.abort(e);
    return {done: true, value: undefined};
  }
}

// sentinel value used as the reason for abort on ReceiverAsyncIterator.return
const receiverAsyncIteratorReturned = Symbol(
  'event-channels.receiverAsyncIteratorReturned'
);
