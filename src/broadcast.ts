import {CircularBuffer} from './buffer';
import {
  ArgumentError,
  ChannelClosedError,
  ReceiverError,
  ReceiverStoppedError,
  SenderClosedError,
  SenderError,
} from './errors';
import {log} from './logger';
import {Receiver, newNotReadyError} from './receiver';
import {type Sender} from './sender';
import {type Settle, type Slot, suspend} from './suspend';

const logger = log('broadcast');

export type BroadcastOptions = {
  /**
   * If true, the channel keeps the latest message sent, and gives it to every
   * receiver created afterwards, as its first message. Defaults to false.
   */
  readonly resendLatest?: boolean;
};

/**
 * What a send does when a receiver's queue is full.
 *
 * - `block`: the send suspends until the receiver consumes a message.
 * - `drop-oldest`: the receiver's oldest message is dropped (and a warning
 *   logged), so slow receivers never hold up the sender.
 */
export type OverflowPolicy = 'block' | 'drop-oldest';

export type BroadcastReceiverOptions = {
  /**
   * Identifies the receiver in errors and logs. Defaults to
   * `<channel>:receiver-<n>`, where n counts the receivers of the channel.
   */
  readonly name?: string;
  /**
   * Capacity of the receiver's queue. Defaults to 50.
   */
  readonly limit?: number;
  /**
   * Defaults to `block`.
   */
  readonly overflow?: OverflowPolicy;
};

/**
 * A receiver of a {@link Broadcast} channel, which owns a private queue.
 */
export type BroadcastReceiver<T> = Receiver<T> & {
  readonly name: string;
  readonly limit: number;
};

/**
 * A channel that delivers a copy of each message to every receiver that
 * exists at the time it is sent (fan-out).
 *
 * Each receiver has its own bounded queue, and sees messages in the order
 * they were sent. The channel closes when {@link close} is called, or when
 * every sender it handed out has been closed.
 *
 * @example
 * ```ts
 * const config = new Broadcast<Config>('config', {resendLatest: true});
 * const updates = config.newSender();
 * await updates.send(initial);
 * // late subscribers start with the current config
 * for await (const current of config.newReceiver()) {
 *   apply(current);
 * }
 * ```
 */
export class Broadcast<T> {
  readonly #state: BroadcastState<T>;

  constructor(name: string, options: BroadcastOptions = {}) {
    this.#state = new BroadcastState(this, name, options.resendLatest ?? false);
  }

  /**
   * Identifies the channel in errors and logs.
   */
  get name(): string {
    return this.#state.name;
  }

  get resendLatest(): boolean {
    return this.#state.resendLatest;
  }

  get isClosed(): boolean {
    return this.#state.closed;
  }

  /**
   * Closes the channel. Suspended sends fail immediately, receivers drain
   * their queues, then stop. Idempotent.
   */
  close(): void {
    this.#state.close();
  }

  newSender(): Sender<T> {
    return new BroadcastSender(this.#state);
  }

  newReceiver(options: BroadcastReceiverOptions = {}): BroadcastReceiver<T> {
    const overflow = options.overflow ?? 'block';
    if (overflow !== 'block' && overflow !== 'drop-oldest') {
      throw new ArgumentError(
        `event-channels: broadcast: invalid overflow policy: ${String(overflow)}`
      );
    }
    const n = ++this.#state.receivers;
    return new BroadcastReceiverImpl(
      this.#state,
      options.name ?? `${this.#state.name}:receiver-${n}`,
      new ReceiverQueue<T>(new CircularBuffer(options.limit ?? 50), overflow)
    );
  }

  toString(): string {
    return `Broadcast:${this.name}`;
  }
}

// a message waiting for room in a full queue; done is called once it was
// added (or will never be, with the reason)
type Delivery<T> = {
  readonly message: T;
  readonly done: (err?: unknown) => void;
};

class ReceiverQueue<T> {
  readonly buffer: CircularBuffer<T>;
  readonly overflow: OverflowPolicy;
  readonly deliveries: Delivery<T>[] = [];
  waiter: Settle<boolean> | undefined;

  constructor(buffer: CircularBuffer<T>, overflow: OverflowPolicy) {
    this.buffer = buffer;
    this.overflow = overflow;
  }

  // Adds the message, unless the queue is full and blocks. Never jumps
  // ahead of pending deliveries.
  offer(message: T, name: string): boolean {
    if (this.deliveries.length === 0 && !this.buffer.full) {
      this.buffer.push(message);
    } else if (this.overflow === 'drop-oldest') {
      this.buffer.shift();
      this.buffer.push(message);
      logger.warn(
        `receiver ${name} is full (${this.buffer.limit} messages), dropped the oldest message`
      );
    } else {
      return false;
    }
    this.wake(true);
    return true;
  }

  shift(): T {
    const value = this.buffer.shift();
    while (!this.buffer.full && this.deliveries.length !== 0) {
      const delivery = this.deliveries.shift();
      if (delivery !== undefined) {
        this.buffer.push(delivery.message);
        delivery.done();
      }
    }
    return value;
  }

  removeDelivery(delivery: Delivery<T>): void {
    const i = this.deliveries.indexOf(delivery);
    if (i !== -1) {
      this.deliveries.splice(i, 1);
    }
  }

  // Gives up on every pending delivery. Their messages are never added.
  release(err?: unknown): void {
    for (const delivery of this.deliveries.splice(0)) {
      delivery.done(err);
    }
  }

  wake(result: boolean): void {
    const waiter = this.waiter;
    this.waiter = undefined;
    waiter?.(result);
  }
}

// Unregisters the queue of a receiver that was garbage collected without
// being closed. The held value must not reference the receiver.
const abandonedReceivers = new FinalizationRegistry<() => void>(unregister =>
  unregister()
);

const unregisterQueue = <T>(
  state: BroadcastState<T>,
  queue: ReceiverQueue<T>
): void => {
  state.queues.delete(queue);
  queue.release();
  queue.wake(false);
};

class BroadcastState<T> {
  readonly channel: Broadcast<T>;
  readonly name: string;
  readonly resendLatest: boolean;
  readonly queues = new Map<ReceiverQueue<T>, string>();
  latest: Slot<T> | undefined;
  closed = false;
  receivers = 0;
  openSenders = 0;

  constructor(channel: Broadcast<T>, name: string, resendLatest: boolean) {
    this.channel = channel;
    this.name = name;
    this.resendLatest = resendLatest;
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    const err = new ChannelClosedError(this.channel);
    for (const queue of this.queues.keys()) {
      queue.release(err);
      queue.wake(false);
    }
  }
}

class BroadcastSender<T> implements Sender<T> {
  readonly #state: BroadcastState<T>;
  #closed = false;

  constructor(state: BroadcastState<T>) {
    this.#state = state;
    state.openSenders++;
  }

  async send(message: T, abort?: AbortSignal): Promise<void> {
    abort?.throwIfAborted();
    if (this.#closed) {
      throw new SenderClosedError(this);
    }
    const state = this.#state;
    if (state.closed) {
      throw this.#closedError(new ChannelClosedError(state.channel));
    }
    if (state.resendLatest) {
      state.latest = {value: message};
    }

    const blocked: ReceiverQueue<T>[] = [];
    for (const [queue, name] of state.queues) {
      if (!queue.offer(message, name)) {
        blocked.push(queue);
      }
    }
    if (blocked.length === 0) {
      return;
    }

    // waits until every blocked queue took the message
    const pending = new Map<ReceiverQueue<T>, Delivery<T>>();
    const err = await suspend<unknown>(
      settle => {
        let remaining = blocked.length;
        for (const queue of blocked) {
          const delivery: Delivery<T> = {
            message,
            done: reason => {
              pending.delete(queue);
              if (reason !== undefined) {
                remaining = 0;
                settle(reason);
              } else if (--remaining === 0) {
                settle(undefined);
              }
            },
          };
          pending.set(queue, delivery);
          queue.deliveries.push(delivery);
        }
      },
      () => {
        for (const [queue, delivery] of pending) {
          queue.removeDelivery(delivery);
        }
        pending.clear();
      },
      abort
    );
    if (err !== undefined) {
      throw this.#closedError(err);
    }
  }

  close(): void {
    if (this.#closed) {
      return;
    }
    this.#closed = true;
    if (--this.#state.openSenders === 0) {
      this.#state.close();
    }
  }

  toString(): string {
    return `${this.#state.name}:sender`;
  }

  #closedError(cause: unknown): SenderError<T> {
    return new SenderError(
      `event-channels: broadcast: channel ${this.#state.name} is closed`,
      this,
      {cause}
    );
  }
}

class BroadcastReceiverImpl<T> extends Receiver<T> {
  readonly name: string;
  readonly #state: BroadcastState<T>;
  readonly #queue: ReceiverQueue<T>;
  #closed = false;

  constructor(state: BroadcastState<T>, name: string, queue: ReceiverQueue<T>) {
    super();
    this.name = name;
    this.#state = state;
    this.#queue = queue;
    if (state.latest !== undefined) {
      queue.buffer.push(state.latest.value);
    }
    if (!state.closed) {
      state.queues.set(queue, name);
      abandonedReceivers.register(
        this,
        () => unregisterQueue(state, queue),
        this
      );
    }
  }

  get limit(): number {
    return this.#queue.buffer.limit;
  }

  ready(): boolean {
    return !this.#queue.buffer.empty;
  }

  wait(abort?: AbortSignal): Promise<boolean> {
    const queue = this.#queue;
    try {
      abort?.throwIfAborted();
      if (this.ready()) {
        return Promise.resolve(true);
      }
      if (this.#stopped) {
        return Promise.resolve(false);
      }
      if (queue.waiter !== undefined) {
        throw new ReceiverError(
          `event-channels: broadcast: receiver ${this.name} is already waiting`,
          this
        );
      }
    } catch (e: unknown) {
      return Promise.reject(e);
    }
    return suspend<boolean>(
      settle => {
        queue.waiter = settle;
      },
      () => {
        queue.waiter = undefined;
      },
      abort
    );
  }

  consume(): T {
    if (this.ready()) {
      return this.#queue.shift();
    }
    if (this.#stopped) {
      throw new ReceiverStoppedError(
        this,
        this.#state.closed
          ? {cause: new ChannelClosedError(this.#state.channel)}
          : undefined
      );
    }
    throw newNotReadyError(this);
  }

  /**
   * Unregisters the receiver from the channel, releasing any send waiting on
   * its queue. Messages already in the queue may still be consumed. A
   * receiver dropped without closing is unregistered once garbage collected,
   * and leaving a `for await` loop early closes it.
   */
  close(): void {
    if (this.#closed) {
      return;
    }
    this.#closed = true;
    abandonedReceivers.unregister(this);
    unregisterQueue(this.#state, this.#queue);
  }

  toString(): string {
    return this.name;
  }

  get #stopped(): boolean {
    return this.#queue.buffer.empty && (this.#closed || this.#state.closed);
  }
}
