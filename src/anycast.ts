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

const logger = log('anycast');

export type AnycastOptions = {
  /**
   * Capacity of the shared buffer. Sends beyond it suspend until a receiver
   * consumes a message. Defaults to 10.
   */
  readonly limit?: number;
  /**
   * A send blocked on a full buffer for longer than this logs a warning.
   * Defaults to 1000ms.
   */
  readonly blockedSendWarningMs?: number;
};

/**
 * A channel that delivers each message to exactly one of its receivers
 * (competing consumers), in the order sent.
 *
 * Messages are stored in a single shared buffer of `limit` entries. Sends
 * suspend while it is full. Receivers suspended waiting for messages are
 * served first-suspended first-served.
 *
 * The channel closes when {@link close} is called, when every sender it
 * handed out has been closed, or when every receiver it handed out has been
 * closed (nothing could consume further messages). Once closed, sends fail,
 * and receivers drain the buffer, then stop.
 *
 * @example
 * ```ts
 * const jobs = new Anycast<string>('jobs', {limit: 100});
 * const sender = jobs.newSender();
 * const workers = [jobs.newReceiver(), jobs.newReceiver()].map(
 *   async receiver => {
 *     for await (const job of receiver) {
 *       await run(job);
 *     }
 *   }
 * );
 * await sender.send('build');
 * jobs.close();
 * await Promise.all(workers);
 * ```
 */
export class Anycast<T> {
  readonly #state: AnycastState<T>;

  constructor(name: string, options: AnycastOptions = {}) {
    const blockedSendWarningMs = options.blockedSendWarningMs ?? 1000;
    if (!(blockedSendWarningMs >= 0)) {
      throw new ArgumentError(
        `event-channels: anycast: invalid blockedSendWarningMs: ${blockedSendWarningMs}`
      );
    }
    this.#state = new AnycastState(
      this,
      name,
      new CircularBuffer(options.limit ?? 10),
      blockedSendWarningMs
    );
  }

  /**
   * Identifies the channel in errors and logs.
   */
  get name(): string {
    return this.#state.name;
  }

  /**
   * Capacity of the shared buffer.
   */
  get limit(): number {
    return this.#state.buffer.limit;
  }

  get isClosed(): boolean {
    return this.#state.closed;
  }

  /**
   * Closes the channel. Suspended sends fail immediately, receivers drain the
   * buffer, then stop. Idempotent.
   */
  close(): void {
    this.#state.close();
  }

  newSender(): Sender<T> {
    return new AnycastSender(this.#state);
  }

  newReceiver(): Receiver<T> {
    return new AnycastReceiver(this.#state);
  }

  toString(): string {
    return `Anycast:${this.name}`;
  }
}

// a send suspended on a full buffer, settled with an error or undefined
type PendingSend<T> = {
  readonly message: T;
  readonly settle: Settle<unknown>;
};

// a receiver suspended on an empty buffer, given a message or (if closed)
// undefined
type PendingReceive<T> = (slot: Slot<T> | undefined) => void;

class AnycastState<T> {
  readonly channel: Anycast<T>;
  readonly name: string;
  readonly buffer: CircularBuffer<T>;
  readonly blockedSendWarningMs: number;
  closed = false;
  readonly sends: PendingSend<T>[] = [];
  readonly recvs: PendingReceive<T>[] = [];
  // handles still open
  openSenders = 0;
  openReceivers = 0;

  constructor(
    channel: Anycast<T>,
    name: string,
    buffer: CircularBuffer<T>,
    blockedSendWarningMs: number
  ) {
    this.channel = channel;
    this.name = name;
    this.buffer = buffer;
    this.blockedSendWarningMs = blockedSendWarningMs;
  }

  get drained(): boolean {
    return this.closed && this.buffer.empty;
  }

  // Accepts the message if a receiver is waiting or there is room, without
  // jumping ahead of suspended sends.
  trySend(message: T): boolean {
    if (this.recvs.length !== 0) {
      const recv = this.recvs.shift();
      recv?.({value: message});
      return true;
    }
    if (this.sends.length === 0 && !this.buffer.full) {
      this.buffer.push(message);
      return true;
    }
    return false;
  }

  tryRecv(): Slot<T> | undefined {
    if (this.buffer.empty) {
      return undefined;
    }
    const value = this.buffer.shift();
    this.#fillBuffer();
    return {value};
  }

  removeSend(send: PendingSend<T>): void {
    const i = this.sends.lastIndexOf(send);
    if (i !== -1) {
      this.sends.splice(i, 1);
    }
  }

  removeRecv(recv: PendingReceive<T>): void {
    const i = this.recvs.lastIndexOf(recv);
    if (i !== -1) {
      this.recvs.splice(i, 1);
    }
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    const err = new ChannelClosedError(this.channel);
    for (const send of this.sends.splice(0)) {
      send.settle(err);
    }
    // receivers only wait on an empty buffer
    for (const recv of this.recvs.splice(0)) {
      recv(undefined);
    }
  }

  #fillBuffer(): void {
    while (!this.buffer.full && this.sends.length !== 0) {
      const send = this.sends.shift();
      if (send !== undefined) {
        this.buffer.push(send.message);
        send.settle(undefined);
      }
    }
  }
}

class AnycastSender<T> implements Sender<T> {
  readonly #state: AnycastState<T>;
  #closed = false;

  constructor(state: AnycastState<T>) {
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
    if (state.trySend(message)) {
      return;
    }

    let warned = false;
    const warning = setTimeout(() => {
      warned = true;
      logger.warn(
        `channel ${state.name} has been full for ${state.blockedSendWarningMs}ms, sender blocked until a receiver consumes a message`
      );
    }, state.blockedSendWarningMs);
    warning.unref();

    let pending: PendingSend<T> | undefined;
    let err: unknown;
    try {
      err = await suspend<unknown>(
        settle => {
          pending = {message, settle};
          state.sends.push(pending);
        },
        () => {
          if (pending !== undefined) {
            state.removeSend(pending);
          }
        },
        abort
      );
    } finally {
      clearTimeout(warning);
    }
    if (err !== undefined) {
      throw this.#closedError(err);
    }
    if (warned) {
      logger.info(`message sent to channel ${state.name}, sender unblocked`);
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
      `event-channels: anycast: channel ${this.#state.name} is closed`,
      this,
      {cause}
    );
  }
}

class AnycastReceiver<T> extends Receiver<T> {
  readonly #state: AnycastState<T>;
  // a message claimed from the channel, that now belongs to this receiver
  #next: Slot<T> | undefined;
  #pending: PendingReceive<T> | undefined;
  #closed = false;

  constructor(state: AnycastState<T>) {
    super();
    this.#state = state;
    state.openReceivers++;
  }

  ready(): boolean {
    return this.#peek() !== undefined;
  }

  wait(abort?: AbortSignal): Promise<boolean> {
    try {
      abort?.throwIfAborted();
      if (this.ready()) {
        return Promise.resolve(true);
      }
      if (this.#stopped) {
        return Promise.resolve(false);
      }
      if (this.#pending !== undefined) {
        throw new ReceiverError(
          `event-channels: anycast: receiver ${String(this)} is already waiting`,
          this
        );
      }
    } catch (e: unknown) {
      return Promise.reject(e);
    }
    return suspend<boolean>(
      settle => {
        const pending: PendingReceive<T> = slot => {
          this.#pending = undefined;
          this.#next = slot;
          settle(slot !== undefined);
        };
        this.#pending = pending;
        this.#state.recvs.push(pending);
      },
      () => {
        if (this.#pending !== undefined) {
          this.#state.removeRecv(this.#pending);
          this.#pending = undefined;
        }
      },
      abort
    );
  }

  consume(): T {
    const next = this.#peek();
    if (next === undefined) {
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
    this.#next = undefined;
    return next.value;
  }

  /**
   * Stops this receiver. A message it already claimed may still be consumed.
   * Closing the last receiver closes the channel, in which case this receiver
   * keeps draining the buffer, so no accepted message is lost.
   */
  close(): void {
    if (this.#closed) {
      return;
    }
    this.#closed = true;
    const pending = this.#pending;
    if (pending !== undefined) {
      this.#state.removeRecv(pending);
      pending(undefined);
    }
    if (--this.#state.openReceivers === 0) {
      this.#state.close();
    }
  }

  toString(): string {
    return `${this.#state.name}:receiver`;
  }

  // closed receivers stop claiming messages, unless no open receiver is left
  get #draining(): boolean {
    return !this.#closed || this.#state.openReceivers === 0;
  }

  get #stopped(): boolean {
    return (
      this.#next === undefined && (!this.#draining || this.#state.drained)
    );
  }

  #peek(): Slot<T> | undefined {
    if (this.#next === undefined && this.#draining) {
      this.#next = this.#state.tryRecv();
    }
    return this.#next;
  }
}
