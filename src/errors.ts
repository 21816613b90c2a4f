import type {Receiver} from './receiver';
import type {Sender} from './sender';
import type {Selected} from './select';

/**
 * Base class of every error raised by this package.
 */
export class ChannelsError extends Error {
  constructor(...args: ConstructorParameters<typeof Error>) {
    if (args.length === 0) {
      args.length = 1;
    }
    if (args[0] === undefined) {
      args[0] = 'event-channels: unknown error';
    }
    super(...args);
    this.name = new.target.name;
  }
}

/**
 * Raised synchronously on programmer misuse, e.g. an invalid limit, or an
 * empty list of receivers passed to {@link merge} or {@link select}.
 */
export class ArgumentError extends ChannelsError {}

/**
 * An error that relates to a whole channel, rather than a single handle.
 */
export class ChannelError extends ChannelsError {
  /**
   * The channel the error relates to.
   */
  readonly channel: unknown;

  constructor(message: string, channel: unknown, options?: ErrorOptions) {
    super(message, options);
    this.channel = channel;
  }
}

/**
 * The channel was closed, and accepts no more messages.
 */
export class ChannelClosedError extends ChannelError {
  constructor(channel: {readonly name: string}, options?: ErrorOptions) {
    super(
      `event-channels: channel ${channel.name} was closed`,
      channel,
      options
    );
  }
}

/**
 * A send failed. Unless the handle itself was closed (see
 * {@link SenderClosedError}), the cause is the channel-level error, usually
 * a {@link ChannelClosedError}.
 */
export class SenderError<T = unknown> extends ChannelsError {
  readonly sender: Sender<T>;

  constructor(message: string, sender: Sender<T>, options?: ErrorOptions) {
    super(message, options);
    this.sender = sender;
  }
}

/**
 * A closed {@link Sender} handle was used.
 */
export class SenderClosedError<T = unknown> extends SenderError<T> {
  constructor(sender: Sender<T>, options?: ErrorOptions) {
    super(`event-channels: sender ${String(sender)} is closed`, sender, options);
  }
}

/**
 * A receive failed, for a reason other than the end of the stream.
 */
export class ReceiverError<T = unknown> extends ChannelsError {
  readonly receiver: Receiver<T>;

  constructor(message: string, receiver: Receiver<T>, options?: ErrorOptions) {
    super(message, options);
    this.receiver = receiver;
  }
}

/**
 * The receiver has stopped, and will never produce another message.
 *
 * This is the normal end of a stream: async iteration over a receiver ends
 * without raising it.
 */
export class ReceiverStoppedError<T = unknown> extends ReceiverError<T> {
  constructor(receiver: Receiver<T>, options?: ErrorOptions) {
    super(
      `event-channels: receiver ${String(receiver)} was stopped`,
      receiver,
      options
    );
  }
}

/**
 * Base class for errors raised by {@link select}.
 */
export class SelectError extends ChannelsError {}

/**
 * A {@link Selected} value yielded by {@link select} was not checked using
 * {@link selectedFrom} before the loop moved on.
 */
export class UnhandledSelectedError<T = unknown> extends SelectError {
  readonly selected: Selected<T>;

  constructor(selected: Selected<T>) {
    super(`event-channels: select: ${String(selected)} was not handled`);
    this.selected = selected;
  }
}

/**
 * Every failure reported by the receivers of a {@link select} loop while it
 * was shutting down.
 */
export class SelectErrorGroup extends AggregateError {
  constructor(errors: Iterable<unknown>, options?: ErrorOptions) {
    super(errors, 'event-channels: select: some receivers failed', options);
    this.name = 'SelectErrorGroup';
  }
}
