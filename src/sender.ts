/**
 * Sender allows callers to send messages to a channel.
 *
 * Handles are cheap: channels hand out as many as needed, via their
 * `newSender` methods. A handle owns no buffer, it delegates to the channel.
 *
 * The type parameter is contravariant: a `Sender<number | string>` may be
 * used where a `Sender<number>` is expected.
 */
export interface Sender<in T> {
  /**
   * Sends a message, returning a promise that resolves once the channel has
   * accepted it. Suspends (but never drops the message) while the destination
   * buffer is full.
   *
   * Rejects with {@link SenderClosedError} if this handle was closed, or with
   * {@link SenderError} (caused by {@link ChannelClosedError}) if the channel
   * was closed. Rejects with `abort.reason` if aborted while suspended, in
   * which case the message was not accepted (or, for fan-out channels, was
   * only accepted by the queues that had room).
   */
  send(message: T, abort?: AbortSignal): Promise<void>;

  /**
   * Closes this handle. Channels close once every sender they handed out has
   * been closed. Idempotent.
   */
  close(): void;
}
