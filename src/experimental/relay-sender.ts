import {type Sender} from '../sender';

/**
 * A sender that sends every message to each of several senders, in turn.
 *
 * A send resolves once every sender accepted the message, and rejects with
 * the first failure, in which case the remaining senders are skipped.
 *
 * @example
 * ```ts
 * const tee = new RelaySender(audit.newSender(), metrics.newSender());
 * await tee.send(event);
 * ```
 */
export class RelaySender<T> implements Sender<T> {
  readonly #senders: readonly Sender<T>[];

  constructor(...senders: Sender<T>[]) {
    this.#senders = senders;
  }

  async send(message: T, abort?: AbortSignal): Promise<void> {
    for (const sender of this.#senders) {
      await sender.send(message, abort);
    }
  }

  /**
   * Closes every sender.
   */
  close(): void {
    for (const sender of this.#senders) {
      sender.close();
    }
  }

  toString(): string {
    return `RelaySender(${this.#senders.map(s => String(s)).join(', ')})`;
  }
}
