import {ChannelsError, ReceiverStoppedError} from './errors';
import {log} from './logger';
import {type Receiver} from './receiver';
import {type Slot} from './suspend';

const logger = log('latest-value-cache');

let cacheCount = 0;

export type LatestValueCacheOptions = {
  /**
   * Identifies the cache in logs. Defaults to `latest-value-cache-<n>`.
   */
  readonly uniqueId?: string;
};

/**
 * Keeps the latest message received from a receiver, which it consumes in
 * the background, from construction until {@link stop} is called, or the
 * receiver stops.
 */
export class LatestValueCache<T> {
  readonly uniqueId: string;
  readonly #receiver: Receiver<T>;
  readonly #abort = new AbortController();
  readonly #task: Promise<void>;
  #latest: Slot<T> | undefined;

  constructor(receiver: Receiver<T>, options: LatestValueCacheOptions = {}) {
    this.uniqueId = options.uniqueId ?? `latest-value-cache-${++cacheCount}`;
    this.#receiver = receiver;
    this.#task = this.#run();
  }

  /**
   * True once a message has been received.
   */
  hasValue(): boolean {
    return this.#latest !== undefined;
  }

  /**
   * Returns the latest message received.
   *
   * @throws {ChannelsError} If no message has been received yet.
   */
  get(): T {
    if (this.#latest === undefined) {
      throw new ChannelsError(
        `event-channels: latest-value-cache: ${this.uniqueId}: no value has been received yet`
      );
    }
    return this.#latest.value;
  }

  /**
   * Stops receiving, resolving once the background task has finished. The
   * latest message stays available.
   */
  async stop(): Promise<void> {
    this.#abort.abort(cacheStopped);
    await this.#task;
  }

  toString(): string {
    return `LatestValueCache(${this.uniqueId})`;
  }

  async #run(): Promise<void> {
    try {
      for (;;) {
        await this.#receiver.wait(this.#abort.signal);
        this.#latest = {value: this.#receiver.consume()};
      }
    } catch (e: unknown) {
      if (e === cacheStopped || e instanceof ReceiverStoppedError) {
        return;
      }
      logger.error(`${this.uniqueId}: receiver failed`, e);
    }
  }
}

// sentinel value used as the reason for abort on LatestValueCache.stop
const cacheStopped = Symbol('event-channels.cacheStopped');
