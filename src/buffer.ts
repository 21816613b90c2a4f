import {ArgumentError, ChannelsError} from './errors';

/**
 * Bounded FIFO queue backing the channels. Operations are O(1).
 */
export class CircularBuffer<T> {
  // The maximum number of messages the buffer can hold.
  readonly limit: number;
  readonly #items: T[];
  #head = 0;
  #tail = 0;
  #size = 0;

  constructor(limit: number) {
    if (!Number.isSafeInteger(limit) || limit <= 0) {
      throw new ArgumentError(`event-channels: invalid limit: ${limit}`);
    }
    this.limit = limit;
    this.#items = new Array<T>(limit);
  }

  get empty(): boolean {
    return this.#size === 0;
  }

  get full(): boolean {
    return this.#size === this.limit;
  }

  get length(): number {
    return this.#size;
  }

  // Adds a message at the tail. Throws if full.
  push(item: T): void {
    if (this.full) {
      throw new ChannelsError('event-channels: buffer full');
    }
    this.#items[this.#tail] = item;
    this.#tail = (this.#tail + 1) % this.limit;
    this.#size++;
  }

  // Removes and returns the message at the head. Throws if empty, since
  // undefined is a valid message.
  shift(): T {
    if (this.empty) {
      throw new ChannelsError('event-channels: buffer empty');
    }
    const item = this.#items[this.#head];
    this.#items[this.#head] = undefined!;
    this.#head = (this.#head + 1) % this.limit;
    this.#size--;
    return item;
  }

  // Drops every message, releasing references.
  clear(): void {
    while (!this.empty) {
      this.shift();
    }
    this.#head = 0;
    this.#tail = 0;
  }
}
