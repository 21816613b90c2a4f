import {ArgumentError, ReceiverStoppedError} from './errors';
import {Receiver, newNotReadyError} from './receiver';
import {type Settle, suspend} from './suspend';

/**
 * Decides when a timer ticks next, after it ticked, which is how a timer
 * recovers from ticks missed while nobody was receiving.
 */
export interface MissedTickPolicy {
  /**
   * Returns the time the next tick is due.
   *
   * @param now The current time (ms).
   * @param scheduledTickTime The time the tick being delivered was due (ms).
   * @param interval The interval of the timer (ms).
   */
  calculateNextTickTime(
    now: number,
    scheduledTickTime: number,
    interval: number
  ): number;
}

/**
 * Delivers every missed tick, immediately, one after the other, keeping the
 * timer on its original schedule (a fixed rate).
 */
export class TriggerAllMissed implements MissedTickPolicy {
  calculateNextTickTime(
    _now: number,
    scheduledTickTime: number,
    interval: number
  ): number {
    return scheduledTickTime + interval;
  }

  toString(): string {
    return 'TriggerAllMissed()';
  }
}

/**
 * Collapses missed ticks into one, then resumes on the original schedule,
 * at the first multiple of the interval after now.
 */
export class SkipMissedAndResync implements MissedTickPolicy {
  calculateNextTickTime(
    now: number,
    scheduledTickTime: number,
    interval: number
  ): number {
    const missed = Math.floor(Math.max(0, now - scheduledTickTime) / interval);
    return scheduledTickTime + (missed + 1) * interval;
  }

  toString(): string {
    return 'SkipMissedAndResync()';
  }
}

export type SkipMissedAndDriftOptions = {
  /**
   * Lateness (ms) tolerated before the schedule is moved. Defaults to 0.
   */
  readonly delayTolerance?: number;
};

/**
 * Collapses missed ticks into one, then restarts the interval from now, so
 * the schedule drifts by however late the tick was. Ticks late by no more
 * than `delayTolerance` keep the original schedule.
 *
 * This is the policy for timeouts: the interval is measured from the last
 * tick delivered.
 */
export class SkipMissedAndDrift implements MissedTickPolicy {
  readonly delayTolerance: number;

  constructor(options: SkipMissedAndDriftOptions = {}) {
    const delayTolerance = options.delayTolerance ?? 0;
    if (!(delayTolerance >= 0)) {
      throw new ArgumentError(
        `event-channels: timer: delayTolerance must be non-negative: ${delayTolerance}`
      );
    }
    this.delayTolerance = delayTolerance;
  }

  calculateNextTickTime(
    now: number,
    scheduledTickTime: number,
    interval: number
  ): number {
    if (now - scheduledTickTime > this.delayTolerance) {
      return now + interval;
    }
    return scheduledTickTime + interval;
  }

  toString(): string {
    return `SkipMissedAndDrift(delayTolerance=${this.delayTolerance})`;
  }
}

export type TimerOptions = {
  /**
   * If false, the timer is created stopped, and starts on {@link Timer.reset}.
   * Defaults to true.
   */
  readonly autoStart?: boolean;
  /**
   * Delay (ms) before the first interval starts. Defaults to 0. Only valid
   * with `autoStart`: a timer created stopped takes its delay from
   * {@link Timer.reset}.
   */
  readonly startDelay?: number;
  /**
   * The source of the current time (ms). Defaults to `performance.now`.
   */
  readonly clock?: () => number;
};

export type TimerResetOptions = {
  /**
   * The new interval (ms). Defaults to the current interval.
   */
  readonly interval?: number;
  /**
   * Delay (ms) before the first interval starts. Defaults to 0.
   */
  readonly startDelay?: number;
};

/**
 * A receiver of periodic ticks.
 *
 * Each message is the drift of the tick: how late (ms) it was received,
 * compared to when it was due. What happens to ticks missed while nobody
 * was receiving depends on the {@link MissedTickPolicy}.
 *
 * {@link stop} and {@link reset} take effect immediately, including on a
 * {@link wait} already in flight.
 *
 * @example
 * ```ts
 * const timer = new Timer(1000, new SkipMissedAndDrift());
 * for await (const drift of timer) {
 *   // once a second
 * }
 * ```
 */
export class Timer extends Receiver<number> {
  readonly #policy: MissedTickPolicy;
  readonly #clock: () => number;
  #interval: number;
  #next = 0;
  #drift: number | undefined;
  #stopped = true;
  // suspended waits, woken on stop and reset
  readonly #wakers = new Set<Settle<void>>();

  constructor(
    interval: number,
    missedTickPolicy: MissedTickPolicy,
    options: TimerOptions = {}
  ) {
    super();
    validateInterval(interval);
    this.#interval = interval;
    this.#policy = missedTickPolicy;
    this.#clock = options.clock ?? (() => performance.now());
    if (options.autoStart ?? true) {
      this.reset({startDelay: options.startDelay});
    } else {
      const startDelay = options.startDelay ?? 0;
      validateStartDelay(startDelay);
      if (startDelay > 0) {
        throw new ArgumentError(
          'event-channels: timer: startDelay cannot be used with autoStart false, pass it to reset instead'
        );
      }
    }
  }

  get interval(): number {
    return this.#interval;
  }

  get missedTickPolicy(): MissedTickPolicy {
    return this.#policy;
  }

  get isRunning(): boolean {
    return !this.#stopped;
  }

  /**
   * Restarts the timer, so the next tick is due after `startDelay` plus the
   * (possibly new) interval. Starts a stopped timer.
   */
  reset(options: TimerResetOptions = {}): void {
    const interval = options.interval ?? this.#interval;
    const startDelay = options.startDelay ?? 0;
    validateInterval(interval);
    validateStartDelay(startDelay);
    this.#interval = interval;
    this.#next = this.#clock() + startDelay + interval;
    this.#drift = undefined;
    this.#stopped = false;
    this.#wake();
  }

  /**
   * Stops the timer. Receiving from it raises {@link ReceiverStoppedError},
   * until it is {@link reset}.
   */
  stop(): void {
    this.#stopped = true;
    this.#drift = undefined;
    this.#wake();
  }

  ready(): boolean {
    if (this.#stopped) {
      return false;
    }
    if (this.#drift !== undefined) {
      return true;
    }
    const now = this.#clock();
    if (now < this.#next) {
      return false;
    }
    this.#drift = now - this.#next;
    this.#next = this.#policy.calculateNextTickTime(
      now,
      this.#next,
      this.#interval
    );
    return true;
  }

  async wait(abort?: AbortSignal): Promise<boolean> {
    abort?.throwIfAborted();
    while (!this.ready()) {
      if (this.#stopped) {
        return false;
      }
      const delay = Math.max(0, this.#next - this.#clock());
      let timeout: ReturnType<typeof setTimeout> | undefined;
      let waker: Settle<void> | undefined;
      try {
        await suspend<void>(
          settle => {
            waker = settle;
            this.#wakers.add(settle);
            timeout = setTimeout(() => settle(), delay);
          },
          () => {
            if (waker !== undefined) {
              this.#wakers.delete(waker);
            }
          },
          abort
        );
      } finally {
        clearTimeout(timeout);
        if (waker !== undefined) {
          this.#wakers.delete(waker);
        }
      }
    }
    return true;
  }

  consume(): number {
    if (this.ready()) {
      const drift = this.#drift ?? 0;
      this.#drift = undefined;
      return drift;
    }
    if (this.#stopped) {
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
    return `Timer(${this.#interval}ms, ${String(this.#policy)})`;
  }

  #wake(): void {
    for (const waker of [...this.#wakers]) {
      waker();
    }
    this.#wakers.clear();
  }
}

const validateInterval = (interval: number) => {
  if (!(interval > 0) || !Number.isFinite(interval)) {
    throw new ArgumentError(
      `event-channels: timer: interval must be positive: ${interval}`
    );
  }
};

const validateStartDelay = (startDelay: number) => {
  if (!(startDelay >= 0) || !Number.isFinite(startDelay)) {
    throw new ArgumentError(
      `event-channels: timer: startDelay must be non-negative: ${startDelay}`
    );
  }
};
