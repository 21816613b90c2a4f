import {
  ArgumentError,
  ReceiverStoppedError,
  SelectErrorGroup,
  UnhandledSelectedError,
} from './errors';
import {type ReceiverMessage} from './merge';
import {type Receiver} from './receiver';
import {getYieldGeneration, yieldToMacrotaskQueue} from './yield';

/**
 * The key of the internal state of a {@link Selected}.
 *
 * WARNING: Not exported from the package, as the value of
 * `Selected[selectedState]` is not part of the API contract.
 */
export const selectedState = Symbol('event-channels.selectedState');

export type SelectedState<T> = {
  readonly receiver: Receiver<T>;
  readonly outcome: {readonly value: T} | {readonly error: unknown};
  handled: boolean;
};

/**
 * The result of one receiver becoming ready within a {@link select} loop.
 *
 * Only the type is exported - instances are yielded by {@link select}, and
 * must be checked using {@link selectedFrom}, before the loop continues.
 */
export class Selected<T> {
  readonly [selectedState]: SelectedState<T>;

  constructor(
    receiver: Receiver<T>,
    outcome: {readonly value: T} | {readonly error: unknown}
  ) {
    this[selectedState] = {receiver, outcome, handled: false};
  }

  /**
   * The message received.
   *
   * @throws {ReceiverStoppedError} If the receiver stopped.
   * @throws {ReceiverError} If the receiver failed.
   */
  get message(): T {
    const outcome = this[selectedState].outcome;
    if ('error' in outcome) {
      throw outcome.error;
    }
    return outcome.value;
  }

  /**
   * The error raised while receiving, if any. Includes the
   * {@link ReceiverStoppedError} of a stopped receiver.
   */
  get exception(): unknown {
    const outcome = this[selectedState].outcome;
    return 'error' in outcome ? outcome.error : undefined;
  }

  /**
   * True if the receiver stopped. A stopped receiver is selected once, then
   * leaves the loop.
   */
  get wasStopped(): boolean {
    return this.exception instanceof ReceiverStoppedError;
  }

  toString(): string {
    return `Selected(${String(this[selectedState].receiver)})`;
  }
}

/**
 * Checks whether `selected` came from `receiver`, narrowing its type, and
 * marks it as handled if so.
 *
 * Every {@link Selected} yielded by {@link select} must be handled before the
 * loop continues, or the loop throws {@link UnhandledSelectedError}.
 */
export const selectedFrom = <T>(
  selected: Selected<unknown>,
  receiver: Receiver<T>
): selected is Selected<T> => {
  const state = selected[selectedState];
  if (state.receiver !== receiver) {
    return false;
  }
  state.handled = true;
  return true;
};

/**
 * Waits on several receivers at once, yielding a {@link Selected} for each
 * receiver that becomes ready, with its message already consumed.
 *
 * Each round polls every receiver, starting one position further along
 * than the previous round (round-robin), so that a receiver that is always
 * ready cannot starve the others. A receiver that stops is selected once more
 * (with {@link Selected.wasStopped} set), then leaves the loop. The loop ends
 * once every receiver has stopped.
 *
 * Leaving the loop (by break, return, or throw) aborts any wait still in
 * flight. If some of those waits failed, for a reason other than the abort,
 * the failures are thrown together, as a {@link SelectErrorGroup}, whose
 * `cause` is the error that ended the loop, if any.
 *
 * @throws {ArgumentError} If no receivers are given.
 *
 * @example
 * ```ts
 * for await (const selected of select(timer, messages)) {
 *   if (selectedFrom(selected, timer)) {
 *     flush();
 *   } else if (selectedFrom(selected, messages)) {
 *     if (selected.wasStopped) {
 *       break;
 *     }
 *     batch.push(selected.message);
 *   }
 * }
 * ```
 */
export function select<R extends Receiver<unknown>[]>(
  ...receivers: R
): AsyncGenerator<Selected<ReceiverMessage<R[number]>>, void, undefined>;
export function select<T>(
  ...receivers: Receiver<T>[]
): AsyncGenerator<Selected<T>, void, undefined> {
  if (receivers.length === 0) {
    throw new ArgumentError(
      'event-channels: select: at least one receiver must be provided'
    );
  }
  return run(receivers);
}

type WaitOutcome<T> =
  | {readonly receiver: Receiver<T>; readonly ready: boolean}
  | {readonly receiver: Receiver<T>; readonly error: unknown};

async function* run<T>(
  receivers: readonly Receiver<T>[]
): AsyncGenerator<Selected<T>, void, undefined> {
  // receivers that have not stopped
  const live = [...receivers];
  // waits in flight, which may outlive the round that started them
  const waits = new Map<Receiver<T>, Promise<WaitOutcome<T>>>();
  const abort = new AbortController();
  let offset = 0;
  // error thrown out of the loop, kept as the cause of any cleanup failure
  let failure: {readonly error: unknown} | undefined;

  const remove = (receiver: Receiver<T>) => {
    const i = live.indexOf(receiver);
    if (i !== -1) {
      live.splice(i, 1);
    }
  };

  try {
    while (live.length !== 0) {
      const yieldGeneration = getYieldGeneration();

      const selected: Selected<T>[] = [];
      for (let i = 0; i < live.length; i++) {
        const receiver = live[(offset + i) % live.length];
        if (receiver.ready()) {
          selected.push(consumeSelected(receiver));
        }
      }
      offset = (offset + 1) % live.length;

      if (selected.length === 0) {
        for (const receiver of live) {
          if (!waits.has(receiver)) {
            waits.set(
              receiver,
              receiver.wait(abort.signal).then(
                (ready): WaitOutcome<T> => ({receiver, ready}),
                (error: unknown): WaitOutcome<T> => ({receiver, error})
              )
            );
          }
        }
        const outcome = await Promise.race(waits.values());
        waits.delete(outcome.receiver);
        if (!live.includes(outcome.receiver)) {
          continue;
        }
        if ('error' in outcome) {
          selected.push(new Selected(outcome.receiver, {error: outcome.error}));
        } else if (!outcome.ready) {
          // stopped or failed, consume raises which
          selected.push(consumeSelected(outcome.receiver));
        }
      }

      for (const s of selected) {
        yield s;
        if (!s[selectedState].handled) {
          throw new UnhandledSelectedError(s);
        }
        if (s.exception !== undefined) {
          remove(s[selectedState].receiver);
        }
      }

      if (live.length !== 0 && getYieldGeneration() === yieldGeneration) {
        // ready receivers never suspend, which would starve timers and I/O
        await yieldToMacrotaskQueue();
      }
    }
  } catch (e: unknown) {
    failure = {error: e};
    throw e;
  } finally {
    abort.abort(selectStopped);
    const errors: unknown[] = [];
    for (const outcome of await Promise.all(waits.values())) {
      if ('error' in outcome && outcome.error !== selectStopped) {
        errors.push(outcome.error);
      }
    }
    if (errors.length !== 0) {
      throw new SelectErrorGroup(
        errors,
        failure !== undefined ? {cause: failure.error} : undefined
      );
    }
  }
}

const consumeSelected = <T>(receiver: Receiver<T>): Selected<T> => {
  try {
    return new Selected(receiver, {value: receiver.consume()});
  } catch (e: unknown) {
    return new Selected(receiver, {error: e});
  }
};

// sentinel value used as the reason for aborting waits, on leaving the loop
const selectStopped = Symbol('event-channels.selectStopped');
