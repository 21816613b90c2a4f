/**
 * Settle is handed to whoever is going to wake a suspended operation.
 */
export type Settle<R> = (result: R) => void;

/**
 * Holds a value, distinguishing "no value" from a value of `undefined`.
 */
export type Slot<T> = {readonly value: T};

/**
 * Suspends the caller until the registered {@link Settle} callback is called.
 *
 * `add` is called synchronously, with the callback that resolves the
 * returned promise. If the abort signal fires first, `remove` is called with
 * the same callback, and the promise rejects with the abort reason.
 * Callers MUST ensure that a removed callback is never called.
 */
export const suspend = <R>(
  add: (settle: Settle<R>) => void,
  remove: (settle: Settle<R>) => void,
  abort?: AbortSignal
): Promise<R> => {
  try {
    abort?.throwIfAborted();
    return new Promise<R>((resolve, reject) => {
      const onAbort = () => {
        try {
          remove(settle);
          reject(abort?.reason);
        } catch (e: unknown) {
          reject(e);
        }
      };
      const settle: Settle<R> = result => {
        abort?.removeEventListener('abort', onAbort);
        resolve(result);
      };
      abort?.addEventListener('abort', onAbort, {once: true});
      add(settle);
    });
  } catch (e: unknown) {
    return Promise.reject(e);
  }
};
