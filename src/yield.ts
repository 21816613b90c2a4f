// Loops that keep finding work on already-resolved promises never give the
// event loop a chance to run timers or I/O. Such a loop records the
// generation before an iteration, and yields only if it has not changed.

let generation = 0;
let pending: Promise<number> | undefined;

/**
 * Returns the current yield generation, which advances every time a
 * {@link yieldToMacrotaskQueue} completes.
 */
export const getYieldGeneration = (): number => generation;

/**
 * Resolves on the next turn of the event loop (via `setImmediate`), with the
 * new yield generation.
 *
 * Concurrent calls share the same promise, so any number of loops waiting
 * together advance the generation once.
 */
export const yieldToMacrotaskQueue = (): Promise<number> => {
  if (pending === undefined) {
    pending = new Promise<number>(resolve => {
      setImmediate(() => {
        pending = undefined;
        // wraps around rather than losing precision
        generation =
          generation === Number.MAX_SAFE_INTEGER
            ? Number.MIN_SAFE_INTEGER
            : generation + 1;
        resolve(generation);
      });
    });
  }
  return pending;
};
