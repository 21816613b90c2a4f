// Module-tagged logger. Every line is prefixed with the package and module:
//
//   const logger = log('anycast');
//   logger.warn('channel is full');   // → [event-channels:anycast] channel is full

export interface Logger {
  info: (msg: string, ...args: unknown[]) => void;
  warn: (msg: string, ...args: unknown[]) => void;
  error: (msg: string, ...args: unknown[]) => void;
}

/**
 * Create a tagged logger for a module.
 * @param module - Short identifier e.g. "anycast", "timer", "file-watcher"
 */
export function log(module: string): Logger {
  const tag = `[event-channels:${module}]`;
  return {
    info(msg: string, ...args: unknown[]) {
      console.info(`${tag} ${msg}`, ...args);
    },
    warn(msg: string, ...args: unknown[]) {
      console.warn(`${tag} ${msg}`, ...args);
    },
    error(msg: string, ...args: unknown[]) {
      console.error(`${tag} ${msg}`, ...args);
    },
  };
}
