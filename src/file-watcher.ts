import {watch} from 'chokidar';
import {Anycast} from './anycast';
import {
  ArgumentError,
  ReceiverError,
  ReceiverStoppedError,
  SenderError,
} from './errors';
import {log} from './logger';
import {Receiver} from './receiver';
import {type Sender} from './sender';

const logger = log('file-watcher');

/** Kinds of filesystem changes the watcher reports. */
export type FileWatcherEventType = 'create' | 'modify' | 'delete';

/** A change to a watched file. */
export type FileWatcherEvent = {
  readonly type: FileWatcherEventType;
  /** Path of the affected file, as reported by the backend. */
  readonly path: string;
};

/** Options passed to a {@link WatchBackend}. */
export type WatchBackendOptions = {
  readonly usePolling: boolean;
  /** Polling interval (ms). */
  readonly interval: number;
  readonly ignoreInitial: boolean;
};

/**
 * The part of a chokidar `FSWatcher` the file watcher uses.
 */
export interface WatchHandle {
  on(
    event: 'add' | 'change' | 'unlink',
    listener: (path: string) => void
  ): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
  close(): Promise<void>;
}

/** Starts watching paths. Defaults to chokidar. */
export type WatchBackend = (
  paths: readonly string[],
  options: WatchBackendOptions
) => WatchHandle;

export type FileWatcherOptions = {
  /** The kinds of change to report. Defaults to all of them. */
  readonly eventTypes?: Iterable<FileWatcherEventType>;
  /**
   * Poll the filesystem instead of relying on native notifications, which
   * some filesystems (NFS, SMB, some container mounts) never deliver.
   * Defaults to true.
   */
  readonly forcePolling?: boolean;
  /** Polling interval (ms). Defaults to 1000. */
  readonly pollingInterval?: number;
  readonly backend?: WatchBackend;
};

const chokidarBackend: WatchBackend = (paths, options) =>
  watch([...paths], options);

const eventTypeByName = {
  add: 'create',
  change: 'modify',
  unlink: 'delete',
} as const;

/**
 * A receiver of changes to files under the watched paths.
 *
 * Events are fed through an internal {@link Anycast} channel, so a slow
 * consumer applies back-pressure, rather than losing events. If the
 * underlying watcher fails, the receiver closes, and the failure is raised
 * by {@link consume}, once buffered events have been delivered.
 */
export class FileWatcher extends Receiver<FileWatcherEvent> {
  readonly paths: readonly string[];
  readonly eventTypes: ReadonlySet<FileWatcherEventType>;
  readonly #channel: Anycast<FileWatcherEvent>;
  readonly #sender: Sender<FileWatcherEvent>;
  readonly #receiver: Receiver<FileWatcherEvent>;
  readonly #watcher: WatchHandle;
  #failure: ReceiverError<FileWatcherEvent> | undefined;

  constructor(paths: readonly string[], options: FileWatcherOptions = {}) {
    super();
    const pollingInterval = options.pollingInterval ?? 1000;
    if (!(pollingInterval > 0)) {
      throw new ArgumentError(
        `event-channels: file-watcher: invalid pollingInterval: ${pollingInterval}`
      );
    }
    this.paths = [...paths];
    this.eventTypes = new Set(
      options.eventTypes ?? ['create', 'modify', 'delete']
    );
    this.#channel = new Anycast(`file-watcher:${this.paths.join(',')}`, {
      limit: 100,
    });
    this.#sender = this.#channel.newSender();
    this.#receiver = this.#channel.newReceiver();

    const backend = options.backend ?? chokidarBackend;
    this.#watcher = backend(this.paths, {
      usePolling: options.forcePolling ?? true,
      interval: pollingInterval,
      ignoreInitial: true,
    });
    for (const name of ['add', 'change', 'unlink'] as const) {
      this.#watcher.on(name, path => {
        this.#emit({type: eventTypeByName[name], path});
      });
    }
    this.#watcher.on('error', error => {
      this.#fail(error);
    });
  }

  ready(): boolean {
    return this.#receiver.ready();
  }

  wait(abort?: AbortSignal): Promise<boolean> {
    return this.#receiver.wait(abort);
  }

  consume(): FileWatcherEvent {
    try {
      return this.#receiver.consume();
    } catch (e: unknown) {
      if (e instanceof ReceiverStoppedError) {
        if (this.#failure !== undefined) {
          throw this.#failure;
        }
        throw new ReceiverStoppedError(this, {cause: e});
      }
      throw e;
    }
  }

  /**
   * Stops watching. Events already received may still be consumed.
   */
  close(): void {
    this.#watcher.close().catch((e: unknown) => {
      logger.error(`${String(this)}: failed to close the watcher`, e);
    });
    this.#channel.close();
  }

  toString(): string {
    return `FileWatcher(${this.paths.join(', ')})`;
  }

  #emit(event: FileWatcherEvent): void {
    if (!this.eventTypes.has(event.type)) {
      return;
    }
    this.#sender.send(event).catch((e: unknown) => {
      // events racing close are dropped
      if (!(e instanceof SenderError)) {
        logger.error(`${String(this)}: failed to send ${event.type} event`, e);
      }
    });
  }

  #fail(error: Error): void {
    if (this.#failure !== undefined) {
      return;
    }
    this.#failure = new ReceiverError(
      `event-channels: file-watcher: ${String(this)} failed: ${error.message}`,
      this,
      {cause: error}
    );
    logger.error(`${String(this)}: watcher failed, closing`, error);
    this.close();
  }
}
