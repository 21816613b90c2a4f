export {
  ChannelsError,
  ArgumentError,
  ChannelError,
  ChannelClosedError,
  SenderError,
  SenderClosedError,
  ReceiverError,
  ReceiverStoppedError,
  SelectError,
  UnhandledSelectedError,
  SelectErrorGroup,
} from './errors';

export {type Sender} from './sender';

export {Receiver, type ReceiverAsyncIterator} from './receiver';

export {Anycast, type AnycastOptions} from './anycast';

export {
  Broadcast,
  type BroadcastOptions,
  type BroadcastReceiver,
  type BroadcastReceiverOptions,
  type OverflowPolicy,
} from './broadcast';

export {merge, type Merger, type ReceiverMessage} from './merge';

export {select, selectedFrom, type Selected} from './select';

export {
  Timer,
  type TimerOptions,
  type TimerResetOptions,
  type MissedTickPolicy,
  TriggerAllMissed,
  SkipMissedAndResync,
  SkipMissedAndDrift,
  type SkipMissedAndDriftOptions,
} from './timer';

export {Event} from './event';

export {
  FileWatcher,
  type FileWatcherEvent,
  type FileWatcherEventType,
  type FileWatcherOptions,
  type WatchBackend,
  type WatchBackendOptions,
  type WatchHandle,
} from './file-watcher';

export {
  LatestValueCache,
  type LatestValueCacheOptions,
} from './latest-value-cache';

export {getYieldGeneration, yieldToMacrotaskQueue} from './yield';

export * as experimental from './experimental';
