import type { ChangeState } from "./change-state.js";
import { internalsOf } from "./internals.js";
import type { ChangeEvent, TrackedRecord } from "./types.js";

type WatchCallback = (event: ChangeEvent) => void;

// Registry: change state -> Set of callbacks
const watcherRegistry = new WeakMap<ChangeState, Set<WatchCallback>>();

/**
 * Internal: notify all watchers of a change state
 */
export function notifyWatchers(state: ChangeState, event: ChangeEvent): void {
  const watchers = watcherRegistry.get(state);
  if (!watchers || watchers.size === 0) return;

  for (const callback of [...watchers]) {
    callback(event);
  }
}

/**
 * Internal: register a watcher for a change state
 */
function registerWatcher(state: ChangeState, callback: WatchCallback): () => void {
  let watchers = watcherRegistry.get(state);
  if (!watchers) {
    watchers = new Set();
    watcherRegistry.set(state, watchers);
  }
  watchers.add(callback);

  // Return unsubscribe function
  return () => {
    watchers?.delete(callback);
  };
}

export interface WatchHandle {
  unsubscribe: () => void;
}

export interface WatchAsyncIteratorOptions {
  /**
   * If true, events arriving while the consumer is busy are merged into one batch.
   * Default: true
   */
  coalesce?: boolean;
}

export interface Watcher extends AsyncIterableIterator<ChangeEvent[]> {
  next(): Promise<IteratorResult<ChangeEvent[], void>>;
  return(): Promise<IteratorResult<ChangeEvent[], void>>;
  unsubscribe: () => void;
}

/**
 * Watch a record's change state.
 *
 * With callback: invokes callback with each event, returns { unsubscribe }
 * Without callback: returns an async iterator that yields event batches, with unsubscribe() method
 */
export function watch<T>(record: TrackedRecord<T>, callback: (event: ChangeEvent) => void): WatchHandle;
export function watch<T>(record: TrackedRecord<T>, options?: WatchAsyncIteratorOptions): Watcher;
export function watch<T>(
  record: TrackedRecord<T>,
  callbackOrOptions?: ((event: ChangeEvent) => void) | WatchAsyncIteratorOptions,
): WatchHandle | Watcher {
  const { state } = internalsOf(record);

  // Callback mode
  if (typeof callbackOrOptions === "function") {
    const unsubscribe = registerWatcher(state, callbackOrOptions);
    return { unsubscribe };
  }

  // Async generator mode
  const { coalesce = true } = callbackOrOptions ?? {};

  let pendingResolve: ((value: IteratorResult<ChangeEvent[], void>) => void) | null = null;
  const pending: ChangeEvent[][] = [];
  let stopped = false;
  let unsubscribeFn: (() => void) | null = null;

  const callback: WatchCallback = (event) => {
    if (stopped) return;

    if (pendingResolve) {
      // Consumer is waiting, resolve immediately
      pendingResolve({ value: [event], done: false });
      pendingResolve = null;
      return;
    }

    const last = pending[pending.length - 1];
    if (coalesce && last) {
      last.push(event);
    } else {
      pending.push([event]);
    }
  };

  unsubscribeFn = registerWatcher(state, callback);

  const doUnsubscribe = () => {
    stopped = true;
    if (unsubscribeFn) {
      unsubscribeFn();
      unsubscribeFn = null;
    }
    if (pendingResolve) {
      pendingResolve({ value: undefined, done: true });
      pendingResolve = null;
    }
  };

  const watcher: Watcher = {
    async next(): Promise<IteratorResult<ChangeEvent[], void>> {
      // Batches queued while the consumer was busy are delivered first
      const batch = pending.shift();
      if (batch) {
        return { value: batch, done: false };
      }

      if (stopped) {
        return { value: undefined, done: true };
      }

      // Wait for next change
      return new Promise((resolve) => {
        pendingResolve = resolve;
      });
    },

    async return(): Promise<IteratorResult<ChangeEvent[], void>> {
      doUnsubscribe();
      pending.length = 0;
      return { value: undefined, done: true };
    },

    async throw(error: unknown): Promise<IteratorResult<ChangeEvent[], void>> {
      doUnsubscribe();
      throw error;
    },

    unsubscribe: doUnsubscribe,

    [Symbol.asyncIterator]() {
      return this;
    },
  };

  return watcher;
}
