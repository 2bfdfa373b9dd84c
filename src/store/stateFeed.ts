// src/store/stateFeed.ts

import { FolderOperationCancelledError, FolderSyncTimeoutError } from "../errors";
import { Logger } from "../types";

export type Listener<T> = (value: T) => void;
export type Unsubscribe = () => void;

/**
 * A value that changes over time. Subscribers receive the current value
 * immediately and every later one.
 */
export interface StateFeed<T> {
  get(): T;
  subscribe(listener: Listener<T>): Unsubscribe;
}

/**
 * Holds a value and notifies subscribers on `set`. A listener that throws is
 * logged and does not stop the others.
 */
export class StateCell<T> implements StateFeed<T> {
  private listeners = new Set<Listener<T>>();

  constructor(
    private value: T,
    private readonly logger: Logger = console,
  ) {}

  get(): T {
    return this.value;
  }

  set(value: T): void {
    this.value = value;
    for (const listener of [...this.listeners]) {
      try {
        listener(value);
      } catch (error) {
        this.logger.error("StateFeed: Error in listener:", error);
      }
    }
  }

  subscribe(listener: Listener<T>): Unsubscribe {
    this.listeners.add(listener);
    listener(this.value);
    return () => {
      this.listeners.delete(listener);
    };
  }
}

/**
 * Projects a feed and drops values equal to the last one a subscriber saw.
 * Each subscriber keeps its own last value.
 */
export function mapDistinct<T, R>(
  source: StateFeed<T>,
  project: (value: T) => R,
  equals: (a: R, b: R) => boolean = Object.is,
): StateFeed<R> {
  return {
    get: () => project(source.get()),
    subscribe(listener) {
      let last: { value: R } | undefined;
      return source.subscribe((value) => {
        const next = project(value);
        if (last && equals(last.value, next)) {
          return;
        }
        last = { value: next };
        listener(next);
      });
    },
  };
}

export interface WaitOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
  /** Named in the timeout error. */
  operation?: string;
}

/** Resolves with the first value of the feed that satisfies `predicate`. */
export function waitFor<T>(feed: StateFeed<T>, predicate: (value: T) => boolean, options: WaitOptions = {}): Promise<T> {
  const { signal, timeoutMs, operation = "waitFor" } = options;

  return new Promise<T>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new FolderOperationCancelledError());
      return;
    }

    let settled = false;
    let unsubscribe: Unsubscribe | undefined;
    let timer: NodeJS.Timeout | undefined;

    const finish = (settle: () => void) => {
      if (settled) return;
      settled = true;
      if (timer !== undefined) clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
      unsubscribe?.();
      settle();
    };
    const onAbort = () => finish(() => reject(new FolderOperationCancelledError()));

    signal?.addEventListener("abort", onAbort, { once: true });
    if (timeoutMs !== undefined) {
      timer = setTimeout(() => finish(() => reject(new FolderSyncTimeoutError(operation, timeoutMs))), timeoutMs);
    }

    unsubscribe = feed.subscribe((value) => {
      if (predicate(value)) {
        finish(() => resolve(value));
      }
    });
    // The current value may already have matched during subscribe.
    if (settled) unsubscribe();
  });
}
