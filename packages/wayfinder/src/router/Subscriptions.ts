/**
 * Handle-based listener registry.
 *
 * `add` returns an opaque handle; `remove` takes it back. Registering the same
 * callback twice yields two handles and two notifications per `notify`.
 * Listeners are called in insertion order. A listener that throws does not
 * stop the pass: `notify` hands back what each failing listener threw.
 */

import * as Brand from "effect/Brand";
import * as Effect from "effect/Effect";

export type SubscriptionHandle = number & Brand.Brand<"SubscriptionHandle">;

const SubscriptionHandle = Brand.nominal<SubscriptionHandle>();

export type Listener<A> = (value: A) => void;

export interface SubscriptionRegistry<A> {
  readonly add: (listener: Listener<A>) => SubscriptionHandle;
  /** Removing an unknown or already-removed handle is a no-op. */
  readonly remove: (handle: SubscriptionHandle) => void;
  /** Returns the values thrown by listeners, in call order. */
  readonly notify: (value: A) => ReadonlyArray<unknown>;
  readonly size: () => number;
}

export function make<A>(): SubscriptionRegistry<A> {
  const listeners = new Map<SubscriptionHandle, Listener<A>>();
  let nextId = 0;

  return {
    add: (listener) => {
      nextId += 1;
      const handle = SubscriptionHandle(nextId);
      listeners.set(handle, listener);
      return handle;
    },
    remove: (handle) => {
      listeners.delete(handle);
    },
    notify: (value) => {
      const failures: unknown[] = [];
      // Listeners added during the pass wait for the next one; removed ones are skipped
      for (const [handle, listener] of Array.from(listeners.entries())) {
        if (!listeners.has(handle)) {
          continue;
        }
        try {
          listener(value);
        } catch (failure) {
          failures.push(failure);
        }
      }
      return failures;
    },
    size: () => listeners.size,
  };
}

/**
 * Log what listeners threw during a notification pass.
 */
export const reportFailures = (
  failures: ReadonlyArray<unknown>,
  message: string,
): Effect.Effect<void> =>
  Effect.forEach(failures, (failure) => Effect.logWarning(message, failure), { discard: true });
