/**
 * Router lifecycle events, published for instrumentation.
 */

import * as Context from "effect/Context";
import * as Data from "effect/Data";
import * as Effect from "effect/Effect";
import * as Layer from "effect/Layer";
import * as Subscriptions from "./Subscriptions.js";
import { reportFailures, type SubscriptionHandle } from "./Subscriptions.js";

export type RouterEvent = Data.TaggedEnum<{
  /** Route data for `path` failed to load */
  RouteChangeError: { readonly path: string };
  /** The route change to `path` has settled, successfully or not */
  RouteChangeComplete: { readonly path: string };
}>;

export const RouterEvent = Data.taggedEnum<RouterEvent>();

export interface RouterEventsService {
  readonly emit: (event: RouterEvent) => Effect.Effect<void>;
  readonly subscribe: (listener: (event: RouterEvent) => void) => Effect.Effect<SubscriptionHandle>;
  readonly unsubscribe: (handle: SubscriptionHandle) => Effect.Effect<void>;
}

export class RouterEvents extends Context.Tag("wayfinder/RouterEvents")<
  RouterEvents,
  RouterEventsService
>() {
  static Live: Layer.Layer<RouterEvents> = Layer.sync(RouterEvents, () => {
    const listeners = Subscriptions.make<RouterEvent>();
    return {
      emit: (event) =>
        Effect.logDebug(`${event._tag} ${event.path}`).pipe(
          Effect.zipRight(Effect.sync(() => listeners.notify(event))),
          Effect.flatMap((failures) => reportFailures(failures, "Router event listener failed")),
        ),
      subscribe: (listener) => Effect.sync(() => listeners.add(listener)),
      unsubscribe: (handle) => Effect.sync(() => listeners.remove(handle)),
    };
  });
}
