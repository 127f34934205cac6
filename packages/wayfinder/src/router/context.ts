/**
 * Context accessors for the rendering tree.
 *
 * Each dies with a ConfigurationError when no router layer is provided:
 * that is a wiring mistake, and the offending render is allowed to fail.
 */

import * as Context from "effect/Context";
import * as Effect from "effect/Effect";
import * as Option from "effect/Option";
import { ConfigurationError } from "./errors.js";
import type { Location } from "./Location.js";
import { LocationStore, type LocationStoreService } from "./LocationStore.js";
import { PrefetchEngine, type PrefetchEngineService } from "./Prefetch.js";
import { Router, type RouterService } from "./Router.js";

const required = <I, S>(tag: Context.Tag<I, S>, accessor: string): Effect.Effect<S> =>
  Effect.flatMap(
    Effect.serviceOption(tag),
    Option.match({
      onNone: () =>
        Effect.die(
          new ConfigurationError({
            accessor,
            message: `${accessor} needs ${tag.key}; provide a router layer above this render`,
          }),
        ),
      onSome: Effect.succeed,
    }),
  );

/**
 * The Router of the enclosing router layer.
 */
export const currentRouter: Effect.Effect<RouterService> = required(Router, "currentRouter");

/**
 * The LocationStore of the enclosing router layer.
 */
export const currentLocationStore: Effect.Effect<LocationStoreService> = required(
  LocationStore,
  "currentLocationStore",
);

/**
 * The PrefetchEngine of the enclosing router layer.
 */
export const currentPrefetchEngine: Effect.Effect<PrefetchEngineService> = required(
  PrefetchEngine,
  "currentPrefetchEngine",
);

/**
 * The current location.
 */
export const currentLocation: Effect.Effect<Location> = required(
  LocationStore,
  "currentLocation",
).pipe(
  Effect.flatMap((store) => store.get),
  Effect.map((context) => context.location),
);

/**
 * The current path with the basename stripped.
 */
export const currentStrippedRoute: Effect.Effect<string> = Effect.gen(function* () {
  const router = yield* required(Router, "currentStrippedRoute");
  const store = yield* required(LocationStore, "currentStrippedRoute");
  const context = yield* store.get;
  return router.stripBasename(context.location.path);
});
