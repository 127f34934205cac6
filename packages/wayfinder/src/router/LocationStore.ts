/**
 * LocationStore - the single source of truth for the current location.
 *
 * Holds a `LocationContext` in an Atom. Every dispatch produces a new context
 * with the next revision, even when the location is unchanged, so each
 * history event is observed as a distinct state. Equality is revision
 * equality.
 *
 * Readers should re-read the whole context rather than caching parts of it.
 */

import * as Context from "effect/Context";
import * as Data from "effect/Data";
import * as Effect from "effect/Effect";
import * as Equal from "effect/Equal";
import * as Hash from "effect/Hash";
import * as Layer from "effect/Layer";
import * as Runtime from "effect/Runtime";
import { Atom, Registry as AtomRegistry } from "@effect-atom/atom";
import { History } from "./History.js";
import type { Location } from "./Location.js";
import * as Subscriptions from "./Subscriptions.js";
import { reportFailures, type SubscriptionHandle } from "./Subscriptions.js";

// =============================================================================
// Types
// =============================================================================

export class LocationContext
  extends Data.Class<{
    readonly location: Location;
    readonly revision: number;
  }>
  implements Equal.Equal
{
  [Equal.symbol](that: Equal.Equal): boolean {
    return that instanceof LocationContext && that.revision === this.revision;
  }

  [Hash.symbol](): number {
    return Hash.number(this.revision);
  }
}

export interface LocationStoreService {
  /**
   * Reactive view of the current context.
   */
  readonly context: Atom.Atom<LocationContext>;

  readonly get: Effect.Effect<LocationContext>;

  /**
   * Store a new location with the next revision and notify subscribers
   * synchronously.
   */
  readonly dispatch: (location: Location) => Effect.Effect<LocationContext>;

  readonly subscribe: (
    listener: (context: LocationContext) => void,
  ) => Effect.Effect<SubscriptionHandle>;
  readonly unsubscribe: (handle: SubscriptionHandle) => Effect.Effect<void>;
}

export class LocationStore extends Context.Tag("wayfinder/LocationStore")<
  LocationStore,
  LocationStoreService
>() {}

// =============================================================================
// Implementation
// =============================================================================

/**
 * Create a store seeded with `initial` at revision 0.
 */
function makeLocationStore(
  registry: AtomRegistry.Registry,
  initial: Location,
): LocationStoreService {
  const contextAtom = Atom.make(new LocationContext({ location: initial, revision: 0 })).pipe(
    Atom.keepAlive,
  );
  const listeners = Subscriptions.make<LocationContext>();

  return {
    context: contextAtom,
    get: Effect.sync(() => registry.get(contextAtom)),
    dispatch: (location) =>
      Effect.gen(function* () {
        const previous = registry.get(contextAtom);
        const next = new LocationContext({ location, revision: previous.revision + 1 });
        registry.set(contextAtom, next);
        yield* reportFailures(listeners.notify(next), "Location subscriber failed");
        return next;
      }),
    subscribe: (listener) => Effect.sync(() => listeners.add(listener)),
    unsubscribe: (handle) => Effect.sync(() => listeners.remove(handle)),
  };
}

/**
 * Location store layer bound to the History service.
 *
 * Dispatches the history's location once on mount, then once per history
 * event until the layer's scope closes.
 */
export const LocationStoreLive: Layer.Layer<
  LocationStore,
  never,
  History | AtomRegistry.AtomRegistry
> = Layer.scoped(
  LocationStore,
  Effect.gen(function* () {
    const history = yield* History;
    const registry = yield* AtomRegistry.AtomRegistry;
    const runSync = Runtime.runSync(yield* Effect.runtime<never>());

    const store = makeLocationStore(registry, yield* history.location);

    // Force a location update on mount
    yield* store.dispatch(yield* history.location);

    const handle = yield* history.listen((location) => {
      runSync(store.dispatch(location));
    });

    yield* Effect.addFinalizer(() => history.unlisten(handle));

    return store;
  }),
);
