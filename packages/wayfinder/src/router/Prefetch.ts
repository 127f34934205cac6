/**
 * PrefetchEngine - loads route data ahead of (or alongside) navigation.
 *
 * Per route key (the target path):
 * - Idle → Pending when a fetch starts and no Pending entry exists; a second
 *   request while Pending attaches to the in-flight load
 * - Pending → Done | Failed when the loader settles, if the key is still the
 *   active route (the basename-stripped path in the LocationStore, or the
 *   default pathname when that is empty)
 * - otherwise the entry is discarded without notifying anyone
 *
 * Done notifies subscribers, then emits RouteChangeComplete. Failed emits
 * RouteChangeError, notifies with an error-carrying ComponentInfo, then emits
 * RouteChangeComplete. Transport and decode failures look the same to
 * subscribers.
 *
 * There is no timeout: a load that never settles keeps its key Pending.
 * A subscriber that throws is logged and skipped; the rest of the pass and
 * the lifecycle events still run.
 */

import * as Cause from "effect/Cause";
import * as Context from "effect/Context";
import * as Deferred from "effect/Deferred";
import * as Effect from "effect/Effect";
import * as Exit from "effect/Exit";
import * as FiberSet from "effect/FiberSet";
import * as Layer from "effect/Layer";
import * as Option from "effect/Option";
import { Atom, Registry as AtomRegistry } from "@effect-atom/atom";
import { stripBasename } from "./Basename.js";
import type { RouteFetchError } from "./errors.js";
import { LocationStore } from "./LocationStore.js";
import { RouteLoader } from "./RouteLoader.js";
import { RouterConfig } from "./RouterConfig.js";
import { RouterEvent, RouterEvents } from "./RouterEvents.js";
import * as Subscriptions from "./Subscriptions.js";
import { reportFailures, type SubscriptionHandle } from "./Subscriptions.js";
import { empty } from "../h.js";
import type { VElement } from "../shared.js";

// =============================================================================
// Types
// =============================================================================

/**
 * What subscribers receive when a fetch for the active route settles.
 * `error` is empty on success.
 */
export interface ComponentInfo {
  readonly payload: VElement;
  readonly error: string;
}

export const FETCH_ERROR_MESSAGE = "Error fetching route";

export type RouteFetchStatus = "Pending" | "Done" | "Failed";

export interface RouteFetchState {
  readonly path: string;
  readonly status: RouteFetchStatus;
  readonly result: Option.Option<ComponentInfo>;
  readonly error: Option.Option<string>;
}

export interface PrefetchEngineService {
  /**
   * Start loading `path` in the background.
   */
  readonly prefetch: (path: string) => Effect.Effect<void>;

  /**
   * Load `path` and wait for it to settle. None when the result was
   * discarded because the active route moved on.
   */
  readonly fetchRoute: (path: string) => Effect.Effect<Option.Option<ComponentInfo>>;

  readonly state: (path: string) => Effect.Effect<Option.Option<RouteFetchState>>;

  /**
   * Last ComponentInfo delivered to subscribers.
   */
  readonly latest: Atom.Atom<Option.Option<ComponentInfo>>;

  readonly subscribe: (listener: (info: ComponentInfo) => void) => Effect.Effect<SubscriptionHandle>;
  readonly unsubscribe: (handle: SubscriptionHandle) => Effect.Effect<void>;
}

export class PrefetchEngine extends Context.Tag("wayfinder/PrefetchEngine")<
  PrefetchEngine,
  PrefetchEngineService
>() {}

// =============================================================================
// Implementation
// =============================================================================

interface Entry {
  readonly state: RouteFetchState;
  readonly settled: Deferred.Deferred<Option.Option<ComponentInfo>>;
}

const pending = (path: string): RouteFetchState => ({
  path,
  status: "Pending",
  result: Option.none(),
  error: Option.none(),
});

export const PrefetchEngineLive: Layer.Layer<
  PrefetchEngine,
  never,
  RouteLoader | RouterEvents | LocationStore | RouterConfig | AtomRegistry.AtomRegistry
> = Layer.scoped(
  PrefetchEngine,
  Effect.gen(function* () {
    const loader = yield* RouteLoader;
    const events = yield* RouterEvents;
    const store = yield* LocationStore;
    const config = yield* RouterConfig;
    const registry = yield* AtomRegistry.AtomRegistry;

    // Loads run here so they outlive the fiber that started them
    const loads = yield* FiberSet.make();

    const entries = new Map<string, Entry>();
    const subscribers = Subscriptions.make<ComponentInfo>();
    const latest = Atom.make(Option.none<ComponentInfo>()).pipe(Atom.keepAlive);

    // The route the Switch renders, default pathname included
    const activeRoute = Effect.map(store.get, (context) => {
      const stripped = stripBasename(config.basename, context.location.path);
      return stripped === "" ? config.defaultPathname : stripped;
    });

    const deliver = (info: ComponentInfo) =>
      Effect.sync(() => {
        registry.set(latest, Option.some(info));
        return subscribers.notify(info);
      }).pipe(Effect.flatMap((failures) => reportFailures(failures, "Prefetch subscriber failed")));

    /**
     * Settle waiters on every exit path, and free the key if the load never
     * reached a settled state.
     */
    const release = (
      path: string,
      settled: Deferred.Deferred<Option.Option<ComponentInfo>>,
      exit: Exit.Exit<Option.Option<ComponentInfo>>,
    ) =>
      Effect.sync(() => {
        const entry = entries.get(path);
        if (entry !== undefined && entry.settled === settled && entry.state.status === "Pending") {
          entries.delete(path);
        }
      }).pipe(Effect.zipRight(Deferred.done(settled, exit)));

    const settle = (
      path: string,
      settled: Deferred.Deferred<Option.Option<ComponentInfo>>,
      exit: Exit.Exit<VElement, RouteFetchError>,
    ): Effect.Effect<Option.Option<ComponentInfo>> =>
      Effect.gen(function* () {
        const active = yield* activeRoute;
        if (active !== path) {
          entries.delete(path);
          yield* Effect.logWarning(`Discarding route data, active route is now ${active}`);
          return Option.none();
        }

        if (Exit.isSuccess(exit)) {
          const info: ComponentInfo = { payload: exit.value, error: "" };
          entries.set(path, {
            settled,
            state: { path, status: "Done", result: Option.some(info), error: Option.none() },
          });
          yield* deliver(info);
          yield* events.emit(RouterEvent.RouteChangeComplete({ path }));
          return Option.some(info);
        }

        yield* Effect.logWarning("Route fetch failed", Cause.pretty(exit.cause));
        const info: ComponentInfo = { payload: empty(), error: FETCH_ERROR_MESSAGE };
        entries.set(path, {
          settled,
          state: {
            path,
            status: "Failed",
            result: Option.some(info),
            error: Option.some(FETCH_ERROR_MESSAGE),
          },
        });
        yield* events.emit(RouterEvent.RouteChangeError({ path }));
        yield* deliver(info);
        yield* events.emit(RouterEvent.RouteChangeComplete({ path }));
        return Option.some(info);
      });

    /**
     * Attach to the Pending entry for `path`, or create one and fork its load.
     */
    const start = (path: string): Effect.Effect<Deferred.Deferred<Option.Option<ComponentInfo>>> =>
      Effect.gen(function* () {
        const created = yield* Deferred.make<Option.Option<ComponentInfo>>();

        // Check and insert in one step so concurrent callers cannot both create
        const attached = yield* Effect.sync((): Option.Option<typeof created> => {
          const existing = entries.get(path);
          if (existing !== undefined && existing.state.status === "Pending") {
            return Option.some(existing.settled);
          }
          entries.set(path, { state: pending(path), settled: created });
          return Option.none();
        });

        if (Option.isSome(attached)) {
          yield* Effect.logDebug("Attaching to in-flight route fetch");
          return attached.value;
        }

        yield* Effect.logDebug("Fetching route data");
        yield* FiberSet.run(
          loads,
          loader.load(path).pipe(
            Effect.exit,
            Effect.flatMap((exit) => settle(path, created, exit)),
            Effect.onExit((exit) => release(path, created, exit)),
            Effect.annotateLogs({ route: path }),
          ),
        );
        return created;
      }).pipe(Effect.annotateLogs({ route: path }));

    return {
      prefetch: (path) => Effect.asVoid(start(path)),
      fetchRoute: (path) => Effect.flatMap(start(path), Deferred.await),
      state: (path) =>
        Effect.sync(() => Option.map(Option.fromNullable(entries.get(path)), (entry) => entry.state)),
      latest,
      subscribe: (listener) => Effect.sync(() => subscribers.add(listener)),
      unsubscribe: (handle) => Effect.sync(() => subscribers.remove(handle)),
    };
  }),
);
