/**
 * Router - the user-facing navigation facade.
 *
 * Combines the History service with the router configuration:
 * - push/replace variants, each prefixed with the basename
 * - back/forward/go
 * - basename prefix/strip
 * - navigate(): picks the push variant for a link-style intent
 * - prefetch and prefetch subscriptions through the PrefetchEngine
 *
 * Every handle to the Router shares the same History instance; navigating
 * through one is visible to all.
 */

import * as Context from "effect/Context";
import * as Effect from "effect/Effect";
import * as Layer from "effect/Layer";
import { Registry as AtomRegistry } from "@effect-atom/atom";
import { prefixBasename, stripBasename } from "./Basename.js";
import type { NavigationError } from "./errors.js";
import {
  BrowserHistoryLive,
  HashHistoryLive,
  History,
  MemoryHistoryLive,
  type HistoryKind,
  type MemoryHistoryOptions,
} from "./History.js";
import type { QueryInput } from "./Location.js";
import { LocationStore, LocationStoreLive } from "./LocationStore.js";
import { PrefetchEngine, PrefetchEngineLive, type ComponentInfo } from "./Prefetch.js";
import { FetchRouteLoaderLive, RouteLoader, type HttpRouteLoaderOptions } from "./RouteLoader.js";
import { RouterConfig, type RouterConfigOptions } from "./RouterConfig.js";
import { RouterEvents } from "./RouterEvents.js";
import type { SubscriptionHandle } from "./Subscriptions.js";

// =============================================================================
// Types
// =============================================================================

/**
 * A link-style navigation intent.
 */
export interface NavigateOptions {
  /** Opaque state stored with the history entry */
  readonly state?: unknown;
  /** Structured query appended to the path */
  readonly query?: QueryInput;
  /** Link target; "_blank" plain pushes are left to the browser */
  readonly target?: string;
  /** The collaborator scrolls in-page anchors itself */
  readonly scroll?: boolean;
}

export interface RouterService {
  readonly basename: string;
  readonly defaultPathname: string;
  readonly kind: HistoryKind;

  readonly push: (path: string) => Effect.Effect<void, NavigationError>;
  readonly replace: (path: string) => Effect.Effect<void, NavigationError>;
  readonly pushWithState: (path: string, state: unknown) => Effect.Effect<void, NavigationError>;
  readonly replaceWithState: (
    path: string,
    state: unknown,
  ) => Effect.Effect<void, NavigationError>;
  readonly pushWithQuery: (path: string, query: QueryInput) => Effect.Effect<void, NavigationError>;
  readonly pushWithQueryAndState: (
    path: string,
    query: QueryInput,
    state: unknown,
  ) => Effect.Effect<void, NavigationError>;
  readonly replaceWithQueryAndState: (
    path: string,
    query: QueryInput,
    state: unknown,
  ) => Effect.Effect<void, NavigationError>;

  readonly back: Effect.Effect<void>;
  readonly forward: Effect.Effect<void>;
  readonly go: (delta: number) => Effect.Effect<void>;

  /**
   * Navigate the way a link does: exactly one push variant is chosen from
   * which of state and query are present.
   */
  readonly navigate: (path: string, options?: NavigateOptions) => Effect.Effect<void, NavigationError>;

  readonly prefixBasename: (path: string) => string;
  readonly stripBasename: (path: string) => string;

  readonly prefetch: (path: string) => Effect.Effect<void>;
  readonly subscribe: (listener: (info: ComponentInfo) => void) => Effect.Effect<SubscriptionHandle>;
  readonly unsubscribe: (handle: SubscriptionHandle) => Effect.Effect<void>;
}

/**
 * Router service tag for Effect dependency injection.
 */
export class Router extends Context.Tag("wayfinder/Router")<Router, RouterService>() {}

// =============================================================================
// Helpers
// =============================================================================

const hasState = (state: unknown): boolean => state !== undefined && state !== null && state !== "";

const hasQuery = (query: QueryInput | undefined): query is QueryInput =>
  query !== undefined && Object.keys(query).length > 0;

/**
 * "#section" or "/#section"
 */
const isInPageAnchor = (path: string): boolean => path.startsWith("#") || path.startsWith("/#");

// =============================================================================
// Router Layer
// =============================================================================

/**
 * The Router facade over History, RouterConfig and PrefetchEngine.
 */
export const RouterFacadeLive: Layer.Layer<Router, never, History | RouterConfig | PrefetchEngine> =
  Layer.effect(
    Router,
    Effect.gen(function* () {
      const history = yield* History;
      const config = yield* RouterConfig;
      const prefetch = yield* PrefetchEngine;

      const prefix = (path: string) => prefixBasename(config.basename, path);

      const service: RouterService = {
        basename: config.basename,
        defaultPathname: config.defaultPathname,
        kind: history.kind,

        push: (path) => history.push(prefix(path)),
        replace: (path) => history.replace(prefix(path)),
        pushWithState: (path, state) => history.pushWithState(prefix(path), state),
        replaceWithState: (path, state) => history.replaceWithState(prefix(path), state),
        pushWithQuery: (path, query) => history.pushWithQuery(prefix(path), query),
        pushWithQueryAndState: (path, query, state) =>
          history.pushWithQueryAndState(prefix(path), query, state),
        replaceWithQueryAndState: (path, query, state) =>
          history.replaceWithQueryAndState(prefix(path), query, state),

        back: history.go(-1),
        forward: history.go(1),
        go: (delta) => history.go(delta),

        navigate: (path, options = {}) => {
          const withState = hasState(options.state);
          const query = options.query;

          if (options.scroll === true && options.target !== "_blank" && isInPageAnchor(path)) {
            return Effect.logDebug(`In-page anchor ${path}, history left untouched`);
          }
          if (hasQuery(query)) {
            return withState
              ? service.pushWithQueryAndState(path, query, options.state)
              : service.pushWithQuery(path, query);
          }
          if (withState) {
            return service.pushWithState(path, options.state);
          }
          // The browser opens the new tab
          if (options.target === "_blank") {
            return Effect.logDebug(`New-tab navigation to ${path}, history left untouched`);
          }
          return service.push(path);
        },

        prefixBasename: prefix,
        stripBasename: (path) => stripBasename(config.basename, path),

        prefetch: prefetch.prefetch,
        subscribe: prefetch.subscribe,
        unsubscribe: prefetch.unsubscribe,
      };

      return service;
    }),
  );

/**
 * Everything a mounted router provides, given a History, a RouterConfig and
 * a RouteLoader.
 */
export const RouterCoreLive: Layer.Layer<
  Router | LocationStore | PrefetchEngine | RouterEvents,
  never,
  History | RouterConfig | RouteLoader | AtomRegistry.AtomRegistry
> = RouterFacadeLive.pipe(
  Layer.provideMerge(PrefetchEngineLive),
  Layer.provideMerge(Layer.merge(LocationStoreLive, RouterEvents.Live)),
);

export type RouterOptions = RouterConfigOptions;

/**
 * Router layers over any History layer the caller provides.
 */
export function RouterLive(
  options: RouterOptions = {},
): Layer.Layer<
  Router | LocationStore | PrefetchEngine | RouterEvents | RouterConfig,
  never,
  History | RouteLoader | AtomRegistry.AtomRegistry
> {
  return RouterCoreLive.pipe(Layer.provideMerge(RouterConfig.layer(options)));
}

/**
 * Atom registry that runs scheduled work immediately, so navigation effects
 * are observable as soon as the navigating call returns.
 */
export const SyncAtomRegistryLayer = AtomRegistry.layerOptions({
  scheduleTask: (f: () => void) => f(),
});

export interface MountOptions extends RouterOptions {
  readonly loader?: HttpRouteLoaderOptions;
}

type MountedRouter =
  | Router
  | LocationStore
  | PrefetchEngine
  | RouterEvents
  | RouterConfig
  | History
  | RouteLoader
  | AtomRegistry.AtomRegistry;

const mount = (
  historyLayer: Layer.Layer<History>,
  options: MountOptions,
): Layer.Layer<MountedRouter> =>
  RouterLive(options).pipe(
    Layer.provideMerge(
      Layer.mergeAll(historyLayer, FetchRouteLoaderLive(options.loader), SyncAtomRegistryLayer),
    ),
  );

/**
 * Router over the browser URL.
 */
export const BrowserRouterLive = (options: MountOptions = {}): Layer.Layer<MountedRouter> =>
  mount(BrowserHistoryLive, options);

/**
 * Router over the URL hash.
 */
export const HashRouterLive = (options: MountOptions = {}): Layer.Layer<MountedRouter> =>
  mount(HashHistoryLive, options);

/**
 * Router over an in-memory stack.
 */
export const MemoryRouterLive = (
  options: MountOptions & MemoryHistoryOptions = {},
): Layer.Layer<MountedRouter> => mount(MemoryHistoryLive(options), options);
