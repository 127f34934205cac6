/**
 * Router module exports.
 *
 * - History service (browser, hash and memory variants)
 * - LocationStore holding the revisioned current location
 * - Router facade with basename handling and link-style navigation
 * - PrefetchEngine for route data and lifecycle events
 * - Switch for rendering the current route
 */

export * as History from "./History.js";
export * as Location from "./Location.js";
export * as LocationStore from "./LocationStore.js";
export * as Router from "./Router.js";
export * as Prefetch from "./Prefetch.js";
export * as RouteLoader from "./RouteLoader.js";
export * as Subscriptions from "./Subscriptions.js";

// Re-export History types and service tag
export type { HistoryKind, HistoryListener, HistoryService, MemoryHistoryOptions } from "./History.js";
export {
  History as HistoryTag,
  BrowserHistoryLive,
  HashHistoryLive,
  MemoryHistoryLive,
  makeMemoryHistory,
} from "./History.js";

export type { Location as RouterLocation, QueryInput } from "./Location.js";
export { QueryParams, encodeQuery, formatLocation, parsePath } from "./Location.js";

export type { LocationStoreService } from "./LocationStore.js";
export { LocationContext, LocationStore as LocationStoreTag, LocationStoreLive } from "./LocationStore.js";

export type { MountOptions, NavigateOptions, RouterOptions, RouterService } from "./Router.js";
export {
  Router as RouterTag,
  BrowserRouterLive,
  HashRouterLive,
  MemoryRouterLive,
  RouterCoreLive,
  RouterLive,
  SyncAtomRegistryLayer,
} from "./Router.js";

export type { RouterConfigOptions, RouterConfigShape } from "./RouterConfig.js";
export { RouterConfig, normalizeBasename } from "./RouterConfig.js";

export { prefixBasename, stripBasename } from "./Basename.js";

export type { ComponentInfo, PrefetchEngineService, RouteFetchState, RouteFetchStatus } from "./Prefetch.js";
export { FETCH_ERROR_MESSAGE, PrefetchEngine, PrefetchEngineLive } from "./Prefetch.js";

export type { HttpRouteLoaderOptions, RouteLoaderService, SerializedElement } from "./RouteLoader.js";
export {
  FetchRouteLoaderLive,
  HttpRouteLoaderLive,
  RouteDocument,
  RouteLoader as RouteLoaderTag,
  routeDataUrl,
} from "./RouteLoader.js";

export { RouterEvent, RouterEvents } from "./RouterEvents.js";

export type { SubscriptionHandle } from "./Subscriptions.js";

export type { RenderRoute, SwitchProps } from "./Switch.js";
export { Switch, dispatch, renderRoute, withPrefetched } from "./Switch.js";

export {
  currentLocation,
  currentLocationStore,
  currentPrefetchEngine,
  currentRouter,
  currentStrippedRoute,
} from "./context.js";

export {
  ConfigurationError,
  HistoryStateError,
  QueryEncodingError,
  RouteFetchError,
  type NavigationError,
} from "./errors.js";
