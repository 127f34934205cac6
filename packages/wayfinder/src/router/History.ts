/**
 * History service - the navigation stack the router drives.
 *
 * Three interchangeable layers provide it:
 * - BrowserHistoryLive - window.history with popstate handling
 * - HashHistoryLive - the route lives after "#" in the URL
 * - MemoryHistoryLive - in-memory stack for tests and non-browser hosts
 *
 * Consumers only see `HistoryService`; `kind` reports which variant is active.
 *
 * Listener notification is synchronous and in registration order. A
 * navigation issued from inside a listener is queued and delivered as its
 * own pass once the current pass has finished.
 */

import * as Effect from "effect/Effect";
import * as Context from "effect/Context";
import * as Layer from "effect/Layer";
import * as Runtime from "effect/Runtime";
import * as Subscriptions from "./Subscriptions.js";
import { reportFailures, type SubscriptionHandle } from "./Subscriptions.js";
import { HistoryStateError, type NavigationError } from "./errors.js";
import {
  encodeQuery,
  formatLocation,
  parsePath,
  withQuery,
  type Location,
  type QueryInput,
} from "./Location.js";

// =============================================================================
// Types
// =============================================================================

export type HistoryKind = "Browser" | "Hash" | "Memory";

export type HistoryListener = (location: Location) => void;

/**
 * History service interface.
 */
export interface HistoryService {
  readonly kind: HistoryKind;

  /**
   * Current location, read live on every run.
   */
  readonly location: Effect.Effect<Location>;

  /**
   * Each navigation fails with HistoryStateError, and emits nothing, when the
   * platform history API rejects it.
   */
  readonly push: (path: string) => Effect.Effect<void, NavigationError>;
  readonly replace: (path: string) => Effect.Effect<void, NavigationError>;
  readonly pushWithState: (path: string, state: unknown) => Effect.Effect<void, NavigationError>;
  readonly replaceWithState: (
    path: string,
    state: unknown,
  ) => Effect.Effect<void, NavigationError>;

  /**
   * Navigate with a structured query. Fails without touching the stack when
   * the query cannot be serialized.
   */
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

  /**
   * Move `delta` entries through the stack.
   */
  readonly go: (delta: number) => Effect.Effect<void>;

  readonly listen: (listener: HistoryListener) => Effect.Effect<SubscriptionHandle>;
  readonly unlisten: (handle: SubscriptionHandle) => Effect.Effect<void>;
}

/**
 * History service tag for Effect dependency injection.
 */
export class History extends Context.Tag("wayfinder/History")<History, HistoryService>() {}

// =============================================================================
// Shared Implementation
// =============================================================================

type WriteMode = "push" | "replace";

/**
 * The platform-specific part of a history variant.
 */
interface HistoryDriver {
  readonly read: () => Location;
  readonly write: (mode: WriteMode, href: string, state: unknown) => void;
  /** Returns true when the move is applied synchronously (no popstate follows). */
  readonly go: (delta: number) => boolean;
}

interface HistoryNotifier {
  readonly listeners: Subscriptions.SubscriptionRegistry<Location>;
  /** Returns what listeners threw during the pass. */
  readonly emit: (location: Location) => ReadonlyArray<unknown>;
}

function makeNotifier(): HistoryNotifier {
  const listeners = Subscriptions.make<Location>();
  const queue: Location[] = [];
  let notifying = false;

  const emit = (location: Location): ReadonlyArray<unknown> => {
    queue.push(location);
    if (notifying) {
      return [];
    }
    notifying = true;
    const failures: unknown[] = [];
    try {
      let next = queue.shift();
      while (next !== undefined) {
        failures.push(...listeners.notify(next));
        next = queue.shift();
      }
    } finally {
      notifying = false;
      queue.length = 0;
    }
    return failures;
  };

  return { listeners, emit };
}

function makeHistoryService(
  kind: HistoryKind,
  driver: HistoryDriver,
  notifier: HistoryNotifier,
): HistoryService {
  const emit = Effect.suspend(() =>
    reportFailures(notifier.emit(driver.read()), "History listener failed"),
  );

  const navigate = (
    mode: WriteMode,
    href: string,
    state: unknown,
  ): Effect.Effect<void, NavigationError> =>
    Effect.gen(function* () {
      yield* Effect.try({
        try: () => driver.write(mode, href, state),
        catch: (cause) => new HistoryStateError({ path: href, cause }),
      });
      yield* emit;
      yield* Effect.logDebug(`${kind} history ${mode} ${href}`);
    });

  const navigateWithQuery = (
    mode: WriteMode,
    path: string,
    query: QueryInput,
    state: unknown,
  ): Effect.Effect<void, NavigationError> =>
    Effect.flatMap(encodeQuery(path, query), (encoded) =>
      navigate(mode, withQuery(path, encoded), state),
    );

  return {
    kind,
    location: Effect.sync(driver.read),
    push: (path) => navigate("push", path, null),
    replace: (path) => navigate("replace", path, null),
    pushWithState: (path, state) => navigate("push", path, state),
    replaceWithState: (path, state) => navigate("replace", path, state),
    pushWithQuery: (path, query) => navigateWithQuery("push", path, query, null),
    pushWithQueryAndState: (path, query, state) => navigateWithQuery("push", path, query, state),
    replaceWithQueryAndState: (path, query, state) =>
      navigateWithQuery("replace", path, query, state),
    go: (delta) => Effect.when(emit, () => driver.go(delta)).pipe(Effect.asVoid),
    listen: (listener) => Effect.sync(() => notifier.listeners.add(listener)),
    unlisten: (handle) => Effect.sync(() => notifier.listeners.remove(handle)),
  };
}

/**
 * Create a layer for a window-backed variant. The popstate listener is
 * removed when the layer's scope closes.
 */
function windowHistoryLayer(kind: HistoryKind, driver: HistoryDriver): Layer.Layer<History> {
  return Layer.scoped(
    History,
    Effect.gen(function* () {
      const notifier = makeNotifier();
      const runSync = Runtime.runSync(yield* Effect.runtime<never>());

      // Back/forward and go() arrive through popstate
      const handlePopState = () => {
        runSync(reportFailures(notifier.emit(driver.read()), "History listener failed"));
      };

      window.addEventListener("popstate", handlePopState);

      yield* Effect.addFinalizer(() =>
        Effect.sync(() => {
          window.removeEventListener("popstate", handlePopState);
        }),
      );

      return makeHistoryService(kind, driver, notifier);
    }),
  );
}

const writeWindowHistory = (mode: WriteMode, url: string, state: unknown): void => {
  if (mode === "push") {
    window.history.pushState(state, "", url);
  } else {
    window.history.replaceState(state, "", url);
  }
};

const goWindowHistory = (delta: number): boolean => {
  window.history.go(delta);
  return false;
};

// =============================================================================
// Browser History Implementation
// =============================================================================

const browserDriver: HistoryDriver = {
  read: () => ({
    path: window.location.pathname,
    query: window.location.search,
    hash: window.location.hash,
    state: window.history.state,
  }),
  write: writeWindowHistory,
  go: goWindowHistory,
};

/**
 * Browser history layer - real browser history with popstate handling.
 */
export const BrowserHistoryLive: Layer.Layer<History> = windowHistoryLayer("Browser", browserDriver);

// =============================================================================
// Hash History Implementation
// =============================================================================

const hashDriver: HistoryDriver = {
  read: () => {
    const route = window.location.hash.slice(1);
    return parsePath(route === "" ? "/" : route, window.history.state);
  },
  write: (mode, href, state) => {
    const url = `${window.location.pathname}${window.location.search}#${href}`;
    writeWindowHistory(mode, url, state);
  },
  go: goWindowHistory,
};

/**
 * Hash history layer - keeps the route after "#" so any static host can
 * serve the application.
 */
export const HashHistoryLive: Layer.Layer<History> = windowHistoryLayer("Hash", hashDriver);

// =============================================================================
// Memory History Implementation
// =============================================================================

/**
 * Options for creating memory history.
 */
export interface MemoryHistoryOptions {
  /** Initial location (defaults to "/") */
  readonly initialPathname?: string;
  /** Initial search string, with or without "?" (defaults to "") */
  readonly initialSearch?: string;
  /** Initial hash (defaults to "") */
  readonly initialHash?: string;
  /** Initial state (defaults to null) */
  readonly initialState?: unknown;
}

/**
 * Create an in-memory history service.
 */
export function makeMemoryHistory(options: MemoryHistoryOptions = {}): HistoryService {
  const search = options.initialSearch ?? "";
  const initialLocation: Location = {
    path: options.initialPathname ?? "/",
    query: search === "" || search.startsWith("?") ? search : `?${search}`,
    hash: options.initialHash ?? "",
    state: options.initialState ?? null,
  };

  const stack: Location[] = [initialLocation];
  let index = 0;

  const current = (): Location => stack[index] ?? initialLocation;

  const driver: HistoryDriver = {
    read: current,
    write: (mode, href, state) => {
      const location = parsePath(href, state);
      if (mode === "push") {
        // Drop forward entries
        stack.splice(index + 1);
        stack.push(location);
        index = stack.length - 1;
      } else {
        stack[index] = location;
      }
    },
    go: (delta) => {
      const target = index + delta;
      if (delta === 0 || target < 0 || target >= stack.length) {
        return false;
      }
      index = target;
      return true;
    },
  };

  return makeHistoryService("Memory", driver, makeNotifier());
}

/**
 * Create a memory history layer - useful for testing and SSR.
 */
export function MemoryHistoryLive(options: MemoryHistoryOptions = {}): Layer.Layer<History> {
  return Layer.sync(History, () => makeMemoryHistory(options));
}

/**
 * Render the current location of a history as an href.
 */
export const currentHref = (history: HistoryService): Effect.Effect<string> =>
  Effect.map(history.location, formatLocation);
