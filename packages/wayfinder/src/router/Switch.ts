/**
 * Switch - decides what to render for the current path.
 *
 * Pattern matching is the render function's job; the Switch only hands it
 * the basename-stripped path, or the fallback pathname when there is none.
 *
 * Usage:
 * ```typescript
 * const render = (path: string) =>
 *   path === "/" ? h("main", {}, ["Home"]) : h("main", {}, ["Not found"]);
 *
 * function App() {
 *   return Switch({ render });
 * }
 * ```
 */

import * as Effect from "effect/Effect";
import * as Option from "effect/Option";
import * as Stream from "effect/Stream";
import { Registry as AtomRegistry } from "@effect-atom/atom";
import { currentLocationStore, currentPrefetchEngine, currentRouter } from "./context.js";
import type { ComponentInfo } from "./Prefetch.js";
import { empty, h } from "../h.js";
import type { VElement } from "../shared.js";

export type RenderRoute = (path: string) => VElement;

export interface SwitchProps {
  readonly render: RenderRoute;
  /** Fallback path; defaults to the router's configured default pathname */
  readonly pathname?: string;
  /** Also render the last prefetched route data, after the routed element */
  readonly prefetched?: boolean;
}

/**
 * Render `path`, falling back to `defaultPathname`, then to an empty fragment.
 */
export function dispatch(path: string, render: RenderRoute, defaultPathname = ""): VElement {
  if (path !== "") {
    return render(path);
  }
  if (defaultPathname !== "") {
    return render(defaultPathname);
  }
  return empty();
}

/**
 * Append the payload of the last prefetched route, if any.
 */
export function withPrefetched(element: VElement, latest: Option.Option<ComponentInfo>): VElement {
  return Option.match(latest, {
    onNone: () => element,
    onSome: (info) => h("FRAGMENT", {}, [element, info.payload]),
  });
}

/**
 * Render the current route once.
 */
export const renderRoute = (props: SwitchProps): Effect.Effect<VElement> =>
  Effect.gen(function* () {
    const router = yield* currentRouter;
    const store = yield* currentLocationStore;
    const context = yield* store.get;
    return dispatch(
      router.stripBasename(context.location.path),
      props.render,
      props.pathname ?? router.defaultPathname,
    );
  });

/**
 * Switch component: re-renders on every LocationStore revision.
 */
export function Switch(
  props: SwitchProps,
): Stream.Stream<VElement, never, AtomRegistry.AtomRegistry> {
  return Stream.unwrap(
    Effect.gen(function* () {
      const router = yield* currentRouter;
      const store = yield* currentLocationStore;
      const registry = yield* AtomRegistry.AtomRegistry;
      const fallback = props.pathname ?? router.defaultPathname;

      const routed = Stream.map(AtomRegistry.toStream(registry, store.context), (context) =>
        dispatch(router.stripBasename(context.location.path), props.render, fallback),
      );
      if (props.prefetched !== true) {
        return routed;
      }

      const engine = yield* currentPrefetchEngine;
      return Stream.zipLatest(routed, AtomRegistry.toStream(registry, engine.latest)).pipe(
        Stream.map(([element, latest]) => withPrefetched(element, latest)),
      );
    }),
  );
}
