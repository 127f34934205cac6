import { Effect, Layer } from "effect";
import { describe, expect } from "vitest";
import { it } from "@effect/vitest";
import { currentLocation, currentRouter, currentStrippedRoute } from "./context.js";
import { ConfigurationError, RouteFetchError } from "./errors.js";
import { MemoryHistoryLive } from "./History.js";
import { RouteLoader } from "./RouteLoader.js";
import { RouterLive, SyncAtomRegistryLayer } from "./Router.js";

const TestRouter = RouterLive({ basename: "/app" }).pipe(
  Layer.provideMerge(
    Layer.mergeAll(
      MemoryHistoryLive({ initialPathname: "/app/docs", initialSearch: "?v=2" }),
      Layer.succeed(RouteLoader, {
        load: (path) => Effect.fail(new RouteFetchError({ path, reason: "Transport", cause: "offline" })),
      }),
      SyncAtomRegistryLayer,
    ),
  ),
);

const defectOf = <A>(effect: Effect.Effect<A>) =>
  effect.pipe(
    Effect.map((): unknown => undefined),
    Effect.catchAllDefect((defect) => Effect.succeed(defect)),
  );

describe("context accessors", () => {
  it.effect("read the enclosing router", () =>
    Effect.gen(function* () {
      const router = yield* currentRouter;
      expect(router.basename).toBe("/app");
      expect(yield* currentLocation).toEqual({
        path: "/app/docs",
        query: "?v=2",
        hash: "",
        state: null,
      });
      expect(yield* currentStrippedRoute).toBe("/docs");
    }).pipe(Effect.provide(TestRouter)),
  );

  it.effect("die with a ConfigurationError outside a router", () =>
    Effect.gen(function* () {
      const routerDefect = yield* defectOf(currentRouter);
      expect(routerDefect).toBeInstanceOf(ConfigurationError);
      expect(routerDefect).toMatchObject({ accessor: "currentRouter" });

      expect(yield* defectOf(currentLocation)).toMatchObject({ accessor: "currentLocation" });
      expect(yield* defectOf(currentStrippedRoute)).toMatchObject({
        accessor: "currentStrippedRoute",
      });
    }),
  );
});
