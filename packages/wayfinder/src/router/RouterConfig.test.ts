import { ConfigProvider, Effect } from "effect";
import { describe, expect } from "vitest";
import { it } from "@effect/vitest";
import { RouterConfig } from "./RouterConfig.js";

describe("RouterConfig", () => {
  it.effect("normalizes the basename", () =>
    Effect.gen(function* () {
      const config = yield* RouterConfig;
      expect(config).toEqual({ basename: "/docs", defaultPathname: "/intro" });
    }).pipe(Effect.provide(RouterConfig.layer({ basename: "/docs/", defaultPathname: "/intro" }))),
  );

  it.effect("defaults to no basename and no fallback", () =>
    Effect.gen(function* () {
      expect(yield* RouterConfig).toEqual({ basename: "", defaultPathname: "" });
    }).pipe(Effect.provide(RouterConfig.layer())),
  );

  it.effect("reads the environment through the ConfigProvider", () =>
    Effect.gen(function* () {
      expect(yield* RouterConfig).toEqual({ basename: "/app", defaultPathname: "/" });
    }).pipe(
      Effect.provide(RouterConfig.fromConfig),
      Effect.withConfigProvider(
        ConfigProvider.fromMap(
          new Map([
            ["ROUTER_BASENAME", "/app/"],
            ["ROUTER_DEFAULT_PATHNAME", "/"],
          ]),
        ),
      ),
    ),
  );
});
