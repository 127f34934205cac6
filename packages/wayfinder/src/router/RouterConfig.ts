/**
 * Router configuration: the basename the app is mounted under and the path
 * the Switch falls back to when no route path is available.
 */

import * as Config from "effect/Config";
import type * as ConfigError from "effect/ConfigError";
import * as Context from "effect/Context";
import * as Effect from "effect/Effect";
import * as Layer from "effect/Layer";

export interface RouterConfigShape {
  /** Never ends with "/"; empty means no prefixing. */
  readonly basename: string;
  readonly defaultPathname: string;
}

export interface RouterConfigOptions {
  readonly basename?: string;
  readonly defaultPathname?: string;
}

/**
 * Drop a single trailing slash ("/app/" → "/app", "/" → "").
 */
export const normalizeBasename = (basename: string): string =>
  basename.endsWith("/") ? basename.slice(0, -1) : basename;

export class RouterConfig extends Context.Tag("wayfinder/RouterConfig")<
  RouterConfig,
  RouterConfigShape
>() {
  static make = (options: RouterConfigOptions = {}): RouterConfigShape => ({
    basename: normalizeBasename(options.basename ?? ""),
    defaultPathname: options.defaultPathname ?? "",
  });

  static layer = (options: RouterConfigOptions = {}): Layer.Layer<RouterConfig> =>
    Layer.succeed(RouterConfig, RouterConfig.make(options));

  /**
   * Read ROUTER_BASENAME and ROUTER_DEFAULT_PATHNAME from the ConfigProvider.
   */
  static fromConfig: Layer.Layer<RouterConfig, ConfigError.ConfigError> = Layer.effect(
    RouterConfig,
    Effect.gen(function* () {
      const basename = yield* Config.string("ROUTER_BASENAME").pipe(Config.withDefault(""));
      const defaultPathname = yield* Config.string("ROUTER_DEFAULT_PATHNAME").pipe(
        Config.withDefault(""),
      );
      return RouterConfig.make({ basename, defaultPathname });
    }),
  );
}
