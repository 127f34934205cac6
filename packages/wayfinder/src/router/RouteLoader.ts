/**
 * RouteLoader - where the prefetch engine gets route data from.
 *
 * The HTTP loader fetches `<urlFor(path)>` as JSON, bypassing the HTTP cache,
 * and decodes a serialized element tree:
 *
 * ```json
 * { "element": { "type": "section", "props": { "class": "post" },
 *                "children": [{ "type": "h1", "children": ["Hello"] }] } }
 * ```
 */

import * as Context from "effect/Context";
import * as Effect from "effect/Effect";
import * as Layer from "effect/Layer";
import * as Schema from "effect/Schema";
import { FetchHttpClient, HttpClient, HttpClientResponse } from "@effect/platform";
import { RouteFetchError } from "./errors.js";
import { h } from "../h.js";
import type { VElement } from "../shared.js";

// =============================================================================
// Service
// =============================================================================

export interface RouteLoaderService {
  readonly load: (path: string) => Effect.Effect<VElement, RouteFetchError>;
}

export class RouteLoader extends Context.Tag("wayfinder/RouteLoader")<
  RouteLoader,
  RouteLoaderService
>() {}

// =============================================================================
// Route Documents
// =============================================================================

const ElementTag = Schema.Literal(
  "FRAGMENT",
  "div",
  "span",
  "p",
  "a",
  "img",
  "ul",
  "ol",
  "li",
  "h1",
  "h2",
  "h3",
  "h4",
  "h5",
  "h6",
  "section",
  "article",
  "aside",
  "header",
  "footer",
  "main",
  "nav",
  "strong",
  "em",
  "code",
  "pre",
  "blockquote",
  "button",
  "table",
  "thead",
  "tbody",
  "tr",
  "th",
  "td",
);

export interface SerializedElement {
  readonly type: typeof ElementTag.Type;
  readonly props?: { readonly [key: string]: unknown };
  readonly children?: ReadonlyArray<SerializedElement | string>;
}

export const SerializedElement: Schema.Schema<SerializedElement> = Schema.Struct({
  type: ElementTag,
  props: Schema.optional(Schema.Record({ key: Schema.String, value: Schema.Unknown })),
  children: Schema.optional(
    Schema.Array(
      Schema.Union(
        Schema.String,
        Schema.suspend((): Schema.Schema<SerializedElement> => SerializedElement),
      ),
    ),
  ),
});

export const RouteDocument = Schema.Struct({
  element: SerializedElement,
});

export type RouteDocument = typeof RouteDocument.Type;

/**
 * Build a VElement from its serialized form.
 */
function toElement(node: SerializedElement): VElement {
  const children = (node.children ?? []).map((child) =>
    typeof child === "string" ? child : toElement(child),
  );
  return h(node.type, { ...node.props }, children);
}

/**
 * Default data URL for a route: "/blog" → "/_routes/blog/index.json".
 */
export function routeDataUrl(path: string): string {
  const trimmed = path.endsWith("/") ? path.slice(0, -1) : path;
  return `/_routes${trimmed}/index.json`;
}

// =============================================================================
// HTTP Loader
// =============================================================================

export interface HttpRouteLoaderOptions {
  /** Map a route path to the URL of its data document */
  readonly urlFor?: (path: string) => string;
}

/**
 * Route loader backed by `HttpClient`. Any transport error, non-2xx status
 * or body that does not decode as a `RouteDocument` fails with
 * `RouteFetchError`.
 */
export function HttpRouteLoaderLive(
  options: HttpRouteLoaderOptions = {},
): Layer.Layer<RouteLoader, never, HttpClient.HttpClient> {
  const urlFor = options.urlFor ?? routeDataUrl;

  return Layer.effect(
    RouteLoader,
    Effect.gen(function* () {
      const client = (yield* HttpClient.HttpClient).pipe(HttpClient.filterStatusOk);

      return {
        load: (path) =>
          client.get(urlFor(path)).pipe(
            Effect.mapError(
              (cause) =>
                new RouteFetchError({
                  path,
                  reason: cause._tag === "ResponseError" ? "Status" : "Transport",
                  cause,
                }),
            ),
            Effect.flatMap((response) =>
              HttpClientResponse.schemaBodyJson(RouteDocument)(response).pipe(
                Effect.mapError((cause) => new RouteFetchError({ path, reason: "Decode", cause })),
              ),
            ),
            Effect.map((document) => toElement(document.element)),
            // Always revalidate with the server
            Effect.provideService(FetchHttpClient.RequestInit, { cache: "reload" }),
            Effect.withSpan("RouteLoader.load", { attributes: { path } }),
          ),
      };
    }),
  );
}

/**
 * HTTP loader on the platform `fetch`.
 */
export const FetchRouteLoaderLive = (
  options: HttpRouteLoaderOptions = {},
): Layer.Layer<RouteLoader> => HttpRouteLoaderLive(options).pipe(Layer.provide(FetchHttpClient.layer));
