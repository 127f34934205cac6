/**
 * Router error taxonomy.
 *
 * - NavigationError: a push/replace variant could not be carried out.
 *   Always returned to the caller of the failing operation.
 * - RouteFetchError: route data could not be loaded. Never escapes the
 *   prefetch engine; subscribers see it as `ComponentInfo.error`.
 * - ConfigurationError: a context accessor ran outside a router. Raised as a
 *   defect since it is a wiring mistake, not a runtime condition.
 */

import * as Data from "effect/Data";

/**
 * The query value handed to a `*WithQuery` navigation cannot be serialized
 * into a search string.
 */
export class QueryEncodingError extends Data.TaggedError("QueryEncodingError")<{
  readonly path: string;
  readonly message: string;
}> {}

/**
 * The platform history API rejected the navigation (e.g. a state value the
 * structured clone algorithm cannot copy).
 */
export class HistoryStateError extends Data.TaggedError("HistoryStateError")<{
  readonly path: string;
  readonly cause: unknown;
}> {}

export type NavigationError = QueryEncodingError | HistoryStateError;

/**
 * Loading data for a route failed.
 *
 * `reason` tells transport failures, non-2xx responses and malformed bodies
 * apart for logging; notification treats all three the same.
 */
export class RouteFetchError extends Data.TaggedError("RouteFetchError")<{
  readonly path: string;
  readonly reason: "Transport" | "Status" | "Decode";
  readonly cause: unknown;
}> {}

/**
 * A router accessor was used where no router layer is provided.
 */
export class ConfigurationError extends Data.TaggedError("ConfigurationError")<{
  readonly accessor: string;
  readonly message: string;
}> {}
