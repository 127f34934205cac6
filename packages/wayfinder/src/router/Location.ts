/**
 * Location snapshots and query-string encoding.
 *
 * A Location is immutable: every navigation produces a new one.
 */

import * as Effect from "effect/Effect";
import * as Schema from "effect/Schema";
import { QueryEncodingError } from "./errors.js";

// =============================================================================
// Types
// =============================================================================

/**
 * Where in the application the user currently is.
 *
 * `query` keeps its leading "?" and `hash` its leading "#"; both are empty
 * strings when absent.
 */
export interface Location {
  readonly path: string;
  readonly query: string;
  readonly hash: string;
  readonly state: unknown;
}

/**
 * Structured query handed to the `*WithQuery` navigation variants.
 * Values are validated against `QueryParams` before encoding.
 */
export type QueryInput = { readonly [key: string]: unknown };

const QueryScalar = Schema.Union(Schema.String, Schema.Number, Schema.Boolean);

/**
 * Serializable query: scalars, arrays of scalars (repeated keys), and
 * null/undefined (skipped).
 */
export const QueryParams = Schema.Record({
  key: Schema.String,
  value: Schema.Union(QueryScalar, Schema.Array(QueryScalar), Schema.Null, Schema.Undefined),
});

export type QueryParams = typeof QueryParams.Type;

// =============================================================================
// Helpers
// =============================================================================

/**
 * Split an href ("/search?q=x#top") into a location.
 */
export function parsePath(href: string, state: unknown = null): Location {
  const hashIndex = href.indexOf("#");
  const beforeHash = hashIndex === -1 ? href : href.slice(0, hashIndex);
  const hash = hashIndex === -1 ? "" : href.slice(hashIndex);

  const queryIndex = beforeHash.indexOf("?");
  const path = queryIndex === -1 ? beforeHash : beforeHash.slice(0, queryIndex);
  const query = queryIndex === -1 ? "" : beforeHash.slice(queryIndex);

  return { path, query: query === "?" ? "" : query, hash, state };
}

/**
 * Render a location back into an href.
 */
export function formatLocation(location: Location): string {
  return `${location.path}${location.query}${location.hash}`;
}

/**
 * Encode a query value into a search string without the leading "?".
 */
export const encodeQuery = (
  path: string,
  query: QueryInput,
): Effect.Effect<string, QueryEncodingError> =>
  Schema.decodeUnknown(QueryParams)(query).pipe(
    Effect.mapError(
      (error) =>
        new QueryEncodingError({
          path,
          message: `Cannot serialize query for ${path}: ${error.message}`,
        }),
    ),
    Effect.map((params) => {
      const search = new URLSearchParams();
      for (const [key, value] of Object.entries(params)) {
        if (value === null || value === undefined) {
          continue;
        }
        if (typeof value === "object") {
          for (const item of value) {
            search.append(key, String(item));
          }
        } else {
          search.append(key, String(value));
        }
      }
      return search.toString();
    }),
  );

/**
 * Append an encoded query to a path, keeping any query the path already has.
 */
export function withQuery(path: string, encoded: string): string {
  if (encoded === "") {
    return path;
  }
  const hashIndex = path.indexOf("#");
  const base = hashIndex === -1 ? path : path.slice(0, hashIndex);
  const hash = hashIndex === -1 ? "" : path.slice(hashIndex);
  const separator = base.includes("?") ? "&" : "?";
  return `${base}${separator}${encoded}${hash}`;
}
