import { Effect } from "effect";
import { describe, expect, test } from "vitest";
import { it } from "@effect/vitest";
import { QueryEncodingError } from "./errors.js";
import { encodeQuery, formatLocation, parsePath, withQuery } from "./Location.js";

describe("parsePath", () => {
  test("splits path, query and hash", () => {
    expect(parsePath("/search?q=x#top")).toEqual({
      path: "/search",
      query: "?q=x",
      hash: "#top",
      state: null,
    });
  });

  test("treats a bare question mark as no query", () => {
    expect(parsePath("/a?").query).toBe("");
  });

  test("carries state", () => {
    expect(parsePath("/a", { from: "test" }).state).toEqual({ from: "test" });
  });

  test("formatLocation reverses it", () => {
    expect(formatLocation(parsePath("/a/b?x=1&y=2#c"))).toBe("/a/b?x=1&y=2#c");
  });
});

describe("withQuery", () => {
  test("appends with ? or &", () => {
    expect(withQuery("/a", "y=2")).toBe("/a?y=2");
    expect(withQuery("/a?x=1#h", "y=2")).toBe("/a?x=1&y=2#h");
  });

  test("leaves the path alone for an empty query", () => {
    expect(withQuery("/a", "")).toBe("/a");
  });
});

describe("encodeQuery", () => {
  it.effect("encodes scalars", () =>
    Effect.gen(function* () {
      const encoded = yield* encodeQuery("/s", { q: "hello world", page: 2, draft: false });
      expect(encoded).toBe("q=hello+world&page=2&draft=false");
    }),
  );

  it.effect("repeats keys for arrays and skips null and undefined", () =>
    Effect.gen(function* () {
      const encoded = yield* encodeQuery("/s", { tag: ["a", "b"], skip: null, gone: undefined });
      expect(encoded).toBe("tag=a&tag=b");
    }),
  );

  it.effect("fails on nested objects", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(encodeQuery("/s", { filter: { nested: 1 } }));
      expect(error).toBeInstanceOf(QueryEncodingError);
      expect(error.path).toBe("/s");
      expect(error.message.startsWith("Cannot serialize query for /s: ")).toBe(true);
    }),
  );
});
