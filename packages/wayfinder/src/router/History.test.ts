import { Effect } from "effect";
import { describe, expect } from "vitest";
import { it } from "@effect/vitest";
import { QueryEncodingError } from "./errors.js";
import { currentHref, makeMemoryHistory } from "./History.js";
import type { Location } from "./Location.js";

const record = (locations: Location[]) => (location: Location) => {
  locations.push(location);
};

describe("MemoryHistory", () => {
  it.effect("starts at the root by default", () =>
    Effect.gen(function* () {
      const history = makeMemoryHistory();
      expect(history.kind).toBe("Memory");
      expect(yield* history.location).toEqual({ path: "/", query: "", hash: "", state: null });
    }),
  );

  it.effect("accepts an initial location", () =>
    Effect.gen(function* () {
      const history = makeMemoryHistory({
        initialPathname: "/docs",
        initialSearch: "page=2",
        initialHash: "#intro",
        initialState: { restored: true },
      });
      expect(yield* history.location).toEqual({
        path: "/docs",
        query: "?page=2",
        hash: "#intro",
        state: { restored: true },
      });
    }),
  );

  it.effect("notifies listeners once per push, in order", () =>
    Effect.gen(function* () {
      const history = makeMemoryHistory();
      const seen: Location[] = [];
      yield* history.listen(record(seen));

      yield* history.push("/a");
      yield* history.push("/b?x=1#h");

      expect(seen.map((location) => location.path)).toEqual(["/a", "/b"]);
      expect(yield* currentHref(history)).toBe("/b?x=1#h");
    }),
  );

  it.effect("moves through the stack with go", () =>
    Effect.gen(function* () {
      const history = makeMemoryHistory();
      const seen: Location[] = [];
      yield* history.push("/a");
      yield* history.push("/b");
      yield* history.listen(record(seen));

      yield* history.go(-1);
      expect((yield* history.location).path).toBe("/a");
      yield* history.go(1);
      expect((yield* history.location).path).toBe("/b");

      expect(seen.map((location) => location.path)).toEqual(["/a", "/b"]);
    }),
  );

  it.effect("ignores moves outside the stack", () =>
    Effect.gen(function* () {
      const history = makeMemoryHistory();
      const seen: Location[] = [];
      yield* history.push("/a");
      yield* history.listen(record(seen));

      yield* history.go(0);
      yield* history.go(1);
      yield* history.go(-5);

      expect(seen).toEqual([]);
      expect((yield* history.location).path).toBe("/a");
    }),
  );

  it.effect("drops forward entries on push", () =>
    Effect.gen(function* () {
      const history = makeMemoryHistory();
      yield* history.push("/a");
      yield* history.push("/b");
      yield* history.go(-1);
      yield* history.push("/c");
      yield* history.go(1);

      expect((yield* history.location).path).toBe("/c");
      yield* history.go(-1);
      expect((yield* history.location).path).toBe("/a");
    }),
  );

  it.effect("replace overwrites the current entry", () =>
    Effect.gen(function* () {
      const history = makeMemoryHistory();
      yield* history.push("/a");
      yield* history.replace("/b");
      yield* history.go(-1);

      expect((yield* history.location).path).toBe("/");
      yield* history.go(1);
      expect((yield* history.location).path).toBe("/b");
    }),
  );

  it.effect("stores state with the entry", () =>
    Effect.gen(function* () {
      const history = makeMemoryHistory();
      yield* history.pushWithState("/a", { scrollY: 120 });
      yield* history.push("/b");

      expect((yield* history.location).state).toBe(null);
      yield* history.go(-1);
      expect((yield* history.location).state).toEqual({ scrollY: 120 });
    }),
  );

  it.effect("encodes structured queries", () =>
    Effect.gen(function* () {
      const history = makeMemoryHistory();
      yield* history.pushWithQuery("/search", { q: "router", tag: ["a", "b"] });
      expect(yield* history.location).toEqual({
        path: "/search",
        query: "?q=router&tag=a&tag=b",
        hash: "",
        state: null,
      });

      yield* history.replaceWithQueryAndState("/search", { q: "next" }, "kept");
      expect(yield* history.location).toEqual({
        path: "/search",
        query: "?q=next",
        hash: "",
        state: "kept",
      });
    }),
  );

  it.effect("a query that cannot be encoded fails without an event", () =>
    Effect.gen(function* () {
      const history = makeMemoryHistory();
      const seen: Location[] = [];
      yield* history.listen(record(seen));

      const error = yield* Effect.flip(
        history.pushWithQueryAndState("/search", { filter: { nested: true } }, "state"),
      );

      expect(error).toBeInstanceOf(QueryEncodingError);
      expect(seen).toEqual([]);
      expect((yield* history.location).path).toBe("/");
    }),
  );

  it.effect("delivers navigations made by listeners after the current pass", () =>
    Effect.gen(function* () {
      const history = makeMemoryHistory();
      const calls: string[] = [];
      yield* history.listen((location) => {
        calls.push(`redirect:${location.path}`);
        if (location.path === "/old") {
          Effect.runSync(history.replace("/new"));
        }
      });
      yield* history.listen((location) => {
        calls.push(`observer:${location.path}`);
      });

      yield* history.push("/old");

      expect(calls).toEqual([
        "redirect:/old",
        "observer:/old",
        "redirect:/new",
        "observer:/new",
      ]);
    }),
  );

  it.effect("stops notifying after unlisten", () =>
    Effect.gen(function* () {
      const history = makeMemoryHistory();
      const seen: Location[] = [];
      const handle = yield* history.listen(record(seen));

      yield* history.push("/a");
      yield* history.unlisten(handle);
      yield* history.push("/b");

      expect(seen.map((location) => location.path)).toEqual(["/a"]);
    }),
  );
});
