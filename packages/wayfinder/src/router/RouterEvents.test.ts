import { Effect } from "effect";
import { describe, expect } from "vitest";
import { it } from "@effect/vitest";
import { RouterEvent, RouterEvents } from "./RouterEvents.js";

describe("RouterEvents", () => {
  it.effect("delivers events to subscribers in order", () =>
    Effect.gen(function* () {
      const events = yield* RouterEvents;
      const seen: RouterEvent[] = [];
      const handle = yield* events.subscribe((event) => seen.push(event));

      yield* events.emit(RouterEvent.RouteChangeError({ path: "/a" }));
      yield* events.emit(RouterEvent.RouteChangeComplete({ path: "/a" }));
      yield* events.unsubscribe(handle);
      yield* events.emit(RouterEvent.RouteChangeComplete({ path: "/b" }));

      expect(seen.map((event) => `${event._tag} ${event.path}`)).toEqual([
        "RouteChangeError /a",
        "RouteChangeComplete /a",
      ]);
    }).pipe(Effect.provide(RouterEvents.Live)),
  );

  it.effect("tells events apart with $is", () =>
    Effect.gen(function* () {
      const event = RouterEvent.RouteChangeError({ path: "/a" });
      expect(RouterEvent.$is("RouteChangeError")(event)).toBe(true);
      expect(RouterEvent.$is("RouteChangeComplete")(event)).toBe(false);
    }),
  );
});
