import { describe, expect, test } from "vitest";
import * as Subscriptions from "./Subscriptions.js";

describe("Subscriptions", () => {
  test("notifies listeners in insertion order", () => {
    const registry = Subscriptions.make<string>();
    const calls: string[] = [];
    registry.add((value) => calls.push(`first:${value}`));
    registry.add((value) => calls.push(`second:${value}`));

    registry.notify("a");

    expect(calls).toEqual(["first:a", "second:a"]);
  });

  test("the same callback registered twice is notified twice", () => {
    const registry = Subscriptions.make<number>();
    let count = 0;
    const listener = () => {
      count += 1;
    };
    const first = registry.add(listener);
    const second = registry.add(listener);

    registry.notify(1);

    expect(first).not.toBe(second);
    expect(count).toBe(2);
  });

  test("remove is idempotent and ignores unknown handles", () => {
    const registry = Subscriptions.make<number>();
    const handle = registry.add(() => {});

    registry.remove(handle);
    registry.remove(handle);

    expect(registry.size()).toBe(0);
  });

  test("a listener may unsubscribe during a pass", () => {
    const registry = Subscriptions.make<string>();
    const calls: string[] = [];
    const handle = registry.add((value) => {
      calls.push(`once:${value}`);
      registry.remove(handle);
    });
    registry.add((value) => calls.push(`always:${value}`));

    registry.notify("a");
    registry.notify("b");

    expect(calls).toEqual(["once:a", "always:a", "always:b"]);
  });

  test("a listener removed earlier in the pass is not called", () => {
    const registry = Subscriptions.make<string>();
    const calls: string[] = [];
    let second: Subscriptions.SubscriptionHandle | undefined;
    registry.add(() => {
      calls.push("first");
      if (second !== undefined) {
        registry.remove(second);
      }
    });
    second = registry.add(() => calls.push("second"));

    registry.notify("a");

    expect(calls).toEqual(["first"]);
  });

  test("a throwing listener does not stop the pass", () => {
    const registry = Subscriptions.make<string>();
    const calls: string[] = [];
    const failure = new Error("listener failed");
    registry.add(() => {
      throw failure;
    });
    registry.add((value) => calls.push(value));

    const failures = registry.notify("a");

    expect(calls).toEqual(["a"]);
    expect(failures).toEqual([failure]);
  });
});
