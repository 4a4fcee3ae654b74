/**
 * Test suite for the enumeration driver
 */

import { describe, it, expect, jest } from "@jest/globals";
import {
  anyOf,
  createSnapshot,
  DiscoveryMode,
  LeafMatch,
  Predicate,
  WindowEnumerator,
  WindowSnapshot,
  WindowSource,
} from "../src";
import { Logger } from "../tooling/lib/logger";
import { chrome, chromeHelper, createFixtureSource, googleChrome } from "./fixtures/windows.fixtures";

const chromeExe = new LeafMatch({ executable: "chrome.exe" }, "full");

/**
 * Source whose discover is a fixed list of handles, in the given order
 */
class HandleSource implements WindowSource<number> {
  discoverCalls = 0;

  constructor(private readonly handles: number[], private readonly failure?: Error) {}

  snapshot(window: number): WindowSnapshot {
    return createSnapshot({ handle: window, title: `window ${window}` });
  }

  discover(predicate: Predicate, _mode: DiscoveryMode): number[] {
    this.discoverCalls += 1;
    if (this.failure) {
      throw this.failure;
    }
    return this.handles.filter((handle) => predicate.match(this.snapshot(handle)));
  }

  activeWindowSnapshot(): WindowSnapshot {
    return this.snapshot(this.handles[0]);
  }
}

describe("WindowEnumerator", () => {
  describe("discover", () => {
    it("should keep the source order", () => {
      const enumerator = new WindowEnumerator(createFixtureSource());
      const titles = enumerator.discover(chromeExe).map((record) => record.snapshot.title);
      expect(titles).toEqual(["Chrome Browser", "Google Chrome"]);
    });

    it("should include non-top-level windows in all mode", () => {
      const enumerator = new WindowEnumerator(createFixtureSource());
      const windows = enumerator.discover(chromeExe, "all").map((record) => record.snapshot);
      expect(windows).toEqual([chrome, googleChrome, chromeHelper]);
    });

    it("should use the configured default mode", () => {
      const enumerator = new WindowEnumerator(createFixtureSource(), { mode: "all" });
      expect(enumerator.defaultMode).toBe("all");
      expect(enumerator.discover(chromeExe)).toHaveLength(3);
    });
  });

  describe("forAll", () => {
    it("should visit every matched window in order", () => {
      const enumerator = new WindowEnumerator(createFixtureSource());
      const visited: string[] = [];

      enumerator.forAll(anyOf(chromeExe, new LeafMatch({ handle: 101 })), (record) => {
        visited.push(record.snapshot.title);
      });

      expect(visited).toEqual(["Untitled - Notepad", "Chrome Browser", "Google Chrome"]);
    });

    it("should not call the observer when nothing matches", () => {
      const enumerator = new WindowEnumerator(createFixtureSource());
      const observer = jest.fn();
      enumerator.forAll(anyOf(), observer);
      expect(observer).not.toHaveBeenCalled();
    });
  });

  describe("forAllWhile", () => {
    it("should stop at the first false", () => {
      const source = new HandleSource([1, 2, 3]);
      const enumerator = new WindowEnumerator(source);
      const visited: number[] = [];

      const complete = enumerator.forAllWhile(new LeafMatch(), (window) => {
        visited.push(window);
        return window !== 2;
      });

      expect(visited).toEqual([1, 2]);
      expect(complete).toBe(false);
      expect(source.discoverCalls).toBe(1);
    });

    it("should report true when every window was visited", () => {
      const enumerator = new WindowEnumerator(new HandleSource([1, 2, 3]));
      const visited: number[] = [];

      const complete = enumerator.forAllWhile(new LeafMatch(), (window) => {
        visited.push(window);
        return true;
      });

      expect(visited).toEqual([1, 2, 3]);
      expect(complete).toBe(true);
    });

    it("should report true when nothing was discovered", () => {
      const enumerator = new WindowEnumerator(new HandleSource([]));
      expect(enumerator.forAllWhile(new LeafMatch(), () => false)).toBe(true);
    });

    it("should log the early stop", () => {
      const logger = new Logger("debug", false);
      const enumerator = new WindowEnumerator(new HandleSource([1, 2, 3]), { logger });

      enumerator.forAllWhile(new LeafMatch(), (window) => window < 2);

      const stop = logger.getEntries().find((entry) => entry.message === "Enumeration stopped by callback");
      expect(stop?.data).toEqual({ visited: 2, total: 3 });
    });
  });

  describe("forAllAsync", () => {
    it("should await each callback before the next", async () => {
      const enumerator = new WindowEnumerator(new HandleSource([1, 2, 3]));
      const events: string[] = [];
      let inFlight = 0;

      const complete = await enumerator.forAllAsync(new LeafMatch(), async (window) => {
        inFlight += 1;
        expect(inFlight).toBe(1);
        events.push(`start ${window}`);
        await new Promise((resolve) => setTimeout(resolve, 5));
        events.push(`end ${window}`);
        inFlight -= 1;
        return true;
      });

      expect(complete).toBe(true);
      expect(events).toEqual(["start 1", "end 1", "start 2", "end 2", "start 3", "end 3"]);
    });

    it("should stop at the first false", async () => {
      const enumerator = new WindowEnumerator(new HandleSource([1, 2, 3]));
      const visited: number[] = [];

      const complete = await enumerator.forAllAsync(new LeafMatch(), async (window) => {
        visited.push(window);
        return window !== 2;
      });

      expect(visited).toEqual([1, 2]);
      expect(complete).toBe(false);
    });

    it("should reject when a callback rejects", async () => {
      const enumerator = new WindowEnumerator(new HandleSource([1, 2, 3]));
      const visited: number[] = [];

      await expect(
        enumerator.forAllAsync(new LeafMatch(), async (window) => {
          visited.push(window);
          if (window === 2) {
            throw new Error("callback failed");
          }
          return true;
        })
      ).rejects.toThrow("callback failed");
      expect(visited).toEqual([1, 2]);
    });
  });

  describe("discovery failures", () => {
    it("should propagate from every variant and log at error", async () => {
      const logger = new Logger("debug", false);
      const enumerator = new WindowEnumerator(new HandleSource([1], new Error("enumeration denied")), { logger });

      expect(() => enumerator.forAll(new LeafMatch(), () => undefined)).toThrow("enumeration denied");
      expect(() => enumerator.forAllWhile(new LeafMatch(), () => true)).toThrow("enumeration denied");
      await expect(enumerator.forAllAsync(new LeafMatch(), async () => true)).rejects.toThrow("enumeration denied");

      expect(logger.getEntriesAtLevel("error")).toHaveLength(3);
      expect(logger.getEntriesAtLevel("error")[0].message).toBe("Window discovery failed");
    });
  });

  describe("matches and isActive", () => {
    it("should match a window through its snapshot", () => {
      const enumerator = new WindowEnumerator(new HandleSource([7]));
      expect(enumerator.matches(new LeafMatch({ title: "window 7" }, "full"), 7)).toBe(true);
      expect(enumerator.matches(new LeafMatch({ title: "window 7" }, "full"), 8)).toBe(false);
    });

    it("should check the active window", () => {
      const enumerator = new WindowEnumerator(createFixtureSource(101));
      expect(enumerator.isActive(new LeafMatch({ title: "Notepad" }, "partial"))).toBe(true);
      expect(enumerator.isActive(chromeExe)).toBe(false);
    });

    it("should treat a missing active window as an empty snapshot", () => {
      const enumerator = new WindowEnumerator(createFixtureSource());
      expect(enumerator.isActive(new LeafMatch({ handle: 101 }))).toBe(false);
      expect(enumerator.isActive(new LeafMatch())).toBe(true);
    });
  });
});
