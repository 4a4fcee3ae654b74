/**
 * Enumeration driver: discover matching windows and visit them in order
 */

import type { Logger } from "../tooling/lib/logger";
import { Predicate } from "./predicate";
import { DiscoveryMode, WindowSource } from "./snapshot";

export type WindowObserver<W> = (window: W) => void;

/**
 * Return false to stop the enumeration
 */
export type WindowGate<W> = (window: W) => boolean;

export type AsyncWindowGate<W> = (window: W) => Promise<boolean>;

export type EnumeratorOptions = {
  mode?: DiscoveryMode;
  logger?: Logger;
};

/**
 * Drives a WindowSource. Every forAll variant discovers once, then visits the
 * discovered windows one at a time in the order the source returned them.
 */
export class WindowEnumerator<W> {
  private readonly source: WindowSource<W>;
  private readonly mode: DiscoveryMode;
  private readonly logger?: Logger;

  constructor(source: WindowSource<W>, options: EnumeratorOptions = {}) {
    this.source = source;
    this.mode = options.mode ?? "topLevel";
    this.logger = options.logger;
  }

  get defaultMode(): DiscoveryMode {
    return this.mode;
  }

  matches(predicate: Predicate, window: W): boolean {
    return predicate.match(this.source.snapshot(window));
  }

  isActive(predicate: Predicate): boolean {
    return predicate.isActive(this.source);
  }

  /**
   * Matching windows in discovery order. Errors from the source are logged and rethrown.
   */
  discover(predicate: Predicate, mode: DiscoveryMode = this.mode): W[] {
    let windows: readonly W[];
    try {
      windows = this.source.discover(predicate, mode);
    } catch (error) {
      this.logger?.error("Window discovery failed", { mode, error: String(error) });
      throw error;
    }
    this.logger?.debug("Discovered windows", { mode, count: windows.length });
    return [...windows];
  }

  forAll(predicate: Predicate, action: WindowObserver<W>, mode: DiscoveryMode = this.mode): void {
    for (const window of this.discover(predicate, mode)) {
      action(window);
    }
  }

  /**
   * @returns true if every discovered window was visited
   */
  forAllWhile(predicate: Predicate, action: WindowGate<W>, mode: DiscoveryMode = this.mode): boolean {
    const windows = this.discover(predicate, mode);
    for (const [index, window] of windows.entries()) {
      if (!action(window)) {
        this.logger?.debug("Enumeration stopped by callback", { visited: index + 1, total: windows.length });
        return false;
      }
    }
    return true;
  }

  /**
   * Like forAllWhile, awaiting each callback before visiting the next window.
   * A rejected callback rejects the whole enumeration.
   */
  async forAllAsync(predicate: Predicate, action: AsyncWindowGate<W>, mode: DiscoveryMode = this.mode): Promise<boolean> {
    const windows = this.discover(predicate, mode);
    for (const [index, window] of windows.entries()) {
      if (!(await action(window))) {
        this.logger?.debug("Enumeration stopped by callback", { visited: index + 1, total: windows.length });
        return false;
      }
    }
    return true;
  }
}
