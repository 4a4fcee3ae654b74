/**
 * In-process window source over a fixed list of snapshots
 * Stands in for the OS when evaluating predicates against recorded windows
 */

import { DiscoveryMode, EMPTY_SNAPSHOT, Predicate, WindowHandle, WindowSnapshot, WindowSource } from "../../src";
import { WindowRecord } from "./types";

export class SnapshotListSource implements WindowSource<WindowRecord> {
  private records: WindowRecord[];
  private activeHandle?: WindowHandle;

  constructor(records: Iterable<WindowRecord> = [], activeHandle?: WindowHandle) {
    this.records = [...records];
    this.activeHandle = activeHandle;
  }

  add(snapshot: WindowSnapshot, topLevel: boolean = true): WindowRecord {
    const record: WindowRecord = { snapshot, topLevel };
    this.records.push(record);
    return record;
  }

  setActive(handle: WindowHandle | undefined): void {
    this.activeHandle = handle;
  }

  all(): WindowRecord[] {
    return [...this.records];
  }

  snapshot(window: WindowRecord): WindowSnapshot {
    return window.snapshot;
  }

  discover(predicate: Predicate, mode: DiscoveryMode): WindowRecord[] {
    return this.records.filter((record) => (mode === "all" || record.topLevel) && predicate.match(record.snapshot));
  }

  /**
   * Snapshot of the active window, or an empty snapshot when no window is active
   */
  activeWindowSnapshot(): WindowSnapshot {
    if (this.activeHandle === undefined) {
      return EMPTY_SNAPSHOT;
    }
    const active = this.records.find((record) => record.snapshot.handle === this.activeHandle);
    return active ? active.snapshot : EMPTY_SNAPSHOT;
  }
}
