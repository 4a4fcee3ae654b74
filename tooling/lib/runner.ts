/**
 * Evaluate a predicate against a recorded windows file
 */

import { readFileSync } from "fs";
import { DiscoveryMode, Predicate, WindowEnumerator, WindowHandle, WindowSnapshot } from "../../src";
import { Logger } from "./logger";
import { parseSnapshot, PredicateParseError } from "./serialization";
import { SnapshotListSource } from "./snapshot-source";
import { MatchReport, WindowRecord } from "./types";
import { describeError, isPlainObject } from "./utils";

export type RunOptions = {
  predicate: Predicate;
  windowsPath: string;
  mode: DiscoveryMode;
};

/**
 * Parse a windows file: an array of snapshot records with optional `topLevel` (default true)
 * and `active` flags. The last record flagged active becomes the active window.
 */
export function parseWindowsFile(raw: unknown): { records: WindowRecord[]; activeHandle?: WindowHandle } {
  if (!Array.isArray(raw)) {
    throw new PredicateParseError("$", "windows file must contain an array");
  }

  const records: WindowRecord[] = [];
  let activeHandle: WindowHandle | undefined;

  raw.forEach((item: unknown, index) => {
    const path = `$[${index}]`;
    const snapshot = parseSnapshot(item, path);
    const topLevel = isPlainObject(item) && item.topLevel === false ? false : true;
    if (isPlainObject(item) && item.active === true) {
      if (snapshot.handle === undefined) {
        throw new PredicateParseError(`${path}.active`, "an active window needs a handle");
      }
      activeHandle = snapshot.handle;
    }
    records.push({ snapshot, topLevel });
  });

  return { records, activeHandle };
}

export function loadWindowSource(windowsPath: string): SnapshotListSource {
  const { records, activeHandle } = parseWindowsFile(JSON.parse(readFileSync(windowsPath, "utf8")));
  return new SnapshotListSource(records, activeHandle);
}

export function runMatch(options: RunOptions, logger: Logger): MatchReport {
  logger.setContext({ component: "runner", mode: options.mode });
  logger.startTimer("match");

  try {
    const source = loadWindowSource(options.windowsPath);
    const enumerator = new WindowEnumerator(source, { mode: options.mode, logger });

    const matched: WindowSnapshot[] = [];
    enumerator.forAll(options.predicate, (record) => {
      matched.push(record.snapshot);
    });

    const activeMatches = enumerator.isActive(options.predicate);
    logger.endTimer("match", "Matched windows", "info");
    logger.debug("Match summary", { matched: matched.length, activeMatches });
    return { matched, activeMatches };
  } catch (error) {
    logger.endTimer("match", `Match failed: ${describeError(error)}`, "error");
    throw error;
  } finally {
    logger.popContext(["component", "mode"]);
  }
}

/**
 * One line per window: handle, title and executable separated by tabs
 */
export function formatWindow(snapshot: WindowSnapshot): string {
  const handle = snapshot.handle === undefined ? "-" : String(snapshot.handle);
  return `${handle}\t${snapshot.title}\t${snapshot.executable}`;
}
