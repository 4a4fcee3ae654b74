/**
 * Shared type definitions for the winmatch tooling
 */

import { Combinator, DiscoveryMode, LeafCriteria, MatchDiscipline, WindowSnapshot } from "../../src";
import { LogLevel } from "./logger";

export type Config = {
  envSearchPaths?: string[];
  logLevel?: LogLevel;
  discoveryMode?: DiscoveryMode;
  discipline?: MatchDiscipline;
  presetsPath?: string;
};

export type SerializedLeaf = {
  kind: "leaf";
  discipline: MatchDiscipline;
  reverse: boolean;
  criteria: LeafCriteria;
};

export type SerializedGroup = {
  kind: "group";
  combinator: Combinator;
  reverse: boolean;
  whitelist: SerializedPredicate[];
  blacklist: SerializedPredicate[];
};

export type SerializedPredicate = SerializedLeaf | SerializedGroup;

export type PresetEntry = {
  name: string;
  description: string;
  predicate: SerializedPredicate;
};

/**
 * One window in a windows file
 */
export type WindowRecord = {
  snapshot: WindowSnapshot;
  topLevel: boolean;
};

export type MatchReport = {
  matched: WindowSnapshot[];
  activeMatches: boolean;
};
