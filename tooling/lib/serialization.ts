/**
 * JSON representation of predicate trees and window snapshots
 */

import {
  createSnapshot,
  isMatchDiscipline,
  LeafCriteria,
  LeafMatch,
  MatchDiscipline,
  MatchGroup,
  Predicate,
  STRING_FIELDS,
  StringField,
  WindowSnapshot,
} from "../../src";
import { SerializedGroup, SerializedLeaf, SerializedPredicate } from "./types";
import { isPlainObject } from "./utils";

export class PredicateParseError extends Error {
  readonly path: string;

  constructor(path: string, message: string) {
    super(`${path}: ${message}`);
    this.name = "PredicateParseError";
    this.path = path;
  }
}

export type ParseOptions = {
  /** Used for leaves that do not name a discipline */
  discipline?: MatchDiscipline;
};

export function serializePredicate(predicate: Predicate): SerializedPredicate {
  switch (predicate.kind) {
    case "leaf":
      return serializeLeaf(predicate);
    case "group":
      return serializeGroup(predicate);
  }
}

function serializeLeaf(leaf: LeafMatch): SerializedLeaf {
  const { handle, processId } = leaf.criteria;
  const criteria: LeafCriteria = {};
  if (handle !== undefined) criteria.handle = handle;
  for (const field of STRING_FIELDS) {
    const value = leaf.criteria[field];
    if (value !== undefined) criteria[field] = value;
  }
  if (processId !== undefined) criteria.processId = processId;
  return { kind: "leaf", discipline: leaf.discipline, reverse: leaf.reverse, criteria };
}

function serializeGroup(group: MatchGroup): SerializedGroup {
  return {
    kind: "group",
    combinator: group.combinator,
    reverse: group.reverse,
    whitelist: group.whitelist.map(serializePredicate),
    blacklist: group.blacklist.map(serializePredicate),
  };
}

/**
 * Validate an unknown JSON value into a predicate tree.
 * Throws PredicateParseError for invalid shapes and PatternError for malformed regex criteria.
 */
export function parsePredicate(input: unknown, options: ParseOptions = {}, path: string = "$"): Predicate {
  if (!isPlainObject(input)) {
    throw new PredicateParseError(path, "predicate must be an object");
  }

  const reverse = readBoolean(input, "reverse", path);

  switch (input.kind) {
    case "leaf": {
      const discipline = input.discipline ?? options.discipline ?? "regex";
      if (!isMatchDiscipline(discipline)) {
        throw new PredicateParseError(`${path}.discipline`, `unknown discipline ${JSON.stringify(discipline)}`);
      }
      return new LeafMatch(parseCriteria(input.criteria, `${path}.criteria`), discipline, reverse);
    }
    case "group": {
      const { combinator } = input;
      if (combinator !== "any" && combinator !== "all") {
        throw new PredicateParseError(`${path}.combinator`, `expected "any" or "all"`);
      }
      const whitelist = parseList(input.whitelist, options, `${path}.whitelist`);
      const blacklist = parseList(input.blacklist, options, `${path}.blacklist`);
      return new MatchGroup(combinator, whitelist, blacklist, reverse);
    }
    default:
      throw new PredicateParseError(`${path}.kind`, `expected "leaf" or "group"`);
  }
}

function parseList(input: unknown, options: ParseOptions, path: string): Predicate[] {
  if (input === undefined) {
    return [];
  }
  if (!Array.isArray(input)) {
    throw new PredicateParseError(path, "expected an array");
  }
  return input.map((item: unknown, index) => parsePredicate(item, options, `${path}[${index}]`));
}

function parseCriteria(input: unknown, path: string): LeafCriteria {
  if (input === undefined) {
    return {};
  }
  if (!isPlainObject(input)) {
    throw new PredicateParseError(path, "criteria must be an object");
  }

  const criteria: LeafCriteria = {};
  for (const field of STRING_FIELDS) {
    const value = input[field];
    if (value === undefined) continue;
    if (typeof value !== "string") {
      throw new PredicateParseError(`${path}.${field}`, "expected a string");
    }
    criteria[field] = value;
  }

  const handle = readOptionalInteger(input, "handle", path);
  if (handle !== undefined) criteria.handle = handle;
  const processId = readOptionalCount(input, "processId", path);
  if (processId !== undefined) criteria.processId = processId;

  return criteria;
}

/**
 * Validate one snapshot record. Missing strings default to "" and a missing process id to 0.
 */
export function parseSnapshot(input: unknown, path: string = "$"): WindowSnapshot {
  if (!isPlainObject(input)) {
    throw new PredicateParseError(path, "snapshot must be an object");
  }

  const fields: Partial<Record<StringField, string>> = {};
  for (const field of STRING_FIELDS) {
    const value = input[field];
    if (value === undefined) continue;
    if (typeof value !== "string") {
      throw new PredicateParseError(`${path}.${field}`, "expected a string");
    }
    fields[field] = value;
  }

  return createSnapshot({
    ...fields,
    handle: readOptionalInteger(input, "handle", path),
    processId: readOptionalCount(input, "processId", path),
  });
}

export function serializeSnapshot(snapshot: WindowSnapshot): Record<string, string | number> {
  const { handle, ...rest } = snapshot;
  return handle === undefined ? { ...rest } : { handle, ...rest };
}

function readBoolean(input: Record<string, unknown>, key: string, path: string): boolean {
  const value = input[key];
  if (value === undefined) return false;
  if (typeof value !== "boolean") {
    throw new PredicateParseError(`${path}.${key}`, "expected a boolean");
  }
  return value;
}

function readOptionalInteger(input: Record<string, unknown>, key: string, path: string): number | undefined {
  const value = input[key];
  if (value === undefined) return undefined;
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new PredicateParseError(`${path}.${key}`, "expected an integer");
  }
  return value;
}

function readOptionalCount(input: Record<string, unknown>, key: string, path: string): number | undefined {
  const value = readOptionalInteger(input, key, path);
  if (value !== undefined && value < 0) {
    throw new PredicateParseError(`${path}.${key}`, "expected a non-negative integer");
  }
  return value;
}
