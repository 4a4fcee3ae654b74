/**
 * Window match predicates
 *
 * A predicate tree is built from two node kinds:
 * - LeafMatch: field criteria checked against one snapshot, all of which must hold
 * - MatchGroup: whitelist/blacklist of child predicates combined with "any" (OR) or "all" (AND)
 *
 * Evaluation is pure. Mutators (add, remove, toggling reverse) are not synchronized,
 * so a tree must only be mutated by one owner at a time.
 */

import { compileStringMatcher, MatchDiscipline, StringMatcher } from "./discipline";
import { ArgumentError } from "./errors";
import { ActiveWindowSource, WindowHandle, WindowSnapshot } from "./snapshot";

export type Predicate = LeafMatch | MatchGroup;

export type Combinator = "any" | "all";

export type LeafCriteria = {
  handle?: WindowHandle;
  title?: string;
  className?: string;
  executable?: string;
  executablePath?: string;
  processId?: number;
};

export type StringField = "title" | "className" | "executable" | "executablePath";

export const STRING_FIELDS: readonly StringField[] = ["className", "executable", "executablePath", "title"];

/**
 * Decides whether a leaf should be removed
 */
export type LeafFilter = (leaf: LeafMatch) => boolean;

export class LeafMatch {
  readonly kind = "leaf" as const;
  readonly criteria: Readonly<LeafCriteria>;
  readonly discipline: MatchDiscipline;
  reverse: boolean;

  private readonly matchers: Partial<Record<StringField, StringMatcher>> = {};

  /**
   * Regex criteria are compiled here, so a malformed pattern throws PatternError
   * before the leaf can be used.
   */
  constructor(criteria: LeafCriteria = {}, discipline: MatchDiscipline = "regex", reverse: boolean = false) {
    const { processId } = criteria;
    if (processId !== undefined && (!Number.isInteger(processId) || processId < 0)) {
      throw new ArgumentError(`processId must be a non-negative integer, got ${processId}`);
    }

    this.criteria = Object.freeze({ ...criteria });
    this.discipline = discipline;
    this.reverse = reverse;

    for (const field of STRING_FIELDS) {
      const criterion = criteria[field];
      if (criterion !== undefined) {
        this.matchers[field] = compileStringMatcher(criterion, discipline, field);
      }
    }
  }

  /**
   * True when no criterion is configured, in which case the leaf matches every window
   */
  get isEmpty(): boolean {
    return Object.values(this.criteria).every((value) => value === undefined);
  }

  match(snapshot: WindowSnapshot): boolean {
    return matchPredicate(this, snapshot);
  }

  /**
   * Leaf matching exactly one window, by handle
   */
  static forWindow(snapshot: WindowSnapshot): LeafMatch {
    if (snapshot.handle === undefined) {
      throw new ArgumentError("forWindow requires a snapshot with a handle");
    }
    return new LeafMatch({ handle: snapshot.handle });
  }

  /**
   * Check the criteria alone, ignoring reverse
   */
  matchCriteria(snapshot: WindowSnapshot): boolean {
    const { handle, processId } = this.criteria;
    if (handle !== undefined && snapshot.handle !== handle) return false;
    if (processId !== undefined && snapshot.processId !== processId) return false;

    return STRING_FIELDS.every((field) => this.fieldMatches(field, snapshot[field]));
  }

  // Single-field checks. An unset criterion holds; reverse is applied.

  matchHandle(handle: WindowHandle | undefined): boolean {
    const expected = this.criteria.handle;
    return this.reverse !== (expected === undefined || expected === handle);
  }

  matchTitle(title: string): boolean {
    return this.reverse !== this.fieldMatches("title", title);
  }

  matchClassName(className: string): boolean {
    return this.reverse !== this.fieldMatches("className", className);
  }

  matchExecutable(executable: string): boolean {
    return this.reverse !== this.fieldMatches("executable", executable);
  }

  matchExecutablePath(executablePath: string): boolean {
    return this.reverse !== this.fieldMatches("executablePath", executablePath);
  }

  matchProcessId(processId: number): boolean {
    const expected = this.criteria.processId;
    return this.reverse !== (expected === undefined || expected === processId);
  }

  private fieldMatches(field: StringField, value: string): boolean {
    const matcher = this.matchers[field];
    return matcher === undefined || matcher(value);
  }

  isActive(source: ActiveWindowSource): boolean {
    return this.match(source.activeWindowSnapshot());
  }

  asList(): LeafMatch[] {
    return [this];
  }

  copy(): LeafMatch {
    return new LeafMatch(this.criteria, this.discipline, this.reverse);
  }

  asReverse(): LeafMatch {
    return new LeafMatch(this.criteria, this.discipline, !this.reverse);
  }

  or(other: Predicate): MatchGroup {
    return new MatchGroup("any", [this, other]);
  }

  and(other: Predicate): MatchGroup {
    return new MatchGroup("all", [this, other]);
  }
}

export class MatchGroup {
  readonly kind = "group" as const;
  readonly combinator: Combinator;
  readonly whitelist: Predicate[];
  readonly blacklist: Predicate[];
  reverse: boolean;

  constructor(
    combinator: Combinator,
    whitelist: Iterable<Predicate> = [],
    blacklist: Iterable<Predicate> = [],
    reverse: boolean = false
  ) {
    this.combinator = combinator;
    this.whitelist = [...whitelist];
    this.blacklist = [...blacklist];
    this.reverse = reverse;
  }

  /**
   * Number of whitelist entries
   */
  get size(): number {
    return this.whitelist.length;
  }

  match(snapshot: WindowSnapshot): boolean {
    return matchPredicate(this, snapshot);
  }

  isActive(source: ActiveWindowSource): boolean {
    return this.match(source.activeWindowSnapshot());
  }

  add(...predicates: Predicate[]): this {
    this.whitelist.push(...predicates);
    return this;
  }

  addBlacklist(...predicates: Predicate[]): this {
    this.blacklist.push(...predicates);
    return this;
  }

  /**
   * Whitelist specific windows by handle
   */
  addWindows(...snapshots: WindowSnapshot[]): this {
    return this.add(...snapshots.map((snapshot) => LeafMatch.forWindow(snapshot)));
  }

  addBlacklistWindows(...snapshots: WindowSnapshot[]): this {
    return this.addBlacklist(...snapshots.map((snapshot) => LeafMatch.forWindow(snapshot)));
  }

  /**
   * Remove every whitelisted leaf the filter accepts, at any depth.
   * Nested groups left with an empty whitelist are removed too.
   * @returns true if anything was removed
   */
  remove(filter: LeafFilter): boolean {
    return removeFromList(this.whitelist, filter);
  }

  /**
   * Same as remove, applied to the blacklist
   */
  removeBlacklist(filter: LeafFilter): boolean {
    return removeFromList(this.blacklist, filter);
  }

  /**
   * Whitelisted leaves in depth-first order. Blacklists are never included.
   */
  asList(): LeafMatch[] {
    return this.whitelist.flatMap((child) => child.asList());
  }

  /**
   * New group with its own whitelist and blacklist arrays. Children are shared.
   */
  copy(): MatchGroup {
    return new MatchGroup(this.combinator, this.whitelist, this.blacklist, this.reverse);
  }

  asReverse(): MatchGroup {
    return new MatchGroup(this.combinator, this.whitelist, this.blacklist, !this.reverse);
  }

  or(other: Predicate): MatchGroup {
    return new MatchGroup("any", [this, other]);
  }

  and(other: Predicate): MatchGroup {
    return new MatchGroup("all", [this, other]);
  }
}

/**
 * Group matching any of the given predicates
 */
export function anyOf(...predicates: Predicate[]): MatchGroup {
  return new MatchGroup("any", predicates);
}

/**
 * Group matching only when all of the given predicates match. Matches nothing when empty.
 */
export function allOf(...predicates: Predicate[]): MatchGroup {
  return new MatchGroup("all", predicates);
}

export function matchPredicate(predicate: Predicate, snapshot: WindowSnapshot): boolean {
  switch (predicate.kind) {
    case "leaf":
      return predicate.reverse !== predicate.matchCriteria(snapshot);
    case "group": {
      const vetoed = predicate.blacklist.some((child) => matchPredicate(child, snapshot));
      const result = vetoed ? false : aggregateWhitelist(predicate.combinator, predicate.whitelist, snapshot);
      return predicate.reverse !== result;
    }
    default: {
      const unreachable: never = predicate;
      throw new Error(`Unknown predicate kind: ${JSON.stringify(unreachable)}`);
    }
  }
}

function aggregateWhitelist(combinator: Combinator, whitelist: Predicate[], snapshot: WindowSnapshot): boolean {
  switch (combinator) {
    case "any":
      return whitelist.some((child) => matchPredicate(child, snapshot));
    case "all":
      // an empty AND-group never matches
      if (whitelist.length === 0) {
        return false;
      }
      return whitelist.every((child) => matchPredicate(child, snapshot));
  }
}

function removeFromList(list: Predicate[], filter: LeafFilter): boolean {
  if (typeof filter !== "function") {
    throw new ArgumentError("remove requires a filter function");
  }

  let changed = false;
  const kept: Predicate[] = [];

  for (const child of list) {
    switch (child.kind) {
      case "leaf":
        if (filter(child)) {
          changed = true;
          continue;
        }
        break;
      case "group": {
        const sizeBefore = child.size;
        if (child.remove(filter)) {
          changed = true;
        }
        // only groups emptied by this removal are pruned
        if (sizeBefore > 0 && child.size === 0) {
          continue;
        }
        break;
      }
    }
    kept.push(child);
  }

  if (changed) {
    list.splice(0, list.length, ...kept);
  }
  return changed;
}
