/**
 * winmatch: Main entry point
 * Exports the predicate engine, the enumeration driver and the collaborator contracts
 */

export {
  Predicate,
  Combinator,
  LeafCriteria,
  LeafFilter,
  StringField,
  STRING_FIELDS,
  LeafMatch,
  MatchGroup,
  anyOf,
  allOf,
  matchPredicate,
} from "./predicate";

export {
  MatchDiscipline,
  MATCH_DISCIPLINES,
  REGEX_FLAGS,
  StringMatcher,
  isMatchDiscipline,
  compileStringMatcher,
} from "./discipline";

export {
  WindowHandle,
  WindowSnapshot,
  DiscoveryMode,
  DISCOVERY_MODES,
  ActiveWindowSource,
  WindowSource,
  EMPTY_SNAPSHOT,
  createSnapshot,
  isDiscoveryMode,
} from "./snapshot";

export {
  WindowEnumerator,
  EnumeratorOptions,
  WindowObserver,
  WindowGate,
  AsyncWindowGate,
} from "./enumerate";

export { PatternError, ArgumentError } from "./errors";
