/**
 * String comparison disciplines for leaf criteria
 */

import { PatternError } from "./errors";

/**
 * - regex: the criterion is a case-insensitive regular expression tested against the field
 * - full: the field must equal the criterion
 * - partial: the field must contain the criterion
 */
export type MatchDiscipline = "regex" | "full" | "partial";

export const MATCH_DISCIPLINES: readonly MatchDiscipline[] = ["regex", "full", "partial"];

export const REGEX_FLAGS = "i";

export type StringMatcher = (value: string) => boolean;

export function isMatchDiscipline(value: unknown): value is MatchDiscipline {
  return MATCH_DISCIPLINES.some((discipline) => discipline === value);
}

/**
 * Compile one criterion into a matcher for the given discipline.
 * Throws PatternError when a regex criterion does not compile.
 */
export function compileStringMatcher(criterion: string, discipline: MatchDiscipline, field: string): StringMatcher {
  switch (discipline) {
    case "full":
      return (value) => value === criterion;
    case "partial":
      return (value) => value.includes(criterion);
    case "regex": {
      let regex: RegExp;
      try {
        regex = new RegExp(criterion, REGEX_FLAGS);
      } catch (error) {
        throw new PatternError(criterion, field, error instanceof Error ? error.message : String(error));
      }
      return (value) => regex.test(value);
    }
  }
}
