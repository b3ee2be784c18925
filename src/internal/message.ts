import { Array as Arr, Inspectable, Predicate } from "effect"
import { enumerate } from "./enumerate.js"

/**
 * Debug rendering of a rule identifier, used when the caller does not name
 * rules. Primitives print as themselves (`ident`, `4`); structured rules print
 * as their JSON form.
 */
export const defaultRuleName = (rule: unknown): string =>
  Predicate.isRecordOrArray(rule) ? stringify(rule) : String(rule)

const stringify = (rule: object): string => {
  try {
    return JSON.stringify(Inspectable.toJSON(rule)) ?? String(rule)
  } catch {
    // cyclic
    return String(rule)
  }
}

export const composeMessage = <R>(
  positives: ReadonlyArray<R>,
  negatives: ReadonlyArray<R>,
  render: (rule: R) => string,
): string => {
  if (Arr.isNonEmptyReadonlyArray(negatives)) {
    return Arr.isNonEmptyReadonlyArray(positives)
      ? `unexpected ${enumerate(negatives, render)}; expected ${enumerate(positives, render)}`
      : `unexpected ${enumerate(negatives, render)}`
  }
  return Arr.isNonEmptyReadonlyArray(positives) ? `expected ${enumerate(positives, render)}` : "unknown parsing error"
}
