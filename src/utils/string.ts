/**
 * Shared string utility functions
 */

/** A lazily evaluated candidate value for a fallback chain */
export type Candidate = () => string;

/**
 * Evaluates candidates left to right and returns the first non-empty result.
 * Later candidates are not evaluated once one succeeds.
 * Returns "" when every candidate is empty.
 */
export function firstNonEmpty(...candidates: Candidate[]): string {
  for (const candidate of candidates) {
    const value = candidate();
    if (value) return value;
  }
  return "";
}

/**
 * Join the non-empty parts with a separator; parts are not trimmed
 * ["Dr", "", "Smith"] → "Dr Smith"
 */
export function joinNonEmpty(parts: readonly string[], separator = " "): string {
  return parts.filter((part) => part !== "").join(separator);
}
