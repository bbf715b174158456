/**
 * HL7v2 separator set.
 *
 * Every message declares its own separators in MSH-1 (field) and MSH-2
 * (component, repetition, escape, subcomponent). The set is derived once per
 * message and carried alongside it.
 */

export interface Separators {
  readonly field: string;
  readonly component: string;
  readonly repetition: string;
  readonly escape: string;
  readonly subcomponent: string;
}

/** Encoding characters assumed when MSH-2 is absent or short: ^~\& */
export const DEFAULT_ENCODING_CHARACTERS = "^~\\&";

export const DEFAULT_FIELD_SEPARATOR = "|";

/**
 * Builds the separator set from MSH-1 and the raw MSH-2 string.
 * Each encoding character falls back to its default independently.
 */
export function createSeparators(field: string, encodingCharacters: string): Separators {
  const enc = encodingCharacters || DEFAULT_ENCODING_CHARACTERS;

  return Object.freeze({
    field,
    component: enc.charAt(0) || DEFAULT_ENCODING_CHARACTERS.charAt(0),
    repetition: enc.charAt(1) || DEFAULT_ENCODING_CHARACTERS.charAt(1),
    escape: enc.charAt(2) || DEFAULT_ENCODING_CHARACTERS.charAt(2),
    subcomponent: enc.charAt(3) || DEFAULT_ENCODING_CHARACTERS.charAt(3),
  });
}

export const DEFAULT_SEPARATORS: Separators = createSeparators(
  DEFAULT_FIELD_SEPARATOR,
  DEFAULT_ENCODING_CHARACTERS,
);
