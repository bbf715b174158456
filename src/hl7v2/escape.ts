import type { Separators } from "./separators";

/**
 * Escape codes that stand for the message's own separators.
 * \F\ field, \S\ component, \R\ repetition, \E\ escape, \T\ subcomponent.
 */
const SEPARATOR_ESCAPES: Record<string, keyof Separators> = {
  F: "field",
  S: "component",
  R: "repetition",
  E: "escape",
  T: "subcomponent",
};

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Decodes the separator escapes \F\ \S\ \R\ \E\ \T\ using the live separators.
 *
 * Any other escape sequence (\H\, \Xdd\, \.br\ ...) is left in place with its
 * delimiters. Hex and multi-byte escapes are not decoded.
 */
export function unescapeHL7(value: string, separators: Separators): string {
  if (!value || !separators.escape || !value.includes(separators.escape)) {
    return value;
  }

  const esc = escapeRegExp(separators.escape);
  const pattern = new RegExp(`${esc}(.+?)${esc}`, "g");

  return value.replace(pattern, (match: string, code: string) => {
    const key = SEPARATOR_ESCAPES[code];
    return key ? separators[key] : match;
  });
}
