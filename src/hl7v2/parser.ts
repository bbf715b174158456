/**
 * HL7v2 wire-format parser.
 *
 * Reads the separators declared in MSH and tokenizes every segment line into
 * its fields. Components, repetitions and escapes stay encoded until a lookup
 * on HL7Message asks for them.
 */

import { HL7ParseError } from "./errors";
import { HL7Message, type SegmentFields } from "./message";
import { createSeparators } from "./separators";
import { normalizeNewlines, segmentLines } from "./split";

const MESSAGE_HEADER = "MSH";

/** MSH| - the field separator is always the 4th character */
const FIELD_SEPARATOR_POSITION = 3;

const SEGMENT_NAME_LENGTH = 3;

/**
 * Parses one message (as produced by splitMessages) into an HL7Message.
 *
 * @throws HL7ParseError if the text is empty, does not start with MSH, or the
 *   MSH line is too short to declare a field separator
 */
export function parseMessage(message: string): HL7Message {
  const lines = segmentLines(normalizeNewlines(message));

  const header = lines[0];
  if (header === undefined || !header.startsWith(MESSAGE_HEADER)) {
    throw new HL7ParseError("Message does not start with MSH segment.");
  }

  if (header.length <= FIELD_SEPARATOR_POSITION) {
    throw new HL7ParseError("MSH segment too short to contain field separator.");
  }

  const fieldSeparator = header.charAt(FIELD_SEPARATOR_POSITION);
  const encodingCharacters = header.split(fieldSeparator)[1] ?? "";
  const separators = createSeparators(fieldSeparator, encodingCharacters);

  const segments = new Map<string, SegmentFields[]>();

  for (const line of lines) {
    if (line.length < SEGMENT_NAME_LENGTH) continue;

    const name = line.slice(0, SEGMENT_NAME_LENGTH);
    const parts = line.split(fieldSeparator);

    // MSH-1 is the separator itself, so it never shows up in the split
    const fields = name === MESSAGE_HEADER ? [MESSAGE_HEADER, fieldSeparator, ...parts.slice(1)] : parts;

    const occurrences = segments.get(name);
    if (occurrences) {
      occurrences.push(fields);
    } else {
      segments.set(name, [fields]);
    }
  }

  return new HL7Message(separators, segments);
}
