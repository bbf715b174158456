export { normalizeNewlines, splitMessages, SEGMENT_DELIMITER } from "./split";
export { parseMessage } from "./parser";
export { HL7Message, type FieldLookupOptions, type ComponentLookupOptions } from "./message";
export { unescapeHL7 } from "./escape";
export {
  createSeparators,
  DEFAULT_SEPARATORS,
  DEFAULT_ENCODING_CHARACTERS,
  type Separators,
} from "./separators";
export {
  parseHL7DateTime,
  parseHL7Date,
  toIso8601Z,
  formatIsoDate,
  type HL7DateTime,
  type HL7Date,
} from "./datetime";
export { HL7Error, HL7ParseError, UnsupportedMessageTypeError, MissingSegmentError } from "./errors";
