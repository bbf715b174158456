/**
 * Line-ending normalization and batch splitting.
 *
 * HL7v2 segments are carriage-return separated, but files written on other
 * systems arrive with \r\n or \n. Everything downstream assumes \r.
 */

export const SEGMENT_DELIMITER = "\r";

const MESSAGE_HEADER = "MSH";

/**
 * Converts \r\n and \n to \r and strips a leading byte-order mark.
 */
export function normalizeNewlines(raw: string): string {
  return raw
    .replace(/\r\n/g, SEGMENT_DELIMITER)
    .replace(/\n/g, SEGMENT_DELIMITER)
    .replace(/^\uFEFF+/, "");
}

/** Non-blank segment lines of a normalized message or batch */
export function segmentLines(normalized: string): string[] {
  return normalized.split(SEGMENT_DELIMITER).filter((line) => line.trim() !== "");
}

/**
 * Splits a file that may hold several messages.
 * Every segment line starting with MSH opens a new message; lines before the
 * first MSH are dropped. Returns [] when there is no MSH at all.
 */
export function splitMessages(raw: string): string[] {
  const lines = segmentLines(normalizeNewlines(raw));

  const headerIndexes: number[] = [];
  lines.forEach((line, i) => {
    if (line.startsWith(MESSAGE_HEADER)) {
      headerIndexes.push(i);
    }
  });

  return headerIndexes.map((start, i) => {
    const end = headerIndexes[i + 1] ?? lines.length;
    return lines.slice(start, end).join(SEGMENT_DELIMITER) + SEGMENT_DELIMITER;
  });
}
