/**
 * Structured HL7v2 message and its addressing operations.
 *
 * Segments are stored by name; each name maps to its occurrences in message
 * order, and each occurrence is a list of raw field strings aligned to HL7
 * field numbering:
 *   - non-MSH: fields[0] = segment name, fields[1] = SEG-1, ...
 *   - MSH:     fields[0] = "MSH", fields[1] = MSH-1 (field separator),
 *              fields[2] = MSH-2 (encoding characters), ...
 *
 * Lookups never throw. A miss at any level yields the caller's default.
 */

import type { Separators } from "./separators";
import { unescapeHL7 } from "./escape";

export type SegmentFields = readonly string[];

export type SegmentMap = ReadonlyMap<string, readonly SegmentFields[]>;

export interface FieldLookupOptions {
  /** Which occurrence of a repeated segment (0-based) */
  occurrence?: number;
  defaultValue?: string;
}

export interface ComponentLookupOptions extends FieldLookupOptions {
  /** Which repetition of a repeating field (0-based) */
  repetition?: number;
}

function splitOn(value: string, separator: string): string[] {
  return separator ? value.split(separator) : [value];
}

/** 1-based HL7 position to list item, or undefined when out of range */
function pick(items: readonly string[], position: number): string | undefined {
  if (position <= 0 || position > items.length) return undefined;
  return items[position - 1];
}

export class HL7Message {
  constructor(
    public readonly separators: Separators,
    private readonly segments: SegmentMap,
  ) {}

  hasSegment(name: string): boolean {
    return this.segmentCount(name) > 0;
  }

  segmentCount(name: string): number {
    return this.segments.get(name)?.length ?? 0;
  }

  segmentNames(): string[] {
    return [...this.segments.keys()];
  }

  /**
   * Raw (still escaped) value of SEG-n.
   */
  getField(segment: string, fieldNum: number, options: FieldLookupOptions = {}): string {
    const { occurrence = 0, defaultValue = "" } = options;

    const occurrences = this.segments.get(segment);
    if (!occurrences || occurrence < 0 || occurrence >= occurrences.length) {
      return defaultValue;
    }

    const fields = occurrences[occurrence];
    if (!fields || fieldNum < 0 || fieldNum >= fields.length) {
      return defaultValue;
    }

    return fields[fieldNum] || defaultValue;
  }

  /** Raw repetitions of SEG-n; [] when the field is empty */
  getRepetitions(segment: string, fieldNum: number, options: FieldLookupOptions = {}): string[] {
    const raw = this.getField(segment, fieldNum, { occurrence: options.occurrence });
    if (!raw) return [];
    return splitOn(raw, this.separators.repetition);
  }

  /**
   * Decoded value of SEG-n.m (component m is 1-based).
   */
  getComponent(
    segment: string,
    fieldNum: number,
    componentNum: number,
    options: ComponentLookupOptions = {},
  ): string {
    const defaultValue = options.defaultValue ?? "";

    const component = this.rawComponent(segment, fieldNum, componentNum, options);
    if (component === undefined) return defaultValue;

    return unescapeHL7(component, this.separators) || defaultValue;
  }

  /**
   * Decoded value of SEG-n.m.s (component and subcomponent are 1-based).
   */
  getSubcomponent(
    segment: string,
    fieldNum: number,
    componentNum: number,
    subcomponentNum: number,
    options: ComponentLookupOptions = {},
  ): string {
    const defaultValue = options.defaultValue ?? "";

    const component = this.rawComponent(segment, fieldNum, componentNum, options);
    if (component === undefined) return defaultValue;

    const subcomponent = pick(splitOn(component, this.separators.subcomponent), subcomponentNum);
    if (subcomponent === undefined) return defaultValue;

    return unescapeHL7(subcomponent, this.separators) || defaultValue;
  }

  private rawComponent(
    segment: string,
    fieldNum: number,
    componentNum: number,
    options: ComponentLookupOptions,
  ): string | undefined {
    const { occurrence = 0, repetition = 0 } = options;

    const raw = this.getField(segment, fieldNum, { occurrence });
    if (!raw) return undefined;

    const repetitions = splitOn(raw, this.separators.repetition);
    if (repetition < 0 || repetition >= repetitions.length) return undefined;

    const value = repetitions[repetition] ?? "";
    return pick(splitOn(value, this.separators.component), componentNum);
  }
}
