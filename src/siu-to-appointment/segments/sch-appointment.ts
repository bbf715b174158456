/**
 * SCH (Scheduling Activity Information) extraction.
 *
 * Mapping:
 * - SCH-1.1 / SCH-2.1 / SCH-1 / SCH-2 -> appointment_id
 *   (Placer then Filler Appointment ID)
 * - SCH-11.4 / SCH-11.1 / SCH-11 -> appointment_datetime
 *   (TQ start date/time is component 4; some senders put it in component 1)
 * - SCH-7 / SCH-8 / SCH-6 (text before identifier) -> reason
 */

import type { HL7Message } from "../../hl7v2/message";
import { parseHL7DateTime, toIso8601Z } from "../../hl7v2/datetime";
import { firstNonEmpty, type Candidate } from "../../utils/string";
import { DEFAULT_REASON_FIELDS } from "../types";

const SCH = "SCH";

const TIMING_FIELD = 11;

/** TQ.4 Start Date/Time */
const TIMING_START_COMPONENT = 4;

export interface AppointmentData {
  appointment_id: string;
  appointment_datetime: string;
  reason: string;
}

export function extractAppointmentId(message: HL7Message): string {
  return firstNonEmpty(
    () => message.getComponent(SCH, 1, 1),
    () => message.getComponent(SCH, 2, 1),
    () => message.getField(SCH, 1),
    () => message.getField(SCH, 2),
  );
}

/**
 * Appointment start rendered as ISO-8601 UTC, or "" when missing or
 * unparseable.
 */
export function extractAppointmentDateTime(message: HL7Message): string {
  const raw = firstNonEmpty(
    () => message.getComponent(SCH, TIMING_FIELD, TIMING_START_COMPONENT),
    () => message.getComponent(SCH, TIMING_FIELD, 1),
    () => message.getField(SCH, TIMING_FIELD),
  );

  const parsed = parseHL7DateTime(raw);
  return parsed ? toIso8601Z(parsed) : "";
}

/**
 * Reason is a CWE in SCH-7 (Appointment Reason); older senders use SCH-8
 * (Appointment Type) or SCH-6 (Event Reason). Within each field the text
 * (component 2) is preferred over the code.
 */
export function extractReason(
  message: HL7Message,
  reasonFields: readonly number[] = DEFAULT_REASON_FIELDS,
): string {
  const candidates = reasonFields.flatMap((field): Candidate[] => [
    () => message.getComponent(SCH, field, 2),
    () => message.getComponent(SCH, field, 1),
    () => message.getField(SCH, field),
  ]);

  return firstNonEmpty(...candidates);
}

export function extractAppointment(
  message: HL7Message,
  reasonFields?: readonly number[],
): AppointmentData {
  return {
    appointment_id: extractAppointmentId(message),
    appointment_datetime: extractAppointmentDateTime(message),
    reason: extractReason(message, reasonFields),
  };
}
