/**
 * PID (Patient Identification) extraction.
 *
 * Mapping:
 * - PID-3.1 / PID-2.1 / PID-3 -> id
 * - PID-5.1 -> last_name, PID-5.2 -> first_name (XPN family^given)
 * - PID-7 -> dob (date only)
 * - PID-8 -> gender (administrative sex code as sent)
 */

import type { HL7Message } from "../../hl7v2/message";
import { formatIsoDate, parseHL7Date } from "../../hl7v2/datetime";
import { firstNonEmpty } from "../../utils/string";
import type { PatientRecord } from "../types";

const PID = "PID";

export const EMPTY_PATIENT: Readonly<PatientRecord> = Object.freeze({
  id: "",
  first_name: "",
  last_name: "",
  dob: "",
  gender: "",
});

/**
 * Builds the patient sub-record. A message without PID yields all-empty values.
 */
export function extractPatient(message: HL7Message): PatientRecord {
  if (!message.hasSegment(PID)) {
    return { ...EMPTY_PATIENT };
  }

  const dob = parseHL7Date(message.getField(PID, 7));

  return {
    id: firstNonEmpty(
      () => message.getComponent(PID, 3, 1),
      () => message.getComponent(PID, 2, 1),
      () => message.getField(PID, 3),
    ),
    first_name: message.getComponent(PID, 5, 2),
    last_name: message.getComponent(PID, 5, 1),
    dob: dob ? formatIsoDate(dob) : "",
    gender: message.getField(PID, 8),
  };
}
