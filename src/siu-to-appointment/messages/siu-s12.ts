/**
 * HL7v2 SIU_S12 Message to Appointment Record Extractor
 *
 * SIU_S12 - Notification of New Appointment Booking
 *
 * Reads:
 * - SCH (required) -> appointment id, start, reason
 * - PID (optional) -> patient
 * - PV1 (optional) -> provider, location
 */

import type { HL7Message } from "../../hl7v2/message";
import { MissingSegmentError, UnsupportedMessageTypeError } from "../../hl7v2/errors";
import type { AppointmentRecord, SiuS12ExtractOptions } from "../types";
import { extractAppointment } from "../segments/sch-appointment";
import { extractPatient } from "../segments/pid-patient";
import { extractLocation, extractProvider } from "../segments/pv1-visit";

const MESSAGE_CODE = "SIU";
const TRIGGER_EVENT = "S12";

// ============================================================================
// Validation
// ============================================================================

/**
 * Checks MSH-9 is exactly SIU^S12 (case-sensitive).
 *
 * @throws UnsupportedMessageTypeError quoting the raw MSH-9 value
 */
export function validateSiuS12(message: HL7Message): void {
  const code = message.getComponent("MSH", 9, 1);
  const event = message.getComponent("MSH", 9, 2);

  if (code !== MESSAGE_CODE || event !== TRIGGER_EVENT) {
    const raw = message.getField("MSH", 9);
    throw new UnsupportedMessageTypeError(`Unsupported message type in MSH-9: '${raw}'`, raw);
  }
}

// ============================================================================
// Main Extractor Function
// ============================================================================

/**
 * Extract an appointment record from a parsed SIU^S12 message.
 *
 * The message type and SCH presence are checked before any field is read, so
 * a failing message never yields a partial record.
 *
 * @throws UnsupportedMessageTypeError if MSH-9 is not SIU^S12
 * @throws MissingSegmentError if SCH is absent
 */
export function parseSiuS12Appointment(
  message: HL7Message,
  options: SiuS12ExtractOptions = {},
): AppointmentRecord {
  validateSiuS12(message);

  if (!message.hasSegment("SCH")) {
    throw new MissingSegmentError("Missing SCH segment (required for appointment).", "SCH");
  }

  const appointment = extractAppointment(message, options.reasonFields);

  return {
    appointment_id: appointment.appointment_id,
    appointment_datetime: appointment.appointment_datetime,
    patient: extractPatient(message),
    provider: extractProvider(message, options.providerFields),
    location: extractLocation(message),
    reason: appointment.reason,
  };
}
