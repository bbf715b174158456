import { parseMessage } from "../../../src/hl7v2/parser";
import type { HL7Message } from "../../../src/hl7v2/message";

export const MSH_SIU = "MSH|^~\\&|SEND|FAC|RECV|FAC|20250101120000+0600||SIU^S12|MSG0001|P|2.3";

export const VALID_SIU = [
  MSH_SIU,
  "SCH|123456|FILL123||||||^General Consultation|||^^^20250502130000+0600",
  "PID|1||P12345^^^HOSP^MR||Doe^John||19850210|M",
  "PV1|1|O|ClinicA^203^^MainFacility|||D67890^Smith^Jane^^^Dr",
].join("\r") + "\r";

export const WRONG_TYPE = "MSH|^~\\&|SEND|FAC|RECV|FAC|20250101120000+0600||ADT^A01|MSG0002|P|2.3\r";

export const MISSING_SCH = [
  "MSH|^~\\&|SEND|FAC|RECV|FAC|20250101120000+0600||SIU^S12|MSG0003|P|2.3",
  "PID|1||P12345^^^HOSP^MR||Doe^John||19850210|M",
].join("\r") + "\r";

/**
 * Builds a segment line from sparse field numbers.
 * segment("SCH", { 1: "A1", 3: "x" }) → "SCH|A1||x"
 */
export function segment(name: string, fields: Record<number, string>): string {
  const max = Math.max(0, ...Object.keys(fields).map(Number));
  const parts = [name];
  for (let i = 1; i <= max; i++) {
    parts.push(fields[i] ?? "");
  }
  return parts.join("|");
}

/** Parses an SIU^S12 message made of MSH plus the given segment lines */
export function siuMessage(...segments: string[]): HL7Message {
  return parseMessage([MSH_SIU, ...segments].join("\r"));
}
