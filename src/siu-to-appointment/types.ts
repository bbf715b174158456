/**
 * Normalized appointment record produced from SIU^S12.
 *
 * Field names are the JSON contract consumed by the CLI output. Every leaf is
 * a string; missing source data is "" rather than absent.
 */

export interface PatientRecord {
  id: string;
  first_name: string;
  last_name: string;
  /** YYYY-MM-DD or "" */
  dob: string;
  gender: string;
}

export interface ProviderRecord {
  id: string;
  name: string;
}

export interface AppointmentRecord {
  appointment_id: string;
  /** ISO-8601 UTC with Z suffix, or "" */
  appointment_datetime: string;
  patient: PatientRecord;
  provider: ProviderRecord;
  location: string;
  reason: string;
}

/** Field probe orders used by the SIU^S12 extractor */
export interface SiuS12ExtractOptions {
  /** PV1 fields probed for the attending provider, first non-empty wins */
  providerFields?: readonly number[];
  /** SCH fields probed for the appointment reason, in priority order */
  reasonFields?: readonly number[];
}

export const DEFAULT_PROVIDER_FIELDS: readonly number[] = [7, 6, 8, 9];
export const DEFAULT_REASON_FIELDS: readonly number[] = [7, 8, 6];
