export { parseSiuS12Appointment, validateSiuS12 } from "./messages/siu-s12";
export {
  siuToAppointmentConfig,
  validateSiuToAppointmentConfig,
  extractOptionsFor,
  clearConfigCache,
  type SiuToAppointmentConfig,
  type MessageTypeConfig,
} from "./config";
export {
  DEFAULT_PROVIDER_FIELDS,
  DEFAULT_REASON_FIELDS,
  type AppointmentRecord,
  type PatientRecord,
  type ProviderRecord,
  type SiuS12ExtractOptions,
} from "./types";
