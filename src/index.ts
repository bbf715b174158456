export * from "./hl7v2";
export * from "./siu-to-appointment";
export { firstNonEmpty, joinNonEmpty, type Candidate } from "./utils/string";
