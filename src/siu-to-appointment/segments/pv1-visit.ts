/**
 * PV1 (Patient Visit) extraction: provider and location.
 *
 * Provider is an XCN: id^family^given^middle^suffix^prefix.
 * PV1-7 (Attending) is the usual source, but real feeds put the provider in
 * PV1-6, PV1-8 or PV1-9 when PV1-7 is empty; the first non-empty field wins.
 *
 * Location is PV1-3, a PL: pointOfCare^room^bed^facility.
 */

import type { HL7Message } from "../../hl7v2/message";
import { joinNonEmpty } from "../../utils/string";
import { DEFAULT_PROVIDER_FIELDS, type ProviderRecord } from "../types";

const PV1 = "PV1";

const LOCATION_FIELD = 3;

/** XCN component positions */
const XCN = {
  ID: 1,
  FAMILY: 2,
  GIVEN: 3,
  PREFIX: 6,
} as const;

/** PL component positions */
const PL = {
  POINT_OF_CARE: 1,
  ROOM: 2,
  BED: 3,
  FACILITY: 4,
} as const;

/**
 * First field in probe order that carries any value, or undefined.
 */
export function findProviderField(
  message: HL7Message,
  providerFields: readonly number[] = DEFAULT_PROVIDER_FIELDS,
): number | undefined {
  return providerFields.find((field) => message.getField(PV1, field) !== "");
}

/**
 * Provider id and display name ("Dr Jane Smith"). Empty when there is no PV1
 * or no probed field has a value.
 */
export function extractProvider(
  message: HL7Message,
  providerFields?: readonly number[],
): ProviderRecord {
  if (!message.hasSegment(PV1)) {
    return { id: "", name: "" };
  }

  const field = findProviderField(message, providerFields);
  if (field === undefined) {
    return { id: "", name: "" };
  }

  const prefix = message.getComponent(PV1, field, XCN.PREFIX);
  const given = message.getComponent(PV1, field, XCN.GIVEN);
  const family = message.getComponent(PV1, field, XCN.FAMILY);

  return {
    id: message.getComponent(PV1, field, XCN.ID),
    name: joinNonEmpty([prefix, given, family]),
  };
}

/**
 * Free-text location, facility first: "MainFacility ClinicA 203".
 */
export function extractLocation(message: HL7Message): string {
  if (!message.hasSegment(PV1)) {
    return "";
  }

  return joinNonEmpty([
    message.getComponent(PV1, LOCATION_FIELD, PL.FACILITY),
    message.getComponent(PV1, LOCATION_FIELD, PL.POINT_OF_CARE),
    message.getComponent(PV1, LOCATION_FIELD, PL.ROOM),
    message.getComponent(PV1, LOCATION_FIELD, PL.BED),
  ]);
}
