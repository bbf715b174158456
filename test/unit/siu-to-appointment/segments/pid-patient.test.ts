import { describe, test, expect } from "vitest";
import { extractPatient } from "../../../../src/siu-to-appointment/segments/pid-patient";
import { siuMessage } from "../helpers";

describe("extractPatient", () => {
  test("maps PID identifiers, name, dob and gender", () => {
    const msg = siuMessage("SCH|1", "PID|1||P12345^^^HOSP^MR||Doe^John||19850210|M");

    expect(extractPatient(msg)).toEqual({
      id: "P12345",
      first_name: "John",
      last_name: "Doe",
      dob: "1985-02-10",
      gender: "M",
    });
  });

  test("uses the first PID-3 repetition", () => {
    const msg = siuMessage("PID|1||MRN1^^^HOSP^MR~SSN9^^^SSA^SS");

    expect(extractPatient(msg).id).toBe("MRN1");
  });

  test("falls back to PID-2 when PID-3 is empty", () => {
    expect(extractPatient(siuMessage("PID|1|EXT7^^^OLD")).id).toBe("EXT7");
  });

  test("falls back to raw PID-3 when its first component is empty", () => {
    expect(extractPatient(siuMessage("PID|1||^^^HOSP")).id).toBe("^^^HOSP");
  });

  test("keeps the dob date when its offset is out of range", () => {
    expect(extractPatient(siuMessage("PID|1||P1||Doe^John||19850210+2500|F")).dob).toBe("1985-02-10");
  });

  test("leaves dob empty when it does not parse", () => {
    expect(extractPatient(siuMessage("PID|1||P1||Doe^John||UNKNOWN|F")).dob).toBe("");
  });

  test("reads dob from a full timestamp", () => {
    expect(extractPatient(siuMessage("PID|1||P1||Doe^John||198502101230-0500|F")).dob).toBe("1985-02-10");
  });

  test("decodes escaped names", () => {
    expect(extractPatient(siuMessage("PID|1||P1||Smith\\S\\Jones^Ann")).last_name).toBe("Smith^Jones");
  });

  test("returns all-empty patient when PID is absent", () => {
    expect(extractPatient(siuMessage("SCH|1"))).toEqual({
      id: "",
      first_name: "",
      last_name: "",
      dob: "",
      gender: "",
    });
  });
});
