import { describe, test, expect } from "vitest";
import { normalizeNewlines, splitMessages } from "../../../src/hl7v2/split";
import { VALID_SIU, WRONG_TYPE } from "../siu-to-appointment/helpers";

describe("normalizeNewlines", () => {
  test("converts CRLF and LF to CR", () => {
    expect(normalizeNewlines("MSH|a\r\nPID|1\nPV1|1")).toBe("MSH|a\rPID|1\rPV1|1");
  });

  test("leaves CR-delimited text unchanged", () => {
    expect(normalizeNewlines("MSH|a\rPID|1\r")).toBe("MSH|a\rPID|1\r");
  });

  test("strips a leading byte-order mark", () => {
    expect(normalizeNewlines("\uFEFFMSH|a\nPID|1")).toBe("MSH|a\rPID|1");
  });

  test("keeps a byte-order mark that is not at the start", () => {
    expect(normalizeNewlines("MSH|\uFEFF")).toBe("MSH|\uFEFF");
  });
});

describe("splitMessages", () => {
  test("splits two messages separated by a blank line", () => {
    const msgs = splitMessages(VALID_SIU + "\r" + WRONG_TYPE);

    expect(msgs).toHaveLength(2);
    expect(msgs[0]).toBe(VALID_SIU);
    expect(msgs[1]).toBe(WRONG_TYPE);
  });

  test("re-joins each run with CR and a trailing CR", () => {
    expect(splitMessages("MSH|a\nPID|1\n\nMSH|b\r\nPID|2")).toEqual([
      "MSH|a\rPID|1\r",
      "MSH|b\rPID|2\r",
    ]);
  });

  test("yields one message per MSH, each starting with MSH", () => {
    const blob = ["MSH|^~\\&|A||||||SIU^S12|1", "SCH|1", "MSH|#!@$|B", "SCH#2", "MSH|^~\\&|C||||||SIU^S12|3"].join("\n");

    const msgs = splitMessages(blob);

    expect(msgs).toHaveLength(3);
    for (const msg of msgs) {
      expect(msg.startsWith("MSH")).toBe(true);
      expect(msg.match(/(^|\r)MSH/g)).toHaveLength(1);
    }
  });

  test("drops lines before the first MSH", () => {
    expect(splitMessages("FHS|x\rBHS|y\rMSH|a\rPID|1")).toEqual(["MSH|a\rPID|1\r"]);
  });

  test("drops whitespace-only lines", () => {
    expect(splitMessages("MSH|a\r   \r\tPID|1\r\r")).toEqual(["MSH|a\r\tPID|1\r"]);
  });

  test("returns empty array when there is no MSH", () => {
    expect(splitMessages("PID|1\nPV1|1\n")).toEqual([]);
    expect(splitMessages("")).toEqual([]);
  });
});
