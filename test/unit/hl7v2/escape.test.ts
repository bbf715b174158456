import { describe, test, expect } from "vitest";
import { unescapeHL7 } from "../../../src/hl7v2/escape";
import { createSeparators, DEFAULT_SEPARATORS } from "../../../src/hl7v2/separators";

describe("unescapeHL7", () => {
  test("returns strings without the escape character unchanged", () => {
    expect(unescapeHL7("General Consultation", DEFAULT_SEPARATORS)).toBe("General Consultation");
    expect(unescapeHL7("", DEFAULT_SEPARATORS)).toBe("");
  });

  test("decodes each separator escape", () => {
    expect(unescapeHL7("\\F\\", DEFAULT_SEPARATORS)).toBe("|");
    expect(unescapeHL7("\\S\\", DEFAULT_SEPARATORS)).toBe("^");
    expect(unescapeHL7("\\R\\", DEFAULT_SEPARATORS)).toBe("~");
    expect(unescapeHL7("\\E\\", DEFAULT_SEPARATORS)).toBe("\\");
    expect(unescapeHL7("\\T\\", DEFAULT_SEPARATORS)).toBe("&");
  });

  test("decodes adjacent and embedded escapes", () => {
    expect(unescapeHL7("\\F\\\\R\\\\E\\\\T\\", DEFAULT_SEPARATORS)).toBe("|~\\&");
    expect(unescapeHL7("Smith\\S\\Jones", DEFAULT_SEPARATORS)).toBe("Smith^Jones");
  });

  test("leaves other escape sequences in place", () => {
    expect(unescapeHL7("\\H\\bold\\N\\", DEFAULT_SEPARATORS)).toBe("\\H\\bold\\N\\");
    expect(unescapeHL7("line\\.br\\break", DEFAULT_SEPARATORS)).toBe("line\\.br\\break");
    expect(unescapeHL7("\\X0D\\", DEFAULT_SEPARATORS)).toBe("\\X0D\\");
  });

  test("leaves a lone escape character in place", () => {
    expect(unescapeHL7("C:\\temp", DEFAULT_SEPARATORS)).toBe("C:\\temp");
  });

  test("decodes to the message's own separators", () => {
    const separators = createSeparators("#", "!@$%");

    expect(unescapeHL7("A$S$B$F$C", separators)).toBe("A!B#C");
  });

  test("treats a regex metacharacter escape literally", () => {
    const separators = createSeparators("|", "^~.&");

    expect(unescapeHL7("A.S.B", separators)).toBe("A^B");
    expect(unescapeHL7("a.b.c", separators)).toBe("a.b.c");
  });

  test("is idempotent once no escapes remain", () => {
    const once = unescapeHL7("O\\T\\Brien \\S\\ Co", DEFAULT_SEPARATORS);

    expect(once).toBe("O&Brien ^ Co");
    expect(unescapeHL7(once, DEFAULT_SEPARATORS)).toBe(once);
  });
});
