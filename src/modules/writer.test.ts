import { describe, it, expect } from "vitest";
import { LosslessNumber } from "lossless-json";
import { formatCell, toCsvText, toJsonText } from "./writer";

const csv = { delimiter: ",", recordDelimiter: "unix" } as const;

describe("formatCell", () => {
  it("renders scalars as text", () => {
    expect(formatCell("Ada")).toBe("Ada");
    expect(formatCell(1.5)).toBe("1.5");
    expect(formatCell(false)).toBe("false");
  });

  it("renders missing and null values as empty cells", () => {
    expect(formatCell(undefined)).toBe("");
    expect(formatCell(null)).toBe("");
  });

  it("renders nested values as compact JSON", () => {
    expect(formatCell({ a: [1, 2] })).toBe('{"a":[1,2]}');
  });

  it("keeps the digits of large integers", () => {
    const big = new LosslessNumber("12345678901234567890");
    expect(formatCell(big)).toBe("12345678901234567890");
    expect(formatCell({ id: big })).toBe('{"id":12345678901234567890}');
  });
});

describe("toCsvText", () => {
  it("writes a header and one row per record in column order", () => {
    const text = toCsvText(
      [
        { name: "Ada", age: 36 },
        { name: "Linus", city: "Helsinki" },
      ],
      ["age", "city", "name"],
      csv,
    );

    expect(text).toBe("age,city,name\n36,,Ada\n,Helsinki,Linus\n");
  });

  it("leaves cells empty for missing keys named like Object members", () => {
    const text = toCsvText(
      [{ a: "1" }, { a: "2", constructor: "x", toString: "y" }],
      ["a", "constructor", "toString"],
      csv,
    );

    expect(text).toBe("a,constructor,toString\n1,,\n2,x,y\n");
  });

  it("quotes cells holding delimiters, quotes or line breaks", () => {
    const text = toCsvText(
      [{ a: "hello, world", b: 'say "hi"', c: "one\ntwo" }],
      ["a", "b", "c"],
      csv,
    );

    expect(text).toBe('a,b,c\n"hello, world","say ""hi""","one\ntwo"\n');
  });

  it("honours the configured delimiters", () => {
    const text = toCsvText([{ a: "1", b: "2" }], ["a", "b"], {
      delimiter: ";",
      recordDelimiter: "windows",
    });

    expect(text).toBe("a;b\r\n1;2\r\n");
  });
});

describe("toJsonText", () => {
  it("writes an indented array with a trailing newline", () => {
    expect(toJsonText([{ a: "1" }], 2)).toBe('[\n  {\n    "a": "1"\n  }\n]\n');
  });

  it("writes an empty array for no records", () => {
    expect(toJsonText([], 2)).toBe("[]\n");
  });
});
