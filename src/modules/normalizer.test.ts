import { describe, it, expect } from "vitest";
import { normalizeJsonDocument, normalizeCsvRows, isRecord } from "./normalizer";
import { LosslessNumber } from "lossless-json";
import { FormatError } from "../utils";

describe("normalizeJsonDocument", () => {
  it("wraps a single object in a list", () => {
    expect(normalizeJsonDocument({ name: "Ada", age: 36 })).toEqual([
      { name: "Ada", age: 36 },
    ]);
  });

  it("passes a list of objects through", () => {
    const records = [{ a: "1" }, { b: null }];
    expect(normalizeJsonDocument(records)).toEqual(records);
  });

  it("accepts an empty list", () => {
    expect(normalizeJsonDocument([])).toEqual([]);
  });

  it("rejects roots that are neither object nor list", () => {
    for (const root of ["text", 42, null, true]) {
      expect(() => normalizeJsonDocument(root)).toThrow(
        new FormatError("JSON must be a list of objects or a single object"),
      );
    }
  });

  it("rejects list items that are not objects", () => {
    expect(() => normalizeJsonDocument([{ a: 1 }, 7])).toThrow(
      "JSON must be a list of objects: item 1 is a number",
    );
    expect(() =>
      normalizeJsonDocument([new LosslessNumber("12345678901234567890")]),
    ).toThrow("JSON must be a list of objects: item 0 is a number");
    expect(() => normalizeJsonDocument([[1, 2]])).toThrow(
      "JSON must be a list of objects: item 0 is an array",
    );
  });
});

describe("normalizeCsvRows", () => {
  it("maps each row to header -> cell", () => {
    const { records, droppedCells } = normalizeCsvRows([
      ["name", "age"],
      ["Ada", "36"],
      ["Linus", "28"],
    ]);

    expect(records).toEqual([
      { name: "Ada", age: "36" },
      { name: "Linus", age: "28" },
    ]);
    expect(droppedCells).toBe(0);
  });

  it("pads short rows and counts extra cells", () => {
    const { records, droppedCells } = normalizeCsvRows([
      ["name", "age"],
      ["Ada", "36", "extra", "more"],
      ["Bob"],
    ]);

    expect(records).toEqual([
      { name: "Ada", age: "36" },
      { name: "Bob", age: "" },
    ]);
    expect(droppedCells).toBe(2);
  });

  it("keeps a __proto__ header as an ordinary field", () => {
    const { records } = normalizeCsvRows([
      ["__proto__", "name"],
      ["x", "Ada"],
    ]);

    expect(Object.keys(records[0])).toEqual(["__proto__", "name"]);
    expect(JSON.stringify(records)).toBe('[{"__proto__":"x","name":"Ada"}]');
  });

  it("returns no records for a header-only or empty table", () => {
    expect(normalizeCsvRows([["name"]]).records).toEqual([]);
    expect(normalizeCsvRows([]).records).toEqual([]);
  });
});

describe("isRecord", () => {
  it("only accepts plain objects", () => {
    expect(isRecord({})).toBe(true);
    expect(isRecord([])).toBe(false);
    expect(isRecord(null)).toBe(false);
    expect(isRecord("a")).toBe(false);
  });
});
