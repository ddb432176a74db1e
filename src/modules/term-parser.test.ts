import { describe, it, expect, vi } from "vitest";
import { parseTerms } from "./term-parser";
import { Logger } from "../utils";

const lines = (...rows: string[]) => rows.join("\n");

describe("parseTerms", () => {
  it("reads grade points and credits for a term", () => {
    const { store, issues } = parseTerms(
      lines(
        "Term: Fall Qtr 2025",
        "Term Grade Points: 52.30",
        "Term GPA Credits: 16.00",
      ),
    );

    expect(store.size).toBe(1);
    const term = store.get("Fall Qtr 2025");
    expect(term?.gradePoints).toBe(52.3);
    expect(term?.credits).toBe(16);
    expect(issues).toEqual([]);
  });

  it("attributes lines to the most recent header", () => {
    const { store } = parseTerms(
      lines(
        "Official Transcript",
        "Term: Fall Qtr 2025",
        "CS 101 Intro to Programming 4.00 A",
        "Term Grade Points: 52.30",
        "",
        "Term: Spring Qtr 2025",
        "Term Grade Points: 1,040.00",
        "Term GPA Credits: 12.00",
      ),
    );

    expect(store.inEncounterOrder().map((t) => t.name)).toEqual([
      "Fall Qtr 2025",
      "Spring Qtr 2025",
    ]);
    expect(store.get("Fall Qtr 2025")?.rawLines).toEqual([
      "CS 101 Intro to Programming 4.00 A",
      "Term Grade Points: 52.30",
    ]);
    expect(store.get("Fall Qtr 2025")?.credits).toBeUndefined();
    expect(store.get("Spring Qtr 2025")?.gradePoints).toBe(1040);
  });

  it("recognises every header form", () => {
    const { store } = parseTerms(
      lines(
        "Term: Sum Ses II 2024",
        "Winter   Quarter  2023",
        "term: spring 2022",
        "SUMMER QTR 2021",
      ),
    );

    expect(store.inEncounterOrder().map((t) => t.name)).toEqual([
      "Sum Ses II 2024",
      "Winter Quarter 2023",
      "spring 2022",
      "SUMMER QTR 2021",
    ]);
  });

  it("treats non-breaking spaces as spaces", () => {
    const { store } = parseTerms("Term:\u00a0Fall\u00a0Qtr\u00a02025");
    expect(store.has("Fall Qtr 2025")).toBe(true);
  });

  it("keeps repeated headers as separate terms", () => {
    const { store } = parseTerms(
      lines(
        "Term: Fall Qtr 2025",
        "Term GPA Credits: 4.00",
        "Term: Fall Qtr 2025",
        "Term GPA Credits: 5.00",
        "Term: Fall Qtr 2025",
      ),
    );

    expect(store.inEncounterOrder().map((t) => [t.name, t.credits])).toEqual([
      ["Fall Qtr 2025", 4],
      ["Fall Qtr 2025 (2)", 5],
      ["Fall Qtr 2025 (3)", undefined],
    ]);
  });

  it("ignores value lines before the first header", () => {
    const { store } = parseTerms(
      lines("Term Grade Points: 9.00", "Term GPA Credits: 3.00"),
    );
    expect(store.size).toBe(0);
  });

  it("never reads values from a header line", () => {
    const { store } = parseTerms("Term: Fall Qtr 2025 Term Grade Points: 5.00");
    const term = store.get("Fall Qtr 2025");

    expect(term?.gradePoints).toBeUndefined();
    expect(term?.rawLines).toEqual([]);
  });

  it("splits Windows line endings", () => {
    const { store } = parseTerms(
      "Term: Fall Qtr 2025\r\nTerm GPA Credits: 16.00\r\n",
    );
    expect(store.get("Fall Qtr 2025")?.credits).toBe(16);
  });

  describe("repeated value lines", () => {
    const text = lines(
      "Term: Fall Qtr 2025",
      "Term Grade Points: 10.00",
      "Term Grade Points: 12.00",
    );

    it("keeps the last value by default", () => {
      expect(parseTerms(text).store.get("Fall Qtr 2025")?.gradePoints).toBe(12);
    });

    it("keeps the first value under first-wins", () => {
      const { store } = parseTerms(text, { valuePolicy: "first-wins" });
      expect(store.get("Fall Qtr 2025")?.gradePoints).toBe(10);
    });
  });

  describe("malformed values", () => {
    it("reports the value and leaves the field unset", () => {
      const { store, issues } = parseTerms(
        lines("Term: Fall Qtr 2025", "Term Grade Points: 1.2.3"),
      );

      expect(store.get("Fall Qtr 2025")?.gradePoints).toBeUndefined();
      expect(issues).toEqual([
        {
          term: "Fall Qtr 2025",
          field: "gradePoints",
          value: "1.2.3",
          message: "could not parse grade points '1.2.3' for term Fall Qtr 2025",
        },
      ]);
    });

    it("keeps an earlier good value and carries on", () => {
      const { store, issues } = parseTerms(
        lines(
          "Term: Fall Qtr 2025",
          "Term GPA Credits: 16.00",
          "Term GPA Credits: ,",
          "Term Grade Points: 40.00",
        ),
      );

      const term = store.get("Fall Qtr 2025");
      expect(term?.credits).toBe(16);
      expect(term?.gradePoints).toBe(40);
      expect(issues.map((i) => i.message)).toEqual([
        "could not parse credits '' for term Fall Qtr 2025",
      ]);
    });
  });

  it("echoes candidate lines at debug level", () => {
    const logger = new Logger("debug");
    const debug = vi.spyOn(logger, "debug").mockImplementation(() => {});

    parseTerms(
      lines("Official Transcript", "Term: Fall Qtr 2025", "MATH 2 4.00 B"),
      { logger },
    );

    expect(debug.mock.calls).toEqual([['Line: "Term: Fall Qtr 2025"']]);
  });

  it("stays quiet above debug level", () => {
    const logger = new Logger("info");
    const debug = vi.spyOn(logger, "debug");

    parseTerms("Term: Fall Qtr 2025", { logger });

    expect(debug).not.toHaveBeenCalled();
  });
});
