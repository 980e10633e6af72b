// test/mock-report.spec.ts
import { describe, it, expect } from "vitest";
import {
  createSeededRandom,
  generateMockRows,
  parseLineNumbers,
  round2,
  type RandomSource,
} from "../src/services/mock-report.service";
import type { ReportDate } from "../src/utils/types";

const AUG_31: ReportDate = { year: 2019, month: 8, day: 31 };
const JUL_31: ReportDate = { year: 2019, month: 7, day: 31 };

// Replays the given draws in order and counts how many were taken
function scripted(...draws: number[]): RandomSource & { taken: () => number } {
  let i = 0;
  const next = () => draws[i++ % draws.length];
  return Object.assign(next, { taken: () => i });
}

describe("createSeededRandom", () => {
  it("repeats the same sequence for the same seed", () => {
    const a = createSeededRandom(42);
    const b = createSeededRandom(42);
    const first = [a(), a(), a(), a(), a()];
    expect([b(), b(), b(), b(), b()]).toEqual(first);
  });

  it("stays within [0, 1)", () => {
    const random = createSeededRandom(7);
    for (let i = 0; i < 1000; i++) {
      const x = random();
      expect(x).toBeGreaterThanOrEqual(0);
      expect(x).toBeLessThan(1);
    }
  });

  it("differs between seeds", () => {
    expect(createSeededRandom(42)()).not.toBe(createSeededRandom(43)());
  });
});

describe("generateMockRows", () => {
  it("scales the base by the line number and leaves previous fields empty without a previous date", () => {
    const random = scripted(0.5);
    const rows = generateMockRows(
      { reportDate: AUG_31, previousDate: null, lines: [17], country: "SG" },
      random
    );

    // base = 1000 + 4000 * 0.5 = 3000; 3000 * 1.17 = 3510
    expect(rows).toEqual([
      {
        COUNTRY: "SG",
        LINE: 17,
        REPORT_DATE: "31Aug2019",
        PREV_DATE: "",
        VALUE: 3510,
        PREV_VALUE: "",
        DELTA: "",
      },
    ]);
    expect(random.taken()).toBe(1);
  });

  it("derives the previous value and delta when a previous date is given", () => {
    const random = scripted(0.25, 0.75);
    const rows = generateMockRows(
      { reportDate: AUG_31, previousDate: JUL_31, lines: [6], country: "SGP" },
      random
    );

    // base = 2000; value = 2000 * 1.06 = 2120; factor = 0.9 + 0.2 * 0.75 = 1.05
    expect(rows).toEqual([
      {
        COUNTRY: "SGP",
        LINE: 6,
        REPORT_DATE: "31Aug2019",
        PREV_DATE: "31Jul2019",
        VALUE: 2120,
        PREV_VALUE: 2226,
        DELTA: -106,
      },
    ]);
    expect(random.taken()).toBe(2);
  });

  it("draws once per line without a previous date and twice with one", () => {
    const lines = [6, 17, 30];

    const without = scripted(0.1);
    generateMockRows({ reportDate: AUG_31, previousDate: null, lines, country: "SG" }, without);
    expect(without.taken()).toBe(3);

    const withPrev = scripted(0.1);
    generateMockRows({ reportDate: AUG_31, previousDate: JUL_31, lines, country: "SG" }, withPrev);
    expect(withPrev.taken()).toBe(6);
  });

  it("keeps the input order of lines", () => {
    const rows = generateMockRows({
      reportDate: AUG_31,
      previousDate: null,
      lines: [17, 6, 1],
      country: "SG",
    });
    expect(rows.map((r) => r.LINE)).toEqual([17, 6, 1]);
  });

  it("is reproducible with the default seed", () => {
    const params = { reportDate: AUG_31, previousDate: JUL_31, lines: [6, 17], country: "SG" };
    expect(generateMockRows(params)).toEqual(generateMockRows(params));
  });

  it("keeps values in range and rounded to two decimals", () => {
    const rows = generateMockRows({
      reportDate: AUG_31,
      previousDate: JUL_31,
      lines: [1, 6, 17, 40, 99],
      country: "SG",
    });

    for (const row of rows) {
      const scale = 1 + row.LINE / 100;
      expect(row.VALUE).toBeGreaterThanOrEqual(round2(1000 * scale));
      expect(row.VALUE).toBeLessThanOrEqual(round2(5000 * scale));
      expect(Math.round(row.VALUE * 100) / 100).toBe(row.VALUE);

      if (row.PREV_VALUE === "" || row.DELTA === "") throw new Error("expected previous value");
      expect(row.PREV_VALUE).toBeGreaterThanOrEqual(round2(row.VALUE * 0.9) - 0.01);
      expect(row.PREV_VALUE).toBeLessThanOrEqual(round2(row.VALUE * 1.1) + 0.01);
      expect(row.DELTA).toBeCloseTo(row.VALUE - row.PREV_VALUE, 2);
    }
  });
});

describe("parseLineNumbers", () => {
  it("parses signed tokens in order", () => {
    expect(parseLineNumbers("6,+17, -3")).toEqual([6, 17, -3]);
  });
});

describe("round2", () => {
  it("rounds to two decimals", () => {
    expect(round2(1234.5678)).toBe(1234.57);
    expect(round2(-106)).toBe(-106);
  });
});
