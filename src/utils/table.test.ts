import { describe, expect, it } from "vitest";
import type { BribeReport } from "../types";
import { assemble } from "./table";

const a: BribeReport = { amount: 100, transaction: "Passport", department: "Police" };
const b: BribeReport = { amount: null, transaction: "Khata", department: "Municipal" };
const c: BribeReport = { amount: 100, transaction: "Passport", department: "Police" };

describe("assemble", () => {
  it("concatenates page tables in order without dedup", () => {
    expect(assemble([[a, b], [c]])).toEqual([a, b, c]);
  });

  it("keeps the row objects as they were extracted", () => {
    const combined = assemble([[a], [], [b]]);
    expect(combined[0]).toBe(a);
    expect(combined[1]).toBe(b);
  });

  it("returns an empty table for no pages", () => {
    expect(assemble([])).toEqual([]);
  });
});
