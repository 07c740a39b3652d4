import { describe, it, expect } from "vitest";
import {
  BASE_INTEREST_RATE,
  formatRefractionIndex,
  getInterestRate,
  getRefractionIndex,
  lookupTier,
} from "@refract/core";

describe("tier tables", () => {
  describe("getInterestRate", () => {
    it.each([
      [365, 15],
      [360, 15],
      [359, 14],
      [320, 14],
      [280, 13],
      [240, 12],
      [200, 11],
      [160, 10],
      [120, 9],
      [80, 8],
      [40, 7],
      [39, 6],
      [7, 6],
    ])("%i days → %i%%", (days, rate) => {
      expect(getInterestRate(days)).toBe(rate);
    });
  });

  describe("getRefractionIndex", () => {
    it.each([
      [365, "46"],
      [360, "46"],
      [180, "28"],
      [90, "19"],
      [60, "16"],
      [30, "13"],
      [20, "12"],
      [15, "11.5"],
      [14, "11"],
      [10, "11"],
      [7, "10.5"],
      [5, "10.5"],
      [4, "10"],
    ])("%i days → %s", (days, index) => {
      expect(formatRefractionIndex(getRefractionIndex(days))).toBe(index);
    });

    it("stores 11.5 as fixed-point 1150", () => {
      expect(getRefractionIndex(15)).toBe(1150n);
    });
  });

  describe("lookupTier", () => {
    it("takes the first threshold reached, in table order", () => {
      const table = [[10, "ten"], [5, "five"]] as const;
      expect(lookupTier<string>(table, 12, "none")).toBe("ten");
      expect(lookupTier<string>(table, 5, "none")).toBe("five");
      expect(lookupTier<string>(table, 4, "none")).toBe("none");
    });

    it("falls back to the base rate below every threshold", () => {
      expect(lookupTier([], 400, BASE_INTEREST_RATE)).toBe(6);
    });
  });
});
