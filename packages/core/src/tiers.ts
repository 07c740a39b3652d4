/**
 * tiers.ts
 *
 * Maturity-tier lookups. Each table is an ordered list of
 * (minimum maturity in days, value) pairs; the first pair whose threshold
 * the maturity reaches wins, otherwise the fallback applies.
 */

import type { RefractionIndex } from "@refract/types";
import { REFRACTION_INDEX_SCALE } from "./constants";

export type TierTable<T> = ReadonlyArray<readonly [minDays: number, value: T]>;

/** Annual interest, in percent of principal, paid at withdrawal. */
export const INTEREST_RATE_TIERS: TierTable<number> = [
  [360, 15],
  [320, 14],
  [280, 13],
  [240, 12],
  [200, 11],
  [160, 10],
  [120, 9],
  [80, 8],
  [40, 7],
];
export const BASE_INTEREST_RATE = 6;

/** Refraction index, fixed-point × REFRACTION_INDEX_SCALE. */
export const REFRACTION_INDEX_TIERS: TierTable<RefractionIndex> = [
  [360, 4600n],
  [180, 2800n],
  [90, 1900n],
  [60, 1600n],
  [30, 1300n],
  [20, 1200n],
  [15, 1150n],
  [10, 1100n],
  [5, 1050n],
];
export const BASE_REFRACTION_INDEX: RefractionIndex = 1000n;

export function lookupTier<T>(table: TierTable<T>, maturityDays: number, fallback: T): T {
  for (const [minDays, value] of table) {
    if (maturityDays >= minDays) return value;
  }
  return fallback;
}

export function getInterestRate(maturityDays: number): number {
  return lookupTier(INTEREST_RATE_TIERS, maturityDays, BASE_INTEREST_RATE);
}

export function getRefractionIndex(maturityDays: number): RefractionIndex {
  return lookupTier(REFRACTION_INDEX_TIERS, maturityDays, BASE_REFRACTION_INDEX);
}

/** 1150n → "11.5", 4600n → "46" */
export function formatRefractionIndex(index: RefractionIndex): string {
  const whole = index / REFRACTION_INDEX_SCALE;
  const fraction = index % REFRACTION_INDEX_SCALE;
  if (fraction === 0n) return whole.toString();
  const digits = fraction.toString().padStart(REFRACTION_INDEX_SCALE.toString().length - 1, "0");
  return `${whole}.${digits.replace(/0+$/, "")}`;
}
