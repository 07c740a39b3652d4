// Protocol constants. Time is unix seconds; amounts are token base units.

export const DAY_SECONDS = 86_400;

/** Fixed 365-day year. Not calendar-adjusted. */
export const YEAR_SECONDS = 31_536_000;

// Tranche thresholds, in days after a cohort starts
export const NINE_MONTH_DAYS    = 270;
export const TWELVE_MONTH_DAYS  = 360;
export const FIFTEEN_MONTH_DAYS = 450;

// Bond terms
export const MIN_MATURITY_DAYS = 7;
export const MAX_MATURITY_DAYS = 365;
export const MAX_BOND_FEE_BPS  = 100;

export const BPS_DENOMINATOR = 10_000n;
export const PERCENT_DENOMINATOR = 100n;

/** Refraction index fixed-point scale: 2 decimals. */
export const REFRACTION_INDEX_SCALE = 100n;

/** Clarity uint ceiling; the fee pool saturates here. */
export const MAX_UINT = (1n << 128n) - 1n;

/** Null identifier. Mints to it are rejected. */
export const ZERO_ACCOUNT = "SP000000000000000000002Q6VF78";

export const CONTRACT_NAMES = {
  token:          "refract-token",
  bondRegistry:   "bond-registry",
  vestingMinter:  "vesting-minter",
  feeDistributor: "fee-distributor",
} as const;
