// Types for the vesting-scheduled minter

/**
 * Newly minted supply of one annual mint event.
 * Each flag flips at most once, after cohort start + 270 / 360 / 450 days.
 */
export interface VestingCohort {
  year: number;                  // year index (unix time / 365 days)
  startTime: number;             // year * 365 days, unix seconds
  totalAmount: bigint;
  nineMonthReleased: boolean;
  twelveMonthReleased: boolean;
  fifteenMonthReleased: boolean;
}

export interface MintSchedule {
  lastYearIndex: number;         // 0 until the first mint
  currentMintFeeBps: number;
  startingMintFeeBps: number;
  decayStepBps: number;
  floorMintFeeBps: number;
}
