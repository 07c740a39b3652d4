/**
 * vesting-minter.ts
 *
 * Annual supply expansion with tranche vesting.
 *
 *  1. mintAndVest()  (once a year)
 *     Mints floor(totalSupply * currentMintFeeBps / 10000) into the
 *     treasury account and records it as the cohort of the current year.
 *     The rate then decays by one step, never below the floor.
 *
 *  2. claimVested()  (any time)
 *     Releases every tranche whose threshold has passed:
 *       start + 270 days → totalAmount / 3
 *       start + 360 days → totalAmount / 3
 *       start + 450 days → the remainder
 *     Only the cohorts of the tracked year and the current year are checked.
 */

import type { MintSchedule, Principal, VestingCohort } from "@refract/types";
import {
  BPS_DENOMINATOR,
  DAY_SECONDS,
  FIFTEEN_MONTH_DAYS,
  NINE_MONTH_DAYS,
  TWELVE_MONTH_DAYS,
  YEAR_SECONDS,
} from "./constants";
import { ProtocolError } from "./errors";
import type { EventLog } from "./events";
import type { FeeLedger } from "./ledger";
import { createLogger, type Logger } from "./logger";
import type { PermissionTable } from "./permissions";
import type { Runtime, Snapshotable } from "./runtime";

interface MinterState {
  schedule: MintSchedule;
  cohorts: Map<number, VestingCohort>;
}

export interface VestingMinterOptions {
  // Contract principal holding the minter capability on the ledger.
  principal: Principal;
  startingMintFeeBps: number;
  decayStepBps: number;
  floorMintFeeBps: number;
  logger?: Logger;
}

/** Year index of a unix timestamp (fixed 365-day years since the epoch). */
export function yearIndexAt(time: number): number {
  return Math.floor(time / YEAR_SECONDS);
}

/**
 * Tranches of `cohort` that are due at `now` and not yet released.
 * Returns the releasable amount and the cohort with those flags set.
 */
export function dueTranches(cohort: VestingCohort, now: number): { amount: bigint; cohort: VestingCohort } {
  const third = cohort.totalAmount / 3n;
  const reached = (days: number) => now >= cohort.startTime + days * DAY_SECONDS;
  const next = { ...cohort };
  let amount = 0n;

  if (!next.nineMonthReleased && reached(NINE_MONTH_DAYS)) {
    next.nineMonthReleased = true;
    amount += third;
  }
  if (!next.twelveMonthReleased && reached(TWELVE_MONTH_DAYS)) {
    next.twelveMonthReleased = true;
    amount += third;
  }
  if (!next.fifteenMonthReleased && reached(FIFTEEN_MONTH_DAYS)) {
    next.fifteenMonthReleased = true;
    // absorbs the integer-division remainder
    amount += cohort.totalAmount - 2n * third;
  }
  return { amount, cohort: next };
}

export class VestingMinter implements Snapshotable<MinterState> {
  readonly principal: Principal;
  private state: MinterState;
  private readonly logger: Logger;

  constructor(
    private readonly runtime: Runtime,
    private readonly permissions: PermissionTable,
    private readonly ledger: FeeLedger,
    private readonly events: EventLog,
    options: VestingMinterOptions
  ) {
    this.principal = options.principal;
    this.logger = options.logger ?? createLogger("vesting-minter");
    this.state = {
      schedule: {
        lastYearIndex: 0,
        currentMintFeeBps: options.startingMintFeeBps,
        startingMintFeeBps: options.startingMintFeeBps,
        decayStepBps: options.decayStepBps,
        floorMintFeeBps: options.floorMintFeeBps,
      },
      cohorts: new Map(),
    };
    runtime.register(this);
  }

  // -----------------------------------------------------------------------
  // Public: annual mint
  // -----------------------------------------------------------------------

  mintAndVest(caller: Principal): VestingCohort {
    return this.runtime.atomic("mint-and-vest", () => {
      this.permissions.require(caller, "treasury");

      const now = this.runtime.now();
      const schedule = this.state.schedule;
      const unlockAt = schedule.lastYearIndex * YEAR_SECONDS + 365 * DAY_SECONDS;
      if (now < unlockAt) {
        throw new ProtocolError("WaitingTimeNotCompleted", `next mint opens at ${unlockAt}`);
      }

      const year = yearIndexAt(now);
      const mintFeeBps = schedule.currentMintFeeBps;
      const amount = (this.ledger.totalSupply() * BigInt(mintFeeBps)) / BPS_DENOMINATOR;

      const cohort: VestingCohort = {
        year,
        startTime: year * YEAR_SECONDS,
        totalAmount: amount,
        nineMonthReleased: false,
        twelveMonthReleased: false,
        fifteenMonthReleased: false,
      };
      this.state.cohorts.set(year, cohort);
      this.ledger.mint(this.principal, this.ledger.treasury, amount);

      if (mintFeeBps > schedule.floorMintFeeBps) {
        schedule.currentMintFeeBps = Math.max(mintFeeBps - schedule.decayStepBps, schedule.floorMintFeeBps);
      }
      if (schedule.lastYearIndex === 0) {
        schedule.lastYearIndex = year;
      }

      this.events.emit({
        type: "mint-and-vest",
        at: now,
        year,
        amount,
        mintFeeBps,
        nextMintFeeBps: schedule.currentMintFeeBps,
      });
      this.logger.info(`year ${year}: minted ${amount} into vesting at ${mintFeeBps} bps`, {
        nextMintFeeBps: schedule.currentMintFeeBps,
      });
      return { ...cohort };
    });
  }

  // -----------------------------------------------------------------------
  // Public: tranche release
  // -----------------------------------------------------------------------

  /** Release every due tranche to `caller`. Returns the amount released (0n when nothing is due). */
  claimVested(caller: Principal): bigint {
    return this.runtime.atomic("claim-vested", () => {
      this.permissions.require(caller, "treasury");

      const now = this.runtime.now();
      const current = yearIndexAt(now);
      const schedule = this.state.schedule;

      let releasable = 0n;
      for (const year of this.trackedYears(current)) {
        const cohort = this.state.cohorts.get(year);
        if (!cohort) continue;
        const due = dueTranches(cohort, now);
        this.state.cohorts.set(year, due.cohort);
        releasable += due.amount;
      }

      if (schedule.lastYearIndex !== current) {
        schedule.lastYearIndex = current;
      }
      if (releasable > 0n) {
        this.ledger.transfer(this.ledger.treasury, caller, releasable);
      }

      this.events.emit({
        type: "vested-claim",
        at: now,
        claimant: caller,
        amount: releasable,
        lastYearIndex: schedule.lastYearIndex,
      });
      this.logger.info(`released ${releasable} vested to ${caller}`, { lastYearIndex: schedule.lastYearIndex });
      return releasable;
    });
  }

  /** Amount claimVested() would release right now. */
  previewVested(): bigint {
    const now = this.runtime.now();
    let releasable = 0n;
    for (const year of this.trackedYears(yearIndexAt(now))) {
      const cohort = this.state.cohorts.get(year);
      if (cohort) releasable += dueTranches(cohort, now).amount;
    }
    return releasable;
  }

  // Cohorts before lastYearIndex are never revisited.
  private trackedYears(current: number): number[] {
    const tracked = this.state.schedule.lastYearIndex;
    return tracked === current ? [current] : [tracked, current];
  }

  // -----------------------------------------------------------------------
  // Read-only
  // -----------------------------------------------------------------------

  getCohort(year: number): VestingCohort | undefined {
    const cohort = this.state.cohorts.get(year);
    return cohort ? { ...cohort } : undefined;
  }

  getSchedule(): MintSchedule {
    return { ...this.state.schedule };
  }

  currentMintFeeBps(): number {
    return this.state.schedule.currentMintFeeBps;
  }

  // -----------------------------------------------------------------------
  // Snapshotable
  // -----------------------------------------------------------------------

  snapshot(): MinterState {
    return {
      schedule: { ...this.state.schedule },
      cohorts: new Map(this.state.cohorts),
    };
  }

  restore(state: MinterState): void {
    this.state = state;
  }
}
