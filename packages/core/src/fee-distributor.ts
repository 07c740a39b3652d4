/**
 * fee-distributor.ts
 *
 * One epoch = one call to distributeRefractionFees(): the fee pool is
 * drained, the bond registry is approved for the drained amount and pulls
 * it out of the treasury account, then its reward-index update runs with
 * that amount. Epochs are triggered on demand, not on a clock.
 */

import type { Principal } from "@refract/types";
import type { BondRegistry } from "./bond-registry";
import { ProtocolError } from "./errors";
import type { EventLog } from "./events";
import type { FeeLedger } from "./ledger";
import { createLogger, type Logger } from "./logger";
import type { PermissionTable } from "./permissions";
import type { Runtime, Snapshotable } from "./runtime";

interface DistributorState {
  lastEpochTime: number;
}

export class FeeDistributor implements Snapshotable<DistributorState> {
  private state: DistributorState = { lastEpochTime: 0 };
  private readonly logger: Logger;

  constructor(
    readonly principal: Principal,
    private readonly runtime: Runtime,
    private readonly permissions: PermissionTable,
    private readonly ledger: FeeLedger,
    private readonly registry: BondRegistry,
    private readonly events: EventLog,
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger("fee-distributor");
    runtime.register(this);
  }

  /** Distribute the whole fee pool. Returns the amount handed to the registry. */
  distributeRefractionFees(caller: Principal): bigint {
    return this.runtime.atomic("distribute-refraction-fees", () => {
      this.permissions.require(caller, "distributor");
      if (this.ledger.feePool() === 0n) {
        throw new ProtocolError("NoFeesToDistribute");
      }

      const amount = this.ledger.drainFeePool(this.principal);
      const now = this.runtime.now();
      this.state.lastEpochTime = now;

      this.ledger.approve(this.ledger.treasury, this.registry.principal, amount);
      this.registry.epochRewardShareIndex(this.principal, amount);

      this.events.emit({ type: "fee-distribution", at: now, amount, recipient: this.registry.principal });
      this.logger.info(`epoch distributed ${amount} refraction fees`, { caller });
      return amount;
    });
  }

  lastEpochTime(): number {
    return this.state.lastEpochTime;
  }

  snapshot(): DistributorState {
    return { ...this.state };
  }

  restore(state: DistributorState): void {
    this.state = state;
  }
}
