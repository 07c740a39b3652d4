/**
 * ledger.ts
 *
 * Fee-bearing token ledger.
 *
 * Every transfer between two non-exempt accounts skims
 * floor(amount * refractionFeePercent / 100) into the treasury account and
 * adds it to the fee pool. The pool is only ever drained, in full, by the
 * fee distributor.
 *
 * Invariant: sum(balances) === totalSupply === totalMinted - totalBurned.
 */

import type { Principal, SupplyState } from "@refract/types";
import { MAX_UINT, PERCENT_DENOMINATOR, ZERO_ACCOUNT } from "./constants";
import { ProtocolError } from "./errors";
import type { EventLog } from "./events";
import { createLogger, type Logger } from "./logger";
import type { PermissionTable } from "./permissions";
import type { Runtime, Snapshotable } from "./runtime";

interface LedgerState {
  balances: Map<Principal, bigint>;
  allowances: Map<string, bigint>;
  exempt: Set<Principal>;
  totalSupply: bigint;
  totalMinted: bigint;
  totalBurned: bigint;
  feePool: bigint;
  refractionFeePercent: bigint;
}

export interface LedgerOptions {
  // Token contract principal: holds the fee pool and unvested supply.
  treasury: Principal;
  refractionFeePercent: bigint;
  genesis?: { account: Principal; amount: bigint };
  logger?: Logger;
}

function cloneState(state: LedgerState): LedgerState {
  return {
    ...state,
    balances: new Map(state.balances),
    allowances: new Map(state.allowances),
    exempt: new Set(state.exempt),
  };
}

function allowanceKey(owner: Principal, spender: Principal): string {
  return `${owner}|${spender}`;
}

function requireAmount(amount: bigint): void {
  if (amount < 0n) throw new ProtocolError("InvalidParameter", `negative amount ${amount}`);
}

function requireAccount(account: Principal): void {
  if (account === ZERO_ACCOUNT || account.length === 0) {
    throw new ProtocolError("ZeroAddress");
  }
}

export class FeeLedger implements Snapshotable<LedgerState> {
  readonly treasury: Principal;
  private state: LedgerState;
  private readonly logger: Logger;

  constructor(
    private readonly runtime: Runtime,
    private readonly permissions: PermissionTable,
    private readonly events: EventLog,
    options: LedgerOptions
  ) {
    if (options.refractionFeePercent <= 0n || options.refractionFeePercent > PERCENT_DENOMINATOR) {
      throw new ProtocolError("InvalidParameter", `refraction fee percent ${options.refractionFeePercent}`);
    }
    this.treasury = options.treasury;
    this.logger = options.logger ?? createLogger("ledger");
    this.state = {
      balances: new Map(),
      allowances: new Map(),
      exempt: new Set(),
      totalSupply: 0n,
      totalMinted: 0n,
      totalBurned: 0n,
      feePool: 0n,
      refractionFeePercent: options.refractionFeePercent,
    };
    if (options.genesis && options.genesis.amount > 0n) {
      this.issue(options.genesis.account, options.genesis.amount);
    }
    runtime.register(this);
  }

  // -----------------------------------------------------------------------
  // Transfers
  // -----------------------------------------------------------------------

  /** Move `amount` out of `sender`, skimming the refraction fee when neither side is exempt. */
  transfer(sender: Principal, to: Principal, amount: bigint): void {
    this.runtime.atomic("transfer", () => {
      this.transferWithFee(sender, to, amount);
    });
  }

  approve(owner: Principal, spender: Principal, amount: bigint): void {
    this.runtime.atomic("approve", () => {
      requireAccount(owner);
      requireAccount(spender);
      requireAmount(amount);
      this.state.allowances.set(allowanceKey(owner, spender), amount);
    });
  }

  /** Allowance-based pull; same fee rules as transfer(). */
  transferFrom(spender: Principal, from: Principal, to: Principal, amount: bigint): void {
    this.runtime.atomic("transfer-from", () => {
      requireAmount(amount);
      const key = allowanceKey(from, spender);
      const allowed = this.state.allowances.get(key) ?? 0n;
      if (allowed < amount) {
        throw new ProtocolError("InsufficientAllowance", `${spender} may pull ${allowed} from ${from}, asked ${amount}`);
      }
      this.state.allowances.set(key, allowed - amount);
      this.transferWithFee(from, to, amount);
    });
  }

  private transferWithFee(from: Principal, to: Principal, amount: bigint): void {
    requireAccount(from);
    requireAccount(to);
    requireAmount(amount);

    const balance = this.balanceOf(from);
    if (balance < amount) {
      throw new ProtocolError("InsufficientBalance", `${from} holds ${balance}, needs ${amount}`);
    }

    let fee = 0n;
    if (!this.isFeeExempt(from) && !this.isFeeExempt(to)) {
      fee = (amount * this.state.refractionFeePercent) / PERCENT_DENOMINATOR;
    }

    if (fee > 0n) {
      this.move(from, this.treasury, fee);
      this.state.feePool = saturatingAdd(this.state.feePool, fee);
    }
    this.move(from, to, amount - fee);

    this.events.emit({ type: "transfer", at: this.runtime.now(), from, to, amount, fee });
    this.logger.debug(`transfer ${from} → ${to}`, { amount, fee });
  }

  private move(from: Principal, to: Principal, amount: bigint): void {
    this.state.balances.set(from, this.balanceOf(from) - amount);
    this.state.balances.set(to, this.balanceOf(to) + amount);
  }

  // -----------------------------------------------------------------------
  // Supply (minter capability)
  // -----------------------------------------------------------------------

  mint(caller: Principal, to: Principal, amount: bigint): void {
    this.runtime.atomic("mint", () => {
      this.permissions.require(caller, "minter");
      requireAccount(to);
      requireAmount(amount);
      this.issue(to, amount);
      this.logger.info(`minted ${amount} to ${to}`, { caller });
    });
  }

  burn(caller: Principal, from: Principal, amount: bigint): void {
    this.runtime.atomic("burn", () => {
      this.permissions.require(caller, "minter");
      requireAccount(from);
      requireAmount(amount);

      const balance = this.balanceOf(from);
      if (balance < amount) {
        throw new ProtocolError("InsufficientBalance", `cannot burn ${amount} from ${from} holding ${balance}`);
      }
      this.state.balances.set(from, balance - amount);
      this.state.totalSupply -= amount;
      this.state.totalBurned += amount;

      this.events.emit({ type: "burn", at: this.runtime.now(), account: from, amount });
      this.logger.info(`burned ${amount} from ${from}`, { caller });
    });
  }

  private issue(to: Principal, amount: bigint): void {
    this.state.balances.set(to, this.balanceOf(to) + amount);
    this.state.totalSupply += amount;
    this.state.totalMinted += amount;
    this.events.emit({ type: "mint", at: this.runtime.now(), account: to, amount });
  }

  // -----------------------------------------------------------------------
  // Fee pool (distributor capability)
  // -----------------------------------------------------------------------

  /** Zero the fee pool and return what it held. The units stay in the treasury account. */
  drainFeePool(caller: Principal): bigint {
    return this.runtime.atomic("drain-fee-pool", () => {
      this.permissions.require(caller, "distributor");
      const amount = this.state.feePool;
      this.state.feePool = 0n;
      return amount;
    });
  }

  // -----------------------------------------------------------------------
  // Administration (admin capability)
  // -----------------------------------------------------------------------

  setRefractionFeePercent(caller: Principal, percent: bigint): void {
    this.runtime.atomic("set-refraction-fee-percent", () => {
      this.permissions.require(caller, "admin");
      if (percent <= 0n || percent > PERCENT_DENOMINATOR) {
        throw new ProtocolError("InvalidParameter", `refraction fee percent must be within 1..100, got ${percent}`);
      }
      const previousPercent = this.state.refractionFeePercent;
      this.state.refractionFeePercent = percent;

      this.events.emit({ type: "fee-rate-changed", at: this.runtime.now(), previousPercent, newPercent: percent });
      this.logger.info(`refraction fee ${previousPercent}% → ${percent}%`, { caller });
    });
  }

  setFeeExempt(caller: Principal, account: Principal, exempt: boolean): void {
    this.runtime.atomic("set-fee-exempt", () => {
      this.permissions.require(caller, "admin");
      requireAccount(account);
      if (exempt) {
        this.state.exempt.add(account);
      } else {
        this.state.exempt.delete(account);
      }

      this.events.emit({ type: "exemption-changed", at: this.runtime.now(), account, exempt });
      this.logger.info(`${account} fee exemption ${exempt ? "granted" : "revoked"}`, { caller });
    });
  }

  // -----------------------------------------------------------------------
  // Read-only
  // -----------------------------------------------------------------------

  balanceOf(account: Principal): bigint {
    return this.state.balances.get(account) ?? 0n;
  }

  allowance(owner: Principal, spender: Principal): bigint {
    return this.state.allowances.get(allowanceKey(owner, spender)) ?? 0n;
  }

  isFeeExempt(account: Principal): boolean {
    return this.state.exempt.has(account);
  }

  feePool(): bigint {
    return this.state.feePool;
  }

  refractionFeePercent(): bigint {
    return this.state.refractionFeePercent;
  }

  totalSupply(): bigint {
    return this.state.totalSupply;
  }

  supply(): SupplyState {
    const { totalSupply, totalMinted, totalBurned } = this.state;
    return { totalSupply, totalMinted, totalBurned };
  }

  /** Sum of every balance; equals totalSupply() at all times. */
  sumOfBalances(): bigint {
    let sum = 0n;
    for (const balance of this.state.balances.values()) sum += balance;
    return sum;
  }

  // -----------------------------------------------------------------------
  // Snapshotable
  // -----------------------------------------------------------------------

  snapshot(): LedgerState {
    return cloneState(this.state);
  }

  restore(state: LedgerState): void {
    this.state = state;
  }
}

function saturatingAdd(a: bigint, b: bigint): bigint {
  const sum = a + b;
  return sum > MAX_UINT ? MAX_UINT : sum;
}
