// Records emitted by every state transition, in emission order.

import type { AssetKind } from "./bond";
import type { Principal } from "./ledger";

interface EventBase {
  at: number;                    // block time, unix seconds
}

export interface TransferEvent extends EventBase {
  type: "transfer";
  from: Principal;
  to: Principal;
  amount: bigint;                // debited from `from`
  fee: bigint;                   // skimmed into the fee pool
}

export interface SupplyEvent extends EventBase {
  type: "mint" | "burn";
  account: Principal;
  amount: bigint;
}

export interface BondDepositEvent extends EventBase {
  type: "bond-deposit";
  certificateId: bigint;
  depositor: Principal;
  principal: bigint;
  maturityDays: number;
  bondFeeBps: number;
  asset: AssetKind;
  refractionIndex: bigint;
}

export interface BondWithdrawEvent extends EventBase {
  type: "bond-withdraw";
  certificateId: bigint;
  owner: Principal;
  principal: bigint;
  interestRate: number;
  yieldAmount: bigint;
}

export interface FeeDistributionEvent extends EventBase {
  type: "fee-distribution";
  amount: bigint;
  recipient: Principal;          // principal authorized to pull the fees
}

export interface MintAndVestEvent extends EventBase {
  type: "mint-and-vest";
  year: number;
  amount: bigint;
  mintFeeBps: number;            // rate applied to this mint
  nextMintFeeBps: number;
}

export interface VestedClaimEvent extends EventBase {
  type: "vested-claim";
  claimant: Principal;
  amount: bigint;
  lastYearIndex: number;
}

export interface FeeRateChangedEvent extends EventBase {
  type: "fee-rate-changed";
  previousPercent: bigint;
  newPercent: bigint;
}

export interface ExemptionChangedEvent extends EventBase {
  type: "exemption-changed";
  account: Principal;
  exempt: boolean;
}

export type ProtocolEvent =
  | TransferEvent
  | SupplyEvent
  | BondDepositEvent
  | BondWithdrawEvent
  | FeeDistributionEvent
  | MintAndVestEvent
  | VestedClaimEvent
  | FeeRateChangedEvent
  | ExemptionChangedEvent;

export type ProtocolEventType = ProtocolEvent["type"];
