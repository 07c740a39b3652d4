import type { AssetTransferProvider, Principal, RewardIndexSink } from "@refract/types";
import {
  createProtocol,
  DEFAULT_CONFIG,
  ManualClock,
  ProtocolError,
  SequentialCertificateIssuer,
  YEAR_SECONDS,
  type ProtocolConfig,
} from "@refract/core";

// Clarinet devnet accounts
export const DEPLOYER = "ST1PQHQKV0RJXZFY1DGX8MNSNYVE3VGZJSRTPGZGM";
export const WALLET_1 = "ST1SJ3DTE5DN7X54YDH5D64R3BCB6A2AG2ZQ8YPD5";
export const WALLET_2 = "ST2CY5V39NHDPWSXMW9QDT3HC3GD6Q6XX4CFRK9AG";
export const WALLET_3 = "ST2JHG361ZXG51QTKY2NQCVBPPRRE2KZB1HR05NNC";

/** Start of year index 56; tests begin exactly on a year boundary. */
export const GENESIS = 56 * YEAR_SECONDS;

// -----------------------------------------------------------------------
// In-process collaborators
// -----------------------------------------------------------------------

export class RecordingRewardSink implements RewardIndexSink {
  readonly received: bigint[] = [];
  onEpoch?: (amount: bigint) => void;

  epochRewardShareIndex(amount: bigint): void {
    this.received.push(amount);
    this.onEpoch?.(amount);
  }
}

/** Token contract stand-in: plain balances, custody held under "custody". */
export class FakeAssetProvider implements AssetTransferProvider {
  readonly balances = new Map<Principal, bigint>();

  constructor(initial: Record<Principal, bigint> = {}) {
    for (const [account, amount] of Object.entries(initial)) this.balances.set(account, amount);
  }

  transferIn(from: Principal, amount: bigint): boolean {
    return this.move(from, "custody", amount);
  }

  transferOut(to: Principal, amount: bigint): boolean {
    return this.move("custody", to, amount);
  }

  balanceOf(account: Principal): bigint {
    return this.balances.get(account) ?? 0n;
  }

  private move(from: Principal, to: Principal, amount: bigint): boolean {
    const balance = this.balanceOf(from);
    if (balance < amount) return false;
    this.balances.set(from, balance - amount);
    this.balances.set(to, this.balanceOf(to) + amount);
    return true;
  }
}

// -----------------------------------------------------------------------
// Harness
// -----------------------------------------------------------------------

export interface SetupOptions {
  config?: Partial<ProtocolConfig>;
  assets?: ReadonlyMap<string, AssetTransferProvider>;
}

/** Fresh protocol at GENESIS with the default 5 % refraction fee and no supply. */
export function setup(options: SetupOptions = {}) {
  const clock = new ManualClock(GENESIS);
  const sink = new RecordingRewardSink();
  const certificates = new SequentialCertificateIssuer();
  const protocol = createProtocol({
    clock,
    rewardSink: sink,
    issuer: certificates,
    assets: options.assets,
    config: { ...DEFAULT_CONFIG, ...options.config },
  });

  /** Credit `amount` without a transfer fee, as the vesting-minter contract. */
  const fund = (account: Principal, amount: bigint) =>
    protocol.ledger.mint(protocol.principals.vestingMinter, account, amount);

  return { ...protocol, clock, sink, certificates, fund };
}

/** Run `fn`, expecting it to throw a ProtocolError; returns that error. */
export function errorOf(fn: () => unknown): ProtocolError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ProtocolError) return err;
    throw err;
  }
  throw new Error("expected the call to fail");
}
