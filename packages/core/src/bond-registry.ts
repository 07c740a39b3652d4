/**
 * bond-registry.ts
 *
 * Time-locked bonds. Each bond is owned through a certificate issued by the
 * certificate issuer; the registry keeps the lock terms and a single
 * terminal flag:
 *
 *   Open ──withdraw()──▶ Withdrawn
 *
 * deposit()   locks principal, mints the same amount of receipt balance,
 *             issues a certificate and records the maturity-tier
 *             refraction index.
 * withdraw()  after maturity: marks the bond withdrawn, burns the receipt
 *             balance and mints floor(principal * rate / 100) as yield.
 */

import type {
  AssetKind,
  AssetTransferProvider,
  Bond,
  CertificateIssuer,
  DepositRequest,
  Principal,
  RewardIndexSink,
} from "@refract/types";
import {
  DAY_SECONDS,
  MAX_BOND_FEE_BPS,
  MAX_MATURITY_DAYS,
  MIN_MATURITY_DAYS,
  PERCENT_DENOMINATOR,
} from "./constants";
import { ProtocolError } from "./errors";
import { describeAsset, type EventLog } from "./events";
import type { FeeLedger } from "./ledger";
import { createLogger, type Logger } from "./logger";
import type { PermissionTable } from "./permissions";
import type { Runtime, Snapshotable } from "./runtime";
import { formatRefractionIndex, getInterestRate, getRefractionIndex } from "./tiers";

const GUARD = "bond-registry";

interface RegistryState {
  bonds: Map<bigint, Bond>;
  custody: Map<string, bigint>;   // describeAsset(asset) → amount locked
}

export interface BondRegistryCollaborators {
  issuer: CertificateIssuer;
  rewardSink: RewardIndexSink;
  // Transfer providers keyed by external asset id.
  assets: ReadonlyMap<string, AssetTransferProvider>;
}

export class BondRegistry implements Snapshotable<RegistryState> {
  private state: RegistryState = { bonds: new Map(), custody: new Map() };
  private readonly logger: Logger;

  constructor(
    readonly principal: Principal,
    private readonly runtime: Runtime,
    private readonly permissions: PermissionTable,
    private readonly ledger: FeeLedger,
    private readonly events: EventLog,
    private readonly collaborators: BondRegistryCollaborators,
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger("bond-registry");
    runtime.register(this);
  }

  // -----------------------------------------------------------------------
  // Public: deposit
  // -----------------------------------------------------------------------

  /**
   * Lock `request.principal` for `request.maturityDays`. Returns the certificate id.
   * `attached` is the native amount sent with the call; it must equal the
   * principal for native bonds and be zero otherwise.
   */
  deposit(caller: Principal, request: DepositRequest, attached = 0n): bigint {
    return this.runtime.atomic("deposit", () =>
      this.runtime.nonReentrant(GUARD, () => this.openBond(caller, request, attached))
    );
  }

  private openBond(depositor: Principal, request: DepositRequest, attached: bigint): bigint {
    const { principal, maturityDays, bondFeeBps, asset } = request;

    if (principal <= 0n) {
      throw new ProtocolError("InvalidAmount", "principal must be positive");
    }
    if (!Number.isInteger(maturityDays) || maturityDays < MIN_MATURITY_DAYS || maturityDays > MAX_MATURITY_DAYS) {
      throw new ProtocolError("InvalidMaturity", `maturity must be ${MIN_MATURITY_DAYS}..${MAX_MATURITY_DAYS} days, got ${maturityDays}`);
    }
    if (!Number.isInteger(bondFeeBps) || bondFeeBps < 0 || bondFeeBps > MAX_BOND_FEE_BPS) {
      throw new ProtocolError("InvalidFee", `bond fee must be 0..${MAX_BOND_FEE_BPS} bps, got ${bondFeeBps}`);
    }

    this.takeCustody(depositor, principal, asset, attached);
    this.ledger.mint(this.principal, depositor, principal);

    const certificateId = this.collaborators.issuer.issue(depositor);
    if (this.state.bonds.has(certificateId)) {
      throw new ProtocolError("InvalidParameter", `certificate ${certificateId} already backs a bond`);
    }

    const refractionIndex = getRefractionIndex(maturityDays);
    const bond: Bond = {
      certificateId,
      withdrawn: false,
      principal,
      startTime: this.runtime.now(),
      maturityDays,
      asset,
      bondFeeBps,
      refractionIndex,
    };
    this.state.bonds.set(certificateId, bond);

    this.events.emit({
      type: "bond-deposit",
      at: bond.startTime,
      certificateId,
      depositor,
      principal,
      maturityDays,
      bondFeeBps,
      asset,
      refractionIndex,
    });
    this.logger.info(`bond ${certificateId} opened by ${depositor}`, {
      principal,
      maturityDays,
      asset: describeAsset(asset),
      refractionIndex: formatRefractionIndex(refractionIndex),
    });
    return certificateId;
  }

  private takeCustody(depositor: Principal, principal: bigint, asset: AssetKind, attached: bigint): void {
    if (asset.kind === "native") {
      if (attached !== principal) {
        throw new ProtocolError("InvalidAmount", `attached value ${attached} does not match principal ${principal}`);
      }
    } else {
      if (attached !== 0n) {
        throw new ProtocolError("InvalidAmount", "native value attached to an external-asset deposit");
      }
      const provider = this.collaborators.assets.get(asset.assetId);
      if (!provider) {
        throw new ProtocolError("InvalidParameter", `no transfer provider for asset ${asset.assetId}`);
      }
      if (!provider.transferIn(depositor, principal)) {
        throw new ProtocolError("AssetTransferFailed", `could not pull ${principal} ${asset.assetId} from ${depositor}`);
      }
    }

    const key = describeAsset(asset);
    this.state.custody.set(key, (this.state.custody.get(key) ?? 0n) + principal);
  }

  // -----------------------------------------------------------------------
  // Public: withdraw
  // -----------------------------------------------------------------------

  /** Close a matured bond. Returns the yield minted to the caller. */
  withdraw(caller: Principal, certificateId: bigint): bigint {
    return this.runtime.atomic("withdraw", () =>
      this.runtime.nonReentrant(GUARD, () => this.closeBond(caller, certificateId))
    );
  }

  private closeBond(caller: Principal, certificateId: bigint): bigint {
    const bond = this.requireBond(certificateId);
    if (bond.withdrawn) {
      throw new ProtocolError("AlreadyWithdrawn", `bond ${certificateId}`);
    }
    if (this.collaborators.issuer.ownerOf(certificateId) !== caller) {
      throw new ProtocolError("NotOwner", `${caller} does not hold certificate ${certificateId}`);
    }
    const maturesAt = bond.startTime + bond.maturityDays * DAY_SECONDS;
    if (this.runtime.now() < maturesAt) {
      throw new ProtocolError("NotMatured", `bond ${certificateId} matures at ${maturesAt}`);
    }

    // Terminal flag goes first: nothing below may observe an open bond.
    this.state.bonds.set(certificateId, { ...bond, withdrawn: true });

    this.ledger.burn(this.principal, caller, bond.principal);
    const interestRate = getInterestRate(bond.maturityDays);
    const yieldAmount = (bond.principal * BigInt(interestRate)) / PERCENT_DENOMINATOR;
    if (yieldAmount > 0n) {
      this.ledger.mint(this.principal, caller, yieldAmount);
    }

    this.events.emit({
      type: "bond-withdraw",
      at: this.runtime.now(),
      certificateId,
      owner: caller,
      principal: bond.principal,
      interestRate,
      yieldAmount,
    });
    this.logger.info(`bond ${certificateId} withdrawn by ${caller}`, { interestRate, yieldAmount });
    return yieldAmount;
  }

  // -----------------------------------------------------------------------
  // Public: reward index (distributor capability)
  // -----------------------------------------------------------------------

  /**
   * Pull a distributed fee amount out of the treasury on the allowance the
   * distributor granted, then hand it to the reward-index sink. Zero is a no-op.
   */
  epochRewardShareIndex(caller: Principal, amount: bigint): void {
    this.runtime.atomic("epoch-reward-share-index", () => {
      this.permissions.require(caller, "distributor");
      if (amount === 0n) return;
      this.ledger.transferFrom(this.principal, this.ledger.treasury, this.principal, amount);
      this.collaborators.rewardSink.epochRewardShareIndex(amount);
      this.logger.info(`pulled ${amount} distributed fees into the registry`);
    });
  }

  /** Distributed fees held by the registry for bond holders. */
  rewardBalance(): bigint {
    return this.ledger.balanceOf(this.principal);
  }

  // -----------------------------------------------------------------------
  // Read-only
  // -----------------------------------------------------------------------

  getBond(certificateId: bigint): Bond | undefined {
    const bond = this.state.bonds.get(certificateId);
    return bond ? { ...bond } : undefined;
  }

  getBondCount(): number {
    return this.state.bonds.size;
  }

  /** Unix time at which the bond can be withdrawn. */
  maturityTime(certificateId: bigint): number {
    const bond = this.requireBond(certificateId);
    return bond.startTime + bond.maturityDays * DAY_SECONDS;
  }

  isMatured(certificateId: bigint): boolean {
    return this.runtime.now() >= this.maturityTime(certificateId);
  }

  /** Total principal ever locked in `asset`. */
  totalLocked(asset: AssetKind): bigint {
    return this.state.custody.get(describeAsset(asset)) ?? 0n;
  }

  private requireBond(certificateId: bigint): Bond {
    const bond = this.state.bonds.get(certificateId);
    if (!bond) throw new ProtocolError("BondNotFound", `no bond for certificate ${certificateId}`);
    return bond;
  }

  // -----------------------------------------------------------------------
  // Snapshotable
  // -----------------------------------------------------------------------

  snapshot(): RegistryState {
    return { bonds: new Map(this.state.bonds), custody: new Map(this.state.custody) };
  }

  restore(state: RegistryState): void {
    this.state = state;
  }
}
