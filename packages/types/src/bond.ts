// Types for the bond registry (per-bond, certificate-based time locks)

/**
 * Asset locked behind a bond.
 *
 *   - native:   value attached to the deposit call
 *   - external: pulled into custody through the asset's transfer provider
 */
export type AssetKind =
  | { kind: "native" }
  | { kind: "external"; assetId: string };

/**
 * Refraction index as a fixed-point integer, scaled by REFRACTION_INDEX_SCALE
 * (11.5 is stored as 1150n).
 */
export type RefractionIndex = bigint;

/**
 * An individual bond created by a deposit.
 *
 * Ownership lives with the certificate issuer; the registry only keeps
 * the lock terms and the terminal `withdrawn` flag.
 */
export interface Bond {
  certificateId: bigint;
  withdrawn: boolean;              // false → true exactly once
  principal: bigint;               // locked amount, also minted 1:1 as receipt balance
  startTime: number;               // unix seconds at deposit
  maturityDays: number;            // 7 ..= 365
  asset: AssetKind;
  bondFeeBps: number;              // 0 ..= 100
  refractionIndex: RefractionIndex;
}

/** Arguments of a deposit, as supplied by the depositor. */
export interface DepositRequest {
  principal: bigint;
  maturityDays: number;
  bondFeeBps: number;
  asset: AssetKind;
}
